// @session-relay/runtime - Outcome responses

import { rejection, rejectionBody, SERVER_ERROR_STATUS } from '@session-relay/policy'
import type { Outcome } from '@session-relay/policy'

/**
 * Framework-agnostic HTTP response for an outcome.
 * Adapters write it as-is.
 */
export interface OutcomeResponse {
  readonly status: number
  readonly body: string
  readonly headers: Readonly<Record<string, string>>
}

const TEXT_HEADERS = { 'content-type': 'text/plain; charset=utf-8', 'cache-control': 'no-store' }
const JSON_HEADERS = { 'content-type': 'application/json', 'cache-control': 'no-store' }

/**
 * Shapes an outcome into a response.
 *
 * - success → 200, the bare token as `text/plain`
 * - rejection → its status, `{"status":"BLOCKED","reason":...}`
 *
 * Both carry `cache-control: no-store`.
 */
export function createOutcomeResponse(outcome: Outcome): OutcomeResponse {
  if (outcome.kind === 'success') {
    return { status: 200, body: outcome.value, headers: TEXT_HEADERS }
  }
  return { status: outcome.status, body: rejectionBody(outcome), headers: JSON_HEADERS }
}

/**
 * Response used when the relay itself fails unexpectedly.
 * Internal detail stays in the logs.
 */
export function createUnexpectedErrorResponse(): OutcomeResponse {
  return createOutcomeResponse(rejection(SERVER_ERROR_STATUS, 'UNKNOWN'))
}
