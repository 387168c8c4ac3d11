// @session-relay/policy - Outcome constructors

import type { Rejection, RejectionReason, Success, TokenType } from './types.js'

/** Body marker carried by every rejection */
export const BLOCKED = 'BLOCKED'

/** Builds a success outcome. */
export function success(field: TokenType, value: string): Success {
  return { kind: 'success', field, value }
}

/** Builds a rejection outcome. */
export function rejection(status: number, reason: RejectionReason): Rejection {
  return { kind: 'rejection', status, reason }
}

/**
 * JSON body sent with a rejection.
 *
 * @example
 * ```typescript
 * rejectionBody(rejection(200, 'BAD_SESSION_ID'))
 * // '{"status":"BLOCKED","reason":"BAD_SESSION_ID"}'
 * ```
 */
export function rejectionBody(outcome: Rejection): string {
  return JSON.stringify({ status: BLOCKED, reason: outcome.reason })
}
