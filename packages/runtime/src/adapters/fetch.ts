// @session-relay/runtime - Native Fetch adapter (Node 20 http servers, edge runtimes)

import type { Relay, HandlerOptions } from '../types.js'
import { extractRelayMetadata } from '../extract-request.js'
import type { HeaderGetter } from '../extract-request.js'
import { createOutcomeResponse, createUnexpectedErrorResponse } from '../error-response.js'
import type { OutcomeResponse } from '../error-response.js'
import { createSilentLogger } from '../logger.js'

// ============================================================
// Types
// ============================================================

/** A handler that processes a Request and returns a Response */
export type FetchHandler = (request: Request) => Promise<Response>

// ============================================================
// Header Getter for Fetch API
// ============================================================

function createFetchHeaderGetter(headers: Headers): HeaderGetter {
  return (name: string): string | null => {
    return headers.get(name.toLowerCase())
  }
}

function toResponse(response: OutcomeResponse): Response {
  return new Response(response.body, {
    status: response.status,
    headers: response.headers,
  })
}

// ============================================================
// Fetch Handler Factory
// ============================================================

/**
 * Creates a Fetch API handler that answers with the relay's outcome.
 *
 * Unexpected errors thrown by the relay itself become `500 UNKNOWN`; the
 * detail is logged, never sent.
 *
 * @example
 * ```typescript
 * import { createRelayFromEnv } from '@session-relay/runtime'
 * import { createFetchHandler } from '@session-relay/runtime/fetch'
 *
 * const relay = await createRelayFromEnv()
 * const handler = createFetchHandler(relay)
 * const response = await handler(new Request('https://relay.example.com/token'))
 * ```
 */
export function createFetchHandler(relay: Relay, options?: HandlerOptions): FetchHandler {
  const logger = options?.logger ?? createSilentLogger()

  return async (request: Request): Promise<Response> => {
    const metadata = extractRelayMetadata(
      createFetchHeaderGetter(request.headers),
      request.url,
      relay.config,
    )

    try {
      return toResponse(createOutcomeResponse(await relay.resolve(metadata)))
    } catch (error) {
      logger.error({ event: 'relay:handler-failed', err: error })
      return toResponse(createUnexpectedErrorResponse())
    }
  }
}
