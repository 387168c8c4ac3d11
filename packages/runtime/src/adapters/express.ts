// @session-relay/runtime - Express handler adapter

import type { Relay, HandlerOptions } from '../types.js'
import { extractRelayMetadata } from '../extract-request.js'
import type { HeaderGetter } from '../extract-request.js'
import { createOutcomeResponse } from '../error-response.js'
import { createSilentLogger } from '../logger.js'

// ============================================================
// Minimal Express-Compatible Types
// ============================================================

/**
 * Minimal Express-compatible request interface.
 * Structurally compatible with `express.Request`.
 */
export interface ExpressLikeRequest {
  readonly originalUrl: string
  readonly headers: Readonly<Record<string, string | string[] | undefined>>
}

/**
 * Minimal Express-compatible response interface.
 * Structurally compatible with `express.Response`.
 */
export interface ExpressLikeResponse {
  status(code: number): ExpressLikeResponse
  setHeader(name: string, value: string): ExpressLikeResponse
  send(body: string): ExpressLikeResponse
}

/** Express-compatible next function */
export type ExpressNextFunction = (err?: unknown) => void

/** Express handler signature */
export type ExpressHandler = (
  req: ExpressLikeRequest,
  res: ExpressLikeResponse,
  next: ExpressNextFunction,
) => void

// ============================================================
// Header Getter for Express
// ============================================================

function createExpressHeaderGetter(
  headers: Readonly<Record<string, string | string[] | undefined>>,
): HeaderGetter {
  return (name: string): string | null => {
    const value = headers[name.toLowerCase()]
    if (typeof value === 'string') return value
    if (Array.isArray(value)) return value[0] ?? null
    return null
  }
}

// ============================================================
// Express Handler Factory
// ============================================================

/**
 * Creates an Express route handler that answers with the relay's outcome.
 *
 * Reads the session id from the configured cookie and the token type from
 * the configured query parameter. Errors thrown by the relay itself go to
 * `next(err)`.
 *
 * @example
 * ```typescript
 * import express from 'express'
 * import { createRelayFromEnv } from '@session-relay/runtime'
 * import { createExpressHandler } from '@session-relay/runtime/express'
 *
 * const relay = await createRelayFromEnv()
 * const app = express()
 * app.get('/token', createExpressHandler(relay))
 * ```
 */
export function createExpressHandler(relay: Relay, options?: HandlerOptions): ExpressHandler {
  const logger = options?.logger ?? createSilentLogger()

  // Express handlers must NOT be async; errors are caught and forwarded to next()
  return (req, res, next) => {
    handleRequest(relay, req, res).catch((error: unknown) => {
      logger.error({ event: 'relay:handler-failed', err: error })
      next(error)
    })
  }
}

/**
 * Internal async handler for Express requests.
 */
async function handleRequest(
  relay: Relay,
  req: ExpressLikeRequest,
  res: ExpressLikeResponse,
): Promise<void> {
  const metadata = extractRelayMetadata(
    createExpressHeaderGetter(req.headers),
    req.originalUrl,
    relay.config,
  )

  const response = createOutcomeResponse(await relay.resolve(metadata))
  for (const [key, value] of Object.entries(response.headers)) {
    res.setHeader(key, value)
  }
  res.status(response.status).send(response.body)
}
