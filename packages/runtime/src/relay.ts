// @session-relay/runtime - Token resolver (orchestration layer)

import { createLruCache, DEFAULT_CACHE_MAX_SIZE } from '@session-relay/core'
import {
  checkSessionId,
  evaluateFetchResult,
  evaluateVerification,
  rejection,
  selectTokenField,
  shortenSessionId,
  DEFAULT_REJECTED_REQUEST_STATUS,
  DEFAULT_SESSION_COOKIE_NAME,
  DEFAULT_TOKEN_TYPE_PARAM,
  SERVER_ERROR_STATUS,
} from '@session-relay/policy'
import type {
  AuthData,
  AuthFetchResult,
  Outcome,
  Rejection,
  RelayRequestMetadata,
  VerificationResult,
} from '@session-relay/policy'
import { createSilentLogger } from './logger.js'
import type { IdTokenVerifier } from './id-token-verifier.js'
import type { Relay, RelayConfig, ResolvedRelayConfig, SessionCache } from './types.js'

// ============================================================
// Configuration Resolution
// ============================================================

/**
 * Resolves user config with defaults applied.
 *
 * @throws {RangeError} If `rejectedRequestStatus` is not an HTTP status
 */
function resolveConfig(config: RelayConfig): ResolvedRelayConfig {
  const rejectedRequestStatus = config.rejectedRequestStatus ?? DEFAULT_REJECTED_REQUEST_STATUS
  if (!Number.isInteger(rejectedRequestStatus) || rejectedRequestStatus < 100 || rejectedRequestStatus > 599) {
    throw new RangeError(
      `rejectedRequestStatus must be an HTTP status, got ${String(rejectedRequestStatus)}`,
    )
  }

  return {
    cacheMaxSize: config.cacheMaxSize ?? DEFAULT_CACHE_MAX_SIZE,
    cacheTtlMs: config.cacheTtlMs,
    rejectedRequestStatus,
    sessionCookieName: config.sessionCookieName ?? DEFAULT_SESSION_COOKIE_NAME,
    tokenTypeParam: config.tokenTypeParam ?? DEFAULT_TOKEN_TYPE_PARAM,
  }
}

/**
 * Runs the verifier and captures the result as data.
 * A missing id token counts as a verification failure.
 */
async function verifyAuthData(
  authData: AuthData,
  verifyIdToken: IdTokenVerifier,
): Promise<VerificationResult> {
  const idToken = authData.id_token
  if (idToken === undefined) {
    return { verified: false, error: new Error('Auth data has no id_token') }
  }
  try {
    return { verified: true, claims: await verifyIdToken(idToken) }
  } catch (error) {
    return { verified: false, error }
  }
}

// ============================================================
// createRelay
// ============================================================

/**
 * Creates a relay.
 *
 * `resolve` evaluates in strict order, stopping at the first rejection:
 *
 * 1. Session id format → 200 BAD_SESSION_ID
 * 2. Cached / fetched auth data → REJECTED_REQUEST (configured status), or
 *    500 UNKNOWN when the lookup throws
 * 3. Id token verification → 200 TOKEN_EXPIRED, 500 UNKNOWN, 500 BAD_EMAIL
 * 4. Token field selection → 500 unsupported type, 500 UNKNOWN
 * 5. Success
 *
 * Auth server answers (including "unknown session") are cached; thrown
 * failures are not.
 *
 * @throws {RangeError} On an invalid cache size, TTL or status
 */
export function createRelay(config: RelayConfig): Relay {
  const resolved = resolveConfig(config)
  const logger = config.logger ?? createSilentLogger()
  const { fetchAuthData, verifyIdToken } = config

  const cache: SessionCache = createLruCache(
    (sessionId: string): Promise<AuthFetchResult> => fetchAuthData(sessionId),
    {
      maxSize: resolved.cacheMaxSize,
      ttlMs: resolved.cacheTtlMs,
      keyOf: ([sessionId]) => sessionId,
    },
  )

  function reject(outcome: Rejection, session: string | null, error?: unknown): Rejection {
    const fields = { event: 'relay:rejected', session, status: outcome.status, reason: outcome.reason }
    if (error === undefined) {
      logger.info(fields)
    } else {
      logger.warn({ ...fields, err: error })
    }
    return outcome
  }

  return {
    async resolve(metadata: RelayRequestMetadata): Promise<Outcome> {
      // Step 1: Session id
      const sessionCheck = checkSessionId(metadata.sessionId)
      if (!sessionCheck.allowed) {
        return reject(sessionCheck.rejection, null)
      }
      const sessionId = sessionCheck.value
      const session = shortenSessionId(sessionId)

      // Step 2: Auth data (cache, then auth server)
      let fetched: AuthFetchResult
      try {
        fetched = await cache.get(sessionId)
      } catch (error) {
        return reject(rejection(SERVER_ERROR_STATUS, 'UNKNOWN'), session, error)
      }

      const dataCheck = evaluateFetchResult(fetched, resolved.rejectedRequestStatus)
      if (!dataCheck.allowed) {
        return reject(dataCheck.rejection, session)
      }
      const authData = dataCheck.value

      // Step 3: Claims
      const verification = await verifyAuthData(authData, verifyIdToken)
      const claimsCheck = evaluateVerification(verification)
      if (!claimsCheck.allowed) {
        return reject(
          claimsCheck.rejection,
          session,
          verification.verified ? undefined : verification.error,
        )
      }

      // Step 4: Field selection
      const outcome = selectTokenField(authData, metadata.tokenType)
      if (outcome.kind === 'rejection') {
        return reject(outcome, session)
      }

      logger.info({ event: 'relay:resolved', session, field: outcome.field })
      return outcome
    },

    cache,
    config: resolved,
  }
}
