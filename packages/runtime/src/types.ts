// @session-relay/runtime - Types and configuration interfaces

import type { LruCache } from '@session-relay/core'
import type { AuthFetchResult, Outcome, RelayRequestMetadata } from '@session-relay/policy'
import type { IdTokenVerifier } from './id-token-verifier.js'
import type { Logger } from './logger.js'

// ============================================================
// Relay Configuration
// ============================================================

/** Looks up a session on the auth server (usually `AuthServerClient.fetchAuthData`) */
export type FetchAuthData = (sessionId: string) => Promise<AuthFetchResult>

/**
 * Configuration for `createRelay`.
 *
 * @example
 * ```typescript
 * const relay = createRelay({
 *   fetchAuthData: (sessionId) => client.fetchAuthData(sessionId),
 *   verifyIdToken: createIdTokenVerifier({ audience: 'my-client-id.apps.example.com' }),
 * })
 * const outcome = await relay.resolve({ sessionId: 'abc123', tokenType: null })
 * ```
 */
export interface RelayConfig {
  // ---- Collaborators ----

  /** Auth server lookup; its results are cached per session id */
  readonly fetchAuthData: FetchAuthData

  /** Identity token verifier */
  readonly verifyIdToken: IdTokenVerifier

  // ---- Cache ----

  /** Maximum number of cached sessions (default: 128) */
  readonly cacheMaxSize?: number | undefined

  /** Lifetime of a cached session in milliseconds (default: none) */
  readonly cacheTtlMs?: number | undefined

  // ---- Responses ----

  /** Status sent with REJECTED_REQUEST (default: 200) */
  readonly rejectedRequestStatus?: number | undefined

  // ---- Request Extraction ----

  /** Cookie carrying the session id (default: 'session_id') */
  readonly sessionCookieName?: string | undefined

  /** Query parameter naming the token type (default: 'token_type') */
  readonly tokenTypeParam?: string | undefined

  readonly logger?: Logger | undefined
}

/**
 * Fully resolved configuration with all defaults applied.
 * Exposed as `relay.config`.
 */
export interface ResolvedRelayConfig {
  readonly cacheMaxSize: number
  readonly cacheTtlMs: number | undefined
  readonly rejectedRequestStatus: number
  readonly sessionCookieName: string
  readonly tokenTypeParam: string
}

// ============================================================
// Relay Instance
// ============================================================

/** Cache of auth server answers, keyed by session id */
export type SessionCache = LruCache<[sessionId: string], AuthFetchResult>

/**
 * The relay. Created by `createRelay(config)`.
 */
export interface Relay {
  /**
   * Resolves one request to exactly one outcome. Never throws for input,
   * auth server or verification failures; they become rejections.
   */
  resolve(metadata: RelayRequestMetadata): Promise<Outcome>

  /** Session cache; may be pre-populated or invalidated */
  readonly cache: SessionCache

  /** Resolved configuration (read-only) */
  readonly config: ResolvedRelayConfig
}

// ============================================================
// Adapter Options
// ============================================================

/** Options shared by the HTTP adapters */
export interface HandlerOptions {
  /** Logger for unexpected adapter failures (default: silent) */
  readonly logger?: Logger | undefined
}
