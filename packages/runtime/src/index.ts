// @session-relay/runtime - Public API surface
// Auth server client, token resolver, configuration and response shaping

// ============================================================
// Types
// ============================================================

export type {
  FetchAuthData,
  RelayConfig,
  ResolvedRelayConfig,
  Relay,
  SessionCache,
  HandlerOptions,
} from './types.js'

export type { AuthServerClient, AuthServerClientConfig } from './auth-server-client.js'
export type { IdTokenVerifier, IdTokenVerifierConfig } from './id-token-verifier.js'
export type { KeyMaterial, KeyMaterialPems, KeyMaterialPaths } from './key-material.js'
export type { RelayEnv } from './config.js'
export type { RelayBootstrapOverrides } from './bootstrap.js'
export type { OutcomeResponse } from './error-response.js'
export type { HeaderGetter } from './extract-request.js'
export type { Logger, LoggerOptions, LevelWithSilent } from './logger.js'
export type { AuthServerErrorKind } from './errors.js'

// ============================================================
// Relay
// ============================================================

export { createRelay } from './relay.js'

export { createRelayFromEnv } from './bootstrap.js'

// ============================================================
// Auth Server
// ============================================================

export {
  createAuthServerClient,
  DEFAULT_AUTH_SERVER_PATH,
  DEFAULT_REJECTED_STATUSES,
} from './auth-server-client.js'

export { packEnvelope, unpackEnvelope, ENVELOPE_CONTENT_TYPE } from './envelope-archive.js'

export { importKeyMaterial, loadKeyMaterial } from './key-material.js'

// ============================================================
// Identity Token
// ============================================================

export {
  createIdTokenVerifier,
  DEFAULT_ID_TOKEN_ISSUERS,
  DEFAULT_JWKS_URL,
} from './id-token-verifier.js'

// ============================================================
// Configuration / Logging
// ============================================================

export { loadRelayEnv, DEFAULT_AUTH_SERVER_TIMEOUT_MS } from './config.js'

export { createLogger, createSilentLogger } from './logger.js'

// ============================================================
// Responses / Request Extraction
// ============================================================

export { createOutcomeResponse, createUnexpectedErrorResponse } from './error-response.js'

export { extractRelayMetadata, readCookie, readQueryParam } from './extract-request.js'

// ============================================================
// Errors
// ============================================================

export { AuthServerError, IdTokenExpiredError, ConfigError } from './errors.js'
