// @session-relay/policy - Public API surface
// Pure resolution rules: session id, claims, token field selection, outcomes

// ============================================================
// Types
// ============================================================

export type {
  TokenType,
  RelayRequestMetadata,
  AuthData,
  AuthFetchResult,
  IdTokenClaims,
  RejectionCode,
  RejectionReason,
  UnsupportedTokenTypeReason,
  Success,
  Rejection,
  Outcome,
  RuleResult,
} from './types.js'

export type { VerificationResult } from './claims.js'

// ============================================================
// Constants
// ============================================================

export {
  SUPPORTED_TOKEN_TYPES,
  DEFAULT_TOKEN_TYPE,
  DEFAULT_SESSION_COOKIE_NAME,
  DEFAULT_TOKEN_TYPE_PARAM,
  MAX_SESSION_ID_LENGTH,
  BAD_SESSION_ID_STATUS,
  DEFAULT_REJECTED_REQUEST_STATUS,
  TOKEN_EXPIRED_STATUS,
  SERVER_ERROR_STATUS,
} from './types.js'

// ============================================================
// Outcomes
// ============================================================

export { BLOCKED, success, rejection, rejectionBody } from './outcome.js'

// ============================================================
// Session Id
// ============================================================

export { isValidSessionId, checkSessionId, shortenSessionId } from './session-id.js'

// ============================================================
// Auth Data / Claims
// ============================================================

export {
  evaluateFetchResult,
  evaluateVerification,
  isExpiredError,
  isEmailVerified,
} from './claims.js'

// ============================================================
// Token Field Selection
// ============================================================

export { isSupportedTokenType, unsupportedTokenTypeReason, selectTokenField } from './token-type.js'
