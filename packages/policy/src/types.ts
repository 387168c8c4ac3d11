// @session-relay/policy - Types and constants

// ============================================================
// Token Types
// ============================================================

/** Fields of the auth data a caller may ask for */
export type TokenType = 'access_token' | 'id_token' | 'email'

/** Supported token types, in the order they are listed to callers */
export const SUPPORTED_TOKEN_TYPES: readonly TokenType[] = ['access_token', 'id_token', 'email']

/** Token type used when the request names none */
export const DEFAULT_TOKEN_TYPE: TokenType = 'id_token'

// ============================================================
// Request Metadata (normalized, framework-agnostic)
// ============================================================

/**
 * What the relay needs from an inbound request.
 *
 * A plain object, not a framework request. The runtime adapters extract it
 * from Express / Fetch requests.
 */
export interface RelayRequestMetadata {
  /** Session cookie value, or null if absent */
  readonly sessionId: string | null

  /** `token_type` query parameter, or null if absent */
  readonly tokenType: string | null
}

/** Default session cookie name */
export const DEFAULT_SESSION_COOKIE_NAME = 'session_id'

/** Default query parameter naming the requested token type */
export const DEFAULT_TOKEN_TYPE_PARAM = 'token_type'

/** Longest accepted session id */
export const MAX_SESSION_ID_LENGTH = 1024

// ============================================================
// Auth Server Data
// ============================================================

/**
 * Decrypted auth server payload for one session.
 * Unknown keys are preserved as the server sent them.
 */
export interface AuthData {
  readonly id_token?: string | undefined
  readonly access_token?: string | undefined
  readonly email?: string | undefined
  readonly [key: string]: unknown
}

/**
 * Result of asking the auth server about a session id.
 *
 * - `auth_data` - the server knows the session
 * - `rejected` - the server answered that it does not
 *
 * Both are cacheable values. Transport and protocol failures are thrown instead.
 */
export type AuthFetchResult =
  | { readonly kind: 'auth_data'; readonly authData: AuthData }
  | { readonly kind: 'rejected' }

/**
 * Claims of a verified identity token. Only `email_verified` is inspected.
 */
export interface IdTokenClaims {
  readonly email?: string | undefined
  readonly email_verified?: boolean | string | undefined
  readonly [claim: string]: unknown
}

// ============================================================
// Outcome
// ============================================================

/** Fixed rejection codes */
export type RejectionCode =
  | 'BAD_SESSION_ID'
  | 'REJECTED_REQUEST'
  | 'TOKEN_EXPIRED'
  | 'BAD_EMAIL'
  | 'UNKNOWN'

/** Rejection reason for an unsupported `token_type` */
export type UnsupportedTokenTypeReason = `Requested token_type "${string}" not one of ${string}`

/** Every reason a rejection may carry */
export type RejectionReason = RejectionCode | UnsupportedTokenTypeReason

/** Successful resolution: the requested field and its value */
export interface Success {
  readonly kind: 'success'
  readonly field: TokenType
  readonly value: string
}

/** Refused resolution, surfaced to the caller as `{"status":"BLOCKED","reason":...}` */
export interface Rejection {
  readonly kind: 'rejection'
  readonly status: number
  readonly reason: RejectionReason
}

/** Exactly one of these is produced per request. Never cached. */
export type Outcome = Success | Rejection

// ============================================================
// Rule Result
// ============================================================

/**
 * Result of one step of the resolution pipeline.
 *
 * - `allowed: true` - continue with `value`
 * - `allowed: false` - stop and answer with `rejection`
 */
export type RuleResult<T> =
  | { readonly allowed: true; readonly value: T }
  | { readonly allowed: false; readonly rejection: Rejection }

// ============================================================
// Default Constants
// ============================================================

/** Status returned with BAD_SESSION_ID */
export const BAD_SESSION_ID_STATUS = 200

/** Default status returned with REJECTED_REQUEST */
export const DEFAULT_REJECTED_REQUEST_STATUS = 200

/** Status returned with TOKEN_EXPIRED */
export const TOKEN_EXPIRED_STATUS = 200

/** Status returned with BAD_EMAIL, UNKNOWN and unsupported token types */
export const SERVER_ERROR_STATUS = 500
