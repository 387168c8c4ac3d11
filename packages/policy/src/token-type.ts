// @session-relay/policy - Token field selection

import { rejection, success } from './outcome.js'
import type { AuthData, Outcome, TokenType, UnsupportedTokenTypeReason } from './types.js'
import { DEFAULT_TOKEN_TYPE, SERVER_ERROR_STATUS, SUPPORTED_TOKEN_TYPES } from './types.js'

/** Whether `value` names a supported token type. */
export function isSupportedTokenType(value: string): value is TokenType {
  return SUPPORTED_TOKEN_TYPES.some((type) => type === value)
}

/**
 * Rejection reason for an unsupported `token_type`.
 *
 * @example
 * ```typescript
 * unsupportedTokenTypeReason('refresh_token')
 * // 'Requested token_type "refresh_token" not one of ["access_token","id_token","email"]'
 * ```
 */
export function unsupportedTokenTypeReason(value: string): UnsupportedTokenTypeReason {
  return `Requested token_type "${value}" not one of ${JSON.stringify(SUPPORTED_TOKEN_TYPES)}`
}

/**
 * Final step of resolution: picks the requested field out of the auth data.
 *
 * - absent `tokenType` → `id_token`
 * - unsupported `tokenType` → 500 with the listing message
 * - selected field missing or not a string → 500 UNKNOWN
 */
export function selectTokenField(authData: AuthData, tokenType: string | null | undefined): Outcome {
  const requested = tokenType ?? DEFAULT_TOKEN_TYPE
  if (!isSupportedTokenType(requested)) {
    return rejection(SERVER_ERROR_STATUS, unsupportedTokenTypeReason(requested))
  }

  const value = authData[requested]
  if (typeof value !== 'string') {
    return rejection(SERVER_ERROR_STATUS, 'UNKNOWN')
  }

  return success(requested, value)
}
