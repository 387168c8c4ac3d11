// @session-relay/policy - Auth data and identity claim rules

import { rejection } from './outcome.js'
import type { AuthData, AuthFetchResult, IdTokenClaims, RuleResult } from './types.js'
import {
  DEFAULT_REJECTED_REQUEST_STATUS,
  SERVER_ERROR_STATUS,
  TOKEN_EXPIRED_STATUS,
} from './types.js'

/** Error code jose sets on an expired JWT */
const JWT_EXPIRED_CODE = 'ERR_JWT_EXPIRED'

/**
 * Outcome of verifying the id token, captured as data so the rules stay pure.
 * The runtime layer builds it from the verifier's promise.
 */
export type VerificationResult =
  | { readonly verified: true; readonly claims: IdTokenClaims }
  | { readonly verified: false; readonly error: unknown }

/**
 * Maps the auth server's answer to the next step.
 *
 * A `rejected` answer means the server does not know the session.
 *
 * @param rejectedRequestStatus - Status sent with REJECTED_REQUEST (default: 200)
 */
export function evaluateFetchResult(
  result: AuthFetchResult,
  rejectedRequestStatus: number = DEFAULT_REJECTED_REQUEST_STATUS,
): RuleResult<AuthData> {
  if (result.kind === 'rejected') {
    return { allowed: false, rejection: rejection(rejectedRequestStatus, 'REJECTED_REQUEST') }
  }
  return { allowed: true, value: result.authData }
}

/**
 * Whether a verification failure means the token has expired.
 *
 * Matches a message containing "expired" (any case) or jose's
 * `ERR_JWT_EXPIRED` code.
 */
export function isExpiredError(error: unknown): boolean {
  if (error instanceof Error) {
    if ('code' in error && error.code === JWT_EXPIRED_CODE) return true
    return /expired/i.test(error.message)
  }
  return typeof error === 'string' && /expired/i.test(error)
}

/**
 * Whether the claims assert a verified email.
 * Accepts boolean `true` and the string `"true"`; anything else, including
 * an absent claim, is unverified.
 */
export function isEmailVerified(claims: IdTokenClaims): boolean {
  const value = claims.email_verified
  return value === true || value === 'true'
}

/**
 * Maps the id token verification to the next step.
 *
 * - expired → 200 TOKEN_EXPIRED
 * - any other failure → 500 UNKNOWN
 * - email not verified → 500 BAD_EMAIL
 */
export function evaluateVerification(verification: VerificationResult): RuleResult<IdTokenClaims> {
  if (!verification.verified) {
    if (isExpiredError(verification.error)) {
      return { allowed: false, rejection: rejection(TOKEN_EXPIRED_STATUS, 'TOKEN_EXPIRED') }
    }
    return { allowed: false, rejection: rejection(SERVER_ERROR_STATUS, 'UNKNOWN') }
  }

  if (!isEmailVerified(verification.claims)) {
    return { allowed: false, rejection: rejection(SERVER_ERROR_STATUS, 'BAD_EMAIL') }
  }

  return { allowed: true, value: verification.claims }
}
