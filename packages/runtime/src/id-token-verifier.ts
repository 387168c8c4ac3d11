// @session-relay/runtime - Identity token verification (jose)

import { createRemoteJWKSet, errors, jwtVerify } from 'jose'
import type { JWTPayload, JWTVerifyGetKey } from 'jose'
import type { IdTokenClaims } from '@session-relay/policy'
import { IdTokenExpiredError } from './errors.js'

/** Verifies an identity token and returns its claims. */
export type IdTokenVerifier = (token: string) => Promise<IdTokenClaims>

/** Issuers Google signs identity tokens as */
export const DEFAULT_ID_TOKEN_ISSUERS: readonly string[] = [
  'https://accounts.google.com',
  'accounts.google.com',
]

/** Google's signing keys */
export const DEFAULT_JWKS_URL = 'https://www.googleapis.com/oauth2/v3/certs'

/** Configuration for `createIdTokenVerifier` */
export interface IdTokenVerifierConfig {
  /** Expected `aud` (the OAuth client id) */
  readonly audience: string | readonly string[]
  /** Accepted `iss` values (default: Google) */
  readonly issuers?: readonly string[] | undefined
  /** JWKS endpoint, used when no `keySet` is given (default: Google) */
  readonly jwksUrl?: string | undefined
  /** Allowed clock skew in seconds for `exp` / `nbf` (default: 0) */
  readonly clockToleranceSec?: number | undefined
  /** Key resolver, e.g. `createLocalJWKSet(jwks)` */
  readonly keySet?: JWTVerifyGetKey | undefined
}

function toClaims(payload: JWTPayload): IdTokenClaims {
  const { email, email_verified: emailVerified } = payload
  return {
    ...payload,
    email: typeof email === 'string' ? email : undefined,
    email_verified:
      typeof emailVerified === 'boolean' || typeof emailVerified === 'string'
        ? emailVerified
        : undefined,
  }
}

/**
 * Creates a verifier for Google-style identity tokens.
 *
 * Signature, `aud`, `iss`, `exp` and `nbf` are checked by jose. An expired
 * token is rethrown as `IdTokenExpiredError`; every other failure propagates
 * unchanged.
 *
 * The remote key set is fetched lazily and cached by jose.
 */
export function createIdTokenVerifier(config: IdTokenVerifierConfig): IdTokenVerifier {
  const keySet = config.keySet ?? createRemoteJWKSet(new URL(config.jwksUrl ?? DEFAULT_JWKS_URL))
  const audience = typeof config.audience === 'string' ? config.audience : [...config.audience]
  const issuer = [...(config.issuers ?? DEFAULT_ID_TOKEN_ISSUERS)]
  const clockTolerance = config.clockToleranceSec ?? 0

  return async (token: string): Promise<IdTokenClaims> => {
    try {
      const { payload } = await jwtVerify(token, keySet, { audience, issuer, clockTolerance })
      return toClaims(payload)
    } catch (error) {
      if (error instanceof errors.JWTExpired) {
        throw new IdTokenExpiredError(error)
      }
      throw error
    }
  }
}
