import { describe, it, expect, beforeAll } from 'vitest'
import { errors } from 'jose'
import { createIdTokenVerifier } from '../src/id-token-verifier.js'
import { IdTokenExpiredError } from '../src/errors.js'
import { createTokenSigner, TEST_AUDIENCE } from './fixtures.js'
import type { TokenSigner } from './fixtures.js'

async function captureError(promise: Promise<unknown>): Promise<unknown> {
  return promise.then(
    () => null,
    (error: unknown) => error,
  )
}

describe('id-token-verifier', () => {
  let signer: TokenSigner

  beforeAll(async () => {
    signer = await createTokenSigner()
  })

  it('should return the claims of a valid token', async () => {
    const verify = createIdTokenVerifier({ audience: TEST_AUDIENCE, keySet: signer.keySet })
    const token = await signer.sign({ email: 'user@example.com', email_verified: true })

    const claims = await verify(token)

    expect(claims).toMatchObject({
      email: 'user@example.com',
      email_verified: true,
      aud: TEST_AUDIENCE,
      iss: 'https://accounts.google.com',
    })
  })

  it('should keep a string email_verified claim as sent', async () => {
    const verify = createIdTokenVerifier({ audience: TEST_AUDIENCE, keySet: signer.keySet })
    const token = await signer.sign({ email: 'user@example.com', email_verified: 'true' })

    expect((await verify(token)).email_verified).toBe('true')
  })

  it('should drop claims of the wrong type', async () => {
    const verify = createIdTokenVerifier({ audience: TEST_AUDIENCE, keySet: signer.keySet })
    const token = await signer.sign({ email: 42, email_verified: 1 })

    const claims = await verify(token)

    expect(claims.email).toBeUndefined()
    expect(claims.email_verified).toBeUndefined()
  })

  it('should accept the bare accounts.google.com issuer', async () => {
    const verify = createIdTokenVerifier({ audience: TEST_AUDIENCE, keySet: signer.keySet })
    const token = await signer.sign({ email_verified: true }, { issuer: 'accounts.google.com' })

    expect((await verify(token)).iss).toBe('accounts.google.com')
  })

  it('should throw IdTokenExpiredError for an expired token', async () => {
    const verify = createIdTokenVerifier({ audience: TEST_AUDIENCE, keySet: signer.keySet })
    const token = await signer.sign(
      { email_verified: true },
      { expiresAt: Math.floor(Date.now() / 1000) - 60 },
    )

    const error = await captureError(verify(token))

    expect(error).toBeInstanceOf(IdTokenExpiredError)
    expect(error).toMatchObject({ message: 'Token expired' })
  })

  it('should honour the clock tolerance', async () => {
    const verify = createIdTokenVerifier({
      audience: TEST_AUDIENCE,
      keySet: signer.keySet,
      clockToleranceSec: 300,
    })
    const token = await signer.sign(
      { email_verified: true },
      { expiresAt: Math.floor(Date.now() / 1000) - 60 },
    )

    expect((await verify(token)).email_verified).toBe(true)
  })

  it('should pass other failures through unchanged', async () => {
    const verify = createIdTokenVerifier({ audience: TEST_AUDIENCE, keySet: signer.keySet })
    const token = await signer.sign({ email_verified: true }, { audience: 'another-client' })

    const error = await captureError(verify(token))

    expect(error).toBeInstanceOf(errors.JWTClaimValidationFailed)
    expect(error).not.toBeInstanceOf(IdTokenExpiredError)
  })

  it('should reject an issuer outside the configured list', async () => {
    const verify = createIdTokenVerifier({
      audience: TEST_AUDIENCE,
      keySet: signer.keySet,
      issuers: ['https://issuer.example.com'],
    })
    const token = await signer.sign({ email_verified: true })

    expect(await captureError(verify(token))).toBeInstanceOf(errors.JWTClaimValidationFailed)
  })

  it('should reject a token signed by another key', async () => {
    const other = await createTokenSigner()
    const verify = createIdTokenVerifier({ audience: TEST_AUDIENCE, keySet: signer.keySet })
    const token = await other.sign({ email_verified: true })

    expect(await captureError(verify(token))).toBeInstanceOf(errors.JWSSignatureVerificationFailed)
  })
})
