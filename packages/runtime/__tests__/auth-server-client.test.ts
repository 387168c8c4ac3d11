import { describe, it, expect, beforeAll, vi } from 'vitest'
import { generateHybridCipher, toArrayBuffer, utf8Encode } from '@session-relay/core'
import { createAuthServerClient } from '../src/auth-server-client.js'
import { packEnvelope } from '../src/envelope-archive.js'
import { AuthServerError } from '../src/errors.js'
import { createAuthServerStub, createExchangeKeys } from './fixtures.js'
import type { ExchangeKeys } from './fixtures.js'

const SESSION_ID = 'abcd1234efgh5678wxyz'

const AUTH_DATA = {
  id_token: 'id-token-value',
  access_token: 'access-token-value',
  email: 'user@example.com',
}

/** Sealed 200 response carrying `payload` for the relay key */
async function sealedResponse(payload: string, relayPublicKey: CryptoKey): Promise<Response> {
  const cipher = await generateHybridCipher()
  const envelope = await cipher.seal(utf8Encode(payload), relayPublicKey)
  return new Response(toArrayBuffer(packEnvelope(envelope)), { status: 200 })
}

async function captureError(promise: Promise<unknown>): Promise<unknown> {
  return promise.then(
    () => null,
    (error: unknown) => error,
  )
}

describe('auth-server-client', () => {
  let keys: ExchangeKeys

  beforeAll(async () => {
    keys = await createExchangeKeys()
  })

  describe('endpoint', () => {
    it('should default the path to /auth', () => {
      const client = createAuthServerClient({
        baseUrl: 'https://auth.example.com',
        keyMaterial: keys.keyMaterial,
      })
      expect(client.endpoint).toBe('https://auth.example.com/auth')
    })

    it('should join base URL and path with one slash', () => {
      const client = createAuthServerClient({
        baseUrl: 'https://auth.example.com/',
        path: 'v2/session',
        keyMaterial: keys.keyMaterial,
      })
      expect(client.endpoint).toBe('https://auth.example.com/v2/session')
    })
  })

  describe('fetchAuthData', () => {
    it('should exchange sealed envelopes with the auth server', async () => {
      const stub = createAuthServerStub(keys, { [SESSION_ID]: AUTH_DATA })
      const client = createAuthServerClient({
        baseUrl: 'https://auth.example.com',
        keyMaterial: keys.keyMaterial,
        fetchImpl: stub.fetch,
      })

      const result = await client.fetchAuthData(SESSION_ID)

      expect(result).toEqual({ kind: 'auth_data', authData: AUTH_DATA })
      expect(stub.calls).toEqual([
        {
          url: 'https://auth.example.com/auth',
          contentType: 'application/zip',
          sessionId: SESSION_ID,
        },
      ])
    })

    it('should freeze the auth data and keep unknown keys', async () => {
      const stub = createAuthServerStub(keys, {
        [SESSION_ID]: { ...AUTH_DATA, refresh_hint: 'later' },
      })
      const client = createAuthServerClient({
        baseUrl: 'https://auth.example.com',
        keyMaterial: keys.keyMaterial,
        fetchImpl: stub.fetch,
      })

      const result = await client.fetchAuthData(SESSION_ID)
      expect(result.kind).toBe('auth_data')
      if (result.kind === 'auth_data') {
        expect(Object.isFrozen(result.authData)).toBe(true)
        expect(result.authData['refresh_hint']).toBe('later')
      }
    })

    it('should resolve rejected when the server does not know the session', async () => {
      const stub = createAuthServerStub(keys, {})
      const client = createAuthServerClient({
        baseUrl: 'https://auth.example.com',
        keyMaterial: keys.keyMaterial,
        fetchImpl: stub.fetch,
      })

      expect(await client.fetchAuthData('UNKNOWN_SESSION_ID')).toEqual({ kind: 'rejected' })
    })

    it('should honour custom rejected statuses', async () => {
      const fetchImpl = vi.fn(async () => new Response(null, { status: 410 }))
      const client = createAuthServerClient({
        baseUrl: 'https://auth.example.com',
        keyMaterial: keys.keyMaterial,
        fetchImpl,
        rejectedStatuses: [410],
      })

      expect(await client.fetchAuthData(SESSION_ID)).toEqual({ kind: 'rejected' })
    })

    it('should release the body of a rejected or failed answer', async () => {
      const cancelled: number[] = []
      const answer = (status: number) =>
        new Response(
          new ReadableStream<Uint8Array>({
            cancel() {
              cancelled.push(status)
            },
          }),
          { status },
        )
      const notFound = createAuthServerClient({
        baseUrl: 'https://auth.example.com',
        keyMaterial: keys.keyMaterial,
        fetchImpl: async () => answer(404),
      })
      const failing = createAuthServerClient({
        baseUrl: 'https://auth.example.com',
        keyMaterial: keys.keyMaterial,
        fetchImpl: async () => answer(502),
      })

      expect(await notFound.fetchAuthData(SESSION_ID)).toEqual({ kind: 'rejected' })
      expect(await captureError(failing.fetchAuthData(SESSION_ID))).toMatchObject({
        kind: 'transport',
        status: 502,
      })
      expect(cancelled).toEqual([404, 502])
    })

    it('should throw a transport error on an unexpected status', async () => {
      const client = createAuthServerClient({
        baseUrl: 'https://auth.example.com',
        keyMaterial: keys.keyMaterial,
        fetchImpl: async () => new Response('upstream down', { status: 502 }),
      })

      const error = await captureError(client.fetchAuthData(SESSION_ID))
      expect(error).toBeInstanceOf(AuthServerError)
      expect(error).toMatchObject({ kind: 'transport', status: 502, message: 'Auth server answered 502' })
    })

    it('should throw a transport error when the network fails', async () => {
      const client = createAuthServerClient({
        baseUrl: 'https://auth.example.com',
        keyMaterial: keys.keyMaterial,
        fetchImpl: async () => {
          throw new TypeError('fetch failed')
        },
      })

      const error = await captureError(client.fetchAuthData(SESSION_ID))
      expect(error).toMatchObject({
        kind: 'transport',
        message: 'Auth server request failed: fetch failed',
      })
    })

    it('should abort after the configured timeout', async () => {
      const client = createAuthServerClient({
        baseUrl: 'https://auth.example.com',
        keyMaterial: keys.keyMaterial,
        timeoutMs: 20,
        fetchImpl: (_input: RequestInfo | URL, init?: RequestInit) =>
          new Promise<Response>((_resolve, reject) => {
            const signal = init?.signal
            if (!signal) return
            signal.addEventListener('abort', () => {
              reject(signal.reason)
            })
          }),
      })

      const error = await captureError(client.fetchAuthData(SESSION_ID))
      expect(error).toMatchObject({
        kind: 'transport',
        message: 'Auth server did not answer within 20ms',
      })
    })

    it('should throw a protocol error when the body is not a zip', async () => {
      const client = createAuthServerClient({
        baseUrl: 'https://auth.example.com',
        keyMaterial: keys.keyMaterial,
        fetchImpl: async () => new Response('not a zip', { status: 200 }),
      })

      const error = await captureError(client.fetchAuthData(SESSION_ID))
      expect(error).toMatchObject({ kind: 'protocol', message: 'Envelope is not a zip archive' })
    })

    it('should throw a protocol error when the response is sealed for another key', async () => {
      const other = await createExchangeKeys()
      const client = createAuthServerClient({
        baseUrl: 'https://auth.example.com',
        keyMaterial: keys.keyMaterial,
        fetchImpl: async () => sealedResponse(JSON.stringify(AUTH_DATA), other.relayPublicKey),
      })

      const error = await captureError(client.fetchAuthData(SESSION_ID))
      expect(error).toBeInstanceOf(AuthServerError)
      expect(error).toMatchObject({
        kind: 'protocol',
        message:
          'Response envelope did not decrypt: RSA-OAEP decryption failed (wrong private key or corrupt block)',
      })
    })

    it('should throw a protocol error when the payload is not JSON', async () => {
      const client = createAuthServerClient({
        baseUrl: 'https://auth.example.com',
        keyMaterial: keys.keyMaterial,
        fetchImpl: async () => sealedResponse('id_token=abc', keys.relayPublicKey),
      })

      const error = await captureError(client.fetchAuthData(SESSION_ID))
      expect(error).toMatchObject({ kind: 'protocol', message: 'Response payload is not UTF-8 JSON' })
    })

    it('should throw a protocol error when the payload is not auth data', async () => {
      const client = createAuthServerClient({
        baseUrl: 'https://auth.example.com',
        keyMaterial: keys.keyMaterial,
        fetchImpl: async () => sealedResponse('{"id_token":42}', keys.relayPublicKey),
      })

      const error = await captureError(client.fetchAuthData(SESSION_ID))
      expect(error).toMatchObject({ kind: 'protocol', message: 'Response payload is not auth data' })
    })

    it('should seal a fresh request envelope per call', async () => {
      const bodies: ArrayBuffer[] = []
      const client = createAuthServerClient({
        baseUrl: 'https://auth.example.com',
        keyMaterial: keys.keyMaterial,
        fetchImpl: async (_input: RequestInfo | URL, init?: RequestInit) => {
          if (init?.body instanceof ArrayBuffer) bodies.push(init.body)
          return new Response(null, { status: 404 })
        },
      })

      await client.fetchAuthData(SESSION_ID)
      await client.fetchAuthData(SESSION_ID)

      expect(bodies).toHaveLength(2)
      expect(new Uint8Array(bodies[0] ?? new ArrayBuffer(0))).not.toEqual(
        new Uint8Array(bodies[1] ?? new ArrayBuffer(0)),
      )
    })
  })
})
