// @session-relay/runtime - Auth server client (sealed request, sealed response)

import { z } from 'zod'
import {
  CipherError,
  WebCryptoAsymmetricTransport,
  createHybridCipher,
  openEnvelope,
  toArrayBuffer,
  utf8Decode,
  utf8Encode,
  webCryptoSymmetricCodecs,
} from '@session-relay/core'
import type { AsymmetricTransport, SymmetricCodecFactory } from '@session-relay/core'
import { shortenSessionId } from '@session-relay/policy'
import type { AuthData, AuthFetchResult } from '@session-relay/policy'
import { ENVELOPE_CONTENT_TYPE, packEnvelope, unpackEnvelope } from './envelope-archive.js'
import { AuthServerError } from './errors.js'
import { createSilentLogger } from './logger.js'
import type { Logger } from './logger.js'
import type { KeyMaterial } from './key-material.js'

// ============================================================
// Configuration
// ============================================================

/** Default request path on the auth server */
export const DEFAULT_AUTH_SERVER_PATH = '/auth'

/** Statuses meaning "this session id is unknown" */
export const DEFAULT_REJECTED_STATUSES: readonly number[] = [401, 403, 404]

/**
 * Configuration for `createAuthServerClient`.
 *
 * @example
 * ```typescript
 * const client = createAuthServerClient({
 *   baseUrl: 'https://auth.internal.example.com',
 *   keyMaterial: await loadKeyMaterial({ privateKeyPath, serverPublicKeyPath }),
 *   timeoutMs: 10_000,
 * })
 * ```
 */
export interface AuthServerClientConfig {
  /** Auth server origin, e.g. `https://auth.internal.example.com` */
  readonly baseUrl: string
  /** Request path appended to `baseUrl` (default: '/auth') */
  readonly path?: string | undefined
  /** Local private key and server public key */
  readonly keyMaterial: KeyMaterial
  /** `fetch` implementation (default: global fetch) */
  readonly fetchImpl?: typeof fetch | undefined
  /** Abort the request after this many milliseconds (default: no timeout) */
  readonly timeoutMs?: number | undefined
  /** Response statuses that mean the session is unknown (default: 401, 403, 404) */
  readonly rejectedStatuses?: readonly number[] | undefined
  /** Asymmetric transport (default: RSA-OAEP / SHA-1) */
  readonly transport?: AsymmetricTransport | undefined
  /** Symmetric codec factory (default: AES-256-CBC) */
  readonly codecs?: SymmetricCodecFactory | undefined
  readonly logger?: Logger | undefined
}

/**
 * Client for the remote auth server.
 */
export interface AuthServerClient {
  /** Full request URL */
  readonly endpoint: string

  /**
   * Asks the auth server for the auth data of `sessionId`.
   *
   * Resolves `{ kind: 'rejected' }` when the server does not know the session.
   *
   * @throws {AuthServerError} On network failure, timeout, unexpected status
   *   or a response that cannot be decoded
   */
  fetchAuthData(sessionId: string): Promise<AuthFetchResult>
}

// ============================================================
// Response Schema
// ============================================================

/** Decrypted response payload. Unknown keys are preserved. */
const authDataSchema = z
  .object({
    id_token: z.string().optional(),
    access_token: z.string().optional(),
    email: z.string().optional(),
  })
  .passthrough()

/** `AbortSignal.timeout` rejects with a DOMException named TimeoutError */
function isTimeoutError(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'name' in error && error.name === 'TimeoutError'
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}

/** Releases the connection of a response whose body is not read */
async function discardBody(response: Response): Promise<void> {
  await response.body?.cancel()
}

function joinUrl(baseUrl: string, path: string): string {
  const base = baseUrl.endsWith('/') ? baseUrl.slice(0, -1) : baseUrl
  const suffix = path.startsWith('/') ? path : `/${path}`
  return `${base}${suffix}`
}

// ============================================================
// Client Factory
// ============================================================

/**
 * Creates an auth server client.
 *
 * Request: `{"session_id": ...}` sealed for the server public key with a
 * fresh symmetric key per call, POSTed as a zip envelope.
 * Response: a zip envelope addressed to the local private key, holding the
 * JSON auth data.
 */
export function createAuthServerClient(config: AuthServerClientConfig): AuthServerClient {
  const endpoint = joinUrl(config.baseUrl, config.path ?? DEFAULT_AUTH_SERVER_PATH)
  const fetchImpl = config.fetchImpl ?? fetch
  const rejectedStatuses = new Set(config.rejectedStatuses ?? DEFAULT_REJECTED_STATUSES)
  const transport = config.transport ?? new WebCryptoAsymmetricTransport()
  const codecs = config.codecs ?? webCryptoSymmetricCodecs
  const logger = config.logger ?? createSilentLogger()
  const { keyMaterial, timeoutMs } = config

  async function sealRequest(sessionId: string): Promise<Uint8Array> {
    const cipher = createHybridCipher(await codecs.generate(), transport)
    const envelope = await cipher.seal(
      utf8Encode(JSON.stringify({ session_id: sessionId })),
      keyMaterial.serverPublicKey,
    )
    return packEnvelope(envelope)
  }

  async function post(body: Uint8Array, session: string): Promise<Response> {
    try {
      return await fetchImpl(endpoint, {
        method: 'POST',
        headers: { 'content-type': ENVELOPE_CONTENT_TYPE },
        body: toArrayBuffer(body),
        signal: timeoutMs === undefined ? null : AbortSignal.timeout(timeoutMs),
      })
    } catch (error) {
      const message = isTimeoutError(error)
        ? `Auth server did not answer within ${String(timeoutMs)}ms`
        : `Auth server request failed: ${errorMessage(error)}`
      logger.warn({ event: 'auth-server:error', session, err: error }, message)
      throw new AuthServerError('transport', message, { cause: error })
    }
  }

  async function decodeResponse(archive: Uint8Array): Promise<AuthData> {
    const envelope = unpackEnvelope(archive)

    let plaintext: Uint8Array
    try {
      plaintext = await openEnvelope(envelope, keyMaterial.privateKey, transport, codecs)
    } catch (error) {
      if (error instanceof CipherError) {
        throw new AuthServerError('protocol', `Response envelope did not decrypt: ${error.message}`, {
          cause: error,
        })
      }
      throw error
    }

    let json: unknown
    try {
      json = JSON.parse(utf8Decode(plaintext))
    } catch (error) {
      throw new AuthServerError('protocol', 'Response payload is not UTF-8 JSON', { cause: error })
    }

    const parsed = authDataSchema.safeParse(json)
    if (!parsed.success) {
      throw new AuthServerError('protocol', 'Response payload is not auth data', {
        cause: parsed.error,
      })
    }
    return Object.freeze(parsed.data)
  }

  return {
    endpoint,

    async fetchAuthData(sessionId: string): Promise<AuthFetchResult> {
      const session = shortenSessionId(sessionId)
      const startedAt = Date.now()
      logger.debug({ event: 'auth-server:request', session, endpoint })

      const response = await post(await sealRequest(sessionId), session)
      logger.debug({
        event: 'auth-server:response',
        session,
        status: response.status,
        durationMs: Date.now() - startedAt,
      })

      if (rejectedStatuses.has(response.status)) {
        await discardBody(response)
        return { kind: 'rejected' }
      }
      if (!response.ok) {
        await discardBody(response)
        throw new AuthServerError(
          'transport',
          `Auth server answered ${String(response.status)}`,
          { status: response.status },
        )
      }

      let body: Uint8Array
      try {
        body = new Uint8Array(await response.arrayBuffer())
      } catch (error) {
        throw new AuthServerError('transport', `Auth server response body failed: ${errorMessage(error)}`, {
          cause: error,
          status: response.status,
        })
      }

      return { kind: 'auth_data', authData: await decodeResponse(body) }
    },
  }
}
