import { SignJWT, createLocalJWKSet, exportJWK, generateKeyPair } from 'jose'
import type { JWTPayload, JWTVerifyGetKey } from 'jose'
import {
  WebCryptoAsymmetricTransport,
  derToPem,
  generateHybridCipher,
  openEnvelope,
  toArrayBuffer,
  utf8Decode,
  utf8Encode,
} from '@session-relay/core'
import type { AuthData } from '@session-relay/policy'
import { packEnvelope, unpackEnvelope } from '../src/envelope-archive.js'
import type { KeyMaterial } from '../src/key-material.js'

// ============================================================
// Envelope Keys
// ============================================================

/** Key pairs of both ends of the auth server exchange */
export interface ExchangeKeys {
  /** Relay side: opens responses, seals requests */
  readonly keyMaterial: KeyMaterial
  /** Auth server side */
  readonly serverPrivateKey: CryptoKey
  readonly relayPublicKey: CryptoKey
}

const transport = new WebCryptoAsymmetricTransport()

export async function createExchangeKeys(): Promise<ExchangeKeys> {
  const [relayPair, serverPair] = await Promise.all([
    transport.generateKeyPair(),
    transport.generateKeyPair(),
  ])
  return {
    keyMaterial: Object.freeze({
      privateKey: relayPair.privateKey,
      serverPublicKey: serverPair.publicKey,
    }),
    serverPrivateKey: serverPair.privateKey,
    relayPublicKey: relayPair.publicKey,
  }
}

/** PEM exports matching `KeyMaterialPems` */
export interface KeyPems {
  readonly privateKeyPem: string
  readonly serverPublicKeyPem: string
}

/** Exports the relay private key and the server public key as PEM */
export async function exportKeyPems(keys: ExchangeKeys): Promise<KeyPems> {
  const [pkcs8, spki] = await Promise.all([
    crypto.subtle.exportKey('pkcs8', keys.keyMaterial.privateKey),
    crypto.subtle.exportKey('spki', keys.keyMaterial.serverPublicKey),
  ])
  return {
    privateKeyPem: derToPem(new Uint8Array(pkcs8), 'PRIVATE KEY'),
    serverPublicKeyPem: derToPem(new Uint8Array(spki), 'PUBLIC KEY'),
  }
}

// ============================================================
// In-process Auth Server
// ============================================================

/** One request the stub received */
export interface StubCall {
  readonly url: string
  readonly contentType: string | null
  readonly sessionId: string
}

export interface AuthServerStub {
  readonly fetch: typeof fetch
  readonly calls: StubCall[]
}

/**
 * A `fetch` standing in for the auth server: opens the request envelope
 * with the server key, looks the session up and answers with a sealed zip.
 * Unknown sessions get 404.
 */
export function createAuthServerStub(
  keys: ExchangeKeys,
  sessions: Readonly<Record<string, AuthData | string>>,
): AuthServerStub {
  const calls: StubCall[] = []

  const stubFetch = async (input: RequestInfo | URL, init?: RequestInit): Promise<Response> => {
    const body = init?.body
    if (!(body instanceof ArrayBuffer)) {
      throw new TypeError('stub expects an ArrayBuffer body')
    }

    const request = unpackEnvelope(new Uint8Array(body))
    const plaintext = await openEnvelope(request, keys.serverPrivateKey)
    const parsed: unknown = JSON.parse(utf8Decode(plaintext))
    const sessionId =
      typeof parsed === 'object' && parsed !== null && 'session_id' in parsed
        ? String(parsed.session_id)
        : ''

    calls.push({
      url: typeof input === 'string' ? input : input instanceof URL ? input.href : input.url,
      contentType: new Headers(init?.headers).get('content-type'),
      sessionId,
    })

    const entry = sessions[sessionId]
    if (entry === undefined) {
      return new Response(null, { status: 404 })
    }

    const payload = typeof entry === 'string' ? entry : JSON.stringify(entry)
    const cipher = await generateHybridCipher()
    const envelope = await cipher.seal(utf8Encode(payload), keys.relayPublicKey)
    return new Response(toArrayBuffer(packEnvelope(envelope)), {
      status: 200,
      headers: { 'content-type': 'application/zip' },
    })
  }

  return { fetch: stubFetch, calls }
}

// ============================================================
// Identity Tokens
// ============================================================

export const TEST_AUDIENCE = 'test-client-id.apps.example.com'
export const TEST_ISSUER = 'https://accounts.google.com'

export interface TokenSigner {
  /** Local key set accepted by the verifier */
  readonly keySet: JWTVerifyGetKey
  /** Signs an id token; `expiresAt` is in seconds since the epoch */
  sign(
    claims: JWTPayload,
    options?: { readonly expiresAt?: number; readonly audience?: string; readonly issuer?: string },
  ): Promise<string>
}

export async function createTokenSigner(): Promise<TokenSigner> {
  const { publicKey, privateKey } = await generateKeyPair('RS256')
  const jwk = await exportJWK(publicKey)
  const keySet = createLocalJWKSet({ keys: [{ ...jwk, kid: 'test-key', alg: 'RS256' }] })

  return {
    keySet,
    sign: (claims, options) =>
      new SignJWT(claims)
        .setProtectedHeader({ alg: 'RS256', kid: 'test-key' })
        .setIssuer(options?.issuer ?? TEST_ISSUER)
        .setAudience(options?.audience ?? TEST_AUDIENCE)
        .setIssuedAt()
        .setExpirationTime(options?.expiresAt ?? '1h')
        .sign(privateKey),
  }
}
