// @session-relay/core - Encoding utilities (base64, PEM, UTF-8, buffer operations)

import { KeyFormatError } from './errors.js'

const encoder = new TextEncoder()
const decoder = new TextDecoder('utf-8', { fatal: true })

/**
 * Encodes a Uint8Array to standard base64 (RFC 4648 §4, with padding).
 */
export function toBase64(buffer: Uint8Array): string {
  let binary = ''
  for (const byte of buffer) {
    binary += String.fromCharCode(byte)
  }
  return btoa(binary)
}

/**
 * Decodes standard base64 (whitespace tolerated) to a Uint8Array.
 *
 * @throws {Error} If the input is not valid base64
 */
export function fromBase64(encoded: string): Uint8Array {
  const binary = atob(encoded.replace(/\s+/g, ''))
  const bytes = new Uint8Array(binary.length)
  for (let i = 0; i < binary.length; i++) {
    bytes[i] = binary.charCodeAt(i)
  }
  return bytes
}

/** UTF-8 encodes a string. */
export function utf8Encode(text: string): Uint8Array {
  return encoder.encode(text)
}

/**
 * Strictly decodes UTF-8 bytes to a string.
 *
 * @throws {TypeError} On malformed UTF-8
 */
export function utf8Decode(bytes: Uint8Array): string {
  return decoder.decode(bytes)
}

/**
 * Copies a Uint8Array into a standalone ArrayBuffer.
 * WebCrypto calls take this instead of a view that may share a larger buffer
 * (Node `Buffer` slices from a pool, for instance).
 */
export function toArrayBuffer(uint8: Uint8Array): ArrayBuffer {
  const buffer = new ArrayBuffer(uint8.byteLength)
  new Uint8Array(buffer).set(uint8)
  return buffer
}

/**
 * Concatenates multiple Uint8Arrays into a single Uint8Array.
 * Used for iv || ciphertext assembly.
 */
export function concatBuffers(...buffers: Uint8Array[]): Uint8Array {
  let totalLength = 0
  for (const buf of buffers) {
    totalLength += buf.length
  }

  const result = new Uint8Array(totalLength)
  let offset = 0
  for (const buf of buffers) {
    result.set(buf, offset)
    offset += buf.length
  }

  return result
}

// ============================================================
// PEM
// ============================================================

/** PEM labels this package understands */
export type PemLabel = 'PUBLIC KEY' | 'PRIVATE KEY'

const PEM_PATTERN = /-----BEGIN ([A-Z0-9 ]+)-----([\s\S]*?)-----END \1-----/

/**
 * Extracts the DER body of a PEM block with the expected label.
 *
 * Only SPKI (`PUBLIC KEY`) and PKCS#8 (`PRIVATE KEY`) are importable by
 * WebCrypto; PKCS#1 blocks (`RSA PRIVATE KEY`) are rejected with a hint.
 *
 * @throws {KeyFormatError} If the armour is missing, mislabelled or not base64
 */
export function pemToDer(pem: string, expectedLabel: PemLabel): Uint8Array {
  const match = PEM_PATTERN.exec(pem)
  if (match === null) {
    throw new KeyFormatError(`Expected a PEM block labelled "${expectedLabel}"`)
  }

  const label = match[1] ?? ''
  if (label !== expectedLabel) {
    const hint = label.startsWith('RSA ')
      ? ' (PKCS#1 key: convert with `openssl pkcs8 -topk8 -nocrypt` or `openssl rsa -pubout`)'
      : ''
    throw new KeyFormatError(`Expected PEM label "${expectedLabel}", got "${label}"${hint}`)
  }

  try {
    return fromBase64(match[2] ?? '')
  } catch (error) {
    throw new KeyFormatError(`PEM block "${expectedLabel}" is not valid base64`, error)
  }
}

/**
 * Wraps DER bytes in PEM armour (64-character lines).
 */
export function derToPem(der: Uint8Array, label: PemLabel): string {
  const body = toBase64(der).replace(/(.{64})/g, '$1\n').replace(/\n$/, '')
  return `-----BEGIN ${label}-----\n${body}\n-----END ${label}-----\n`
}
