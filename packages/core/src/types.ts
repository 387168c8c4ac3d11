// @session-relay/core - Types and constants

// ============================================================
// Symmetric Cipher Constants (AES-256-CBC)
// ============================================================

/** AES key size in bytes (256-bit) */
export const AES_KEY_SIZE = 32

/** AES block size in bytes; also the IV size for CBC mode */
export const AES_BLOCK_SIZE = 16

/** IV size in bytes, prepended to every symmetric ciphertext */
export const IV_SIZE = AES_BLOCK_SIZE

/**
 * Smallest valid symmetric ciphertext: iv(16) + one padded block(16) = 32 bytes.
 * PKCS#7 always emits at least one block, even for empty plaintext.
 */
export const MIN_SYMMETRIC_CIPHERTEXT_SIZE = IV_SIZE + AES_BLOCK_SIZE

// ============================================================
// Asymmetric Transport Constants (RSA-OAEP)
// ============================================================

/** OAEP digest names supported by the transport */
export type OaepHash = 'SHA-1' | 'SHA-256'

/**
 * Default OAEP digest.
 * SHA-1 matches the auth server's OAEP parameters (MGF1 and label hash).
 */
export const DEFAULT_OAEP_HASH: OaepHash = 'SHA-1'

/** Default RSA modulus length in bits for generated key pairs */
export const DEFAULT_RSA_MODULUS_LENGTH = 2048

// ============================================================
// Envelope
// ============================================================

/** Archive member holding the wrapped symmetric key */
export const ENVELOPE_KEY_MEMBER = 'key'

/** Archive member holding the symmetric ciphertext */
export const ENVELOPE_DATA_MEMBER = 'session_data'

/**
 * Two-part encrypted container exchanged with the auth server.
 *
 * - `key` - symmetric key, encrypted for the recipient's public key
 * - `session_data` - payload, encrypted with that symmetric key (iv || ciphertext)
 */
export interface EncryptedEnvelope {
  readonly key: Uint8Array
  readonly session_data: Uint8Array
}

// ============================================================
// Cache Defaults
// ============================================================

/** Default maximum entry count for the bounded LRU cache */
export const DEFAULT_CACHE_MAX_SIZE = 128
