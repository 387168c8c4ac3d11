// @session-relay/core - Public API surface
// Hybrid cipher and bounded memoizing cache

// ============================================================
// Types
// ============================================================

export type {
  AsymmetricTransport,
  SymmetricCodec,
  SymmetricCodecFactory,
} from './crypto-provider.js'

export type { EncryptedEnvelope, OaepHash } from './types.js'

export type { HybridCipher } from './hybrid-cipher.js'

export type { LruCache, LruCacheConfig, Producer } from './lru-cache.js'

export type { WebCryptoTransportConfig } from './web-crypto-provider.js'

export type { PemLabel } from './encoding.js'

// ============================================================
// Cipher
// ============================================================

export {
  WebCryptoSymmetricCodec,
  WebCryptoAsymmetricTransport,
  webCryptoSymmetricCodecs,
} from './web-crypto-provider.js'

export { createHybridCipher, generateHybridCipher, openEnvelope } from './hybrid-cipher.js'

// ============================================================
// Errors
// ============================================================

export { CipherError, DecryptionError, EncryptionError, KeyFormatError } from './errors.js'

// ============================================================
// LRU Cache
// ============================================================

export { createLruCache } from './lru-cache.js'

// ============================================================
// Constants
// ============================================================

export {
  AES_KEY_SIZE,
  AES_BLOCK_SIZE,
  IV_SIZE,
  MIN_SYMMETRIC_CIPHERTEXT_SIZE,
  DEFAULT_OAEP_HASH,
  DEFAULT_RSA_MODULUS_LENGTH,
  ENVELOPE_KEY_MEMBER,
  ENVELOPE_DATA_MEMBER,
  DEFAULT_CACHE_MAX_SIZE,
} from './types.js'

// ============================================================
// Encoding Utilities
// ============================================================

export {
  toBase64,
  fromBase64,
  utf8Encode,
  utf8Decode,
  toArrayBuffer,
  concatBuffers,
  pemToDer,
  derToPem,
} from './encoding.js'
