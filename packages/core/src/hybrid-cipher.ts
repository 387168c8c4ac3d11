// @session-relay/core - Hybrid cipher (symmetric payload + asymmetric transport)

import type {
  AsymmetricTransport,
  SymmetricCodec,
  SymmetricCodecFactory,
} from './crypto-provider.js'
import type { EncryptedEnvelope } from './types.js'
import { WebCryptoAsymmetricTransport, webCryptoSymmetricCodecs } from './web-crypto-provider.js'

/**
 * A symmetric codec composed with an asymmetric transport.
 *
 * The four primitives can be chained:
 *
 * ```
 * decryptSym(decryptAsym(encryptAsym(encryptSym(p), pub), priv)) === p
 * ```
 *
 * as long as the symmetric ciphertext fits the OAEP limit (214 bytes for
 * RSA-2048 / SHA-1). Larger payloads go through `seal`, which wraps only the
 * symmetric key.
 */
export interface HybridCipher {
  encryptSym(plaintext: Uint8Array): Promise<Uint8Array>
  decryptSym(ciphertext: Uint8Array): Promise<Uint8Array>
  encryptAsym(data: Uint8Array, publicKey: CryptoKey): Promise<Uint8Array>
  decryptAsym(data: Uint8Array, privateKey: CryptoKey): Promise<Uint8Array>

  /**
   * Encrypts `plaintext` with this cipher's symmetric key and wraps the key
   * for `publicKey`.
   */
  seal(plaintext: Uint8Array, publicKey: CryptoKey): Promise<EncryptedEnvelope>
}

/**
 * Composes a HybridCipher from a codec and a transport.
 */
export function createHybridCipher(
  codec: SymmetricCodec,
  transport: AsymmetricTransport,
): HybridCipher {
  return {
    encryptSym: (plaintext) => codec.encrypt(plaintext),
    decryptSym: (ciphertext) => codec.decrypt(ciphertext),
    encryptAsym: (data, publicKey) => transport.encrypt(data, publicKey),
    decryptAsym: (data, privateKey) => transport.decrypt(data, privateKey),

    async seal(plaintext: Uint8Array, publicKey: CryptoKey): Promise<EncryptedEnvelope> {
      const rawKey = await codec.exportKey()
      const [key, sessionData] = await Promise.all([
        transport.encrypt(rawKey, publicKey),
        codec.encrypt(plaintext),
      ])
      return { key, session_data: sessionData }
    },
  }
}

/**
 * Creates a HybridCipher with a freshly generated symmetric key.
 * Defaults to AES-256-CBC + RSA-OAEP (SHA-1).
 */
export async function generateHybridCipher(
  transport: AsymmetricTransport = new WebCryptoAsymmetricTransport(),
  codecs: SymmetricCodecFactory = webCryptoSymmetricCodecs,
): Promise<HybridCipher> {
  return createHybridCipher(await codecs.generate(), transport)
}

/**
 * Opens an envelope addressed to `privateKey`.
 *
 * 1. Unwraps the symmetric key from `envelope.key`
 * 2. Decrypts `envelope.session_data` with it
 *
 * @throws {DecryptionError} If either step fails
 * @throws {KeyFormatError} If the unwrapped key has the wrong length
 */
export async function openEnvelope(
  envelope: EncryptedEnvelope,
  privateKey: CryptoKey,
  transport: AsymmetricTransport = new WebCryptoAsymmetricTransport(),
  codecs: SymmetricCodecFactory = webCryptoSymmetricCodecs,
): Promise<Uint8Array> {
  const rawKey = await transport.decrypt(envelope.key, privateKey)
  const codec = await codecs.fromRawKey(rawKey)
  return codec.decrypt(envelope.session_data)
}
