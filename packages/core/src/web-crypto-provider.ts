// @session-relay/core - WebCrypto-based codec and transport implementations

import type {
  AsymmetricTransport,
  SymmetricCodec,
  SymmetricCodecFactory,
} from './crypto-provider.js'
import { concatBuffers, pemToDer, toArrayBuffer } from './encoding.js'
import { DecryptionError, EncryptionError, KeyFormatError } from './errors.js'
import {
  AES_BLOCK_SIZE,
  AES_KEY_SIZE,
  DEFAULT_OAEP_HASH,
  DEFAULT_RSA_MODULUS_LENGTH,
  IV_SIZE,
  MIN_SYMMETRIC_CIPHERTEXT_SIZE,
} from './types.js'
import type { OaepHash } from './types.js'

// ============================================================
// Symmetric: AES-256-CBC
// ============================================================

/**
 * AES-256-CBC codec on WebCrypto.
 *
 * - PKCS#7 padding (built into WebCrypto's AES-CBC)
 * - 16-byte random IV per message, prepended to the ciphertext
 * - Key is extractable so it can be wrapped for the peer
 *
 * Construct through `WebCryptoSymmetricCodec.generate()` or
 * `WebCryptoSymmetricCodec.fromRawKey()`.
 */
export class WebCryptoSymmetricCodec implements SymmetricCodec {
  private constructor(private readonly key: CryptoKey) {}

  /** Creates a codec with a fresh random 256-bit key. */
  static async generate(): Promise<WebCryptoSymmetricCodec> {
    const key = await crypto.subtle.generateKey({ name: 'AES-CBC', length: AES_KEY_SIZE * 8 }, true, [
      'encrypt',
      'decrypt',
    ])
    return new WebCryptoSymmetricCodec(key)
  }

  /**
   * Creates a codec from raw key bytes.
   *
   * @throws {KeyFormatError} If the key is not exactly 32 bytes
   */
  static async fromRawKey(rawKey: Uint8Array): Promise<WebCryptoSymmetricCodec> {
    if (rawKey.byteLength !== AES_KEY_SIZE) {
      throw new KeyFormatError(
        `Symmetric key must be ${String(AES_KEY_SIZE)} bytes, got ${String(rawKey.byteLength)}`,
      )
    }
    const key = await crypto.subtle.importKey('raw', toArrayBuffer(rawKey), { name: 'AES-CBC' }, true, [
      'encrypt',
      'decrypt',
    ])
    return new WebCryptoSymmetricCodec(key)
  }

  async encrypt(plaintext: Uint8Array): Promise<Uint8Array> {
    const iv = crypto.getRandomValues(new Uint8Array(IV_SIZE))
    const ciphertext = await crypto.subtle.encrypt(
      { name: 'AES-CBC', iv },
      this.key,
      toArrayBuffer(plaintext),
    )
    return concatBuffers(iv, new Uint8Array(ciphertext))
  }

  async decrypt(ciphertext: Uint8Array): Promise<Uint8Array> {
    if (ciphertext.byteLength < MIN_SYMMETRIC_CIPHERTEXT_SIZE) {
      throw new DecryptionError(
        `Ciphertext too short: ${String(ciphertext.byteLength)} bytes, need at least ${String(MIN_SYMMETRIC_CIPHERTEXT_SIZE)}`,
      )
    }
    if ((ciphertext.byteLength - IV_SIZE) % AES_BLOCK_SIZE !== 0) {
      throw new DecryptionError('Ciphertext is not a whole number of AES blocks')
    }

    const iv = toArrayBuffer(ciphertext.subarray(0, IV_SIZE))
    const body = toArrayBuffer(ciphertext.subarray(IV_SIZE))
    try {
      const plaintext = await crypto.subtle.decrypt({ name: 'AES-CBC', iv }, this.key, body)
      return new Uint8Array(plaintext)
    } catch (error) {
      // WebCrypto reports bad PKCS#7 padding as a bare OperationError
      throw new DecryptionError('Symmetric decryption failed (bad key or padding)', error)
    }
  }

  async exportKey(): Promise<Uint8Array> {
    return new Uint8Array(await crypto.subtle.exportKey('raw', this.key))
  }
}

/** Factory producing WebCrypto AES-256-CBC codecs */
export const webCryptoSymmetricCodecs: SymmetricCodecFactory = {
  generate: () => WebCryptoSymmetricCodec.generate(),
  fromRawKey: (rawKey) => WebCryptoSymmetricCodec.fromRawKey(rawKey),
}

// ============================================================
// Asymmetric: RSA-OAEP
// ============================================================

/** Options for the RSA-OAEP transport */
export interface WebCryptoTransportConfig {
  /** OAEP digest (default: SHA-1) */
  readonly hash?: OaepHash | undefined
  /** Modulus length for generated key pairs (default: 2048) */
  readonly modulusLength?: number | undefined
}

/**
 * RSA-OAEP transport on WebCrypto.
 *
 * Keys are imported from SPKI / PKCS#8 PEM. The OAEP digest is fixed per
 * instance and must match the peer; keys imported by one instance carry
 * that digest and cannot be used with a different one.
 */
export class WebCryptoAsymmetricTransport implements AsymmetricTransport {
  private readonly hash: OaepHash
  private readonly modulusLength: number

  constructor(config?: WebCryptoTransportConfig) {
    this.hash = config?.hash ?? DEFAULT_OAEP_HASH
    this.modulusLength = config?.modulusLength ?? DEFAULT_RSA_MODULUS_LENGTH
  }

  async encrypt(data: Uint8Array, publicKey: CryptoKey): Promise<Uint8Array> {
    try {
      const ciphertext = await crypto.subtle.encrypt({ name: 'RSA-OAEP' }, publicKey, toArrayBuffer(data))
      return new Uint8Array(ciphertext)
    } catch (error) {
      throw new EncryptionError(
        `RSA-OAEP encryption failed for ${String(data.byteLength)} bytes (payload too large or key unusable)`,
        error,
      )
    }
  }

  async decrypt(data: Uint8Array, privateKey: CryptoKey): Promise<Uint8Array> {
    try {
      const plaintext = await crypto.subtle.decrypt({ name: 'RSA-OAEP' }, privateKey, toArrayBuffer(data))
      return new Uint8Array(plaintext)
    } catch (error) {
      throw new DecryptionError('RSA-OAEP decryption failed (wrong private key or corrupt block)', error)
    }
  }

  async importPublicKey(pem: string): Promise<CryptoKey> {
    const der = pemToDer(pem, 'PUBLIC KEY')
    try {
      return await crypto.subtle.importKey(
        'spki',
        toArrayBuffer(der),
        { name: 'RSA-OAEP', hash: this.hash },
        true,
        ['encrypt'],
      )
    } catch (error) {
      throw new KeyFormatError('Public key is not an importable RSA SPKI key', error)
    }
  }

  async importPrivateKey(pem: string): Promise<CryptoKey> {
    const der = pemToDer(pem, 'PRIVATE KEY')
    try {
      return await crypto.subtle.importKey(
        'pkcs8',
        toArrayBuffer(der),
        { name: 'RSA-OAEP', hash: this.hash },
        false,
        ['decrypt'],
      )
    } catch (error) {
      throw new KeyFormatError('Private key is not an importable RSA PKCS#8 key', error)
    }
  }

  async generateKeyPair(): Promise<CryptoKeyPair> {
    return crypto.subtle.generateKey(
      {
        name: 'RSA-OAEP',
        modulusLength: this.modulusLength,
        publicExponent: new Uint8Array([0x01, 0x00, 0x01]),
        hash: this.hash,
      },
      true,
      ['encrypt', 'decrypt'],
    )
  }
}
