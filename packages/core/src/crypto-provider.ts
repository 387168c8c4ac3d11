// @session-relay/core - Cipher abstractions (symmetric codec, asymmetric transport)

/**
 * Symmetric payload cipher.
 *
 * One instance holds exactly one key for its whole lifetime. Every call to
 * `encrypt` draws a fresh random IV and prepends it to the output, so the
 * ciphertext alone is enough to decrypt.
 *
 * Default implementation: WebCryptoSymmetricCodec (AES-256-CBC, PKCS#7).
 */
export interface SymmetricCodec {
  /**
   * Encrypts `plaintext` and returns `iv || ciphertext`.
   */
  encrypt(plaintext: Uint8Array): Promise<Uint8Array>

  /**
   * Decrypts `iv || ciphertext`.
   *
   * @throws {DecryptionError} On truncated input, misaligned blocks or bad padding
   */
  decrypt(ciphertext: Uint8Array): Promise<Uint8Array>

  /** Raw key bytes, for wrapping with an AsymmetricTransport */
  exportKey(): Promise<Uint8Array>
}

/**
 * Creates SymmetricCodec instances, either with a fresh random key or
 * from raw key bytes unwrapped off the wire.
 */
export interface SymmetricCodecFactory {
  generate(): Promise<SymmetricCodec>
  fromRawKey(rawKey: Uint8Array): Promise<SymmetricCodec>
}

/**
 * Public-key transport wrapper.
 *
 * Protects a small binary artifact (a symmetric ciphertext or a symmetric
 * key) in transit between this process and the auth server.
 *
 * Default implementation: WebCryptoAsymmetricTransport (RSA-OAEP).
 */
export interface AsymmetricTransport {
  /**
   * Encrypts `data` for the holder of the matching private key.
   *
   * @throws {EncryptionError} If `data` exceeds the OAEP size limit
   */
  encrypt(data: Uint8Array, publicKey: CryptoKey): Promise<Uint8Array>

  /**
   * Decrypts `data` with the local private key.
   *
   * @throws {DecryptionError} If the key does not match or the block is corrupt
   */
  decrypt(data: Uint8Array, privateKey: CryptoKey): Promise<Uint8Array>

  /** Imports an SPKI `PUBLIC KEY` PEM for encryption */
  importPublicKey(pem: string): Promise<CryptoKey>

  /** Imports a PKCS#8 `PRIVATE KEY` PEM for decryption */
  importPrivateKey(pem: string): Promise<CryptoKey>

  /** Generates a fresh key pair (tests, local tooling) */
  generateKeyPair(): Promise<CryptoKeyPair>
}
