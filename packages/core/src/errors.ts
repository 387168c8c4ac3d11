// @session-relay/core - Error types

/**
 * Base class for every failure raised by the cipher layer.
 * The underlying WebCrypto error (usually an `OperationError`) is kept in `cause`.
 */
export class CipherError extends Error {
  override readonly cause?: unknown

  constructor(message: string, cause?: unknown) {
    super(message)
    this.name = 'CipherError'
    this.cause = cause
  }
}

/** Ciphertext could not be decrypted: bad length, bad padding or wrong key. */
export class DecryptionError extends CipherError {
  constructor(message: string, cause?: unknown) {
    super(message, cause)
    this.name = 'DecryptionError'
  }
}

/** Plaintext could not be encrypted (e.g. too large for RSA-OAEP). */
export class EncryptionError extends CipherError {
  constructor(message: string, cause?: unknown) {
    super(message, cause)
    this.name = 'EncryptionError'
  }
}

/** Key material is not in the expected PEM / DER format. */
export class KeyFormatError extends CipherError {
  constructor(message: string, cause?: unknown) {
    super(message, cause)
    this.name = 'KeyFormatError'
  }
}
