// @session-relay/runtime - Error types

/** Category of an auth server failure */
export type AuthServerErrorKind = 'transport' | 'protocol'

/**
 * The auth server could not be reached or answered with something unusable.
 *
 * - `transport` - network failure, timeout, unexpected HTTP status
 * - `protocol` - body is not a valid envelope, does not decrypt or is not auth data
 *
 * Never cached. The relay maps it to `500 UNKNOWN`.
 */
export class AuthServerError extends Error {
  override readonly cause?: unknown
  readonly kind: AuthServerErrorKind
  /** HTTP status, when the server answered */
  readonly status: number | undefined

  constructor(
    kind: AuthServerErrorKind,
    message: string,
    options?: { readonly cause?: unknown; readonly status?: number | undefined },
  ) {
    super(message)
    this.name = 'AuthServerError'
    this.kind = kind
    this.cause = options?.cause
    this.status = options?.status
  }
}

/** The identity token's `exp` has passed. */
export class IdTokenExpiredError extends Error {
  override readonly cause?: unknown

  constructor(cause?: unknown) {
    super('Token expired')
    this.name = 'IdTokenExpiredError'
    this.cause = cause
  }
}

/** Environment configuration is missing or invalid. */
export class ConfigError extends Error {
  override readonly cause?: unknown
  /** One `NAME: problem` line per offending variable */
  readonly issues: readonly string[]

  constructor(issues: readonly string[], cause?: unknown) {
    super(`Invalid relay configuration:\n  ${issues.join('\n  ')}`)
    this.name = 'ConfigError'
    this.issues = issues
    this.cause = cause
  }
}
