// @session-relay/runtime - Environment configuration (zod)

import { z } from 'zod'
import { DEFAULT_CACHE_MAX_SIZE } from '@session-relay/core'
import { DEFAULT_REJECTED_REQUEST_STATUS, DEFAULT_SESSION_COOKIE_NAME } from '@session-relay/policy'
import type { LevelWithSilent } from './logger.js'
import { DEFAULT_AUTH_SERVER_PATH } from './auth-server-client.js'
import { DEFAULT_ID_TOKEN_ISSUERS } from './id-token-verifier.js'
import { ConfigError } from './errors.js'

/** Default auth server timeout applied by the environment loader */
export const DEFAULT_AUTH_SERVER_TIMEOUT_MS = 10_000

/** Relay settings read from the environment */
export interface RelayEnv {
  readonly authServerUrl: string
  readonly authServerPath: string
  readonly privateKeyPath: string
  readonly authServerPublicKeyPath: string
  readonly idTokenAudience: string
  readonly idTokenIssuers: readonly string[]
  readonly sessionCookieName: string
  readonly sessionCacheMaxSize: number
  readonly sessionCacheTtlMs: number | undefined
  readonly authServerTimeoutMs: number
  readonly rejectedRequestStatus: number
  readonly logLevel: LevelWithSilent
}

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const

/** Blank values count as unset */
function optional<T extends z.ZodTypeAny>(schema: T) {
  return z.preprocess(
    (value) => (typeof value === 'string' && value.trim() === '' ? undefined : value),
    schema.optional(),
  )
}

const required = z.string().trim().min(1, 'is required')
const positiveInt = z.coerce.number().int().positive()

const envSchema = z.object({
  AUTH_SERVER_URL: z.string().trim().url(),
  AUTH_SERVER_PATH: optional(z.string().trim().startsWith('/', 'must start with "/"')),
  PRIVATE_KEY_PATH: required,
  AUTH_SERVER_PUBLIC_KEY_PATH: required,
  ID_TOKEN_AUDIENCE: required,
  ID_TOKEN_ISSUERS: optional(z.string()),
  SESSION_COOKIE_NAME: optional(
    z.string().trim().regex(/^[!#$%&'*+\-.^_`|~0-9A-Za-z]+$/, 'is not a cookie name'),
  ),
  SESSION_CACHE_MAX_SIZE: optional(positiveInt),
  SESSION_CACHE_TTL_MS: optional(positiveInt),
  AUTH_SERVER_TIMEOUT_MS: optional(positiveInt),
  REJECTED_REQUEST_STATUS: optional(z.coerce.number().int().min(100).max(599)),
  LOG_LEVEL: optional(z.enum(LOG_LEVELS)),
})

function parseList(value: string | undefined): string[] | undefined {
  if (value === undefined) return undefined
  const items = value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0)
  return items.length > 0 ? items : undefined
}

/**
 * Reads and validates relay settings from the environment.
 *
 * @throws {ConfigError} Listing every missing or invalid variable
 *
 * @example
 * ```typescript
 * const env = loadRelayEnv({
 *   AUTH_SERVER_URL: 'https://auth.internal.example.com',
 *   PRIVATE_KEY_PATH: '/etc/relay/private.pem',
 *   AUTH_SERVER_PUBLIC_KEY_PATH: '/etc/relay/auth-server.pem',
 *   ID_TOKEN_AUDIENCE: 'my-client-id.apps.example.com',
 * })
 * ```
 */
export function loadRelayEnv(env: Readonly<Record<string, string | undefined>> = process.env): RelayEnv {
  const parsed = envSchema.safeParse(env)
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => {
      const name = issue.path.join('.')
      const missing = issue.code === 'invalid_type' && issue.received === 'undefined'
      return `${name}: ${missing ? 'is required' : issue.message}`
    })
    throw new ConfigError(issues, parsed.error)
  }

  const values = parsed.data
  return {
    authServerUrl: values.AUTH_SERVER_URL,
    authServerPath: values.AUTH_SERVER_PATH ?? DEFAULT_AUTH_SERVER_PATH,
    privateKeyPath: values.PRIVATE_KEY_PATH,
    authServerPublicKeyPath: values.AUTH_SERVER_PUBLIC_KEY_PATH,
    idTokenAudience: values.ID_TOKEN_AUDIENCE,
    idTokenIssuers: parseList(values.ID_TOKEN_ISSUERS) ?? DEFAULT_ID_TOKEN_ISSUERS,
    sessionCookieName: values.SESSION_COOKIE_NAME ?? DEFAULT_SESSION_COOKIE_NAME,
    sessionCacheMaxSize: values.SESSION_CACHE_MAX_SIZE ?? DEFAULT_CACHE_MAX_SIZE,
    sessionCacheTtlMs: values.SESSION_CACHE_TTL_MS,
    authServerTimeoutMs: values.AUTH_SERVER_TIMEOUT_MS ?? DEFAULT_AUTH_SERVER_TIMEOUT_MS,
    rejectedRequestStatus: values.REJECTED_REQUEST_STATUS ?? DEFAULT_REJECTED_REQUEST_STATUS,
    logLevel: values.LOG_LEVEL ?? 'info',
  }
}
