// @session-relay/runtime - Relay wiring from environment

import type { JWTVerifyGetKey } from 'jose'
import { createAuthServerClient } from './auth-server-client.js'
import { loadRelayEnv } from './config.js'
import { createIdTokenVerifier } from './id-token-verifier.js'
import { loadKeyMaterial } from './key-material.js'
import { createLogger } from './logger.js'
import type { Logger } from './logger.js'
import { createRelay } from './relay.js'
import type { Relay } from './types.js'

/** Collaborators that replace the real network / stdout in tests and embedders */
export interface RelayBootstrapOverrides {
  readonly fetchImpl?: typeof fetch | undefined
  readonly keySet?: JWTVerifyGetKey | undefined
  readonly logger?: Logger | undefined
}

/**
 * Builds a relay from environment variables:
 * config → logger → key material → auth server client → verifier → relay.
 *
 * @throws {ConfigError} If the environment is invalid
 * @throws {KeyFormatError} If a key file does not hold the expected key
 */
export async function createRelayFromEnv(
  env: Readonly<Record<string, string | undefined>> = process.env,
  overrides?: RelayBootstrapOverrides,
): Promise<Relay> {
  const settings = loadRelayEnv(env)
  const logger = overrides?.logger ?? createLogger({ level: settings.logLevel })

  const keyMaterial = await loadKeyMaterial({
    privateKeyPath: settings.privateKeyPath,
    serverPublicKeyPath: settings.authServerPublicKeyPath,
  })

  const client = createAuthServerClient({
    baseUrl: settings.authServerUrl,
    path: settings.authServerPath,
    keyMaterial,
    fetchImpl: overrides?.fetchImpl,
    timeoutMs: settings.authServerTimeoutMs,
    logger,
  })

  const verifyIdToken = createIdTokenVerifier({
    audience: settings.idTokenAudience,
    issuers: settings.idTokenIssuers,
    keySet: overrides?.keySet,
  })

  logger.info(
    {
      event: 'relay:started',
      endpoint: client.endpoint,
      cacheMaxSize: settings.sessionCacheMaxSize,
      cacheTtlMs: settings.sessionCacheTtlMs ?? null,
    },
    'session relay ready',
  )

  return createRelay({
    fetchAuthData: (sessionId) => client.fetchAuthData(sessionId),
    verifyIdToken,
    cacheMaxSize: settings.sessionCacheMaxSize,
    cacheTtlMs: settings.sessionCacheTtlMs,
    rejectedRequestStatus: settings.rejectedRequestStatus,
    sessionCookieName: settings.sessionCookieName,
    logger,
  })
}
