// @session-relay/runtime - Key material (local private key + auth server public key)

import { readFile } from 'node:fs/promises'
import { WebCryptoAsymmetricTransport } from '@session-relay/core'
import type { AsymmetricTransport } from '@session-relay/core'

/**
 * Keys used to talk to the auth server. Loaded once, frozen, passed in at
 * construction.
 *
 * - `privateKey` - opens response envelopes addressed to this relay
 * - `serverPublicKey` - seals request envelopes for the auth server
 */
export interface KeyMaterial {
  readonly privateKey: CryptoKey
  readonly serverPublicKey: CryptoKey
}

/** PEM sources for `importKeyMaterial` */
export interface KeyMaterialPems {
  /** PKCS#8 `PRIVATE KEY` PEM */
  readonly privateKeyPem: string
  /** SPKI `PUBLIC KEY` PEM */
  readonly serverPublicKeyPem: string
}

/** File sources for `loadKeyMaterial` */
export interface KeyMaterialPaths {
  readonly privateKeyPath: string
  readonly serverPublicKeyPath: string
}

/**
 * Imports key material from PEM strings.
 *
 * @throws {KeyFormatError} If either PEM is mislabelled or not an RSA key
 */
export async function importKeyMaterial(
  pems: KeyMaterialPems,
  transport: AsymmetricTransport = new WebCryptoAsymmetricTransport(),
): Promise<KeyMaterial> {
  const [privateKey, serverPublicKey] = await Promise.all([
    transport.importPrivateKey(pems.privateKeyPem),
    transport.importPublicKey(pems.serverPublicKeyPem),
  ])
  return Object.freeze({ privateKey, serverPublicKey })
}

/**
 * Reads both PEM files and imports them.
 *
 * @throws {KeyFormatError} If either file does not hold the expected key
 */
export async function loadKeyMaterial(
  paths: KeyMaterialPaths,
  transport?: AsymmetricTransport,
): Promise<KeyMaterial> {
  const [privateKeyPem, serverPublicKeyPem] = await Promise.all([
    readFile(paths.privateKeyPath, 'utf8'),
    readFile(paths.serverPublicKeyPath, 'utf8'),
  ])
  return importKeyMaterial({ privateKeyPem, serverPublicKeyPem }, transport)
}
