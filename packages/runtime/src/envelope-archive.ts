// @session-relay/runtime - Envelope archive codec (zip with `key` + `session_data`)

import AdmZip from 'adm-zip'
import { ENVELOPE_DATA_MEMBER, ENVELOPE_KEY_MEMBER } from '@session-relay/core'
import type { EncryptedEnvelope } from '@session-relay/core'
import { AuthServerError } from './errors.js'

/** Content type of a packed envelope */
export const ENVELOPE_CONTENT_TYPE = 'application/zip'

/**
 * Packs an envelope into a zip archive with exactly the members
 * `key` and `session_data`.
 */
export function packEnvelope(envelope: EncryptedEnvelope): Uint8Array {
  const zip = new AdmZip()
  zip.addFile(ENVELOPE_KEY_MEMBER, Buffer.from(envelope.key))
  zip.addFile(ENVELOPE_DATA_MEMBER, Buffer.from(envelope.session_data))
  return new Uint8Array(zip.toBuffer())
}

/**
 * Unpacks a zip archive into an envelope.
 *
 * @throws {AuthServerError} kind `protocol` if the body is not a zip, a
 *   member is missing, or any other member is present
 */
export function unpackEnvelope(archive: Uint8Array): EncryptedEnvelope {
  let zip: AdmZip
  try {
    zip = new AdmZip(Buffer.from(archive))
  } catch (error) {
    throw new AuthServerError('protocol', 'Envelope is not a zip archive', { cause: error })
  }

  const members = new Map<string, Uint8Array>()
  try {
    for (const entry of zip.getEntries()) {
      if (entry.isDirectory) continue
      members.set(entry.entryName, new Uint8Array(entry.getData()))
    }
  } catch (error) {
    throw new AuthServerError('protocol', 'Envelope archive is corrupt', { cause: error })
  }

  const key = members.get(ENVELOPE_KEY_MEMBER)
  const sessionData = members.get(ENVELOPE_DATA_MEMBER)
  if (key === undefined || sessionData === undefined) {
    throw new AuthServerError(
      'protocol',
      `Envelope archive must contain "${ENVELOPE_KEY_MEMBER}" and "${ENVELOPE_DATA_MEMBER}", got [${[...members.keys()].join(', ')}]`,
    )
  }
  if (members.size !== 2) {
    const extra = [...members.keys()].filter(
      (name) => name !== ENVELOPE_KEY_MEMBER && name !== ENVELOPE_DATA_MEMBER,
    )
    throw new AuthServerError('protocol', `Unexpected archive members: ${extra.join(', ')}`)
  }

  return { key, session_data: sessionData }
}
