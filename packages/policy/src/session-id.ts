// @session-relay/policy - Session id format

import { rejection } from './outcome.js'
import type { RuleResult } from './types.js'
import { BAD_SESSION_ID_STATUS, MAX_SESSION_ID_LENGTH } from './types.js'

/** Cookie-safe characters a session id may contain */
const SESSION_ID_PATTERN = /^[A-Za-z0-9._~+/=-]+$/

/**
 * Checks the shape of a session id without consulting any server.
 *
 * Accepts 1..1024 characters from `[A-Za-z0-9._~+/=-]`.
 */
export function isValidSessionId(value: string | null | undefined): value is string {
  if (value === null || value === undefined) return false
  if (value.length === 0 || value.length > MAX_SESSION_ID_LENGTH) return false
  return SESSION_ID_PATTERN.test(value)
}

/**
 * First step of resolution: missing, empty or malformed ids stop here with
 * `BAD_SESSION_ID`.
 */
export function checkSessionId(value: string | null | undefined): RuleResult<string> {
  if (!isValidSessionId(value)) {
    return { allowed: false, rejection: rejection(BAD_SESSION_ID_STATUS, 'BAD_SESSION_ID') }
  }
  return { allowed: true, value }
}

/**
 * Shortens a session id for log lines: `abcd1234...wxyz`.
 * Ids of 16 characters or fewer keep only their first two.
 */
export function shortenSessionId(value: string): string {
  if (value.length > 16) {
    return `${value.slice(0, 8)}...${value.slice(-4)}`
  }
  return `${value.slice(0, 2)}...`
}
