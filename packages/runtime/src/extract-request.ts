// @session-relay/runtime - Request metadata extraction helpers

import type { RelayRequestMetadata } from '@session-relay/policy'

// ============================================================
// Header Getter Abstraction
// ============================================================

/**
 * Generic header getter function.
 * Adapters implement this to bridge framework-specific header access.
 */
export type HeaderGetter = (name: string) => string | null

// ============================================================
// Cookie Parsing
// ============================================================

/**
 * Reads one cookie out of a `Cookie` header.
 *
 * First occurrence wins. Values wrapped in double quotes are unwrapped;
 * percent-encoding is decoded where valid and kept verbatim otherwise.
 *
 * @example
 * readCookie('theme=dark; session_id=abc123', 'session_id') → 'abc123'
 * readCookie(null, 'session_id') → null
 */
export function readCookie(cookieHeader: string | null, name: string): string | null {
  if (cookieHeader === null) return null

  for (const pair of cookieHeader.split(';')) {
    const eq = pair.indexOf('=')
    if (eq < 0) continue
    if (pair.slice(0, eq).trim() !== name) continue

    let value = pair.slice(eq + 1).trim()
    if (value.length >= 2 && value.startsWith('"') && value.endsWith('"')) {
      value = value.slice(1, -1)
    }
    return decodeCookieValue(value)
  }
  return null
}

function decodeCookieValue(value: string): string {
  if (!value.includes('%')) return value
  try {
    return decodeURIComponent(value)
  } catch {
    // Malformed escape: keep as sent, the session id check rejects it
    return value
  }
}

// ============================================================
// Query Parsing
// ============================================================

/**
 * Reads a query parameter from a request URL or path.
 * Accepts absolute URLs and origin-relative paths (`/token?token_type=email`).
 */
export function readQueryParam(url: string, name: string): string | null {
  const qIndex = url.indexOf('?')
  if (qIndex < 0) return null
  const hashIndex = url.indexOf('#', qIndex)
  const query = hashIndex < 0 ? url.slice(qIndex + 1) : url.slice(qIndex + 1, hashIndex)
  return new URLSearchParams(query).get(name)
}

// ============================================================
// Request Metadata Assembly
// ============================================================

/**
 * Assembles `RelayRequestMetadata` from generic request components.
 *
 * This is the single point where framework-specific HTTP objects
 * are transformed into the policy layer's input format.
 */
export function extractRelayMetadata(
  getHeader: HeaderGetter,
  url: string,
  options: { readonly sessionCookieName: string; readonly tokenTypeParam: string },
): RelayRequestMetadata {
  return {
    sessionId: readCookie(getHeader('cookie'), options.sessionCookieName),
    tokenType: readQueryParam(url, options.tokenTypeParam),
  }
}
