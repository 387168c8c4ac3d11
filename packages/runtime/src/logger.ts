// @session-relay/runtime - Structured logging (pino)

import { pino, stdTimeFunctions } from 'pino'
import type { DestinationStream, LevelWithSilent, Logger, LoggerOptions as PinoOptions } from 'pino'

export type { Logger, LevelWithSilent }

/** Options for `createLogger` */
export interface LoggerOptions {
  /** Minimum level (default: 'info') */
  readonly level?: LevelWithSilent | undefined
  /** Logger name, emitted as `name` on every line (default: 'session-relay') */
  readonly name?: string | undefined
  /** Output stream (default: stdout) */
  readonly destination?: DestinationStream | undefined
}

/**
 * Creates the relay's JSON logger.
 *
 * Lines carry an ISO timestamp and a string `level` label. Session ids are
 * logged shortened (see `shortenSessionId`); token values are never logged.
 */
export function createLogger(options?: LoggerOptions): Logger {
  const config: PinoOptions = {
    name: options?.name ?? 'session-relay',
    level: options?.level ?? 'info',
    timestamp: stdTimeFunctions.isoTime,
    formatters: {
      level: (label: string) => ({ level: label }),
    },
  }
  return options?.destination === undefined ? pino(config) : pino(config, options.destination)
}

/** Logger that discards everything. Default for library entry points. */
export function createSilentLogger(): Logger {
  return pino({ level: 'silent' })
}
