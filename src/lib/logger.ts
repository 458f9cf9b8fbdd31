/**
 * Console logger
 *
 * Writes every level to stderr for library callers outside Actions.
 */

import type { Logger } from '../types.js'

export function createConsoleLogger(options: { verbose?: boolean; quiet?: boolean } = {}): Logger {
  const { verbose = false, quiet = false } = options

  return {
    debug(message: string) {
      if (verbose) {
        console.error(`[secret-fleet] ${message}`)
      }
    },
    info(message: string) {
      if (!quiet) {
        console.error(message)
      }
    },
    warn(message: string) {
      console.error(`Warning: ${message}`)
    },
    error(message: string) {
      console.error(`Error: ${message}`)
    }
  }
}

/** Logger that drops everything */
export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {}
}
