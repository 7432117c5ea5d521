/**
 * Minimal logging hook. The library never prints on its own behalf except
 * through one of these, so hosts can route or silence it.
 */
export interface SegmentationLogger {
  debug(message: string, ...details: unknown[]): void
  warn(message: string, ...details: unknown[]): void
}

const TAG = '[paintseg]'

/**
 * Console-backed logger. `debug` output is dropped unless `verbose` is set.
 */
export function createConsoleLogger(verbose = false): SegmentationLogger {
  return {
    debug(message, ...details) {
      if (verbose) console.debug(`${TAG} ${message}`, ...details)
    },
    warn(message, ...details) {
      console.warn(`${TAG} ${message}`, ...details)
    },
  }
}

export const silentLogger: SegmentationLogger = {
  debug() {},
  warn() {},
}
