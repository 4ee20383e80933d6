/**
 * Logger used by the package.
 *
 * The default writes to the console. Replace it to route warnings into your own logging setup.
 *
 * @example
 * ```ts
 * import { setLogger } from "jsonapi-resource"
 *
 * setLogger({
 *   warn(msg, ctx) { pino.warn(ctx, msg) },
 * })
 * ```
 */

export interface Logger {
  warn(message: string, context?: Record<string, unknown>): void
}

const defaultLogger: Logger = {
  warn(message, context) {
    if (context && Object.keys(context).length > 0) {
      console.warn(`[jsonapi-resource] ${message}`, context)
    } else {
      console.warn(`[jsonapi-resource] ${message}`)
    }
  },
}

let currentLogger: Logger = defaultLogger

/** Replace the current logger. Pass nothing to restore the console logger. */
export function setLogger(logger: Logger = defaultLogger): void {
  currentLogger = logger
}

/** Get the current logger instance. */
export function getLogger(): Logger {
  return currentLogger
}
