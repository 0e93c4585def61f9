/**
 * SDK diagnostic logger.
 *
 * Logs to `console.info/warn/error` with a `[Switchboard]` prefix.
 *
 * **Privacy**: Never pass message bodies or passwords to these functions.
 * Dispatcher and session addresses are directory entries and may be logged.
 *
 * @module Core/Logger
 */

const PREFIX = '[Switchboard]'

export function logInfo(message: string): void {
  console.info(PREFIX, message)
}

export function logWarn(message: string): void {
  console.warn(PREFIX, message)
}

export function logError(message: string): void {
  console.error(PREFIX, message)
}
