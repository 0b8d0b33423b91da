/**
 * Sink for diagnostics that do not stop parsing
 */
export interface Logger {
  warn: (...args: unknown[]) => void
}

const PREFIX = "[tagged-json]"

export const consoleLogger: Logger = {
  warn: (...args) => console.warn(PREFIX, ...args),
}

export const silentLogger: Logger = {
  warn: () => {},
}
