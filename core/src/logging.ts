/**
 * @file core/src/logging.ts
 * @description
 * Console logging for SolidValue. Node flavour of the browser helper:
 * objects go through util.inspect so bigint amounts print as-is.
 */

import { inspect } from 'node:util'
import defaultLoggingConfig from './logging.config.js'

let lastLogTime = performance.now()

let loggingConfig: { [file: string]: boolean } = { ...defaultLoggingConfig }

export const log = {
  info: (...args: unknown[]) => console.log('[info]', ...args),
  warn: (...args: unknown[]) => console.warn('[warn]', ...args),
  error: (...args: unknown[]) => console.error('[error]', ...args)
}

/**
 * Override per-file switches at runtime, e.g. `setLoggingConfig({ chain: true })`.
 */
export const setLoggingConfig = (overrides: { [file: string]: boolean }): void => {
  loggingConfig = { ...loggingConfig, ...overrides }
}

export const isLoggingEnabled = (file: string): boolean =>
  loggingConfig[file] !== undefined ? loggingConfig[file] : loggingConfig.default

const safeFormat = (val: unknown): unknown => {
  if (typeof val === 'object' && val !== null) {
    return inspect(val, { depth: 4, breakLength: 120 })
  }
  return val
}

export const logWithTimestamp = (file: string = 'unknown', message: unknown = 'No message', ...args: unknown[]): void => {
  if (!isLoggingEnabled(file)) return

  const now = performance.now()
  const elapsed = (now - lastLogTime) / 1000
  lastLogTime = now

  const timestamp = new Date().toISOString()

  console.log(
    `[${timestamp}] [${elapsed.toFixed(3)}s] [${file}]`,
    safeFormat(message),
    ...args.map(safeFormat)
  )
}
