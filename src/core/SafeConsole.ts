/**
 * SafeConsole - Development-only logging
 *
 * Outside development, log/warn/info/debug calls are no-ops.
 * In development, they pass through to console.
 *
 * The environment is checked per call rather than once at load, so a
 * process that flips NODE_ENV (or a test that stubs it) sees the change.
 */

import { isDevelopment } from './env.ts'

/**
 * Log message (dev only)
 */
export function log(...args: unknown[]): void {
  if (isDevelopment()) {
    console.log(...args)
  }
}

/**
 * Warning message (dev only)
 */
export function warn(...args: unknown[]): void {
  if (isDevelopment()) {
    console.warn(...args)
  }
}

/**
 * Error message (always logs, even in prod - errors should be visible)
 */
export function error(...args: unknown[]): void {
  console.error(...args)
}

/**
 * Info message (dev only)
 */
export function info(...args: unknown[]): void {
  if (isDevelopment()) {
    console.info(...args)
  }
}

/**
 * Debug message (dev only)
 */
export function debug(...args: unknown[]): void {
  if (isDevelopment()) {
    console.debug(...args)
  }
}

/**
 * Debug group (dev only)
 */
export function group(label: string): void {
  if (isDevelopment()) {
    console.group(label)
  }
}

/**
 * Debug group end (dev only)
 */
export function groupEnd(): void {
  if (isDevelopment()) {
    console.groupEnd()
  }
}

export const SafeConsole = {
  log,
  warn,
  error,
  info,
  debug,
  group,
  groupEnd,
}
