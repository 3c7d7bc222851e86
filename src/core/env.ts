/**
 * Environment Detection Utilities
 *
 * Reads process.env at call time, so tests can switch environments by
 * stubbing variables.
 *
 * Environments are mutually exclusive:
 * - development: NODE_ENV=development
 * - test: Automated test runner (Vitest) or NODE_ENV=test
 * - production: anything else, including an unset NODE_ENV
 */

export type Environment = 'development' | 'test' | 'production'

/**
 * Get the current environment name.
 * Environments are mutually exclusive.
 */
export function getEnvironment(): Environment {
  // Test environment (checked first - highest priority)
  if (process.env.NODE_ENV === 'test' || process.env.VITEST === 'true') {
    return 'test'
  }

  if (process.env.NODE_ENV === 'development') {
    return 'development'
  }

  // A library consumer that sets nothing gets quiet output
  return 'production'
}

// =============================================================================
// Environment checks
// =============================================================================

/** Check if running in test environment (Vitest). */
export function isTest(): boolean {
  return getEnvironment() === 'test'
}

/** Check if running in development environment. */
export function isDevelopment(): boolean {
  return getEnvironment() === 'development'
}

/** Check if running in production environment. */
export function isProduction(): boolean {
  return getEnvironment() === 'production'
}
