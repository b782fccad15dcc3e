/**
 * Word VM Core Package
 *
 * Logging, environment loading and shared utilities
 */

export * from './env'
// Export logger
export * from './logger'
// Export all utilities
export * from './utils'
