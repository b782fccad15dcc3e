/**
 * Utility functions
 */

export * from './permutations'
