/**
 * Centralized Type Definitions for the Word VM
 *
 * Single source of truth for the interfaces, types and error classes used
 * across the VM, its I/O bindings and the command line.
 */

// Error types
export * from './errors'
// Safe types
export * from './safe'
// VM types
export * from './vm'
