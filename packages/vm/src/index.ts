/**
 * Word VM Package Exports
 *
 * Execution engine, I/O bindings and process network for programs made of
 * signed 64-bit integer words
 */

// Logger
export { logger } from '@wordvm/core'
// Re-export types from centralized types package
export * from '@wordvm/types'
// Configuration constants
export {
  ADDRESSING_MODES,
  INSTRUCTION_WIDTH,
  MEMORY_CONFIG,
  OPCODES,
  RESULT_CODES,
} from './config'
export {
  InstructionDecoder,
  modeOf,
  opcodeOf,
  resolveParameter,
  toAddress,
} from './decoder'
export { ExecutionEngine } from './engine'
// Instruction handlers
export { ADDInstruction, MULInstruction } from './instructions/arithmetic'
export {
  BaseInstruction,
  BinaryInstruction,
  formatParameter,
  type InstructionHandler,
} from './instructions/base'
export {
  EQUALSInstruction,
  LESS_THANInstruction,
} from './instructions/comparison'
export {
  ADJUST_RELATIVE_BASEInstruction,
  HALTInstruction,
  JUMP_IF_FALSEInstruction,
  JUMP_IF_TRUEInstruction,
} from './instructions/control-flow'
export {
  INPUTInstruction,
  OUTPUTInstruction,
} from './instructions/input-output'
export { InstructionRegistry } from './instructions/registry'
// I/O bindings
export * from './io'
export { WordMemory } from './memory'
export { findMaxSignal, ProcessNetwork } from './network'
export {
  formatProgram,
  loadProgram,
  parseProgram,
  wordSchema,
} from './program'
