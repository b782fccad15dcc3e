/**
 * VM Configuration Constants
 *
 * Centralized configuration for the word VM runtime
 */

// Opcode definitions (low two decimal digits of an instruction word)
export const OPCODES = {
  ADD: 1,
  MULTIPLY: 2,
  INPUT: 3,
  OUTPUT: 4,
  JUMP_IF_TRUE: 5,
  JUMP_IF_FALSE: 6,
  LESS_THAN: 7,
  EQUALS: 8,
  ADJUST_RELATIVE_BASE: 9,
  HALT: 99,
} as const

// Parameter addressing modes (decimal digits above the opcode)
export const ADDRESSING_MODES = {
  POSITION: 0,
  IMMEDIATE: 1,
  RELATIVE: 2,
} as const

// Result codes
export const RESULT_CODES = {
  HALT: 0, // Halt instruction decoded
  END_OF_STREAM: 1, // Input stream closed by its producer
} as const

// Instruction widths in words, opcode included
export const INSTRUCTION_WIDTH = {
  THREE_OPERANDS: 4,
  TWO_OPERANDS: 3,
  ONE_OPERAND: 2,
  NO_OPERANDS: 1,
} as const

// Memory configuration
export const MEMORY_CONFIG = {
  GROWTH_FACTOR: 2,
  // Words held in the contiguous buffer; higher addresses are stored sparsely
  DENSE_LIMIT: 2 ** 20,
  // Highest addressable word index
  MAX_ADDRESS: 2 ** 32 - 1,
} as const

export const OPCODE_DIVISOR = 100n
