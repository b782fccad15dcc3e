/**
 * Instruction Decoder
 *
 * Splits the word at the program counter into an opcode and addressing
 * modes and materialises a decoded instruction. Decoding is a pure function
 * of memory, program counter and relative base: it reads through `peek` and
 * never grows memory or touches the registers.
 */

import {
  DecodeError,
  type DecodedInstruction,
  type EngineRegisters,
  InvalidAddressError,
  type Memory,
  type Parameter,
  type RawWords,
  type Safe,
  safeError,
  safeResult,
} from '@wordvm/types'
import { ADDRESSING_MODES, MEMORY_CONFIG, OPCODE_DIVISOR } from './config'
import type { InstructionHandler } from './instructions/base'
import type { InstructionRegistry } from './instructions/registry'

export type OperandIndex = 0 | 1 | 2

/**
 * A decoded instruction together with the handler that executes it
 */
export interface ResolvedInstruction {
  instruction: DecodedInstruction
  handler: InstructionHandler
}

export function opcodeOf(instruction: bigint): number {
  return Number(instruction % OPCODE_DIVISOR)
}

/**
 * Addressing mode digit of an operand: hundreds for the first operand,
 * thousands for the second, ten-thousands for the third
 */
export function modeOf(instruction: bigint, index: OperandIndex): number {
  const place = 10n ** BigInt(index + 2)
  return Number((instruction / place) % 10n)
}

export function toAddress(
  value: bigint,
  details: { pc: number; opcode: number },
): Safe<number> {
  if (value < 0n || value > BigInt(MEMORY_CONFIG.MAX_ADDRESS)) {
    return safeError(new InvalidAddressError(value, details))
  }
  return safeResult(Number(value))
}

/**
 * Resolve one operand of the raw words into a parameter
 */
export function resolveParameter(
  raw: RawWords,
  index: OperandIndex,
): Safe<Parameter> {
  const opcode = opcodeOf(raw.instruction)
  const mode = modeOf(raw.instruction, index)
  const value = raw.operands[index]

  switch (mode) {
    case ADDRESSING_MODES.POSITION:
      return indirect(value, raw.pc, opcode)
    case ADDRESSING_MODES.IMMEDIATE:
      return safeResult<Parameter>({ mode: 'immediate', value })
    case ADDRESSING_MODES.RELATIVE:
      return indirect(value + raw.relativeBase, raw.pc, opcode)
    default:
      return safeError(DecodeError.unknownMode(mode, opcode, raw.pc))
  }
}

function indirect(value: bigint, pc: number, opcode: number): Safe<Parameter> {
  const [error, address] = toAddress(value, { pc, opcode })
  if (error) {
    return safeError(error)
  }
  return safeResult<Parameter>({ mode: 'indirect', address })
}

export class InstructionDecoder {
  constructor(private readonly registry: InstructionRegistry) {}

  /**
   * Capture the instruction word and the three words after it
   */
  fetch(memory: Memory, registers: EngineRegisters): RawWords {
    const pc = registers.programCounter
    return {
      pc,
      instruction: memory.peek(pc),
      operands: [memory.peek(pc + 1), memory.peek(pc + 2), memory.peek(pc + 3)],
      relativeBase: registers.relativeBase,
    }
  }

  resolve(
    memory: Memory,
    registers: EngineRegisters,
  ): Safe<ResolvedInstruction> {
    const raw = this.fetch(memory, registers)
    const opcode = opcodeOf(raw.instruction)
    const handler = this.registry.getHandler(opcode)
    if (!handler) {
      return safeError(DecodeError.unknownOpcode(opcode, raw.pc))
    }
    const [error, instruction] = handler.decode(raw)
    if (error) {
      return safeError(error)
    }
    return safeResult({ instruction, handler })
  }

  decode(
    memory: Memory,
    registers: EngineRegisters,
  ): Safe<DecodedInstruction> {
    const [error, resolved] = this.resolve(memory, registers)
    if (error) {
      return safeError(error)
    }
    return safeResult(resolved.instruction)
  }
}
