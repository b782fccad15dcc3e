/**
 * Control Flow Instructions
 *
 * Conditional jumps, relative base adjustment and halt
 */

import {
  type DecodedAdjustRelativeBase,
  type DecodedHalt,
  type DecodedJumpIfFalse,
  type DecodedJumpIfTrue,
  type InstructionContext,
  type InstructionResult,
  type Parameter,
  type RawWords,
  type Safe,
  safeError,
  safeResult,
  type Word,
} from '@wordvm/types'
import { INSTRUCTION_WIDTH, OPCODES, RESULT_CODES } from '../config'
import { BaseInstruction } from './base'

type ConditionalJump = DecodedJumpIfTrue | DecodedJumpIfFalse

/**
 * pc = target when the predicate holds on the condition, else fall through
 *
 * The target's resolved value becomes the next pc directly.
 */
abstract class ConditionalJumpInstruction<
  T extends ConditionalJump,
> extends BaseInstruction<T> {
  readonly width = INSTRUCTION_WIDTH.TWO_OPERANDS

  protected abstract holds(condition: Word): boolean

  execute(instruction: T, context: InstructionContext): InstructionResult {
    const condition = this.read(context, instruction.condition)
    if (!this.holds(condition)) {
      return this.advance(context)
    }
    return this.jump(context, this.read(context, instruction.target), instruction)
  }

  protected operands(
    raw: RawWords,
  ): Safe<{ condition: Parameter; target: Parameter }> {
    const [conditionError, condition] = this.parameter(raw, 0)
    if (conditionError) {
      return safeError(conditionError)
    }
    const [targetError, target] = this.parameter(raw, 1)
    if (targetError) {
      return safeError(targetError)
    }
    return safeResult({ condition, target })
  }

  protected parametersOf(instruction: T): Parameter[] {
    return [instruction.condition, instruction.target]
  }
}

/**
 * JUMP_IF_TRUE instruction (opcode 5)
 */
export class JUMP_IF_TRUEInstruction extends ConditionalJumpInstruction<DecodedJumpIfTrue> {
  readonly opcode = OPCODES.JUMP_IF_TRUE
  readonly name = 'jump-if-true'

  decode(raw: RawWords): Safe<DecodedJumpIfTrue> {
    const [error, operands] = this.operands(raw)
    if (error) {
      return safeError(error)
    }
    return safeResult({
      kind: this.name,
      opcode: this.opcode,
      pc: raw.pc,
      ...operands,
    })
  }

  protected holds(condition: Word): boolean {
    return condition !== 0n
  }
}

/**
 * JUMP_IF_FALSE instruction (opcode 6)
 */
export class JUMP_IF_FALSEInstruction extends ConditionalJumpInstruction<DecodedJumpIfFalse> {
  readonly opcode = OPCODES.JUMP_IF_FALSE
  readonly name = 'jump-if-false'

  decode(raw: RawWords): Safe<DecodedJumpIfFalse> {
    const [error, operands] = this.operands(raw)
    if (error) {
      return safeError(error)
    }
    return safeResult({
      kind: this.name,
      opcode: this.opcode,
      pc: raw.pc,
      ...operands,
    })
  }

  protected holds(condition: Word): boolean {
    return condition === 0n
  }
}

/**
 * ADJUST_RELATIVE_BASE instruction (opcode 9)
 * relativeBase += offset
 */
export class ADJUST_RELATIVE_BASEInstruction extends BaseInstruction<DecodedAdjustRelativeBase> {
  readonly opcode = OPCODES.ADJUST_RELATIVE_BASE
  readonly name = 'adjust-relative-base'
  readonly width = INSTRUCTION_WIDTH.ONE_OPERAND

  decode(raw: RawWords): Safe<DecodedAdjustRelativeBase> {
    const [error, offset] = this.parameter(raw, 0)
    if (error) {
      return safeError(error)
    }
    return safeResult({
      kind: this.name,
      opcode: this.opcode,
      pc: raw.pc,
      offset,
    })
  }

  execute(
    instruction: DecodedAdjustRelativeBase,
    context: InstructionContext,
  ): InstructionResult {
    const offset = this.read(context, instruction.offset)
    context.registers.relativeBase = BigInt.asIntN(
      64,
      context.registers.relativeBase + offset,
    )
    return this.advance(context)
  }

  protected parametersOf(instruction: DecodedAdjustRelativeBase): Parameter[] {
    return [instruction.offset]
  }
}

/**
 * HALT instruction (opcode 99)
 */
export class HALTInstruction extends BaseInstruction<DecodedHalt> {
  readonly opcode = OPCODES.HALT
  readonly name = 'halt'
  readonly width = INSTRUCTION_WIDTH.NO_OPERANDS

  decode(raw: RawWords): Safe<DecodedHalt> {
    return safeResult({ kind: this.name, opcode: this.opcode, pc: raw.pc })
  }

  execute(
    _instruction: DecodedHalt,
    _context: InstructionContext,
  ): InstructionResult {
    return { resultCode: RESULT_CODES.HALT }
  }

  protected parametersOf(): Parameter[] {
    return []
  }
}
