/**
 * Base VM Instruction System
 *
 * Defines the base interface and abstract classes for all instruction
 * handlers. A handler owns both the operand shape of its opcode (decode)
 * and its semantics (execute).
 */

import {
  type DecodedAdd,
  type DecodedEquals,
  type DecodedInstruction,
  type DecodedLessThan,
  type DecodedMultiply,
  type InstructionContext,
  type InstructionResult,
  InvalidWriteError,
  type Parameter,
  type RawWords,
  type Safe,
  safeError,
  safeResult,
  type Word,
} from '@wordvm/types'
import { INSTRUCTION_WIDTH } from '../config'
import { type OperandIndex, resolveParameter, toAddress } from '../decoder'

/**
 * Base interface for all instruction handlers
 */
export interface InstructionHandler<
  T extends DecodedInstruction = DecodedInstruction,
> {
  readonly opcode: number
  readonly name: T['kind']
  /** Words consumed by the instruction, opcode included */
  readonly width: number

  /**
   * Materialise the decoded instruction from the raw words
   */
  decode(raw: RawWords): Safe<T>

  /**
   * Execute the instruction (mutates context in place)
   * @returns resultCode (null = continue, otherwise halt/end of stream)
   */
  execute(
    instruction: T,
    context: InstructionContext,
  ): InstructionResult | Promise<InstructionResult>

  /**
   * Disassemble instruction to string representation
   */
  disassemble(instruction: T): string
}

export abstract class BaseInstruction<T extends DecodedInstruction>
  implements InstructionHandler<T>
{
  abstract readonly opcode: number
  abstract readonly name: T['kind']
  abstract readonly width: number

  abstract decode(raw: RawWords): Safe<T>

  abstract execute(
    instruction: T,
    context: InstructionContext,
  ): InstructionResult | Promise<InstructionResult>

  disassemble(instruction: T): string {
    const operands = this.parametersOf(instruction).map(formatParameter)
    return [this.name.toUpperCase(), operands.join(', ')]
      .filter((part) => part.length > 0)
      .join(' ')
  }

  protected abstract parametersOf(instruction: T): Parameter[]

  protected parameter(raw: RawWords, index: OperandIndex): Safe<Parameter> {
    return resolveParameter(raw, index)
  }

  /**
   * Resolve a parameter to a value: indirect through memory, immediate as is
   */
  protected read(context: InstructionContext, parameter: Parameter): Word {
    if (parameter.mode === 'immediate') {
      return parameter.value
    }
    return context.memory.read(parameter.address)
  }

  protected write(
    context: InstructionContext,
    parameter: Parameter,
    value: Word,
    instruction: T,
  ): Safe<true> {
    if (parameter.mode === 'immediate') {
      return safeError(
        new InvalidWriteError(parameter.value, {
          pc: instruction.pc,
          opcode: instruction.opcode,
        }),
      )
    }
    context.memory.write(parameter.address, value)
    return safeResult<true>(true)
  }

  protected advance(context: InstructionContext): InstructionResult {
    context.registers.programCounter += this.width
    return { resultCode: null }
  }

  protected jump(
    context: InstructionContext,
    target: Word,
    instruction: T,
  ): InstructionResult {
    const [error, address] = toAddress(target, {
      pc: instruction.pc,
      opcode: instruction.opcode,
    })
    if (error) {
      return { resultCode: null, error }
    }
    context.registers.programCounter = address
    return { resultCode: null }
  }
}

type BinaryInstructionKind =
  | DecodedAdd
  | DecodedMultiply
  | DecodedLessThan
  | DecodedEquals

/**
 * Two read operands and one destination: `dest = compute(op1, op2)`
 */
export abstract class BinaryInstruction<
  T extends BinaryInstructionKind,
> extends BaseInstruction<T> {
  readonly width = INSTRUCTION_WIDTH.THREE_OPERANDS

  protected abstract compute(a: Word, b: Word): Word

  execute(instruction: T, context: InstructionContext): InstructionResult {
    const a = this.read(context, instruction.op1)
    const b = this.read(context, instruction.op2)
    const [error] = this.write(
      context,
      instruction.dest,
      this.compute(a, b),
      instruction,
    )
    if (error) {
      return { resultCode: null, error }
    }
    return this.advance(context)
  }

  protected operands(
    raw: RawWords,
  ): Safe<{ op1: Parameter; op2: Parameter; dest: Parameter }> {
    const [op1Error, op1] = this.parameter(raw, 0)
    if (op1Error) {
      return safeError(op1Error)
    }
    const [op2Error, op2] = this.parameter(raw, 1)
    if (op2Error) {
      return safeError(op2Error)
    }
    const [destError, dest] = this.parameter(raw, 2)
    if (destError) {
      return safeError(destError)
    }
    return safeResult({ op1, op2, dest })
  }

  protected parametersOf(instruction: T): Parameter[] {
    return [instruction.op1, instruction.op2, instruction.dest]
  }
}

export function formatParameter(parameter: Parameter): string {
  return parameter.mode === 'immediate'
    ? parameter.value.toString()
    : `[${parameter.address}]`
}
