/**
 * Input/Output Instructions
 *
 * The only instructions that reach the engine's I/O capability, and so the
 * only points where an engine can suspend.
 */

import {
  type DecodedInput,
  type DecodedOutput,
  EndOfStreamError,
  type InstructionContext,
  type InstructionResult,
  type Parameter,
  type RawWords,
  type Safe,
  safeError,
  safeResult,
} from '@wordvm/types'
import { INSTRUCTION_WIDTH, OPCODES, RESULT_CODES } from '../config'
import { BaseInstruction } from './base'

/**
 * INPUT instruction (opcode 3)
 * dest = next input value
 *
 * A closed input stream ends the engine normally; any other input error is
 * a fault.
 */
export class INPUTInstruction extends BaseInstruction<DecodedInput> {
  readonly opcode = OPCODES.INPUT
  readonly name = 'input'
  readonly width = INSTRUCTION_WIDTH.ONE_OPERAND

  decode(raw: RawWords): Safe<DecodedInput> {
    const [error, dest] = this.parameter(raw, 0)
    if (error) {
      return safeError(error)
    }
    return safeResult({ kind: this.name, opcode: this.opcode, pc: raw.pc, dest })
  }

  async execute(
    instruction: DecodedInput,
    context: InstructionContext,
  ): Promise<InstructionResult> {
    const [inputError, value] = await context.io.requestInput()
    if (inputError) {
      if (inputError instanceof EndOfStreamError) {
        return { resultCode: RESULT_CODES.END_OF_STREAM }
      }
      return { resultCode: null, error: inputError }
    }

    const [writeError] = this.write(context, instruction.dest, value, instruction)
    if (writeError) {
      return { resultCode: null, error: writeError }
    }
    return this.advance(context)
  }

  protected parametersOf(instruction: DecodedInput): Parameter[] {
    return [instruction.dest]
  }
}

/**
 * OUTPUT instruction (opcode 4)
 * emit the value of the sole operand
 */
export class OUTPUTInstruction extends BaseInstruction<DecodedOutput> {
  readonly opcode = OPCODES.OUTPUT
  readonly name = 'output'
  readonly width = INSTRUCTION_WIDTH.ONE_OPERAND

  decode(raw: RawWords): Safe<DecodedOutput> {
    const [error, from] = this.parameter(raw, 0)
    if (error) {
      return safeError(error)
    }
    return safeResult({ kind: this.name, opcode: this.opcode, pc: raw.pc, from })
  }

  async execute(
    instruction: DecodedOutput,
    context: InstructionContext,
  ): Promise<InstructionResult> {
    const value = this.read(context, instruction.from)
    const [error] = await context.io.emitOutput(value)
    if (error) {
      return { resultCode: null, error }
    }
    return this.advance(context)
  }

  protected parametersOf(instruction: DecodedOutput): Parameter[] {
    return [instruction.from]
  }
}
