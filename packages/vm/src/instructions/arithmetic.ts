/**
 * Arithmetic Instructions
 *
 * ADD and MUL - dest = op1 (+|*) op2, wrapped to 64 bits
 */

import {
  type DecodedAdd,
  type DecodedMultiply,
  type RawWords,
  type Safe,
  safeError,
  safeResult,
  type Word,
} from '@wordvm/types'
import { OPCODES } from '../config'
import { BinaryInstruction } from './base'

/**
 * ADD instruction (opcode 1)
 */
export class ADDInstruction extends BinaryInstruction<DecodedAdd> {
  readonly opcode = OPCODES.ADD
  readonly name = 'add'

  decode(raw: RawWords): Safe<DecodedAdd> {
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

  protected compute(a: Word, b: Word): Word {
    return BigInt.asIntN(64, a + b)
  }
}

/**
 * MUL instruction (opcode 2)
 */
export class MULInstruction extends BinaryInstruction<DecodedMultiply> {
  readonly opcode = OPCODES.MULTIPLY
  readonly name = 'multiply'

  decode(raw: RawWords): Safe<DecodedMultiply> {
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

  protected compute(a: Word, b: Word): Word {
    return BigInt.asIntN(64, a * b)
  }
}
