/**
 * Comparison Instructions
 *
 * LESS_THAN and EQUALS - dest = 1 when the predicate holds, 0 otherwise
 */

import {
  type DecodedEquals,
  type DecodedLessThan,
  type RawWords,
  type Safe,
  safeError,
  safeResult,
  type Word,
} from '@wordvm/types'
import { OPCODES } from '../config'
import { BinaryInstruction } from './base'

/**
 * LESS_THAN instruction (opcode 7)
 */
export class LESS_THANInstruction extends BinaryInstruction<DecodedLessThan> {
  readonly opcode = OPCODES.LESS_THAN
  readonly name = 'less-than'

  decode(raw: RawWords): Safe<DecodedLessThan> {
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
    return a < b ? 1n : 0n
  }
}

/**
 * EQUALS instruction (opcode 8)
 */
export class EQUALSInstruction extends BinaryInstruction<DecodedEquals> {
  readonly opcode = OPCODES.EQUALS
  readonly name = 'equals'

  decode(raw: RawWords): Safe<DecodedEquals> {
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
    return a === b ? 1n : 0n
  }
}
