/**
 * Instruction Registry
 *
 * Central registry of the instruction handlers, keyed by opcode.
 * Acts as a dispatcher for the decoder and the execution engine.
 */

import { ADDInstruction, MULInstruction } from './arithmetic'
import type { InstructionHandler } from './base'
import { EQUALSInstruction, LESS_THANInstruction } from './comparison'
import {
  ADJUST_RELATIVE_BASEInstruction,
  HALTInstruction,
  JUMP_IF_FALSEInstruction,
  JUMP_IF_TRUEInstruction,
} from './control-flow'
import { INPUTInstruction, OUTPUTInstruction } from './input-output'

export class InstructionRegistry {
  private readonly handlers = new Map<number, InstructionHandler>()

  constructor() {
    this.registerAllInstructions()
  }

  private registerAllInstructions(): void {
    this.register(new ADDInstruction())
    this.register(new MULInstruction())
    this.register(new INPUTInstruction())
    this.register(new OUTPUTInstruction())
    this.register(new JUMP_IF_TRUEInstruction())
    this.register(new JUMP_IF_FALSEInstruction())
    this.register(new LESS_THANInstruction())
    this.register(new EQUALSInstruction())
    this.register(new ADJUST_RELATIVE_BASEInstruction())
    this.register(new HALTInstruction())
  }

  /**
   * Register an instruction handler
   */
  register(handler: InstructionHandler): void {
    this.handlers.set(handler.opcode, handler)
  }

  /**
   * Get instruction handler by opcode
   */
  getHandler(opcode: number): InstructionHandler | undefined {
    return this.handlers.get(opcode)
  }

  hasHandler(opcode: number): boolean {
    return this.handlers.has(opcode)
  }

  getRegisteredOpcodes(): number[] {
    return Array.from(this.handlers.keys())
  }
}
