/**
 * Execution Engine
 *
 * Fetch-decode-execute loop over one Word Memory. Owns the program counter
 * and the relative base; talks to its environment only through the
 * injected I/O capability.
 */

import { logger } from '@wordvm/core'
import {
  type DecodedInstruction,
  type EngineOptions,
  type EngineRegisters,
  type EngineStatus,
  type IExecutionEngine,
  type InstructionContext,
  type IOCapability,
  type ProgramImage,
  type ResultCode,
  type RunResult,
  type Safe,
  type SafePromise,
  safeError,
  safeResult,
  safeTry,
  VM_ERRORS,
  VmError,
  type Word,
} from '@wordvm/types'
import { RESULT_CODES } from './config'
import { InstructionDecoder } from './decoder'
import { InstructionRegistry } from './instructions/registry'
import { WordMemory } from './memory'

let engineCounter = 0

export class ExecutionEngine implements IExecutionEngine {
  readonly name: string
  protected readonly memory: WordMemory
  protected readonly registry: InstructionRegistry
  protected readonly decoder: InstructionDecoder
  private readonly registers: EngineRegisters = {
    programCounter: 0,
    relativeBase: 0n,
  }
  private readonly context: InstructionContext
  private readonly onTerminate: EngineOptions['onTerminate']
  private readonly trace: boolean
  private currentStatus: EngineStatus = 'idle'
  private executedSteps = 0

  constructor(
    program: ProgramImage,
    io: IOCapability,
    options: EngineOptions = {},
  ) {
    engineCounter += 1
    this.name = options.name ?? `engine-${engineCounter}`
    this.memory = new WordMemory(program)
    this.registry = new InstructionRegistry()
    this.decoder = new InstructionDecoder(this.registry)
    this.context = { memory: this.memory, registers: this.registers, io }
    this.onTerminate = options.onTerminate
    this.trace = options.trace ?? false
  }

  get status(): EngineStatus {
    return this.currentStatus
  }

  get steps(): number {
    return this.executedSteps
  }

  /**
   * Decode the instruction at the program counter without executing it
   */
  decode(): Safe<DecodedInstruction> {
    return this.decoder.decode(this.memory, this.registers)
  }

  /**
   * Execute a single instruction
   * @returns the result code (null = continue) or the fault that stopped the engine
   */
  async step(): SafePromise<ResultCode | null> {
    if (this.isTerminated()) {
      return safeError(
        new VmError(
          VM_ERRORS.ENGINE_TERMINATED,
          `Engine ${this.name} has already terminated (${this.currentStatus})`,
        ),
      )
    }
    this.currentStatus = 'running'

    const [decodeError, resolved] = this.decoder.resolve(
      this.memory,
      this.registers,
    )
    if (decodeError) {
      return this.fault(decodeError)
    }
    const { instruction, handler } = resolved

    if (this.trace) {
      logger.debug(
        `${this.name} ${instruction.pc}: ${handler.disassemble(instruction)}`,
        { relativeBase: this.registers.relativeBase.toString() },
      )
    }

    // a handler or I/O binding that throws faults this engine only
    const [thrown, result] = await safeTry(
      (async () => handler.execute(instruction, this.context))(),
    )
    if (thrown) {
      return this.fault(thrown)
    }
    if (result.error) {
      return this.fault(result.error)
    }

    // an input cut short by end of stream never completed
    if (result.resultCode === RESULT_CODES.END_OF_STREAM) {
      this.terminate('ended', result.resultCode)
      return safeResult(result.resultCode)
    }

    this.executedSteps += 1
    if (result.resultCode === RESULT_CODES.HALT) {
      this.terminate('halted', result.resultCode)
    }
    return safeResult(result.resultCode)
  }

  /**
   * Execute instructions until halt, end of input stream, or a fault
   */
  async run(): SafePromise<RunResult> {
    logger.debug(`${this.name}: run started`, {
      programLength: this.memory.length,
    })

    for (;;) {
      const [error, resultCode] = await this.step()
      if (error) {
        return safeError(error)
      }
      if (resultCode !== null) {
        return safeResult({ resultCode, steps: this.executedSteps })
      }
    }
  }

  /**
   * Copy of the engine's memory
   */
  snapshot(): Word[] {
    return this.memory.snapshot()
  }

  private isTerminated(): boolean {
    return (
      this.currentStatus === 'halted' ||
      this.currentStatus === 'ended' ||
      this.currentStatus === 'faulted'
    )
  }

  private terminate(status: 'halted' | 'ended', resultCode: ResultCode): void {
    this.currentStatus = status
    logger.debug(`${this.name}: ${status}`, { steps: this.executedSteps })
    this.onTerminate?.(
      safeResult({ resultCode, steps: this.executedSteps }),
    )
  }

  private fault(error: Error): Safe<ResultCode | null> {
    this.currentStatus = 'faulted'
    logger.error(
      `${this.name}: faulted at pc ${this.registers.programCounter}`,
      error,
    )
    this.onTerminate?.(safeError(error))
    return safeError(error)
  }
}
