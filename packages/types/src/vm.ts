/**
 * Word VM Type Definitions
 *
 * Types shared by the decoder, the execution engine, the I/O bindings and
 * the process network.
 */

import type { Safe, SafePromise } from './safe'

/**
 * Signed 64-bit integer: the only value type for code, data and addresses
 */
export type Word = bigint

export type ProgramImage = readonly Word[]

/**
 * Resolved operand
 *
 * Indirect parameters name a memory cell, immediate parameters carry a
 * literal and are only valid in read positions.
 */
export type Parameter =
  | { mode: 'indirect'; address: number }
  | { mode: 'immediate'; value: Word }

/**
 * Words at the program counter, captured before decoding
 */
export interface RawWords {
  pc: number
  instruction: Word
  operands: readonly [Word, Word, Word]
  relativeBase: Word
}

interface DecodedBase<K extends string> {
  kind: K
  opcode: number
  pc: number
}

export interface DecodedAdd extends DecodedBase<'add'> {
  op1: Parameter
  op2: Parameter
  dest: Parameter
}

export interface DecodedMultiply extends DecodedBase<'multiply'> {
  op1: Parameter
  op2: Parameter
  dest: Parameter
}

export interface DecodedInput extends DecodedBase<'input'> {
  dest: Parameter
}

export interface DecodedOutput extends DecodedBase<'output'> {
  from: Parameter
}

export interface DecodedJumpIfTrue extends DecodedBase<'jump-if-true'> {
  condition: Parameter
  target: Parameter
}

export interface DecodedJumpIfFalse extends DecodedBase<'jump-if-false'> {
  condition: Parameter
  target: Parameter
}

export interface DecodedLessThan extends DecodedBase<'less-than'> {
  op1: Parameter
  op2: Parameter
  dest: Parameter
}

export interface DecodedEquals extends DecodedBase<'equals'> {
  op1: Parameter
  op2: Parameter
  dest: Parameter
}

export interface DecodedAdjustRelativeBase
  extends DecodedBase<'adjust-relative-base'> {
  offset: Parameter
}

export interface DecodedHalt extends DecodedBase<'halt'> {}

export type DecodedInstruction =
  | DecodedAdd
  | DecodedMultiply
  | DecodedInput
  | DecodedOutput
  | DecodedJumpIfTrue
  | DecodedJumpIfFalse
  | DecodedLessThan
  | DecodedEquals
  | DecodedAdjustRelativeBase
  | DecodedHalt

export type InstructionKind = DecodedInstruction['kind']

/**
 * I/O capability injected into an execution engine
 *
 * The engine only ever calls these two operations; what sits behind them
 * (a console, a script, a channel, a robot) is invisible to it.
 */
export interface IOCapability {
  requestInput(): Safe<Word> | SafePromise<Word>
  emitOutput(value: Word): Safe<true> | SafePromise<true>
}

/**
 * Word-addressed memory as seen by instruction handlers
 */
export interface Memory {
  readonly length: number
  read(address: number): Word
  write(address: number, value: Word): void
  peek(address: number): Word
  snapshot(): Word[]
}

/**
 * Engine registers (mutable, owned by one engine)
 */
export interface EngineRegisters {
  programCounter: number
  relativeBase: Word
}

/**
 * Instruction execution context (mutable)
 * Instructions modify this context directly
 */
export interface InstructionContext {
  memory: Memory
  registers: EngineRegisters
  io: IOCapability
}

export type ResultCode = 0 | 1

export interface InstructionResult {
  resultCode: ResultCode | null // null = continue execution
  error?: Error
}

export type EngineStatus = 'idle' | 'running' | 'halted' | 'ended' | 'faulted'

export interface RunResult {
  resultCode: ResultCode
  steps: number
}

export interface EngineOptions {
  /** Name used in log lines */
  name?: string
  /** Log every decoded instruction at debug level */
  trace?: boolean
  /** Called once when the engine stops, whatever the reason */
  onTerminate?: (outcome: Safe<RunResult>) => void
}

export interface IExecutionEngine {
  readonly name: string
  readonly status: EngineStatus
  decode(): Safe<DecodedInstruction>
  step(): SafePromise<ResultCode | null>
  run(): SafePromise<RunResult>
  snapshot(): Word[]
}

export interface NetworkOptions {
  /** Feed the last engine's output back into the first engine */
  feedback?: boolean
  /** Signal pushed into the first engine after its phase */
  initialSignal?: Word
}

export interface NetworkResult {
  /** Last value observed on the final engine's output */
  signal: Word
  /** Every value observed on the final engine's output, in order */
  observed: Word[]
  engines: RunResult[]
}

export interface PhaseSearchResult {
  signal: Word
  phases: Word[]
}
