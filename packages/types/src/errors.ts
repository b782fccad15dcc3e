/**
 * Word VM Error Constants
 *
 * Centralized definitions of the error codes raised by the decoder, the
 * execution engine, the I/O bindings and program loading.
 */

export const VM_ERRORS = {
  UNKNOWN_OPCODE: 'unknown_opcode',
  UNKNOWN_MODE: 'unknown_mode',
  INVALID_ADDRESS: 'invalid_address',
  INVALID_WRITE: 'invalid_write',
  INPUT_EXHAUSTED: 'input_exhausted',
  END_OF_STREAM: 'end_of_stream',
  INVALID_PROGRAM: 'invalid_program',
  INVALID_COMMAND: 'invalid_command',
  ENGINE_TERMINATED: 'engine_terminated',
  CHANNEL_CLOSED: 'channel_closed',
  INVALID_NETWORK: 'invalid_network',
  NO_OUTPUT: 'no_output',
} as const

export type VmErrorCode = (typeof VM_ERRORS)[keyof typeof VM_ERRORS]

export interface VmErrorDetails {
  pc?: number
  opcode?: number
  address?: bigint
}

export class VmError extends Error {
  readonly pc: number | undefined
  readonly opcode: number | undefined
  readonly address: bigint | undefined

  constructor(
    readonly code: VmErrorCode,
    message: string,
    details: VmErrorDetails = {},
  ) {
    super(message)
    this.name = new.target.name
    this.pc = details.pc
    this.opcode = details.opcode
    this.address = details.address
  }
}

/**
 * Unrecognised opcode or addressing mode
 */
export class DecodeError extends VmError {
  static unknownOpcode(opcode: number, pc: number): DecodeError {
    return new DecodeError(
      VM_ERRORS.UNKNOWN_OPCODE,
      `Unrecognized opcode ${opcode} at pc ${pc}`,
      { pc, opcode },
    )
  }

  static unknownMode(mode: number, opcode: number, pc: number): DecodeError {
    return new DecodeError(
      VM_ERRORS.UNKNOWN_MODE,
      `Unrecognized addressing mode ${mode} for opcode ${opcode} at pc ${pc}`,
      { pc, opcode },
    )
  }
}

/**
 * Negative (or unrepresentable) memory address or jump target
 */
export class InvalidAddressError extends VmError {
  constructor(address: bigint, details: { pc: number; opcode: number }) {
    super(
      VM_ERRORS.INVALID_ADDRESS,
      `Invalid address ${address} for opcode ${details.opcode} at pc ${details.pc}`,
      { ...details, address },
    )
  }
}

/**
 * Write through an immediate parameter
 */
export class InvalidWriteError extends VmError {
  constructor(value: bigint, details: { pc: number; opcode: number }) {
    super(
      VM_ERRORS.INVALID_WRITE,
      `Nonsensical write to immediate ${value} for opcode ${details.opcode} at pc ${details.pc}`,
      details,
    )
  }
}

export class InputExhaustedError extends VmError {
  constructor(supplied: number) {
    super(
      VM_ERRORS.INPUT_EXHAUSTED,
      `Input requested after all ${supplied} scripted values were consumed`,
    )
  }
}

/**
 * The producing end of an input stream is closed; a normal termination
 */
export class EndOfStreamError extends VmError {
  constructor(source = 'input') {
    super(VM_ERRORS.END_OF_STREAM, `End of stream on ${source}`)
  }
}

export class ChannelClosedError extends VmError {
  constructor(channel: string) {
    super(VM_ERRORS.CHANNEL_CLOSED, `Send on closed channel ${channel}`)
  }
}

export class ProgramFormatError extends VmError {
  constructor(message: string) {
    super(VM_ERRORS.INVALID_PROGRAM, message)
  }
}

export class RobotCommandError extends VmError {
  constructor(message: string) {
    super(VM_ERRORS.INVALID_COMMAND, message)
  }
}
