import {
  InputExhaustedError,
  type IOCapability,
  type Safe,
  safeError,
  safeResult,
  type Word,
} from '@wordvm/types'

/**
 * Scripted I/O: inputs come from a fixed list, outputs are collected
 *
 * Requesting more inputs than were supplied is a fault.
 */
export class ScriptedIO implements IOCapability {
  private readonly inputs: readonly Word[]
  private readonly emitted: Word[] = []
  private cursor = 0

  constructor(inputs: readonly Word[] = []) {
    this.inputs = [...inputs]
  }

  get outputs(): readonly Word[] {
    return this.emitted
  }

  get lastOutput(): Word | undefined {
    return this.emitted.at(-1)
  }

  get remainingInputs(): number {
    return this.inputs.length - this.cursor
  }

  requestInput(): Safe<Word> {
    if (this.cursor >= this.inputs.length) {
      return safeError(new InputExhaustedError(this.inputs.length))
    }
    const value = this.inputs[this.cursor]
    this.cursor += 1
    return safeResult(value)
  }

  emitOutput(value: Word): Safe<true> {
    this.emitted.push(value)
    return safeResult<true>(true)
  }
}
