import { createInterface } from 'node:readline'
import type { Readable, Writable } from 'node:stream'
import {
  EndOfStreamError,
  type IOCapability,
  type Safe,
  type SafePromise,
  safeError,
  safeResult,
  type Word,
} from '@wordvm/types'
import { wordSchema } from '../program'

export const INTERACTIVE_MESSAGES = {
  PROMPT: 'Input required.',
  INVALID: 'Invalid integer, try again.',
} as const

export interface InteractiveIOOptions {
  input?: Readable
  output?: Writable
}

/**
 * Console I/O: one integer per line in, one value per line out
 *
 * Malformed lines are answered with a retry message and never reach the
 * engine. Closing the input stream ends the engine's input.
 */
export class InteractiveIO implements IOCapability {
  private readonly output: Writable
  private readonly lines: AsyncIterator<string>
  private readonly close: () => void

  constructor(options: InteractiveIOOptions = {}) {
    this.output = options.output ?? process.stdout
    const readline = createInterface({
      input: options.input ?? process.stdin,
      terminal: false,
    })
    this.lines = readline[Symbol.asyncIterator]()
    this.close = () => readline.close()
  }

  async requestInput(): SafePromise<Word> {
    this.writeLine(INTERACTIVE_MESSAGES.PROMPT)

    for (;;) {
      const line = await this.lines.next()
      if (line.done) {
        return safeError(new EndOfStreamError('console'))
      }

      const parsed = wordSchema.safeParse(line.value.trim())
      if (parsed.success) {
        return safeResult(parsed.data)
      }
      this.writeLine(INTERACTIVE_MESSAGES.INVALID)
    }
  }

  emitOutput(value: Word): Safe<true> {
    this.writeLine(value.toString())
    return safeResult<true>(true)
  }

  /**
   * Release the input stream
   */
  dispose(): void {
    this.close()
  }

  private writeLine(text: string): void {
    this.output.write(`${text}\n`)
  }
}
