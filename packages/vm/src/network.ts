/**
 * Process Network
 *
 * Several execution engines, each with its own memory, wired output to
 * input by channels. Engine i reads channel i and writes channel i + 1; the
 * last engine writes to the observer, which records every value and, in a
 * feedback ring, forwards it to the first engine.
 */

import { logger, permutations } from '@wordvm/core'
import {
  type NetworkOptions,
  type NetworkResult,
  type PhaseSearchResult,
  type ProgramImage,
  type RunResult,
  type Safe,
  type SafePromise,
  safeError,
  safeResult,
  VM_ERRORS,
  VmError,
  type Word,
} from '@wordvm/types'
import { ExecutionEngine } from './engine'
import { Channel, ChannelIO } from './io/channel'

export class ProcessNetwork {
  private readonly feedback: boolean
  private readonly initialSignal: Word

  constructor(
    private readonly programs: readonly ProgramImage[],
    private readonly phases: readonly Word[],
    options: NetworkOptions = {},
  ) {
    this.feedback = options.feedback ?? false
    this.initialSignal = options.initialSignal ?? 0n
  }

  /**
   * One copy of the same program per phase
   */
  static replicate(
    program: ProgramImage,
    phases: readonly Word[],
    options: NetworkOptions = {},
  ): ProcessNetwork {
    return new ProcessNetwork(
      phases.map(() => program),
      phases,
      options,
    )
  }

  async run(): SafePromise<NetworkResult> {
    const count = this.phases.length
    if (count === 0 || this.programs.length !== count) {
      return safeError(
        new VmError(
          VM_ERRORS.INVALID_NETWORK,
          `Network needs one phase per program (${this.programs.length} programs, ${count} phases)`,
        ),
      )
    }

    const channels = Array.from(
      { length: count + 1 },
      (_, index) =>
        new Channel<Word>(index === count ? 'observer' : `engine-${index}`),
    )
    this.phases.forEach((phase, index) => {
      channels[index].send(phase)
    })
    channels[0].send(this.initialSignal)
    if (!this.feedback) {
      channels[0].close()
    }

    const runs = this.programs.map((program, index) => {
      const outbound = channels[index + 1]
      const engine = new ExecutionEngine(
        program,
        new ChannelIO(channels[index], outbound),
        {
          name: `engine-${index}`,
          onTerminate: () => outbound.close(),
        },
      )
      return engine.run()
    })

    const observed = await this.observe(channels[0], channels[count])
    const outcomes = await Promise.all(runs)
    return this.collect(outcomes, observed)
  }

  /**
   * Read the last engine's outputs one at a time until it closes its end
   */
  private async observe(
    first: Channel<Word>,
    last: Channel<Word>,
  ): Promise<Word[]> {
    const observed: Word[] = []
    for (;;) {
      const [endOfStream, value] = await last.receive()
      if (endOfStream) {
        break
      }
      observed.push(value)
      if (this.feedback) {
        const [error] = first.send(value)
        if (error) {
          logger.warn('Feedback value dropped', { error: error.message })
        }
      }
    }
    first.close()
    return observed
  }

  private collect(
    outcomes: Safe<RunResult>[],
    observed: Word[],
  ): Safe<NetworkResult> {
    const engines: RunResult[] = []
    for (const [error, result] of outcomes) {
      if (error) {
        return safeError(error)
      }
      engines.push(result)
    }

    const signal = observed.at(-1)
    if (signal === undefined) {
      return safeError(
        new VmError(VM_ERRORS.NO_OUTPUT, 'Network produced no output'),
      )
    }

    logger.debug('Network finished', {
      signal: signal.toString(),
      feedback: this.feedback,
    })
    return safeResult({ signal, observed, engines })
  }
}

/**
 * Run the network for every ordering of the phase values and keep the
 * strongest final signal
 */
export async function findMaxSignal(
  program: ProgramImage,
  phaseValues: readonly Word[],
  options: NetworkOptions = {},
): SafePromise<PhaseSearchResult> {
  if (phaseValues.length === 0) {
    return safeError(
      new VmError(VM_ERRORS.INVALID_NETWORK, 'No phase values to search'),
    )
  }

  // every ordering is non-empty, so the first one always replaces the seed
  let best: PhaseSearchResult = { signal: 0n, phases: [] }
  for (const phases of permutations(phaseValues)) {
    const [error, result] = await ProcessNetwork.replicate(
      program,
      phases,
      options,
    ).run()
    if (error) {
      return safeError(error)
    }
    if (best.phases.length === 0 || result.signal > best.signal) {
      best = { signal: result.signal, phases }
    }
  }
  return safeResult(best)
}
