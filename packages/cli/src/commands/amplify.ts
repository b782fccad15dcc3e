import { wordRange } from '@wordvm/core'
import {
  findMaxSignal,
  loadProgram,
  logger,
  type PhaseSearchResult,
  ProcessNetwork,
  type SafePromise,
  safeError,
  safeResult,
  type Word,
} from '@wordvm/vm'
import { Command } from 'commander'
import { parseWord, parseWordList, parseWordRange } from '../utils/validation'

export interface AmplifyOptions {
  phases?: Word[]
  range?: Word[]
  feedback?: boolean
  signal: Word
}

const DEFAULT_PHASE_RANGES = {
  chain: wordRange(0n, 4n),
  feedback: wordRange(5n, 9n),
} as const

export function createAmplifyCommand(): Command {
  const command = new Command('amplify')
    .description(
      'Wire copies of a program into a chain (or ring) and report the final signal',
    )
    .argument('<program>', 'Program image file')
    .option(
      '-p, --phases <values>',
      'Comma separated phase per engine; skips the search',
      parseWordList,
    )
    .option(
      '--range <start..end>',
      'Phase values to search (default 0..4, or 5..9 with --feedback)',
      parseWordRange,
    )
    .option('-f, --feedback', 'Feed the last output back into the first engine')
    .option('-s, --signal <value>', 'Initial signal', parseWord, 0n)
    .action(async (programPath: string, options: AmplifyOptions) => {
      const [error, best] = await executeAmplifyCommand(programPath, options)
      if (error) {
        logger.error('Failed to amplify:', error)
        process.exit(1)
      }

      process.stdout.write(`${best.signal}\n`)
      logger.info(`Best phase sequence: ${best.phases.join(',')}`)
    })

  return command
}

export async function executeAmplifyCommand(
  programPath: string,
  options: AmplifyOptions,
): SafePromise<PhaseSearchResult> {
  const [loadError, program] = await loadProgram(programPath)
  if (loadError) {
    return safeError(loadError)
  }

  const networkOptions = {
    feedback: options.feedback ?? false,
    initialSignal: options.signal,
  }

  if (options.phases) {
    const [error, result] = await ProcessNetwork.replicate(
      program,
      options.phases,
      networkOptions,
    ).run()
    if (error) {
      return safeError(error)
    }
    return safeResult({ signal: result.signal, phases: options.phases })
  }

  const range =
    options.range ??
    (networkOptions.feedback
      ? DEFAULT_PHASE_RANGES.feedback
      : DEFAULT_PHASE_RANGES.chain)
  return findMaxSignal(program, range, networkOptions)
}
