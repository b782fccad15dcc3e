import {
  ExecutionEngine,
  InteractiveIO,
  type IOCapability,
  loadProgram,
  logger,
  type RunResult,
  ScriptedIO,
  type SafePromise,
  safeError,
  safeResult,
  type Word,
} from '@wordvm/vm'
import { Command } from 'commander'
import { parseWordList } from '../utils/validation'

export interface RunOptions {
  input?: Word[]
  trace?: boolean
}

export interface RunReport {
  result: RunResult
  /** Outputs collected from a scripted run; interactive runs print as they go */
  outputs: readonly Word[]
}

export function createRunCommand(): Command {
  const command = new Command('run')
    .description('Run a program on a single engine')
    .argument('<program>', 'Program image file')
    .option(
      '-i, --input <values>',
      'Comma separated inputs; without it the console is used',
      parseWordList,
    )
    .option('--trace', 'Log every executed instruction at debug level')
    .action(async (programPath: string, options: RunOptions) => {
      const [error, report] = await executeRunCommand(programPath, options)
      if (error) {
        logger.error('Failed to run program:', error)
        process.exit(1)
      }

      for (const value of report.outputs) {
        process.stdout.write(`${value}\n`)
      }
      logger.info(`Program stopped after ${report.result.steps} steps`)
    })

  return command
}

export async function executeRunCommand(
  programPath: string,
  options: RunOptions,
): SafePromise<RunReport> {
  const [loadError, program] = await loadProgram(programPath)
  if (loadError) {
    return safeError(loadError)
  }

  if (options.input) {
    const io = new ScriptedIO(options.input)
    const [runError, result] = await runEngine(program, io, options)
    if (runError) {
      return safeError(runError)
    }
    return safeResult({ result, outputs: io.outputs })
  }

  const io = new InteractiveIO()
  const [runError, result] = await runEngine(program, io, options)
  io.dispose()
  if (runError) {
    return safeError(runError)
  }
  return safeResult({ result, outputs: [] })
}

function runEngine(
  program: Word[],
  io: IOCapability,
  options: RunOptions,
): SafePromise<RunResult> {
  return new ExecutionEngine(program, io, {
    name: 'main',
    trace: options.trace ?? false,
  }).run()
}
