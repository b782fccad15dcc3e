import {
  ExecutionEngine,
  loadProgram,
  logger,
  PANEL_COLORS,
  type PanelColor,
  PaintingRobot,
  type SafePromise,
  safeError,
  safeResult,
} from '@wordvm/vm'
import { Command } from 'commander'
import { parseStartColor } from '../utils/validation'

export interface PaintOptions {
  start: PanelColor
  render?: boolean
}

export interface PaintReport {
  paintedPanels: number
  image: string
}

export function createPaintCommand(): Command {
  const command = new Command('paint')
    .description('Drive the hull painting robot with a program')
    .argument('<program>', 'Program image file')
    .option(
      '--start <color>',
      'Color of the starting panel (black or white)',
      parseStartColor,
      PANEL_COLORS.BLACK,
    )
    .option('--render', 'Print the painted hull as a netpbm (P1) image')
    .action(async (programPath: string, options: PaintOptions) => {
      const [error, report] = await executePaintCommand(programPath, options)
      if (error) {
        logger.error('Failed to paint:', error)
        process.exit(1)
      }

      process.stdout.write(`${report.paintedPanels}\n`)
      if (options.render) {
        process.stdout.write(report.image)
      }
    })

  return command
}

export async function executePaintCommand(
  programPath: string,
  options: PaintOptions,
): SafePromise<PaintReport> {
  const [loadError, program] = await loadProgram(programPath)
  if (loadError) {
    return safeError(loadError)
  }

  const robot = new PaintingRobot({ startColor: options.start })
  const [runError] = await new ExecutionEngine(program, robot, {
    name: 'robot',
  }).run()
  if (runError) {
    return safeError(runError)
  }

  logger.debug('Robot finished', { position: robot.position })
  return safeResult({
    paintedPanels: robot.paintedPanelCount,
    image: robot.render(),
  })
}
