import { Command } from 'commander'
import { createAmplifyCommand } from './commands/amplify'
import { createPaintCommand } from './commands/paint'
import { createRunCommand } from './commands/run'

export const CLI_VERSION = '0.1.0'

export function createCli(): Command {
  return new Command('wordvm')
    .description('Run word VM programs, amplifier networks and the painting robot')
    .version(CLI_VERSION)
    .addCommand(createRunCommand())
    .addCommand(createAmplifyCommand())
    .addCommand(createPaintCommand())
}
