/* eslint-disable no-console */
import type { CommandModule } from 'yargs'
import { countCombinations } from '../parameters'
import { exitWithError, loadCliConfig } from './shared'
import type { BaseArgs, PrintConfigArgs } from './types'

export const printConfigCommand: CommandModule<BaseArgs, PrintConfigArgs> = {
  command: 'print-config',
  describe: 'Show the resolved and validated configuration',
  builder: (yargs) => {
    return yargs.option('format', {
      alias: 'f',
      type: 'string',
      choices: ['json'],
      default: 'json',
      describe: 'Output format for the configuration',
    })
  },
  handler: async (argv) => {
    try {
      const config = await loadCliConfig(argv)

      const output = {
        ...config,
        _taskCount: config.sweep ? countCombinations(config.sweep) : 0,
      }

      console.log(JSON.stringify(output, null, 2))

      if (!argv.quiet) {
        console.error('✅ Configuration is valid')
      }
    } catch (error) {
      exitWithError(error)
    }
  },
}
