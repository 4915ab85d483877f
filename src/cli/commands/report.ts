import type { CommandModule } from 'yargs'
import { GOALS } from '../../core/types'
import { buildRunReport } from '../../reporting'
import { exitWithError, loadCliConfig, printReport, withStore } from '../shared'
import type { BaseArgs, ReportArgs } from '../types'

export const reportCommand: CommandModule<BaseArgs, ReportArgs> = {
  command: 'report <runId>',
  describe: 'Show the results of a run with recommendations',
  builder: (yargs) => {
    return yargs
      .positional('runId', {
        type: 'number',
        describe: 'Id of the run',
        demandOption: true,
      })
      .option('format', {
        alias: 'f',
        type: 'string',
        choices: ['cli', 'json'],
        default: 'cli',
        describe: 'Output format',
      })
      .option('goal', {
        alias: 'g',
        type: 'string',
        choices: GOALS,
        describe: 'Optimization goal for the recommendations (default: config goal)',
      })
      .option('output', {
        alias: 'o',
        type: 'string',
        describe: 'Also write run-<id>.json into this directory',
      })
      .example('$0 report 12', 'Print the results table of run 12')
      .example('$0 report 12 --goal protect_capital -f json', 'Recommendations favouring low drawdown, as JSON')
  },
  handler: async (argv) => {
    try {
      const config = await loadCliConfig(argv, argv.output ? { output: { dir: argv.output, formats: ['json'] } } : {})
      const goal = GOALS.find((candidate) => candidate === argv.goal)
      await withStore(config, async (store) => {
        const report = await buildRunReport(store, argv.runId)
        await printReport(report, config, { quiet: argv.quiet, goal, format: argv.format === 'json' ? 'json' : 'cli' })
      })
    } catch (error) {
      exitWithError(error)
    }
  },
}
