import type { CommandModule } from 'yargs'
import { resolveCredentials } from '../../core/config'
import { resumeSweep } from '../../sweeprunner'
import { exitWithError, loadCliConfig, logRunEvent, printReport, watchShutdownSignals } from '../shared'
import type { BaseArgs, RunIdArgs } from '../types'

export const resumeCommand: CommandModule<BaseArgs, RunIdArgs> = {
  command: 'resume <runId>',
  describe: 'Execute the unfinished tasks of an earlier run',
  builder: (yargs) => {
    return yargs
      .positional('runId', {
        type: 'number',
        describe: 'Id of the run to resume',
        demandOption: true,
      })
      .example('$0 resume 12', 'Continue run 12 where it stopped')
  },
  handler: async (argv) => {
    try {
      const config = await loadCliConfig(argv)
      const shutdown = watchShutdownSignals()
      try {
        const { outcome, report } = await resumeSweep(argv.runId, {
          config,
          credentials: resolveCredentials(),
          onUpdate: argv.quiet ? undefined : logRunEvent,
          signal: shutdown.signal,
        })
        await printReport(report, config, { quiet: argv.quiet })
        if (outcome.status === 'failed') {
          process.exitCode = 1
        }
      } finally {
        shutdown.dispose()
      }
    } catch (error) {
      exitWithError(error)
    }
  },
}
