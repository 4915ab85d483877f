import type { CommandModule } from 'yargs'
import { resolveCredentials } from '../../core/config'
import { logger } from '../../logger'
import { runSweep } from '../../sweeprunner'
import { exitWithError, loadCliConfig, logRunEvent, printReport, watchShutdownSignals } from '../shared'
import type { BaseArgs, RunArgs } from '../types'

export const runCommand: CommandModule<BaseArgs, RunArgs> = {
  command: 'run',
  describe: 'Create a run from the configuration and execute it',
  builder: (yargs) => {
    return yargs
      .option('url', {
        type: 'string',
        describe: 'Target page URL (overrides target.url)',
      })
      .option('workers', {
        alias: 'w',
        type: 'number',
        describe: 'Number of concurrent browser workers',
      })
      .option('skip-cache', {
        type: 'boolean',
        describe: 'Re-run combinations that already have a cached result',
      })
      .option('headless', {
        type: 'boolean',
        describe: 'Run Chrome headless (use --no-headless to watch it)',
      })
      .example('$0 run', 'Run the sweep from sweep.config.json')
      .example('$0 run --workers 4 --skip-cache', 'Run with four workers, ignoring cached results')
      .example('$0 run --url https://app.example.com/test/abc', 'Run the configured sweep against another page')
  },
  handler: async (argv) => {
    try {
      await executeRun(argv)
    } catch (error) {
      exitWithError(error)
    }
  },
}

async function executeRun(args: RunArgs): Promise<void> {
  logger.info('Loading configuration...')
  const config = await loadCliConfig(args, {
    workers: args.workers,
    skipCache: args.skipCache,
    headless: args.headless,
    target: args.url ? { url: args.url } : undefined,
  })
  const credentials = resolveCredentials()

  const shutdown = watchShutdownSignals()
  try {
    const { outcome, report } = await runSweep({
      config,
      credentials,
      onUpdate: args.quiet ? undefined : logRunEvent,
      signal: shutdown.signal,
    })
    await printReport(report, config, { quiet: args.quiet })

    if (outcome.status === 'failed') {
      process.exitCode = 1
    }
  } finally {
    shutdown.dispose()
  }
}
