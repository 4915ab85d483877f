/* eslint-disable no-console */
import type { CommandModule } from 'yargs'
import { RunNotFoundError } from '../../core/errors'
import { exitWithError, loadCliConfig, withStore } from '../shared'
import type { BaseArgs, RunIdArgs } from '../types'

export const statusCommand: CommandModule<BaseArgs, RunIdArgs> = {
  command: 'status <runId>',
  describe: 'Show the state of a run and its tasks',
  builder: (yargs) => {
    return yargs.positional('runId', {
      type: 'number',
      describe: 'Id of the run',
      demandOption: true,
    })
  },
  handler: async (argv) => {
    try {
      const config = await loadCliConfig(argv)
      await withStore(config, async (store) => {
        const run = await store.getRun(argv.runId)
        if (!run) {
          throw new RunNotFoundError(argv.runId)
        }
        const target = await store.getTarget(run.targetId)
        const counts = await store.countTasks(run.id)

        if (argv.quiet) {
          console.log(JSON.stringify({ run, counts }, null, 2))
          return
        }
        console.log(`Run #${run.id} (${run.mode}) on ${target?.name ?? target?.url ?? `target ${run.targetId}`}`)
        console.log(`Status: ${run.status}`)
        if (run.startedAt) console.log(`Started: ${run.startedAt.toISOString()}`)
        if (run.completedAt) console.log(`Completed: ${run.completedAt.toISOString()}`)
        console.log(
          `Tasks: ${counts.total} total, ${counts.completed} completed, ${counts.failed} failed, ` +
            `${counts.running} running, ${counts.pending} pending`,
        )
      })
    } catch (error) {
      exitWithError(error)
    }
  },
}
