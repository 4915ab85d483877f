import yargs from 'yargs'
import { hideBin } from 'yargs/helpers'
import { parametersCommand } from './commands/parameters'
import { reportCommand } from './commands/report'
import { resumeCommand } from './commands/resume'
import { runCommand } from './commands/run'
import { statusCommand } from './commands/status'
import { printConfigCommand } from './print-config'
import { applyLogLevel } from './shared'

export function createCli(argv: string[] = hideBin(process.argv)) {
  return yargs(argv)
    .scriptName('sweep')
    .usage('$0 <command> [options]')
    .option('config', {
      alias: 'c',
      type: 'string',
      describe: 'Path to configuration file',
      global: true,
    })
    .option('verbose', {
      alias: 'v',
      type: 'boolean',
      describe: 'Enable verbose logging',
      global: true,
    })
    .option('quiet', {
      alias: 'q',
      type: 'boolean',
      describe: 'Suppress non-essential output',
      global: true,
    })
    .middleware(applyLogLevel)
    .command(runCommand)
    .command(resumeCommand)
    .command(statusCommand)
    .command(reportCommand)
    .command(parametersCommand)
    .command(printConfigCommand)
    .demandCommand(1, 'You need to specify a command')
    .help()
    .alias('help', 'h')
    .version()
    .alias('version', 'V')
    .strict()
}

export async function runCli(argv: string[] = hideBin(process.argv)) {
  return createCli(argv).parse()
}
