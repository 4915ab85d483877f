/* eslint-disable no-console */
import type { CommandModule } from 'yargs'
import { listParameters } from '../../parameters'
import type { BaseArgs } from '../types'

export const parametersCommand: CommandModule<BaseArgs, BaseArgs> = {
  command: 'parameters',
  describe: 'List the parameters that can be swept and their default ranges',
  handler: (argv) => {
    const parameters = listParameters().map((handler) => ({
      name: handler.name,
      displayName: handler.displayName,
      description: handler.description,
      defaults: handler.defaults(),
    }))

    if (argv.quiet) {
      console.log(JSON.stringify(parameters, null, 2))
      return
    }
    for (const parameter of parameters) {
      console.log(`${parameter.name} (${parameter.displayName}): ${parameter.description}`)
      console.log(`  defaults: ${JSON.stringify(parameter.defaults)}`)
    }
  },
}
