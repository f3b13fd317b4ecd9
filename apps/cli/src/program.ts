import { VALID_LOG_LEVELS, configureLogger } from '@intentcfg/telemetry'
import { Command, Option } from 'commander'
import { ZodError } from 'zod'
import { captureCommand } from './commands/capture.js'
import { diffCommands } from './commands/diff.js'
import { generateCommand } from './commands/generate.js'
import { exitWithIssues } from './commands/shared.js'
import { applyConfigFileValues, loadConfigFile } from './config-file.js'
import { resolveLogLevel } from './settings.js'
import { GlobalOptionsSchema } from './types.js'

export function createProgram(): Command {
  const program = new Command()

  program
    .name('intentcfg')
    .description('Synthesize router configurations from network intent and diff them')
    .version(process.env.VERSION || '0.0.0-dev')
    .addOption(new Option('--config <path>', 'Path to JSON config file').env('INTENTCFG_CONFIG'))
    .addOption(new Option('--log-level <level>', 'Log level').choices(VALID_LOG_LEVELS))
    .addOption(
      new Option('--inventory <path>', 'Device console inventory (JSON)')
        .env('INTENTCFG_INVENTORY')
        .default('inventory.json')
    )
    .addOption(new Option('--interface-pool <names>', 'Comma-separated physical interface names'))
    .addOption(new Option('--ospf-process-id <id>', 'OSPF process id'))
    .addOption(new Option('--loopback-interface <name>', 'Loopback interface name'))

  program.hook('preAction', async (thisCommand) => {
    const configPath: unknown = thisCommand.getOptionValue('config')
    if (typeof configPath === 'string') {
      applyConfigFileValues(thisCommand, await loadConfigFile(configPath))
    }

    const globals = GlobalOptionsSchema.safeParse(thisCommand.opts())
    if (!globals.success) exitWithIssues(globals.error)
    try {
      await configureLogger({ level: resolveLogLevel(globals.data) })
    } catch (error) {
      if (error instanceof ZodError) exitWithIssues(error)
      throw error
    }
  })

  program.addCommand(generateCommand())
  program.addCommand(diffCommands())
  program.addCommand(captureCommand())

  return program
}
