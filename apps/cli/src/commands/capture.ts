import chalk from 'chalk'
import { Command } from 'commander'
import { captureHandler } from '../handlers/capture-handlers.js'
import { CaptureInputSchema } from '../types.js'
import { exitWithError, exitWithIssues, openTransport, readGlobals } from './shared.js'

export function captureCommand(): Command {
  return new Command('capture')
    .description('Save the running configuration of a device')
    .argument('<device>', 'Device name from the inventory')
    .option('-o, --output <dir>', 'Directory for <device>_running-config.cfg', 'configs')
    .action(async (device: string, options: { output: string }, cmd: Command) => {
      const globals = readGlobals(cmd)
      const validation = CaptureInputSchema.safeParse({ device, outputDir: options.output })
      if (!validation.success) exitWithIssues(validation.error)

      try {
        const result = await captureHandler(validation.data, await openTransport(globals))
        if (!result.success) exitWithError(result.error)
        const { path, sections } = result.data
        console.log(chalk.green(`[ok] Saved ${device} (${sections} sections) to ${path}`))
        process.exit(0)
      } catch (error) {
        exitWithError(error instanceof Error ? error.message : String(error))
      }
    })
}
