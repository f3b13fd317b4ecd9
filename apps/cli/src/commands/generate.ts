import chalk from 'chalk'
import { Command } from 'commander'
import { generateHandler } from '../handlers/generate-handlers.js'
import { GenerateInputSchema } from '../types.js'
import { exitWithError, exitWithIssues, readGlobals, synthesisSettings } from './shared.js'

export function generateCommand(): Command {
  return new Command('generate')
    .description('Synthesize the configuration of every router in an intent file')
    .argument('<intent>', 'Intent JSON file')
    .option('-o, --output <dir>', 'Write <hostname>_startup-config.cfg files here instead of stdout')
    .action(async (intent: string, options: { output?: string }, cmd: Command) => {
      const globals = readGlobals(cmd)
      const validation = GenerateInputSchema.safeParse({
        intent,
        outputDir: options.output,
        settings: synthesisSettings(globals),
      })
      if (!validation.success) exitWithIssues(validation.error)

      const result = await generateHandler(validation.data)
      if (!result.success) exitWithError(result.error)

      const { report, written } = result.data
      if (validation.data.outputDir) {
        for (const path of written) console.log(chalk.green(`[ok] Wrote ${path}`))
      } else {
        for (const config of report.configs.values()) process.stdout.write(config)
      }
      for (const failure of report.failures) {
        console.error(chalk.red(`[error] ${failure.hostname}: ${failure.code}: ${failure.message}`))
      }
      process.exit(report.success ? 0 : 1)
    })
}
