import chalk from 'chalk'
import { Command } from 'commander'
import {
  diffFilesHandler,
  diffIntentsHandler,
  diffRunningHandler,
} from '../handlers/diff-handlers.js'
import { formatDiffReport } from '../report.js'
import {
  DiffFilesInputSchema,
  DiffIntentsInputSchema,
  DiffRunningInputSchema,
} from '../types.js'
import {
  exitWithError,
  exitWithIssues,
  openTransport,
  readGlobals,
  synthesisSettings,
} from './shared.js'

export function diffCommands(): Command {
  const diff = new Command('diff').description('Compare configurations')

  diff
    .command('files')
    .description('Diff two configuration files')
    .argument('<reference>', 'Reference configuration file')
    .argument('<candidate>', 'Candidate configuration file')
    .action(async (reference: string, candidate: string) => {
      const validation = DiffFilesInputSchema.safeParse({ reference, candidate })
      if (!validation.success) exitWithIssues(validation.error)

      const result = await diffFilesHandler(validation.data)
      if (!result.success) exitWithError(result.error)

      const { diff: changes, commands } = result.data
      console.log(formatDiffReport(`${reference} -> ${candidate}`, changes, commands))
      process.exit(0)
    })

  diff
    .command('running')
    .description('Diff the running configurations of two devices')
    .argument('<reference>', 'Reference device name')
    .argument('<candidate>', 'Candidate device name')
    .option('--apply', 'Push the commands to the reference device', false)
    .action(
      async (reference: string, candidate: string, options: { apply: boolean }, cmd: Command) => {
        const globals = readGlobals(cmd)
        const validation = DiffRunningInputSchema.safeParse({
          reference,
          candidate,
          apply: options.apply,
        })
        if (!validation.success) exitWithIssues(validation.error)

        try {
          const result = await diffRunningHandler(validation.data, await openTransport(globals))
          if (!result.success) exitWithError(result.error)

          const { diff: changes, commands, applied } = result.data
          console.log(formatDiffReport(`${reference} -> ${candidate}`, changes, commands))
          if (applied) {
            console.log(chalk.green(`[ok] Applied ${commands.length} commands to ${reference}`))
          }
          process.exit(0)
        } catch (error) {
          exitWithError(error instanceof Error ? error.message : String(error))
        }
      }
    )

  diff
    .command('intents')
    .description('Synthesize two intent files and diff every router')
    .argument('<reference>', 'Reference intent file')
    .argument('<candidate>', 'Candidate intent file')
    .option('-r, --router <hostname>', 'Only this router')
    .option('-o, --output <dir>', 'Write <hostname>_commands.txt files here')
    .option('--apply', 'Push the commands to the devices', false)
    .action(
      async (
        reference: string,
        candidate: string,
        options: { router?: string; output?: string; apply: boolean },
        cmd: Command
      ) => {
        const globals = readGlobals(cmd)
        const validation = DiffIntentsInputSchema.safeParse({
          reference,
          candidate,
          router: options.router,
          outputDir: options.output,
          apply: options.apply,
          settings: synthesisSettings(globals),
        })
        if (!validation.success) exitWithIssues(validation.error)

        try {
          const transport = validation.data.apply ? await openTransport(globals) : undefined
          const result = await diffIntentsHandler(validation.data, transport)
          if (!result.success) exitWithError(result.error)

          for (const router of result.data.routers) {
            console.log(
              formatDiffReport(`${router.hostname} [${router.status}]`, router.diff, router.commands)
            )
          }
          for (const path of result.data.written) console.log(chalk.green(`[ok] Wrote ${path}`))
          for (const hostname of result.data.applied) {
            console.log(chalk.green(`[ok] Applied changes to ${hostname}`))
          }
          process.exit(0)
        } catch (error) {
          exitWithError(error instanceof Error ? error.message : String(error))
        }
      }
    )

  return diff
}
