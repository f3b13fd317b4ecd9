import type { SynthesisConfig } from '@intentcfg/config'
import chalk from 'chalk'
import type { Command } from 'commander'
import { ZodError } from 'zod'
import { resolveSynthesisConfig } from '../settings.js'
import { ConsoleTransport } from '../transport/console-transport.js'
import { loadInventory } from '../transport/inventory.js'
import type { DeviceTransport } from '../transport/types.js'
import { GlobalOptionsSchema } from '../types.js'
import type { GlobalOptions } from '../types.js'

export function exitWithIssues(error: ZodError): never {
  console.error(chalk.red('Invalid input:'))
  error.issues.forEach((issue) => {
    console.error(chalk.yellow(`- ${issue.path.join('.')}: ${issue.message}`))
  })
  process.exit(1)
}

export function exitWithError(message: string): never {
  console.error(chalk.red(`[error] ${message}`))
  process.exit(1)
}

export function readGlobals(cmd: Command): GlobalOptions {
  const validation = GlobalOptionsSchema.safeParse(cmd.optsWithGlobals())
  if (!validation.success) exitWithIssues(validation.error)
  return validation.data
}

export function synthesisSettings(globals: GlobalOptions): SynthesisConfig {
  try {
    return resolveSynthesisConfig(globals)
  } catch (error) {
    if (error instanceof ZodError) exitWithIssues(error)
    throw error
  }
}

export async function openTransport(globals: GlobalOptions): Promise<DeviceTransport> {
  return new ConsoleTransport(await loadInventory(globals.inventory))
}
