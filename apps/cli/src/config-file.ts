import { readFile } from 'node:fs/promises'
import type { Command } from 'commander'
import { z } from 'zod'

/**
 * JSON config file schema for the intentcfg CLI.
 *
 * Every field is optional; values fill in program options that were not
 * given on the command line. Keys use the camelCase option names.
 * Unknown keys are rejected (.strict()) to catch typos early.
 */
export const ConfigFileSchema = z
  .object({
    logLevel: z.string().optional(),
    inventory: z.string().optional(),
    interfacePool: z.union([z.array(z.string()), z.string()]).optional(),
    ospfProcessId: z.union([z.string(), z.number()]).optional(),
    loopbackInterface: z.string().optional(),
  })
  .strict()

export type ConfigFile = z.infer<typeof ConfigFileSchema>

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT'
}

/**
 * Load and validate a JSON config file, with every value converted to the
 * string Commander stores for an option argument.
 *
 * @throws {Error} if the file does not exist, is not valid JSON,
 *   or fails validation
 */
export async function loadConfigFile(filePath: string): Promise<Record<string, string>> {
  let text: string
  try {
    text = await readFile(filePath, 'utf-8')
  } catch (err) {
    if (isMissingFile(err)) throw new Error(`Config file not found: ${filePath}`)
    throw err
  }

  let raw: unknown
  try {
    raw = JSON.parse(text)
  } catch {
    throw new Error(`Config file is not valid JSON: ${filePath}`)
  }

  const parsed = ConfigFileSchema.parse(raw)
  const result: Record<string, string> = {}

  for (const [key, value] of Object.entries(parsed)) {
    if (value === undefined) continue
    if (Array.isArray(value)) {
      result[key] = value.join(',')
    } else {
      result[key] = String(value)
    }
  }

  return result
}

/**
 * Apply config file values to a Commander command instance.
 *
 * Only sets values where the current source is 'default' or unset, so
 * flags and environment variables keep precedence. Injected values are
 * tagged with source 'config'.
 */
export function applyConfigFileValues(cmd: Command, configValues: Record<string, string>): void {
  for (const [key, value] of Object.entries(configValues)) {
    const source = cmd.getOptionValueSource(key)
    if (source === 'default' || source === undefined) {
      cmd.setOptionValueWithSource(key, value, 'config')
    }
  }
}
