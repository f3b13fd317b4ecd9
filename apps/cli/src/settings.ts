import { SynthesisConfigSchema, loadDefaultConfig } from '@intentcfg/config'
import type { LogLevel, SynthesisConfig } from '@intentcfg/config'
import type { GlobalOptions } from './types.js'

type Env = Record<string, string | undefined>

function splitList(value: string): string[] {
  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0)
}

/**
 * Synthesis settings for a run. Program options (flags, then config file)
 * win over the environment, which wins over built-in defaults.
 *
 * @throws {z.ZodError} when a value from any source is invalid
 */
export function resolveSynthesisConfig(
  options: GlobalOptions,
  env: Env = process.env
): SynthesisConfig {
  const base = loadDefaultConfig(env).synthesis
  return SynthesisConfigSchema.parse({
    interfacePool: options.interfacePool ? splitList(options.interfacePool) : base.interfacePool,
    ospfProcessId: options.ospfProcessId ?? base.ospfProcessId,
    loopbackInterface: options.loopbackInterface ?? base.loopbackInterface,
  })
}

export function resolveLogLevel(options: GlobalOptions, env: Env = process.env): LogLevel {
  return options.logLevel ?? loadDefaultConfig(env).logLevel
}
