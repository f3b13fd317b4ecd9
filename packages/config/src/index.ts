import { z } from 'zod'

/**
 * Physical interface names of the c7200 image used in the lab, in the order
 * links are assigned to them.
 */
export const DEFAULT_INTERFACE_POOL: readonly string[] = [
  'GigabitEthernet1/0',
  'GigabitEthernet2/0',
  'GigabitEthernet3/0',
  'GigabitEthernet4/0',
  'GigabitEthernet5/0',
  'GigabitEthernet6/0',
]

export const InterfacePoolSchema = z
  .array(z.string().trim().min(1))
  .min(1)
  .refine((names) => new Set(names).size === names.length, 'Interface names must be unique')

/**
 * Synthesis settings shared by every router in a run.
 */
export const SynthesisConfigSchema = z.object({
  interfacePool: InterfacePoolSchema.default([...DEFAULT_INTERFACE_POOL]),
  ospfProcessId: z.number().int().min(1).max(65535).default(10),
  loopbackInterface: z.string().trim().min(1).default('Loopback0'),
})

export type SynthesisConfig = z.infer<typeof SynthesisConfigSchema>

export const LogLevelSchema = z.enum(['debug', 'info', 'warning', 'error', 'fatal'])
export type LogLevel = z.infer<typeof LogLevelSchema>

/**
 * Top-level intentcfg configuration
 */
export const IntentCfgConfigSchema = z.object({
  synthesis: SynthesisConfigSchema.default({}),
  logLevel: LogLevelSchema.default('info'),
})

export type IntentCfgConfig = z.infer<typeof IntentCfgConfigSchema>

type Env = Record<string, string | undefined>

/**
 * Loads the default configuration from environment variables.
 *
 * - `INTENTCFG_INTERFACE_POOL`: comma-separated interface names
 * - `INTENTCFG_OSPF_PROCESS_ID`
 * - `INTENTCFG_LOOPBACK_INTERFACE`
 * - `LOG_LEVEL`
 *
 * @throws {z.ZodError} when a variable is present but invalid
 */
export function loadDefaultConfig(env: Env = process.env): IntentCfgConfig {
  const pool = env.INTENTCFG_INTERFACE_POOL
  const processId = env.INTENTCFG_OSPF_PROCESS_ID

  return IntentCfgConfigSchema.parse({
    synthesis: {
      interfacePool: pool
        ? pool
            .split(',')
            .map((name) => name.trim())
            .filter((name) => name.length > 0)
        : undefined,
      ospfProcessId: processId ? Number(processId) : undefined,
      loopbackInterface: env.INTENTCFG_LOOPBACK_INTERFACE || undefined,
    },
    logLevel: env.LOG_LEVEL || undefined,
  })
}
