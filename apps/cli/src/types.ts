import { LogLevelSchema, SynthesisConfigSchema } from '@intentcfg/config'
import type { Result } from '@intentcfg/types'
import { z } from 'zod'

/** Handler outcome; the error is the message printed to the user. */
export type CliResult<T> = Result<T>

/** Options declared on the root program, after config-file values are applied. */
export const GlobalOptionsSchema = z.object({
  config: z.string().optional(),
  logLevel: LogLevelSchema.optional(),
  inventory: z.string().min(1).default('inventory.json'),
  interfacePool: z.string().optional(),
  ospfProcessId: z.coerce.number().int().min(1).max(65535).optional(),
  loopbackInterface: z.string().min(1).optional(),
})
export type GlobalOptions = z.infer<typeof GlobalOptionsSchema>

export const GenerateInputSchema = z.object({
  intent: z.string().min(1),
  outputDir: z.string().min(1).optional(),
  settings: SynthesisConfigSchema,
})
export type GenerateInput = z.infer<typeof GenerateInputSchema>

export const DiffFilesInputSchema = z.object({
  reference: z.string().min(1),
  candidate: z.string().min(1),
})
export type DiffFilesInput = z.infer<typeof DiffFilesInputSchema>

export const DiffRunningInputSchema = z.object({
  reference: z.string().min(1),
  candidate: z.string().min(1),
  apply: z.boolean().default(false),
})
export type DiffRunningInput = z.infer<typeof DiffRunningInputSchema>

export const DiffIntentsInputSchema = z.object({
  reference: z.string().min(1),
  candidate: z.string().min(1),
  router: z.string().min(1).optional(),
  outputDir: z.string().min(1).optional(),
  apply: z.boolean().default(false),
  settings: SynthesisConfigSchema,
})
export type DiffIntentsInput = z.infer<typeof DiffIntentsInputSchema>

export const CaptureInputSchema = z.object({
  device: z.string().min(1),
  outputDir: z.string().min(1).default('configs'),
})
export type CaptureInput = z.infer<typeof CaptureInputSchema>
