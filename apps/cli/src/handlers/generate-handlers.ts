import { mkdir, writeFile } from 'node:fs/promises'
import { join } from 'node:path'
import { loadIntentFile } from '@intentcfg/intent'
import { synthesizeNetwork } from '@intentcfg/synthesis'
import type { SynthesisReport } from '@intentcfg/synthesis'
import { errorMessage, fail, ok } from '@intentcfg/types'
import type { CliResult, GenerateInput } from '../types.js'

export interface GenerateOutput {
  report: SynthesisReport
  /** Files written, in router order; empty when printing to stdout. */
  written: string[]
}

export function startupConfigFileName(hostname: string): string {
  return `${hostname}_startup-config.cfg`
}

/**
 * Synthesize every router of an intent file. A report with failures is
 * still a successful result: the rendered routers are written and the
 * command decides the exit code.
 */
export async function generateHandler(input: GenerateInput): Promise<CliResult<GenerateOutput>> {
  try {
    const intent = await loadIntentFile(input.intent)
    const report = synthesizeNetwork(intent, input.settings)

    const written: string[] = []
    if (input.outputDir) {
      await mkdir(input.outputDir, { recursive: true })
      for (const [hostname, config] of report.configs) {
        const path = join(input.outputDir, startupConfigFileName(hostname))
        await writeFile(path, config)
        written.push(path)
      }
    }

    return ok({ report, written })
  } catch (error) {
    return fail(errorMessage(error))
  }
}
