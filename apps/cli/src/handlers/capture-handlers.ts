import { mkdir, writeFile } from 'node:fs/promises'
import { join } from 'node:path'
import { parseConfig } from '@intentcfg/diff'
import { errorMessage, fail, ok } from '@intentcfg/types'
import type { DeviceTransport } from '../transport/types.js'
import type { CaptureInput, CliResult } from '../types.js'

export interface CaptureOutput {
  device: string
  path: string
  sections: number
}

export function runningConfigFileName(device: string): string {
  return `${device}_running-config.cfg`
}

/**
 * Save a device's running configuration. The text must parse before it is
 * written, so a truncated capture is reported instead of stored.
 */
export async function captureHandler(
  input: CaptureInput,
  transport: DeviceTransport
): Promise<CliResult<CaptureOutput>> {
  try {
    const config = await transport.fetchRunningConfig(input.device)
    const tree = parseConfig(config, input.device)

    await mkdir(input.outputDir, { recursive: true })
    const path = join(input.outputDir, runningConfigFileName(input.device))
    await writeFile(path, config)

    return ok({ device: input.device, path, sections: tree.sections.length })
  } catch (error) {
    return fail(errorMessage(error))
  }
}
