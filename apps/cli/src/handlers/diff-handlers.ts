import { mkdir, readFile, writeFile } from 'node:fs/promises'
import { join } from 'node:path'
import { diffConfigs, frameCommands, isEmptyDiff, parseConfig, projectDiff } from '@intentcfg/diff'
import type { ConfigDiff, ConfigTree } from '@intentcfg/diff'
import { loadIntentFile } from '@intentcfg/intent'
import { synthesizeNetwork } from '@intentcfg/synthesis'
import type { SynthesisReport } from '@intentcfg/synthesis'
import { errorMessage, fail, ok } from '@intentcfg/types'
import type { DeviceTransport } from '../transport/types.js'
import type {
  CliResult,
  DiffFilesInput,
  DiffIntentsInput,
  DiffRunningInput,
} from '../types.js'

export interface ConfigComparison {
  diff: ConfigDiff
  commands: string[]
}

export interface RunningComparison extends ConfigComparison {
  /** Whether the framed commands were pushed to the reference device. */
  applied: boolean
}

export type RouterStatus = 'added' | 'removed' | 'changed' | 'unchanged'

export interface RouterComparison extends ConfigComparison {
  hostname: string
  status: RouterStatus
}

export interface IntentComparison {
  routers: RouterComparison[]
  /** Command files written, when an output directory was given. */
  written: string[]
  /** Routers the framed commands were pushed to. */
  applied: string[]
}

interface NamedText {
  label: 'reference' | 'candidate'
  name: string
  text: string
}

/**
 * Parse both sides and diff them. When a side is malformed the error names
 * it; both sides are always parsed so a double failure reports both.
 */
export function compareConfigTexts(
  reference: NamedText,
  candidate: NamedText
): CliResult<ConfigComparison> {
  const errors: string[] = []
  const parse = (side: NamedText): ConfigTree | undefined => {
    try {
      return parseConfig(side.text, side.name)
    } catch (error) {
      errors.push(`${side.label} ${side.name}: ${errorMessage(error)}`)
      return undefined
    }
  }

  const before = parse(reference)
  const after = parse(candidate)
  if (!before || !after) return fail(errors.join('\n'))

  const diff = diffConfigs(before, after)
  return ok({ diff, commands: projectDiff(diff) })
}

export async function diffFilesHandler(
  input: DiffFilesInput
): Promise<CliResult<ConfigComparison>> {
  try {
    const [reference, candidate] = await Promise.all([
      readFile(input.reference, 'utf-8'),
      readFile(input.candidate, 'utf-8'),
    ])
    return compareConfigTexts(
      { label: 'reference', name: input.reference, text: reference },
      { label: 'candidate', name: input.candidate, text: candidate }
    )
  } catch (error) {
    return fail(errorMessage(error))
  }
}

/**
 * Diff the running configurations of two devices. With `apply`, the
 * commands that bring the reference device in line are pushed to it.
 */
export async function diffRunningHandler(
  input: DiffRunningInput,
  transport: DeviceTransport
): Promise<CliResult<RunningComparison>> {
  try {
    const reference = await transport.fetchRunningConfig(input.reference)
    const candidate = await transport.fetchRunningConfig(input.candidate)
    const result = compareConfigTexts(
      { label: 'reference', name: input.reference, text: reference },
      { label: 'candidate', name: input.candidate, text: candidate }
    )
    if (!result.success) return result

    const framed = frameCommands(result.data.commands, transport.framing)
    const applied = input.apply && framed.length > 0
    if (applied) await transport.sendCommands(input.reference, framed)
    return ok({ ...result.data, applied })
  } catch (error) {
    return fail(errorMessage(error))
  }
}

function describeFailures(side: string, path: string, report: SynthesisReport): string[] {
  return report.failures.map(
    (failure) => `${side} intent ${path}: ${failure.hostname}: ${failure.code}: ${failure.message}`
  )
}

function compareRouter(
  hostname: string,
  reference: string | undefined,
  candidate: string | undefined
): RouterComparison {
  const diff = diffConfigs(
    parseConfig(reference ?? '', `reference ${hostname}`),
    parseConfig(candidate ?? '', `candidate ${hostname}`)
  )
  let status: RouterStatus
  if (reference === undefined) {
    status = 'added'
  } else if (candidate === undefined) {
    status = 'removed'
  } else {
    status = isEmptyDiff(diff) ? 'unchanged' : 'changed'
  }
  return { hostname, status, diff, commands: projectDiff(diff) }
}

export function commandFileName(hostname: string): string {
  return `${hostname}_commands.txt`
}

/**
 * Synthesize two intent files and diff the result router by router:
 * candidate routers in order, then routers only the reference has.
 */
export async function diffIntentsHandler(
  input: DiffIntentsInput,
  transport?: DeviceTransport
): Promise<CliResult<IntentComparison>> {
  try {
    const reference = synthesizeNetwork(await loadIntentFile(input.reference), input.settings)
    const candidate = synthesizeNetwork(await loadIntentFile(input.candidate), input.settings)
    const failures = [
      ...describeFailures('reference', input.reference, reference),
      ...describeFailures('candidate', input.candidate, candidate),
    ]
    if (failures.length > 0) return fail(failures.join('\n'))

    const hostnames = [
      ...candidate.configs.keys(),
      ...[...reference.configs.keys()].filter((hostname) => !candidate.configs.has(hostname)),
    ]
    if (input.router !== undefined && !hostnames.includes(input.router)) {
      return fail(`Router ${input.router} is in neither intent`)
    }

    const routers = hostnames
      .filter((hostname) => input.router === undefined || hostname === input.router)
      .map((hostname) =>
        compareRouter(hostname, reference.configs.get(hostname), candidate.configs.get(hostname))
      )

    const written: string[] = []
    if (input.outputDir) {
      await mkdir(input.outputDir, { recursive: true })
      for (const router of routers) {
        if (router.commands.length === 0) continue
        const path = join(input.outputDir, commandFileName(router.hostname))
        await writeFile(path, router.commands.join('\n') + '\n')
        written.push(path)
      }
    }

    const applied: string[] = []
    if (input.apply) {
      if (!transport) return fail('No device transport to apply changes with')
      for (const router of routers) {
        const framed = frameCommands(router.commands, transport.framing)
        if (router.status === 'removed' || framed.length === 0) continue
        await transport.sendCommands(router.hostname, framed)
        applied.push(router.hostname)
      }
    }

    return ok({ routers, written, applied })
  } catch (error) {
    return fail(errorMessage(error))
  }
}
