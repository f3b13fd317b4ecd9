import { readFile } from 'node:fs/promises'
import { getLogger } from '@intentcfg/telemetry'
import { IntentCfgError } from '@intentcfg/types'
import type { ZodIssue } from 'zod'
import { IntentFileSchema } from './schema.js'
import type { IntentFile } from './schema.js'
import type { AutonomousSystem, Intent, Router } from './model.js'
import { collectIntentIssues } from './validate.js'

const logger = getLogger(['intentcfg', 'intent'])

function formatIssue(issue: ZodIssue): string {
  const path = issue.path.length > 0 ? issue.path.join('.') : '(root)'
  return `${path}: ${issue.message}`
}

function invalid(issues: string[], source: string): IntentCfgError {
  const summary = issues.map((issue) => `  - ${issue}`).join('\n')
  return new IntentCfgError('InvalidIntent', `Invalid intent ${source}:\n${summary}`, {
    source,
    issues,
  })
}

function buildIntent(file: IntentFile): Intent {
  const systems: AutonomousSystem[] = file.Les_AS.map((record) => ({
    asNumber: record.AS_number,
    transportPrefix: record.ipv4_prefix,
    loopbackPrefix: record.ipv4_loopback_prefix,
    internalRouting: record.internal_routing,
    routers: record.routers,
    ldp: record.LDP_activation,
    connections: record.connected_AS,
  }))

  const routers: Router[] = file.Les_routeurs.map((record) => ({
    hostname: record.hostname,
    asNumber: record.AS_number,
    links: record.links.map((link) => ({
      neighbor: link.hostname,
      interface: link.interface,
      address: link.ipv4_address,
      ospfCost: link.ospf_cost,
    })),
    loopback: record.ipv4_loopback_address,
    position: record.position,
    vpnFamily: record.VPN_family,
  }))

  return {
    ipVersion: 4,
    systems,
    routers,
    asByNumber: new Map(systems.map((as) => [as.asNumber, as])),
    routerByHostname: new Map(routers.map((router) => [router.hostname, router])),
  }
}

/**
 * Validate a decoded intent document and build the immutable model.
 *
 * @throws {IntentCfgError} `InvalidIntent` listing every schema and
 *   cross-reference issue; nothing is returned for a partially valid file
 */
export function parseIntent(raw: unknown, source = '<inline>'): Intent {
  const parsed = IntentFileSchema.safeParse(raw)
  if (!parsed.success) {
    throw invalid(parsed.error.issues.map(formatIssue), source)
  }

  const intent = buildIntent(parsed.data)
  const issues = collectIntentIssues(intent)
  if (issues.length > 0) {
    throw invalid(issues, source)
  }

  logger.debug`Loaded intent ${source}: ${intent.systems.length} AS, ${intent.routers.length} routers`
  for (const as of intent.systems) {
    if (as.internalRouting === 'RIP') {
      logger.warn`AS ${as.asNumber} uses RIP; no IGP block will be rendered for its routers`
    }
  }
  return intent
}

export function parseIntentText(text: string, source = '<inline>'): Intent {
  let raw: unknown
  try {
    raw = JSON.parse(text)
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err)
    throw invalid([`not valid JSON (${reason})`], source)
  }
  return parseIntent(raw, source)
}

/**
 * Read and validate an intent file.
 *
 * @throws {Error} if the file cannot be read
 * @throws {IntentCfgError} `InvalidIntent` if the content is not a valid intent
 */
export async function loadIntentFile(filePath: string): Promise<Intent> {
  const text = await readFile(filePath, 'utf-8')
  return parseIntentText(text, filePath)
}
