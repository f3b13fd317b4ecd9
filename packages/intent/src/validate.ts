import { containsAddress, formatPrefix, prefixesOverlap } from '@intentcfg/netaddr'
import type { Ipv4Prefix } from '@intentcfg/netaddr'
import { invertRelationship } from './model.js'
import type { Intent, Router } from './model.js'

interface NamedPrefix {
  readonly label: string
  readonly prefix: Ipv4Prefix
}

function checkPoolsDisjoint(pools: NamedPrefix[], issues: string[]): void {
  for (let i = 0; i < pools.length; i++) {
    for (let j = i + 1; j < pools.length; j++) {
      const a = pools[i]
      const b = pools[j]
      if (prefixesOverlap(a.prefix, b.prefix)) {
        issues.push(
          `${a.label} ${formatPrefix(a.prefix)} overlaps ${b.label} ${formatPrefix(b.prefix)}`
        )
      }
    }
  }
}

function checkSystems(intent: Intent, issues: string[]): void {
  const seen = new Set<number>()
  const pools: NamedPrefix[] = []
  for (const as of intent.systems) {
    if (seen.has(as.asNumber)) issues.push(`AS ${as.asNumber} is declared more than once`)
    seen.add(as.asNumber)
    pools.push({ label: `AS ${as.asNumber} ipv4_prefix`, prefix: as.transportPrefix })
    pools.push({ label: `AS ${as.asNumber} ipv4_loopback_prefix`, prefix: as.loopbackPrefix })
  }

  // The same boundary prefix may be declared by both sides of a link.
  const boundary = new Map<string, NamedPrefix>()
  for (const as of intent.systems) {
    for (const connection of as.connections) {
      for (const [hostname, prefix] of connection.linkPrefixes) {
        const key = formatPrefix(prefix)
        if (!boundary.has(key)) {
          boundary.set(key, { label: `AS ${as.asNumber} link prefix for ${hostname}`, prefix })
        }
      }
    }
  }
  checkPoolsDisjoint([...pools, ...boundary.values()], issues)
}

function checkMembership(intent: Intent, issues: string[]): void {
  const owner = new Map<string, number>()
  for (const as of intent.systems) {
    for (const hostname of as.routers) {
      const previous = owner.get(hostname)
      if (previous !== undefined) {
        issues.push(`Router ${hostname} is listed in AS ${previous} and AS ${as.asNumber}`)
        continue
      }
      owner.set(hostname, as.asNumber)
      if (!intent.routerByHostname.has(hostname)) {
        issues.push(`AS ${as.asNumber} lists unknown router ${hostname}`)
      }
    }
  }

  const hostnames = new Set<string>()
  for (const router of intent.routers) {
    if (hostnames.has(router.hostname)) {
      issues.push(`Router ${router.hostname} is declared more than once`)
    }
    hostnames.add(router.hostname)

    const as = intent.asByNumber.get(router.asNumber)
    if (!as) {
      issues.push(`Router ${router.hostname} references unknown AS ${router.asNumber}`)
      continue
    }
    if (owner.get(router.hostname) !== router.asNumber) {
      issues.push(`Router ${router.hostname} is not listed in the routers of AS ${router.asNumber}`)
    }
  }
}

function checkConnections(intent: Intent, issues: string[]): void {
  for (const as of intent.systems) {
    const listed = new Set<number>()
    for (const connection of as.connections) {
      const where = `AS ${as.asNumber} connected_AS ${connection.asNumber}`
      if (listed.has(connection.asNumber)) issues.push(`${where} is declared more than once`)
      listed.add(connection.asNumber)

      if (connection.asNumber === as.asNumber) {
        issues.push(`${where} refers to itself`)
        continue
      }
      const remote = intent.asByNumber.get(connection.asNumber)
      if (!remote) {
        issues.push(`${where} refers to an unknown AS`)
        continue
      }
      for (const hostname of connection.linkPrefixes.keys()) {
        if (!as.routers.includes(hostname)) {
          issues.push(`${where} reserves a prefix for ${hostname}, which is not in AS ${as.asNumber}`)
        }
      }

      const back = remote.connections.find((c) => c.asNumber === as.asNumber)
      if (back && back.relationship !== invertRelationship(connection.relationship)) {
        issues.push(
          `${where} is declared as ${connection.relationship} but AS ${remote.asNumber} declares AS ${as.asNumber} as ${back.relationship}`
        )
      }
    }
  }
}

function checkLinks(router: Router, intent: Intent, issues: string[]): void {
  const neighbors = new Set<string>()
  for (const link of router.links) {
    const where = `Router ${router.hostname} link to ${link.neighbor}`
    if (link.neighbor === router.hostname) {
      issues.push(`${where} is a self-link`)
      continue
    }
    if (neighbors.has(link.neighbor)) {
      issues.push(`${where} is declared more than once`)
      continue
    }
    neighbors.add(link.neighbor)

    const neighbor = intent.routerByHostname.get(link.neighbor)
    if (!neighbor) {
      issues.push(`${where} refers to an unknown router`)
      continue
    }
    if (!neighbor.links.some((back) => back.neighbor === router.hostname)) {
      issues.push(`${where} has no matching link on ${link.neighbor}`)
    }
    if (link.address?.length !== undefined && link.address.length !== 30) {
      issues.push(`${where} address must be a /30, got /${link.address.length}`)
    }
  }
}

function checkLoopbacks(intent: Intent, issues: string[]): void {
  const taken = new Map<number, string>()
  for (const router of intent.routers) {
    const loopback = router.loopback
    if (!loopback) continue
    if (loopback.length !== undefined && loopback.length !== 32) {
      issues.push(`Router ${router.hostname} loopback must be a /32, got /${loopback.length}`)
    }
    const as = intent.asByNumber.get(router.asNumber)
    if (as && !containsAddress(as.loopbackPrefix, loopback.address)) {
      issues.push(
        `Router ${router.hostname} loopback lies outside ${formatPrefix(as.loopbackPrefix)}`
      )
    }
    const other = taken.get(loopback.address)
    if (other !== undefined) {
      issues.push(`Routers ${other} and ${router.hostname} share the same loopback address`)
    }
    taken.set(loopback.address, router.hostname)
  }
}

/**
 * Cross-reference checks the schema cannot express. Returns every issue
 * found; an empty list means the intent is consistent.
 */
export function collectIntentIssues(intent: Intent): string[] {
  const issues: string[] = []
  checkSystems(intent, issues)
  checkMembership(intent, issues)
  checkConnections(intent, issues)
  checkLoopbacks(intent, issues)
  for (const router of intent.routers) checkLinks(router, intent, issues)
  return issues
}
