import { findConnection, linkKey, lookupAs, lookupRouter } from '@intentcfg/intent'
import type { Intent, Link, Router } from '@intentcfg/intent'
import { formatIpv4, formatPrefix, prefixOf } from '@intentcfg/netaddr'
import type { Ipv4Prefix } from '@intentcfg/netaddr'
import { getLogger } from '@intentcfg/telemetry'
import { IntentCfgError, isIntentCfgError } from '@intentcfg/types'
import type { ErrorContext } from '@intentcfg/types'
import {
  LINK_PREFIX_LENGTH,
  allocateInterfaceAddress,
  createLedger,
} from './address-allocator.js'
import type { AllocationLedger } from './address-allocator.js'
import { FactTable } from './fact-table.js'

const logger = getLogger(['intentcfg', 'synthesis', 'addressing'])

/** Highest router id that still renders as a dotted quad `n.n.n.n`. */
export const MAX_ROUTER_ID = 255

export interface LinkAllocation {
  readonly key: string
  /** Lexically lower hostname; takes the first usable host by default. */
  readonly local: string
  readonly remote: string
  readonly interAs: boolean
  readonly subnet: Ipv4Prefix
  readonly addresses: ReadonlyMap<string, number>
}

export interface AddressPlan {
  readonly links: FactTable<string, LinkAllocation>
  readonly loopbacks: FactTable<string, number>
  readonly routerIds: FactTable<string, number>
}

interface PendingLink {
  readonly key: string
  readonly local: Router
  readonly remote: Router
  readonly localLink: Link
  readonly remoteLink: Link
  readonly pool: Ipv4Prefix
  readonly context: ErrorContext
}

function reverseLink(router: Router, neighbor: Router): Link {
  const back = neighbor.links.find((link) => link.neighbor === router.hostname)
  if (!back) throw new Error(`Link ${router.hostname}-${neighbor.hostname} has no reverse side`)
  return back
}

/**
 * Pool a link's /30 is carved from: the AS transport pool for intra-AS
 * links; for inter-AS links the boundary prefix reserved for the local end,
 * then the one reserved for the remote end, then the local AS transport pool.
 */
function linkPool(intent: Intent, local: Router, remote: Router): Ipv4Prefix {
  const localAs = lookupAs(intent, local.asNumber)
  if (local.asNumber === remote.asNumber) return localAs.transportPrefix
  const remoteAs = lookupAs(intent, remote.asNumber)
  return (
    findConnection(localAs, remote.asNumber)?.linkPrefixes.get(local.hostname) ??
    findConnection(remoteAs, local.asNumber)?.linkPrefixes.get(remote.hostname) ??
    localAs.transportPrefix
  )
}

/** Every link once, in AS order, then AS router order, then declared link order. */
function enumerateLinks(intent: Intent): PendingLink[] {
  const seen = new Set<string>()
  const links: PendingLink[] = []
  for (const as of intent.systems) {
    for (const hostname of as.routers) {
      const router = lookupRouter(intent, hostname)
      for (const link of router.links) {
        const key = linkKey(hostname, link.neighbor)
        if (seen.has(key)) continue
        seen.add(key)

        const neighbor = lookupRouter(intent, link.neighbor)
        const routerIsLocal = router.hostname < neighbor.hostname
        const local = routerIsLocal ? router : neighbor
        const remote = routerIsLocal ? neighbor : router
        const context: ErrorContext =
          local.asNumber === remote.asNumber
            ? { as: local.asNumber, link: key }
            : { as: local.asNumber, remoteAs: remote.asNumber, link: key }

        links.push({
          key,
          local,
          remote,
          localLink: routerIsLocal ? link : reverseLink(router, neighbor),
          remoteLink: routerIsLocal ? reverseLink(router, neighbor) : link,
          pool: linkPool(intent, local, remote),
          context,
        })
      }
    }
  }
  return links
}

function pinnedSubnet(link: PendingLink): Ipv4Prefix | undefined {
  const pins: Ipv4Prefix[] = []
  for (const side of [link.localLink, link.remoteLink]) {
    if (side.address?.length !== undefined) {
      pins.push(prefixOf(side.address.address, side.address.length))
    }
  }
  const [first, second] = pins
  if (first && second && (first.network !== second.network || first.length !== second.length)) {
    throw new IntentCfgError(
      'AddressConflict',
      `Explicit addresses on ${link.key} are in different subnets ${formatPrefix(first)} and ${formatPrefix(second)}`,
      link.context
    )
  }
  return first
}

function recordFailure<V>(table: FactTable<string, V>, key: string, err: unknown): void {
  if (!isIntentCfgError(err)) throw err
  logger.error`${err.code} for ${key}: ${err.message}`
  table.fail(key, err)
}

function planLinks(intent: Intent, table: FactTable<string, LinkAllocation>): void {
  const ledgers = new Map<string, AllocationLedger>()
  const ledgerFor = (pool: Ipv4Prefix): AllocationLedger => {
    const id = formatPrefix(pool)
    let ledger = ledgers.get(id)
    if (!ledger) {
      ledger = createLedger(pool)
      ledgers.set(id, ledger)
    }
    return ledger
  }

  const pending = enumerateLinks(intent)
  const subnets = new Map<string, Ipv4Prefix>()

  // Pinned subnets are reserved before any automatic allocation.
  for (const link of pending) {
    try {
      const pin = pinnedSubnet(link)
      if (pin) subnets.set(link.key, ledgerFor(link.pool).reserve(pin, link.context))
    } catch (err) {
      recordFailure(table, link.key, err)
    }
  }

  for (const link of pending) {
    if (subnets.has(link.key) || table.has(link.key)) continue
    try {
      subnets.set(link.key, ledgerFor(link.pool).allocate(LINK_PREFIX_LENGTH, link.context))
    } catch (err) {
      recordFailure(table, link.key, err)
    }
  }

  for (const link of pending) {
    const subnet = subnets.get(link.key)
    if (!subnet) continue
    try {
      const localAddress = allocateInterfaceAddress(
        subnet,
        'local',
        link.localLink.address?.address,
        link.remoteLink.address?.address,
        link.context
      )
      const remoteAddress = allocateInterfaceAddress(
        subnet,
        'remote',
        link.remoteLink.address?.address,
        localAddress,
        link.context
      )
      table.set(link.key, {
        key: link.key,
        local: link.local.hostname,
        remote: link.remote.hostname,
        interAs: link.local.asNumber !== link.remote.asNumber,
        subnet,
        addresses: new Map([
          [link.local.hostname, localAddress],
          [link.remote.hostname, remoteAddress],
        ]),
      })
      logger.debug`${link.key}: ${formatPrefix(subnet)} (${link.local.hostname} ${formatIpv4(localAddress)}, ${link.remote.hostname} ${formatIpv4(remoteAddress)})`
    } catch (err) {
      recordFailure(table, link.key, err)
    }
  }
}

function planLoopbacks(intent: Intent, table: FactTable<string, number>): void {
  for (const as of intent.systems) {
    const ledger = createLedger(as.loopbackPrefix)
    const routers = as.routers.map((hostname) => lookupRouter(intent, hostname))

    for (const router of routers) {
      if (!router.loopback) continue
      try {
        ledger.reserve(prefixOf(router.loopback.address, 32), {
          as: as.asNumber,
          router: router.hostname,
        })
        table.set(router.hostname, router.loopback.address)
      } catch (err) {
        recordFailure(table, router.hostname, err)
      }
    }

    for (const router of routers) {
      if (router.loopback) continue
      try {
        const block = ledger.allocate(32, { as: as.asNumber, router: router.hostname })
        table.set(router.hostname, block.network)
      } catch (err) {
        recordFailure(table, router.hostname, err)
      }
    }
  }
}

function planRouterIds(intent: Intent, table: FactTable<string, number>): void {
  let counter = 0
  for (const as of intent.systems) {
    for (const hostname of as.routers) {
      counter += 1
      if (counter > MAX_ROUTER_ID) {
        table.fail(
          hostname,
          new IntentCfgError(
            'AddressSpaceExhausted',
            `Router id ${counter} does not fit a dotted quad (at most ${MAX_ROUTER_ID} routers)`,
            { as: as.asNumber, router: hostname }
          )
        )
      } else {
        table.set(hostname, counter)
      }
    }
  }
}

/**
 * Allocate every link subnet, interface address, loopback and router id of
 * the intent. Failures are kept per link or router; nothing here throws
 * for an address problem.
 */
export function planAddresses(intent: Intent): AddressPlan {
  const plan: AddressPlan = {
    links: new FactTable('link allocation'),
    loopbacks: new FactTable('loopback'),
    routerIds: new FactTable('router id'),
  }
  planLinks(intent, plan.links)
  planLoopbacks(intent, plan.loopbacks)
  planRouterIds(intent, plan.routerIds)
  return plan
}

/** Address of `hostname` on its link to `neighbor`. Rethrows the link's failure. */
export function endpointAddress(plan: AddressPlan, hostname: string, neighbor: string): number {
  const allocation = plan.links.get(linkKey(hostname, neighbor))
  const address = allocation.addresses.get(hostname)
  if (address === undefined) throw new Error(`${hostname} is not an endpoint of ${allocation.key}`)
  return address
}

export function formatRouterId(id: number): string {
  return `${id}.${id}.${id}.${id}`
}
