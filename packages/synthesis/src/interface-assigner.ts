import type { Router } from '@intentcfg/intent'
import { IntentCfgError } from '@intentcfg/types'

export interface InterfaceAssignment {
  /** Interface name per neighbor hostname. */
  readonly byNeighbor: ReadonlyMap<string, string>
  /** Every interface to render: the pool in order, then explicit names outside it. */
  readonly ordered: readonly string[]
  /** Pool interfaces no link uses. */
  readonly unused: ReadonlySet<string>
}

/**
 * Map a router's links onto physical interfaces.
 *
 * Works on a private copy of `template`, so routers never share allocation
 * state. A router may have at most as many links as the pool has names,
 * whether or not some links name interfaces outside it. Explicit interface
 * names are reserved first; remaining links then take the first free pool
 * name in declared link order.
 *
 * @throws {IntentCfgError} InterfaceExhausted when the links outnumber the
 *   pool, InterfaceConflict when two links name the same interface or a link
 *   names the loopback
 */
export function assignInterfaces(
  router: Router,
  template: readonly string[],
  loopbackInterface: string
): InterfaceAssignment {
  if (router.links.length > template.length) {
    throw new IntentCfgError(
      'InterfaceExhausted',
      `No interface left on ${router.hostname}: ${router.links.length} links for a pool of ${template.length}`,
      { router: router.hostname, links: router.links.length, pool: template.length }
    )
  }

  const available = [...template]
  const reserved = new Set<string>()
  const byNeighbor = new Map<string, string>()
  const extras: string[] = []

  for (const link of router.links) {
    if (link.interface === undefined) continue
    if (link.interface === loopbackInterface) {
      throw new IntentCfgError(
        'InterfaceConflict',
        `Interface ${link.interface} on ${router.hostname} is reserved for the loopback`,
        { router: router.hostname, interface: link.interface, neighbor: link.neighbor }
      )
    }
    if (reserved.has(link.interface)) {
      throw new IntentCfgError(
        'InterfaceConflict',
        `Interface ${link.interface} is assigned to more than one link on ${router.hostname}`,
        { router: router.hostname, interface: link.interface, neighbor: link.neighbor }
      )
    }
    reserved.add(link.interface)
    byNeighbor.set(link.neighbor, link.interface)

    const index = available.indexOf(link.interface)
    if (index >= 0) {
      available.splice(index, 1)
    } else {
      extras.push(link.interface)
    }
  }

  for (const link of router.links) {
    if (link.interface !== undefined) continue
    const name = available.shift()
    if (name === undefined) {
      throw new IntentCfgError(
        'InterfaceExhausted',
        `No interface left on ${router.hostname} for its link to ${link.neighbor} (pool of ${template.length})`,
        { router: router.hostname, neighbor: link.neighbor }
      )
    }
    byNeighbor.set(link.neighbor, name)
  }

  return {
    byNeighbor,
    ordered: [...template, ...extras],
    unused: new Set(available),
  }
}
