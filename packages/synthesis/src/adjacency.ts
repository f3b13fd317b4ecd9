import { declaredRelationship, linkKey, lookupAs, lookupRouter } from '@intentcfg/intent'
import type { AutonomousSystem, Intent, Link, Relationship, Router } from '@intentcfg/intent'
import type { SynthesisConfig } from '@intentcfg/config'
import { compareIpv4, formatIpv4, netmask, wildcardMask } from '@intentcfg/netaddr'
import type { Ipv4Prefix } from '@intentcfg/netaddr'
import { LINK_PREFIX_LENGTH } from './address-allocator.js'
import { endpointAddress, formatRouterId } from './address-plan.js'
import type { AddressPlan } from './address-plan.js'
import type { InterfaceAssignment } from './interface-assigner.js'
import type {
  BgpNeighborPlan,
  BgpPlan,
  InterfacePlan,
  Ipv4NeighborPlan,
  OspfPlan,
  PolicyPlan,
  RouteMapPlan,
  RouterPlan,
  VrfPlan,
} from './router-plan.js'

export interface SynthesisContext {
  readonly intent: Intent
  readonly addresses: AddressPlan
  readonly settings: SynthesisConfig
}

export const GENERAL_OUT_ROUTE_MAP = 'General-OUT'

const LOCAL_PREFERENCE: Record<Relationship, number> = {
  client: 300,
  peer: 200,
  provider: 100,
}

const ROUTE_MAP_PREFIX: Record<Relationship, string> = {
  client: 'Client',
  peer: 'Peer',
  provider: 'Provider',
}

export function communityOf(asNumber: number): string {
  return `${asNumber}:1000`
}

export function communityListName(asNumber: number): string {
  return `AS${asNumber}`
}

export function inboundRouteMapName(relationship: Relationship, asNumber: number): string {
  return `${ROUTE_MAP_PREFIX[relationship]}-AS${asNumber}`
}

/** A router in an LDP-enabled AS with at least one link into another AS. */
export function isProviderEdge(intent: Intent, router: Router): boolean {
  if (!lookupAs(intent, router.asNumber).ldp) return false
  return router.links.some(
    (link) => lookupRouter(intent, link.neighbor).asNumber !== router.asNumber
  )
}

/** VRF a PE binds its link to `neighbor` into, when the neighbor is a VPN customer edge. */
function vrfName(intent: Intent, router: Router, neighbor: Router): string | undefined {
  if (neighbor.asNumber === router.asNumber || neighbor.vpnFamily === undefined) return undefined
  return isProviderEdge(intent, router) ? `VPN${neighbor.vpnFamily}` : undefined
}

interface EbgpSession {
  readonly neighbor: Router
  readonly address: string
  readonly vrf?: string
  readonly relationship?: Relationship
}

function comparePrefix(a: Ipv4Prefix, b: Ipv4Prefix): number {
  return a.network - b.network || a.length - b.length
}

function byAddress<T extends { readonly address: string }>(a: T, b: T): number {
  return compareIpv4(a.address, b.address)
}

function planInterfaces(
  ctx: SynthesisContext,
  router: Router,
  as: AutonomousSystem,
  assignment: InterfaceAssignment
): InterfacePlan[] {
  const linkByInterface = new Map<string, Link>()
  for (const link of router.links) {
    const name = assignment.byNeighbor.get(link.neighbor)
    if (name !== undefined) linkByInterface.set(name, link)
  }

  return assignment.ordered.map((name): InterfacePlan => {
    const link = linkByInterface.get(name)
    if (!link) return { name, mpls: false, shutdown: true }

    const neighbor = lookupRouter(ctx.intent, link.neighbor)
    const interAs = neighbor.asNumber !== router.asNumber
    return {
      name,
      neighbor: neighbor.hostname,
      address: {
        address: formatIpv4(endpointAddress(ctx.addresses, router.hostname, neighbor.hostname)),
        mask: netmask(LINK_PREFIX_LENGTH),
      },
      vrf: vrfName(ctx.intent, router, neighbor),
      ospfCost: as.internalRouting === 'OSPF' ? link.ospfCost : undefined,
      mpls: as.ldp && !interAs,
      shutdown: false,
    }
  })
}

function planOspf(
  ctx: SynthesisContext,
  router: Router,
  interfaces: readonly InterfacePlan[],
  routerId: string,
  loopback: number
): OspfPlan {
  const prefixes: Ipv4Prefix[] = [{ network: loopback, length: 32 }]
  for (const link of router.links) {
    const neighbor = lookupRouter(ctx.intent, link.neighbor)
    if (neighbor.asNumber !== router.asNumber) continue
    prefixes.push(ctx.addresses.links.get(linkKey(router.hostname, neighbor.hostname)).subnet)
  }
  prefixes.sort(comparePrefix)

  return {
    processId: ctx.settings.ospfProcessId,
    routerId,
    passiveInterfaces: interfaces
      .filter((plan) => {
        if (plan.neighbor === undefined) return false
        return lookupRouter(ctx.intent, plan.neighbor).asNumber !== router.asNumber
      })
      .map((plan) => plan.name),
    networks: prefixes.map((prefix) => ({
      address: formatIpv4(prefix.network),
      wildcard: wildcardMask(prefix.length),
    })),
  }
}

function ebgpSessions(ctx: SynthesisContext, router: Router): EbgpSession[] {
  const sessions: EbgpSession[] = []
  for (const link of router.links) {
    const neighbor = lookupRouter(ctx.intent, link.neighbor)
    if (neighbor.asNumber === router.asNumber) continue
    sessions.push({
      neighbor,
      address: formatIpv4(endpointAddress(ctx.addresses, neighbor.hostname, router.hostname)),
      vrf: vrfName(ctx.intent, router, neighbor),
      relationship: declaredRelationship(ctx.intent, router.asNumber, neighbor.asNumber),
    })
  }
  return sessions
}

function planBgp(
  ctx: SynthesisContext,
  router: Router,
  as: AutonomousSystem,
  routerId: string,
  sessions: readonly EbgpSession[]
): BgpPlan {
  const loopbackName = ctx.settings.loopbackInterface
  const peers = as.routers
    .filter((hostname) => hostname !== router.hostname)
    .map((hostname) => ({
      router: lookupRouter(ctx.intent, hostname),
      address: formatIpv4(ctx.addresses.loopbacks.get(hostname)),
    }))
  const sendCommunityInternally = as.connections.length > 0

  const global = sessions.filter((session) => session.vrf === undefined)
  const neighbors: BgpNeighborPlan[] = [
    ...peers.map((peer) => ({
      address: peer.address,
      remoteAs: as.asNumber,
      updateSource: loopbackName,
    })),
    ...global.map((session) => ({
      address: session.address,
      remoteAs: session.neighbor.asNumber,
    })),
  ].sort(byAddress)

  const ipv4Neighbors: Ipv4NeighborPlan[] = [
    ...peers.map((peer) => ({ address: peer.address, sendCommunity: sendCommunityInternally })),
    ...global.map((session): Ipv4NeighborPlan => {
      if (session.relationship === undefined) {
        return { address: session.address, sendCommunity: false }
      }
      return {
        address: session.address,
        sendCommunity: true,
        routeMapIn: inboundRouteMapName(session.relationship, session.neighbor.asNumber),
        routeMapOut: session.relationship === 'client' ? undefined : GENERAL_OUT_ROUTE_MAP,
      }
    }),
  ].sort(byAddress)

  const vpnv4 = isProviderEdge(ctx.intent, router)
    ? peers
        .filter((peer) => isProviderEdge(ctx.intent, peer.router))
        .map((peer) => peer.address)
        .sort(compareIpv4)
    : []

  const vrfNeighbors = new Map<string, BgpNeighborPlan[]>()
  for (const session of sessions) {
    if (session.vrf === undefined) continue
    const list = vrfNeighbors.get(session.vrf) ?? []
    list.push({ address: session.address, remoteAs: session.neighbor.asNumber })
    vrfNeighbors.set(session.vrf, list)
  }

  return {
    asNumber: as.asNumber,
    routerId,
    neighbors,
    ipv4: {
      redistributeConnected: global.some((session) => session.relationship === 'provider'),
      neighbors: ipv4Neighbors,
    },
    vpnv4,
    vrfs: [...vrfNeighbors.entries()]
      .sort(([a], [b]) => a.localeCompare(b))
      .map(([vrf, list]) => ({ vrf, neighbors: list.sort(byAddress) })),
  }
}

function planVrfs(router: Router, sessions: readonly EbgpSession[]): VrfPlan[] {
  const vrfs = new Map<string, VrfPlan>()
  for (const session of sessions) {
    const family = session.neighbor.vpnFamily
    if (session.vrf === undefined || family === undefined) continue
    const target = `${router.asNumber}:${family}`
    vrfs.set(session.vrf, { name: session.vrf, rd: target, routeTarget: target })
  }
  return [...vrfs.values()].sort((a, b) => a.name.localeCompare(b.name))
}

/**
 * Community lists and route-maps for a border router whose AS declares the
 * relationship of at least one of its global eBGP neighbors. Undeclared
 * relationships get no policy at all.
 */
function planPolicy(as: AutonomousSystem, sessions: readonly EbgpSession[]): PolicyPlan {
  const governed = new Map<number, Relationship>()
  for (const session of sessions) {
    if (session.vrf === undefined && session.relationship !== undefined) {
      governed.set(session.neighbor.asNumber, session.relationship)
    }
  }
  if (governed.size === 0) return { communityLists: [], routeMaps: [] }

  const connections = [...as.connections].sort((a, b) => a.asNumber - b.asNumber)
  const routeMaps: RouteMapPlan[] = [...governed.entries()]
    .sort(([a], [b]) => a - b)
    .map(([asNumber, relationship]): RouteMapPlan => ({
      name: inboundRouteMapName(relationship, asNumber),
      action: 'permit',
      sequence: 10,
      matchCommunities: [],
      localPreference: LOCAL_PREFERENCE[relationship],
      community: communityOf(asNumber),
    }))

  if ([...governed.values()].some((relationship) => relationship !== 'client')) {
    routeMaps.push(
      {
        name: GENERAL_OUT_ROUTE_MAP,
        action: 'deny',
        sequence: 10,
        matchCommunities: connections
          .filter((connection) => connection.relationship !== 'client')
          .map((connection) => communityListName(connection.asNumber)),
      },
      { name: GENERAL_OUT_ROUTE_MAP, action: 'permit', sequence: 20, matchCommunities: [] }
    )
  }

  return {
    communityLists: connections.map((connection) => ({
      name: communityListName(connection.asNumber),
      community: communityOf(connection.asNumber),
    })),
    routeMaps,
  }
}

/**
 * Resolve everything one router's configuration contains. Reading a fact
 * that failed to allocate (this router's or a neighbor's) rethrows that
 * failure, which fails this router too.
 */
export function deriveRouterPlan(
  ctx: SynthesisContext,
  router: Router,
  assignment: InterfaceAssignment
): RouterPlan {
  const as = lookupAs(ctx.intent, router.asNumber)
  const loopback = ctx.addresses.loopbacks.get(router.hostname)
  const routerId = formatRouterId(ctx.addresses.routerIds.get(router.hostname))
  const interfaces = planInterfaces(ctx, router, as, assignment)
  const sessions = ebgpSessions(ctx, router)

  return {
    hostname: router.hostname,
    vrfs: planVrfs(router, sessions),
    loopback: { name: ctx.settings.loopbackInterface, address: formatIpv4(loopback) },
    interfaces,
    ospf:
      as.internalRouting === 'OSPF'
        ? planOspf(ctx, router, interfaces, routerId, loopback)
        : undefined,
    bgp: planBgp(ctx, router, as, routerId, sessions),
    policy: planPolicy(as, sessions),
    ldpRouterId: as.ldp ? ctx.settings.loopbackInterface : undefined,
  }
}
