import type { InterfaceAddress, Ipv4Prefix } from '@intentcfg/netaddr'

/** Role of the remote AS as seen from the AS that declares the connection. */
export type Relationship = 'peer' | 'provider' | 'client'

export type InternalRouting = 'OSPF' | 'RIP'

export interface Connection {
  readonly asNumber: number
  readonly relationship: Relationship
  /** Local router hostname to the prefix reserved for its boundary links. */
  readonly linkPrefixes: ReadonlyMap<string, Ipv4Prefix>
}

export interface AutonomousSystem {
  readonly asNumber: number
  readonly transportPrefix: Ipv4Prefix
  readonly loopbackPrefix: Ipv4Prefix
  readonly internalRouting: InternalRouting
  /** Member hostnames in declaration order. Drives loopback and router-id order. */
  readonly routers: readonly string[]
  readonly ldp: boolean
  readonly connections: readonly Connection[]
}

export interface Link {
  readonly neighbor: string
  readonly interface?: string
  readonly address?: InterfaceAddress
  readonly ospfCost?: number
}

export interface Router {
  readonly hostname: string
  readonly asNumber: number
  readonly links: readonly Link[]
  /** Explicit loopback; when absent one is allocated from the AS loopback pool. */
  readonly loopback?: InterfaceAddress
  readonly position: { readonly x: number; readonly y: number }
  readonly vpnFamily?: number
}

/**
 * Validated, immutable intent. Every hostname and AS number reachable from
 * here resolves through the lookup maps.
 */
export interface Intent {
  readonly ipVersion: 4
  readonly systems: readonly AutonomousSystem[]
  readonly routers: readonly Router[]
  readonly asByNumber: ReadonlyMap<number, AutonomousSystem>
  readonly routerByHostname: ReadonlyMap<string, Router>
}

export function lookupRouter(intent: Intent, hostname: string): Router {
  const router = intent.routerByHostname.get(hostname)
  if (!router) throw new Error(`Unknown router: ${hostname}`)
  return router
}

export function lookupAs(intent: Intent, asNumber: number): AutonomousSystem {
  const as = intent.asByNumber.get(asNumber)
  if (!as) throw new Error(`Unknown AS: ${asNumber}`)
  return as
}

export function asOfRouter(intent: Intent, hostname: string): AutonomousSystem {
  return lookupAs(intent, lookupRouter(intent, hostname).asNumber)
}

export function findConnection(
  as: AutonomousSystem,
  remoteAsNumber: number
): Connection | undefined {
  return as.connections.find((connection) => connection.asNumber === remoteAsNumber)
}

/**
 * Relationship of `remote` as declared by `local`. Undefined when `local`
 * does not list `remote` in its connections; routing policy is then omitted.
 */
export function declaredRelationship(
  intent: Intent,
  localAsNumber: number,
  remoteAsNumber: number
): Relationship | undefined {
  return findConnection(lookupAs(intent, localAsNumber), remoteAsNumber)?.relationship
}

/** The relationship the remote AS must declare back for the pair to be consistent. */
export function invertRelationship(relationship: Relationship): Relationship {
  switch (relationship) {
    case 'peer':
      return 'peer'
    case 'provider':
      return 'client'
    case 'client':
      return 'provider'
  }
}

/** Unordered pair key for a link: the two hostnames sorted and joined. */
export function linkKey(a: string, b: string): string {
  return a < b ? `${a}--${b}` : `${b}--${a}`
}
