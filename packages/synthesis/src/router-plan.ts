/**
 * Fully resolved configuration of one router. Everything the renderer needs
 * is here, already sorted; rendering is a straight walk over this structure.
 */

export interface InterfacePlan {
  readonly name: string
  /** Neighbor hostname on the other end; absent for unused interfaces. */
  readonly neighbor?: string
  readonly address?: { readonly address: string; readonly mask: string }
  readonly vrf?: string
  readonly ospfCost?: number
  readonly mpls: boolean
  readonly shutdown: boolean
}

export interface OspfNetwork {
  readonly address: string
  readonly wildcard: string
}

export interface OspfPlan {
  readonly processId: number
  readonly routerId: string
  readonly passiveInterfaces: readonly string[]
  readonly networks: readonly OspfNetwork[]
}

export interface BgpNeighborPlan {
  readonly address: string
  readonly remoteAs: number
  readonly updateSource?: string
}

export interface Ipv4NeighborPlan {
  readonly address: string
  readonly sendCommunity: boolean
  readonly routeMapIn?: string
  readonly routeMapOut?: string
}

export interface VrfAddressFamilyPlan {
  readonly vrf: string
  readonly neighbors: readonly BgpNeighborPlan[]
}

export interface BgpPlan {
  readonly asNumber: number
  readonly routerId: string
  readonly neighbors: readonly BgpNeighborPlan[]
  readonly ipv4: {
    readonly redistributeConnected: boolean
    readonly neighbors: readonly Ipv4NeighborPlan[]
  }
  /** PE loopbacks this router exchanges VPNv4 routes with. */
  readonly vpnv4: readonly string[]
  readonly vrfs: readonly VrfAddressFamilyPlan[]
}

export interface VrfPlan {
  readonly name: string
  readonly rd: string
  readonly routeTarget: string
}

export interface CommunityListPlan {
  readonly name: string
  readonly community: string
}

export interface RouteMapPlan {
  readonly name: string
  readonly action: 'permit' | 'deny'
  readonly sequence: number
  readonly matchCommunities: readonly string[]
  readonly localPreference?: number
  readonly community?: string
}

export interface PolicyPlan {
  readonly communityLists: readonly CommunityListPlan[]
  readonly routeMaps: readonly RouteMapPlan[]
}

export interface RouterPlan {
  readonly hostname: string
  readonly vrfs: readonly VrfPlan[]
  readonly loopback: { readonly name: string; readonly address: string }
  readonly interfaces: readonly InterfacePlan[]
  readonly ospf?: OspfPlan
  readonly bgp: BgpPlan
  readonly policy: PolicyPlan
  /** Interface LDP takes its router id from; absent when LDP is off. */
  readonly ldpRouterId?: string
}
