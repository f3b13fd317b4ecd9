import type {
  BgpPlan,
  InterfacePlan,
  OspfPlan,
  PolicyPlan,
  RouteMapPlan,
  RouterPlan,
} from './router-plan.js'

const HOST_MASK = '255.255.255.255'

function renderInterface(plan: InterfacePlan): string[] {
  const lines = [`interface ${plan.name}`]
  if (plan.shutdown || !plan.address) {
    lines.push(' no ip address', ' shutdown', '!')
    return lines
  }
  if (plan.vrf !== undefined) lines.push(` ip vrf forwarding ${plan.vrf}`)
  lines.push(` ip address ${plan.address.address} ${plan.address.mask}`)
  if (plan.ospfCost !== undefined) lines.push(` ip ospf cost ${plan.ospfCost}`)
  if (plan.mpls) lines.push(' mpls ip')
  lines.push(' no shutdown', '!')
  return lines
}

function renderOspf(plan: OspfPlan): string[] {
  return [
    `router ospf ${plan.processId}`,
    ` router-id ${plan.routerId}`,
    ...plan.passiveInterfaces.map((name) => ` passive-interface ${name}`),
    ...plan.networks.map((network) => ` network ${network.address} ${network.wildcard} area 0`),
    '!',
  ]
}

function renderBgp(plan: BgpPlan): string[] {
  const lines = [
    `router bgp ${plan.asNumber}`,
    ` bgp router-id ${plan.routerId}`,
    ' bgp log-neighbor-changes',
  ]
  for (const neighbor of plan.neighbors) {
    lines.push(` neighbor ${neighbor.address} remote-as ${neighbor.remoteAs}`)
    if (neighbor.updateSource !== undefined) {
      lines.push(` neighbor ${neighbor.address} update-source ${neighbor.updateSource}`)
    }
  }

  lines.push(' !', ' address-family ipv4')
  if (plan.ipv4.redistributeConnected) lines.push('  redistribute connected')
  for (const neighbor of plan.ipv4.neighbors) {
    lines.push(`  neighbor ${neighbor.address} activate`)
    if (neighbor.sendCommunity) lines.push(`  neighbor ${neighbor.address} send-community`)
    if (neighbor.routeMapIn !== undefined) {
      lines.push(`  neighbor ${neighbor.address} route-map ${neighbor.routeMapIn} in`)
    }
    if (neighbor.routeMapOut !== undefined) {
      lines.push(`  neighbor ${neighbor.address} route-map ${neighbor.routeMapOut} out`)
    }
  }
  lines.push(' exit-address-family')

  if (plan.vpnv4.length > 0) {
    lines.push(' !', ' address-family vpnv4')
    for (const address of plan.vpnv4) {
      lines.push(`  neighbor ${address} activate`, `  neighbor ${address} send-community both`)
    }
    lines.push(' exit-address-family')
  }

  for (const vrf of plan.vrfs) {
    lines.push(' !', ` address-family ipv4 vrf ${vrf.vrf}`, '  redistribute connected')
    for (const neighbor of vrf.neighbors) {
      lines.push(
        `  neighbor ${neighbor.address} remote-as ${neighbor.remoteAs}`,
        `  neighbor ${neighbor.address} activate`
      )
    }
    lines.push(' exit-address-family')
  }

  lines.push('!')
  return lines
}

function renderRouteMap(plan: RouteMapPlan): string[] {
  const lines = [`route-map ${plan.name} ${plan.action} ${plan.sequence}`]
  for (const list of plan.matchCommunities) lines.push(` match community ${list}`)
  if (plan.localPreference !== undefined) lines.push(` set local-preference ${plan.localPreference}`)
  if (plan.community !== undefined) lines.push(` set community ${plan.community}`)
  lines.push('!')
  return lines
}

function renderPolicy(plan: PolicyPlan): string[] {
  const lines: string[] = []
  for (const list of plan.communityLists) {
    lines.push(`ip community-list standard ${list.name} permit ${list.community}`)
  }
  if (lines.length > 0) lines.push('!')
  for (const routeMap of plan.routeMaps) lines.push(...renderRouteMap(routeMap))
  return lines
}

/**
 * Render a router plan as IOS configuration text.
 *
 * Block order is fixed: hostname, VRF definitions, loopback, physical
 * interfaces, OSPF, BGP, community lists and route-maps, LDP, `end`.
 * The output always ends with a newline.
 */
export function renderRouterConfig(plan: RouterPlan): string {
  const lines = [`hostname ${plan.hostname}`, '!']

  for (const vrf of plan.vrfs) {
    lines.push(
      `ip vrf ${vrf.name}`,
      ` rd ${vrf.rd}`,
      ` route-target export ${vrf.routeTarget}`,
      ` route-target import ${vrf.routeTarget}`,
      '!'
    )
  }

  lines.push(
    `interface ${plan.loopback.name}`,
    ` ip address ${plan.loopback.address} ${HOST_MASK}`,
    '!'
  )
  for (const iface of plan.interfaces) lines.push(...renderInterface(iface))

  if (plan.ospf) lines.push(...renderOspf(plan.ospf))
  lines.push(...renderBgp(plan.bgp))
  lines.push(...renderPolicy(plan.policy))

  if (plan.ldpRouterId !== undefined) {
    lines.push(`mpls ldp router-id ${plan.ldpRouterId} force`, '!')
  }

  lines.push('end')
  return lines.join('\n') + '\n'
}
