import { describe, expect, it } from 'vitest'
import { renderRouterConfig } from '../src/renderer.js'
import type { RouterPlan } from '../src/router-plan.js'

function basePlan(): RouterPlan {
  return {
    hostname: 'R9',
    vrfs: [],
    loopback: { name: 'Loopback0', address: '10.9.9.1' },
    interfaces: [
      {
        name: 'GigabitEthernet1/0',
        neighbor: 'R8',
        address: { address: '192.168.9.1', mask: '255.255.255.252' },
        ospfCost: 5,
        mpls: false,
        shutdown: false,
      },
      { name: 'GigabitEthernet2/0', mpls: false, shutdown: true },
    ],
    bgp: {
      asNumber: 9,
      routerId: '1.1.1.1',
      neighbors: [{ address: '10.9.9.2', remoteAs: 9, updateSource: 'Loopback0' }],
      ipv4: {
        redistributeConnected: false,
        neighbors: [{ address: '10.9.9.2', sendCommunity: false }],
      },
      vpnv4: [],
      vrfs: [],
    },
    policy: { communityLists: [], routeMaps: [] },
  }
}

describe('renderRouterConfig', () => {
  it('renders a router without IGP, VRFs, policy or LDP', () => {
    expect(renderRouterConfig(basePlan())).toBe(
      [
        'hostname R9',
        '!',
        'interface Loopback0',
        ' ip address 10.9.9.1 255.255.255.255',
        '!',
        'interface GigabitEthernet1/0',
        ' ip address 192.168.9.1 255.255.255.252',
        ' ip ospf cost 5',
        ' no shutdown',
        '!',
        'interface GigabitEthernet2/0',
        ' no ip address',
        ' shutdown',
        '!',
        'router bgp 9',
        ' bgp router-id 1.1.1.1',
        ' bgp log-neighbor-changes',
        ' neighbor 10.9.9.2 remote-as 9',
        ' neighbor 10.9.9.2 update-source Loopback0',
        ' !',
        ' address-family ipv4',
        '  neighbor 10.9.9.2 activate',
        ' exit-address-family',
        '!',
        'end',
        '',
      ].join('\n')
    )
  })

  it('renders OSPF, policy and LDP blocks in order', () => {
    const plan: RouterPlan = {
      ...basePlan(),
      ospf: {
        processId: 10,
        routerId: '1.1.1.1',
        passiveInterfaces: ['GigabitEthernet1/0'],
        networks: [{ address: '10.9.9.1', wildcard: '0.0.0.0' }],
      },
      policy: {
        communityLists: [{ name: 'AS8', community: '8:1000' }],
        routeMaps: [
          {
            name: 'Peer-AS8',
            action: 'permit',
            sequence: 10,
            matchCommunities: [],
            localPreference: 200,
            community: '8:1000',
          },
          { name: 'General-OUT', action: 'deny', sequence: 10, matchCommunities: ['AS8'] },
        ],
      },
      ldpRouterId: 'Loopback0',
    }
    const lines = renderRouterConfig(plan).split('\n')
    const ospfAt = lines.indexOf('router ospf 10')
    const bgpAt = lines.indexOf('router bgp 9')

    expect(lines.slice(ospfAt, bgpAt)).toEqual([
      'router ospf 10',
      ' router-id 1.1.1.1',
      ' passive-interface GigabitEthernet1/0',
      ' network 10.9.9.1 0.0.0.0 area 0',
      '!',
    ])
    expect(lines.slice(lines.indexOf('ip community-list standard AS8 permit 8:1000'))).toEqual([
      'ip community-list standard AS8 permit 8:1000',
      '!',
      'route-map Peer-AS8 permit 10',
      ' set local-preference 200',
      ' set community 8:1000',
      '!',
      'route-map General-OUT deny 10',
      ' match community AS8',
      '!',
      'mpls ldp router-id Loopback0 force',
      '!',
      'end',
      '',
    ])
  })

  it('renders VRF definitions and the VPN address families', () => {
    const base = basePlan()
    const plan: RouterPlan = {
      ...base,
      vrfs: [{ name: 'VPN1', rd: '9:1', routeTarget: '9:1' }],
      bgp: {
        ...base.bgp,
        vpnv4: ['10.9.9.2'],
        vrfs: [{ vrf: 'VPN1', neighbors: [{ address: '172.16.9.1', remoteAs: 90 }] }],
      },
    }
    const text = renderRouterConfig(plan)

    expect(text.startsWith('hostname R9\n!\nip vrf VPN1\n rd 9:1\n')).toBe(true)
    expect(text).toContain(
      [
        ' exit-address-family',
        ' !',
        ' address-family vpnv4',
        '  neighbor 10.9.9.2 activate',
        '  neighbor 10.9.9.2 send-community both',
        ' exit-address-family',
        ' !',
        ' address-family ipv4 vrf VPN1',
        '  redistribute connected',
        '  neighbor 172.16.9.1 remote-as 90',
        '  neighbor 172.16.9.1 activate',
        ' exit-address-family',
        '!',
        'end',
      ].join('\n')
    )
  })
})
