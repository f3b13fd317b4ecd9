import { describe, expect, it } from 'vitest'
import { parseIntent } from '@intentcfg/intent'
import { formatIpv4, formatPrefix, prefixesOverlap } from '@intentcfg/netaddr'
import { IntentCfgError } from '@intentcfg/types'
import { endpointAddress, formatRouterId, planAddresses } from '../src/address-plan.js'
import type { AddressPlan } from '../src/address-plan.js'
import { exampleInput, exampleIntent } from './helpers.js'

function endpoint(plan: AddressPlan, hostname: string, neighbor: string): string {
  return formatIpv4(endpointAddress(plan, hostname, neighbor))
}

function subnet(plan: AddressPlan, key: string): string {
  return formatPrefix(plan.links.get(key).subnet)
}

describe('planAddresses', () => {
  it('allocates intra-AS links from the transport pool in declaration order', () => {
    const plan = planAddresses(exampleIntent('mpls-vpn'))

    expect(subnet(plan, 'P1--PE1')).toBe('192.168.1.0/30')
    expect(subnet(plan, 'P1--PE2')).toBe('192.168.1.4/30')
    expect(endpoint(plan, 'P1', 'PE1')).toBe('192.168.1.1')
    expect(endpoint(plan, 'PE1', 'P1')).toBe('192.168.1.2')
    expect(endpoint(plan, 'P1', 'PE2')).toBe('192.168.1.5')
    expect(endpoint(plan, 'PE2', 'P1')).toBe('192.168.1.6')
  })

  it('takes inter-AS links from the boundary prefix of the declaring AS', () => {
    const plan = planAddresses(exampleIntent('mpls-vpn'))

    expect(subnet(plan, 'CE1--PE1')).toBe('172.16.0.0/30')
    expect(endpoint(plan, 'CE1', 'PE1')).toBe('172.16.0.1')
    expect(endpoint(plan, 'PE1', 'CE1')).toBe('172.16.0.2')
    expect(subnet(plan, 'CE2--PE2')).toBe('172.16.0.4/30')
    expect(endpoint(plan, 'CE2', 'PE2')).toBe('172.16.0.5')
    expect(endpoint(plan, 'PE2', 'CE2')).toBe('172.16.0.6')
    expect(plan.links.get('CE1--PE1').interAs).toBe(true)
    expect(plan.links.get('P1--PE1').interAs).toBe(false)
  })

  it('never hands out overlapping link subnets', () => {
    const plan = planAddresses(exampleIntent('mpls-vpn-extended'))
    const keys = ['P1--PE1', 'CE1--PE1', 'P1--PE2', 'P1--P2', 'CE2--PE2']
    const subnets = keys.map((key) => plan.links.get(key).subnet)

    for (const [i, a] of subnets.entries()) {
      expect(a.length).toBe(30)
      for (const b of subnets.slice(i + 1)) expect(prefixesOverlap(a, b)).toBe(false)
    }
    expect(plan.links.failures()).toEqual([])
  })

  it('allocates loopbacks per AS and router ids across the whole intent', () => {
    const plan = planAddresses(exampleIntent('mpls-vpn'))

    expect(formatIpv4(plan.loopbacks.get('PE1'))).toBe('10.1.1.1')
    expect(formatIpv4(plan.loopbacks.get('P1'))).toBe('10.1.1.2')
    expect(formatIpv4(plan.loopbacks.get('PE2'))).toBe('10.1.1.3')
    expect(formatIpv4(plan.loopbacks.get('CE1'))).toBe('10.2.2.1')
    expect(formatIpv4(plan.loopbacks.get('CE2'))).toBe('10.3.3.1')
    expect(['PE1', 'P1', 'PE2', 'CE1', 'CE2'].map((h) => plan.routerIds.get(h))).toEqual([
      1, 2, 3, 4, 5,
    ])
  })

  it('honours explicit loopbacks and interface addresses', () => {
    const plan = planAddresses(exampleIntent('transit'))

    expect(formatIpv4(plan.loopbacks.get('R1'))).toBe('10.0.10.10')
    expect(formatIpv4(plan.loopbacks.get('R2'))).toBe('10.0.10.1')
    expect(subnet(plan, 'R1--R2')).toBe('192.168.10.0/30')
    expect(subnet(plan, 'R1--R4')).toBe('172.30.0.0/30')
    expect(endpoint(plan, 'R1', 'R4')).toBe('172.30.0.1')
    expect(endpoint(plan, 'R4', 'R1')).toBe('172.30.0.2')
    expect(subnet(plan, 'R2--R3')).toBe('172.20.0.0/30')
    expect(endpoint(plan, 'R2', 'R3')).toBe('172.20.0.2')
    expect(endpoint(plan, 'R3', 'R2')).toBe('172.20.0.1')
  })

  it('reserves pinned subnets before allocating the rest', () => {
    const raw = exampleInput('mpls-vpn')
    raw.Les_routeurs[1].links = [
      { hostname: 'PE1' },
      { hostname: 'PE2', ipv4_address: '192.168.1.2/30' },
    ]
    const plan = planAddresses(parseIntent(raw))

    expect(subnet(plan, 'P1--PE2')).toBe('192.168.1.0/30')
    expect(endpoint(plan, 'P1', 'PE2')).toBe('192.168.1.2')
    expect(endpoint(plan, 'PE2', 'P1')).toBe('192.168.1.1')
    expect(subnet(plan, 'P1--PE1')).toBe('192.168.1.4/30')
    expect(endpoint(plan, 'P1', 'PE1')).toBe('192.168.1.5')
  })

  it('fails a link whose two ends pin different subnets', () => {
    const raw = exampleInput('transit')
    raw.Les_routeurs[0].links = [
      { hostname: 'R2', ipv4_address: '192.168.10.9/30' },
      { hostname: 'R4' },
    ]
    raw.Les_routeurs[1].links = [
      { hostname: 'R1', ipv4_address: '192.168.10.13/30' },
      { hostname: 'R3', ipv4_address: '172.20.0.2' },
    ]
    const plan = planAddresses(parseIntent(raw))

    expect(() => plan.links.get('R1--R2')).toThrow(
      'Explicit addresses on R1--R2 are in different subnets 192.168.10.8/30 and 192.168.10.12/30'
    )
    expect(endpoint(plan, 'R1', 'R4')).toBe('172.30.0.1')
    expect(plan.links.failures().map((err) => err.code)).toEqual(['AddressConflict'])
  })

  it('records exhaustion on the link that did not fit and keeps the others', () => {
    const raw = exampleInput('mpls-vpn')
    raw.Les_AS[0].ipv4_prefix = '192.168.1.0/30'
    const plan = planAddresses(parseIntent(raw))

    expect(subnet(plan, 'P1--PE1')).toBe('192.168.1.0/30')
    expect(() => plan.links.get('P1--PE2')).toThrow(IntentCfgError)
    const [failure] = plan.links.failures()
    expect(failure.code).toBe('AddressSpaceExhausted')
    expect(failure.context).toEqual({
      as: 100,
      link: 'P1--PE2',
      pool: '192.168.1.0/30',
    })
  })
})

describe('formatRouterId', () => {
  it('repeats the id in every octet', () => {
    expect(formatRouterId(3)).toBe('3.3.3.3')
    expect(formatRouterId(255)).toBe('255.255.255.255')
  })
})
