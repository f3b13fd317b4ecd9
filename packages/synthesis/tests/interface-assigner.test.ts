import { describe, expect, it } from 'vitest'
import type { Link, Router } from '@intentcfg/intent'
import { IntentCfgError } from '@intentcfg/types'
import { assignInterfaces } from '../src/interface-assigner.js'

const POOL = ['Gi1/0', 'Gi2/0', 'Gi3/0']
const LOOPBACK = 'Loopback0'

function router(links: Link[]): Router {
  return { hostname: 'R1', asNumber: 1, links, position: { x: 0, y: 0 } }
}

describe('assignInterfaces', () => {
  it('assigns pool interfaces in link order', () => {
    const assignment = assignInterfaces(
      router([{ neighbor: 'A' }, { neighbor: 'B' }]),
      POOL,
      LOOPBACK
    )

    expect([...assignment.byNeighbor]).toEqual([
      ['A', 'Gi1/0'],
      ['B', 'Gi2/0'],
    ])
    expect(assignment.ordered).toEqual(POOL)
    expect([...assignment.unused]).toEqual(['Gi3/0'])
  })

  it('reserves explicit interfaces before filling the rest', () => {
    const assignment = assignInterfaces(
      router([{ neighbor: 'A' }, { neighbor: 'B', interface: 'Gi1/0' }]),
      POOL,
      LOOPBACK
    )

    expect(assignment.byNeighbor.get('A')).toBe('Gi2/0')
    expect(assignment.byNeighbor.get('B')).toBe('Gi1/0')
    expect([...assignment.unused]).toEqual(['Gi3/0'])
  })

  it('appends explicit interfaces outside the pool', () => {
    const assignment = assignInterfaces(
      router([{ neighbor: 'A', interface: 'FastEthernet0/0' }]),
      POOL,
      LOOPBACK
    )

    expect(assignment.byNeighbor.get('A')).toBe('FastEthernet0/0')
    expect(assignment.ordered).toEqual([...POOL, 'FastEthernet0/0'])
    expect(assignment.unused.size).toBe(3)
  })

  it('does not share state between routers', () => {
    const template = [...POOL]
    assignInterfaces(router([{ neighbor: 'A' }, { neighbor: 'B' }]), template, LOOPBACK)
    const second = assignInterfaces(router([{ neighbor: 'C' }]), template, LOOPBACK)

    expect(template).toEqual(POOL)
    expect(second.byNeighbor.get('C')).toBe('Gi1/0')
  })

  it('fails with InterfaceConflict when two links name the same interface', () => {
    const links = [
      { neighbor: 'A', interface: 'Gi2/0' },
      { neighbor: 'B', interface: 'Gi2/0' },
    ]
    expect(() => assignInterfaces(router(links), POOL, LOOPBACK)).toThrow(
      new IntentCfgError(
        'InterfaceConflict',
        'Interface Gi2/0 is assigned to more than one link on R1'
      )
    )
  })

  it('fails with InterfaceConflict when a link names the loopback', () => {
    const links = [{ neighbor: 'A' }, { neighbor: 'B', interface: 'Loopback0' }]
    try {
      assignInterfaces(router(links), POOL, LOOPBACK)
      expect.unreachable()
    } catch (err) {
      expect(err).toBeInstanceOf(IntentCfgError)
      if (err instanceof IntentCfgError) {
        expect(err.code).toBe('InterfaceConflict')
        expect(err.message).toBe('Interface Loopback0 on R1 is reserved for the loopback')
        expect(err.context).toEqual({ router: 'R1', interface: 'Loopback0', neighbor: 'B' })
      }
    }
  })

  it('fails with InterfaceExhausted when links outnumber the pool', () => {
    const links = ['A', 'B', 'C', 'D'].map((neighbor) => ({ neighbor }))
    try {
      assignInterfaces(router(links), POOL, LOOPBACK)
      expect.unreachable()
    } catch (err) {
      expect(err).toBeInstanceOf(IntentCfgError)
      if (err instanceof IntentCfgError) {
        expect(err.code).toBe('InterfaceExhausted')
        expect(err.message).toBe('No interface left on R1: 4 links for a pool of 3')
        expect(err.context).toEqual({ router: 'R1', links: 4, pool: 3 })
      }
    }
  })

  it('counts links on interfaces outside the pool against its size', () => {
    const links = [
      { neighbor: 'A', interface: 'FastEthernet0/0' },
      { neighbor: 'B', interface: 'FastEthernet0/1' },
      { neighbor: 'C' },
      { neighbor: 'D' },
    ]
    expect(() => assignInterfaces(router(links), POOL, LOOPBACK)).toThrow(
      new IntentCfgError('InterfaceExhausted', 'No interface left on R1: 4 links for a pool of 3')
    )
  })
})
