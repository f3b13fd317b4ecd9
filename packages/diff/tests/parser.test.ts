import { describe, expect, it } from 'vitest'
import { IntentCfgError } from '@intentcfg/types'
import { formatConfig, parseConfig } from '../src/parser.js'

const RUNNING = `hostname R1
!
interface GigabitEthernet1/0
 ip address 10.0.0.1 255.255.255.252
 no shutdown
!
router bgp 100
 neighbor 10.0.0.2 remote-as 100
 !
 address-family ipv4
  neighbor 10.0.0.2 activate
 exit-address-family
!
end
`

describe('parseConfig', () => {
  it('builds top-level sections with nested blocks', () => {
    expect(parseConfig(RUNNING).sections).toEqual([
      { kind: 'section', header: 'hostname R1', children: [] },
      {
        kind: 'section',
        header: 'interface GigabitEthernet1/0',
        children: [
          { kind: 'line', text: 'ip address 10.0.0.1 255.255.255.252' },
          { kind: 'line', text: 'no shutdown' },
        ],
      },
      {
        kind: 'section',
        header: 'router bgp 100',
        children: [
          { kind: 'line', text: 'neighbor 10.0.0.2 remote-as 100' },
          {
            kind: 'section',
            header: 'address-family ipv4',
            children: [{ kind: 'line', text: 'neighbor 10.0.0.2 activate' }],
            terminator: 'exit-address-family',
          },
        ],
      },
    ])
  })

  it('ignores blank lines and carriage returns', () => {
    const tree = parseConfig('interface A\r\n\r\n description uplink\r\n\n')
    expect(tree.sections).toEqual([
      {
        kind: 'section',
        header: 'interface A',
        children: [{ kind: 'line', text: 'description uplink' }],
      },
    ])
  })

  it('lets an indented ! close the blocks at its depth', () => {
    const tree = parseConfig('interface A\n description x\n !\n  speed 100\n')
    expect(tree.sections[0].children).toEqual([
      { kind: 'line', text: 'description x' },
      { kind: 'line', text: 'speed 100' },
    ])

    const nested = parseConfig('interface A\n description x\n  speed 100\n')
    expect(nested.sections[0].children).toEqual([
      {
        kind: 'section',
        header: 'description x',
        children: [{ kind: 'line', text: 'speed 100' }],
      },
    ])
  })

  it('keeps an empty block closed by its terminator', () => {
    const tree = parseConfig('router bgp 1\n !\n address-family ipv4\n exit-address-family\n!\n')
    expect(tree.sections[0].children).toEqual([
      {
        kind: 'section',
        header: 'address-family ipv4',
        children: [],
        terminator: 'exit-address-family',
      },
    ])
  })

  it('keeps an exit with no block before it as a line', () => {
    const tree = parseConfig('interface A\n exit\n')
    expect(tree.sections[0].children).toEqual([{ kind: 'line', text: 'exit' }])
  })

  it('rejects an indented line with no open block', () => {
    try {
      parseConfig('router ospf 1\n network 10.0.0.0 0.0.0.3 area 0\n!\n orphan\n', 'R1.cfg')
      expect.unreachable()
    } catch (err) {
      expect(err).toBeInstanceOf(IntentCfgError)
      if (err instanceof IntentCfgError) {
        expect(err.code).toBe('MalformedConfig')
        expect(err.message).toBe('R1.cfg line 4: "orphan" is indented but no block is open')
        expect(err.context).toEqual({ source: 'R1.cfg', line: 4, text: 'orphan' })
      }
    }
  })

  it('accepts empty input', () => {
    expect(parseConfig('').sections).toEqual([])
    expect(parseConfig('!\nend\n').sections).toEqual([])
  })
})

describe('formatConfig', () => {
  it('writes one space per level and closes top-level sections', () => {
    expect(formatConfig(parseConfig(RUNNING))).toBe(
      [
        'hostname R1',
        '!',
        'interface GigabitEthernet1/0',
        ' ip address 10.0.0.1 255.255.255.252',
        ' no shutdown',
        '!',
        'router bgp 100',
        ' neighbor 10.0.0.2 remote-as 100',
        ' address-family ipv4',
        '  neighbor 10.0.0.2 activate',
        ' exit-address-family',
        '!',
        '',
      ].join('\n')
    )
  })

  it('parses back to the same tree', () => {
    const tree = parseConfig(RUNNING)
    expect(parseConfig(formatConfig(tree))).toEqual(tree)
  })
})
