import { describe, expect, it } from 'vitest'
import { resolveLogLevel, resolveSynthesisConfig } from '../src/settings.js'
import { GlobalOptionsSchema } from '../src/types.js'

describe('resolveSynthesisConfig', () => {
  it('falls back to built-in defaults', () => {
    const settings = resolveSynthesisConfig(GlobalOptionsSchema.parse({}), {})

    expect(settings.ospfProcessId).toBe(10)
    expect(settings.loopbackInterface).toBe('Loopback0')
    expect(settings.interfacePool).toHaveLength(6)
  })

  it('prefers program options over the environment', () => {
    const options = GlobalOptionsSchema.parse({ interfacePool: 'Gi1/0, Gi2/0', ospfProcessId: '20' })
    const settings = resolveSynthesisConfig(options, {
      INTENTCFG_OSPF_PROCESS_ID: '30',
      INTENTCFG_LOOPBACK_INTERFACE: 'Loopback9',
    })

    expect(settings).toEqual({
      interfacePool: ['Gi1/0', 'Gi2/0'],
      ospfProcessId: 20,
      loopbackInterface: 'Loopback9',
    })
  })

  it('rejects an out-of-range process id', () => {
    expect(() => GlobalOptionsSchema.parse({ ospfProcessId: '70000' })).toThrow()
  })
})

describe('resolveLogLevel', () => {
  it('uses the option, then LOG_LEVEL, then info', () => {
    expect(resolveLogLevel(GlobalOptionsSchema.parse({ logLevel: 'error' }), { LOG_LEVEL: 'debug' })).toBe('error')
    expect(resolveLogLevel(GlobalOptionsSchema.parse({}), { LOG_LEVEL: 'debug' })).toBe('debug')
    expect(resolveLogLevel(GlobalOptionsSchema.parse({}), {})).toBe('info')
  })
})
