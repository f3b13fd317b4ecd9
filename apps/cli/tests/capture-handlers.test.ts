import { readFile } from 'node:fs/promises'
import { join } from 'node:path'
import { describe, expect, it } from 'vitest'
import { captureHandler } from '../src/handlers/capture-handlers.js'
import { FakeTransport, withTempDir } from './helpers.js'

const RUNNING = `hostname R1
!
interface Loopback0
 ip address 10.1.1.1 255.255.255.255
!
end
`

describe('captureHandler', () => {
  it('saves the running configuration under the device name', async () => {
    await withTempDir(async (dir) => {
      const outputDir = join(dir, 'configs')
      const result = await captureHandler(
        { device: 'R1', outputDir },
        new FakeTransport({ R1: RUNNING })
      )

      const path = join(outputDir, 'R1_running-config.cfg')
      expect(result).toEqual({ success: true, data: { device: 'R1', path, sections: 2 } })
      expect(await readFile(path, 'utf-8')).toBe(RUNNING)
    })
  })

  it('refuses to store a configuration that does not parse', async () => {
    await withTempDir(async (dir) => {
      const result = await captureHandler(
        { device: 'R1', outputDir: dir },
        new FakeTransport({ R1: ' ip address 10.1.1.1 255.255.255.255\n' })
      )

      expect(result).toEqual({
        success: false,
        error:
          'MalformedConfig: R1 line 1: "ip address 10.1.1.1 255.255.255.255" is indented but no block is open',
      })
    })
  })
})
