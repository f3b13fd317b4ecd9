import { mkdtemp, rm } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { fileURLToPath } from 'node:url'
import { IOS_FRAMING } from '../src/transport/types.js'
import type { DeviceTransport } from '../src/transport/types.js'

export function examplePath(name: string): string {
  return fileURLToPath(new URL(`../../../examples/intents/${name}.json`, import.meta.url))
}

export async function withTempDir<T>(run: (dir: string) => Promise<T>): Promise<T> {
  const dir = await mkdtemp(join(tmpdir(), 'intentcfg-'))
  try {
    return await run(dir)
  } finally {
    await rm(dir, { recursive: true, force: true })
  }
}

/** In-memory devices keyed by name. */
export class FakeTransport implements DeviceTransport {
  readonly framing = IOS_FRAMING
  readonly sent = new Map<string, readonly string[]>()

  constructor(private readonly configs: Record<string, string> = {}) {}

  async fetchRunningConfig(device: string): Promise<string> {
    const config = this.configs[device]
    if (config === undefined) throw new Error(`Device ${device} is not in the inventory`)
    return config
  }

  async sendCommands(device: string, commands: readonly string[]): Promise<void> {
    this.sent.set(device, commands)
  }
}
