import { connect } from 'node:net'
import type { Socket } from 'node:net'
import { getLogger } from '@intentcfg/telemetry'
import type { Inventory } from './inventory.js'
import { resolveDevice } from './inventory.js'
import { IOS_FRAMING } from './types.js'
import type { DeviceTransport } from './types.js'

const IAC = 0xff
const SB = 0xfa
const SE = 0xf0

export interface ConsoleTransportOptions {
  /** Upper bound for one console exchange. */
  timeoutMs?: number
}

/** Drop telnet option negotiation from raw console bytes. */
export function stripTelnetNegotiation(data: Buffer): string {
  const bytes: number[] = []
  let i = 0
  while (i < data.length) {
    const byte = data[i]
    if (byte !== IAC) {
      bytes.push(byte)
      i += 1
      continue
    }
    const command = data[i + 1]
    if (command === IAC) {
      bytes.push(IAC)
      i += 2
    } else if (command === SB) {
      const end = data.indexOf(SE, i + 2)
      i = end === -1 ? data.length : end + 1
    } else if (command !== undefined && command >= 0xfb) {
      i += 3
    } else {
      i += 2
    }
  }
  return Buffer.from(bytes).toString('utf-8')
}

const PREAMBLE = /^(Building configuration|Current configuration)/

/**
 * Cut the configuration out of a console transcript: everything after the
 * `show running-config` echo up to and including `end`, without the
 * preamble IOS prints first or any leading blank line.
 */
export function extractRunningConfig(transcript: string): string {
  const lines = transcript.replace(/\r/g, '').split('\n')
  const echo = lines.findIndex((line) => line.trimEnd().endsWith('show running-config'))
  const body = lines.slice(echo + 1)
  const end = body.findIndex((line) => line.trimEnd() === 'end')
  const config = (end === -1 ? body : body.slice(0, end + 1)).filter(
    (line) => !PREAMBLE.test(line)
  )
  return config.join('\n').replace(/^\n+/, '') + '\n'
}

function hasConfigEnd(text: string): boolean {
  const echo = text.indexOf('show running-config')
  return echo !== -1 && /\r?\nend\r?\n/.test(text.slice(echo))
}

/**
 * Plain TCP console access, one connection per exchange, to the console
 * ports an emulator exposes for its routers.
 */
export class ConsoleTransport implements DeviceTransport {
  readonly framing = IOS_FRAMING
  private readonly logger = getLogger(['intentcfg', 'cli', 'transport'])
  private readonly timeoutMs: number

  constructor(
    private readonly inventory: Inventory,
    options: ConsoleTransportOptions = {}
  ) {
    this.timeoutMs = options.timeoutMs ?? 15_000
  }

  async fetchRunningConfig(device: string): Promise<string> {
    const transcript = await this.exchange(
      device,
      ['', 'terminal length 0', 'show running-config'],
      hasConfigEnd
    )
    return extractRunningConfig(transcript)
  }

  async sendCommands(device: string, commands: readonly string[]): Promise<void> {
    await this.exchange(device, commands)
    this.logger.info`Sent ${commands.length} commands to ${device}`
  }

  private open(device: string): Promise<Socket> {
    const { host, port } = resolveDevice(this.inventory, device)
    return new Promise((resolve, reject) => {
      const socket = connect({ host, port })
      socket.once('connect', () => {
        socket.off('error', reject)
        resolve(socket)
      })
      socket.once('error', reject)
    })
  }

  /**
   * Write `commands` and collect the console output. Without `done` the
   * exchange ends once everything is flushed; with it, once `done` accepts
   * the output so far.
   */
  private async exchange(
    device: string,
    commands: readonly string[],
    done?: (output: string) => boolean
  ): Promise<string> {
    const socket = await this.open(device)
    this.logger.debug`Connected to ${device} console`

    return new Promise((resolve, reject) => {
      // Negotiation sequences and multi-byte characters can span chunks.
      let raw = Buffer.alloc(0)
      const timer = setTimeout(() => {
        socket.destroy()
        reject(new Error(`Timed out after ${this.timeoutMs}ms talking to ${device}`))
      }, this.timeoutMs)

      const finish = (): void => {
        clearTimeout(timer)
        socket.destroy()
        resolve(stripTelnetNegotiation(raw))
      }

      socket.on('data', (chunk: Buffer) => {
        raw = Buffer.concat([raw, chunk])
        if (done?.(stripTelnetNegotiation(raw))) finish()
      })
      socket.on('error', (err) => {
        clearTimeout(timer)
        socket.destroy()
        reject(err)
      })

      socket.write(commands.map((command) => `${command}\r\n`).join(''))
      if (!done) socket.end(finish)
    })
  }
}
