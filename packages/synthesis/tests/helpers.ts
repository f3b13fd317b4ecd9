import { readFileSync } from 'node:fs'
import { parseIntent } from '@intentcfg/intent'
import type { Intent, IntentInput } from '@intentcfg/intent'
import { parseIpv4, parseIpv4Prefix } from '@intentcfg/netaddr'
import type { Ipv4Prefix } from '@intentcfg/netaddr'

export function exampleInput(name: string): IntentInput {
  const url = new URL(`../../../examples/intents/${name}.json`, import.meta.url)
  const raw: IntentInput = JSON.parse(readFileSync(url, 'utf-8'))
  return raw
}

export function exampleIntent(name: string): Intent {
  return parseIntent(exampleInput(name), name)
}

export function prefix(text: string): Ipv4Prefix {
  const parsed = parseIpv4Prefix(text)
  if (!parsed) throw new Error(`bad prefix in test: ${text}`)
  return parsed
}

export function ip(text: string): number {
  const parsed = parseIpv4(text)
  if (parsed === undefined) throw new Error(`bad address in test: ${text}`)
  return parsed
}
