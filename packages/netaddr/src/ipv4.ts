/**
 * IPv4 address and prefix arithmetic.
 *
 * Addresses are unsigned 32-bit integers; prefixes are a network address
 * plus a length. Every function here is pure.
 */

export interface Ipv4Prefix {
  readonly network: number
  readonly length: number
}

/** An interface address as written in an intent file, with optional `/len`. */
export interface InterfaceAddress {
  readonly address: number
  readonly length?: number
}

const IPV4_PATTERN = /^(\d{1,3})\.(\d{1,3})\.(\d{1,3})\.(\d{1,3})$/

/** Parse dotted-decimal text into a 32-bit integer, or undefined when malformed. */
export function parseIpv4(text: string): number | undefined {
  const match = IPV4_PATTERN.exec(text.trim())
  if (!match) return undefined
  let value = 0
  for (const octet of match.slice(1)) {
    const n = Number(octet)
    if (n > 255) return undefined
    value = ((value << 8) | n) >>> 0
  }
  return value
}

export function formatIpv4(value: number): string {
  return [(value >>> 24) & 0xff, (value >>> 16) & 0xff, (value >>> 8) & 0xff, value & 0xff].join(
    '.'
  )
}

function parseLength(text: string): number | undefined {
  if (!/^\d{1,2}$/.test(text)) return undefined
  const length = Number(text)
  return length <= 32 ? length : undefined
}

/**
 * Parse `a.b.c.d/len`. Host bits must be zero: `10.0.0.1/24` is not a
 * prefix and returns undefined.
 */
export function parseIpv4Prefix(text: string): Ipv4Prefix | undefined {
  const [addressText, lengthText, ...rest] = text.trim().split('/')
  if (lengthText === undefined || rest.length > 0) return undefined
  const network = parseIpv4(addressText)
  const length = parseLength(lengthText)
  if (network === undefined || length === undefined) return undefined
  if ((network & ~prefixMask(length)) >>> 0 !== 0) return undefined
  return { network, length }
}

/** Parse `a.b.c.d` or `a.b.c.d/len`. */
export function parseInterfaceAddress(text: string): InterfaceAddress | undefined {
  const [addressText, lengthText, ...rest] = text.trim().split('/')
  if (rest.length > 0) return undefined
  const address = parseIpv4(addressText)
  if (address === undefined) return undefined
  if (lengthText === undefined) return { address }
  const length = parseLength(lengthText)
  if (length === undefined) return undefined
  return { address, length }
}

export function formatPrefix(prefix: Ipv4Prefix): string {
  return `${formatIpv4(prefix.network)}/${prefix.length}`
}

export function prefixMask(length: number): number {
  return length === 0 ? 0 : (0xffffffff << (32 - length)) >>> 0
}

/** Dotted netmask, e.g. 255.255.255.252 for /30. */
export function netmask(length: number): string {
  return formatIpv4(prefixMask(length))
}

/** Inverse mask as OSPF network statements take it, e.g. 0.0.0.3 for /30. */
export function wildcardMask(length: number): string {
  return formatIpv4(~prefixMask(length) >>> 0)
}

export function blockSize(length: number): number {
  return 2 ** (32 - length)
}

export function broadcastOf(prefix: Ipv4Prefix): number {
  return prefix.network + blockSize(prefix.length) - 1
}

/** The prefix of the given length that contains `address`. */
export function prefixOf(address: number, length: number): Ipv4Prefix {
  return { network: (address & prefixMask(length)) >>> 0, length }
}

export function containsAddress(prefix: Ipv4Prefix, address: number): boolean {
  return address >= prefix.network && address <= broadcastOf(prefix)
}

export function containsPrefix(outer: Ipv4Prefix, inner: Ipv4Prefix): boolean {
  return inner.length >= outer.length && containsAddress(outer, inner.network)
}

export function prefixesOverlap(a: Ipv4Prefix, b: Ipv4Prefix): boolean {
  return a.network <= broadcastOf(b) && b.network <= broadcastOf(a)
}

/** Numeric ordering of dotted-decimal addresses, for sorting rendered statements. */
export function compareIpv4(a: string, b: string): number {
  const left = parseIpv4(a)
  const right = parseIpv4(b)
  if (left === undefined || right === undefined) return a.localeCompare(b)
  return left - right
}
