import {
  blockSize,
  broadcastOf,
  containsAddress,
  containsPrefix,
  formatIpv4,
  formatPrefix,
  prefixesOverlap,
} from '@intentcfg/netaddr'
import type { Ipv4Prefix } from '@intentcfg/netaddr'
import { IntentCfgError } from '@intentcfg/types'
import type { ErrorContext } from '@intentcfg/types'

/** Point-to-point links always take a /30. */
export const LINK_PREFIX_LENGTH = 30

export interface AllocationLedger {
  readonly pool: Ipv4Prefix

  /**
   * Reserve a fixed block (a pinned link subnet or an explicit loopback).
   * Throws AddressConflict when it leaves the pool or overlaps a reservation.
   */
  reserve(block: Ipv4Prefix, context?: ErrorContext): Ipv4Prefix

  /**
   * Take the lowest free aligned block of the given length.
   * Throws AddressSpaceExhausted when none fits before the pool broadcast.
   */
  allocate(length: number, context?: ErrorContext): Ipv4Prefix

  /** Reservations in the order they were made. */
  getAllocations(): readonly Ipv4Prefix[]
}

/**
 * Lowest aligned block of `length` inside `pool` that overlaps nothing in
 * `taken`. Host routes drawn from a pool wider than /31 skip the pool's
 * network and broadcast addresses.
 */
function findFreeBlock(
  pool: Ipv4Prefix,
  length: number,
  taken: readonly Ipv4Prefix[]
): Ipv4Prefix | undefined {
  const size = blockSize(length)
  const last = broadcastOf(pool)
  const hostRoute = length === 32 && pool.length < 31
  for (let network = pool.network; network + size - 1 <= last; network += size) {
    if (hostRoute && (network === pool.network || network === last)) continue
    const block = { network, length }
    if (!taken.some((other) => prefixesOverlap(other, block))) return block
  }
  return undefined
}

/**
 * Create the allocation ledger of one address pool. Existing reservations
 * are re-applied before anything else is handed out.
 */
export function createLedger(
  pool: Ipv4Prefix,
  existing: readonly Ipv4Prefix[] = []
): AllocationLedger {
  const allocations: Ipv4Prefix[] = []
  const poolText = formatPrefix(pool)

  const ledger: AllocationLedger = {
    pool,

    reserve(block, context = {}) {
      if (!containsPrefix(pool, block)) {
        throw new IntentCfgError(
          'AddressConflict',
          `${formatPrefix(block)} lies outside pool ${poolText}`,
          { ...context, pool: poolText, block: formatPrefix(block) }
        )
      }
      const taken = allocations.find((other) => prefixesOverlap(other, block))
      if (taken) {
        throw new IntentCfgError(
          'AddressConflict',
          `${formatPrefix(block)} overlaps ${formatPrefix(taken)} already allocated from ${poolText}`,
          { ...context, pool: poolText, block: formatPrefix(block) }
        )
      }
      allocations.push(block)
      return block
    },

    allocate(length, context = {}) {
      const block = findFreeBlock(pool, length, allocations)
      if (!block) {
        throw new IntentCfgError(
          'AddressSpaceExhausted',
          `No free /${length} left in pool ${poolText}`,
          { ...context, pool: poolText }
        )
      }
      allocations.push(block)
      return block
    },

    getAllocations() {
      return allocations
    },
  }

  for (const block of existing) ledger.reserve(block)
  return ledger
}

/**
 * Next unused /30 of `poolPrefix`, scanning upward from its base and skipping
 * every block that overlaps `alreadyAllocated`.
 *
 * @throws {IntentCfgError} AddressSpaceExhausted
 */
export function allocateLinkSubnet(
  poolPrefix: Ipv4Prefix,
  alreadyAllocated: readonly Ipv4Prefix[]
): Ipv4Prefix {
  const block = findFreeBlock(poolPrefix, LINK_PREFIX_LENGTH, alreadyAllocated)
  if (!block) {
    throw new IntentCfgError(
      'AddressSpaceExhausted',
      `No free /${LINK_PREFIX_LENGTH} left in pool ${formatPrefix(poolPrefix)}`,
      { pool: formatPrefix(poolPrefix) }
    )
  }
  return block
}

/** `local` is the lexically lower hostname of the link, `remote` the other one. */
export type EndpointRole = 'local' | 'remote'

/**
 * Address of one link endpoint inside `subnet`.
 *
 * Without an override, `local` takes the first usable host and `remote` the
 * second; `exclude` (the peer's address) pushes the endpoint to the other
 * usable host. An override is validated and returned unchanged.
 *
 * @throws {IntentCfgError} AddressConflict when the override is not a usable
 *   host of `subnet` or equals `exclude`
 */
export function allocateInterfaceAddress(
  subnet: Ipv4Prefix,
  role: EndpointRole,
  override?: number,
  exclude?: number,
  context: ErrorContext = {}
): number {
  const first = subnet.network + 1
  const second = subnet.network + 2
  const subnetText = formatPrefix(subnet)

  if (override !== undefined) {
    const usable =
      containsAddress(subnet, override) &&
      override !== subnet.network &&
      override !== broadcastOf(subnet)
    if (!usable) {
      throw new IntentCfgError(
        'AddressConflict',
        `${formatIpv4(override)} is not a usable host address of ${subnetText}`,
        { ...context, subnet: subnetText, address: formatIpv4(override) }
      )
    }
    if (override === exclude) {
      throw new IntentCfgError(
        'AddressConflict',
        `Both ends of the link use ${formatIpv4(override)}`,
        { ...context, subnet: subnetText, address: formatIpv4(override) }
      )
    }
    return override
  }

  const [preferred, fallback] = role === 'local' ? [first, second] : [second, first]
  return preferred === exclude ? fallback : preferred
}
