/**
 * Generic success/error result.
 *
 * Handlers at the edges of the system (CLI, transport) report failures as
 * values rather than throwing, so callers can decide how to present them.
 *
 * @example
 * ```typescript
 * function readDevice(name: string): Result<Device> {
 *   const device = inventory.get(name)
 *   if (device) return ok(device)
 *   return fail(`Unknown device: ${name}`)
 * }
 * ```
 */
export type Result<T, E = string> = { success: true; data: T } | { success: false; error: E }

export function ok<T>(data: T): { success: true; data: T } {
  return { success: true, data }
}

export function fail<E = string>(error: E): { success: false; error: E } {
  return { success: false, error }
}
