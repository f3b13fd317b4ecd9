import { readFile } from 'node:fs/promises'
import { z } from 'zod'

export const DeviceEndpointSchema = z.object({
  host: z.string().min(1).default('127.0.0.1'),
  port: z.number().int().min(1).max(65535),
})
export type DeviceEndpoint = z.infer<typeof DeviceEndpointSchema>

/** Console endpoints per device name, as exported from the emulator project. */
export const InventorySchema = z.object({
  devices: z.record(z.string().min(1), DeviceEndpointSchema),
})
export type Inventory = z.infer<typeof InventorySchema>

export async function loadInventory(filePath: string): Promise<Inventory> {
  const text = await readFile(filePath, 'utf-8')
  let raw: unknown
  try {
    raw = JSON.parse(text)
  } catch {
    throw new Error(`Inventory file is not valid JSON: ${filePath}`)
  }
  const result = InventorySchema.safeParse(raw)
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    throw new Error(`Invalid inventory ${filePath}: ${issues.join('; ')}`)
  }
  return result.data
}

export function resolveDevice(inventory: Inventory, device: string): DeviceEndpoint {
  const endpoint = inventory.devices[device]
  if (!endpoint) throw new Error(`Device ${device} is not in the inventory`)
  return endpoint
}
