import type { CommandFraming } from '@intentcfg/diff'

/** Reaches a device's console to read its configuration or push commands. */
export interface DeviceTransport {
  /** Session commands wrapped around every pushed change set. */
  readonly framing: CommandFraming
  fetchRunningConfig(device: string): Promise<string>
  sendCommands(device: string, commands: readonly string[]): Promise<void>
}

/** Enter privileged configuration mode, then leave it and save. */
export const IOS_FRAMING: CommandFraming = {
  enter: ['enable', 'configure terminal'],
  commit: ['end', 'write memory'],
}
