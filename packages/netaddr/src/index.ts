export {
  parseIpv4,
  formatIpv4,
  parseIpv4Prefix,
  parseInterfaceAddress,
  formatPrefix,
  prefixMask,
  netmask,
  wildcardMask,
  blockSize,
  broadcastOf,
  prefixOf,
  containsAddress,
  containsPrefix,
  prefixesOverlap,
  compareIpv4,
} from './ipv4.js'
export type { Ipv4Prefix, InterfaceAddress } from './ipv4.js'
