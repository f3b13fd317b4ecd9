export { synthesizeNetwork } from './synthesize.js'
export type { SynthesisReport, RouterFailure } from './synthesize.js'
export {
  LINK_PREFIX_LENGTH,
  createLedger,
  allocateLinkSubnet,
  allocateInterfaceAddress,
} from './address-allocator.js'
export type { AllocationLedger, EndpointRole } from './address-allocator.js'
export { planAddresses, endpointAddress, formatRouterId, MAX_ROUTER_ID } from './address-plan.js'
export type { AddressPlan, LinkAllocation } from './address-plan.js'
export { assignInterfaces } from './interface-assigner.js'
export type { InterfaceAssignment } from './interface-assigner.js'
export { deriveRouterPlan, isProviderEdge } from './adjacency.js'
export type { SynthesisContext } from './adjacency.js'
export { renderRouterConfig } from './renderer.js'
export type * from './router-plan.js'
export { FactTable } from './fact-table.js'
