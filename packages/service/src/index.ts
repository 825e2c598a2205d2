export { LifecycleManager } from './lifecycle-manager.js'
export { ConstructionError, ShutdownTimeoutError, TransportError } from './errors.js'
export type {
  HostingOptions,
  LifecycleManagerOptions,
  LifecycleState,
  ServiceHandle,
  ServiceInfo,
  ShutdownReport,
  WireFn,
  WiringScope,
} from './types.js'
