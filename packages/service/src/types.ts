import type { Server } from 'node:http'
import type { HostingMode } from '@tierline/config'
import type { ServiceTelemetry } from '@tierline/telemetry'
import type { Hono } from 'hono'

/**
 * Lifecycle state of a hosted service.
 *
 * Transitions only move forward. `wiring` either reaches `serving` or fails
 * straight to `stopped`; `serving` leaves only through `shutting_down`.
 */
export type LifecycleState = 'uninitialized' | 'wiring' | 'serving' | 'shutting_down' | 'stopped'

/** Static metadata about a service. */
export interface ServiceInfo {
  readonly name: string
  readonly version: string
}

/**
 * Handed to the wiring function. Every component registered through `own()`
 * is released by the lifecycle manager in reverse registration order, on
 * shutdown or when wiring fails part way.
 */
export interface WiringScope {
  own<T>(name: string, resource: T, release: (resource: T) => Promise<void> | void): T
}

/**
 * Builds the dependency graph and returns the application that serves it.
 * Runs exactly once per lifecycle, during `wiring`.
 */
export type WireFn = (scope: WiringScope) => Promise<Hono> | Hono

/** Listener settings, usually taken from the service configuration. */
export interface HostingOptions {
  readonly mode: HostingMode
  readonly hostname: string
  readonly port: number
  readonly drainTimeoutMs: number
}

export interface LifecycleManagerOptions {
  readonly info: ServiceInfo
  readonly hosting: HostingOptions
  readonly wire: WireFn
  readonly telemetry: ServiceTelemetry
  /**
   * Embedded mode only: a server the caller owns. The manager attaches its
   * request listener and detaches it on shutdown, but never binds or closes it.
   */
  readonly server?: Server
  /** Abstract stop trigger. Aborting it has the same effect as `stop()`. */
  readonly signal?: AbortSignal
}

/** Outcome of a completed shutdown. */
export interface ShutdownReport {
  /** Requests in flight at shutdown that completed before the drain deadline. */
  readonly drained: number
  /** Requests still running at the deadline; their connections were destroyed. */
  readonly abandoned: number
  /** Released resources in release order, starting with `listener`. */
  readonly released: readonly string[]
}

/**
 * What callers hold after a successful start. Nothing else about the wired
 * components is reachable through it.
 */
export interface ServiceHandle {
  readonly info: ServiceInfo
  readonly mode: HostingMode
  readonly state: LifecycleState
  /** Port the listener is bound to, when it is bound. */
  readonly port: number | undefined
  /** Base URL for a bound listener, e.g. `http://127.0.0.1:3000`. */
  readonly url: string | undefined
  /** Requests currently being handled. */
  readonly inFlight: number
  /** Resolves once the service has stopped. This is the blocking half of standalone hosting. */
  run(): Promise<ShutdownReport>
  /** Stop accepting, drain, release. Idempotent. */
  stop(): Promise<ShutdownReport>
}
