/**
 * Standalone entry of the echo service.
 *
 * `serve()` binds the configured `hostname:port` and blocks until the service
 * has stopped. To run inside another process, use `@tierline/echo/embedded`.
 *
 * @example
 * ```ts
 * const controller = new AbortController()
 * process.once('SIGTERM', () => controller.abort())
 * const report = await serve(loadEchoConfig(), { signal: controller.signal })
 * ```
 */

import { ConfigurationError } from '@tierline/config'
import type { EchoConfig } from '@tierline/config'
import type { ShutdownReport } from '@tierline/service'
import type { ServiceTelemetry } from '@tierline/telemetry'
import { launchEcho } from './internal/wiring.js'

export interface ServeOptions {
  /** Stop trigger. The service drains and stops once it aborts. */
  signal?: AbortSignal
  telemetry?: ServiceTelemetry
}

/**
 * Start the echo service in standalone mode and wait for it to stop.
 *
 * @throws ConfigurationError for a config that is not `standalone`
 * @throws ConstructionError when wiring or binding fails
 */
export async function serve(config: EchoConfig, options: ServeOptions = {}): Promise<ShutdownReport> {
  if (config.mode !== 'standalone') {
    throw new ConfigurationError([
      { path: 'mode', message: `serve() hosts standalone only, got "${config.mode}"` },
    ])
  }
  const handle = await launchEcho(config, options)
  return handle.run()
}

export { ConfigurationError, loadEchoConfig, parseEchoConfig } from '@tierline/config'
export type { ConfigLoadOptions, EchoConfig, EchoConfigInput, HostingMode, StoreKind } from '@tierline/config'
export { ConstructionError } from '@tierline/service'
export type { LifecycleState, ServiceHandle, ShutdownReport } from '@tierline/service'
