import type { Server } from 'node:http'
import type { EchoConfig, StoreKind } from '@tierline/config'
import { LifecycleManager } from '@tierline/service'
import type { ServiceHandle, ServiceInfo, WireFn } from '@tierline/service'
import { TelemetryBuilder } from '@tierline/telemetry'
import type { ServiceTelemetry } from '@tierline/telemetry'
import { DefaultEchoLogic } from './logic/echo-logic.js'
import { createRouter } from './router/router.js'
import { buildRouteTable } from './router/routes.js'
import { InMemoryEchoStore } from './store/memory.js'
import { NoopEchoStore } from './store/noop.js'
import type { EchoStore } from './store/types.js'

export const ECHO_SERVICE: ServiceInfo = Object.freeze({ name: 'echo', version: '0.1.0' })

/** What an embedding caller may hand in instead of the defaults. */
export interface EchoDependencies {
  /** Data access used instead of the one `config.store` selects. Released with the service. */
  readonly store?: EchoStore
  /** Caller-owned server to attach to. Embedded hosting only. */
  readonly server?: Server
  /** Aborting it stops the service. */
  readonly signal?: AbortSignal
  readonly telemetry?: ServiceTelemetry
}

function createStore(kind: StoreKind): EchoStore {
  switch (kind) {
    case 'memory':
      return new InMemoryEchoStore()
    case 'noop':
      return new NoopEchoStore()
  }
}

/**
 * Store, then logic, then route table, then router. The lifecycle manager
 * releases them in the opposite order.
 */
function wireEcho(
  config: EchoConfig,
  deps: EchoDependencies,
  telemetry: ServiceTelemetry
): WireFn {
  const { logger } = telemetry
  return (scope) => {
    const store = scope.own('store', deps.store ?? createStore(config.store), (s) => s.close())
    const logic = scope.own(
      'logic',
      new DefaultEchoLogic(store, { maxMessageLength: config.maxMessageLength, logger }),
      (l) => l.close()
    )
    const routes = scope.own('routes', buildRouteTable(logic), (table) => {
      logger.debug`Route table released (${table.length} routes)`
    })
    return createRouter(routes, { telemetry })
  }
}

async function buildTelemetry(): Promise<ServiceTelemetry> {
  try {
    return await new TelemetryBuilder(ECHO_SERVICE.name)
      .withLogger({ category: ['tierline', ECHO_SERVICE.name] })
      .withMetrics()
      .withTracing()
      .build()
  } catch (err) {
    process.stderr.write(`[${ECHO_SERVICE.name}] telemetry init failed, using noop: ${err}\n`)
    return TelemetryBuilder.noop(ECHO_SERVICE.name)
  }
}

/** Wire the echo service and acquire its listener. */
export async function launchEcho(
  config: EchoConfig,
  deps: EchoDependencies = {}
): Promise<ServiceHandle> {
  const telemetry = deps.telemetry ?? (await buildTelemetry())
  const manager = new LifecycleManager({
    info: ECHO_SERVICE,
    hosting: config,
    wire: wireEcho(config, deps, telemetry),
    telemetry,
    server: deps.server,
    signal: deps.signal,
  })
  return manager.start()
}
