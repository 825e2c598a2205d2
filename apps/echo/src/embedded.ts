/**
 * Embedded entry of the echo service.
 *
 * `start()` wires the service inside the caller's process and returns as soon
 * as it serves. It either attaches to a server the caller owns or binds its
 * own (port `0` picks any free port). The capability interfaces are exported
 * so tests can hand in their own data access.
 */

import { ConfigurationError } from '@tierline/config'
import type { EchoConfig } from '@tierline/config'
import type { ServiceHandle } from '@tierline/service'
import { launchEcho } from './internal/wiring.js'
import type { EchoDependencies } from './internal/wiring.js'

export type EmbeddedDependencies = EchoDependencies

/**
 * @throws ConfigurationError for a config that is not `embedded`
 * @throws ConstructionError when wiring or binding fails
 */
export async function start(
  config: EchoConfig,
  deps: EmbeddedDependencies = {}
): Promise<ServiceHandle> {
  if (config.mode !== 'embedded') {
    throw new ConfigurationError([
      { path: 'mode', message: `start() hosts embedded only, got "${config.mode}"` },
    ])
  }
  return launchEcho(config, deps)
}

export type { EchoRecord, EchoStore, Mutation } from './internal/store/types.js'
export type {
  DomainError,
  DomainErrorKind,
  EchoInput,
  EchoLogic,
  EchoOutput,
} from './internal/logic/types.js'
export { parseEchoConfig } from '@tierline/config'
export type { EchoConfig } from '@tierline/config'
export type { ServiceHandle, ShutdownReport } from '@tierline/service'
