export { configureLogger, resetLogger, createJsonSink, getLogger } from './logger.js'
export type { LoggerConfig } from './logger.js'
export type { Logger } from '@logtape/logtape'
export {
  ROOT_CATEGORY,
  VALID_ENVIRONMENTS,
  VALID_LOG_LEVELS,
  validateEnvironment,
  validateLogLevel,
} from './constants.js'
export type { Environment, LogLevel } from './constants.js'

// Hono middleware is available via the subpath '@tierline/telemetry/middleware/hono'
// so that consumers that only log do not load hono.

export { TelemetryBuilder } from './builder.js'
export type {
  LoggerBuilderOpts,
  MiddlewareOptions,
  ScopeBuilderOpts,
  ServiceTelemetry,
} from './types.js'
