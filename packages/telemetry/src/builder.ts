/**
 * @tierline/telemetry — TelemetryBuilder
 *
 * Chainable per-service telemetry configuration that produces a frozen
 * `ServiceTelemetry` bag for dependency injection.
 *
 * Only the logger signal installs global state (LogTape sinks). The meter
 * and tracer come from the `@opentelemetry/api` global registries, so they
 * stay noop until the hosting process registers real providers.
 *
 * @example
 * ```ts
 * const telemetry = await new TelemetryBuilder('echo')
 *   .withLogger({ category: ['tierline', 'echo'] })
 *   .withMetrics()
 *   .withTracing()
 *   .build()
 *
 * // Testing: synchronous, zero global state
 * const telemetry = TelemetryBuilder.noop('echo')
 * ```
 */

import { getLogger } from '@logtape/logtape'
import { metrics, trace } from '@opentelemetry/api'
import { ROOT_CATEGORY } from './constants.js'
import { configureLogger } from './logger.js'
import type { LoggerBuilderOpts, ScopeBuilderOpts, ServiceTelemetry } from './types.js'

export class TelemetryBuilder {
  private readonly _serviceName: string
  private _loggerOpts: LoggerBuilderOpts | undefined
  private _metricsOpts: ScopeBuilderOpts | undefined
  private _tracingOpts: ScopeBuilderOpts | undefined

  constructor(serviceName: string) {
    if (!serviceName || !serviceName.trim()) {
      throw new Error('serviceName must be a non-empty string')
    }
    this._serviceName = serviceName
  }

  /** Configure the logger signal. Returns `this` for chaining. */
  withLogger(opts?: LoggerBuilderOpts): this {
    this._loggerOpts = opts ?? {}
    return this
  }

  /** Configure the metrics signal. Returns `this` for chaining. */
  withMetrics(opts?: ScopeBuilderOpts): this {
    this._metricsOpts = opts ?? {}
    return this
  }

  /** Configure the tracing signal. Returns `this` for chaining. */
  withTracing(opts?: ScopeBuilderOpts): this {
    this._tracingOpts = opts ?? {}
    return this
  }

  /**
   * Configure the global logger (if `.withLogger()` was called and it is not
   * configured yet) and return a scoped, frozen `ServiceTelemetry`.
   */
  async build(): Promise<ServiceTelemetry> {
    if (this._loggerOpts) {
      await configureLogger({
        level: this._loggerOpts.level,
        environment: this._loggerOpts.environment,
      })
    }

    const category = this._loggerOpts?.category ?? [ROOT_CATEGORY, this._serviceName]
    const meterScope = this._metricsOpts?.scope ?? this._serviceName
    const tracerScope = this._tracingOpts?.scope ?? this._serviceName

    return Object.freeze({
      serviceName: this._serviceName,
      logger: getLogger(category),
      meter: metrics.getMeter(meterScope),
      tracer: trace.getTracer(tracerScope),
    })
  }

  /**
   * Synchronously return a `ServiceTelemetry` whose logger sits outside the
   * configured category tree. Does NOT modify any global state, which makes
   * it the default for unit tests.
   */
  static noop(serviceName: string): ServiceTelemetry {
    return Object.freeze({
      serviceName,
      logger: getLogger([serviceName]),
      meter: metrics.getMeter(serviceName),
      tracer: trace.getTracer(serviceName),
    })
  }
}
