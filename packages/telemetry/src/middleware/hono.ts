/**
 * @tierline/telemetry — Hono telemetry middleware
 *
 * Creates a span per HTTP request, records the request duration histogram,
 * and writes one debug log line per request.
 *
 * Follows stable HTTP semantic conventions:
 * @see https://opentelemetry.io/docs/specs/semconv/http/http-spans/
 * @see https://opentelemetry.io/docs/specs/semconv/http/http-metrics/
 */

import type { Context, MiddlewareHandler } from 'hono'
import type { Histogram, Meter } from '@opentelemetry/api'
import { getLogger } from '@logtape/logtape'
import { context, metrics, propagation, SpanStatusCode, trace } from '@opentelemetry/api'
import {
  ATTR_ERROR_TYPE,
  ATTR_HTTP_REQUEST_METHOD,
  ATTR_HTTP_RESPONSE_STATUS_CODE,
  ATTR_HTTP_ROUTE,
  ATTR_URL_PATH,
} from '@opentelemetry/semantic-conventions'
import { DURATION_BUCKETS, ROOT_CATEGORY } from '../constants.js'
import type { MiddlewareOptions } from '../types.js'

const METRIC_HTTP_SERVER_REQUEST_DURATION = 'http.server.request.duration'
const INSTRUMENTATION_SCOPE = '@tierline/telemetry'

/** Route label used for requests that matched no route, to keep span names low-cardinality. */
export const UNMATCHED_ROUTE = '(unmatched)'

// Without a meter of its own, the instrument is looked up per request: it is
// bound to whichever MeterProvider is registered at the time, and the SDK
// caches by name.
function createDurationHistogram(meter: Meter): Histogram {
  return meter.createHistogram(
    METRIC_HTTP_SERVER_REQUEST_DURATION,
    {
      description: 'Duration of HTTP server requests',
      unit: 's',
      advice: { explicitBucketBoundaries: DURATION_BUCKETS },
    }
  )
}

/**
 * Route pattern Hono matched for this request. Hono reports the catch-all
 * `/*` when nothing but middleware matched.
 */
function matchedRoute(c: Context): string {
  const route = c.req.routePath
  return route && route !== '/*' ? route : UNMATCHED_ROUTE
}

/**
 * Hono middleware that instruments every HTTP request.
 *
 * - span `{prefix} {METHOD} {route}` with `http.request.method`, `http.route`,
 *   `url.path` and `http.response.status_code`; inbound `traceparent` is honored
 * - `http.server.request.duration` histogram in seconds
 * - debug log `{METHOD} {path} -> {status} ({ms} ms)`
 *
 * Paths listed in `ignorePaths` (exact match) are skipped entirely.
 */
export function telemetryMiddleware(options?: MiddlewareOptions): MiddlewareHandler {
  const ignorePaths = new Set(options?.ignorePaths ?? [])
  const prefix = options?.spanNamePrefix ?? 'HTTP'
  const logger = getLogger(options?.category ?? [ROOT_CATEGORY, 'http'])
  const ownMeter = options?.meter
  const ownHistogram = ownMeter ? createDurationHistogram(ownMeter) : undefined
  const durationHistogram = () =>
    ownHistogram ?? createDurationHistogram(metrics.getMeter(INSTRUMENTATION_SCOPE))

  return async (c, next) => {
    const path = c.req.path
    if (ignorePaths.has(path)) {
      return next()
    }

    const startTime = performance.now()
    const method = c.req.method

    const inboundHeaders: Record<string, string> = {}
    const tp = c.req.header('traceparent')
    if (tp) inboundHeaders['traceparent'] = tp
    const ts = c.req.header('tracestate')
    if (ts) inboundHeaders['tracestate'] = ts
    const parentCtx = propagation.extract(context.active(), inboundHeaders)

    const tracer = options?.tracer ?? trace.getTracer(INSTRUMENTATION_SCOPE)

    await context.with(parentCtx, async () => {
      const span = tracer.startSpan(`${prefix} ${method} ${path}`, {}, context.active())
      span.setAttribute(ATTR_HTTP_REQUEST_METHOD, method)
      span.setAttribute(ATTR_URL_PATH, path)

      try {
        await context.with(trace.setSpan(context.active(), span), next)
      } catch (err) {
        span.recordException(err instanceof Error ? err : String(err))
        span.setStatus({
          code: SpanStatusCode.ERROR,
          message: err instanceof Error ? err.message : String(err),
        })
        throw err
      } finally {
        const route = matchedRoute(c)
        const status = c.res.status
        span.updateName(`${prefix} ${method} ${route}`)
        span.setAttribute(ATTR_HTTP_ROUTE, route)
        span.setAttribute(ATTR_HTTP_RESPONSE_STATUS_CODE, status)
        if (status >= 500) {
          span.setStatus({ code: SpanStatusCode.ERROR })
        }
        span.end()

        const elapsedMs = performance.now() - startTime
        const attributes: Record<string, string | number> = {
          [ATTR_HTTP_REQUEST_METHOD]: method,
          [ATTR_HTTP_ROUTE]: route,
          [ATTR_HTTP_RESPONSE_STATUS_CODE]: status,
        }
        if (status >= 400) {
          attributes[ATTR_ERROR_TYPE] = String(status)
        }
        durationHistogram().record(elapsedMs / 1000, attributes)

        logger.debug`${method} ${path} -> ${status} (${elapsedMs.toFixed(1)} ms)`
      }
    })
  }
}
