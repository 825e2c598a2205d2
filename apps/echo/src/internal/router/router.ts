import { Hono } from 'hono'
import type { ServiceTelemetry } from '@tierline/telemetry'
import { telemetryMiddleware } from '@tierline/telemetry/middleware/hono'
import { INTERNAL_ERROR_BODY, NOT_FOUND_BODY } from './error-map.js'
import type { RouteTable } from './routes.js'

export interface RouterOptions {
  /** Spans, the duration histogram and error logs go through this bag. */
  telemetry: ServiceTelemetry
}

/**
 * Build the Hono application for a route table.
 *
 * Anything the table does not match answers 404, whatever the method.
 * Uncaught handler errors answer 500 and the cause stays in the log.
 */
export function createRouter(table: RouteTable, options: RouterOptions): Hono {
  const { logger, tracer, meter } = options.telemetry
  const app = new Hono()

  app.use(
    telemetryMiddleware({
      ignorePaths: ['/health'],
      category: ['tierline', 'echo', 'http'],
      tracer,
      meter,
    })
  )

  for (const route of table) {
    app.on(route.method, route.path, route.handler)
  }

  app.notFound((c) => c.json(NOT_FOUND_BODY, 404))

  app.onError((error, c) => {
    logger.error`Unhandled error on ${c.req.method} ${c.req.path}: ${error}`
    return c.json(INTERNAL_ERROR_BODY, 500)
  })

  return app
}
