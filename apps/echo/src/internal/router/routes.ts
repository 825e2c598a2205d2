import type { Context, Handler } from 'hono'
import { z } from 'zod'
import type { EchoLogic } from '../logic/types.js'
import { DOMAIN_ERROR_STATUS, errorBody } from './error-map.js'

export type RouteMethod = 'GET' | 'POST'

export interface RouteDefinition {
  readonly method: RouteMethod
  readonly path: string
  readonly handler: Handler
}

/** Frozen, ordered. Built once during wiring. */
export type RouteTable = readonly RouteDefinition[]

const EchoBodySchema = z.object({ message: z.string() })

const INVALID_BODY = errorBody('invalid_input', 'Request body must be a JSON object with a string "message"')

async function respond(c: Context, logic: EchoLogic, message: string): Promise<Response> {
  const result = await logic.execute({ message })
  if (result.success) {
    return c.json(result.data, 200)
  }
  const { kind, message: detail } = result.error
  return c.json(errorBody(kind, detail), DOMAIN_ERROR_STATUS[kind])
}

export function buildRouteTable(logic: EchoLogic): RouteTable {
  const routes: RouteDefinition[] = [
    {
      method: 'GET',
      path: '/health',
      handler: (c) => c.json({ status: 'ok', service: 'echo', state: 'serving' }, 200),
    },
    {
      method: 'GET',
      path: '/echo/:message',
      handler: (c) => respond(c, logic, c.req.param('message') ?? ''),
    },
    {
      method: 'POST',
      path: '/echo',
      handler: async (c) => {
        let body: unknown
        try {
          body = await c.req.json()
        } catch {
          return c.json(INVALID_BODY, DOMAIN_ERROR_STATUS.invalid_input)
        }
        const parsed = EchoBodySchema.safeParse(body)
        if (!parsed.success) {
          return c.json(INVALID_BODY, DOMAIN_ERROR_STATUS.invalid_input)
        }
        return respond(c, logic, parsed.data.message)
      },
    },
  ]
  return Object.freeze(routes.map((route) => Object.freeze(route)))
}
