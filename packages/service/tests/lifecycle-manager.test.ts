import { createServer as createHttpServer } from 'node:http'
import type { Server } from 'node:http'
import { createServer as createNetServer } from 'node:net'
import { afterEach, describe, expect, it, vi } from 'vitest'
import { Hono } from 'hono'
import { TelemetryBuilder } from '@tierline/telemetry'
import { ConstructionError } from '../src/errors.js'
import { LifecycleManager } from '../src/lifecycle-manager.js'
import type { HostingOptions, LifecycleManagerOptions, WireFn } from '../src/types.js'
import { freePort, httpGet, sendRaw, settledSoon } from './helpers.js'

const telemetry = TelemetryBuilder.noop('lifecycle-test')
const info = { name: 'test', version: '1.0.0' }

const EMBEDDED: HostingOptions = {
  mode: 'embedded',
  hostname: '127.0.0.1',
  port: 0,
  drainTimeoutMs: 200,
}

function pingApp(): Hono {
  const app = new Hono()
  app.get('/ping', (c) => c.text('pong'))
  return app
}

describe('LifecycleManager', () => {
  const managers: LifecycleManager[] = []

  function tracked(options: Partial<LifecycleManagerOptions>) {
    const manager = new LifecycleManager({
      info,
      telemetry,
      hosting: EMBEDDED,
      wire: pingApp,
      ...options,
    })
    managers.push(manager)
    return manager
  }

  afterEach(async () => {
    vi.restoreAllMocks()
    for (const manager of managers) {
      if (manager.state === 'serving') await manager.stop()
    }
    managers.length = 0
  })

  describe('embedded hosting', () => {
    it('starts in uninitialized state', () => {
      const manager = tracked({})
      expect(manager.state).toBe('uninitialized')
      expect(manager.port).toBeUndefined()
    })

    it('binds a self-managed listener and returns while serving', async () => {
      const manager = tracked({})
      await manager.start()

      expect(manager.state).toBe('serving')
      expect(manager.mode).toBe('embedded')
      expect(manager.port).toBeGreaterThan(0)
      expect(manager.url).toBe(`http://127.0.0.1:${manager.port}`)

      const res = await fetch(`${manager.url}/ping`)
      expect(res.status).toBe(200)
      expect(await res.text()).toBe('pong')
    })

    it('attaches to a caller-supplied server without taking ownership of it', async () => {
      const server: Server = createHttpServer()
      const manager = tracked({ server })
      await manager.start()
      await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve))

      try {
        expect(server.listenerCount('request')).toBe(1)
        const res = await fetch(`${manager.url}/ping`)
        expect(await res.text()).toBe('pong')

        await manager.stop()

        expect(server.listenerCount('request')).toBe(0)
        expect(server.listening).toBe(true)
      } finally {
        server.closeAllConnections()
        await new Promise<void>((resolve) => server.close(() => resolve()))
      }
    })

    it('rejects a caller-supplied server outside embedded mode', () => {
      expect(
        () =>
          new LifecycleManager({
            info,
            telemetry,
            wire: pingApp,
            hosting: { ...EMBEDDED, mode: 'standalone', port: 3000 },
            server: createHttpServer(),
          })
      ).toThrow(ConstructionError)
    })
  })

  describe('standalone hosting', () => {
    it('run() blocks until the service stops', async () => {
      const port = await freePort()
      const manager = tracked({ hosting: { ...EMBEDDED, mode: 'standalone', port } })
      await manager.start()
      expect(manager.url).toBe(`http://127.0.0.1:${port}`)

      const running = manager.run()
      expect(await settledSoon(running)).toBe(false)

      const report = await manager.stop()
      await expect(running).resolves.toBe(report)
      expect(manager.state).toBe('stopped')
    })

    it('fails with ConstructionError when the port is taken', async () => {
      const port = await freePort()
      const blocker = createNetServer()
      await new Promise<void>((resolve) => blocker.listen(port, '127.0.0.1', resolve))

      const released: string[] = []
      const manager = tracked({
        hosting: { ...EMBEDDED, mode: 'standalone', port },
        wire: (scope) => {
          scope.own('store', {}, () => {
            released.push('store')
          })
          return pingApp()
        },
      })

      try {
        await expect(manager.start()).rejects.toThrow(`Port ${port} is already in use`)
        expect(manager.state).toBe('stopped')
        expect(released).toEqual(['store'])
      } finally {
        await new Promise<void>((resolve) => blocker.close(() => resolve()))
      }
    })
  })

  describe('wiring', () => {
    it('releases resources in reverse order of acquisition', async () => {
      const events: string[] = []
      const manager = tracked({
        wire: (scope) => {
          for (const name of ['store', 'logic', 'routes']) {
            events.push(`acquire ${name}`)
            scope.own(name, name, () => {
              events.push(`release ${name}`)
            })
          }
          return pingApp()
        },
      })

      await manager.start()
      const report = await manager.stop()

      expect(report.released).toEqual(['listener', 'routes', 'logic', 'store'])
      expect(events).toEqual([
        'acquire store',
        'acquire logic',
        'acquire routes',
        'release routes',
        'release logic',
        'release store',
      ])
    })

    it('keeps releasing when one release fails', async () => {
      const manager = tracked({
        wire: (scope) => {
          scope.own('store', null, () => undefined)
          scope.own('logic', null, () => {
            throw new Error('release failed')
          })
          return pingApp()
        },
      })

      await manager.start()
      const report = await manager.stop()
      expect(report.released).toEqual(['listener', 'logic', 'store'])
    })

    it('aborts startup on a wiring failure and never binds', async () => {
      const port = await freePort()
      const released: string[] = []
      const manager = tracked({
        hosting: { ...EMBEDDED, port },
        wire: (scope) => {
          scope.own('store', null, () => {
            released.push('store')
          })
          throw new Error('logic failed to initialize')
        },
      })

      const error = await manager.start().catch((err: unknown) => err)

      expect(error).toBeInstanceOf(ConstructionError)
      expect(error).toHaveProperty(
        'message',
        'Service "test" failed to start: logic failed to initialize'
      )
      expect(manager.state).toBe('stopped')
      expect(released).toEqual(['store'])
      await expect(fetch(`http://127.0.0.1:${port}/ping`)).rejects.toThrow()
    })

    it('leaves a caller-supplied server without a listener when wiring fails', async () => {
      const server = createHttpServer()
      const manager = tracked({
        server,
        wire: () => {
          throw new Error('boom')
        },
      })

      await expect(manager.start()).rejects.toThrow(ConstructionError)
      expect(server.listenerCount('request')).toBe(0)
    })

    it('refuses registrations after wiring has finished', async () => {
      let captured: Parameters<WireFn>[0] | undefined
      const manager = tracked({
        wire: (scope) => {
          captured = scope
          return pingApp()
        },
      })
      await manager.start()

      expect(() => captured?.own('late', null, () => undefined)).toThrow(
        'Cannot register "late" outside of wiring'
      )
    })
  })

  describe('transport errors', () => {
    it('drops a malformed request without disturbing other connections', async () => {
      const own = TelemetryBuilder.noop('transport-error-test')
      const warn = vi.spyOn(own.logger, 'warn')
      const manager = tracked({ telemetry: own })
      await manager.start()

      const received = await sendRaw(manager.port ?? 0, 'GARBAGE\r\n\r\n')

      expect(received).toBe('')
      expect(warn).toHaveBeenCalledWith(
        expect.anything(),
        expect.stringMatching(/^Client connection error: /)
      )
      const res = await fetch(`${manager.url}/ping`)
      expect(res.status).toBe(200)
      expect(await res.text()).toBe('pong')
    })
  })

  describe('state transitions', () => {
    it('refuses to start twice', async () => {
      const manager = tracked({})
      await manager.start()
      await expect(manager.start()).rejects.toThrow(/Expected "uninitialized"/)
    })

    it('refuses to run or stop before start', async () => {
      const manager = tracked({})
      await expect(manager.run()).rejects.toThrow(
        'Cannot run service "test" in state "uninitialized"'
      )
      await expect(manager.stop()).rejects.toThrow(
        'Cannot stop service "test" in state "uninitialized"'
      )
    })

    it('stop() is idempotent', async () => {
      const manager = tracked({})
      await manager.start()

      const first = manager.stop()
      const second = manager.stop()
      expect(second).toBe(first)
      await first
      await expect(manager.stop()).resolves.toEqual(await first)
    })

    it('stops when the abort signal fires', async () => {
      const controller = new AbortController()
      const manager = tracked({ signal: controller.signal })
      await manager.start()

      controller.abort()
      const report = await manager.run()

      expect(manager.state).toBe('stopped')
      expect(report.released).toEqual(['listener'])
    })

    it('does not start with an already aborted signal', async () => {
      const controller = new AbortController()
      controller.abort()
      const manager = tracked({ signal: controller.signal })

      await expect(manager.start()).rejects.toThrow('Service "test" was aborted before it started')
      expect(manager.state).toBe('stopped')
    })
  })

  describe('drain', () => {
    it('finishes in-flight requests and abandons those past the deadline', async () => {
      let releaseFast: () => void = () => {}
      const fastGate = new Promise<void>((resolve) => {
        releaseFast = resolve
      })

      const manager = tracked({
        hosting: { ...EMBEDDED, drainTimeoutMs: 100 },
        wire: () => {
          const app = new Hono()
          app.get('/fast', async (c) => {
            await fastGate
            return c.text('fast')
          })
          app.get('/slow', async (c) => {
            await new Promise<never>(() => {})
            return c.text('never')
          })
          return app
        },
      })
      await manager.start()
      const url = manager.url

      const fast = fetch(`${url}/fast`)
      const slow = fetch(`${url}/slow`).then(
        () => 'completed',
        () => 'aborted'
      )
      await vi.waitFor(() => expect(manager.inFlight).toBe(2))

      const stopping = manager.stop()
      expect(manager.state).toBe('shutting_down')
      releaseFast()
      const report = await stopping

      expect(report).toEqual({ drained: 1, abandoned: 1, released: ['listener'] })
      const fastRes = await fast
      expect(fastRes.status).toBe(200)
      expect(await fastRes.text()).toBe('fast')
      expect(await slow).toBe('aborted')
      expect(manager.state).toBe('stopped')
    })

    it('answers 503 shutting_down to requests that arrive while draining', async () => {
      let releaseSlow: () => void = () => {}
      const slowGate = new Promise<void>((resolve) => {
        releaseSlow = resolve
      })
      const server = createHttpServer()
      const manager = tracked({
        server,
        hosting: { ...EMBEDDED, drainTimeoutMs: 5_000 },
        wire: () => {
          const app = pingApp()
          app.get('/slow', async (c) => {
            await slowGate
            return c.text('slow')
          })
          return app
        },
      })
      await manager.start()
      await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve))
      const url = manager.url

      try {
        const slow = fetch(`${url}/slow`)
        await vi.waitFor(() => expect(manager.inFlight).toBe(1))
        const stopping = manager.stop()

        expect(await httpGet(`${url}/ping`)).toEqual({
          status: 503,
          connection: 'close',
          body: '{"error":{"code":"shutting_down","message":"Service is shutting down"}}',
        })

        releaseSlow()
        expect(await stopping).toEqual({ drained: 1, abandoned: 0, released: ['listener'] })
        expect(await (await slow).text()).toBe('slow')
        expect(server.listenerCount('request')).toBe(0)
      } finally {
        server.closeAllConnections()
        await new Promise<void>((resolve) => server.close(() => resolve()))
      }
    })

    it('stops promptly with nothing in flight', async () => {
      const manager = tracked({ hosting: { ...EMBEDDED, drainTimeoutMs: 10_000 } })
      await manager.start()
      const res = await fetch(`${manager.url}/ping`)
      expect(await res.text()).toBe('pong')
      await vi.waitFor(() => expect(manager.inFlight).toBe(0))

      const report = await manager.stop()
      expect(report).toEqual({ drained: 0, abandoned: 0, released: ['listener'] })
    })
  })
})
