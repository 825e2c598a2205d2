import { createServer } from 'node:http'
import type { IncomingMessage, Server, ServerResponse } from 'node:http'
import type { AddressInfo } from 'node:net'
import type { Duplex } from 'node:stream'
import { getRequestListener } from '@hono/node-server'
import type { HostingMode } from '@tierline/config'
import type { Logger } from '@tierline/telemetry'
import { ConstructionError, ShutdownTimeoutError, TransportError } from './errors.js'
import { InFlightTracker } from './in-flight.js'
import type {
  HostingOptions,
  LifecycleManagerOptions,
  LifecycleState,
  ServiceHandle,
  ServiceInfo,
  ShutdownReport,
  WireFn,
  WiringScope,
} from './types.js'

type RequestHandler = (req: IncomingMessage, res: ServerResponse) => void

interface OwnedResource {
  readonly name: string
  readonly release: () => Promise<void> | void
}

const SHUTTING_DOWN_BODY = JSON.stringify({
  error: { code: 'shutting_down', message: 'Service is shutting down' },
})

/**
 * Owns one run of a service: wiring, listener acquisition, serving, drain
 * and release.
 *
 * Two hosting modes share every step except how the listener is acquired:
 *
 * - `standalone` binds `hostname:port` on a server it creates. `start()`
 *   resolves once bound; the caller then awaits `run()`, which blocks until
 *   shutdown completes.
 * - `embedded` attaches to a caller-supplied `http.Server`, or binds its own
 *   (port 0 allowed), and returns from `start()` immediately. The service then
 *   runs concurrently with the caller's code until `stop()` or the abort
 *   signal.
 *
 * Requests are served by the same Hono application in both modes, so
 * responses are identical.
 *
 * @example
 * ```ts
 * const manager = new LifecycleManager({ info, hosting, wire, telemetry, signal })
 * await manager.start()
 * const report = await manager.run()
 * ```
 */
export class LifecycleManager implements ServiceHandle {
  readonly info: ServiceInfo
  private readonly _hosting: HostingOptions
  private readonly _wire: WireFn
  private readonly _logger: Logger
  private readonly _callerServer: Server | undefined
  private readonly _signal: AbortSignal | undefined

  private _state: LifecycleState = 'uninitialized'
  private _server: Server | undefined
  private _handler: RequestHandler | undefined
  private readonly _owned: OwnedResource[] = []
  private readonly _inFlight = new InFlightTracker()
  private _stopping: Promise<ShutdownReport> | undefined
  private _resolveStopped: (report: ShutdownReport) => void = () => {}
  private readonly _stopped: Promise<ShutdownReport>
  private readonly _onAbort = (): void => {
    this.stop().catch((err: unknown) => {
      this._logger.error`${this.info.name} failed to stop on abort: ${err}`
    })
  }

  constructor(options: LifecycleManagerOptions) {
    if (options.server && options.hosting.mode !== 'embedded') {
      throw new ConstructionError('A caller-supplied server is only accepted in embedded mode')
    }
    this.info = options.info
    this._hosting = options.hosting
    this._wire = options.wire
    this._logger = options.telemetry.logger
    this._callerServer = options.server
    this._signal = options.signal
    this._stopped = new Promise<ShutdownReport>((resolve) => {
      this._resolveStopped = resolve
    })
  }

  get mode(): HostingMode {
    return this._hosting.mode
  }

  get state(): LifecycleState {
    return this._state
  }

  get inFlight(): number {
    return this._inFlight.size
  }

  get port(): number | undefined {
    return this._address()?.port
  }

  get url(): string | undefined {
    const addr = this._address()
    if (!addr) return undefined
    const wildcard = addr.address === '0.0.0.0' || addr.address === '::'
    const host = wildcard ? '127.0.0.1' : addr.address
    return `http://${!wildcard && addr.family === 'IPv6' ? `[${host}]` : host}:${addr.port}`
  }

  private _address(): AddressInfo | undefined {
    const server = this._server ?? this._callerServer
    if (!server || this._state !== 'serving') return undefined
    const addr = server.address()
    if (!addr || typeof addr === 'string') return undefined
    return addr
  }

  /**
   * Wire the dependency graph and acquire the listener.
   *
   * @throws ConstructionError when wiring or binding fails. Everything acquired
   * so far has been released by then and the state is `stopped`.
   */
  async start(): Promise<this> {
    if (this._state !== 'uninitialized') {
      throw new ConstructionError(
        `Cannot start service "${this.info.name}" in state "${this._state}". Expected "uninitialized".`
      )
    }
    if (this._signal?.aborted) {
      this._state = 'stopped'
      throw new ConstructionError(`Service "${this.info.name}" was aborted before it started`)
    }
    this._state = 'wiring'

    try {
      const app = await this._wire(this._scope())
      const listener = getRequestListener(app.fetch)
      this._handler = (req, res) => this._dispatch(listener, req, res)
      await this._acquireListener(this._handler)
    } catch (err) {
      await this._abortWiring()
      if (err instanceof ConstructionError) throw err
      throw new ConstructionError(
        `Service "${this.info.name}" failed to start: ${err instanceof Error ? err.message : String(err)}`,
        { cause: err }
      )
    }

    this._state = 'serving'
    // Wiring is not cancellable; an abort that arrived meanwhile stops right away.
    if (this._signal?.aborted) {
      this._onAbort()
    } else {
      this._signal?.addEventListener('abort', this._onAbort, { once: true })
    }

    const where = this.url ?? 'caller-supplied server'
    this._logger.info`${this.info.name} v${this.info.version} serving (${this.mode}) on ${where}`
    return this
  }

  run(): Promise<ShutdownReport> {
    if (this._state === 'serving' || this._stopping) {
      return this._stopped
    }
    return Promise.reject(
      new Error(`Cannot run service "${this.info.name}" in state "${this._state}"`)
    )
  }

  stop(): Promise<ShutdownReport> {
    if (this._stopping) return this._stopping
    if (this._state !== 'serving') {
      return Promise.reject(
        new Error(`Cannot stop service "${this.info.name}" in state "${this._state}"`)
      )
    }
    this._stopping = this._shutdown()
    return this._stopping
  }

  // --- Wiring ---

  private _scope(): WiringScope {
    return {
      own: <T>(name: string, resource: T, release: (resource: T) => Promise<void> | void): T => {
        if (this._state !== 'wiring') {
          throw new ConstructionError(`Cannot register "${name}" outside of wiring`)
        }
        this._owned.push({ name, release: () => release(resource) })
        return resource
      },
    }
  }

  private async _abortWiring(): Promise<void> {
    this._detachListener()
    if (this._server) {
      await closeServer(this._server)
      this._server = undefined
    }
    await this._releaseOwned()
    this._state = 'stopped'
  }

  // --- Listener ---

  private async _acquireListener(handler: RequestHandler): Promise<void> {
    if (this._callerServer) {
      this._callerServer.on('request', handler)
      return
    }

    const server = createServer(handler)
    server.on('clientError', (err: Error, socket: Duplex) => this._onClientError(err, socket))
    this._server = server

    const { port, hostname } = this._hosting
    await new Promise<void>((resolve, reject) => {
      const onError = (err: Error) => {
        const code = 'code' in err ? err.code : undefined
        reject(
          new ConstructionError(
            code === 'EADDRINUSE'
              ? `Port ${port} is already in use`
              : `Cannot bind ${hostname}:${port}: ${err.message}`,
            { cause: err }
          )
        )
      }
      server.once('error', onError)
      server.listen(port, hostname, () => {
        server.off('error', onError)
        resolve()
      })
    })
  }

  private _detachListener(): void {
    if (this._callerServer && this._handler) {
      this._callerServer.off('request', this._handler)
    }
  }

  private _onClientError(err: Error, socket: Duplex): void {
    const error = new TransportError(`Client connection error: ${err.message}`, { cause: err })
    this._logger.warn`${error.message}`
    socket.destroy()
  }

  private _dispatch(
    listener: ReturnType<typeof getRequestListener>,
    req: IncomingMessage,
    res: ServerResponse
  ): void {
    if (this._state !== 'serving') {
      res.writeHead(503, { 'content-type': 'application/json', connection: 'close' })
      res.end(SHUTTING_DOWN_BODY)
      return
    }
    this._inFlight.track(res)
    listener(req, res).catch((err: unknown) => {
      const error = new TransportError('Failed to write response', { cause: err })
      this._logger.warn`${error.message}: ${err}`
      res.destroy()
    })
  }

  // --- Shutdown ---

  private async _shutdown(): Promise<ShutdownReport> {
    this._state = 'shutting_down'
    this._signal?.removeEventListener('abort', this._onAbort)
    this._logger.info`${this.info.name} shutting down`

    // Stop accepting before draining. A self-managed server keeps its open
    // connections until the drain is over. A caller-supplied server keeps
    // accepting, so the listener stays attached and answers 503 until then.
    const server = this._server
    this._server = undefined
    const closed = server ? closeServer(server) : Promise.resolve()
    server?.closeIdleConnections()

    const { drained, abandoned } = await this._inFlight.drain(this._hosting.drainTimeoutMs)
    if (abandoned > 0) {
      const error = new ShutdownTimeoutError(abandoned, this._hosting.drainTimeoutMs)
      this._logger.warn`${error.message}`
    }
    this._detachListener()
    server?.closeAllConnections()
    await closed

    const released = ['listener', ...(await this._releaseOwned())]

    this._state = 'stopped'
    const report: ShutdownReport = { drained, abandoned, released }
    this._logger.info`${this.info.name} stopped (drained ${drained}, abandoned ${abandoned})`
    this._resolveStopped(report)
    return report
  }

  /** Release owned resources newest first. Every release runs even if an earlier one fails. */
  private async _releaseOwned(): Promise<string[]> {
    const released: string[] = []
    while (this._owned.length > 0) {
      const resource = this._owned.pop()
      if (!resource) break
      try {
        await resource.release()
      } catch (err) {
        this._logger.error`Failed to release ${resource.name}: ${err}`
      }
      released.push(resource.name)
    }
    return released
  }
}

function closeServer(server: Server): Promise<void> {
  return new Promise<void>((resolve) => {
    if (!server.listening) {
      resolve()
      return
    }
    server.close(() => resolve())
  })
}
