import { Command } from 'commander'
import chalk from 'chalk'
import { ConfigurationError, loadEchoConfig, serve } from './index.js'
import type { EchoConfig, ServeOptions, ShutdownReport } from './index.js'

type Env = Record<string, string | undefined>

export type ServeFn = (config: EchoConfig, options: ServeOptions) => Promise<ShutdownReport>

type CliFlags = {
  host?: string
  port?: number
  drainTimeout?: number
  store?: string
  maxMessageLength?: number
}

const STOP_SIGNALS = ['SIGTERM', 'SIGINT'] as const

function toNumber(value: string): number {
  return Number(value)
}

/**
 * `tierline-echo`: run the echo service standalone until SIGTERM or SIGINT.
 * Flags win over the environment.
 */
export function createProgram(run: ServeFn = serve, env: Env = process.env): Command {
  const program = new Command()

  program
    .name('tierline-echo')
    .description('Layered HTTP echo service')
    .version(env.VERSION || '0.1.0')
    .option('--host <hostname>', 'Interface to bind (env: TIERLINE_HOST)')
    .option('--port <port>', 'Port to bind (env: PORT)', toNumber)
    .option('--drain-timeout <ms>', 'Drain deadline on shutdown (env: TIERLINE_DRAIN_TIMEOUT_MS)', toNumber)
    .option('--store <kind>', 'Data access: memory or noop (env: TIERLINE_STORE)')
    .option('--max-message-length <n>', 'Longest accepted message (env: TIERLINE_MAX_MESSAGE_LENGTH)', toNumber)
    .action(async () => {
      const flags = program.opts<CliFlags>()
      const config = loadEchoConfig({
        env,
        overrides: {
          mode: 'standalone',
          hostname: flags.host,
          port: flags.port,
          drainTimeoutMs: flags.drainTimeout,
          store: flags.store,
          maxMessageLength: flags.maxMessageLength,
        },
      })

      const controller = new AbortController()
      const onSignal = () => controller.abort()
      for (const signal of STOP_SIGNALS) process.once(signal, onSignal)
      try {
        await run(config, { signal: controller.signal })
      } finally {
        for (const signal of STOP_SIGNALS) process.off(signal, onSignal)
      }
    })

  return program
}

/** Print why the service could not start. */
export function formatStartupFailure(error: unknown): string {
  if (error instanceof ConfigurationError) {
    return [
      chalk.red('Invalid configuration:'),
      ...error.issues.map((issue) => chalk.yellow(`- ${issue.path}: ${issue.message}`)),
    ].join('\n')
  }
  const message = error instanceof Error ? error.message : String(error)
  return chalk.red(`✗ Echo service failed to start: ${message}`)
}
