import { z } from 'zod'

/**
 * Port to bind. `0` asks the OS for any free port and is only accepted for
 * embedded hosting, where the caller reads the bound port back from the handle.
 */
export const PortSchema = z.number().int().min(0).max(65535)

/**
 * How the service acquires its listener.
 *
 * - `standalone`: bind `hostname:port` and block the caller until shutdown
 * - `embedded`: start inside the caller's process and return immediately
 */
export const HostingModeSchema = z.enum(['standalone', 'embedded'])

export type HostingMode = z.infer<typeof HostingModeSchema>

/** Data access implementation selected at wiring time. */
export const StoreKindSchema = z.enum(['memory', 'noop'])

export type StoreKind = z.infer<typeof StoreKindSchema>

/**
 * Echo service configuration
 */
export const EchoConfigSchema = z
  .object({
    hostname: z.string().min(1).default('0.0.0.0'),
    port: PortSchema.default(3000),
    mode: HostingModeSchema.default('standalone'),
    drainTimeoutMs: z.number().int().positive().default(5_000),
    store: StoreKindSchema.default('memory'),
    maxMessageLength: z.number().int().positive().default(1024),
  })
  .superRefine((config, ctx) => {
    if (config.mode === 'standalone' && config.port === 0) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['port'],
        message: 'Standalone hosting needs a fixed port',
      })
    }
  })

export type EchoConfig = Readonly<z.infer<typeof EchoConfigSchema>>
export type EchoConfigInput = z.input<typeof EchoConfigSchema>

export interface ConfigIssue {
  readonly path: string
  readonly message: string
}

/**
 * Raised when startup parameters fail validation. Always thrown before any
 * component is constructed.
 */
export class ConfigurationError extends Error {
  readonly issues: readonly ConfigIssue[]

  constructor(issues: readonly ConfigIssue[]) {
    super(
      `Invalid configuration: ${issues.map((i) => `${i.path || '(root)'}: ${i.message}`).join('; ')}`
    )
    this.name = 'ConfigurationError'
    this.issues = issues
  }
}

function validate(raw: unknown): EchoConfig {
  const result = EchoConfigSchema.safeParse(raw)
  if (!result.success) {
    throw new ConfigurationError(
      result.error.issues.map((issue) => ({
        path: issue.path.join('.'),
        message: issue.message,
      }))
    )
  }
  return Object.freeze(result.data)
}

/**
 * Validate a configuration object and freeze the result.
 *
 * @throws ConfigurationError when any field is invalid
 */
export function parseEchoConfig(input: EchoConfigInput = {}): EchoConfig {
  return validate(input)
}

type Env = Record<string, string | undefined>

export type ConfigLoadOptions = {
  /** Variables to read. Defaults to `process.env`. */
  env?: Env
  /**
   * Values that win over the environment, e.g. parsed CLI flags. Validated
   * like the environment, so raw flag values are accepted as they come.
   */
  overrides?: Partial<Record<keyof EchoConfigInput, unknown>>
}

function numberFromEnv(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') return undefined
  return Number(value)
}

function stringFromEnv(value: string | undefined): string | undefined {
  return value === undefined || value === '' ? undefined : value
}

/**
 * Loads the echo configuration from environment variables.
 *
 * | Variable                      | Field              |
 * | ----------------------------- | ------------------ |
 * | `TIERLINE_HOST`               | `hostname`         |
 * | `PORT`                        | `port`             |
 * | `TIERLINE_MODE`               | `mode`             |
 * | `TIERLINE_DRAIN_TIMEOUT_MS`   | `drainTimeoutMs`   |
 * | `TIERLINE_STORE`              | `store`            |
 * | `TIERLINE_MAX_MESSAGE_LENGTH` | `maxMessageLength` |
 */
export function loadEchoConfig(options: ConfigLoadOptions = {}): EchoConfig {
  const env = options.env ?? process.env

  const fromEnv: Record<string, unknown> = {
    hostname: stringFromEnv(env.TIERLINE_HOST),
    port: numberFromEnv(env.PORT),
    mode: stringFromEnv(env.TIERLINE_MODE),
    drainTimeoutMs: numberFromEnv(env.TIERLINE_DRAIN_TIMEOUT_MS),
    store: stringFromEnv(env.TIERLINE_STORE),
    maxMessageLength: numberFromEnv(env.TIERLINE_MAX_MESSAGE_LENGTH),
  }

  const merged: Record<string, unknown> = {}
  for (const [key, value] of Object.entries({ ...fromEnv, ...options.overrides })) {
    if (value !== undefined) merged[key] = value
  }

  return validate(merged)
}
