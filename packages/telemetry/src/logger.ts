import { configure, getLogger, reset } from '@logtape/logtape'
import type { LogRecord, Sink } from '@logtape/logtape'
import { context, trace } from '@opentelemetry/api'
import { ROOT_CATEGORY, validateEnvironment, validateLogLevel } from './constants.js'
import type { Environment, LogLevel } from './constants.js'

export interface LoggerConfig {
  level?: LogLevel
  environment?: Environment
}

let configPromise: Promise<void> | null = null
let configured = false

// ---------------------------------------------------------------------------
// Internal helpers
// ---------------------------------------------------------------------------

function safeStringify(value: unknown): string {
  try {
    return JSON.stringify(value)
  } catch {
    // Circular reference: retry with a replacer that marks cycles
    const seen = new WeakSet<object>()
    return JSON.stringify(value, (_key, val: unknown) => {
      if (typeof val === 'object' && val !== null) {
        if (seen.has(val)) return '[Circular]'
        seen.add(val)
      }
      return val
    })
  }
}

function formatMessage(record: LogRecord): string {
  return record.message.map((part) => (typeof part === 'string' ? part : String(part))).join('')
}

function getTraceContext(): { traceId?: string; spanId?: string } {
  const span = trace.getSpan(context.active())
  if (!span) return {}
  const ctx = span.spanContext()
  return { traceId: ctx.traceId, spanId: ctx.spanId }
}

const ANSI = {
  reset: '\x1b[0m',
  dim: '\x1b[2m',
  red: '\x1b[31m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  cyan: '\x1b[36m',
  magenta: '\x1b[35m',
}

const LEVEL_COLORS: Record<string, string> = {
  debug: ANSI.dim,
  info: ANSI.cyan,
  warning: ANSI.yellow,
  error: ANSI.red,
  fatal: ANSI.magenta,
}

// ---------------------------------------------------------------------------
// Sink factories
// ---------------------------------------------------------------------------

function createPrettySink(): Sink {
  return (record: LogRecord) => {
    const time = new Date(record.timestamp).toISOString().slice(11, 23)
    const level = record.level.toUpperCase().padEnd(7)
    const color = LEVEL_COLORS[record.level] ?? ''
    const category = record.category.join('.')
    const props = Object.keys(record.properties).length
      ? ` ${safeStringify(record.properties)}`
      : ''
    console.log(
      `${ANSI.dim}${time}${ANSI.reset} ${color}${level}${ANSI.reset} ${ANSI.blue}${category}${ANSI.reset}: ${formatMessage(record)}${props}`
    )
  }
}

/** One JSON object per line on stdout, correlated with the active span when there is one. */
export function createJsonSink(
  write: (line: string) => void = (line) => process.stdout.write(line)
): Sink {
  return (record: LogRecord) => {
    const { traceId, spanId } = getTraceContext()
    const line = safeStringify({
      timestamp: record.timestamp,
      level: record.level,
      category: record.category.join('.'),
      message: formatMessage(record),
      ...(Object.keys(record.properties).length ? { properties: record.properties } : {}),
      ...(traceId ? { trace_id: traceId, span_id: spanId } : {}),
    })
    write(line + '\n')
  }
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Configure LogTape with environment-appropriate sinks.
 *
 * | environment  | sink                 | default level |
 * | ------------ | -------------------- | ------------- |
 * | production   | JSON lines on stdout | info          |
 * | development  | colored console      | info          |
 * | test         | colored console      | warning       |
 *
 * `LOG_LEVEL` overrides the default level. Safe to call multiple times;
 * calls after the first successful one are no-ops.
 */
export async function configureLogger(config?: LoggerConfig): Promise<void> {
  if (configured) return
  if (configPromise) return configPromise

  configPromise = doConfigureLogger(config)
    .then(() => {
      configured = true
    })
    .catch((err: unknown) => {
      configPromise = null
      throw err
    })
  return configPromise
}

async function doConfigureLogger(config?: LoggerConfig): Promise<void> {
  const environment =
    config?.environment ?? validateEnvironment(process.env.NODE_ENV) ?? 'development'
  const level: LogLevel =
    config?.level ??
    validateLogLevel(process.env.LOG_LEVEL) ??
    (environment === 'test' ? 'warning' : 'info')

  const sinks: Record<string, Sink> =
    environment === 'production' ? { json: createJsonSink() } : { pretty: createPrettySink() }
  const sinkNames = Object.keys(sinks)

  await configure({
    sinks,
    loggers: [
      { category: ['logtape', 'meta'], lowestLevel: 'warning', sinks: sinkNames },
      { category: [ROOT_CATEGORY], lowestLevel: level, sinks: sinkNames },
    ],
  })
}

/**
 * @internal
 * Reset all logger state so `configureLogger` can be called again.
 * Intended for test teardown only.
 */
export async function resetLogger(): Promise<void> {
  await reset()
  configPromise = null
  configured = false
}

export { getLogger }
