import fs from 'node:fs'
import path from 'node:path'

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const

export type LogLevel = typeof LOG_LEVELS[number]
export type LogMeta = Record<string, unknown> | undefined

export interface LoggerOptions {
  level: LogLevel
  /** One line per entry, mirrored to the console. */
  summaryPath?: string
  /** Entries with pretty-printed metadata once it outgrows one line. */
  detailPath?: string
}

export interface Logger {
  debug: (message: string, meta?: LogMeta) => void
  info: (message: string, meta?: LogMeta) => void
  warn: (message: string, meta?: LogMeta) => void
  error: (message: string, meta?: LogMeta) => void
  child: (scope: string) => Logger
}

const consoleWriters: Record<LogLevel, (line: string) => void> = {
  debug: line => console.log(line),
  info: line => console.log(line),
  warn: line => console.warn(line),
  error: line => console.error(line),
}

const PRETTY_THRESHOLD = 200

let minimumRank = LOG_LEVELS.indexOf('info')
let summaryStream: fs.WriteStream | null = null
let detailStream: fs.WriteStream | null = null

async function openStream(filePath: string | undefined): Promise<fs.WriteStream | null> {
  if (!filePath) return null
  await fs.promises.mkdir(path.dirname(filePath), { recursive: true })
  return fs.createWriteStream(filePath, { flags: 'a' })
}

export async function configureLogger(options: LoggerOptions): Promise<void> {
  minimumRank = LOG_LEVELS.indexOf(options.level)
  closeLogger()
  summaryStream = await openStream(options.summaryPath)
  detailStream = await openStream(options.detailPath)
}

export function closeLogger(): void {
  summaryStream?.end()
  detailStream?.end()
  summaryStream = null
  detailStream = null
}

/** Own enumerable fields (url, status, field...) are kept next to name and message. */
function serializeError(error: Error): Record<string, unknown> {
  const fields: Record<string, unknown> = {}
  for (const [key, value] of Object.entries(error)) {
    if (key !== 'cause') fields[key] = value
  }
  return {
    name: error.name,
    message: error.message,
    ...fields,
    stack: error.stack,
    cause: error.cause instanceof Error ? serializeError(error.cause) : error.cause,
  }
}

function stringifyMeta(meta: Record<string, unknown>, indent: number): string {
  const seen = new WeakSet<object>()
  return JSON.stringify(meta, (_key: string, value: unknown) => {
    if (value instanceof Uint8Array) return `<${value.byteLength} bytes>`
    if (typeof value === 'object' && value !== null) {
      if (seen.has(value)) return '[Circular]'
      seen.add(value)
    }
    return value instanceof Error ? serializeError(value) : value
  }, indent)
}

function formatEntry(level: LogLevel, scope: string | undefined, message: string, meta: LogMeta) {
  const head = `[${new Date().toISOString()}] [${level}]${scope ? ` [${scope}]` : ''} ${message}`
  if (!meta || Object.keys(meta).length === 0) {
    return { summary: head, detail: head }
  }

  const compact = stringifyMeta(meta, 0)
  const summary = `${head} | ${compact}`
  if (compact.length <= PRETTY_THRESHOLD && !compact.includes('\\n')) {
    return { summary, detail: summary }
  }
  const pretty = stringifyMeta(meta, 2).replaceAll('\n', '\n  ')
  return { summary, detail: `${head}\n  ${pretty}` }
}

function write(level: LogLevel, scope: string | undefined, message: string, meta?: LogMeta): void {
  if (LOG_LEVELS.indexOf(level) < minimumRank) return
  const entry = formatEntry(level, scope, message, meta)
  consoleWriters[level](entry.summary)
  summaryStream?.write(`${entry.summary}\n`)
  detailStream?.write(`${entry.detail}\n`)
}

export function createLogger(scope?: string): Logger {
  return {
    debug: (message, meta) => write('debug', scope, message, meta),
    info: (message, meta) => write('info', scope, message, meta),
    warn: (message, meta) => write('warn', scope, message, meta),
    error: (message, meta) => write('error', scope, message, meta),
    child: childScope => createLogger(scope ? `${scope}:${childScope}` : childScope),
  }
}

export const logger = createLogger()
