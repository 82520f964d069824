import { createWriteStream, mkdirSync, existsSync } from 'fs'
import { join } from 'path'
import type { WriteStream } from 'fs'

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent'

const LOG_FILE = 'ppf-reader.log'
const RANK: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3, silent: 4 }

let stream: WriteStream | null = null
let logDir = ''
let threshold: LogLevel = 'info'

function ts(): string { return new Date().toISOString().slice(11, 23) }

function enabled(level: LogLevel): boolean {
  return RANK[level] >= RANK[threshold]
}

export function initLogger(dir: string): void {
  closeLogger()
  logDir = dir
  if (!existsSync(logDir)) mkdirSync(logDir, { recursive: true })
  const file = createWriteStream(join(logDir, LOG_FILE), { flags: 'w' })
  file.on('error', err => {
    console.error(`${ts()} [ERROR] log file unavailable: ${err.message}`)
    if (stream === file) stream = null
  })
  stream = file
  stream.write(`=== ppf-reader started ${new Date().toISOString()} ===\n`)
}

export function closeLogger(): void {
  stream?.end()
  stream = null
}

export function setLogLevel(level: LogLevel): void {
  threshold = level
}

export function getLogLevel(): LogLevel {
  return threshold
}

function write(level: string, msg: string): void {
  stream?.write(`${ts()} [${level}] ${msg}\n`)
}

export function debug(msg: string): void {
  if (!enabled('debug')) return
  console.debug(`${ts()} [DEBUG] ${msg}`)
  write('DEBUG', msg)
}

export function log(msg: string): void {
  if (!enabled('info')) return
  console.log(`${ts()} ${msg}`)
  write('INFO', msg)
}

export function warn(msg: string): void {
  if (!enabled('warn')) return
  console.warn(`${ts()} [WARN] ${msg}`)
  write('WARN', msg)
}

export function error(msg: string, err?: unknown): void {
  if (!enabled('error')) return
  const detail = err ? ` ${err instanceof Error ? err.stack || err.message : String(err)}` : ''
  console.error(`${ts()} [ERROR] ${msg}${detail}`)
  write('ERROR', `${msg}${detail}`)
}

export function getLogPath(): string {
  return logDir ? join(logDir, LOG_FILE) : ''
}
