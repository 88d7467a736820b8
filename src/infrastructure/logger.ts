import { appendFileSync, mkdirSync, existsSync } from 'node:fs'
import { dirname } from 'node:path'

// Empty LOG_FILE disables the file sink (tests run that way)
const LOG_PATH = process.env.LOG_FILE ?? './data/monitor.log'

if (LOG_PATH) {
  const dir = dirname(LOG_PATH)
  if (!existsSync(dir)) mkdirSync(dir, { recursive: true })
}

function ts() {
  return new Date().toLocaleString()
}

let fileSinkBroken = false

function writeToFile(level: string, line: string) {
  if (!LOG_PATH || fileSinkBroken) return
  try {
    appendFileSync(LOG_PATH, `[${ts()}] ${level} ${line}\n`)
  } catch (err) {
    fileSinkBroken = true
    console.error(`[ERROR][logger] Cannot write ${LOG_PATH}, file logging disabled:`, err)
  }
}

// ── Structured logger with level filtering ────────────────────────────────────

export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 }

function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LEVEL_ORDER, value)
}

const envLevel = (process.env.LOG_LEVEL ?? 'info').toLowerCase()
const currentLevel: LogLevel = isLogLevel(envLevel) ? envLevel : 'info'

function shouldLog(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[currentLevel]
}

function render(value: unknown): string {
  if (value instanceof Error) {
    const cause = value.cause !== undefined ? ` (cause: ${render(value.cause)})` : ''
    return `${value.name}: ${value.message}${cause}`
  }
  if (typeof value === 'object' && value !== null) return JSON.stringify(value)
  return String(value)
}

function fmt(args: unknown[]): string {
  return args.map(render).join(' ')
}

export const logger = {
  debug(tag: string, msg: string, ...rest: unknown[]): void {
    if (!shouldLog('debug')) return
    const line = `[DEBUG][${tag}] ${msg}${rest.length ? ' ' + fmt(rest) : ''}`
    console.log(line)
    writeToFile('DEBUG', line)
  },
  info(tag: string, msg: string, ...rest: unknown[]): void {
    if (!shouldLog('info')) return
    const line = `[${tag}] ${msg}${rest.length ? ' ' + fmt(rest) : ''}`
    console.log(line)
    writeToFile('INFO ', line)
  },
  warn(tag: string, msg: string, ...rest: unknown[]): void {
    if (!shouldLog('warn')) return
    const line = `[WARN][${tag}] ${msg}${rest.length ? ' ' + fmt(rest) : ''}`
    console.warn(line)
    writeToFile('WARN ', line)
  },
  error(tag: string, msg: string, ...rest: unknown[]): void {
    if (!shouldLog('error')) return
    const line = `[ERROR][${tag}] ${msg}${rest.length ? ' ' + fmt(rest) : ''}`
    console.error(line)
    writeToFile('ERROR', line)
  },
}
