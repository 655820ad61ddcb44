/**
 * Design decisions:
 * - Logging goes to a file by default, one file per process under the runtime directory
 * - The console only sees info/warn/error, so interactive output stays clean
 * - Set DEBUG=1 to mirror debug lines to the console
 */

import chalk from 'chalk'
import { appendFileSync, existsSync, mkdirSync, readdirSync, statSync } from 'node:fs'
import { join } from 'node:path'
import { configuration } from '@/configuration'

type ConsoleLevel = 'debug' | 'info' | 'warn' | 'error'

function createTimestampForFilename(date: Date = new Date()): string {
  return date.toLocaleString('sv-SE', {
    timeZone: Intl.DateTimeFormat().resolvedOptions().timeZone,
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
    hour: '2-digit',
    minute: '2-digit',
    second: '2-digit',
  }).replace(/[: ]/g, '-').replace(/,/g, '')
}

function createTimestampForLogEntry(date: Date = new Date()): string {
  return date.toLocaleTimeString('en-US', {
    hour12: false,
    hour: '2-digit',
    minute: '2-digit',
    second: '2-digit',
    fractionalSecondDigits: 3,
  })
}

function createLogFilePath(): string {
  const suffix = configuration.isDaemonProcess ? '-daemon' : ''
  return join(configuration.logsDir, `${createTimestampForFilename()}-pid-${process.pid}${suffix}.log`)
}

export function formatLogArgument(arg: unknown): string {
  if (arg instanceof Error) {
    return arg.stack ?? `${arg.name}: ${arg.message}`
  }
  if (typeof arg === 'string') {
    return arg
  }
  try {
    return JSON.stringify(arg)
  } catch {
    return String(arg)
  }
}

/**
 * Shortens long strings and arrays so a whole snapshot fits on a few lines
 */
function truncateForLog(value: unknown, maxStringLength: number, maxArrayLength: number): unknown {
  if (typeof value === 'string') {
    return value.length > maxStringLength
      ? `${value.slice(0, maxStringLength)}... [truncated ${value.length - maxStringLength} chars]`
      : value
  }
  if (Array.isArray(value)) {
    const items = value.slice(0, maxArrayLength).map((item) => truncateForLog(item, maxStringLength, maxArrayLength))
    if (value.length > maxArrayLength) {
      items.push(`... [truncated ${value.length - maxArrayLength} items]`)
    }
    return items
  }
  if (value && typeof value === 'object') {
    const result: Record<string, unknown> = {}
    for (const [key, entry] of Object.entries(value)) {
      result[key] = truncateForLog(entry, maxStringLength, maxArrayLength)
    }
    return result
  }
  return value
}

class Logger {
  private logsDirReady = false

  constructor(public readonly logFilePath: string = createLogFilePath()) {}

  debug(message: string, ...args: unknown[]): void {
    this.logToFile(`[${createTimestampForLogEntry()}]`, message, ...args)
    if (process.env.DEBUG) {
      this.logToConsole('debug', '', message, ...args)
    }
  }

  debugLargeJson(message: string, object: unknown, maxStringLength: number = 100, maxArrayLength: number = 10): void {
    if (!process.env.DEBUG) {
      this.debug(message, truncateForLog(object, maxStringLength, maxArrayLength))
      return
    }
    this.debug(message, object)
  }

  info(message: string, ...args: unknown[]): void {
    this.logToConsole('info', '', message, ...args)
    this.logToFile(`[${createTimestampForLogEntry()}]`, message, ...args)
  }

  warn(message: string, ...args: unknown[]): void {
    this.logToConsole('warn', '', message, ...args)
    this.logToFile(`[${createTimestampForLogEntry()}] [WARN]`, message, ...args)
  }

  error(message: string, ...args: unknown[]): void {
    this.logToConsole('error', '', message, ...args)
    this.logToFile(`[${createTimestampForLogEntry()}] [ERROR]`, message, ...args)
  }

  private logToConsole(level: ConsoleLevel, prefix: string, message: string, ...args: unknown[]): void {
    const line = [prefix, message, ...args.map(formatLogArgument)].filter(Boolean).join(' ')
    switch (level) {
      case 'debug':
        console.log(chalk.gray(line))
        break
      case 'info':
        console.log(line)
        break
      case 'warn':
        console.log(chalk.yellow(line))
        break
      case 'error':
        console.error(chalk.red(line))
        break
    }
  }

  private logToFile(prefix: string, message: string, ...args: unknown[]): void {
    const line = `${prefix} ${message} ${args.map(formatLogArgument).join(' ')}`.trimEnd() + '\n'
    try {
      if (!this.logsDirReady) {
        mkdirSync(configuration.logsDir, { recursive: true })
        this.logsDirReady = true
      }
      appendFileSync(this.logFilePath, line)
    } catch (error) {
      // Only surfaced while debugging
      if (process.env.DEBUG) {
        console.error('[DEV] Failed to write to log file:', error)
        console.error(line)
      }
    }
  }
}

export const logger = new Logger()

/**
 * Most recent daemon log file, used by `daemon status` and `doctor`
 */
export function getLatestDaemonLog(): { path: string; modified: Date } | null {
  if (!existsSync(configuration.logsDir)) {
    return null
  }
  const candidates = readdirSync(configuration.logsDir)
    .filter((file) => file.endsWith('-daemon.log'))
    .map((file) => {
      const path = join(configuration.logsDir, file)
      return { path, modified: statSync(path).mtime }
    })
    .sort((a, b) => b.modified.getTime() - a.modified.getTime())
  return candidates[0] ?? null
}
