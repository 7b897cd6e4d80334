// Debug logging utility for commit-digest
// Keeps a bounded buffer for the TUI debug panel, notifies subscribers,
// and can append to a per-process log file or mirror to the console

import { existsSync, mkdirSync, appendFileSync } from 'fs'
import { join } from 'path'
import { getLogsDir } from '../config/paths.ts'

export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

export type LogEntry = {
  timestamp: Date
  level: LogLevel
  message: string
  data?: unknown
}

type LogSubscriber = (entry: LogEntry) => void

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
}

/**
 * Filename-safe timestamp: YYYY-MM-DD_HH-MM-SS
 */
export function formatFileTimestamp(date: Date): string {
  const pad = (n: number) => n.toString().padStart(2, '0')
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}_${pad(date.getHours())}-${pad(date.getMinutes())}-${pad(date.getSeconds())}`
}

function serializeData(data: unknown): string {
  try {
    return JSON.stringify(data, null, 2) ?? String(data)
  } catch {
    return '[Data not serializable]'
  }
}

export function formatLogEntry(entry: LogEntry): string {
  const timestamp = entry.timestamp.toISOString()
  const level = entry.level.toUpperCase().padEnd(5)
  let line = `[${timestamp}] ${level} ${entry.message}`

  if (entry.data !== undefined) {
    const indented = serializeData(entry.data)
      .split('\n')
      .map((l) => `    ${l}`)
      .join('\n')
    line += `\n${indented}`
  }

  return line
}

export class DebugLogger {
  private subscribers: Set<LogSubscriber> = new Set()
  private logs: LogEntry[] = []
  private maxLogs = 100
  private _enabled = false
  private _consoleLevel: LogLevel | null = null

  private _fileLoggingEnabled = false
  private _startTime: Date
  private _logFilePath: string | null = null
  private _logsDir: string

  constructor(logsDir: string = getLogsDir()) {
    this._startTime = new Date()
    this._logsDir = logsDir
  }

  get enabled(): boolean {
    return this._enabled
  }

  get logFilePath(): string | null {
    return this._logFilePath
  }

  /**
   * Keep entries in memory and notify subscribers (TUI debug panel).
   */
  setEnabled(enabled: boolean): void {
    this._enabled = enabled
  }

  /**
   * Mirror entries at or above `level` to stdout/stderr. Used by `serve`.
   */
  enableConsole(level: LogLevel = 'info'): void {
    this._consoleLevel = level
  }

  /**
   * Create a log file for this process under ~/.commit-digest/logs
   */
  enableFileLogging(): void {
    if (this._fileLoggingEnabled) return

    try {
      if (!existsSync(this._logsDir)) {
        mkdirSync(this._logsDir, { recursive: true })
      }

      this._logFilePath = join(this._logsDir, `run_${formatFileTimestamp(this._startTime)}.log`)

      const header = [
        '='.repeat(80),
        'COMMIT-DIGEST LOG',
        `Started: ${this._startTime.toISOString()}`,
        '='.repeat(80),
        '',
      ].join('\n')

      appendFileSync(this._logFilePath, header + '\n')
      this._fileLoggingEnabled = true
      this.info('File logging enabled', { logFile: this._logFilePath })
    } catch (err) {
      // Logging must never stop the app
      console.error('Failed to enable file logging:', err)
    }
  }

  private writeToFile(entry: LogEntry): void {
    if (!this._fileLoggingEnabled || !this._logFilePath) return

    try {
      appendFileSync(this._logFilePath, formatLogEntry(entry) + '\n')
    } catch (err) {
      this._fileLoggingEnabled = false
      console.error('Disabling file logging after write failure:', err)
    }
  }

  private writeToConsole(entry: LogEntry): void {
    if (this._consoleLevel === null) return
    if (LEVEL_ORDER[entry.level] < LEVEL_ORDER[this._consoleLevel]) return

    const line = formatLogEntry(entry)
    if (entry.level === 'error' || entry.level === 'warn') {
      console.error(line)
    } else {
      console.log(line)
    }
  }

  subscribe(callback: LogSubscriber): () => void {
    this.subscribers.add(callback)
    return () => {
      this.subscribers.delete(callback)
    }
  }

  getLogs(): LogEntry[] {
    return [...this.logs]
  }

  clear(): void {
    this.logs = []
  }

  private log(level: LogLevel, message: string, data?: unknown): void {
    const entry: LogEntry = {
      timestamp: new Date(),
      level,
      message,
      data,
    }

    this.writeToFile(entry)
    this.writeToConsole(entry)

    if (!this._enabled) return

    this.logs.push(entry)
    if (this.logs.length > this.maxLogs) {
      this.logs = this.logs.slice(-this.maxLogs)
    }

    for (const subscriber of this.subscribers) {
      subscriber(entry)
    }
  }

  debug(message: string, data?: unknown): void {
    this.log('debug', message, data)
  }

  info(message: string, data?: unknown): void {
    this.log('info', message, data)
  }

  warn(message: string, data?: unknown): void {
    this.log('warn', message, data)
  }

  error(message: string, data?: unknown): void {
    this.log('error', message, data)
  }
}

// Singleton instance
export const debugLog = new DebugLogger()
