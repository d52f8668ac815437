export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

export interface LogEntry {
  level: LogLevel
  category: string
  message: string
  data?: unknown
  timestamp: Date
}

const LEVELS: LogLevel[] = ['debug', 'info', 'warn', 'error']

const LEVEL_COLORS: Record<LogLevel, string> = {
  debug: '\x1b[90m',  // gray
  info: '\x1b[36m',   // cyan
  warn: '\x1b[33m',   // yellow
  error: '\x1b[31m',  // red
}

const RESET = '\x1b[0m'

export function isLogLevel(value: unknown): value is LogLevel {
  return LEVELS.some((level) => level === value)
}

function describeData(data: unknown): string {
  if (typeof data === 'string') return data
  if (data instanceof Error) return data.stack ?? `${data.name}: ${data.message}`
  return JSON.stringify(data, null, 2)
}

class Logger {
  private minLevel: LogLevel = 'info'
  private entries: LogEntry[] = []
  private maxEntries = 1000
  private sink: (line: string) => void = (line) => process.stderr.write(`${line}\n`)

  setLevel(level: LogLevel): void {
    this.minLevel = level
  }

  getLevel(): LogLevel {
    return this.minLevel
  }

  /** Replace where formatted lines go. Entries are recorded regardless. */
  setSink(sink: (line: string) => void): void {
    this.sink = sink
  }

  private shouldLog(level: LogLevel): boolean {
    return LEVELS.indexOf(level) >= LEVELS.indexOf(this.minLevel)
  }

  private formatMessage(entry: LogEntry): string {
    const color = LEVEL_COLORS[entry.level]
    const time = entry.timestamp.toISOString().slice(11, 23)
    const levelPad = entry.level.toUpperCase().padEnd(5)

    let msg = `${color}[${time}] ${levelPad}${RESET} [${entry.category}] ${entry.message}`

    if (entry.data !== undefined) {
      msg += `\n${describeData(entry.data)}`
    }

    return msg
  }

  private log(level: LogLevel, category: string, message: string, data?: unknown): void {
    const entry: LogEntry = {
      level,
      category,
      message,
      data,
      timestamp: new Date(),
    }

    this.entries.push(entry)
    if (this.entries.length > this.maxEntries) {
      this.entries.shift()
    }

    if (this.shouldLog(level)) {
      this.sink(this.formatMessage(entry))
    }
  }

  debug(category: string, message: string, data?: unknown): void {
    this.log('debug', category, message, data)
  }

  info(category: string, message: string, data?: unknown): void {
    this.log('info', category, message, data)
  }

  warn(category: string, message: string, data?: unknown): void {
    this.log('warn', category, message, data)
  }

  error(category: string, message: string, data?: unknown): void {
    this.log('error', category, message, data)
  }

  getEntries(filter?: { level?: LogLevel; category?: string; limit?: number }): LogEntry[] {
    let filtered = this.entries

    if (filter?.level) {
      filtered = filtered.filter(e => e.level === filter.level)
    }

    if (filter?.category) {
      filtered = filtered.filter(e => e.category === filter.category)
    }

    if (filter?.limit) {
      filtered = filtered.slice(-filter.limit)
    }

    return filtered
  }
}

export const log = new Logger()
