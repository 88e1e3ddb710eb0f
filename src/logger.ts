export type LogLevel = "debug" | "info" | "warn" | "error"

export type LogMeta = Record<string, unknown>

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
}

export function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LEVEL_ORDER, value)
}

export interface LoggerOptions {
  level?: LogLevel
  /** Output sink, defaults to the console method matching each level */
  write?: (level: LogLevel, line: string) => void
}

function writeToConsole(level: LogLevel, line: string): void {
  switch (level) {
    case "debug":
      console.debug(line)
      break
    case "info":
      console.log(line)
      break
    case "warn":
      console.warn(line)
      break
    case "error":
      console.error(line)
      break
  }
}

export class Logger {
  private level: LogLevel
  private write: (level: LogLevel, line: string) => void

  constructor(options: LoggerOptions = {}) {
    this.level = options.level ?? (process.env.NODE_ENV === "development" ? "debug" : "info")
    this.write = options.write ?? writeToConsole
  }

  private formatTimestamp(): string {
    return new Date().toISOString()
  }

  formatMessage(level: LogLevel, message: string, meta?: LogMeta): string {
    const timestamp = this.formatTimestamp()
    const metaStr = meta ? ` | ${JSON.stringify(meta)}` : ""
    return `[${timestamp}] ${level.toUpperCase()}: ${message}${metaStr}`
  }

  private log(level: LogLevel, message: string, meta?: LogMeta): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.level]) {
      return
    }
    this.write(level, this.formatMessage(level, message, meta))
  }

  info(message: string, meta?: LogMeta): void {
    this.log("info", message, meta)
  }

  warn(message: string, meta?: LogMeta): void {
    this.log("warn", message, meta)
  }

  error(message: string, meta?: LogMeta): void {
    this.log("error", message, meta)
  }

  debug(message: string, meta?: LogMeta): void {
    this.log("debug", message, meta)
  }
}
