/**
 * Console logger with the `[module] message` prefix used across the library.
 * The level and sink are global so tests can silence or capture output.
 */

export const LogLevel = { DEBUG: 0, INFO: 1, WARN: 2, ERROR: 3 } as const
export type LogLevel = (typeof LogLevel)[keyof typeof LogLevel]

export type LogSink = (level: LogLevel, ...args: unknown[]) => void

const defaultSink: LogSink = (level, ...args) => {
  const fn =
    level === LogLevel.DEBUG
      ? console.debug
      : level === LogLevel.INFO
        ? console.info
        : level === LogLevel.WARN
          ? console.warn
          : console.error
  fn(...args)
}

export function parseLogLevel(value: string | undefined): LogLevel | undefined {
  switch (value?.trim().toLowerCase()) {
    case 'debug': return LogLevel.DEBUG
    case 'info': return LogLevel.INFO
    case 'warn': return LogLevel.WARN
    case 'error': return LogLevel.ERROR
    default: return undefined
  }
}

let currentLevel: LogLevel = parseLogLevel(process.env.MEDIA_CHRONICLE_LOG_LEVEL) ?? LogLevel.WARN
let currentSink: LogSink = defaultSink

export class Logger {
  constructor(private readonly module: string) {}

  /** Messages below this level are dropped. */
  static setLevel(level: LogLevel): void {
    currentLevel = level
  }

  static getLevel(): LogLevel {
    return currentLevel
  }

  /** Pass `null` to restore console output. */
  static setSink(sink: LogSink | null): void {
    currentSink = sink ?? defaultSink
  }

  debug(message: string, ...args: unknown[]): void {
    if (currentLevel > LogLevel.DEBUG) return
    currentSink(LogLevel.DEBUG, `[${this.module}] ${message}`, ...args)
  }

  info(message: string, ...args: unknown[]): void {
    if (currentLevel > LogLevel.INFO) return
    currentSink(LogLevel.INFO, `[${this.module}] ${message}`, ...args)
  }

  warn(message: string, ...args: unknown[]): void {
    if (currentLevel > LogLevel.WARN) return
    currentSink(LogLevel.WARN, `[${this.module}] ${message}`, ...args)
  }

  error(message: string, ...args: unknown[]): void {
    currentSink(LogLevel.ERROR, `[${this.module}] ${message}`, ...args)
  }
}
