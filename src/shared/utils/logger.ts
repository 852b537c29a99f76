/**
 * Console logger with level tags. Components take a scoped logger through
 * `logger.scope('Name')` so every line they write carries `[Name]`.
 */

type LogMethod = (...args: unknown[]) => void

export interface ScopedLogger {
  debug: LogMethod
  info: LogMethod
  warn: LogMethod
  error: LogMethod
}

class Logger {
  private isDev = process.env.NODE_ENV === 'development'

  /** Enabled by `MONITOR_DEBUG` through the monitor config */
  setDebug(enabled: boolean): void {
    this.isDev = enabled
  }

  isDebugEnabled(): boolean {
    return this.isDev
  }

  scope(component: string): ScopedLogger {
    const tag = `[${component}]`
    return {
      debug: (...args) => this.debug(tag, ...args),
      info: (...args) => this.info(tag, ...args),
      warn: (...args) => this.warn(tag, ...args),
      error: (...args) => this.error(tag, ...args)
    }
  }

  debug(...args: unknown[]): void {
    if (this.isDev) {
      console.debug('[DEBUG]', ...args)
    }
  }

  info(...args: unknown[]): void {
    console.info('[INFO]', ...args)
  }

  warn(...args: unknown[]): void {
    console.warn('[WARN]', ...args)
  }

  error(...args: unknown[]): void {
    console.error('[ERROR]', ...args)
  }
}

export const logger = new Logger()
