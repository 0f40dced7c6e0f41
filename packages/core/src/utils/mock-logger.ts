import type { Logger } from '@tradeloop/shared'

export interface LogEntry {
  readonly level: 'debug' | 'info' | 'warn' | 'error'
  readonly message: string
  readonly context?: Record<string, unknown>
}

/**
 * Logger that keeps every entry in memory for assertions
 */
export class MockLogger implements Logger {
  constructor(readonly entries: LogEntry[] = []) {}

  debug(message: string, context?: Record<string, unknown>): void {
    this.entries.push({ level: 'debug', message, context })
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.entries.push({ level: 'info', message, context })
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.entries.push({ level: 'warn', message, context })
  }

  error(message: string, context?: Record<string, unknown>): void {
    this.entries.push({ level: 'error', message, context })
  }

  /** Children share the parent's entries */
  child(_component: string): Logger {
    return new MockLogger(this.entries)
  }

  messages(level: LogEntry['level']): string[] {
    return this.entries.filter(e => e.level === level).map(e => e.message)
  }
}
