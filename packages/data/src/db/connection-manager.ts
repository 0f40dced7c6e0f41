import { type Logger, NoopLogger } from '@tradeloop/shared'
import Database from 'better-sqlite3'
import fs from 'node:fs/promises'
import path from 'node:path'

/**
 * Configuration options for SQLite connection
 */
export interface SQLiteConfig {
  /** Path to the database file. Use ':memory:' for in-memory database */
  readonly databasePath: string
  /** Log every statement at debug level */
  readonly enableLogging?: boolean
  /** Enable WAL mode */
  readonly enableWAL?: boolean
  /** Busy timeout in milliseconds */
  readonly busyTimeout?: number
}

/**
 * Owns the single SQLite handle shared by the ledger and the risk manager.
 * Handles initialization, connection lifecycle and configuration.
 */
export class ConnectionManager {
  private db: Database.Database | null = null
  private readonly config: SQLiteConfig
  private readonly logger: Logger
  private isInitialized = false

  constructor(config: SQLiteConfig, logger: Logger = new NoopLogger()) {
    this.config = config
    this.logger = logger.child('sqlite')
  }

  /**
   * Initialize the database connection
   */
  async initialize(): Promise<void> {
    if (this.isInitialized) {
      return
    }

    try {
      // Ensure directory exists for file-based databases
      if (this.config.databasePath !== ':memory:') {
        await fs.mkdir(path.dirname(this.config.databasePath), { recursive: true })
      }

      const db = new Database(this.config.databasePath)

      if (this.config.enableWAL) {
        db.pragma('journal_mode = WAL')
      }

      if (this.config.busyTimeout) {
        db.pragma(`busy_timeout = ${this.config.busyTimeout}`)
      }

      this.db = db
      this.isInitialized = true

      this.logger.info('SQLite connection initialized', {
        databasePath: this.config.databasePath,
        inMemory: this.config.databasePath === ':memory:',
      })
    } catch (error) {
      this.isInitialized = false
      this.logger.error('SQLite connection initialization failed', { error })
      throw error
    }
  }

  /**
   * Get the database instance
   */
  async getDatabase(): Promise<Database.Database> {
    if (!this.isInitialized || !this.db) {
      await this.initialize()
    }

    if (!this.db) {
      throw new Error('Database not initialized')
    }

    return this.db
  }

  /**
   * Execute a query and return results
   */
  async query<T = unknown>(sql: string, params: readonly unknown[] = []): Promise<T[]> {
    const db = await this.getDatabase()

    try {
      const result = db.prepare(sql).all(...params)
      this.logStatement('Query executed', sql)
      return result as T[]
    } catch (error) {
      this.logger.error('Query error', { error, sql })
      throw error
    }
  }

  /**
   * Execute a statement without returning rows
   */
  async execute(sql: string, params: readonly unknown[] = []): Promise<Database.RunResult> {
    const db = await this.getDatabase()

    try {
      const result = db.prepare(sql).run(...params)
      this.logStatement('Statement executed', sql)
      return result
    } catch (error) {
      this.logger.error('Execute error', { error, sql })
      throw error
    }
  }

  /**
   * Execute multiple statements in a transaction
   * Note: SQLite transactions require synchronous functions
   */
  async transaction<T>(fn: (db: Database.Database) => T): Promise<T> {
    const db = await this.getDatabase()
    const transactionFn = db.transaction(() => fn(db))
    return transactionFn()
  }

  /**
   * Close the database connection
   */
  close(): void {
    if (!this.db) {
      return
    }

    this.db.close()
    this.db = null
    this.isInitialized = false

    this.logger.info('SQLite connection closed')
  }

  isConnected(): boolean {
    return this.isInitialized && this.db !== null && this.db.open
  }

  private logStatement(message: string, sql: string): void {
    if (this.config.enableLogging) {
      this.logger.debug(message, { sql })
    }
  }
}

/**
 * Helper function to create a connection manager with default config
 */
export function createConnectionManager(config: Partial<SQLiteConfig> = {}, logger?: Logger): ConnectionManager {
  const defaultConfig: SQLiteConfig = {
    databasePath: './data/trading.db',
    enableLogging: false,
    enableWAL: true,
    busyTimeout: 5000,
    ...config,
  }

  return new ConnectionManager(defaultConfig, logger)
}
