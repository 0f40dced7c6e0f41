import { type Logger, NoopLogger } from '@tradeloop/shared'
import { PerformanceRepository } from '../repositories/performance-repository'
import { TradeRepository } from '../repositories/trade-repository'
import { type ConnectionManager, createConnectionManager, type SQLiteConfig } from './connection-manager'
import { MigrationRunner } from './migrations'

export interface DatabaseOptions extends Partial<SQLiteConfig> {
  /** Timezone whose calendar date defines a trading day */
  readonly timeZone: string
}

/**
 * Database instance with all repositories. Owns the one connection the
 * ledger and the risk manager share.
 */
export class Database {
  readonly connectionManager: ConnectionManager
  readonly migrationRunner: MigrationRunner
  readonly trades: TradeRepository
  readonly performance: PerformanceRepository
  private readonly logger: Logger

  constructor(options: DatabaseOptions, logger: Logger = new NoopLogger()) {
    const { timeZone, ...sqliteConfig } = options
    this.logger = logger.child('database')
    this.connectionManager = createConnectionManager(sqliteConfig, logger)
    this.migrationRunner = new MigrationRunner(this.connectionManager)

    this.trades = new TradeRepository(this.connectionManager, { timeZone })
    this.performance = new PerformanceRepository(this.connectionManager)
  }

  /**
   * Open the connection and apply pending migrations. Safe to call on every
   * start; existing rows are never touched.
   */
  async initialize(): Promise<void> {
    try {
      await this.connectionManager.initialize()
      const applied = await this.migrationRunner.migrate()
      const { currentVersion } = await this.migrationRunner.getStatus()

      this.logger.info('Database initialized successfully', {
        appliedMigrations: applied,
        schemaVersion: currentVersion,
      })
    } catch (error) {
      this.logger.error('Database initialization failed', { error })
      throw error
    }
  }

  close(): void {
    this.connectionManager.close()
  }
}

/**
 * Create and initialize a database instance
 */
export async function createDatabase(options: DatabaseOptions, logger?: Logger): Promise<Database> {
  const db = new Database(options, logger)
  await db.initialize()
  return db
}
