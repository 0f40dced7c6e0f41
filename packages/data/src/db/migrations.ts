/**
 * Database migrations for SQLite
 */

import type Database from 'better-sqlite3'
import type { ConnectionManager } from './connection-manager'
import { getAllSchemaStatements } from './schema'

export interface Migration {
  readonly version: number
  readonly description: string
  readonly up: (db: Database.Database) => void
}

function hasColumn(db: Database.Database, table: string, column: string): boolean {
  const columns = db.prepare(`PRAGMA table_info(${table})`).all()
  return columns.some(info => typeof info === 'object' && info !== null && 'name' in info && info.name === column)
}

/**
 * List of all migrations
 */
export const MIGRATIONS: readonly Migration[] = [
  {
    version: 1,
    description: 'Initial schema',
    up: (db) => {
      for (const statement of getAllSchemaStatements()) {
        db.exec(statement)
      }
    },
  },
  {
    version: 2,
    description: 'Add realized profit to trades',
    up: (db) => {
      // Ledgers created before migrations were tracked may already carry the column
      if (!hasColumn(db, 'trades', 'profit')) {
        db.exec('ALTER TABLE trades ADD COLUMN profit REAL')
      }
    },
  },
]

/**
 * Migration runner for SQLite databases
 */
export class MigrationRunner {
  constructor(private readonly connectionManager: ConnectionManager) {}

  /**
   * Run all pending migrations
   */
  async migrate(): Promise<number[]> {
    const db = await this.connectionManager.getDatabase()

    db.exec(`
      CREATE TABLE IF NOT EXISTS migrations (
        version INTEGER PRIMARY KEY,
        description TEXT NOT NULL,
        applied_at INTEGER DEFAULT (strftime('%s', 'now') * 1000)
      )
    `)

    const currentVersion = this.getCurrentVersion(db)
    const pendingMigrations = MIGRATIONS.filter(m => m.version > currentVersion)

    for (const migration of pendingMigrations) {
      await this.runMigration(db, migration)
    }

    return pendingMigrations.map(m => m.version)
  }

  /**
   * Get migration status
   */
  async getStatus(): Promise<{
    currentVersion: number
    pendingMigrations: Migration[]
  }> {
    const db = await this.connectionManager.getDatabase()
    const currentVersion = this.getCurrentVersion(db)

    return {
      currentVersion,
      pendingMigrations: MIGRATIONS.filter(m => m.version > currentVersion),
    }
  }

  private getCurrentVersion(db: Database.Database): number {
    const table = db
      .prepare(`SELECT name FROM sqlite_master WHERE type = 'table' AND name = 'migrations'`)
      .get()
    if (!table) {
      return 0
    }

    const result = db.prepare('SELECT MAX(version) as version FROM migrations').get()
    if (result && typeof result === 'object' && 'version' in result && typeof result.version === 'number') {
      return result.version
    }
    return 0
  }

  private async runMigration(db: Database.Database, migration: Migration): Promise<void> {
    await this.connectionManager.transaction(() => {
      migration.up(db)

      db.prepare('INSERT INTO migrations (version, description) VALUES (?, ?)').run(
        migration.version,
        migration.description
      )
    })
  }
}
