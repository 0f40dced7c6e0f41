/**
 * Database schema definitions for the trade ledger
 */

/**
 * SQL statements for creating database tables. Every statement is
 * create-if-absent so it can run on each process start.
 */
export const SCHEMA_STATEMENTS = {
  trades: `
    CREATE TABLE IF NOT EXISTS trades (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      timestamp TEXT,
      symbol TEXT,
      action TEXT,
      quantity INTEGER,
      price REAL,
      order_id TEXT
    )
  `,

  trades_indexes: [
    'CREATE INDEX IF NOT EXISTS idx_trades_timestamp ON trades(timestamp)',
    'CREATE INDEX IF NOT EXISTS idx_trades_symbol ON trades(symbol)',
  ],

  performance: `
    CREATE TABLE IF NOT EXISTS performance (
      date TEXT PRIMARY KEY,
      returns REAL,
      volatility REAL,
      max_drawdown REAL
    )
  `,
}

/**
 * Get all schema creation statements in order
 */
export function getAllSchemaStatements(): string[] {
  return [
    SCHEMA_STATEMENTS.trades,
    SCHEMA_STATEMENTS.performance,
    ...SCHEMA_STATEMENTS.trades_indexes,
  ]
}

/**
 * Schema version for tracking migrations
 */
export const CURRENT_SCHEMA_VERSION = 2
