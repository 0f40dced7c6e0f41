import type { ConnectionManager } from '../db/connection-manager'

/**
 * Base repository class with common database operations
 */
export abstract class BaseRepository<T extends object> {
  protected abstract readonly tableName: string

  constructor(protected readonly connectionManager: ConnectionManager) {}

  /**
   * Insert a single record and return its rowid
   */
  protected async insert(data: Partial<T>): Promise<number> {
    const fields = Object.keys(data)
    const values = Object.values(data)
    const placeholders = fields.map(() => '?').join(', ')

    const sql = `INSERT INTO ${this.tableName} (${fields.join(', ')}) VALUES (${placeholders})`
    const result = await this.connectionManager.execute(sql, values)
    return Number(result.lastInsertRowid)
  }

  /**
   * Find one record
   */
  protected async findOne(where: string, params: readonly unknown[] = []): Promise<T | null> {
    const sql = `SELECT * FROM ${this.tableName} WHERE ${where} LIMIT 1`
    const results = await this.connectionManager.query<T>(sql, params)
    return results[0] ?? null
  }

  /**
   * Find multiple records
   */
  protected async findMany(
    where?: string,
    params: readonly unknown[] = [],
    orderBy?: string,
    limit?: number,
  ): Promise<T[]> {
    let sql = `SELECT * FROM ${this.tableName}`

    if (where) {
      sql += ` WHERE ${where}`
    }

    if (orderBy) {
      sql += ` ORDER BY ${orderBy}`
    }

    if (limit) {
      sql += ` LIMIT ${limit}`
    }

    return this.connectionManager.query<T>(sql, params)
  }

  /**
   * Count records
   */
  protected async count(where?: string, params: readonly unknown[] = []): Promise<number> {
    let sql = `SELECT COUNT(*) as count FROM ${this.tableName}`

    if (where) {
      sql += ` WHERE ${where}`
    }

    const results = await this.connectionManager.query<{ count: number }>(sql, params)
    return results[0]?.count ?? 0
  }
}
