import type { ConnectionManager } from '../db/connection-manager'
import type Database from 'better-sqlite3'

/**
 * Base repository class with common database operations
 */
export abstract class BaseRepository<T extends object> {
  protected abstract readonly tableName: string

  constructor(protected readonly connectionManager: ConnectionManager) {
  }

  /**
   * Insert a single record
   */
  protected async insert(data: Partial<T>): Promise<void> {
    const fields = Object.keys(data)
    const values = Object.values(data)
    const placeholders = fields.map(() => '?').join(', ')

    const sql = `INSERT INTO ${this.tableName} (${fields.join(', ')}) VALUES (${placeholders})`
    await this.connectionManager.execute(sql, values)
  }

  /**
   * Insert multiple records inside an open transaction
   */
  protected insertBatchSync(db: Database.Database, records: readonly Partial<T>[]): void {
    const firstRecord = records[0]
    if (!firstRecord) return

    const fields = Object.keys(firstRecord)
    const placeholders = fields.map(() => '?').join(', ')
    const stmt = db.prepare(`INSERT INTO ${this.tableName} (${fields.join(', ')}) VALUES (${placeholders})`)

    for (const record of records) {
      const row = new Map<string, unknown>(Object.entries(record))
      stmt.run(...fields.map(field => row.get(field)))
    }
  }

  /**
   * Update records
   */
  protected async update(
    data: Partial<T>,
    where: string,
    whereParams: readonly unknown[] = [],
  ): Promise<number> {
    const fields = Object.keys(data)
    const setClause = fields.map(field => `${field} = ?`).join(', ')
    const values = [...Object.values(data), ...whereParams]

    const sql = `UPDATE ${this.tableName} SET ${setClause} WHERE ${where}`
    return this.connectionManager.execute(sql, values)
  }

  /**
   * Delete records
   * @returns Number of rows deleted
   */
  protected async delete(where: string, params: readonly unknown[] = []): Promise<number> {
    const sql = `DELETE FROM ${this.tableName} WHERE ${where}`
    return this.connectionManager.execute(sql, params)
  }

  /**
   * Find one record
   */
  protected async findOne(where: string, params: readonly unknown[] = [], orderBy?: string): Promise<T | null> {
    let sql = `SELECT * FROM ${this.tableName} WHERE ${where}`
    if (orderBy) {
      sql += ` ORDER BY ${orderBy}`
    }
    const results = await this.connectionManager.query<T>(`${sql} LIMIT 1`, params)
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
      sql += ` LIMIT ${Math.floor(limit)}`
    }

    return this.connectionManager.query<T>(sql, params)
  }

  /**
   * Execute raw query
   */
  protected async query<R>(sql: string, params: readonly unknown[] = []): Promise<R[]> {
    return this.connectionManager.query<R>(sql, params)
  }

  /**
   * Execute in transaction
   */
  protected async transaction<R>(
    fn: (db: Database.Database) => R,
  ): Promise<R> {
    return this.connectionManager.transaction(fn)
  }
}
