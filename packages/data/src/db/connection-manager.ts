import type { Logger } from '@metaeval/types'
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
  /** Enable WAL mode so readers don't block the cycle that is writing */
  readonly enableWAL?: boolean
  /** Busy timeout in milliseconds */
  readonly busyTimeout?: number
  readonly logger?: Logger
}

/**
 * Connection manager for SQLite database
 * Handles database initialization, connection lifecycle, and configuration
 */
export class ConnectionManager {
  private db: Database.Database | null = null
  private readonly config: SQLiteConfig
  private isInitialized = false

  constructor(config: SQLiteConfig) {
    this.config = config
  }

  /**
   * Initialize the database connection
   */
  async initialize(): Promise<void> {
    if (this.isInitialized) {
      return
    }

    try {
      if (this.config.databasePath !== ':memory:') {
        const dir = path.dirname(this.config.databasePath)
        await fs.mkdir(dir, { recursive: true })
      }

      const db = new Database(this.config.databasePath, {
        verbose: this.config.enableLogging
          ? (message?: unknown) => this.config.logger?.debug('SQL', { statement: message })
          : undefined,
      })

      if (this.config.enableWAL) {
        db.pragma('journal_mode = WAL')
      }

      if (this.config.busyTimeout) {
        db.pragma(`busy_timeout = ${this.config.busyTimeout}`)
      }

      db.pragma('foreign_keys = ON')

      this.db = db
      this.isInitialized = true

      this.config.logger?.info('SQLite connection initialized', {
        databasePath: this.config.databasePath,
        inMemory: this.config.databasePath === ':memory:',
      })
    } catch (error) {
      this.isInitialized = false
      this.config.logger?.error('SQLite connection initialization failed', {
        databasePath: this.config.databasePath,
        error,
      })
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
    return db.prepare<unknown[], T>(sql).all(...params)
  }

  /**
   * Execute a statement without returning results
   * @returns Number of rows changed
   */
  async execute(sql: string, params: readonly unknown[] = []): Promise<number> {
    const db = await this.getDatabase()
    return db.prepare(sql).run(...params).changes
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

    this.config.logger?.info('SQLite connection closed')
  }

  /**
   * Check if the database is connected
   */
  isConnected(): boolean {
    return this.isInitialized && this.db !== null && this.db.open
  }

  /**
   * Get table names and row counts
   */
  async getStats(): Promise<{
    readonly sizeBytes: number | null
    readonly tables: string[]
    readonly rowCounts: Record<string, number>
  }> {
    let sizeBytes: number | null = null
    if (this.config.databasePath !== ':memory:') {
      try {
        sizeBytes = (await fs.stat(this.config.databasePath)).size
      } catch (error) {
        this.config.logger?.warn('Could not stat database file', { error })
      }
    }

    const tables = await this.query<{ name: string }>(`
      SELECT name
      FROM sqlite_master
      WHERE type = 'table'
      AND name NOT LIKE 'sqlite_%'
      ORDER BY name
    `)

    const rowCounts: Record<string, number> = {}
    for (const table of tables) {
      const result = await this.query<{ count: number }>(`SELECT COUNT(*) as count FROM ${table.name}`)
      rowCounts[table.name] = result[0]?.count ?? 0
    }

    return { sizeBytes, tables: tables.map(t => t.name), rowCounts }
  }
}

/**
 * Helper function to create a connection manager with default config
 */
export function createConnectionManager(config: Partial<SQLiteConfig> = {}): ConnectionManager {
  const defaultConfig: SQLiteConfig = {
    databasePath: process.env.SQLITE_PATH || './data/metaeval.db',
    enableLogging: process.env.NODE_ENV === 'development',
    enableWAL: true,
    busyTimeout: 5000,
    ...config,
  }

  return new ConnectionManager(defaultConfig)
}
