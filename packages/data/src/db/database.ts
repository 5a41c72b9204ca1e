import type { Logger } from '@metaeval/types'
import type { ConnectionManager } from './connection-manager'
import { getAllSchemaStatements } from './schema'

const TABLES = [
  'meta_agent_performance',
  'meta_agent_rankings',
  'meta_rotation_decisions',
  'meta_regime_analysis',
  'agent_signals',
  'active_agents',
]

/**
 * Initialize the database with all required tables and indexes
 */
export async function initializeDatabase(connectionManager: ConnectionManager, logger?: Logger): Promise<void> {
  const statements = getAllSchemaStatements()

  try {
    await connectionManager.transaction((db) => {
      for (const statement of statements) {
        db.exec(statement)
      }
    })

    logger?.info('Database schema initialized successfully', {
      tablesCreated: statements.filter(s => s.includes('CREATE TABLE')).length,
      indexesCreated: statements.filter(s => s.includes('CREATE INDEX')).length,
    })
  } catch (error) {
    logger?.error('Database initialization failed', { error })
    throw error
  }
}

/**
 * Drop all tables from the database
 */
export async function dropAllTables(connectionManager: ConnectionManager, logger?: Logger): Promise<void> {
  try {
    await connectionManager.transaction((db) => {
      for (const table of TABLES) {
        db.exec(`DROP TABLE IF EXISTS ${table}`)
      }
    })

    logger?.info('All database tables dropped successfully')
  } catch (error) {
    logger?.warn('Dropping database tables failed', { error })
    throw error
  }
}
