import {
  createLogger,
  CsvPriceHistoryProvider,
  type EngineConfig,
  MetaEvaluationEngine,
  RealTimeSource,
} from '@metaeval/core'
import { createEvaluationDatabase, type EvaluationDatabase } from '@metaeval/data'
import { loadCliConfig } from './config-loader'

/**
 * Options shared by every command
 */
export type GlobalOptions = {
  /** JSON file of engine overrides */
  config?: string
  /** SQLite database file */
  db?: string
  /** Directory of `<SYMBOL>.csv` price files */
  prices?: string
}

export interface EngineContext {
  readonly config: EngineConfig
  readonly database: EvaluationDatabase
  readonly engine: MetaEvaluationEngine
  close(): void
}

/**
 * Open the database, seed the active set on first use and wire the engine to both
 */
export async function createEngineContext(options: GlobalOptions): Promise<EngineContext> {
  const config = await loadCliConfig(options.config)
  const timeSource = new RealTimeSource()

  const database = await createEvaluationDatabase(
    { databasePath: options.db ?? process.env.SQLITE_PATH ?? './data/metaeval.db', enableWAL: true },
    { logger: createLogger('database'), now: () => timeSource.nowEpoch() },
  )

  try {
    await database.activeAgents.seed(config.activeAgents, timeSource.nowEpoch())
  } catch (error) {
    database.close()
    throw error
  }

  const engine = new MetaEvaluationEngine({
    config,
    marketData: new CsvPriceHistoryProvider({
      directory: options.prices ?? process.env.PRICES_DIR ?? './data/prices',
      timeSource,
      logger: createLogger('market-data'),
    }),
    predictions: database.predictions,
    store: database,
    activeAgents: database.activeAgents,
    timeSource,
    logger: createLogger('engine'),
  })

  return {
    config,
    database,
    engine,
    close: () => database.close(),
  }
}
