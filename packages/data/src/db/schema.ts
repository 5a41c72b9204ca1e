/**
 * Database schema definitions for the evaluation store
 */

const REGIME_CHECK = "regime IN ('bull', 'bear', 'neutral', 'volatile', 'trending')"

/**
 * SQL statements for creating database tables
 */
export const SCHEMA_STATEMENTS = {
  meta_agent_performance: `
    CREATE TABLE IF NOT EXISTS meta_agent_performance (
      id INTEGER PRIMARY KEY,
      agent_name TEXT NOT NULL,

      accuracy REAL NOT NULL CHECK (accuracy >= 0 AND accuracy <= 1),
      sharpe_ratio REAL NOT NULL,
      total_return REAL NOT NULL,
      max_drawdown REAL NOT NULL CHECK (max_drawdown >= 0),
      win_rate REAL NOT NULL CHECK (win_rate >= 0 AND win_rate <= 1),
      confidence REAL NOT NULL CHECK (confidence >= 0 AND confidence <= 1),
      response_time REAL NOT NULL CHECK (response_time > 0),

      regime TEXT NOT NULL CHECK (${REGIME_CHECK}),
      source TEXT NOT NULL CHECK (source IN ('history', 'synthetic', 'default')),
      sample_size INTEGER NOT NULL DEFAULT 0,
      created_at TEXT NOT NULL
    )
  `,

  meta_agent_performance_indexes: [
    'CREATE INDEX IF NOT EXISTS idx_performance_regime_created ON meta_agent_performance(regime, created_at)',
    'CREATE INDEX IF NOT EXISTS idx_performance_agent ON meta_agent_performance(agent_name)',
    'CREATE INDEX IF NOT EXISTS idx_performance_created ON meta_agent_performance(created_at)',
  ],

  meta_agent_rankings: `
    CREATE TABLE IF NOT EXISTS meta_agent_rankings (
      id INTEGER PRIMARY KEY,
      agent_name TEXT NOT NULL,
      regime TEXT NOT NULL CHECK (${REGIME_CHECK}),
      rank INTEGER NOT NULL CHECK (rank >= 1),
      composite_score REAL NOT NULL,

      accuracy REAL NOT NULL,
      sharpe_ratio REAL NOT NULL,
      total_return REAL NOT NULL,
      max_drawdown REAL NOT NULL,
      win_rate REAL NOT NULL,
      confidence REAL NOT NULL,
      response_time REAL NOT NULL,

      synthetic INTEGER NOT NULL DEFAULT 0,
      created_at TEXT NOT NULL,
      UNIQUE(regime, rank)
    )
  `,

  meta_agent_rankings_indexes: [
    'CREATE INDEX IF NOT EXISTS idx_rankings_regime_rank ON meta_agent_rankings(regime, rank)',
  ],

  meta_rotation_decisions: `
    CREATE TABLE IF NOT EXISTS meta_rotation_decisions (
      decision_id TEXT PRIMARY KEY,
      from_agent TEXT NOT NULL,
      to_agent TEXT NOT NULL,
      reason TEXT NOT NULL,
      confidence REAL NOT NULL CHECK (confidence >= 0 AND confidence <= 1),
      expected_improvement REAL NOT NULL,
      regime TEXT NOT NULL CHECK (${REGIME_CHECK}),
      is_applied INTEGER NOT NULL DEFAULT 0,
      applied_at TEXT,
      created_at TEXT NOT NULL
    )
  `,

  meta_rotation_decisions_indexes: [
    'CREATE INDEX IF NOT EXISTS idx_rotations_created ON meta_rotation_decisions(created_at)',
    'CREATE INDEX IF NOT EXISTS idx_rotations_from_agent ON meta_rotation_decisions(from_agent)',
  ],

  meta_regime_analysis: `
    CREATE TABLE IF NOT EXISTS meta_regime_analysis (
      id INTEGER PRIMARY KEY,
      regime TEXT NOT NULL CHECK (${REGIME_CHECK}),
      confidence REAL NOT NULL CHECK (confidence >= 0 AND confidence <= 1),
      volatility REAL NOT NULL,
      trend_strength REAL NOT NULL,
      volume_ratio REAL NOT NULL,
      trend_direction TEXT NOT NULL CHECK (trend_direction IN ('up', 'down', 'neutral')),
      market_indicators TEXT NOT NULL,
      is_fallback INTEGER NOT NULL DEFAULT 0,
      created_at TEXT NOT NULL
    )
  `,

  meta_regime_analysis_indexes: [
    'CREATE INDEX IF NOT EXISTS idx_regime_analysis_created ON meta_regime_analysis(created_at)',
  ],

  agent_signals: `
    CREATE TABLE IF NOT EXISTS agent_signals (
      id INTEGER PRIMARY KEY,
      agent_name TEXT NOT NULL,
      symbol TEXT,
      predicted_direction TEXT NOT NULL CHECK (predicted_direction IN ('up', 'down', 'neutral')),
      actual_direction TEXT CHECK (actual_direction IN ('up', 'down', 'neutral')),
      confidence REAL NOT NULL CHECK (confidence >= 0 AND confidence <= 1),
      timestamp TEXT NOT NULL
    )
  `,

  agent_signals_indexes: [
    'CREATE INDEX IF NOT EXISTS idx_signals_agent_time ON agent_signals(agent_name, timestamp)',
  ],

  active_agents: `
    CREATE TABLE IF NOT EXISTS active_agents (
      agent_name TEXT PRIMARY KEY,
      activated_at TEXT NOT NULL
    )
  `,
}

/**
 * Get all schema statements in creation order
 */
export function getAllSchemaStatements(): string[] {
  return [
    SCHEMA_STATEMENTS.meta_agent_performance,
    SCHEMA_STATEMENTS.meta_agent_rankings,
    SCHEMA_STATEMENTS.meta_rotation_decisions,
    SCHEMA_STATEMENTS.meta_regime_analysis,
    SCHEMA_STATEMENTS.agent_signals,
    SCHEMA_STATEMENTS.active_agents,

    ...SCHEMA_STATEMENTS.meta_agent_performance_indexes,
    ...SCHEMA_STATEMENTS.meta_agent_rankings_indexes,
    ...SCHEMA_STATEMENTS.meta_rotation_decisions_indexes,
    ...SCHEMA_STATEMENTS.meta_regime_analysis_indexes,
    ...SCHEMA_STATEMENTS.agent_signals_indexes,
  ]
}

