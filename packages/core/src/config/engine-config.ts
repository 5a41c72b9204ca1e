import { MARKET_REGIMES } from '@metaeval/shared'
import { z } from 'zod/v4'

/**
 * Milliseconds per periodic cycle
 */
const cycleMsSchema = z.object({
  performance: z.number().int().positive(),
  ranking: z.number().int().positive(),
  rotation: z.number().int().positive(),
  regime: z.number().int().positive(),
})

/**
 * Engine configuration schema
 * @property symbol - Market symbol the regime is read from
 * @property lookbackDays - Days of price history the classifier reads
 * @property historyWindowDays - Days of predictions the scorer reads
 * @property historyLimit - Most recent predictions the scorer reads
 * @property rankingWindowHours - Age limit of the records a ranking considers
 * @property rotationThreshold - Composite score gap a rotation must exceed
 * @property roster - Every agent that is evaluated
 * @property activeAgents - Agents deployed when the persisted set is empty
 * @property regimes - Regimes ranked by the ranking cycle
 * @property intervals - Sleep between successful iterations, per cycle
 * @property errorDelays - Sleep after a failed iteration, per cycle
 * @property providerTimeoutMs - Bound on every provider and store call
 * @property seed - Seed of the synthetic estimator
 */
const engineConfigObject = z.object({
  symbol: z.string().min(1),
  lookbackDays: z.number().int().min(2).max(3_650),
  historyWindowDays: z.number().int().positive(),
  historyLimit: z.number().int().positive(),
  rankingWindowHours: z.number().positive(),
  rotationThreshold: z.number().min(0).max(1),
  roster: z.array(z.string().min(1)).min(1),
  activeAgents: z.array(z.string().min(1)),
  regimes: z.array(z.enum(MARKET_REGIMES)).min(1),
  intervals: cycleMsSchema,
  errorDelays: cycleMsSchema,
  providerTimeoutMs: z.number().int().positive(),
  seed: z.number().int(),
  summary: z.object({
    topAgents: z.number().int().positive(),
    recentRotations: z.number().int().positive(),
    windowHours: z.number().positive(),
  }),
})

export const engineConfigSchema = engineConfigObject
  .refine(data => data.roster.length === new Set(data.roster).size, {
    message: 'Roster agent names must be unique',
    path: ['roster'],
  })
  .refine(data => data.activeAgents.every(agent => data.roster.includes(agent)), {
    message: 'Active agents must be part of the roster',
    path: ['activeAgents'],
  })

/**
 * Partial configuration as read from a file; nested groups may be partial too
 */
export const engineConfigOverridesSchema = engineConfigObject
  .extend({
    intervals: cycleMsSchema.partial(),
    errorDelays: cycleMsSchema.partial(),
    summary: engineConfigObject.shape.summary.partial(),
  })
  .partial()
  .strict()

export type EngineConfig = z.infer<typeof engineConfigSchema>
export type CycleDurations = z.infer<typeof cycleMsSchema>

export type EngineConfigOverrides = Partial<Omit<EngineConfig, 'intervals' | 'errorDelays' | 'summary'>> & {
  readonly intervals?: Partial<CycleDurations>
  readonly errorDelays?: Partial<CycleDurations>
  readonly summary?: Partial<EngineConfig['summary']>
}

export const DEFAULT_ROSTER: readonly string[] = [
  'ForecastAgent',
  'MomentumAgent',
  'VolatilityAgent',
  'SentimentAgent',
  'RiskAgent',
  'CorrelationAgent',
  'StrategyAgent',
  'RLStrategyAgent',
  'EventImpactAgent',
  'DayForecastAgent',
]

export const DEFAULT_ACTIVE_AGENTS: readonly string[] = ['ForecastAgent', 'MomentumAgent', 'VolatilityAgent']

const DEFAULT_INTERVALS: CycleDurations = {
  performance: 60_000,
  ranking: 300_000,
  rotation: 600_000,
  regime: 120_000,
}

/**
 * Raised when a configuration does not pass the schema
 */
export class ConfigValidationError extends Error {
  constructor(readonly issues: readonly string[]) {
    super(`Invalid engine configuration: ${issues.join('; ')}`)
    this.name = 'ConfigValidationError'
  }
}

/**
 * Build the engine configuration from defaults, then environment, then overrides
 * @throws ConfigValidationError
 */
export function loadEngineConfig(
  overrides: EngineConfigOverrides = {},
  env: NodeJS.ProcessEnv = process.env,
): EngineConfig {
  const intervals = { ...DEFAULT_INTERVALS, ...overrides.intervals }

  const candidate = {
    symbol: env.METAEVAL_SYMBOL || 'SPY',
    lookbackDays: 30,
    historyWindowDays: 7,
    historyLimit: 100,
    rankingWindowHours: 24,
    rotationThreshold: 0.1,
    roster: [...DEFAULT_ROSTER],
    activeAgents: [...DEFAULT_ACTIVE_AGENTS],
    regimes: [...MARKET_REGIMES],
    providerTimeoutMs: env.METAEVAL_PROVIDER_TIMEOUT_MS ? Number(env.METAEVAL_PROVIDER_TIMEOUT_MS) : 10_000,
    seed: env.METAEVAL_SEED ? Number(env.METAEVAL_SEED) : 42,
    ...overrides,
    intervals,
    errorDelays: { ...intervals, ...overrides.errorDelays },
    summary: { topAgents: 10, recentRotations: 5, windowHours: 24, ...overrides.summary },
  }

  const result = engineConfigSchema.safeParse(candidate)
  if (!result.success) {
    throw new ConfigValidationError(
      result.error.issues.map(issue => `${issue.path.map(String).join('.') || '(root)'}: ${issue.message}`),
    )
  }
  return result.data
}
