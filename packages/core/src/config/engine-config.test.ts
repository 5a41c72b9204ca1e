import assert from 'node:assert/strict'
import { describe, it } from 'node:test'
import { ConfigValidationError, DEFAULT_ROSTER, loadEngineConfig } from './engine-config'

describe('loadEngineConfig', () => {
  it('should fill every default', () => {
    const config = loadEngineConfig({}, {})

    assert.equal(config.symbol, 'SPY')
    assert.equal(config.lookbackDays, 30)
    assert.equal(config.historyWindowDays, 7)
    assert.equal(config.historyLimit, 100)
    assert.equal(config.rankingWindowHours, 24)
    assert.equal(config.rotationThreshold, 0.1)
    assert.equal(config.providerTimeoutMs, 10_000)
    assert.deepEqual(config.roster, DEFAULT_ROSTER)
    assert.deepEqual(config.activeAgents, ['ForecastAgent', 'MomentumAgent', 'VolatilityAgent'])
    assert.deepEqual(config.regimes, ['bull', 'bear', 'neutral', 'volatile', 'trending'])
    assert.deepEqual(config.intervals, { performance: 60_000, ranking: 300_000, rotation: 600_000, regime: 120_000 })
    assert.deepEqual(config.summary, { topAgents: 10, recentRotations: 5, windowHours: 24 })
  })

  it('should default error delays to the intervals', () => {
    const config = loadEngineConfig({ intervals: { ranking: 5_000 }, errorDelays: { rotation: 1_000 } }, {})

    assert.equal(config.intervals.ranking, 5_000)
    assert.deepEqual(config.errorDelays, { performance: 60_000, ranking: 5_000, rotation: 1_000, regime: 120_000 })
  })

  it('should read the environment', () => {
    const config = loadEngineConfig({}, {
      METAEVAL_SYMBOL: 'QQQ',
      METAEVAL_SEED: '7',
      METAEVAL_PROVIDER_TIMEOUT_MS: '2500',
    })

    assert.equal(config.symbol, 'QQQ')
    assert.equal(config.seed, 7)
    assert.equal(config.providerTimeoutMs, 2_500)
  })

  it('should let overrides win over the environment', () => {
    const config = loadEngineConfig({ symbol: 'IWM' }, { METAEVAL_SYMBOL: 'QQQ' })

    assert.equal(config.symbol, 'IWM')
  })

  it('should reject a non-numeric seed', () => {
    assert.throws(() => loadEngineConfig({}, { METAEVAL_SEED: 'abc' }), ConfigValidationError)
  })

  it('should reject active agents outside the roster', () => {
    assert.throws(
      () => loadEngineConfig({ roster: ['A', 'B'], activeAgents: ['C'] }, {}),
      (error: unknown) => {
        assert.ok(error instanceof ConfigValidationError)
        assert.deepEqual(error.issues, ['activeAgents: Active agents must be part of the roster'])
        return true
      },
    )
  })

  it('should reject duplicate roster names', () => {
    assert.throws(
      () => loadEngineConfig({ roster: ['A', 'A'], activeAgents: [] }, {}),
      /roster: Roster agent names must be unique/,
    )
  })

  it('should reject an empty regime list', () => {
    assert.throws(() => loadEngineConfig({ regimes: [] }, {}), ConfigValidationError)
  })
})
