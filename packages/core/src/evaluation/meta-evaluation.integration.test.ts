import { toEpochDate } from '@metaeval/shared'
import type { MarketDataProvider, PredictionHistoryStore } from '@metaeval/types'
import assert from 'node:assert/strict'
import { beforeEach, describe, it } from 'node:test'
import { DEFAULT_ROSTER, loadEngineConfig } from '../config/engine-config'
import { EventBus } from '../events/event-bus'
import { SimulatedTimeSource } from '../events/time-source'
import type { CycleFailedEvent } from '../events/types'
import { NoopLogger } from '../utils/logger'
import { StaticActiveAgentSet } from './active-agents'
import { MetaEvaluationEngine } from './meta-evaluation-engine'
import { MockEvaluationStore } from './mock-evaluation-store'
import { SeededEstimator } from './synthetic-estimator'

const START = toEpochDate(new Date('2026-05-04T09:00:00.000Z'))
const MINUTE = 60 * 1000

const noHistory: PredictionHistoryStore = { getRecentPredictions: async () => [] }

describe('meta-evaluation end to end', () => {
  let store: MockEvaluationStore
  let timeSource: SimulatedTimeSource
  let failures: CycleFailedEvent[]

  function createEngine(marketData: MarketDataProvider, activeAgents: readonly string[]): MetaEvaluationEngine {
    const eventBus = new EventBus()
    eventBus.subscribe('cycle.failed', (event) => {
      failures.push(event)
    })
    return new MetaEvaluationEngine({
      config: loadEngineConfig({ activeAgents: [] }, {}),
      marketData,
      predictions: noHistory,
      store,
      activeAgents: new StaticActiveAgentSet(activeAgents),
      estimator: new SeededEstimator(2026),
      timeSource,
      eventBus,
      logger: new NoopLogger(),
    })
  }

  beforeEach(() => {
    store = new MockEvaluationStore()
    timeSource = new SimulatedTimeSource(START)
    failures = []
  })

  it('should rank the whole roster from synthetic records without deciding anything', async () => {
    const engine = createEngine({ getPriceHistory: async () => [] }, [])

    await engine.runRegimeRefresh()
    const records = await engine.runPerformanceCollection()
    const rankings = await engine.runRankingAnalysis()
    const decision = await engine.runRotationEvaluation()

    assert.equal(records.length, DEFAULT_ROSTER.length)
    assert.ok(records.every(r => r.source === 'synthetic' && r.sampleSize === 0))
    assert.ok(records.every(r => r.accuracy >= 0.4 && r.accuracy < 0.7))

    const neutral = rankings.find(r => r.regime === 'neutral')
    assert.equal(neutral?.fallback, false)
    assert.deepEqual(neutral?.rankings.map(r => r.rank), Array.from({ length: DEFAULT_ROSTER.length }, (_, i) => i + 1))
    assert.deepEqual(
      [...(neutral?.rankings.map(r => r.agentId) ?? [])].sort(),
      [...DEFAULT_ROSTER].sort(),
    )
    assert.ok(neutral?.rankings.every(r => r.synthetic))

    assert.equal(decision, null)
    assert.equal(store.decisions.length, 0)
    assert.deepEqual(failures, [])

    const summary = await engine.getSummary()
    assert.equal(summary.currentRegime, 'neutral')
    assert.equal(summary.regimeConfidence, 0.6)
    assert.equal(summary.topAgents.length, 10)
    assert.equal(summary.performanceSummary.totalAgents, DEFAULT_ROSTER.length)
    assert.deepEqual(summary.recentRotations, [])
  })

  it('should stay on the fallback regime and emit no rotation through an outage', async () => {
    const engine = createEngine({
      getPriceHistory: async () => {
        throw new Error('connection refused')
      },
    }, ['ForecastAgent', 'MomentumAgent', 'VolatilityAgent'])

    for (let round = 0; round < 3; round++) {
      const snapshot = await engine.runRegimeRefresh()
      assert.equal(snapshot.fallback, true)
      assert.equal(snapshot.regime, 'neutral')

      await engine.runPerformanceCollection()
      await engine.runRankingAnalysis()
      assert.equal(await engine.runRotationEvaluation(), null)

      timeSource.advance(10 * MINUTE)
    }

    assert.equal(store.snapshots.length, 3)
    assert.equal(store.decisions.length, 0)
    assert.ok(store.rankings.get('neutral')?.every(r => r.synthetic))
    assert.deepEqual(failures, [])
  })

  it('should answer the same summary twice in a row', async () => {
    const engine = createEngine({ getPriceHistory: async () => [] }, [])
    await engine.runRegimeRefresh()
    await engine.runPerformanceCollection()
    await engine.runRankingAnalysis()

    assert.deepEqual(await engine.getSummary(), await engine.getSummary())
  })
})
