import { type AgentPerformanceRecord, type EpochDate, toEpochDate } from '@metaeval/shared'
import assert from 'node:assert/strict'
import { beforeEach, describe, it } from 'node:test'
import { SimulatedTimeSource } from '../events/time-source'
import { NoopLogger } from '../utils/logger'
import { MockEvaluationStore } from './mock-evaluation-store'
import { deriveMetrics } from './performance-scorer'
import {
  buildFallbackRanking,
  computeCompositeScore,
  RankingEngine,
  rankPerformanceRecords,
} from './ranking-engine'
import { FixedEstimator, SeededEstimator } from './synthetic-estimator'

const NOW = toEpochDate(new Date('2026-04-01T12:00:00.000Z'))
const HOUR = 60 * 60 * 1000

function makeRecord(
  agentId: string,
  accuracy: number,
  overrides: Partial<AgentPerformanceRecord> = {},
): AgentPerformanceRecord {
  return {
    agentId,
    ...deriveMetrics(accuracy, 0.5, 1),
    regime: 'bull',
    timestamp: toEpochDate(NOW - HOUR),
    source: 'history',
    sampleSize: 10,
    ...overrides,
  }
}

describe('computeCompositeScore', () => {
  it('should blend the weighted metrics', () => {
    const score = computeCompositeScore({
      accuracy: 0.75,
      sharpeRatio: 1,
      totalReturn: 0.05,
      maxDrawdown: 0,
      winRate: 0.75,
      confidence: 0.5,
      responseTime: 1,
    })

    // 0.1875 + 0.2 + 0.01 + 0.1125 + 0.05 + 0.05
    assert.ok(Math.abs(score - 0.61) < 1e-12)
  })

  it('should favour the faster agent when everything else is equal', () => {
    const slow = computeCompositeScore(deriveMetrics(0.6, 0.5, 3))
    const fast = computeCompositeScore(deriveMetrics(0.6, 0.5, 0.2))

    assert.ok(fast > slow)
  })
})

describe('rankPerformanceRecords', () => {
  it('should return nothing for no records', () => {
    assert.deepEqual(rankPerformanceRecords([], 'bull', NOW), [])
  })

  it('should rank a single agent first', () => {
    const [only] = rankPerformanceRecords([makeRecord('A', 0.6)], 'bull', NOW)

    assert.equal(only?.rank, 1)
    assert.equal(only?.agentId, 'A')
    assert.equal(only?.timestamp, NOW)
  })

  it('should order by composite score, best first', () => {
    const rankings = rankPerformanceRecords(
      [makeRecord('A', 0.55), makeRecord('B', 0.8), makeRecord('C', 0.65)],
      'bull',
      NOW,
    )

    assert.deepEqual(rankings.map(r => [r.agentId, r.rank]), [['B', 1], ['C', 2], ['A', 3]])
  })

  it('should keep input order on ties', () => {
    const rankings = rankPerformanceRecords(
      [makeRecord('A', 0.6), makeRecord('B', 0.6), makeRecord('C', 0.6)],
      'bull',
      NOW,
    )

    assert.deepEqual(rankings.map(r => r.agentId), ['A', 'B', 'C'])
  })

  it('should keep only the newest record of each agent', () => {
    const rankings = rankPerformanceRecords(
      [makeRecord('A', 0.55), makeRecord('B', 0.7), makeRecord('A', 0.9)],
      'bull',
      NOW,
    )

    assert.equal(rankings.length, 2)
    assert.equal(rankings.find(r => r.agentId === 'A')?.metrics.accuracy, 0.55)
  })

  it('should mark rows not backed by history as synthetic', () => {
    const rankings = rankPerformanceRecords(
      [
        makeRecord('A', 0.6, { source: 'history' }),
        makeRecord('B', 0.6, { source: 'synthetic' }),
        makeRecord('C', 0.6, { source: 'default' }),
      ],
      'bull',
      NOW,
    )

    assert.deepEqual(rankings.map(r => r.synthetic), [false, true, true])
  })

  it('should produce sorted contiguous ranks for any number of agents', () => {
    const estimator = new SeededEstimator(11)

    for (let n = 1; n <= 12; n++) {
      const records = Array.from({ length: n }, (_, i) => makeRecord(`Agent${i}`, estimator.uniform(0, 1)))
      const rankings = rankPerformanceRecords(records, 'bull', NOW)

      assert.deepEqual(rankings.map(r => r.rank), Array.from({ length: n }, (_, i) => i + 1))
      for (let i = 1; i < rankings.length; i++) {
        assert.ok(rankings[i - 1].compositeScore >= rankings[i].compositeScore)
      }
    }
  })
})

describe('buildFallbackRanking', () => {
  it('should estimate every roster agent', () => {
    const rankings = buildFallbackRanking(['A', 'B', 'C'], 'neutral', new FixedEstimator([0, 0, 1, 1, 0.5, 0.5]), NOW)

    assert.deepEqual(rankings.map(r => [r.agentId, r.rank]), [['B', 1], ['C', 2], ['A', 3]])
    assert.equal(rankings[0].compositeScore, 0.8)
    assert.equal(rankings[0].metrics.responseTime, 2)
    assert.equal(rankings[2].compositeScore, 0.4)
    assert.equal(rankings[2].metrics.accuracy, 0.4)
    assert.equal(rankings[2].metrics.responseTime, 0.5)
    assert.ok(rankings.every(r => r.synthetic && r.regime === 'neutral'))
  })
})

describe('RankingEngine', () => {
  let store: MockEvaluationStore
  let engine: RankingEngine

  beforeEach(() => {
    store = new MockEvaluationStore()
    engine = new RankingEngine({
      store,
      estimator: new FixedEstimator(0.5),
      timeSource: new SimulatedTimeSource(NOW),
      logger: new NoopLogger(),
      roster: ['A', 'B', 'C', 'D'],
      rankingWindowHours: 24,
      timeoutMs: 1_000,
    })
  })

  it('should rank the records inside the window', async () => {
    const at = (hoursAgo: number): EpochDate => toEpochDate(NOW - hoursAgo * HOUR)
    await store.savePerformance(makeRecord('A', 0.6, { timestamp: at(2) }))
    await store.savePerformance(makeRecord('B', 0.7, { timestamp: at(1) }))
    await store.savePerformance(makeRecord('C', 0.9, { timestamp: at(25) }))
    await store.savePerformance(makeRecord('D', 0.9, { timestamp: at(1), regime: 'bear' }))

    const result = await engine.rank('bull')

    assert.equal(result.fallback, false)
    assert.equal(result.regime, 'bull')
    assert.deepEqual(result.rankings.map(r => r.agentId), ['B', 'A'])
  })

  it('should fall back to the estimated roster when there are no records', async () => {
    const result = await engine.rank('bear')

    assert.equal(result.fallback, true)
    assert.equal(result.rankings.length, 4)
    assert.ok(result.rankings.every(r => r.synthetic))
  })

  it('should fall back when the store cannot be read', async () => {
    await store.savePerformance(makeRecord('A', 0.6))
    store.shouldFailReads = true

    const result = await engine.rank('bull')

    assert.equal(result.fallback, true)
    assert.deepEqual(result.rankings.map(r => r.rank), [1, 2, 3, 4])
  })
})
