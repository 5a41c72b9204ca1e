import { type AgentRanking, type EpochDate, toEpochDate } from '@metaeval/shared'
import assert from 'node:assert/strict'
import { afterEach, beforeEach, describe, it } from 'node:test'
import { createConnectionManager, type ConnectionManager } from '../db/connection-manager'
import { initializeDatabase } from '../db/database'
import { RankingRepository } from './ranking-repository'

const at = (iso: string): EpochDate => toEpochDate(new Date(iso))

function makeRanking(agentId: string, rank: number, compositeScore: number, synthetic = false): AgentRanking {
  return {
    agentId,
    regime: 'neutral',
    rank,
    compositeScore,
    metrics: {
      accuracy: 0.6,
      sharpeRatio: 0.4,
      totalReturn: 0.02,
      maxDrawdown: 0,
      winRate: 0.6,
      confidence: 0.55,
      responseTime: 1.5,
    },
    synthetic,
    timestamp: at('2026-03-01T12:00:00.000Z'),
  }
}

describe('RankingRepository', () => {
  let connectionManager: ConnectionManager
  let repository: RankingRepository

  beforeEach(async () => {
    connectionManager = createConnectionManager({ databasePath: ':memory:' })
    await connectionManager.initialize()
    await initializeDatabase(connectionManager)
    repository = new RankingRepository(connectionManager)
  })

  afterEach(() => {
    connectionManager.close()
  })

  it('should store a ranking set ordered by rank', async () => {
    const rankings = [makeRanking('A', 2, 0.5), makeRanking('B', 1, 0.7, true)]
    await repository.replace('neutral', rankings)

    const stored = await repository.getByRegime('neutral')
    assert.deepEqual(stored, [rankings[1], rankings[0]])
  })

  it('should supersede the previous set of the same regime', async () => {
    await repository.replace('neutral', [makeRanking('A', 1, 0.7), makeRanking('B', 2, 0.5), makeRanking('C', 3, 0.3)])
    await repository.replace('neutral', [makeRanking('C', 1, 0.9)])

    const stored = await repository.getByRegime('neutral')
    assert.deepEqual(stored.map(r => r.agentId), ['C'])
  })

  it('should keep other regimes untouched', async () => {
    await repository.replace('bull', [{ ...makeRanking('A', 1, 0.7), regime: 'bull' }])
    await repository.replace('neutral', [makeRanking('B', 1, 0.6)])
    await repository.replace('neutral', [])

    assert.equal((await repository.getByRegime('bull')).length, 1)
    assert.equal((await repository.getByRegime('neutral')).length, 0)
  })

  it('should honor the limit', async () => {
    await repository.replace('neutral', [makeRanking('A', 1, 0.7), makeRanking('B', 2, 0.5), makeRanking('C', 3, 0.3)])

    const stored = await repository.getByRegime('neutral', 2)
    assert.deepEqual(stored.map(r => r.rank), [1, 2])
  })

  it('should keep the old set when a replacement fails', async () => {
    await repository.replace('neutral', [makeRanking('A', 1, 0.7)])

    await assert.rejects(repository.replace('neutral', [makeRanking('B', 1, 0.8), makeRanking('C', 1, 0.6)]))

    const stored = await repository.getByRegime('neutral')
    assert.deepEqual(stored.map(r => r.agentId), ['A'])
  })
})
