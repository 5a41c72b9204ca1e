import { type EpochDate, type RotationDecision, toEpochDate } from '@metaeval/shared'
import assert from 'node:assert/strict'
import { afterEach, beforeEach, describe, it } from 'node:test'
import { createConnectionManager, type ConnectionManager } from '../db/connection-manager'
import { initializeDatabase } from '../db/database'
import { RotationRepository } from './rotation-repository'

const at = (iso: string): EpochDate => toEpochDate(new Date(iso))

function makeDecision(decisionId: string, timestamp: EpochDate): RotationDecision {
  return {
    decisionId,
    fromAgent: 'SentimentAgent',
    toAgent: 'RiskAgent',
    reason: 'Performance improvement: 20.00%',
    confidence: 0.4,
    expectedImprovement: 0.2,
    regime: 'volatile',
    timestamp,
    applied: false,
    appliedAt: null,
  }
}

describe('RotationRepository', () => {
  let connectionManager: ConnectionManager
  let repository: RotationRepository

  beforeEach(async () => {
    connectionManager = createConnectionManager({ databasePath: ':memory:' })
    await connectionManager.initialize()
    await initializeDatabase(connectionManager)
    repository = new RotationRepository(connectionManager)
  })

  afterEach(() => {
    connectionManager.close()
  })

  it('should save and find a decision', async () => {
    const decision = makeDecision('rotation_20260301_120000_000', at('2026-03-01T12:00:00.000Z'))
    await repository.save(decision)

    assert.deepEqual(await repository.findById(decision.decisionId), decision)
    assert.equal(await repository.findById('rotation_missing'), null)
  })

  it('should list the newest decisions first', async () => {
    await repository.save(makeDecision('rotation_20260301_100000_000', at('2026-03-01T10:00:00.000Z')))
    await repository.save(makeDecision('rotation_20260301_120000_000', at('2026-03-01T12:00:00.000Z')))
    await repository.save(makeDecision('rotation_20260301_110000_000', at('2026-03-01T11:00:00.000Z')))

    const recent = await repository.getRecent(2)
    assert.deepEqual(recent.map(d => d.decisionId), [
      'rotation_20260301_120000_000',
      'rotation_20260301_110000_000',
    ])
  })

  it('should reject a duplicate decision id', async () => {
    const decision = makeDecision('rotation_20260301_120000_000', at('2026-03-01T12:00:00.000Z'))
    await repository.save(decision)

    await assert.rejects(repository.save(decision))
  })

  it('should mark a decision applied inside a transaction', async () => {
    await repository.save(makeDecision('rotation_20260301_120000_000', at('2026-03-01T12:00:00.000Z')))
    const appliedAt = at('2026-03-01T12:05:00.000Z')

    await connectionManager.transaction((db) => {
      repository.markAppliedSync(db, 'rotation_20260301_120000_000', appliedAt)
    })

    const stored = await repository.findById('rotation_20260301_120000_000')
    assert.equal(stored?.applied, true)
    assert.equal(stored?.appliedAt, appliedAt)
  })

  it('should delete decisions older than the cutoff', async () => {
    await repository.save(makeDecision('rotation_20260101_000000_000', at('2026-01-01T00:00:00.000Z')))
    await repository.save(makeDecision('rotation_20260301_000000_000', at('2026-03-01T00:00:00.000Z')))

    assert.equal(await repository.cleanup(at('2026-02-01T00:00:00.000Z')), 1)
    assert.equal((await repository.getRecent(10)).length, 1)
  })
})
