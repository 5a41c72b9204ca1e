import { type EpochDate, toEpochDate } from '@metaeval/shared'
import assert from 'node:assert/strict'
import { afterEach, beforeEach, describe, it } from 'node:test'
import { createConnectionManager, type ConnectionManager } from '../db/connection-manager'
import { initializeDatabase } from '../db/database'
import { PredictionRepository } from './prediction-repository'

const at = (iso: string): EpochDate => toEpochDate(new Date(iso))
const NOW = at('2026-03-10T00:00:00.000Z')

describe('PredictionRepository', () => {
  let connectionManager: ConnectionManager
  let repository: PredictionRepository

  beforeEach(async () => {
    connectionManager = createConnectionManager({ databasePath: ':memory:' })
    await connectionManager.initialize()
    await initializeDatabase(connectionManager)
    repository = new PredictionRepository(connectionManager, () => NOW)
  })

  afterEach(() => {
    connectionManager.close()
  })

  it('should return resolved predictions in the window, newest first', async () => {
    await repository.recordPrediction({
      agentId: 'ForecastAgent',
      predictedDirection: 'up',
      actualDirection: 'up',
      confidence: 0.8,
      timestamp: at('2026-03-08T00:00:00.000Z'),
    })
    await repository.recordPrediction({
      agentId: 'ForecastAgent',
      symbol: 'BTC-USD',
      predictedDirection: 'down',
      actualDirection: 'up',
      confidence: 0.6,
      timestamp: at('2026-03-09T00:00:00.000Z'),
    })
    await repository.recordPrediction({
      agentId: 'ForecastAgent',
      predictedDirection: 'up',
      actualDirection: 'up',
      confidence: 0.9,
      timestamp: at('2026-02-01T00:00:00.000Z'),
    })
    await repository.recordPrediction({
      agentId: 'MomentumAgent',
      predictedDirection: 'up',
      actualDirection: 'down',
      confidence: 0.7,
      timestamp: at('2026-03-09T00:00:00.000Z'),
    })

    const predictions = await repository.getRecentPredictions('ForecastAgent', 30, 100)

    assert.deepEqual(predictions, [
      {
        confidence: 0.6,
        predictedDirection: 'down',
        actualDirection: 'up',
        timestamp: at('2026-03-09T00:00:00.000Z'),
      },
      {
        confidence: 0.8,
        predictedDirection: 'up',
        actualDirection: 'up',
        timestamp: at('2026-03-08T00:00:00.000Z'),
      },
    ])
  })

  it('should leave out unresolved predictions until they are resolved', async () => {
    const timestamp = at('2026-03-09T06:00:00.000Z')
    await repository.recordPrediction({ agentId: 'RiskAgent', predictedDirection: 'neutral', confidence: 0.5, timestamp })

    assert.equal((await repository.getRecentPredictions('RiskAgent', 30, 100)).length, 0)

    assert.equal(await repository.resolvePrediction('RiskAgent', timestamp, 'neutral'), 1)
    assert.equal(await repository.resolvePrediction('RiskAgent', timestamp, 'up'), 0)

    const predictions = await repository.getRecentPredictions('RiskAgent', 30, 100)
    assert.equal(predictions.length, 1)
    assert.equal(predictions[0]?.actualDirection, 'neutral')
  })

  it('should honor the limit', async () => {
    for (let day = 1; day <= 5; day++) {
      await repository.recordPrediction({
        agentId: 'ForecastAgent',
        predictedDirection: 'up',
        actualDirection: 'down',
        confidence: 0.5,
        timestamp: at(`2026-03-0${day}T00:00:00.000Z`),
      })
    }

    const predictions = await repository.getRecentPredictions('ForecastAgent', 30, 3)
    assert.deepEqual(predictions.map(p => p.timestamp), [
      at('2026-03-05T00:00:00.000Z'),
      at('2026-03-04T00:00:00.000Z'),
      at('2026-03-03T00:00:00.000Z'),
    ])
  })

  it('should reject a confidence outside [0, 1]', async () => {
    await assert.rejects(repository.recordPrediction({
      agentId: 'ForecastAgent',
      predictedDirection: 'up',
      confidence: 1.2,
      timestamp: NOW,
    }))
  })

  it('should delete predictions older than the cutoff', async () => {
    await repository.recordPrediction({
      agentId: 'ForecastAgent',
      predictedDirection: 'up',
      actualDirection: 'up',
      confidence: 0.5,
      timestamp: at('2026-01-01T00:00:00.000Z'),
    })

    assert.equal(await repository.cleanup(at('2026-02-01T00:00:00.000Z')), 1)
  })
})
