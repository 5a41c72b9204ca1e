import { type Direction, type EpochDate, epochDateNow, isDirection, isoToEpoch } from '@metaeval/shared'
import ora from 'ora'
import { createEngineContext, type GlobalOptions } from '../engine-factory'
import { reportFailure } from '../utils/errors'

interface RecordPredictionOptions {
  confidence: string
  actual?: string
  at?: string
  symbol?: string
}

function parseDirection(value: string, label: string): Direction {
  if (!isDirection(value)) {
    throw new Error(`${label} must be up, down or neutral, got ${value}`)
  }
  return value
}

function parseTimestamp(value: string | undefined): EpochDate {
  if (value === undefined) {
    return epochDateNow()
  }
  const timestamp = isoToEpoch(value)
  if (Number.isNaN(timestamp)) {
    throw new Error(`Invalid timestamp: ${value}`)
  }
  return timestamp
}

/**
 * Store a prediction an agent made, optionally with its outcome
 */
export async function recordPrediction(
  agentId: string,
  direction: string,
  options: RecordPredictionOptions,
  globals: GlobalOptions,
): Promise<void> {
  const spinner = ora(`Recording prediction for ${agentId}...`).start()

  try {
    const predictedDirection = parseDirection(direction, 'Direction')
    const actualDirection = options.actual === undefined ? null : parseDirection(options.actual, '--actual')
    const confidence = Number(options.confidence)
    if (!Number.isFinite(confidence) || confidence < 0 || confidence > 1) {
      throw new Error(`--confidence must be between 0 and 1, got ${options.confidence}`)
    }
    const timestamp = parseTimestamp(options.at)

    const context = await createEngineContext(globals)
    try {
      if (!context.config.roster.includes(agentId)) {
        throw new Error(`${agentId} is not in the roster`)
      }
      await context.database.predictions.recordPrediction({
        agentId,
        symbol: options.symbol ?? context.config.symbol,
        predictedDirection,
        actualDirection,
        confidence,
        timestamp,
      })
      spinner.succeed(`Recorded ${predictedDirection} for ${agentId}${actualDirection ? ` (actual ${actualDirection})` : ''}`)
    } finally {
      context.close()
    }
  } catch (error) {
    reportFailure(spinner, 'Prediction not recorded', error)
  }
}

/**
 * Fill in the observed direction of an agent's open prediction
 */
export async function resolvePrediction(
  agentId: string,
  at: string,
  direction: string,
  globals: GlobalOptions,
): Promise<void> {
  const spinner = ora(`Resolving prediction for ${agentId}...`).start()

  try {
    const actualDirection = parseDirection(direction, 'Direction')
    const timestamp = parseTimestamp(at)

    const context = await createEngineContext(globals)
    try {
      const resolved = await context.database.predictions.resolvePrediction(agentId, timestamp, actualDirection)
      if (resolved === 0) {
        spinner.warn(`No open prediction for ${agentId} at ${at}`)
      } else {
        spinner.succeed(`Resolved ${resolved} prediction${resolved === 1 ? '' : 's'} as ${actualDirection}`)
      }
    } finally {
      context.close()
    }
  } catch (error) {
    reportFailure(spinner, 'Prediction not resolved', error)
  }
}
