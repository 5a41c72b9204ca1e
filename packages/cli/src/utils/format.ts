import type { EvaluationSummary, RegimeRanking } from '@metaeval/core'
import type { AgentPerformanceRecord, RegimeSnapshot, RotationDecision } from '@metaeval/shared'

const percent = (value: number, digits = 1): string => `${(value * 100).toFixed(digits)}%`

export function topAgentRows(summary: EvaluationSummary): string[][] {
  return [
    ['Rank', 'Agent', 'Score', 'Accuracy'],
    ...summary.topAgents.map(agent => [
      agent.rank.toString(),
      agent.agentId,
      agent.compositeScore.toFixed(3),
      percent(agent.accuracy),
    ]),
  ]
}

export function rotationRows(summary: EvaluationSummary): string[][] {
  return [
    ['Decision', 'From', 'To', 'Confidence', 'Created'],
    ...summary.recentRotations.map(rotation => [
      rotation.decisionId,
      rotation.fromAgent,
      rotation.toAgent,
      percent(rotation.confidence, 0),
      rotation.createdAt,
    ]),
  ]
}

export function performanceRows(records: readonly AgentPerformanceRecord[]): string[][] {
  return [
    ['Agent', 'Source', 'Accuracy', 'Sharpe', 'Win Rate', 'Response'],
    ...records.map(record => [
      record.agentId,
      record.source,
      percent(record.accuracy),
      record.sharpeRatio.toFixed(2),
      percent(record.winRate),
      `${record.responseTime.toFixed(2)}s`,
    ]),
  ]
}

export function rankingRows(rankings: readonly RegimeRanking[]): string[][] {
  return [
    ['Regime', 'Agents', 'Leader', 'Score', 'Fallback'],
    ...rankings.map(({ regime, rankings: rows, fallback }) => [
      regime,
      rows.length.toString(),
      rows[0]?.agentId ?? '-',
      rows[0]?.compositeScore.toFixed(3) ?? '-',
      fallback ? 'yes' : 'no',
    ]),
  ]
}

export function describeSnapshot(snapshot: RegimeSnapshot): string {
  const source = snapshot.fallback ? ' (fallback)' : ''
  return `${snapshot.regime} at ${percent(snapshot.confidence, 0)} confidence${source}, ` +
    `volatility ${snapshot.volatility.toFixed(3)}, trend ${snapshot.trendDirection}`
}

export function describeDecision(decision: RotationDecision): string {
  return `${decision.fromAgent} -> ${decision.toAgent} in ${decision.regime} ` +
    `(+${decision.expectedImprovement.toFixed(3)}, ${percent(decision.confidence, 0)} confidence)`
}
