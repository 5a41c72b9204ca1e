import type {
  AgentPerformanceRecord,
  RegimeSnapshot,
  RotationDecision,
} from '@metaeval/shared'
import type {
  ActiveAgentSet,
  EvaluationStore,
  Logger,
  MarketDataProvider,
  PredictionHistoryStore,
} from '@metaeval/types'
import type { EngineConfig } from '../config/engine-config'
import { EventBus } from '../events/event-bus'
import { RealTimeSource, type TimeSource } from '../events/time-source'
import { CYCLE_NAMES, type CycleName, EventTypes } from '../events/types'
import { createLogger, describeError } from '../utils/logger'
import { withTimeout } from '../utils/with-timeout'
import { PerformanceScorer } from './performance-scorer'
import { PeriodicCycle } from './periodic-cycle'
import { RankingEngine, type RegimeRanking } from './ranking-engine'
import { RegimeClassifier } from './regime-classifier'
import { RotationDecisionEngine } from './rotation-engine'
import { type EvaluationSummary, SummaryAssembler } from './summary-assembler'
import { SeededEstimator, type SyntheticEstimator } from './synthetic-estimator'

export interface MetaEvaluationEngineDependencies {
  readonly config: EngineConfig
  readonly marketData: MarketDataProvider
  readonly predictions: PredictionHistoryStore
  readonly store: EvaluationStore
  readonly activeAgents: ActiveAgentSet
  readonly estimator?: SyntheticEstimator
  readonly timeSource?: TimeSource
  readonly eventBus?: EventBus
  readonly logger?: Logger
}

/**
 * Runs regime detection, performance scoring, ranking and rotation evaluation
 * as four independent periodic cycles, and answers the consolidated summary.
 */
export class MetaEvaluationEngine {
  readonly events: EventBus
  readonly classifier: RegimeClassifier
  readonly scorer: PerformanceScorer
  readonly rankingEngine: RankingEngine
  readonly rotationEngine: RotationDecisionEngine
  readonly summaryAssembler: SummaryAssembler

  private readonly config: EngineConfig
  private readonly store: EvaluationStore
  private readonly timeSource: TimeSource
  private readonly logger: Logger
  private readonly cycles: Record<CycleName, PeriodicCycle>
  private running = false

  constructor(deps: MetaEvaluationEngineDependencies) {
    const { config } = deps
    this.config = config
    this.store = deps.store
    this.logger = deps.logger ?? createLogger('meta-evaluation')
    this.timeSource = deps.timeSource ?? new RealTimeSource()
    this.events = deps.eventBus ?? new EventBus(this.logger)

    const estimator = deps.estimator ?? new SeededEstimator(config.seed)
    const shared = { estimator, timeSource: this.timeSource, logger: this.logger, timeoutMs: config.providerTimeoutMs }

    this.classifier = new RegimeClassifier({
      ...shared,
      provider: deps.marketData,
      symbol: config.symbol,
      lookbackDays: config.lookbackDays,
    })
    this.scorer = new PerformanceScorer({
      ...shared,
      store: deps.predictions,
      historyWindowDays: config.historyWindowDays,
      historyLimit: config.historyLimit,
    })
    this.rankingEngine = new RankingEngine({
      ...shared,
      store: deps.store,
      roster: config.roster,
      rankingWindowHours: config.rankingWindowHours,
    })
    this.rotationEngine = new RotationDecisionEngine({
      rankingEngine: this.rankingEngine,
      activeAgents: deps.activeAgents,
      timeSource: this.timeSource,
      logger: this.logger,
      threshold: config.rotationThreshold,
      timeoutMs: config.providerTimeoutMs,
    })
    this.summaryAssembler = new SummaryAssembler({
      store: deps.store,
      timeSource: this.timeSource,
      logger: this.logger,
      topAgents: config.summary.topAgents,
      recentRotations: config.summary.recentRotations,
      windowHours: config.summary.windowHours,
      timeoutMs: config.providerTimeoutMs,
    })

    this.cycles = {
      performance: this.createCycle('performance', () => this.runPerformanceCollection()),
      ranking: this.createCycle('ranking', () => this.runRankingAnalysis()),
      rotation: this.createCycle('rotation', () => this.runRotationEvaluation()),
      regime: this.createCycle('regime', () => this.runRegimeRefresh()),
    }
  }

  get isRunning(): boolean {
    return this.running
  }

  /**
   * Start every cycle. Starting a running engine only logs a warning.
   */
  start(): void {
    if (this.running) {
      this.logger.warn('Meta-evaluation engine already running')
      return
    }
    this.running = true
    for (const name of CYCLE_NAMES) {
      this.cycles[name].start()
    }
    this.logger.info('Meta-evaluation engine started', { cycles: CYCLE_NAMES.length, symbol: this.config.symbol })
  }

  /**
   * Stop every cycle. Resolves once in-flight iterations have finished.
   */
  async stop(): Promise<void> {
    if (!this.running) {
      return
    }
    this.running = false
    await Promise.all(CYCLE_NAMES.map(name => this.cycles[name].stop()))
    await this.events.waitForAsyncHandlers()
    this.logger.info('Meta-evaluation engine stopped')
  }

  /**
   * Run one iteration of a cycle without timers
   * @returns False when the iteration failed
   */
  async runCycleOnce(name: CycleName): Promise<boolean> {
    return this.cycles[name].runOnce()
  }

  /**
   * Classify the regime, score every roster agent and append each record
   */
  async runPerformanceCollection(): Promise<AgentPerformanceRecord[]> {
    const snapshot = await this.classifier.classify()
    const records: AgentPerformanceRecord[] = []
    let failedWrites = 0

    for (const agentId of this.config.roster) {
      const record = await this.scorer.score(agentId, snapshot.regime)
      records.push(record)
      try {
        await withTimeout(this.store.savePerformance(record), this.config.providerTimeoutMs, 'savePerformance')
      } catch (error) {
        failedWrites++
        this.logger.error('Failed to save performance record', { agentId, error: describeError(error) })
      }
    }

    this.logger.info('Performance collected', {
      regime: snapshot.regime,
      agents: records.length,
      failedWrites,
    })
    this.events.emit(EventTypes.PERFORMANCE_COLLECTED, {
      regime: snapshot.regime,
      records,
      failedWrites,
      timestamp: this.timeSource.nowEpoch(),
    })
    return records
  }

  /**
   * Rank every configured regime and replace its stored ranking set
   */
  async runRankingAnalysis(): Promise<RegimeRanking[]> {
    const results: RegimeRanking[] = []

    for (const regime of this.config.regimes) {
      const result = await this.rankingEngine.rank(regime)
      results.push(result)
      try {
        await withTimeout(
          this.store.replaceRankings(regime, result.rankings),
          this.config.providerTimeoutMs,
          'replaceRankings',
        )
      } catch (error) {
        this.logger.error('Failed to replace rankings', { regime, error: describeError(error) })
        continue
      }
      this.events.emit(EventTypes.RANKINGS_UPDATED, {
        regime,
        rankings: result.rankings,
        timestamp: this.timeSource.nowEpoch(),
      })
    }

    this.logger.info('Rankings updated', {
      regimes: results.length,
      fallback: results.filter(r => r.fallback).map(r => r.regime),
    })
    return results
  }

  /**
   * Classify the regime and append a rotation decision when one is warranted
   */
  async runRotationEvaluation(): Promise<RotationDecision | null> {
    const snapshot = await this.classifier.classify()
    const decision = await this.rotationEngine.evaluate(snapshot.regime)
    if (!decision) {
      return null
    }

    try {
      await withTimeout(this.store.saveRotationDecision(decision), this.config.providerTimeoutMs, 'saveRotationDecision')
    } catch (error) {
      this.logger.error('Failed to save rotation decision', {
        decisionId: decision.decisionId,
        error: describeError(error),
      })
      return decision
    }

    this.events.emit(EventTypes.ROTATION_RECOMMENDED, { decision, timestamp: decision.timestamp })
    return decision
  }

  /**
   * Classify the regime and append the snapshot
   */
  async runRegimeRefresh(): Promise<RegimeSnapshot> {
    const snapshot = await this.classifier.classify()

    try {
      await withTimeout(this.store.saveRegimeSnapshot(snapshot), this.config.providerTimeoutMs, 'saveRegimeSnapshot')
    } catch (error) {
      this.logger.error('Failed to save regime snapshot', { error: describeError(error) })
    }

    this.events.emit(EventTypes.REGIME_CLASSIFIED, { snapshot, timestamp: snapshot.timestamp })
    return snapshot
  }

  getSummary(): Promise<EvaluationSummary> {
    return this.summaryAssembler.getSummary()
  }

  private createCycle(name: CycleName, run: () => Promise<unknown>): PeriodicCycle {
    return new PeriodicCycle({
      name,
      intervalMs: this.config.intervals[name],
      errorDelayMs: this.config.errorDelays[name],
      run: async () => {
        await run()
      },
      onError: (error) => {
        const message = describeError(error)
        this.logger.error('Cycle iteration failed', { cycle: name, error: message })
        this.events.emit(EventTypes.CYCLE_FAILED, { cycle: name, error: message, timestamp: this.timeSource.nowEpoch() })
      },
      logger: this.logger,
    })
  }
}
