import { isCycleName } from '@metaeval/core'
import chalk from 'chalk'
import ora from 'ora'
import { table } from 'table'
import { createEngineContext, type GlobalOptions } from '../engine-factory'
import { reportFailure } from '../utils/errors'
import { describeDecision, describeSnapshot, performanceRows, rankingRows } from '../utils/format'

/**
 * Run a single iteration of one cycle and print what it produced
 */
export async function runStep(cycle: string, options: GlobalOptions): Promise<void> {
  const spinner = ora(`Running ${cycle} cycle...`).start()

  if (!isCycleName(cycle)) {
    reportFailure(spinner, `Unknown cycle: ${cycle}`, new Error('Expected one of performance, ranking, rotation, regime'))
    return
  }

  try {
    const context = await createEngineContext(options)
    try {
      const { engine } = context
      switch (cycle) {
        case 'regime': {
          const snapshot = await engine.runRegimeRefresh()
          spinner.succeed(`Regime: ${describeSnapshot(snapshot)}`)
          break
        }
        case 'performance': {
          const records = await engine.runPerformanceCollection()
          spinner.succeed(`Scored ${records.length} agents`)
          console.log(table(performanceRows(records)))
          break
        }
        case 'ranking': {
          const rankings = await engine.runRankingAnalysis()
          spinner.succeed(`Ranked ${rankings.length} regimes`)
          console.log(table(rankingRows(rankings)))
          break
        }
        case 'rotation': {
          const decision = await engine.runRotationEvaluation()
          if (decision) {
            spinner.succeed(`Rotation recommended: ${describeDecision(decision)}`)
            console.log(chalk.gray(`  apply with: metaeval confirm ${decision.decisionId}`))
          } else {
            spinner.succeed('No rotation recommended')
          }
          break
        }
      }
    } finally {
      context.close()
    }
  } catch (error) {
    reportFailure(spinner, `${cycle} cycle failed`, error)
  }
}
