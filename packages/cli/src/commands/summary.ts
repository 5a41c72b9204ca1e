import chalk from 'chalk'
import ora from 'ora'
import { table } from 'table'
import { createEngineContext, type GlobalOptions } from '../engine-factory'
import { reportFailure } from '../utils/errors'
import { rotationRows, topAgentRows } from '../utils/format'

interface SummaryOptions {
  json?: boolean
}

export async function showSummary(options: SummaryOptions, globals: GlobalOptions): Promise<void> {
  const spinner = ora('Reading evaluation summary...').start()

  try {
    const context = await createEngineContext(globals)
    try {
      const summary = await context.engine.getSummary()
      spinner.stop()

      if (options.json) {
        console.log(JSON.stringify(summary, null, 2))
        return
      }

      const { performanceSummary: perf } = summary
      console.log(chalk.cyan('\n=== Meta-Evaluation Summary ===\n'))
      console.log(`Regime: ${chalk.bold(summary.currentRegime)} (${(summary.regimeConfidence * 100).toFixed(0)}% confidence)`)
      console.log(chalk.gray(`Last updated: ${summary.lastUpdated ?? 'never'}\n`))

      console.log(chalk.yellow('Top agents:'))
      console.log(summary.topAgents.length > 0 ? table(topAgentRows(summary)) : chalk.gray('  No rankings yet\n'))

      console.log(chalk.yellow('Recent rotations:'))
      console.log(summary.recentRotations.length > 0 ? table(rotationRows(summary)) : chalk.gray('  None\n'))

      console.log(chalk.yellow(`Last ${context.config.summary.windowHours}h:`))
      console.log(
        `  ${perf.totalAgents} agents, accuracy ${(perf.avgAccuracy * 100).toFixed(1)}%, ` +
        `sharpe ${perf.avgSharpeRatio.toFixed(2)}, response ${perf.avgResponseTime.toFixed(2)}s`,
      )
    } finally {
      context.close()
    }
  } catch (error) {
    reportFailure(spinner, 'Summary unavailable', error)
  }
}
