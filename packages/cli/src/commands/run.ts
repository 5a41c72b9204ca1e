import { EventTypes } from '@metaeval/core'
import chalk from 'chalk'
import ora from 'ora'
import { createEngineContext, type EngineContext, type GlobalOptions } from '../engine-factory'
import { reportFailure } from '../utils/errors'
import { describeDecision, describeSnapshot } from '../utils/format'

function waitForShutdownSignal(): Promise<NodeJS.Signals> {
  return new Promise(resolve => {
    process.once('SIGINT', resolve)
    process.once('SIGTERM', resolve)
  })
}

/**
 * Run every cycle until SIGINT or SIGTERM
 */
export async function runEngine(options: GlobalOptions): Promise<void> {
  const spinner = ora('Starting meta-evaluation engine...').start()

  let context: EngineContext
  try {
    context = await createEngineContext(options)
  } catch (error) {
    reportFailure(spinner, 'Meta-evaluation engine failed to start', error)
    return
  }

  const { config, engine } = context
  engine.events.subscribe(EventTypes.REGIME_CLASSIFIED, ({ snapshot }) => {
    console.log(chalk.gray(`Regime: ${describeSnapshot(snapshot)}`))
  })
  engine.events.subscribe(EventTypes.ROTATION_RECOMMENDED, ({ decision }) => {
    console.log(chalk.yellow(`Rotation recommended: ${describeDecision(decision)}`))
    console.log(chalk.gray(`  apply with: metaeval confirm ${decision.decisionId}`))
  })
  engine.events.subscribe(EventTypes.CYCLE_FAILED, ({ cycle, error }) => {
    console.log(chalk.red(`Cycle ${cycle} failed: ${error}`))
  })

  engine.start()
  spinner.succeed(`Evaluating ${config.roster.length} agents on ${config.symbol}`)
  console.log(chalk.gray('Press Ctrl+C to stop'))

  const signal = await waitForShutdownSignal()

  const stopping = ora(`Received ${signal}, stopping cycles...`).start()
  try {
    await engine.stop()
    stopping.succeed('Meta-evaluation engine stopped')
  } catch (error) {
    reportFailure(stopping, 'Meta-evaluation engine did not stop cleanly', error)
  } finally {
    context.close()
  }
}
