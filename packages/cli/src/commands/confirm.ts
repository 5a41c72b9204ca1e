import ora from 'ora'
import { createEngineContext, type GlobalOptions } from '../engine-factory'
import { reportFailure } from '../utils/errors'

/**
 * Apply a recommended rotation to the persisted active set
 */
export async function confirmRotation(decisionId: string, options: GlobalOptions): Promise<void> {
  const spinner = ora(`Applying rotation ${decisionId}...`).start()

  try {
    const context = await createEngineContext(options)
    try {
      const decision = await context.database.confirmRotation(decisionId)
      const active = await context.database.activeAgents.getActiveAgents()
      spinner.succeed(`Swapped ${decision.fromAgent} for ${decision.toAgent}; active: ${active.join(', ')}`)
    } finally {
      context.close()
    }
  } catch (error) {
    reportFailure(spinner, `Rotation ${decisionId} not applied`, error)
  }
}
