import ora from 'ora'
import { table } from 'table'
import { createEngineContext, type GlobalOptions } from '../engine-factory'
import { reportFailure } from '../utils/errors'

interface PruneOptions {
  days: string
}

/**
 * Delete evaluation history older than the retention window
 */
export async function pruneHistory(options: PruneOptions, globals: GlobalOptions): Promise<void> {
  const spinner = ora('Pruning evaluation history...').start()

  const days = parseInt(options.days, 10)
  if (!Number.isInteger(days) || days < 1) {
    reportFailure(spinner, 'Invalid retention window', new Error(`--days must be a positive integer, got ${options.days}`))
    return
  }

  try {
    const context = await createEngineContext(globals)
    try {
      const result = await context.database.cleanup(days)
      spinner.succeed(`Removed records older than ${days} days`)
      console.log(table([
        ['Table', 'Deleted'],
        ['performance', result.performanceDeleted.toString()],
        ['regime snapshots', result.snapshotsDeleted.toString()],
        ['rotation decisions', result.decisionsDeleted.toString()],
        ['predictions', result.predictionsDeleted.toString()],
      ]))
    } finally {
      context.close()
    }
  } catch (error) {
    reportFailure(spinner, 'Prune failed', error)
  }
}
