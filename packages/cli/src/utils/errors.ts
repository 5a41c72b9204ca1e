import { ConfigValidationError } from '@metaeval/core'
import { RotationConfirmationError } from '@metaeval/data'
import chalk from 'chalk'
import type { Ora } from 'ora'
import { ConfigLoadError } from '../config-loader'

/**
 * Print a failed command's error and flag a non-zero exit
 */
export function reportFailure(spinner: Ora, message: string, error: unknown): void {
  spinner.fail(message)

  if (error instanceof ConfigValidationError) {
    for (const issue of error.issues) {
      console.error(chalk.red(`  - ${issue}`))
    }
  } else if (error instanceof ConfigLoadError || error instanceof RotationConfirmationError) {
    console.error(chalk.red(error.message))
  } else {
    console.error(chalk.red('\nError:'), error)
  }

  process.exitCode = 1
}
