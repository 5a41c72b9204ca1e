#!/usr/bin/env tsx

import { closeLoggers } from '@metaeval/core'
import { Command } from 'commander'
import { confirmRotation } from './commands/confirm'
import { recordPrediction, resolvePrediction } from './commands/predictions'
import { pruneHistory } from './commands/prune'
import { runEngine } from './commands/run'
import { runStep } from './commands/step'
import { showSummary } from './commands/summary'
import type { GlobalOptions } from './engine-factory'

const program = new Command()

program
  .name('metaeval')
  .description('Meta-evaluation and rotation engine for a roster of trading agents')
  .version('1.0.0')
  .option('-c, --config <path>', 'JSON file of engine overrides')
  .option('--db <path>', 'SQLite database file (or SQLITE_PATH)')
  .option('--prices <dir>', 'Directory of <SYMBOL>.csv price files (or PRICES_DIR)')

const globals = (): GlobalOptions => program.opts<GlobalOptions>()

program
  .command('run')
  .description('Run every evaluation cycle until interrupted')
  .action(() => runEngine(globals()))

program
  .command('step')
  .description('Run one iteration of a cycle: performance, ranking, rotation or regime')
  .argument('<cycle>', 'Cycle to run')
  .action((cycle: string) => runStep(cycle, globals()))

program
  .command('summary')
  .description('Show the current regime, top agents and recent rotations')
  .option('--json', 'Print the summary as JSON')
  .action((options: { json?: boolean }) => showSummary(options, globals()))

program
  .command('confirm')
  .description('Apply a recommended rotation to the active agent set')
  .argument('<decisionId>', 'Rotation decision id')
  .action((decisionId: string) => confirmRotation(decisionId, globals()))

program
  .command('record-prediction')
  .description('Record a prediction made by an agent')
  .argument('<agent>', 'Agent name')
  .argument('<direction>', 'Predicted direction: up, down or neutral')
  .option('--confidence <value>', 'Prediction confidence between 0 and 1', '0.5')
  .option('--actual <direction>', 'Observed direction, when already known')
  .option('--at <timestamp>', 'ISO time the prediction was made (default now)')
  .option('--symbol <symbol>', 'Symbol the prediction is about (default the configured symbol)')
  .action((agent: string, direction: string, options: { confidence: string; actual?: string; at?: string; symbol?: string }) =>
    recordPrediction(agent, direction, options, globals()))

program
  .command('resolve-prediction')
  .description('Record the observed direction of an open prediction')
  .argument('<agent>', 'Agent name')
  .argument('<timestamp>', 'ISO time the prediction was made')
  .argument('<direction>', 'Observed direction: up, down or neutral')
  .action((agent: string, timestamp: string, direction: string) =>
    resolvePrediction(agent, timestamp, direction, globals()))

program
  .command('prune')
  .description('Delete evaluation history older than the retention window')
  .option('--days <count>', 'Days of history to keep', '90')
  .action((options: { days: string }) => pruneHistory(options, globals()))

try {
  await program.parseAsync()
} finally {
  closeLoggers()
}
