#!/usr/bin/env node
/**
 * tabletalk CLI
 *
 * Ingest files, open analysis sessions and ask questions from the terminal.
 *
 * Usage:
 *   tabletalk ingest ./sales.csv --name "Q3 sales"
 *   tabletalk ingest ./sales.xlsx --open-session
 *   tabletalk datasets
 *   tabletalk session <dataset_id> --title "Revenue review"
 *   tabletalk ask <session_id> "sum revenue by region"
 *   tabletalk history <session_id> --limit 5
 *   tabletalk status
 */

import 'dotenv/config';
import { Command } from 'commander';
import { ingestCommand } from './commands/ingest.js';
import { datasetsCommand } from './commands/datasets.js';
import { sessionCommand } from './commands/session.js';
import { askCommand } from './commands/ask.js';
import { historyCommand } from './commands/history.js';
import { statusCommand } from './commands/status.js';

const program = new Command();

program
  .name('tabletalk')
  .description('tabletalk CLI - conversational analysis of tabular data')
  .version('0.1.0');

// ingest <file>
program
  .command('ingest <file>')
  .description('Upload a .csv, .xlsx or .xls file as a dataset')
  .option('--name <name>', 'Dataset name (defaults to the file name)')
  .option('--open-session', 'Also open an analysis session on the dataset')
  .action(ingestCommand);

// datasets
program
  .command('datasets')
  .description('List datasets, newest first')
  .action(datasetsCommand);

// session <dataset_id>
program
  .command('session <dataset_id>')
  .description('Start an analysis session over a dataset')
  .option('--title <title>', 'Session title')
  .action(sessionCommand);

// ask <session_id> <prompt>
program
  .command('ask <session_id> <prompt>')
  .description('Ask a question in a session')
  .option('--json', 'Print the recorded exchange as JSON', false)
  .action(askCommand);

// history <session_id>
program
  .command('history <session_id>')
  .description('Show the exchanges of a session, oldest first')
  .option('--limit <n>', 'Only the most recent N exchanges')
  .action(historyCommand);

// status
program
  .command('status')
  .description('Show cache, client and query metrics')
  .action(statusCommand);

program.parseAsync(process.argv).catch((error) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
