/**
 * Datasets Command
 */

import chalk from 'chalk';
import { createDefaultAnalystEngine } from '../../console/analyst/engine.js';
import { printHeader } from '../print.js';

export async function datasetsCommand(): Promise<void> {
  printHeader('TABLETALK - Datasets');

  const engine = createDefaultAnalystEngine();
  try {
    const datasets = await engine.listDatasets();
    if (datasets.length === 0) {
      console.log(chalk.yellow('No datasets yet. Use `tabletalk ingest <file>`.'));
      return;
    }

    for (const dataset of datasets) {
      const status = dataset.status === 'ready' ? chalk.green(dataset.status) : chalk.yellow(dataset.status);
      const rows = dataset.metadata.rowCount !== undefined ? `${dataset.metadata.rowCount} rows` : '';
      console.log(chalk.cyan(dataset.id), status, chalk.white(dataset.name), chalk.dim(rows));
    }
  } finally {
    engine.close();
  }
}
