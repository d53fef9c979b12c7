/**
 * Status Command
 *
 * Shows stored datasets and sessions, plus this process's cache, client and
 * query counters (fresh per CLI run).
 */

import chalk from 'chalk';
import { createDefaultAnalystEngine } from '../../console/analyst/engine.js';
import { getAnalystConfig } from '../../console/analyst/config.js';
import { printHeader } from '../print.js';

export async function statusCommand(): Promise<void> {
  printHeader('TABLETALK - System Status');

  const config = getAnalystConfig();
  const engine = createDefaultAnalystEngine(config);
  try {
    const status = await engine.getStatus(true);

    console.log(chalk.bold.cyan('Storage'));
    console.log(chalk.dim('-'.repeat(40)));
    console.log(chalk.white('Database:'), chalk.cyan(config.databasePath));
    console.log(chalk.white('Uploads:'), chalk.cyan(config.blobDirectory));
    console.log(chalk.white('Datasets:'), chalk.green(status.datasets.toString()));
    console.log(chalk.white('Sessions:'), chalk.green(status.sessions.toString()));
    console.log();

    console.log(chalk.bold.cyan('Analyst'));
    console.log(chalk.dim('-'.repeat(40)));
    console.log(chalk.white('Model:'), chalk.cyan(config.claudeModel));
    console.log(
      chalk.white('API key:'),
      config.anthropicApiKey ? chalk.green('configured') : chalk.red('missing (set ANTHROPIC_API_KEY)')
    );
    console.log(chalk.white('Context window:'), `${config.contextMaxEntries} exchanges / ${config.maxContextTokens} tokens`);
    console.log(
      chalk.white('Timeouts:'),
      `${config.invokeTimeoutMs}ms per call, ${config.queryTimeoutMs}ms per query, ${config.retryBackoffMs}ms backoff`
    );
    console.log(chalk.white('Dataset cache:'), `${status.cache.size}/${status.cache.maxSize}`);
    console.log();
  } finally {
    engine.close();
  }
}
