/**
 * History Command
 */

import chalk from 'chalk';
import { createDefaultAnalystEngine } from '../../console/analyst/engine.js';
import { errorMessage } from '../../common/services/logger.js';
import { printExchange, printHeader } from '../print.js';

interface HistoryOptions {
  limit?: string;
}

export async function historyCommand(sessionId: string, options: HistoryOptions): Promise<void> {
  const limit = options.limit !== undefined ? parseInt(options.limit, 10) : undefined;
  if (limit !== undefined && (!Number.isInteger(limit) || limit < 1)) {
    console.log(chalk.red('--limit must be a positive integer'));
    process.exitCode = 1;
    return;
  }

  printHeader(`TABLETALK - Session ${sessionId}`);

  const engine = createDefaultAnalystEngine();
  try {
    const exchanges = await engine.getHistory(sessionId, limit);
    if (exchanges.length === 0) {
      console.log(chalk.yellow('No exchanges yet.'));
      return;
    }
    for (const exchange of exchanges) {
      printExchange(exchange);
    }
  } catch (error) {
    console.log(chalk.red('Failed to read history:'), errorMessage(error));
    process.exitCode = 1;
  } finally {
    engine.close();
  }
}
