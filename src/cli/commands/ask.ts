/**
 * Ask Command
 *
 * Submits one prompt to a session and prints the recorded exchange.
 */

import ora from 'ora';
import chalk from 'chalk';
import { createDefaultAnalystEngine } from '../../console/analyst/engine.js';
import { errorMessage } from '../../common/services/logger.js';
import { printExchange } from '../print.js';

interface AskOptions {
  json: boolean;
}

export async function askCommand(sessionId: string, prompt: string, options: AskOptions): Promise<void> {
  const engine = createDefaultAnalystEngine();
  const spinner = ora('Analyzing...').start();
  try {
    const exchange = await engine.submitQuery(sessionId, prompt);
    spinner.stop();

    if (options.json) {
      console.log(JSON.stringify(exchange, null, 2));
    } else {
      printExchange(exchange);
    }
    if (exchange.status === 'error') {
      process.exitCode = 1;
    }
  } catch (error) {
    spinner.fail(chalk.red(errorMessage(error)));
    process.exitCode = 1;
  } finally {
    engine.close();
  }
}
