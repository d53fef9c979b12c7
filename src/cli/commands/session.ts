/**
 * Session Command
 *
 * Starts an analysis session over a dataset.
 */

import chalk from 'chalk';
import { createDefaultAnalystEngine } from '../../console/analyst/engine.js';
import { errorMessage } from '../../common/services/logger.js';

interface SessionOptions {
  title?: string;
}

export async function sessionCommand(datasetId: string, options: SessionOptions): Promise<void> {
  const engine = createDefaultAnalystEngine();
  try {
    const session = await engine.createSession(datasetId, options.title);
    console.log(chalk.green('Session created:'), chalk.cyan(session.id));
    console.log(chalk.white('Title:'), session.title);
  } catch (error) {
    console.log(chalk.red('Failed to create session:'), errorMessage(error));
    process.exitCode = 1;
  } finally {
    engine.close();
  }
}
