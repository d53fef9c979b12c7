/**
 * Ingest Command
 *
 * Reads a local file and stores it as a dataset, optionally opening a
 * session on it.
 */

import { readFile } from 'fs/promises';
import { basename } from 'path';
import ora from 'ora';
import chalk from 'chalk';
import { createDefaultAnalystEngine } from '../../console/analyst/engine.js';
import { errorMessage } from '../../common/services/logger.js';
import { printHeader } from '../print.js';

interface IngestOptions {
  name?: string;
  openSession?: boolean;
}

export async function ingestCommand(file: string, options: IngestOptions): Promise<void> {
  printHeader('TABLETALK - Ingest Dataset');

  const engine = createDefaultAnalystEngine();
  const spinner = ora(`Reading ${file}...`).start();
  try {
    const bytes = await readFile(file);
    const fileName = basename(file);

    spinner.text = `Decoding ${fileName} (${bytes.length.toLocaleString()} bytes)...`;
    const upload = { name: options.name ?? fileName, fileName, bytes };
    const { dataset, session } = options.openSession
      ? await engine.ingestAndOpenSession(upload)
      : { dataset: await engine.ingestDataset(upload), session: null };

    if (dataset.status === 'ready') {
      spinner.succeed(`Dataset ready: ${dataset.name}`);
    } else {
      spinner.fail(`Dataset ${dataset.status}: ${dataset.metadata.error ?? 'unknown error'}`);
      process.exitCode = 1;
    }

    console.log(chalk.white('Id:'), chalk.cyan(dataset.id));
    if (dataset.metadata.rowCount !== undefined) {
      console.log(chalk.white('Rows:'), chalk.green(dataset.metadata.rowCount.toLocaleString()));
    }
    for (const column of dataset.metadata.columns ?? []) {
      console.log(chalk.dim(`  ${column.name.padEnd(24)} ${column.dtype}`));
    }
    for (const warning of dataset.metadata.parseWarnings) {
      console.log(chalk.yellow(`  ! ${warning}`));
    }
    if (session) {
      console.log(chalk.white('Session:'), chalk.cyan(session.id), chalk.dim(session.title));
    }
  } catch (error) {
    spinner.fail(`Ingestion failed: ${errorMessage(error)}`);
    process.exitCode = 1;
  } finally {
    engine.close();
  }
}
