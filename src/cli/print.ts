/**
 * Terminal rendering shared by the CLI commands
 */

import chalk from 'chalk';
import type { Exchange } from '../common/types.js';

export function printHeader(title: string): void {
  console.log(chalk.bold('\n' + '='.repeat(60)));
  console.log(chalk.bold.cyan(title));
  console.log(chalk.bold('='.repeat(60)));
  console.log();
}

export function printExchange(exchange: Exchange): void {
  const badge = exchange.status === 'success' ? chalk.bgGreen.black(' OK ') : chalk.bgRed.white(' ERROR ');
  console.log(badge, chalk.bold(`#${exchange.sequence}`), chalk.dim(exchange.createdAt));
  console.log(chalk.white('Q:'), exchange.prompt);

  if (exchange.status === 'success') {
    console.log(chalk.green('A:'), exchange.responseText);
    if (exchange.visualization !== null) {
      console.log(chalk.dim('  [visualization attached: Plotly JSON]'));
    }
  } else {
    console.log(chalk.red(`${exchange.errorCategory ?? 'Error'}:`), exchange.errorMessage ?? '');
  }

  console.log(chalk.dim(`  attempts: ${exchange.attempts}, ${exchange.durationMs}ms`));
  console.log();
}
