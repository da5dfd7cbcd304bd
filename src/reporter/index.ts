/**
 * End-of-run console summary
 */

import chalk from 'chalk';
import type { ReconcileResult } from '../types/ledger.js';

export function formatSummary(result: ReconcileResult): string[] {
  const lines: string[] = [];

  lines.push('');
  if (result.downloaded.length > 0) {
    lines.push(chalk.bold('Downloaded apps:'));
    for (const app of result.downloaded) {
      lines.push(`  ${chalk.green('-')} ${app}`);
    }
  } else {
    lines.push(chalk.yellow('No new apps downloaded'));
  }

  if (result.skipped.length > 0) {
    lines.push('');
    lines.push(chalk.bold('Skipped apps:'));
    for (const app of result.skipped) {
      lines.push(`  ${chalk.dim('-')} ${app}`);
    }
  }

  lines.push('');
  lines.push(chalk.green('Process completed successfully'));
  return lines;
}

export function printSummary(result: ReconcileResult): void {
  for (const line of formatSummary(result)) {
    console.log(line);
  }
}
