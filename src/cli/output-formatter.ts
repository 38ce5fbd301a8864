/**
 * CLI Output Formatter
 *
 * Presentation layer for CLI output.
 * Converts CliResult/CliOutput to formatted strings with chalk.
 */

import chalk from 'chalk';
import type { CliResult, CliOutput } from './types/cli-result.js';
import type { PresentationRow } from '../domain/presentation.js';

/** Highlight for versions a live consumer still references. */
const inUse = chalk.hex('#FFA500');

/**
 * One line of the cache tree: indented name, then size, date and comment columns.
 * Branch rows carry size and date only when `showBranchDetails` is set.
 */
export function formatTreeRow(row: PresentationRow, showBranchDetails: boolean = false): string {
  const label = row.kind === 'branch' ? `${row.name}/` : row.name;
  const columns = [`${'  '.repeat(row.depth)}${label}`];

  if (row.kind === 'leaf' || showBranchDetails) {
    columns.push(row.formattedSize, row.formattedDate);
  }
  if (row.comment) {
    columns.push(row.comment);
  }

  let line = columns.join('  ');
  if (row.protected) line += '  [protected]';

  if (row.inUse) return inUse(line);
  return row.kind === 'branch' ? chalk.bold(line) : line;
}

/**
 * Format a CliOutput structure to a styled string.
 */
export function formatOutput(output: CliOutput, isError: boolean = false): string {
  if (output.json !== undefined) {
    return JSON.stringify(output.json, null, 2);
  }

  const lines: string[] = [];

  // Main message
  if (isError) {
    lines.push(chalk.red(`❌ ${output.message}`));
  } else {
    lines.push(chalk.green(output.message));
  }

  if (output.rows && output.rows.length > 0) {
    lines.push('');
    for (const row of output.rows) {
      lines.push(formatTreeRow(row, output.showBranchDetails));
    }
  }

  // Details
  if (output.details && output.details.length > 0) {
    lines.push('');
    output.details.forEach((detail) => {
      lines.push(chalk.white(`  • ${detail}`));
    });
  }

  // Warnings
  if (output.warnings && output.warnings.length > 0) {
    lines.push('');
    lines.push(chalk.yellow('⚠️  Warnings:'));
    output.warnings.forEach((warning) => {
      lines.push(chalk.yellow(`  • ${warning}`));
    });
  }

  // Suggestions
  if (output.suggestions && output.suggestions.length > 0) {
    lines.push('');
    lines.push(chalk.gray('💡 Suggestions:'));
    output.suggestions.forEach((suggestion) => {
      lines.push(chalk.gray(`  • ${suggestion}`));
    });
  }

  return lines.join('\n');
}

/**
 * Format a CliResult to a styled string.
 */
export function formatResult(result: CliResult): string {
  switch (result.kind) {
    case 'success':
      return result.output ? formatOutput(result.output, false) : '';

    case 'failure':
      return formatOutput(result.output, true);
  }
}

/**
 * Print a CliResult: failures to stderr, everything else to stdout.
 */
export function printResult(result: CliResult): void {
  const formatted = formatResult(result);
  if (formatted) {
    if (result.kind === 'failure') {
      console.error(formatted);
    } else {
      console.log(formatted);
    }
  }
}
