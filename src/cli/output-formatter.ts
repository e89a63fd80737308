/**
 * CLI Output Formatter
 *
 * Presentation only: CliResult to styled text with chalk.
 */

import chalk from 'chalk';
import type { CliResult, CliOutput } from './types/cli-result.js';

export function formatOutput(output: CliOutput, isError: boolean = false): string {
  const lines: string[] = [isError ? chalk.red(`✖ ${output.message}`) : chalk.green(`✔ ${output.message}`)];

  if (output.fields && output.fields.length > 0) {
    const width = Math.max(...output.fields.map(([label]) => label.length));
    lines.push('');
    for (const [label, value] of output.fields) {
      lines.push(`  ${chalk.white(label.padEnd(width))}  ${chalk.cyan(value)}`);
    }
  }

  if (output.details && output.details.length > 0) {
    lines.push('');
    output.details.forEach((detail) => lines.push(chalk.white(`  • ${detail}`)));
  }

  if (output.suggestions && output.suggestions.length > 0) {
    lines.push('');
    lines.push(chalk.gray('Suggestions:'));
    output.suggestions.forEach((s) => lines.push(chalk.gray(`  • ${s}`)));
  }

  return lines.join('\n');
}

export function formatResult(result: CliResult): string {
  switch (result.kind) {
    case 'success':
      return result.output ? formatOutput(result.output, false) : '';
    case 'failure':
      return formatOutput(result.output, true);
  }
}

export function printResult(result: CliResult): void {
  const formatted = formatResult(result);
  if (!formatted) return;
  if (result.kind === 'failure') {
    console.error(formatted);
  } else {
    console.log(formatted);
  }
}
