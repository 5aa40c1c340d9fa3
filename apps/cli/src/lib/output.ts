/**
 * Output Formatter
 *
 * Consistent CLI output formatting.
 */

import chalk from 'chalk';
import { DebkitError } from '@debkit/core';

export function printSuccess(message: string): void {
  console.log(chalk.green('✓'), message);
}

export function printError(message: string): void {
  console.error(chalk.red('✗'), message);
}

/**
 * Print a failed command's error with its code and return the exit code
 */
export function printFailure(error: unknown): number {
  if (error instanceof DebkitError) {
    console.error(chalk.red('✗'), error.message, chalk.gray(`[${error.code}]`));
    return error.exitCode;
  }
  printError(error instanceof Error ? error.message : 'Unknown error');
  return 1;
}

export function printWarning(message: string): void {
  console.warn(chalk.yellow('!'), message);
}

export function printJson(data: unknown): void {
  console.log(JSON.stringify(data, null, 2));
}

export function printHeader(title: string): void {
  console.log();
  console.log(chalk.bold.underline(title));
  console.log();
}

export function printKeyValue(key: string, value: unknown): void {
  console.log(`  ${chalk.gray(key + ':')} ${String(value)}`);
}
