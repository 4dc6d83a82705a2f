/**
 * Terminal output helpers.
 *
 * Status lines go through consola; plain listings (help screens) are written
 * with console.log by the callers, the same as the rest of the CLI.
 */

import chalk from 'chalk';
import consola from 'consola';

const DEBUG_LEVEL = 4;
const INFO_LEVEL = 3;

export function setDebug(enabled: boolean): void {
  consola.level = enabled ? DEBUG_LEVEL : INFO_LEVEL;
}

export function printInfo(message: string): void {
  consola.info(message);
}

export function printSuccess(message: string): void {
  consola.success(message);
}

export function printWarning(message: string): void {
  consola.warn(message);
}

export function printDebug(message: string): void {
  consola.debug(message);
}

/**
 * Report an error that ends the invocation. The caller decides the exit code.
 */
export function printFatal(error: unknown): void {
  const message = error instanceof Error ? error.message : String(error);
  consola.error(`${chalk.red('Fatal Error:')} ${message}`);

  if (error instanceof Error && 'suggestion' in error && typeof error.suggestion === 'string') {
    consola.log(chalk.dim(error.suggestion));
  }
}

export function bold(text: string): string {
  return chalk.bold(text);
}
