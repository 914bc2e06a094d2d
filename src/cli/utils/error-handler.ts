// CLI error handling utilities

import { LinkerError, UsageError, RepositoryError, InputError } from '../../core/errors.js';

/**
 * Format an error for CLI output
 */
export function formatError(error: unknown): string {
  if (error instanceof UsageError) {
    const option = error.option ? ` (option: ${error.option})` : '';
    return `Usage Error${option}: ${error.message}`;
  }

  if (error instanceof RepositoryError) {
    return `Repository Error: ${error.message}`;
  }

  if (error instanceof InputError) {
    return error.message;
  }

  if (error instanceof LinkerError) {
    return `Error [${error.code}]: ${error.message}`;
  }

  if (error instanceof Error) {
    return `Error: ${error.message}`;
  }

  return `Unknown error: ${String(error)}`;
}

/**
 * Exit code for an error
 */
export function exitCodeFor(error: unknown): number {
  return error instanceof LinkerError ? error.exitCode : 1;
}

/**
 * Report an error on stderr and exit
 */
export function handleError(error: unknown): never {
  console.error(`addlinks: ${formatError(error)}`);
  process.exit(exitCodeFor(error));
}
