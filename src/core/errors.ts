// Domain-specific error types for the location linker

/**
 * Base error class for all linker errors
 */
export abstract class LinkerError extends Error {
  abstract readonly code: string;
  abstract readonly exitCode: number;

  constructor(message: string, public readonly context?: Record<string, unknown>) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON() {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context
    };
  }
}

/**
 * Invalid command-line options
 */
export class UsageError extends LinkerError {
  readonly code = 'USAGE_ERROR';
  readonly exitCode = 2;

  constructor(message: string, public readonly option?: string) {
    super(message, { option });
  }
}

/**
 * Not running inside a clone of the hosting repository
 */
export class RepositoryError extends LinkerError {
  readonly code = 'REPOSITORY_ERROR';
  readonly exitCode = 3;
}

/**
 * A git invocation failed. Raised per token and always absorbed by the linker.
 */
export class GitCommandError extends LinkerError {
  readonly code = 'GIT_COMMAND_ERROR';
  readonly exitCode = 1;

  constructor(public readonly command: string[], cause: unknown) {
    super(`git ${command.join(' ')} failed: ${describeCause(cause)}`, { command });
  }
}

/**
 * An input file could not be opened or read
 */
export class InputError extends LinkerError {
  readonly code = 'INPUT_ERROR';
  readonly exitCode = 1;

  constructor(public readonly file: string, cause: unknown) {
    super(`Can't open ${file}: ${describeCause(cause)}`, { file });
  }
}

function describeCause(cause: unknown): string {
  if (cause instanceof Error) {
    return cause.message.trim().split('\n')[0] || cause.name;
  }
  return String(cause);
}
