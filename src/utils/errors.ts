import { SlipwayError, ErrorCodes, CommandResult, SubstRange } from '../types/index.js';
import { logger } from './logger.js';

/**
 * Custom error classes for the different failure modes of the slipway CLI
 */

/**
 * Raised when a scanner is registered with a pattern that cannot produce a
 * version reference. This is a programming error, never a runtime condition.
 */
export class InvalidPatternError extends SlipwayError {
  constructor(pattern: string, reason: string, file?: string) {
    super(`Invalid version pattern ${JSON.stringify(pattern)}: ${reason}`, ErrorCodes.INVALID_PATTERN, { pattern, file });
    this.name = 'InvalidPatternError';
  }
}

export class VersionRefNotFoundError extends SlipwayError {
  constructor(pattern: string, file: string) {
    super(`Pattern ${JSON.stringify(pattern)} does not match in file '${file}'`, ErrorCodes.VERSION_REF_NOT_FOUND, { pattern, file });
    this.name = 'VersionRefNotFoundError';
  }
}

export class InvalidRangeError extends SlipwayError {
  constructor(public readonly index: number, range: SubstRange) {
    super(`Invalid range at index ${index}: (start: ${range[0]}, end: ${range[1]})`, ErrorCodes.INVALID_RANGE, { index, range });
    this.name = 'InvalidRangeError';
  }
}

export class OverlapError extends SlipwayError {
  constructor(public readonly index: number, previous: SubstRange, range: SubstRange) {
    super(
      `Invalid range at index ${index}: (${range[0]}, ${range[1]}) overlaps with previous range (${previous[0]}, ${previous[1]})`,
      ErrorCodes.INVALID_RANGE,
      { index, previous, range }
    );
    this.name = 'OverlapError';
  }
}

export class CyclicDependencyError extends SlipwayError {
  constructor(public readonly remaining: string[]) {
    super(`Encountered a dependency cycle (unordered nodes: ${remaining.join(', ')})`, ErrorCodes.CYCLIC_DEPENDENCY, { remaining });
    this.name = 'CyclicDependencyError';
  }
}

export class InconsistentVersionError extends SlipwayError {
  constructor(public readonly values: Record<string, string[]>) {
    const summary = Object.keys(values).map(value => `${value} (${values[value].join(', ')})`).join('; ');
    super(`Versions are inconsistent: ${summary}`, ErrorCodes.INCONSISTENT_VERSION, { values });
    this.name = 'InconsistentVersionError';
  }
}

export class InvalidVersionError extends SlipwayError {
  constructor(version: string, reason: string = 'not a valid PEP 440 version') {
    super(`Invalid version '${version}': ${reason}`, ErrorCodes.INVALID_VERSION, { version });
    this.name = 'InvalidVersionError';
  }
}

export class FileSystemError extends SlipwayError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(`File system error: ${message}`, ErrorCodes.FILE_SYSTEM_ERROR, details);
  }
}

export class ValidationError extends SlipwayError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(`Validation error: ${message}`, ErrorCodes.VALIDATION_ERROR, details);
  }
}

export class ConfigError extends SlipwayError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, ErrorCodes.CONFIG_ERROR, details);
  }
}

export class VcsError extends SlipwayError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, ErrorCodes.VCS_ERROR, details);
  }
}

export class UserCancellationError extends Error {
  constructor(message: string = 'Operation cancelled by user') {
    super(message);
    this.name = 'UserCancellationError';
  }
}

/**
 * Carries a non-zero exit code out of a command action without printing an
 * additional error line; the command already reported what went wrong.
 */
export class ExitCodeError extends Error {
  constructor(public readonly exitCode: number) {
    super(`exit code ${exitCode}`);
    this.name = 'ExitCodeError';
  }
}

/**
 * Error handler function that provides consistent error handling across commands
 */
export function handleError(error: unknown): CommandResult {
  if (error instanceof SlipwayError) {
    logger.debug(error.message, { code: error.code, details: error.details });
    return {
      success: false,
      error: error.message
    };
  } else if (error instanceof Error) {
    logger.debug('Unexpected error occurred', { message: error.message, stack: error.stack });
    return {
      success: false,
      error: error.message
    };
  } else {
    logger.debug('Unknown error occurred', { error });
    return {
      success: false,
      error: 'An unknown error occurred'
    };
  }
}

/**
 * Wraps an async function with error handling for Commander.js actions
 */
export function withErrorHandling<T extends unknown[]>(
  fn: (...args: T) => Promise<void>
): (...args: T) => Promise<void> {
  return async (...args: T): Promise<void> => {
    try {
      await fn(...args);
    } catch (error) {
      if (error instanceof UserCancellationError) {
        process.exit(0);
      }
      if (error instanceof ExitCodeError) {
        process.exit(error.exitCode);
      }
      // Scanner registration bugs surface with their stack trace
      if (error instanceof InvalidPatternError) {
        throw error;
      }

      const result = handleError(error);
      console.error(`error: ${result.error}`);
      process.exit(1);
    }
  };
}
