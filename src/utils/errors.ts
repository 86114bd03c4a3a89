import { DistroDepsError, ErrorCodes, CommandResult } from '../types/index.js';
import { EXIT_CODES } from '../constants/index.js';
import { logger } from './logger.js';

/**
 * Custom error classes for the distro-deps CLI
 */

export class InputNotFoundError extends DistroDepsError {
  constructor(kind: string, path: string) {
    super(`${kind} not found: ${path}`, ErrorCodes.INPUT_NOT_FOUND, { kind, path });
    this.name = 'InputNotFoundError';
  }
}

export class ValidationError extends DistroDepsError {
  constructor(message: string, details?: unknown) {
    super(`Validation error: ${message}`, ErrorCodes.VALIDATION_ERROR, details);
    this.name = 'ValidationError';
  }
}

export class NoDependenciesError extends DistroDepsError {
  constructor(root: string, scope: string) {
    super(`No dependencies found in ${root}`, ErrorCodes.NO_DEPENDENCIES, { root, scope });
    this.name = 'NoDependenciesError';
  }
}

export class MalformedDescriptorError extends DistroDepsError {
  constructor(reason: string, details?: unknown) {
    super(`Malformed descriptor: ${reason}`, ErrorCodes.MALFORMED_DESCRIPTOR, details);
    this.name = 'MalformedDescriptorError';
  }
}

export class ExtractionError extends DistroDepsError {
  constructor(archive: string, reason: string) {
    super(`Failed to extract ${archive}: ${reason}`, ErrorCodes.EXTRACTION_FAILED, { archive });
    this.name = 'ExtractionError';
  }
}

export class FileSystemError extends DistroDepsError {
  constructor(message: string, details?: unknown) {
    super(`File system error: ${message}`, ErrorCodes.FILE_SYSTEM_ERROR, details);
    this.name = 'FileSystemError';
  }
}

export class ConfigError extends DistroDepsError {
  constructor(message: string, details?: unknown) {
    super(message, ErrorCodes.CONFIG_ERROR, details);
    this.name = 'ConfigError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Error handler function that provides consistent error handling across commands
 */
export function handleError(error: unknown): CommandResult {
  if (error instanceof DistroDepsError) {
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
      const result = handleError(error);
      console.error(`Error: ${result.error}`);
      process.exit(EXIT_CODES.FAILURE);
    }
  };
}
