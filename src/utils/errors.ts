import { GraphpinError, ErrorCodes, CommandResult } from '../types/index.js';
import { logger } from './logger.js';

/**
 * Error classes raised at the CLI boundary. The core returns tagged results;
 * commands convert those into these classes before printing.
 */

export class ResolutionFailedError extends GraphpinError {
  constructor(explanation: string, details?: unknown) {
    super(explanation, ErrorCodes.RESOLUTION_FAILED, details);
    this.name = 'ResolutionFailedError';
  }
}

export class GraphValidationError extends GraphpinError {
  constructor(message: string, details?: unknown) {
    super(`Invalid package graph: ${message}`, ErrorCodes.GRAPH_INVALID, details);
    this.name = 'GraphValidationError';
  }
}

export class InvalidManifestError extends GraphpinError {
  constructor(source: string, reason: string) {
    super(`Invalid manifest ${source}: ${reason}`, ErrorCodes.INVALID_MANIFEST, { source });
    this.name = 'InvalidManifestError';
  }
}

export class FileSystemError extends GraphpinError {
  constructor(message: string, details?: unknown) {
    super(`File system error: ${message}`, ErrorCodes.FILE_SYSTEM_ERROR, details);
  }
}

export class ValidationError extends GraphpinError {
  /** The message without the `Validation error:` prefix */
  readonly reason: string;

  constructor(message: string, details?: unknown) {
    super(`Validation error: ${message}`, ErrorCodes.VALIDATION_ERROR, details);
    this.reason = message;
  }
}

export class ConfigError extends GraphpinError {
  constructor(message: string, details?: unknown) {
    super(message, ErrorCodes.CONFIG_ERROR, details);
  }
}

/**
 * Error handler function that provides consistent error handling across commands
 */
export function handleError(error: unknown): CommandResult {
  if (error instanceof GraphpinError) {
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
      console.error(result.error);
      process.exitCode = 1;
    }
  };
}
