import { PackageModelError, ErrorCodes, CommandResult } from '../types/index.js';
import { logger } from './logger.js';

/**
 * Error classes for the failures the package model surfaces to its callers
 */

export class RecipeNotFoundError extends PackageModelError {
  constructor(directory: string, candidates: readonly string[]) {
    super(
      `No package file found in ${directory}, expected one of ${candidates.join('/')}`,
      ErrorCodes.RECIPE_NOT_FOUND,
      { directory, candidates: [...candidates] }
    );
    this.name = 'RecipeNotFoundError';
  }
}

export class InvalidRecipeError extends PackageModelError {
  constructor(reason: string, details?: Record<string, unknown>) {
    super(`Invalid package recipe: ${reason}`, ErrorCodes.INVALID_RECIPE, details);
    this.name = 'InvalidRecipeError';
  }
}

export class UnknownConfigurationError extends PackageModelError {
  constructor(packageName: string, configuration: string) {
    super(
      `Unknown configuration for ${packageName}: ${configuration}`,
      ErrorCodes.UNKNOWN_CONFIGURATION,
      { packageName, configuration }
    );
    this.name = 'UnknownConfigurationError';
  }
}

export class UnknownBuildTypeError extends PackageModelError {
  constructor(packageName: string, buildType: string) {
    super(
      `Unknown build type for ${packageName}: '${buildType}'`,
      ErrorCodes.UNKNOWN_BUILD_TYPE,
      { packageName, buildType }
    );
    this.name = 'UnknownBuildTypeError';
  }
}

export class UnknownVersionError extends PackageModelError {
  constructor(packageName: string) {
    super(
      `Trying to store package ${packageName} with an 'unknown' version, this is not supported.`,
      ErrorCodes.UNKNOWN_VERSION,
      { packageName }
    );
    this.name = 'UnknownVersionError';
  }
}

export class UsageError extends PackageModelError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, ErrorCodes.USAGE_ERROR, details);
    this.name = 'UsageError';
  }
}

export class FileSystemError extends PackageModelError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(`File system error: ${message}`, ErrorCodes.FILE_SYSTEM_ERROR, details);
    this.name = 'FileSystemError';
  }
}

/**
 * Error handler function that provides consistent error handling across commands
 */
export function handleError(error: unknown): CommandResult {
  if (error instanceof PackageModelError) {
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
