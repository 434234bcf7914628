/**
 * Common types and interfaces for the drecipe package model
 */

// Re-export model types
export * from './recipe.js';
export * from './description.js';

export interface CommandResult<T = unknown> {
  success: boolean;
  data?: T;
  error?: string;
  warnings?: string[];
}

// Error types
export class PackageModelError extends Error {
  public code: string;
  public details?: Record<string, unknown>;

  constructor(message: string, code: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'PackageModelError';
    this.code = code;
    this.details = details;
  }
}

export enum ErrorCodes {
  RECIPE_NOT_FOUND = 'RECIPE_NOT_FOUND',
  INVALID_RECIPE = 'INVALID_RECIPE',
  UNKNOWN_CONFIGURATION = 'UNKNOWN_CONFIGURATION',
  UNKNOWN_BUILD_TYPE = 'UNKNOWN_BUILD_TYPE',
  UNKNOWN_VERSION = 'UNKNOWN_VERSION',
  USAGE_ERROR = 'USAGE_ERROR',
  FILE_SYSTEM_ERROR = 'FILE_SYSTEM_ERROR'
}

// Logger types
export enum LogLevel {
  DEBUG = 'debug',
  INFO = 'info',
  WARN = 'warn',
  ERROR = 'error'
}

export interface Logger {
  debug(message: string, meta?: unknown): void;
  info(message: string, meta?: unknown): void;
  warn(message: string, meta?: unknown): void;
  error(message: string, meta?: unknown): void;
}
