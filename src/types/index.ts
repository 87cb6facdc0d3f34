/**
 * Common types and interfaces for the slipway CLI application
 */

// Re-export domain types
export * from './project.js';
export * from './release.js';

export interface CommandResult<T = unknown> {
  success: boolean;
  data?: T;
  error?: string;
  warnings?: string[];
}

// Error types
export class SlipwayError extends Error {
  public code: string;
  public details?: Record<string, unknown>;

  constructor(message: string, code: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'SlipwayError';
    this.code = code;
    this.details = details;
  }
}

export enum ErrorCodes {
  INVALID_PATTERN = 'INVALID_PATTERN',
  VERSION_REF_NOT_FOUND = 'VERSION_REF_NOT_FOUND',
  INVALID_RANGE = 'INVALID_RANGE',
  CYCLIC_DEPENDENCY = 'CYCLIC_DEPENDENCY',
  INCONSISTENT_VERSION = 'INCONSISTENT_VERSION',
  INVALID_VERSION = 'INVALID_VERSION',
  FILE_SYSTEM_ERROR = 'FILE_SYSTEM_ERROR',
  VALIDATION_ERROR = 'VALIDATION_ERROR',
  CONFIG_ERROR = 'CONFIG_ERROR',
  VCS_ERROR = 'VCS_ERROR'
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
