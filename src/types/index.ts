/**
 * Common types and interfaces for the graphpin resolver
 */

// Re-export manifest model
export * from './manifest.js';

// Core application types
export interface GraphpinDirectories {
  config: string;
}

export interface GraphpinConfig {
  /** Registry directory used by the bundled provider */
  registry?: string;
  /** Build platform used to filter conditional target dependencies */
  platform?: string;
  /** Lockfile name relative to the workspace root */
  lockfileName?: string;
}

// Command option types

export interface ResolveCommandOptions {
  update?: boolean;
}

export interface GraphCommandOptions {
  target?: string;
}

// Results

/**
 * Outcome of an operation that fails with a typed, closed error union.
 * Mirrors CommandResult, but the error side carries data instead of a message.
 */
export type Result<T, E> =
  | { success: true; data: T }
  | { success: false; error: E };

export interface CommandResult<T = unknown> {
  success: boolean;
  data?: T;
  error?: string;
  warnings?: string[];
}

// Error types
export class GraphpinError extends Error {
  public code: string;
  public details?: unknown;

  constructor(message: string, code: string, details?: unknown) {
    super(message);
    this.name = 'GraphpinError';
    this.code = code;
    this.details = details;
  }
}

export enum ErrorCodes {
  RESOLUTION_FAILED = 'RESOLUTION_FAILED',
  GRAPH_INVALID = 'GRAPH_INVALID',
  INVALID_MANIFEST = 'INVALID_MANIFEST',
  FILE_SYSTEM_ERROR = 'FILE_SYSTEM_ERROR',
  VALIDATION_ERROR = 'VALIDATION_ERROR',
  CONFIG_ERROR = 'CONFIG_ERROR'
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
