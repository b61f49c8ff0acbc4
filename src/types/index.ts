export * from './crate.js';

// Command result
export interface CommandResult<T = unknown> {
  success: boolean;
  data?: T;
  error?: string;
  code?: string;
  warnings?: string[];
}

// Error types
export class CrateBuildError extends Error {
  public code: string;
  public details?: Record<string, unknown>;

  constructor(message: string, code: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'CrateBuildError';
    this.code = code;
    this.details = details;
  }
}

export enum ErrorCodes {
  MALFORMED_DOCUMENT = 'MalformedDocument',
  MISSING_ROOT_ENTITY = 'MissingRootEntity',
  UNSATISFIABLE_REQUIREMENT = 'UnsatisfiableRequirement',
  CONFLICTING_OS_REQUIREMENT = 'ConflictingOSRequirement',
  UNSUPPORTED_BASE_OS = 'UnsupportedBaseOS',
  CYCLIC_DEPENDENCY = 'CyclicDependency',
  INVALID_VERSION_RANGE = 'InvalidVersionRange',
  FILE_SYSTEM_ERROR = 'FileSystemError',
  CONFIG_ERROR = 'ConfigError'
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

// Configuration types
export interface OsDeclaration {
  name: string;
  version: string;
}

export interface BaseImageEntry {
  distribution: string;
  version: string;
  image: string;
}

export interface CrateBuildConfig {
  defaultOs?: OsDeclaration;
  baseImages?: BaseImageEntry[];
  ecosystemPrefixes?: string[];
}
