import * as fs from 'fs';
import type { EventField, LogLevel, ParseFailureReason } from './types.js';

// Standardized error handling
export interface AppError extends Error {
  code: string;
  context: Record<string, unknown>;
}

export class ValidationError extends Error implements AppError {
  code = 'VALIDATION_ERROR';
  context: Record<string, unknown>;

  constructor(message: string, context?: Record<string, unknown>) {
    super(message);
    this.name = 'ValidationError';
    this.context = context || {};
  }
}

export class ProcessingError extends Error implements AppError {
  code = 'PROCESSING_ERROR';
  context: Record<string, unknown>;

  constructor(message: string, context?: Record<string, unknown>) {
    super(message);
    this.name = 'ProcessingError';
    this.context = context || {};
  }
}

export class DatabaseError extends Error implements AppError {
  code = 'DATABASE_ERROR';
  context: Record<string, unknown>;

  constructor(message: string, context?: Record<string, unknown>) {
    super(message);
    this.name = 'DatabaseError';
    this.context = context || {};
  }
}

/**
 * A document that cannot become a typed event. Returned by the parser rather
 * than thrown; the pipeline logs it and moves on to the next document.
 */
export class ParseError extends Error implements AppError {
  code = 'PARSE_ERROR';
  context: Record<string, unknown>;
  readonly reason: ParseFailureReason;
  readonly field?: EventField;

  constructor(
    reason: ParseFailureReason,
    message: string,
    options: { field?: EventField; context?: Record<string, unknown> } = {}
  ) {
    super(message);
    this.name = 'ParseError';
    this.reason = reason;
    this.field = options.field;
    this.context = options.context || {};
  }
}

export class SchemaError extends Error implements AppError {
  code = 'SCHEMA_ERROR';
  context: Record<string, unknown>;

  constructor(message: string, context?: Record<string, unknown>) {
    super(message);
    this.name = 'SchemaError';
    this.context = context || {};
  }
}

export class PersistenceError extends Error implements AppError {
  code = 'PERSISTENCE_ERROR';
  context: Record<string, unknown>;
  readonly table: string;

  constructor(table: string, message: string, context?: Record<string, unknown>) {
    super(message);
    this.name = 'PersistenceError';
    this.table = table;
    this.context = context || {};
  }
}

export function isAppError(error: unknown): error is AppError {
  return error instanceof ValidationError ||
    error instanceof ProcessingError ||
    error instanceof DatabaseError ||
    error instanceof ParseError ||
    error instanceof SchemaError ||
    error instanceof PersistenceError;
}

// Input validation utilities
export class Validators {
  static isValidDirectory(path: string): boolean {
    return Boolean(path && path.length > 0 && fs.existsSync(path) && fs.statSync(path).isDirectory());
  }

  static isValidString(value: unknown): value is string {
    return typeof value === 'string' && value.trim().length > 0;
  }

  static isValidNumber(value: unknown): value is number {
    return typeof value === 'number' && !isNaN(value);
  }

  static isPositiveInteger(value: unknown): value is number {
    return Validators.isValidNumber(value) && Number.isInteger(value) && value > 0;
  }

  static isValidDate(value: unknown): value is Date {
    return value instanceof Date && !isNaN(value.getTime());
  }

  static isLogLevel(value: unknown): value is LogLevel {
    return typeof value === 'string' && Object.prototype.hasOwnProperty.call(LOG_LEVEL_RANK, value);
  }
}

const LOG_LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export interface LogSink {
  log(line: string): void;
  error(line: string): void;
}

const consoleSink: LogSink = {
  log: line => console.log(line),
  error: line => console.error(line),
};

// Standardized logging
export class Logger {
  constructor(
    private level: LogLevel = 'info',
    private sink: LogSink = consoleSink
  ) {}

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  isEnabled(level: LogLevel): boolean {
    return LOG_LEVEL_RANK[level] >= LOG_LEVEL_RANK[this.level];
  }

  debug(message: string, context?: Record<string, unknown>) {
    if (this.isEnabled('debug')) {
      this.sink.log(`🔍 ${message}${formatContext(context)}`);
    }
  }

  info(message: string, context?: Record<string, unknown>) {
    if (this.isEnabled('info')) {
      this.sink.log(`ℹ️  ${message}${formatContext(context)}`);
    }
  }

  success(message: string) {
    if (this.isEnabled('info')) {
      this.sink.log(`✅ ${message}`);
    }
  }

  warn(message: string) {
    if (this.isEnabled('warn')) {
      this.sink.log(`⚠️  ${message}`);
    }
  }

  error(message: string, error?: unknown) {
    if (!this.isEnabled('error')) return;
    if (error === undefined) {
      this.sink.error(`❌ ${message}`);
      return;
    }
    const errorMessage = error instanceof Error ? error.message : String(error);
    this.sink.error(`❌ ${message}: ${errorMessage}`);
  }
}

function formatContext(context?: Record<string, unknown>): string {
  return context ? ` ${JSON.stringify(context)}` : '';
}

// Error handling utility
export function handleError(error: unknown, context: string, logger: Logger): never {
  if (isAppError(error)) {
    logger.error(`${context} failed`, error);
    let cause = error.context['originalError'];
    while (isAppError(cause) && cause.context['originalError'] !== undefined) {
      cause = cause.context['originalError'];
    }
    if (cause !== undefined) {
      logger.error('Caused by', cause);
    }
  } else {
    logger.error(`Unexpected error during ${context}`, error);
  }
  process.exit(1);
}
