/**
 * Error types raised by the promotion core
 *
 * Services throw these internally and translate them into ServiceResponse
 * envelopes at their public edge.
 */

import { PromotionErrorCode } from './enums';

export type ErrorContext = Record<string, unknown>;

/**
 * Domain error carrying a code from the promotion taxonomy
 */
export class PromotionError extends Error {
  readonly code: PromotionErrorCode;
  readonly context: ErrorContext | undefined;

  constructor(code: PromotionErrorCode, message: string, context?: ErrorContext, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'PromotionError';
    this.code = code;
    this.context = context;
  }

  static isPromotionError(error: unknown): error is PromotionError {
    return error instanceof PromotionError;
  }

  /**
   * Check an error for a specific code
   */
  static hasCode(error: unknown, code: PromotionErrorCode): boolean {
    return error instanceof PromotionError && error.code === code;
  }
}

/**
 * Raised by the schema-version parser
 */
export class SchemaVersionError extends PromotionError {
  constructor(message: string, context?: ErrorContext) {
    super(PromotionErrorCode.INVALID_FORMAT, message, context);
    this.name = 'SchemaVersionError';
  }
}

/**
 * Raised by the migration registry
 */
export class MigrationError extends PromotionError {
  constructor(
    code: PromotionErrorCode.DUPLICATE_MIGRATION | PromotionErrorCode.NO_MIGRATION_PATH | PromotionErrorCode.MIGRATION_FAILED | PromotionErrorCode.INVALID_FORMAT,
    message: string,
    context?: ErrorContext,
    options?: { cause?: unknown }
  ) {
    super(code, message, context, options);
    this.name = 'MigrationError';
  }
}

/**
 * Raised by repositories when a record does not exist
 */
export class RepositoryNotFoundError extends Error {
  readonly resource: string;
  readonly key: string;

  constructor(resource: string, key: string) {
    super(`${resource} not found: ${key}`);
    this.name = 'RepositoryNotFoundError';
    this.resource = resource;
    this.key = key;
  }

  static isNotFound(error: unknown): error is RepositoryNotFoundError {
    return error instanceof RepositoryNotFoundError;
  }
}

/**
 * Raised by repositories when a unique constraint rejects a write,
 * e.g. a racing create of the same (environment, slug)
 */
export class RepositoryConflictError extends Error {
  readonly resource: string;
  readonly key: string;

  constructor(resource: string, key: string) {
    super(`${resource} already exists: ${key}`);
    this.name = 'RepositoryConflictError';
    this.resource = resource;
    this.key = key;
  }

  static isConflict(error: unknown): error is RepositoryConflictError {
    return error instanceof RepositoryConflictError;
  }
}

/**
 * Message of an unknown thrown value
 */
export function errorMessage(error: unknown, fallback = 'Unknown error'): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string' && error.length > 0) return error;
  return fallback;
}

/**
 * Code of an unknown thrown value within the promotion taxonomy
 */
export function errorCodeOf(error: unknown): PromotionErrorCode {
  if (error instanceof PromotionError) return error.code;
  if (error instanceof RepositoryNotFoundError) return PromotionErrorCode.NOT_FOUND;
  if (error instanceof RepositoryConflictError) return PromotionErrorCode.SLUG_EXISTS;
  if (error instanceof Error && error.name === 'AbortError') return PromotionErrorCode.CANCELLED;
  return PromotionErrorCode.INTERNAL_ERROR;
}
