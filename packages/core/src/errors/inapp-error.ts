/**
 * InAppError - structured error with a code, category and context
 */

import {
  type ErrorCategory,
  type ErrorCode,
  getErrorCategory,
  getErrorInfo,
} from './error-codes.js';

/**
 * Options for creating an InAppError
 */
export interface InAppErrorOptions {
  /** The error code */
  code: ErrorCode;
  /** Custom message (overrides default) */
  message?: string;
  /** Custom suggestion (overrides default) */
  suggestion?: string;
  /** Additional context information */
  context?: Record<string, unknown>;
  /** The original error that caused this error */
  cause?: Error;
}

/**
 * Serialized format of an InAppError
 */
export interface SerializedInAppError {
  name: string;
  code: string;
  message: string;
  suggestion?: string;
  category: ErrorCategory;
  context: Record<string, unknown>;
  stack?: string;
  cause?: SerializedInAppError | { name: string; message: string; stack?: string };
}

/**
 * Error class shared by every in-app remote data package.
 *
 * Carries a unique code, a category derived from it, a suggestion for
 * resolving the failure and free-form context for debugging.
 *
 * @example
 * ```typescript
 * throw new InAppError({
 *   code: 'INAPP_R100',
 *   context: { source: 'app' },
 * });
 *
 * try {
 *   await provider.fetch('app');
 * } catch (error) {
 *   if (InAppError.isCategory(error, 'remote-data')) {
 *     logger.warn(error.format());
 *   }
 * }
 * ```
 */
export class InAppError extends Error {
  /** Unique error code */
  readonly code: ErrorCode;

  /** Helpful suggestion for resolving the error */
  readonly suggestion?: string;

  /** Error category for grouping */
  readonly category: ErrorCategory;

  /** Additional context information */
  readonly context: Record<string, unknown>;

  /** Original error that caused this error */
  override readonly cause?: Error;

  constructor(options: InAppErrorOptions) {
    const errorInfo = getErrorInfo(options.code);
    const message = options.message ?? errorInfo.message;

    super(message, { cause: options.cause });

    this.name = 'InAppError';
    this.code = options.code;
    this.suggestion = options.suggestion ?? errorInfo.suggestion;
    this.category = getErrorCategory(options.code);
    this.context = options.context ?? {};
    this.cause = options.cause;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, InAppError);
    }
  }

  /**
   * Create an InAppError from an error code with minimal options
   */
  static fromCode(code: ErrorCode, context?: Record<string, unknown>): InAppError {
    return new InAppError({ code, context });
  }

  /**
   * Wrap an existing error
   */
  static wrap(error: Error, code: ErrorCode, context?: Record<string, unknown>): InAppError {
    return new InAppError({
      code,
      message: error.message,
      context,
      cause: error,
    });
  }

  static isInAppError(error: unknown): error is InAppError {
    return error instanceof InAppError;
  }

  static isCode(error: unknown, code: ErrorCode): boolean {
    return InAppError.isInAppError(error) && error.code === code;
  }

  static isCategory(error: unknown, category: ErrorCategory): boolean {
    return InAppError.isInAppError(error) && error.category === category;
  }

  /**
   * Format the error for display
   */
  format(): string {
    const lines = [`[${this.code}] ${this.message}`];

    if (Object.keys(this.context).length > 0) {
      lines.push(`Context: ${JSON.stringify(this.context)}`);
    }

    if (this.suggestion) {
      lines.push(`Suggestion: ${this.suggestion}`);
    }

    return lines.join('\n');
  }

  /**
   * Convert to a plain object for serialization
   */
  toJSON(): SerializedInAppError {
    const result: SerializedInAppError = {
      name: this.name,
      code: this.code,
      message: this.message,
      category: this.category,
      context: this.context,
    };

    if (this.suggestion) {
      result.suggestion = this.suggestion;
    }

    if (this.stack) {
      result.stack = this.stack;
    }

    if (this.cause) {
      if (InAppError.isInAppError(this.cause)) {
        result.cause = this.cause.toJSON();
      } else {
        result.cause = {
          name: this.cause.name,
          message: this.cause.message,
          stack: this.cause.stack,
        };
      }
    }

    return result;
  }

  override toString(): string {
    return this.format();
  }
}

/**
 * Preference store read or write failure
 */
export class StorageError extends InAppError {
  constructor(message: string, context?: Record<string, unknown>, cause?: Error) {
    super({ code: 'INAPP_S400', message, context, cause });
    this.name = 'StorageError';
  }
}

/**
 * Helper function to ensure errors are InAppErrors
 */
export function ensureInAppError(
  error: unknown,
  defaultCode: ErrorCode = 'INAPP_X900',
  context?: Record<string, unknown>
): InAppError {
  if (InAppError.isInAppError(error)) {
    return error;
  }

  if (error instanceof Error) {
    return InAppError.wrap(error, defaultCode, context);
  }

  return new InAppError({
    code: defaultCode,
    message: String(error),
    context,
  });
}
