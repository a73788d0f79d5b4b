/**
 * In-app error system
 *
 * - Unique error codes (INAPP_R100, INAPP_P200, etc.)
 * - Suggestions for resolution
 * - Error categorization
 * - Error chaining through `cause`
 *
 * @example
 * ```typescript
 * import { InAppError } from '@inapp/core';
 *
 * if (InAppError.isCode(error, 'INAPP_R101')) {
 *   // a newer payload already won
 * }
 * ```
 *
 * @module errors
 */

export {
  ERROR_CODES,
  getErrorCategory,
  getErrorInfo,
  type ErrorCategory,
  type ErrorCode,
} from './error-codes.js';

export {
  InAppError,
  StorageError,
  ensureInAppError,
  type InAppErrorOptions,
  type SerializedInAppError,
} from './inapp-error.js';
