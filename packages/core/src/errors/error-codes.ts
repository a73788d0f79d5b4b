/**
 * In-app error codes
 *
 * Error codes are structured as INAPP_[CATEGORY][NUMBER]:
 * - R: Remote data errors (R100-R199)
 * - P: Persistence errors (P200-P299)
 * - V: Validation errors (V300-V399)
 * - S: Storage errors (S400-S499)
 * - X: Internal errors (X900-X999)
 */

/**
 * Error code definitions with messages and suggestions
 */
export const ERROR_CODES = {
  // Remote data errors (R100-R199)
  INAPP_R100: {
    code: 'INAPP_R100',
    message: 'Remote data fetch failed',
    suggestion: 'The source stays idle until the next change notification or refresh request.',
  },
  INAPP_R101: {
    code: 'INAPP_R101',
    message: 'Stale commit rejected',
    suggestion: 'A newer payload was already committed for this source. Discard the result.',
  },
  INAPP_R102: {
    code: 'INAPP_R102',
    message: 'Refresh abandoned',
    suggestion: 'The engine was unsubscribed while the refresh was pending.',
  },

  // Persistence errors (P200-P299)
  INAPP_P200: {
    code: 'INAPP_P200',
    message: 'Schedule persistence failed',
    suggestion: 'The affected schedules are retried on the next reconcile cycle.',
  },

  // Validation errors (V300-V399)
  INAPP_V300: {
    code: 'INAPP_V300',
    message: 'Invalid remote data payload',
    suggestion: 'The payload must be a JSON object with an optional in_app_messages array.',
  },
  INAPP_V301: {
    code: 'INAPP_V301',
    message: 'Invalid schedule entry',
    suggestion: 'Each in-app message needs an identifier and ISO-8601 timestamps.',
  },

  // Storage errors (S400-S499)
  INAPP_S400: {
    code: 'INAPP_S400',
    message: 'Preference store operation failed',
    suggestion: 'Check that the preference file is readable, writable and holds valid JSON.',
  },

  // Internal errors (X900-X999)
  INAPP_X900: {
    code: 'INAPP_X900',
    message: 'Internal error',
    suggestion: 'This is likely a bug. Please report it with the error context.',
  },
} as const;

/**
 * Error code type
 */
export type ErrorCode = keyof typeof ERROR_CODES;

/**
 * Error category type
 */
export type ErrorCategory = 'remote-data' | 'persistence' | 'validation' | 'storage' | 'internal';

/**
 * Get the category of an error code
 */
export function getErrorCategory(code: ErrorCode): ErrorCategory {
  const letter = code.charAt(6);
  switch (letter) {
    case 'R':
      return 'remote-data';
    case 'P':
      return 'persistence';
    case 'V':
      return 'validation';
    case 'S':
      return 'storage';
    default:
      return 'internal';
  }
}

/**
 * Get error info by code
 */
export function getErrorInfo(code: ErrorCode): (typeof ERROR_CODES)[ErrorCode] {
  return ERROR_CODES[code];
}
