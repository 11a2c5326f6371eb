/**
 * Error Codes
 *
 * Central definition of the parser's error codes with both string identifiers
 * and numeric status codes. The numeric codes follow HTTP semantics for
 * familiarity.
 *
 * Status Code Ranges:
 * - 400-499: Caller errors (bad options, missing file, reading past the end)
 * - 500-599: Internal errors (I/O failures)
 */

/**
 * Error code definition with string identifier and numeric status
 */
export interface ErrorCodeDef {
  /** String identifier (e.g., 'NOT_FOUND') */
  code: string
  /** Numeric status code (e.g., 404) */
  status: number
  /** Default message */
  message: string
}

export const ErrorCodes = {
  // ─────────────────────────────────────────────────────────────
  // 4xx - Caller Errors
  // ─────────────────────────────────────────────────────────────

  /** Invalid parser options */
  INVALID_ARGUMENT: {
    code: 'INVALID_ARGUMENT',
    status: 400,
    message: 'Invalid argument',
  },

  /** Definition file not found */
  NOT_FOUND: {
    code: 'NOT_FOUND',
    status: 404,
    message: 'Not found',
  },

  /** Line source read after it was exhausted */
  OUT_OF_RANGE: {
    code: 'OUT_OF_RANGE',
    status: 416,
    message: 'Out of range',
  },

  // ─────────────────────────────────────────────────────────────
  // 5xx - Internal Errors
  // ─────────────────────────────────────────────────────────────

  /** Internal error (I/O failure, unexpected state) */
  INTERNAL_ERROR: {
    code: 'INTERNAL_ERROR',
    status: 500,
    message: 'Internal error',
  },

  /** Unknown error */
  UNKNOWN: {
    code: 'UNKNOWN',
    status: 500,
    message: 'Unknown error',
  },
} as const satisfies Record<string, ErrorCodeDef>

/**
 * Error code type (string union)
 */
export type ErrorCode = keyof typeof ErrorCodes

function isErrorCode(code: string): code is ErrorCode {
  return Object.prototype.hasOwnProperty.call(ErrorCodes, code)
}

/**
 * Get error code definition by string code
 */
export function getErrorCode(code: string): ErrorCodeDef {
  if (isErrorCode(code)) {
    return ErrorCodes[code]
  }

  // Return unknown for unrecognized codes
  return {
    code,
    status: 500,
    message: code,
  }
}

/**
 * Get numeric status for a string code
 */
export function getStatusForCode(code: string): number {
  return getErrorCode(code).status
}

/**
 * Check if status code is a caller error (4xx)
 */
export function isClientError(status: number): boolean {
  return status >= 400 && status < 500
}
