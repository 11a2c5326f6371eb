/**
 * Error Factories
 *
 * Pre-built error helpers for the parser's failure scenarios.
 * Each factory creates a ProtoError with both string code and numeric status.
 */

import { ProtoError } from './proto-error.js'

/**
 * A single option validation problem
 */
export interface OptionIssue {
  /** Dotted path of the offending option */
  path: string
  /** Why validation failed */
  message: string
}

/**
 * Pre-built error factories for consistent error handling
 *
 * @example
 * ```typescript
 * throw Errors.fileNotFound('api/service.proto')
 * // Creates: { code: 'NOT_FOUND', status: 404, message: "Definition file 'api/service.proto' not found" }
 * ```
 */
export const Errors = {
  /**
   * Parser options failed validation
   * @param issues - One entry per failing option
   */
  invalidOptions(issues: OptionIssue[]): ProtoError {
    const message = issues.map((issue) => `${issue.path}: ${issue.message}`).join('; ')
    return new ProtoError('INVALID_ARGUMENT', `Invalid parser options: ${message}`, { issues })
  },

  /**
   * Definition file does not exist
   */
  fileNotFound(path: string): ProtoError {
    return new ProtoError('NOT_FOUND', `Definition file '${path}' not found`, { path })
  },

  /**
   * Definition file exists but could not be read
   * @param cause - Underlying I/O error
   */
  readFailed(path: string, cause: unknown): ProtoError {
    const reason = cause instanceof Error ? cause.message : String(cause)
    return new ProtoError('INTERNAL_ERROR', `Failed to read '${path}': ${reason}`, { path, cause })
  },

  /**
   * A visitor was handed a line it does not claim
   */
  unexpectedLine(kind: string, lineNumber: number, syntax: string): ProtoError {
    return new ProtoError(
      'INVALID_ARGUMENT',
      `Expected ${kind} declaration at line ${lineNumber}: ${syntax}`,
      { kind, line: lineNumber, syntax }
    )
  },

  /**
   * A line source was read after `scan()` reported no more input
   * @param lastLine - Number of the last line the source produced (0 when empty)
   */
  endOfInput(lastLine: number): ProtoError {
    return new ProtoError('OUT_OF_RANGE', `No line available after line ${lastLine}`, { lastLine })
  },
}
