import { getStatusForCode } from './codes.js'

/**
 * Error raised by the parser's outer surfaces (options, files, line sources).
 *
 * The RPC recognizer never throws for malformed definition text; it recovers
 * and returns what it built.
 */
export class ProtoError extends Error {
  /**
   * Numeric status code (HTTP-compatible)
   *
   * - 400-499: Caller errors
   * - 500-599: Internal errors
   */
  public readonly status: number

  constructor(
    /** String error code (e.g., 'NOT_FOUND', 'INVALID_ARGUMENT') */
    public readonly code: string,
    message: string,
    public readonly details?: unknown,
    /** Optional explicit status override */
    status?: number
  ) {
    super(message)
    this.name = 'ProtoError'
    this.status = status ?? getStatusForCode(code)
  }

  /**
   * Convert to plain object for serialization
   */
  toJSON(): { code: string; status: number; message: string; details?: unknown } {
    return {
      code: this.code,
      status: this.status,
      message: this.message,
      ...(this.details !== undefined && { details: this.details }),
    }
  }
}
