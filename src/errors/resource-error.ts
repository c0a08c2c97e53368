/**
 * Resource Error
 *
 * The single error type thrown by resource handlers.
 */

import type { ErrorCode } from './codes.js'

export class ResourceError extends Error {
  constructor(
    /** Error code (e.g., 'UNSUPPORTED', 'NOT_FOUND') */
    public readonly code: ErrorCode,
    message: string,
    public readonly details?: unknown,
    options?: { cause?: unknown }
  ) {
    super(message, options)
    this.name = 'ResourceError'
  }

  /**
   * Convert to plain object for serialization
   */
  toJSON(): { code: ErrorCode; message: string; details?: unknown } {
    return {
      code: this.code,
      message: this.message,
      ...(this.details !== undefined && { details: this.details }),
    }
  }
}

/**
 * Check if a thrown value is a ResourceError
 */
export function isResourceError(error: unknown): error is ResourceError {
  return error instanceof ResourceError
}

/**
 * Check if a thrown value is the "try another handler" signal
 */
export function isUnsupported(error: unknown): error is ResourceError {
  return isResourceError(error) && error.code === 'UNSUPPORTED'
}
