/**
 * Error Codes
 *
 * Central definition of every code a resource handler may fail with.
 *
 * `UNSUPPORTED` is the only code with protocol meaning: a handler throws it
 * to say "this URL is not mine, try the next handler". Every other code means
 * the handler owned the URL and failed to read it.
 */

/**
 * Error code definition with string identifier and default message
 */
export interface ErrorCodeDef {
  /** String identifier (e.g., 'NOT_FOUND') */
  code: string
  /** Default message */
  message: string
}

/**
 * All resource error codes
 */
export const ResourceErrorCodes = {
  /** The handler does not read URLs of this scheme or form */
  UNSUPPORTED: {
    code: 'UNSUPPORTED',
    message: 'Unsupported resource',
  },

  /** The resource does not exist */
  NOT_FOUND: {
    code: 'NOT_FOUND',
    message: 'Resource not found',
  },

  /** The resource exists but may not be read */
  PERMISSION_DENIED: {
    code: 'PERMISSION_DENIED',
    message: 'Permission denied',
  },

  /** The URL belongs to the handler but cannot address a resource */
  INVALID_URL: {
    code: 'INVALID_URL',
    message: 'Invalid resource URL',
  },

  /** The resource content is not in the expected format */
  MALFORMED_DATA: {
    code: 'MALFORMED_DATA',
    message: 'Malformed resource data',
  },

  /** The resource is larger than the handler's read limit */
  LIMIT_EXCEEDED: {
    code: 'LIMIT_EXCEEDED',
    message: 'Read limit exceeded',
  },

  /** Handler configuration failed validation */
  INVALID_CONFIG: {
    code: 'INVALID_CONFIG',
    message: 'Invalid configuration',
  },

  /** Any other I/O failure */
  IO_ERROR: {
    code: 'IO_ERROR',
    message: 'I/O error',
  },

  /** Unknown error */
  UNKNOWN: {
    code: 'UNKNOWN',
    message: 'Unknown error',
  },
} as const satisfies Record<string, ErrorCodeDef>

/**
 * Error code type (string union)
 */
export type ErrorCode = keyof typeof ResourceErrorCodes

/**
 * Check whether a string is one of the known codes
 */
export function isErrorCode(code: string): code is ErrorCode {
  return Object.prototype.hasOwnProperty.call(ResourceErrorCodes, code)
}

/**
 * Get error code definition by string code
 */
export function getErrorCode(code: string): ErrorCodeDef {
  if (isErrorCode(code)) {
    return ResourceErrorCodes[code]
  }

  // Return unknown for unrecognized codes
  return {
    code,
    message: code,
  }
}
