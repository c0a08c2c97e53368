/**
 * Error Factories
 *
 * Pre-built error helpers for the failures resource handlers report.
 * Each factory creates a ResourceError carrying the URL it concerns.
 */

import { ResourceError } from './resource-error.js'

/**
 * Node system error shape (fs, net)
 */
interface SystemError {
  code: string
  message: string
}

function isSystemError(error: unknown): error is SystemError {
  return (
    error instanceof Error &&
    'code' in error &&
    typeof error.code === 'string'
  )
}

/**
 * Pre-built error factories for consistent error handling
 *
 * @example
 * ```typescript
 * throw Errors.unsupported(url, 'Only file URLs are read here')
 * // Creates: { code: 'UNSUPPORTED', message: 'Only file URLs are read here' }
 *
 * throw Errors.limitExceeded(url, 1024)
 * // Creates: { code: 'LIMIT_EXCEEDED', message: 'Contents of file:///a.png exceeded 1024 bytes' }
 * ```
 */
export const Errors = {
  /**
   * The URL is outside this handler's domain
   * @param reason - Optional message, defaults to naming the URL
   */
  unsupported(url: URL, reason?: string): ResourceError {
    return new ResourceError(
      'UNSUPPORTED',
      reason || `Reading from resource ${url.href} is not supported`,
      { url: url.href }
    )
  },

  notFound(url: URL, cause?: unknown): ResourceError {
    return new ResourceError('NOT_FOUND', `Resource ${url.href} not found`, { url: url.href }, { cause })
  },

  permissionDenied(url: URL, cause?: unknown): ResourceError {
    return new ResourceError(
      'PERMISSION_DENIED',
      `Permission denied reading ${url.href}`,
      { url: url.href },
      { cause }
    )
  },

  /**
   * The URL is in the handler's domain but does not address a readable resource
   */
  invalidUrl(url: URL, reason: string, cause?: unknown): ResourceError {
    return new ResourceError('INVALID_URL', reason, { url: url.href }, { cause })
  },

  malformedData(url: URL, reason?: string): ResourceError {
    return new ResourceError(
      'MALFORMED_DATA',
      reason || `Malformed data URL ${url.href}`,
      { url: url.href }
    )
  },

  /**
   * @param limit - Read limit in bytes
   */
  limitExceeded(url: URL, limit: number): ResourceError {
    return new ResourceError(
      'LIMIT_EXCEEDED',
      `Contents of ${url.href} exceeded ${limit} bytes`,
      { url: url.href, limit }
    )
  },

  /**
   * @param errors - Field errors reported by the config schema
   */
  invalidConfig(errors: Array<{ field: string; message: string; code: string }>): ResourceError {
    const message = errors.map((e) => `${e.field}: ${e.message}`).join('; ')
    return new ResourceError('INVALID_CONFIG', message, { errors })
  },

  io(url: URL, cause?: unknown): ResourceError {
    const reason = cause instanceof Error ? `: ${cause.message}` : ''
    return new ResourceError('IO_ERROR', `Failed to read ${url.href}${reason}`, { url: url.href }, { cause })
  },

  /**
   * Map a Node system error (fs errno) to a ResourceError
   */
  fromSystemError(url: URL, error: unknown): ResourceError {
    if (!isSystemError(error)) {
      return Errors.io(url, error)
    }

    switch (error.code) {
      case 'ENOENT':
      case 'ENOTDIR':
        return Errors.notFound(url, error)
      case 'EACCES':
      case 'EPERM':
        return Errors.permissionDenied(url, error)
      case 'EISDIR':
        return Errors.invalidUrl(url, `Resource ${url.href} is a directory`, error)
      default:
        return Errors.io(url, error)
    }
  },
}
