/**
 * Error Module
 *
 * Resource error type, error factories and error code definitions.
 */

export { Errors } from './factories.js'

export {
  ResourceErrorCodes,
  type ErrorCode,
  type ErrorCodeDef,
  getErrorCode,
  isErrorCode,
} from './codes.js'

export { ResourceError, isResourceError, isUnsupported } from './resource-error.js'
