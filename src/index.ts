/**
 * resource-handlers
 *
 * Pluggable resolution of the bytes and content type behind a URL.
 *
 * @example
 * ```typescript
 * import { createResourceHandler, isUnsupported } from 'resource-handlers'
 *
 * const resources = createResourceHandler()
 *
 * try {
 *   const image = resources.readResource(new URL('file:///tmp/diagram.png'))
 *   render(image.mimeTypeEssence(), image.data)
 * } catch (error) {
 *   if (!isUnsupported(error)) throw error
 *   renderLink()
 * }
 * ```
 */

// === Resources ===
export {
  MimeData,
  DEFAULT_READ_LIMIT,
  filterSchemes,
  urlScheme,
  toResourceHandler,
  NoopResourceHandler,
  DispatchingResourceHandler,
  FileResourceHandler,
  DataUrlResourceHandler,
  createResourceHandler,
} from './resources/index.js'

export type {
  ResourceUrlHandler,
  ResourceReader,
  HandlerLike,
  FileResourceHandlerOptions,
  DataUrlResourceHandlerOptions,
  ResourceHandlerConfig,
  HandlerConfig,
  HandlerType,
} from './resources/index.js'

// === Errors ===
export {
  Errors,
  ResourceErrorCodes,
  ResourceError,
  getErrorCode,
  isErrorCode,
  isResourceError,
  isUnsupported,
} from './errors/index.js'

export type { ErrorCode, ErrorCodeDef } from './errors/index.js'

// === Utilities ===
export {
  createLogger,
  getLogger,
  resolveLoggerSettings,
  LOG_DESTINATION,
  parseMimeType,
  guessMimeType,
} from './utils/index.js'
export type { ParsedMimeType, LoggerSettings } from './utils/index.js'
