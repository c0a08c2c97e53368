/**
 * Resources Module
 *
 * Handler contract, scheme guard, the built-in handlers and the dispatcher
 * that chains them.
 */

export { MimeData, DEFAULT_READ_LIMIT } from './types.js'
export type { ResourceUrlHandler, ResourceReader, HandlerLike } from './types.js'

export { filterSchemes, urlScheme } from './filter.js'
export { toResourceHandler } from './reader.js'

export { NoopResourceHandler } from './noop.js'
export { DispatchingResourceHandler } from './dispatch.js'
export { FileResourceHandler } from './file.js'
export type { FileResourceHandlerOptions } from './file.js'
export { DataUrlResourceHandler } from './data.js'
export type { DataUrlResourceHandlerOptions } from './data.js'

export { createResourceHandler } from './factory.js'
export type { ResourceHandlerConfig, HandlerConfig, HandlerType } from './factory.js'
