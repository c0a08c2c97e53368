/**
 * Function Handlers
 *
 * Lets a plain `(url) => MimeData` function stand in for a handler object.
 */

import type { HandlerLike, MimeData, ResourceReader, ResourceUrlHandler } from './types.js'

class ReaderResourceHandler implements ResourceUrlHandler {
  constructor(
    readonly name: string,
    private readonly reader: ResourceReader
  ) {}

  readResource(url: URL): MimeData {
    return this.reader(url)
  }
}

/**
 * Normalize a handler or reader function into a handler
 *
 * Handler objects are returned as they are. A reader function is wrapped in
 * a handler named `name`, falling back to the function's own name.
 *
 * @example
 * ```typescript
 * const assets = toResourceHandler((url) => {
 *   filterSchemes(['asset'], url)
 *   return new MimeData('image/png', bundle.get(url.pathname))
 * }, 'assets')
 * ```
 */
export function toResourceHandler(handler: HandlerLike, name?: string): ResourceUrlHandler {
  if (typeof handler !== 'function') {
    return handler
  }
  return new ReaderResourceHandler(name ?? (handler.name || 'reader'), handler)
}
