/**
 * Dispatching Resource Handler
 *
 * Composes an ordered list of handlers into one. Handlers are asked in order
 * until one answers: a result or a failure other than `UNSUPPORTED` ends the
 * walk, and later handlers are never called.
 */

import { Errors, isUnsupported } from '../errors/index.js'
import { createLogger } from '../utils/logger.js'
import { toResourceHandler } from './reader.js'
import type { HandlerLike, MimeData, ResourceUrlHandler } from './types.js'

const logger = createLogger('resources:dispatch')

/**
 * A handler which dispatches reading among a list of inner handlers
 *
 * @example
 * ```typescript
 * const resources = new DispatchingResourceHandler([
 *   new FileResourceHandler({ readLimit: 10 * 1024 * 1024 }),
 *   new DataUrlResourceHandler(),
 * ])
 *
 * const image = resources.readResource(new URL('file:///tmp/logo.png'))
 * image.mimeTypeEssence() // 'image/png'
 * ```
 */
export class DispatchingResourceHandler implements ResourceUrlHandler {
  readonly name = 'dispatch'

  private readonly handlers: readonly ResourceUrlHandler[]

  constructor(handlers: readonly HandlerLike[]) {
    this.handlers = handlers.map((handler) => toResourceHandler(handler))
  }

  /**
   * Try every inner handler while they throw `UNSUPPORTED`
   *
   * Returns the first result. Any other error is rethrown as it is. When
   * every handler declines, throws a fresh `UNSUPPORTED` error so that this
   * dispatcher can itself sit inside another one.
   */
  readResource(url: URL): MimeData {
    for (const handler of this.handlers) {
      let data: MimeData
      try {
        data = handler.readResource(url)
      } catch (error) {
        if (isUnsupported(error)) {
          logger.debug({ url: url.href, handler: handler.name }, 'Handler declined resource')
          continue
        }
        logger.debug({ url: url.href, handler: handler.name, err: error }, 'Handler failed to read resource')
        throw error
      }
      logger.debug({ url: url.href, handler: handler.name }, 'Resource read')
      return data
    }

    throw Errors.unsupported(url, `No handler supported reading from ${url.href}`)
  }
}
