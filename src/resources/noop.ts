import { Errors } from '../errors/index.js'
import type { MimeData, ResourceUrlHandler } from './types.js'

/**
 * A handler which reads nothing
 *
 * Every URL is declined with `UNSUPPORTED`, so in a dispatcher it behaves as
 * if it were absent.
 */
export class NoopResourceHandler implements ResourceUrlHandler {
  readonly name = 'noop'

  readResource(url: URL): MimeData {
    throw Errors.unsupported(url)
  }
}
