/**
 * Resource Types
 *
 * The handler contract shared by every resource reading strategy, and the
 * data a successful read produces.
 */

import { parseMimeType } from '../utils/mime.js'

/**
 * Data of a resource with its mime type, if known
 */
export class MimeData {
  constructor(
    /** Content type as reported by the handler (may carry parameters) */
    public readonly mimeType: string | undefined,
    public readonly data: Buffer
  ) {}

  /**
   * The mime type without parameters, e.g. `image/png` for
   * `image/png; charset=binary`
   */
  mimeTypeEssence(): string | undefined {
    if (this.mimeType === undefined) return undefined
    return parseMimeType(this.mimeType)?.essence
  }
}

/**
 * Reads the resource behind a URL
 *
 * `readResource` either returns the data, throws a ResourceError with code
 * `UNSUPPORTED` when the URL is outside the handler's domain, or throws any
 * other error when the URL is its own but reading failed. Only `UNSUPPORTED`
 * lets a dispatcher fall back to the next handler.
 *
 * Handlers hold no per-call state; one instance serves any number of reads.
 */
export interface ResourceUrlHandler {
  /** Handler name for identification */
  readonly name: string

  readResource(url: URL): MimeData
}

/**
 * Plain function form of a handler
 */
export type ResourceReader = (url: URL) => MimeData

/**
 * Anything accepted where a handler is expected
 */
export type HandlerLike = ResourceUrlHandler | ResourceReader

/**
 * Default read limit for file and data handlers (100 MiB)
 */
export const DEFAULT_READ_LIMIT = 104_857_600
