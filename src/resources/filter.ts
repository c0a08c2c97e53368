import { Errors } from '../errors/index.js'

/**
 * The scheme of a URL without its trailing colon
 */
export function urlScheme(url: URL): string {
  return url.protocol.slice(0, -1)
}

/**
 * Return `url` if its scheme is one of `schemes`, otherwise throw an
 * `UNSUPPORTED` ResourceError.
 *
 * @example
 * ```typescript
 * readResource(url: URL): MimeData {
 *   filterSchemes(['file'], url)
 *   // ... only file: URLs get here
 * }
 * ```
 */
export function filterSchemes(schemes: readonly string[], url: URL): URL {
  if (schemes.includes(urlScheme(url))) {
    return url
  }
  throw Errors.unsupported(
    url,
    `Unsupported scheme in ${url.href}, expected one of [${schemes.map((scheme) => JSON.stringify(scheme)).join(', ')}]`
  )
}
