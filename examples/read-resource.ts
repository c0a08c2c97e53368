/**
 * Read Resource Example
 *
 * Resolves each argument (a URL or a local path) through the default handler
 * chain, plus a custom handler for `asset:` URLs.
 *
 * Run: npx tsx examples/read-resource.ts ./logo.png 'data:,hello' asset:banner
 */

import { pathToFileURL } from 'node:url'
import {
  DispatchingResourceHandler,
  Errors,
  MimeData,
  createLogger,
  createResourceHandler,
  filterSchemes,
  isResourceError,
} from '../src/index.js'

const logger = createLogger('example')

const assets = new Map([['banner', Buffer.from('<svg xmlns="http://www.w3.org/2000/svg"/>')]])

const resources = new DispatchingResourceHandler([
  function readAsset(url: URL): MimeData {
    filterSchemes(['asset'], url)
    const data = assets.get(url.pathname)
    if (!data) {
      throw Errors.notFound(url)
    }
    return new MimeData('image/svg+xml', data)
  },
  createResourceHandler({ handlers: [{ type: 'file', readLimit: 1024 * 1024 }, { type: 'data' }] }),
])

function toUrl(arg: string): URL {
  return URL.canParse(arg) ? new URL(arg) : pathToFileURL(arg)
}

for (const arg of process.argv.slice(2)) {
  const url = toUrl(arg)
  try {
    const resource = resources.readResource(url)
    logger.info(
      { url: url.href, mimeType: resource.mimeTypeEssence() ?? 'unknown', bytes: resource.data.length },
      'Resource read'
    )
  } catch (error) {
    if (!isResourceError(error)) throw error
    logger.warn({ url: url.href, code: error.code }, error.message)
  }
}
