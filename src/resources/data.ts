/**
 * Data URL Resource Handler
 *
 * Reads resources embedded in `data:` URLs:
 * `data:[<mediatype>][;base64],<payload>`
 */

import { Errors } from '../errors/index.js'
import { parseMimeType } from '../utils/mime.js'
import { filterSchemes } from './filter.js'
import { DEFAULT_READ_LIMIT, MimeData, type ResourceUrlHandler } from './types.js'

export interface DataUrlResourceHandlerOptions {
  /**
   * Maximum number of decoded bytes
   * @default 104857600 (100 MiB)
   */
  readLimit?: number
}

const DEFAULT_MEDIA_TYPE = 'text/plain;charset=US-ASCII'
const BASE64_SUFFIX = /;\s*base64\s*$/i
const BASE64_BODY = /^[A-Za-z0-9+/]*$/
const HEX_PAIR = /^[0-9A-Fa-f]{2}$/

/**
 * Decode `%XX` escapes to raw bytes; everything else is taken as UTF-8
 */
function percentDecode(input: string): Buffer {
  const bytes: number[] = []
  const encoded = Buffer.from(input, 'utf8')
  for (let i = 0; i < encoded.length; i += 1) {
    const byte = encoded[i]
    if (byte === 0x25 && i + 2 < encoded.length) {
      const hex = encoded.subarray(i + 1, i + 3).toString('latin1')
      if (HEX_PAIR.test(hex)) {
        bytes.push(parseInt(hex, 16))
        i += 2
        continue
      }
    }
    bytes.push(byte)
  }
  return Buffer.from(bytes)
}

function decodeBase64(url: URL, payload: Buffer): Buffer {
  let text = payload.toString('latin1').replace(/[\t\n\f\r ]/g, '')
  // Padding is only valid on a whole number of quanta
  if (text.length % 4 === 0) {
    text = text.replace(/={1,2}$/, '')
  }
  if (!BASE64_BODY.test(text) || text.length % 4 === 1) {
    throw Errors.malformedData(url, `Invalid base64 payload in data URL ${url.href}`)
  }
  return Buffer.from(text, 'base64')
}

function normalizeMediaType(mediaType: string): string {
  if (mediaType === '') return DEFAULT_MEDIA_TYPE
  const value = mediaType.startsWith(';') ? `text/plain${mediaType}` : mediaType
  return parseMimeType(value) ? value : DEFAULT_MEDIA_TYPE
}

/**
 * Data URL Resource Handler
 *
 * @example
 * ```typescript
 * const embedded = new DataUrlResourceHandler()
 * const pixel = embedded.readResource(new URL('data:image/png;base64,iVBORw0KGgo='))
 * pixel.mimeType // 'image/png'
 * ```
 */
export class DataUrlResourceHandler implements ResourceUrlHandler {
  readonly name = 'data'

  readonly readLimit: number

  constructor(options: DataUrlResourceHandlerOptions = {}) {
    this.readLimit = options.readLimit ?? DEFAULT_READ_LIMIT
  }

  readResource(url: URL): MimeData {
    filterSchemes(['data'], url)

    // Everything after `data:` up to the fragment
    const input = url.pathname + url.search
    const comma = input.indexOf(',')
    if (comma === -1) {
      throw Errors.malformedData(url)
    }

    let mediaType = input.slice(0, comma).trim()
    const payload = percentDecode(input.slice(comma + 1))

    let data: Buffer
    if (BASE64_SUFFIX.test(mediaType)) {
      mediaType = mediaType.replace(BASE64_SUFFIX, '').trim()
      data = decodeBase64(url, payload)
    } else {
      data = payload
    }

    if (data.length > this.readLimit) {
      throw Errors.limitExceeded(url, this.readLimit)
    }

    return new MimeData(normalizeMediaType(mediaType), data)
  }
}
