/**
 * Mime Type Helpers
 *
 * Parsing of content type strings and extension-based type guessing for
 * resources read from disk.
 */

import * as path from 'node:path'

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export interface ParsedMimeType {
  /** Top-level type, lower-cased (e.g., 'image') */
  type: string
  /** Subtype, lower-cased (e.g., 'svg+xml') */
  subtype: string
  /** `type/subtype` without parameters */
  essence: string
  /** Parameters keyed by lower-cased name */
  parameters: Record<string, string>
}

// ─────────────────────────────────────────────────────────────────────────────
// MIME Types
// ─────────────────────────────────────────────────────────────────────────────

const MIME_TYPES: Record<string, string> = {
  // Images
  '.png': 'image/png',
  '.jpg': 'image/jpeg',
  '.jpeg': 'image/jpeg',
  '.gif': 'image/gif',
  '.webp': 'image/webp',
  '.svg': 'image/svg+xml',
  '.svgz': 'image/svg+xml',
  '.bmp': 'image/bmp',
  '.ico': 'image/x-icon',
  '.avif': 'image/avif',
  '.tif': 'image/tiff',
  '.tiff': 'image/tiff',

  // Text
  '.md': 'text/markdown; charset=UTF-8',
  '.markdown': 'text/markdown; charset=UTF-8',
  '.txt': 'text/plain; charset=UTF-8',
  '.html': 'text/html; charset=UTF-8',
  '.htm': 'text/html; charset=UTF-8',
  '.css': 'text/css; charset=UTF-8',
  '.csv': 'text/csv; charset=UTF-8',
  '.xml': 'text/xml; charset=UTF-8',

  // Data
  '.json': 'application/json; charset=UTF-8',
  '.pdf': 'application/pdf',
}

const TOKEN = /^[!#$%&'*+.^_`|~0-9A-Za-z-]+$/

function unquote(value: string): string {
  if (value.length >= 2 && value.startsWith('"') && value.endsWith('"')) {
    return value.slice(1, -1).replace(/\\(.)/g, '$1')
  }
  return value
}

/**
 * Parse a content type such as `text/html; charset=UTF-8`
 *
 * Returns undefined when the value has no valid `type/subtype` part.
 * Parameters without a `=` are ignored.
 */
export function parseMimeType(value: string): ParsedMimeType | undefined {
  const [head, ...params] = value.split(';')
  const slash = head.indexOf('/')
  if (slash === -1) return undefined

  const type = head.slice(0, slash).trim().toLowerCase()
  const subtype = head.slice(slash + 1).trim().toLowerCase()
  if (!TOKEN.test(type) || !TOKEN.test(subtype)) return undefined

  const parameters: Record<string, string> = {}
  for (const param of params) {
    const eq = param.indexOf('=')
    if (eq === -1) continue
    const name = param.slice(0, eq).trim().toLowerCase()
    if (!TOKEN.test(name)) continue
    parameters[name] = unquote(param.slice(eq + 1).trim())
  }

  return { type, subtype, essence: `${type}/${subtype}`, parameters }
}

/**
 * Guess a mime type from a file path's extension
 */
export function guessMimeType(filePath: string): string | undefined {
  const ext = path.extname(filePath).toLowerCase()
  return MIME_TYPES[ext]
}
