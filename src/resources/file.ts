/**
 * File Resource Handler
 *
 * Reads `file:` URLs from the local filesystem.
 *
 * Features:
 * - Read limit checked before any byte is read
 * - Mime type guessed from the file extension
 * - Filesystem errors mapped to resource error codes
 */

import fs from 'node:fs'
import { fileURLToPath } from 'node:url'

import { Errors, isResourceError } from '../errors/index.js'
import { guessMimeType } from '../utils/mime.js'
import { filterSchemes } from './filter.js'
import { DEFAULT_READ_LIMIT, MimeData, type ResourceUrlHandler } from './types.js'

const READ_CHUNK_SIZE = 64 * 1024

export interface FileResourceHandlerOptions {
  /**
   * Maximum number of bytes to read from a file
   * @default 104857600 (100 MiB)
   */
  readLimit?: number
}

/**
 * File Resource Handler
 *
 * @example
 * ```typescript
 * const files = new FileResourceHandler({ readLimit: 1024 * 1024 })
 * const logo = files.readResource(pathToFileURL('docs/logo.png'))
 * ```
 */
export class FileResourceHandler implements ResourceUrlHandler {
  readonly name = 'file'

  readonly readLimit: number

  constructor(options: FileResourceHandlerOptions = {}) {
    this.readLimit = options.readLimit ?? DEFAULT_READ_LIMIT
  }

  readResource(url: URL): MimeData {
    filterSchemes(['file'], url)

    if (url.hostname !== '') {
      throw Errors.invalidUrl(url, `Remote file URL ${url.href} not supported`)
    }

    let filePath: string
    try {
      filePath = fileURLToPath(url)
    } catch (error) {
      throw Errors.invalidUrl(url, `Cannot convert ${url.href} to a local path`, error)
    }

    const data = this.readFile(url, filePath)
    return new MimeData(guessMimeType(filePath), data)
  }

  private readFile(url: URL, filePath: string): Buffer {
    let fd: number
    try {
      fd = fs.openSync(filePath, 'r')
    } catch (error) {
      throw Errors.fromSystemError(url, error)
    }

    try {
      const stats = fs.fstatSync(fd)
      if (stats.isDirectory()) {
        throw Errors.invalidUrl(url, `Resource ${url.href} is a directory`)
      }
      if (stats.size > this.readLimit) {
        throw Errors.limitExceeded(url, this.readLimit)
      }
      return this.readBounded(url, fd)
    } catch (error) {
      if (isResourceError(error)) throw error
      throw Errors.fromSystemError(url, error)
    } finally {
      fs.closeSync(fd)
    }
  }

  /**
   * Read at most `readLimit + 1` bytes; device files and pipes report size 0
   * so the fstat check alone does not bound them
   */
  private readBounded(url: URL, fd: number): Buffer {
    const buffer = Buffer.alloc(Math.min(this.readLimit + 1, READ_CHUNK_SIZE))
    const chunks: Buffer[] = []
    let total = 0

    for (;;) {
      const bytesRead = fs.readSync(fd, buffer, 0, buffer.length, null)
      if (bytesRead === 0) break
      total += bytesRead
      if (total > this.readLimit) {
        throw Errors.limitExceeded(url, this.readLimit)
      }
      chunks.push(Buffer.from(buffer.subarray(0, bytesRead)))
    }

    return Buffer.concat(chunks, total)
  }
}
