import { describe, it, expect, beforeAll, afterAll } from 'vitest'
import fs from 'node:fs'
import os from 'node:os'
import path from 'node:path'
import { pathToFileURL } from 'node:url'

import { ResourceError, isUnsupported } from '../errors/index.js'
import { FileResourceHandler } from './file.js'
import { DEFAULT_READ_LIMIT } from './types.js'

const PNG_SIGNATURE = Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a])

function readError(handler: FileResourceHandler, url: URL): ResourceError {
  try {
    handler.readResource(url)
  } catch (error) {
    if (error instanceof ResourceError) return error
    throw error
  }
  throw new Error('expected readResource to throw')
}

describe('FileResourceHandler', () => {
  let dir: string

  beforeAll(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'resource-handlers-'))
    fs.writeFileSync(path.join(dir, 'x.png'), PNG_SIGNATURE)
    fs.writeFileSync(path.join(dir, 'notes.unknownext'), 'hello')
    fs.writeFileSync(path.join(dir, 'empty.txt'), '')
    fs.mkdirSync(path.join(dir, 'sub'))
  })

  afterAll(() => {
    fs.rmSync(dir, { recursive: true, force: true })
  })

  it('should read a file with its mime type', () => {
    const handler = new FileResourceHandler()
    const result = handler.readResource(pathToFileURL(path.join(dir, 'x.png')))

    expect(result.mimeType).toBe('image/png')
    expect(result.mimeTypeEssence()).toBe('image/png')
    expect(result.data).toEqual(PNG_SIGNATURE)
  })

  it('should leave the mime type unset for unknown extensions', () => {
    const result = new FileResourceHandler().readResource(pathToFileURL(path.join(dir, 'notes.unknownext')))

    expect(result.mimeType).toBeUndefined()
    expect(result.data.toString('utf8')).toBe('hello')
  })

  it('should read empty files', () => {
    const result = new FileResourceHandler().readResource(pathToFileURL(path.join(dir, 'empty.txt')))

    expect(result.mimeTypeEssence()).toBe('text/plain')
    expect(result.data.length).toBe(0)
  })

  it('should decline other schemes', () => {
    const handler = new FileResourceHandler()

    expect(isUnsupported(readError(handler, new URL('data:,x')))).toBe(true)
    expect(isUnsupported(readError(handler, new URL('https://example.com/x.png')))).toBe(true)
  })

  it('should fail with NOT_FOUND for missing files', () => {
    const url = pathToFileURL(path.join(dir, 'missing.png'))
    const error = readError(new FileResourceHandler(), url)

    expect(error.code).toBe('NOT_FOUND')
    expect(error.message).toBe(`Resource ${url.href} not found`)
  })

  it('should fail with INVALID_URL for directories', () => {
    const url = pathToFileURL(path.join(dir, 'sub'))
    const error = readError(new FileResourceHandler(), url)

    expect(error.code).toBe('INVALID_URL')
    expect(error.message).toBe(`Resource ${url.href} is a directory`)
  })

  it('should reject remote file URLs', () => {
    const error = readError(new FileResourceHandler(), new URL('file://server/share/x.png'))

    expect(error.code).toBe('INVALID_URL')
    expect(error.message).toBe('Remote file URL file://server/share/x.png not supported')
  })

  describe('read limit', () => {
    it('should default to 100 MiB', () => {
      expect(new FileResourceHandler().readLimit).toBe(DEFAULT_READ_LIMIT)
      expect(DEFAULT_READ_LIMIT).toBe(100 * 1024 * 1024)
    })

    it('should fail with LIMIT_EXCEEDED above the limit', () => {
      const url = pathToFileURL(path.join(dir, 'x.png'))
      const error = readError(new FileResourceHandler({ readLimit: 7 }), url)

      expect(error.code).toBe('LIMIT_EXCEEDED')
      expect(error.message).toBe(`Contents of ${url.href} exceeded 7 bytes`)
    })

    it.skipIf(!fs.existsSync('/dev/zero'))('should bound device files that report no size', () => {
      const url = new URL('file:///dev/zero')
      const error = readError(new FileResourceHandler({ readLimit: 16 }), url)

      expect(error.code).toBe('LIMIT_EXCEEDED')
      expect(error.message).toBe('Contents of file:///dev/zero exceeded 16 bytes')
    })

    it('should read files larger than one chunk', () => {
      const content = Buffer.alloc(200 * 1024, 0x61)
      const filePath = path.join(dir, 'large.txt')
      fs.writeFileSync(filePath, content)

      const result = new FileResourceHandler().readResource(pathToFileURL(filePath))
      expect(result.data.equals(content)).toBe(true)
    })

    it('should read files exactly at the limit', () => {
      const url = pathToFileURL(path.join(dir, 'x.png'))
      const result = new FileResourceHandler({ readLimit: 8 }).readResource(url)

      expect(result.data.length).toBe(8)
    })
  })
})
