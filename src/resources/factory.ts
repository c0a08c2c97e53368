/**
 * Resource Handler Factory
 *
 * Builds a dispatching handler from a declarative configuration.
 */

import { z } from 'zod'

import { Errors } from '../errors/index.js'
import { DataUrlResourceHandler } from './data.js'
import { DispatchingResourceHandler } from './dispatch.js'
import { FileResourceHandler } from './file.js'
import { NoopResourceHandler } from './noop.js'
import type { ResourceUrlHandler } from './types.js'

const readLimit = z.number().int().positive()

const handlerConfigSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('file'), readLimit: readLimit.optional() }),
  z.object({ type: z.literal('data'), readLimit: readLimit.optional() }),
  z.object({ type: z.literal('noop') }),
])

const resourceConfigSchema = z.object({
  handlers: z.array(handlerConfigSchema).default([{ type: 'file' }, { type: 'data' }]),
})

export type HandlerConfig = z.infer<typeof handlerConfigSchema>
export type HandlerType = HandlerConfig['type']
export type ResourceHandlerConfig = z.input<typeof resourceConfigSchema>

function createHandler(config: HandlerConfig): ResourceUrlHandler {
  switch (config.type) {
    case 'file':
      return new FileResourceHandler({ readLimit: config.readLimit })
    case 'data':
      return new DataUrlResourceHandler({ readLimit: config.readLimit })
    case 'noop':
      return new NoopResourceHandler()
  }
}

/**
 * Create a dispatching handler from configuration
 *
 * Handlers are consulted in the order they are listed. Without a `handlers`
 * list, file and data URLs are read.
 *
 * @example Default handlers
 * ```typescript
 * const resources = createResourceHandler()
 * ```
 *
 * @example Data URLs only, with a small limit
 * ```typescript
 * const resources = createResourceHandler({
 *   handlers: [{ type: 'data', readLimit: 64 * 1024 }],
 * })
 * ```
 *
 * @example Reading disabled
 * ```typescript
 * const resources = createResourceHandler({ handlers: [] })
 * ```
 */
export function createResourceHandler(config: ResourceHandlerConfig = {}): DispatchingResourceHandler {
  const result = resourceConfigSchema.safeParse(config)
  if (!result.success) {
    throw Errors.invalidConfig(
      result.error.issues.map((issue) => ({
        field: issue.path.map(String).join('.') || 'root',
        message: issue.message,
        code: issue.code,
      }))
    )
  }

  return new DispatchingResourceHandler(result.data.handlers.map(createHandler))
}
