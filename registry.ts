/*
 * Copyright Elasticsearch B.V. and contributors
 * SPDX-License-Identifier: Apache-2.0
 */

import { z } from 'zod'
import { zodToJsonSchema } from 'zod-to-json-schema'
import type { ClusterApi } from './cluster.js'
import { DuplicateToolError, ToolRegistryError, UnknownToolError, errorMessage } from './errors.js'
import { formatArgsIssues } from './tool-args.js'
import { compareVersions, parseVersion, type VersionRange } from './version.js'

export const HTTP_METHODS = ['GET', 'POST', 'PUT', 'DELETE', 'HEAD', 'PATCH'] as const
export type HttpMethod = typeof HTTP_METHODS[number]

// Object schema advertised to MCP clients for a tool's arguments.
const ToolInputSchema = z
  .object({
    type: z.literal('object'),
    properties: z.record(z.unknown()).default({}),
    required: z.array(z.string()).optional()
  })
  .passthrough()

export type ToolInputSchema = z.output<typeof ToolInputSchema>

export type TextContent = {
  type: 'text'
  text: string
}

export type ToolResult =
  | { ok: true, value: unknown }
  | { ok: false, error: TextContent }

export function toolSuccess (value: unknown): ToolResult {
  return { ok: true, value }
}

export function toolError (text: string): ToolResult {
  return { ok: false, error: { type: 'text', text } }
}

export interface ToolContext {
  api: ClusterApi
  registry: ToolRegistry
  signal?: AbortSignal
}

export type ToolHandler = (rawArgs: unknown, context: ToolContext) => Promise<ToolResult>

export interface ToolDescriptor extends VersionRange {
  readonly name: string
  readonly displayName: string
  readonly description: string
  readonly inputSchema: ToolInputSchema
  readonly argsModel: z.ZodTypeAny
  readonly handler: ToolHandler
  readonly httpMethods: readonly HttpMethod[]
}

export interface ToolDefinition<S extends z.ZodRawShape> extends VersionRange {
  name: string
  displayName?: string
  description: string
  argsModel: z.ZodObject<S>
  httpMethods: readonly HttpMethod[]
  handler: (args: z.output<z.ZodObject<S>>, context: ToolContext) => Promise<ToolResult>
}

/**
 * Builds a descriptor whose handler takes raw arguments. Arguments are
 * validated against the model before the typed handler runs, so a malformed
 * call never reaches the cluster.
 */
export function defineTool<S extends z.ZodRawShape> (definition: ToolDefinition<S>): ToolDescriptor {
  const { name, description, argsModel, httpMethods, minVersion, maxVersion } = definition
  const displayName = definition.displayName ?? name

  return {
    name,
    displayName,
    description,
    argsModel,
    inputSchema: ToolInputSchema.parse(zodToJsonSchema(argsModel, { $refStrategy: 'none' })),
    minVersion,
    maxVersion,
    httpMethods,
    handler: async (rawArgs, context) => {
      const parsed = argsModel.safeParse(rawArgs ?? {})
      if (!parsed.success) {
        return toolError(`Invalid arguments for ${displayName}: ${formatArgsIssues(parsed.error)}`)
      }
      return await definition.handler(parsed.data, context)
    }
  }
}

/**
 * Name-keyed tool catalogue. Populated once at startup and sealed; lookups
 * after that are read-only and need no coordination between concurrent
 * invocations.
 */
export class ToolRegistry {
  private readonly tools = new Map<string, ToolDescriptor>()
  private sealed = false

  register (descriptor: ToolDescriptor): this {
    if (this.sealed) {
      throw new ToolRegistryError(`Cannot register '${descriptor.name}': registry is sealed`)
    }
    if (this.tools.has(descriptor.name)) {
      throw new DuplicateToolError(descriptor.name)
    }
    validateRange(descriptor)

    this.tools.set(descriptor.name, descriptor)
    return this
  }

  seal (): this {
    this.sealed = true
    return this
  }

  get isSealed (): boolean {
    return this.sealed
  }

  get (name: string): ToolDescriptor {
    const descriptor = this.tools.get(name)
    if (descriptor == null) {
      throw new UnknownToolError(name)
    }
    return descriptor
  }

  has (name: string): boolean {
    return this.tools.has(name)
  }

  list (): ToolDescriptor[] {
    return [...this.tools.values()]
  }

  get size (): number {
    return this.tools.size
  }
}

export function createToolRegistry (descriptors: Iterable<ToolDescriptor>): ToolRegistry {
  const registry = new ToolRegistry()
  for (const descriptor of descriptors) {
    registry.register(descriptor)
  }
  return registry.seal()
}

function validateRange (descriptor: ToolDescriptor): void {
  const { name, minVersion, maxVersion } = descriptor
  try {
    if (minVersion != null) parseVersion(minVersion)
    if (maxVersion != null) parseVersion(maxVersion)
    if (minVersion != null && maxVersion != null && compareVersions(minVersion, maxVersion) > 0) {
      throw new ToolRegistryError(`Tool '${name}' has minVersion ${minVersion} above maxVersion ${maxVersion}`)
    }
  } catch (error) {
    if (error instanceof ToolRegistryError) throw error
    throw new ToolRegistryError(`Tool '${name}' declares an invalid version range: ${errorMessage(error)}`)
  }
}
