/*
 * Copyright Elasticsearch B.V. and contributors
 * SPDX-License-Identifier: Apache-2.0
 */

import type { ClusterApi } from './cluster.js'
import { UnknownToolError, errorMessage, isAbortError } from './errors.js'
import { toolError, type HttpMethod, type ToolInputSchema, type ToolRegistry, type ToolResult } from './registry.js'

export interface ToolListing {
  name: string
  displayName: string
  description: string
  inputSchema: ToolInputSchema
  httpMethods: readonly HttpMethod[]
  minVersion?: string
  maxVersion?: string
}

export interface DispatchOptions {
  signal?: AbortSignal
}

/**
 * Single entry point between a transport and the tool handlers. Returns a
 * `ToolResult` for every call and only throws when the call was cancelled.
 */
export class ToolDispatcher {
  readonly registry: ToolRegistry
  private readonly api: ClusterApi

  constructor (registry: ToolRegistry, api: ClusterApi) {
    this.registry = registry
    this.api = api
  }

  listTools (): ToolListing[] {
    return this.registry.list().map((tool) => ({
      name: tool.name,
      displayName: tool.displayName,
      description: tool.description,
      inputSchema: tool.inputSchema,
      httpMethods: tool.httpMethods,
      minVersion: tool.minVersion,
      maxVersion: tool.maxVersion
    }))
  }

  async dispatch (name: string, rawArgs: unknown, options: DispatchOptions = {}): Promise<ToolResult> {
    const { signal } = options
    try {
      const tool = this.registry.get(name)
      return await tool.handler(rawArgs, { api: this.api, registry: this.registry, signal })
    } catch (error) {
      if (isAbortError(error, signal)) throw error
      if (error instanceof UnknownToolError) {
        return toolError(error.message)
      }
      console.error(`Tool ${name} failed unexpectedly: ${errorMessage(error)}`)
      return toolError(`Error running ${name}: ${errorMessage(error)}`)
    }
  }
}
