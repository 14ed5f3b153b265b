/*
 * Copyright Elasticsearch B.V. and contributors
 * SPDX-License-Identifier: Apache-2.0
 */

import { McpServer, ResourceTemplate } from '@modelcontextprotocol/sdk/server/mcp.js'
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
  type CallToolResult,
  type ListToolsResult,
  type ReadResourceResult,
  type Tool
} from '@modelcontextprotocol/sdk/types.js'
import pkg from './package.json' with { type: 'json' }
import { ClusterConnections, OpenSearchClusterApi, createOpenSearchClient, type ClusterApi } from './cluster.js'
import type { ServerConfig } from './config.js'
import { ToolDispatcher, type ToolListing } from './dispatch.js'
import { GENERIC_API_TOOL, GenericApiArgs, isMutatingMethod } from './generic-api.js'
import { ClusterMetadataCache } from './metadata-cache.js'
import type { ToolResult } from './registry.js'
import { createDefaultRegistry } from './tools.js'

// Product metadata, used to generate the request User-Agent header and
// passed to the McpServer constructor.
export const product = {
  name: 'opensearch-query-mcp',
  version: pkg.version
}

/**
 * Everything a server instance needs, shared across the per-request servers
 * the stateless HTTP transport creates.
 */
export interface ServerContext {
  dispatcher: ToolDispatcher
  cache: ClusterMetadataCache
  namespace: string
  close: () => Promise<void>
}

export function createServerContext (config: ServerConfig, api?: ClusterApi): ServerContext {
  const connections = new ClusterConnections(
    config.cluster,
    config.clusters,
    (settings) => createOpenSearchClient(settings, `${product.name}/${product.version}`)
  )
  const dispatcher = new ToolDispatcher(createDefaultRegistry(), api ?? new OpenSearchClusterApi(connections))

  return {
    dispatcher,
    cache: new ClusterMetadataCache(dispatcher),
    namespace: config.namespace,
    close: async () => await connections.close()
  }
}

export function toCallToolResult (result: ToolResult): CallToolResult {
  if (!result.ok) {
    return { content: [result.error], isError: true }
  }
  return {
    content: [
      {
        type: 'text' as const,
        text: typeof result.value === 'string' ? result.value : JSON.stringify(result.value, null, 2)
      }
    ]
  }
}

function toResourceContents (uri: URL, result: ToolResult): ReadResourceResult {
  if (!result.ok) {
    return { contents: [{ uri: uri.href, mimeType: 'text/plain', text: result.error.text }] }
  }
  return {
    contents: [{ uri: uri.href, mimeType: 'application/json', text: JSON.stringify(result.value) }]
  }
}

/**
 * Advertised form of a registry entry. The verb set and version bounds are
 * documentation for the caller and travel in `_meta`.
 */
export function toMcpTool (tool: ToolListing): Tool {
  return {
    name: tool.name,
    title: tool.displayName,
    description: tool.description,
    inputSchema: tool.inputSchema,
    _meta: {
      httpMethods: [...tool.httpMethods],
      minVersion: tool.minVersion,
      maxVersion: tool.maxVersion
    }
  }
}

export function createOpenSearchMcpServer (context: ServerContext): McpServer {
  const { dispatcher, cache, namespace } = context
  const server = new McpServer(
    { name: `${product.name}:${namespace}`, version: product.version },
    { capabilities: { tools: {} } }
  )

  // Tool requests go straight to the dispatcher, so argument validation and
  // unknown names come back as tool results rather than protocol errors.
  server.server.setRequestHandler(ListToolsRequestSchema, async (): Promise<ListToolsResult> => ({
    tools: dispatcher.listTools().map(toMcpTool)
  }))

  server.server.setRequestHandler(CallToolRequestSchema, async (request, extra): Promise<CallToolResult> => {
    const { name, arguments: args } = request.params
    const result = await dispatcher.dispatch(name, args ?? {}, { signal: extra.signal })

    // A write through the passthrough may change the index list or mappings.
    if (result.ok && name === GENERIC_API_TOOL) {
      const call = GenericApiArgs.safeParse(args)
      if (call.success && isMutatingMethod(call.data.method)) {
        cache.invalidate(call.data.opensearch_cluster_name)
      }
    }

    return toCallToolResult(result)
  })

  server.resource(
    'all_indices',
    'opensearch://indices',
    {
      description: 'Detailed listing of every index in the default cluster (cached)',
      mimeType: 'application/json'
    },
    async (uri, extra) => toResourceContents(uri, await cache.allIndices(undefined, { signal: extra.signal }))
  )

  server.resource(
    'index_mapping',
    new ResourceTemplate('opensearch://indices/{index}/mapping', { list: undefined }),
    {
      description: 'Mapping of one index in the default cluster (cached)',
      mimeType: 'application/json'
    },
    async (uri, variables, extra) => {
      const index = Array.isArray(variables.index) ? variables.index.join(',') : variables.index
      return toResourceContents(uri, await cache.indexMapping(index, undefined, { signal: extra.signal }))
    }
  )

  return server
}
