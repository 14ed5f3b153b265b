/*
 * Copyright Elasticsearch B.V. and contributors
 * SPDX-License-Identifier: Apache-2.0
 */

import { withCompatibilityGate } from './compatibility.js'
import { genericApiTool } from './generic-api.js'
import { createToolRegistry, defineTool, type ToolDescriptor, type ToolRegistry } from './registry.js'
import {
  CatNodesArgs,
  GetAllocationArgs,
  GetClusterStateArgs,
  GetIndexInfoArgs,
  GetIndexMappingArgs,
  GetIndexStatsArgs,
  GetLongRunningTasksArgs,
  GetNodesArgs,
  GetNodesHotThreadsArgs,
  GetQueryInsightsArgs,
  GetSegmentsArgs,
  GetShardsArgs,
  ListIndicesArgs,
  SearchIndexArgs
} from './tool-args.js'

/**
 * Reduces a detailed `_cat/indices` listing to index names. Entries that are
 * not records with a string `index` field are dropped, not reported.
 */
export function indexNames (listing: unknown): string[] {
  if (!Array.isArray(listing)) return []

  const names: string[] = []
  for (const item of listing) {
    if (typeof item === 'object' && item !== null && 'index' in item && typeof item.index === 'string') {
      names.push(item.index)
    }
  }
  return names
}

export const listIndicesTool = defineTool({
  name: 'ListIndexTool',
  description:
    'Lists indices in the OpenSearch cluster. By default, returns a filtered list of index names only to minimize response size. Set include_detail=true to return full metadata from cat.indices (docs.count, store.size, etc.). If an index parameter is provided, returns detailed information for that specific index including mappings and settings.',
  argsModel: ListIndicesArgs,
  minVersion: '1.0.0',
  httpMethods: ['GET'],
  handler: withCompatibilityGate<ListIndicesArgs>('ListIndexTool', 'listing indices', async (args, { api }, options) => {
    if (args.index !== '') {
      return await api.getIndex(args, options)
    }

    const indices = await api.listIndices(args, options)
    return args.include_detail ? indices : indexNames(indices)
  })
})

export const indexMappingTool = defineTool({
  name: 'IndexMappingTool',
  description: 'Retrieves index mapping and setting information for an index in OpenSearch',
  argsModel: GetIndexMappingArgs,
  httpMethods: ['GET'],
  handler: withCompatibilityGate<GetIndexMappingArgs>('IndexMappingTool', 'getting mapping', async (args, { api }, options) =>
    await api.getIndexMapping(args, options)
  )
})

export const searchIndexTool = defineTool({
  name: 'SearchIndexTool',
  description: 'Searches an index using a query written in query domain-specific language (DSL) in OpenSearch',
  argsModel: SearchIndexArgs,
  httpMethods: ['GET', 'POST'],
  handler: withCompatibilityGate<SearchIndexArgs>('SearchIndexTool', 'searching index', async (args, { api }, options) =>
    await api.searchIndex(args, options)
  )
})

export const clusterStateTool = defineTool({
  name: 'GetClusterStateTool',
  description:
    'Gets the current state of the cluster including node information, index settings, and more. Can be filtered by specific metrics and indices.',
  argsModel: GetClusterStateArgs,
  minVersion: '1.0.0',
  httpMethods: ['GET'],
  handler: withCompatibilityGate<GetClusterStateArgs>('GetClusterStateTool', 'getting cluster state', async (args, { api }, options) =>
    await api.getClusterState(args, options)
  )
})

export const indexInfoTool = defineTool({
  name: 'GetIndexInfoTool',
  description:
    'Gets detailed information about an index including mappings, settings, and aliases. Supports wildcards in index names.',
  argsModel: GetIndexInfoArgs,
  minVersion: '1.0.0',
  httpMethods: ['GET'],
  handler: withCompatibilityGate<GetIndexInfoArgs>('GetIndexInfoTool', 'getting index information', async (args, { api }, options) =>
    await api.getIndexInfo(args, options)
  )
})

export const indexStatsTool = defineTool({
  name: 'GetIndexStatsTool',
  description:
    'Gets statistics about an index including document count, store size, indexing and search performance metrics. Can be filtered to specific metrics.',
  argsModel: GetIndexStatsArgs,
  minVersion: '1.0.0',
  httpMethods: ['GET'],
  handler: withCompatibilityGate<GetIndexStatsArgs>('GetIndexStatsTool', 'getting index statistics', async (args, { api }, options) =>
    await api.getIndexStats(args, options)
  )
})

// The top_queries endpoint ships with the query insights plugin from 2.12.
export const queryInsightsTool = defineTool({
  name: 'GetQueryInsightsTool',
  description:
    'Gets query insights from the /_insights/top_queries endpoint, showing information about query patterns and performance.',
  argsModel: GetQueryInsightsArgs,
  minVersion: '2.12.0',
  httpMethods: ['GET'],
  handler: withCompatibilityGate<GetQueryInsightsArgs>('GetQueryInsightsTool', 'getting query insights', async (args, { api }, options) =>
    await api.getQueryInsights(args, options)
  )
})

export const shardsTool = defineTool({
  name: 'GetShardsTool',
  description: 'Gets shard placement and state for all indices or the given indices.',
  argsModel: GetShardsArgs,
  minVersion: '1.0.0',
  httpMethods: ['GET'],
  handler: withCompatibilityGate<GetShardsArgs>('GetShardsTool', 'getting shards', async (args, { api }, options) =>
    await api.getShards(args, options)
  )
})

export const segmentsTool = defineTool({
  name: 'GetSegmentsTool',
  description: 'Gets Lucene segment information for all indices or the given indices.',
  argsModel: GetSegmentsArgs,
  minVersion: '1.0.0',
  httpMethods: ['GET'],
  handler: withCompatibilityGate<GetSegmentsArgs>('GetSegmentsTool', 'getting segments', async (args, { api }, options) =>
    await api.getSegments(args, options)
  )
})

export const catNodesTool = defineTool({
  name: 'CatNodesTool',
  description: 'Lists the nodes of the cluster with resource usage columns such as heap, CPU and load.',
  argsModel: CatNodesArgs,
  minVersion: '1.0.0',
  httpMethods: ['GET'],
  handler: withCompatibilityGate<CatNodesArgs>('CatNodesTool', 'listing nodes', async (args, { api }, options) =>
    await api.catNodes(args, options)
  )
})

export const nodesTool = defineTool({
  name: 'GetNodesTool',
  description: 'Gets detailed node information such as settings, OS, JVM and plugins, optionally for specific nodes and metrics.',
  argsModel: GetNodesArgs,
  minVersion: '1.0.0',
  httpMethods: ['GET'],
  handler: withCompatibilityGate<GetNodesArgs>('GetNodesTool', 'getting node information', async (args, { api }, options) =>
    await api.getNodes(args, options)
  )
})

export const nodesHotThreadsTool = defineTool({
  name: 'GetNodesHotThreadsTool',
  description: 'Samples the busiest threads on each node. Useful for diagnosing high CPU usage.',
  argsModel: GetNodesHotThreadsArgs,
  minVersion: '1.0.0',
  httpMethods: ['GET'],
  handler: withCompatibilityGate<GetNodesHotThreadsArgs>('GetNodesHotThreadsTool', 'getting hot threads', async (args, { api }, options) =>
    await api.getNodesHotThreads(args, options)
  )
})

export const allocationTool = defineTool({
  name: 'GetAllocationTool',
  description: 'Gets the number of shards and disk space allocated to each data node.',
  argsModel: GetAllocationArgs,
  minVersion: '1.0.0',
  httpMethods: ['GET'],
  handler: withCompatibilityGate<GetAllocationArgs>('GetAllocationTool', 'getting allocation', async (args, { api }, options) =>
    await api.getAllocation(args, options)
  )
})

export const longRunningTasksTool = defineTool({
  name: 'GetLongRunningTasksTool',
  description: 'Lists the tasks currently running in the cluster, longest running first.',
  argsModel: GetLongRunningTasksArgs,
  minVersion: '1.0.0',
  httpMethods: ['GET'],
  handler: withCompatibilityGate<GetLongRunningTasksArgs>('GetLongRunningTasksTool', 'getting long running tasks', async (args, { api }, options) =>
    await api.getLongRunningTasks(args, options)
  )
})

// Registration order is the order tools are advertised in.
export const builtinTools: readonly ToolDescriptor[] = [
  listIndicesTool,
  indexMappingTool,
  searchIndexTool,
  clusterStateTool,
  indexInfoTool,
  indexStatsTool,
  queryInsightsTool,
  shardsTool,
  segmentsTool,
  catNodesTool,
  nodesTool,
  nodesHotThreadsTool,
  allocationTool,
  longRunningTasksTool,
  genericApiTool
]

export function createDefaultRegistry (): ToolRegistry {
  return createToolRegistry(builtinTools)
}
