/*
 * Copyright Elasticsearch B.V. and contributors
 * SPDX-License-Identifier: Apache-2.0
 */

import { z } from 'zod'

// Spread into every tool's argument shape.
export const baseToolArgs = {
  opensearch_cluster_name: z
    .string()
    .trim()
    .min(1, 'Cluster name cannot be empty')
    .optional()
    .describe('Name of a configured OpenSearch cluster. Omit to use the default cluster')
}

const indexName = (description: string) =>
  z
    .string()
    .trim()
    .min(1, 'Index name is required')
    .describe(description)

export const ListIndicesArgs = z.object({
  ...baseToolArgs,
  index: z
    .string()
    .trim()
    .default('')
    .describe('Index name. When set, detailed information for that index is returned instead of a listing'),
  include_detail: z
    .boolean()
    .default(false)
    .describe('Return full cat.indices metadata instead of index names only')
})

export const GetIndexMappingArgs = z.object({
  ...baseToolArgs,
  index: indexName('Name of the index to get the mapping for')
})

export const SearchIndexArgs = z.object({
  ...baseToolArgs,
  index: indexName('Name of the index to search'),
  query: z
    .record(z.unknown())
    .describe('Search request body in query DSL, e.g. {"query": {"match_all": {}}, "size": 10}')
})

export const GetClusterStateArgs = z.object({
  ...baseToolArgs,
  metric: z
    .string()
    .trim()
    .min(1)
    .optional()
    .describe('Limit the state to these metrics, e.g. "nodes,routing_table"'),
  index: z
    .string()
    .trim()
    .min(1)
    .optional()
    .describe('Limit the state to these indices')
})

export const GetIndexInfoArgs = z.object({
  ...baseToolArgs,
  index: indexName('Index name or wildcard pattern to describe')
})

export const GetIndexStatsArgs = z.object({
  ...baseToolArgs,
  index: indexName('Index name or wildcard pattern to get statistics for'),
  metric: z
    .string()
    .trim()
    .min(1)
    .optional()
    .describe('Limit statistics to these metrics, e.g. "docs,store"')
})

export const GetQueryInsightsArgs = z.object({
  ...baseToolArgs
})

export const GetShardsArgs = z.object({
  ...baseToolArgs,
  index: z.string().trim().min(1).optional().describe('Limit shard information to these indices')
})

export const GetSegmentsArgs = z.object({
  ...baseToolArgs,
  index: z.string().trim().min(1).optional().describe('Limit segment information to these indices')
})

export const CatNodesArgs = z.object({
  ...baseToolArgs,
  metrics: z
    .string()
    .trim()
    .min(1)
    .optional()
    .describe('Comma separated columns to return, e.g. "name,heap.percent,cpu"')
})

export const GetNodesArgs = z.object({
  ...baseToolArgs,
  node_id: z.string().trim().min(1).optional().describe('Node ids or names to describe'),
  metric: z.string().trim().min(1).optional().describe('Limit node information to these metrics, e.g. "jvm,os"')
})

export const GetNodesHotThreadsArgs = z.object({
  ...baseToolArgs,
  node_id: z.string().trim().min(1).optional().describe('Node ids or names to sample')
})

export const GetAllocationArgs = z.object({
  ...baseToolArgs,
  node_id: z.string().trim().min(1).optional().describe('Limit disk allocation to these nodes')
})

export const GetLongRunningTasksArgs = z.object({
  ...baseToolArgs,
  limit: z
    .number()
    .int()
    .positive()
    .max(1000)
    .default(10)
    .describe('Maximum number of tasks to return, longest running first')
})

export type BaseToolArgs = z.infer<z.ZodObject<typeof baseToolArgs>>
export type ListIndicesArgs = z.infer<typeof ListIndicesArgs>
export type GetIndexMappingArgs = z.infer<typeof GetIndexMappingArgs>
export type SearchIndexArgs = z.infer<typeof SearchIndexArgs>
export type GetClusterStateArgs = z.infer<typeof GetClusterStateArgs>
export type GetIndexInfoArgs = z.infer<typeof GetIndexInfoArgs>
export type GetIndexStatsArgs = z.infer<typeof GetIndexStatsArgs>
export type GetQueryInsightsArgs = z.infer<typeof GetQueryInsightsArgs>
export type GetShardsArgs = z.infer<typeof GetShardsArgs>
export type GetSegmentsArgs = z.infer<typeof GetSegmentsArgs>
export type CatNodesArgs = z.infer<typeof CatNodesArgs>
export type GetNodesArgs = z.infer<typeof GetNodesArgs>
export type GetNodesHotThreadsArgs = z.infer<typeof GetNodesHotThreadsArgs>
export type GetAllocationArgs = z.infer<typeof GetAllocationArgs>
export type GetLongRunningTasksArgs = z.infer<typeof GetLongRunningTasksArgs>

/**
 * Flattens zod issues into a single line, e.g.
 * `index: Index name is required; query: Required`.
 */
export function formatArgsIssues (error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ')
}
