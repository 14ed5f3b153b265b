/*
 * Copyright Elasticsearch B.V. and contributors
 * SPDX-License-Identifier: Apache-2.0
 */

import { describe, expect, it, vi } from 'vitest'
import type { ClusterApi } from './cluster.js'
import { UpstreamCallError } from './errors.js'
import type { ToolContext } from './registry.js'
import { abortError, fakeClusterApi } from './test-support.js'
import { createDefaultRegistry, indexNames } from './tools.js'

const registry = createDefaultRegistry()

function context (api: ClusterApi, signal?: AbortSignal): ToolContext {
  return { api, registry, signal }
}

async function invoke (name: string, args: unknown, ctx: ToolContext) {
  return await registry.get(name).handler(args, ctx)
}

const detailedListing = [
  { health: 'green', status: 'open', index: 'logs-2024', 'docs.count': '120' },
  { health: 'yellow', status: 'open', 'docs.count': '3' },
  'not-a-record',
  null,
  { health: 'green', status: 'open', index: 'metrics', 'docs.count': '8' },
  { index: 42 }
]

describe('indexNames', () => {
  it('keeps only the index field of well-formed entries', () => {
    expect(indexNames(detailedListing)).toEqual(['logs-2024', 'metrics'])
  })

  it('returns nothing for a non-array listing', () => {
    expect(indexNames({ index: 'logs' })).toEqual([])
  })
})

describe('ListIndexTool', () => {
  it('returns plain index names by default', async () => {
    const api = fakeClusterApi('2.13.0', { listIndices: vi.fn(async () => detailedListing) })

    const result = await invoke('ListIndexTool', {}, context(api))

    expect(result).toEqual({ ok: true, value: ['logs-2024', 'metrics'] })
  })

  it('returns the full listing when include_detail is set', async () => {
    const api = fakeClusterApi('2.13.0', { listIndices: vi.fn(async () => detailedListing) })

    const result = await invoke('ListIndexTool', { include_detail: true }, context(api))

    expect(result).toEqual({ ok: true, value: detailedListing })
  })

  it('returns single-index detail without listing every index', async () => {
    const detail = { 'logs-2024': { aliases: {}, mappings: {}, settings: {} } }
    const api = fakeClusterApi('2.13.0', { getIndex: vi.fn(async () => detail) })

    const result = await invoke('ListIndexTool', { index: 'logs-2024' }, context(api))

    expect(result).toEqual({ ok: true, value: detail })
    expect(api.listIndices).toHaveBeenCalledTimes(0)
    expect(api.getIndex).toHaveBeenCalledWith(
      { index: 'logs-2024', include_detail: false },
      { signal: undefined }
    )
  })

  it('reports a failed listing as a text payload', async () => {
    const api = fakeClusterApi('2.13.0', {
      listIndices: vi.fn(async () => { throw new UpstreamCallError('Listing indices', new Error('connect ECONNREFUSED')) })
    })

    const result = await invoke('ListIndexTool', {}, context(api))

    expect(result).toEqual({
      ok: false,
      error: { type: 'text', text: 'Error listing indices: Listing indices failed: connect ECONNREFUSED' }
    })
  })
})

describe('GetQueryInsightsTool', () => {
  it('is rejected on 2.11.0 without calling the insights endpoint', async () => {
    const api = fakeClusterApi('2.11.0')

    const result = await invoke('GetQueryInsightsTool', {}, context(api))

    expect(result).toEqual({
      ok: false,
      error: {
        type: 'text',
        text: "Error getting query insights: Tool 'GetQueryInsightsTool' is not supported for this OpenSearch version (current version: 2.11.0). Supported version: 2.12.0 or later."
      }
    })
    expect(api.getQueryInsights).not.toHaveBeenCalled()
  })

  it('returns the insights verbatim on 2.12.0', async () => {
    const insights = { top_queries: [{ timestamp: 1700000000000, latency: 12 }] }
    const api = fakeClusterApi('2.12.0', { getQueryInsights: vi.fn(async () => insights) })

    const result = await invoke('GetQueryInsightsTool', {}, context(api))

    expect(result).toEqual({ ok: true, value: insights })
  })
})

describe('SearchIndexTool', () => {
  it('passes the query body through and returns the response', async () => {
    const response = { hits: { total: { value: 1 }, hits: [{ _id: '1', _source: { title: 'hello' } }] } }
    const api = fakeClusterApi('1.3.0', { searchIndex: vi.fn(async () => response) })
    const query = { query: { match: { title: 'hello' } }, size: 5 }

    const result = await invoke('SearchIndexTool', { index: 'docs', query }, context(api))

    expect(result).toEqual({ ok: true, value: response })
    expect(api.searchIndex).toHaveBeenCalledWith({ index: 'docs', query }, { signal: undefined })
  })

  it('rejects a missing query before touching the cluster', async () => {
    const api = fakeClusterApi()

    const result = await invoke('SearchIndexTool', { index: 'docs' }, context(api))

    expect(result).toEqual({
      ok: false,
      error: { type: 'text', text: 'Invalid arguments for SearchIndexTool: query: Required' }
    })
    expect(api.getVersion).not.toHaveBeenCalled()
  })
})

describe('every tool', () => {
  const validArgs: Record<string, unknown> = {
    ListIndexTool: {},
    IndexMappingTool: { index: 'logs' },
    SearchIndexTool: { index: 'logs', query: { query: { match_all: {} } } },
    GetClusterStateTool: { metric: 'nodes' },
    GetIndexInfoTool: { index: 'logs-*' },
    GetIndexStatsTool: { index: 'logs', metric: 'docs' },
    GetQueryInsightsTool: {},
    GetShardsTool: { index: 'logs' },
    GetSegmentsTool: {},
    CatNodesTool: { metrics: 'name,cpu' },
    GetNodesTool: { node_id: 'node-1' },
    GetNodesHotThreadsTool: {},
    GetAllocationTool: {},
    GetLongRunningTasksTool: { limit: 5 },
    GenericOpenSearchApiTool: { path: '/_cluster/health' }
  }

  function failingApi (): ClusterApi {
    const fail = vi.fn(async () => { throw new Error('socket hang up') })
    return fakeClusterApi('2.13.0', {
      listIndices: fail,
      getIndex: fail,
      getIndexMapping: fail,
      searchIndex: fail,
      getClusterState: fail,
      getIndexInfo: fail,
      getIndexStats: fail,
      getQueryInsights: fail,
      getShards: fail,
      getSegments: fail,
      catNodes: fail,
      getNodes: fail,
      getNodesHotThreads: fail,
      getAllocation: fail,
      getLongRunningTasks: fail,
      request: fail
    })
  }

  it('has test arguments for each registered tool', () => {
    expect(Object.keys(validArgs)).toEqual(registry.list().map((tool) => tool.name))
  })

  it.each(Object.keys(validArgs))('%s turns an upstream failure into a text payload', async (name) => {
    const result = await invoke(name, validArgs[name], context(failingApi()))

    expect(result.ok).toBe(false)
    if (!result.ok) {
      expect(result.error.type).toBe('text')
      expect(result.error.text).toMatch(/^Error .+: socket hang up$/)
    }
  })

  it.each(Object.keys(validArgs))('%s reports a failed version probe without calling the cluster', async (name) => {
    const api = failingApi()
    api.getVersion = vi.fn(async () => { throw new Error('401 Unauthorized') })

    const result = await invoke(name, validArgs[name], context(api))

    expect(result.ok).toBe(false)
    expect(api.listIndices).not.toHaveBeenCalled()
    expect(api.request).not.toHaveBeenCalled()
  })

  it('propagates cancellation from an in-flight call', async () => {
    const controller = new AbortController()
    const api = fakeClusterApi('2.13.0', {
      getClusterState: vi.fn(async () => {
        controller.abort()
        throw abortError()
      })
    })

    await expect(invoke('GetClusterStateTool', {}, context(api, controller.signal)))
      .rejects.toThrow('The operation was aborted')
  })
})
