/*
 * Copyright Elasticsearch B.V. and contributors
 * SPDX-License-Identifier: Apache-2.0
 */

import { describe, expect, it, vi } from 'vitest'
import type { ClusterApi } from './cluster.js'
import { ToolDispatcher } from './dispatch.js'
import { ClusterMetadataCache } from './metadata-cache.js'
import { fakeClusterApi } from './test-support.js'
import { createDefaultRegistry } from './tools.js'

const listing = [{ index: 'logs', 'docs.count': '10' }]

function setup (listIndices: ClusterApi['listIndices'] = vi.fn(async () => listing)) {
  const api = fakeClusterApi('2.13.0', {
    listIndices,
    getIndexMapping: vi.fn(async (args: { index: string }) => ({ [args.index]: { mappings: { properties: {} } } }))
  })
  const cache = new ClusterMetadataCache(new ToolDispatcher(createDefaultRegistry(), api))
  return { api, cache }
}

describe('ClusterMetadataCache', () => {
  it('loads the detailed listing once and serves it from memory afterwards', async () => {
    const { api, cache } = setup()

    expect(await cache.allIndices()).toEqual({ ok: true, value: listing })
    expect(await cache.allIndices()).toEqual({ ok: true, value: listing })
    expect(api.listIndices).toHaveBeenCalledTimes(1)
    expect(cache.size).toBe(1)
  })

  it('does not cache a failed load', async () => {
    const listIndices = vi.fn()
      .mockRejectedValueOnce(new Error('timeout'))
      .mockResolvedValueOnce(listing)
    const { cache } = setup(listIndices)

    expect(await cache.allIndices()).toEqual({
      ok: false,
      error: { type: 'text', text: 'Error listing indices: timeout' }
    })
    expect(cache.size).toBe(0)
    expect(await cache.allIndices()).toEqual({ ok: true, value: listing })
    expect(listIndices).toHaveBeenCalledTimes(2)
  })

  it('keys entries by cluster', async () => {
    const { api, cache } = setup()

    await cache.allIndices()
    await cache.allIndices('east')

    expect(api.listIndices).toHaveBeenCalledTimes(2)
    expect(api.listIndices).toHaveBeenLastCalledWith(
      { index: '', include_detail: true, opensearch_cluster_name: 'east' },
      { signal: undefined }
    )
  })

  it('reloads after invalidation of that cluster only', async () => {
    const { api, cache } = setup()
    await cache.allIndices()
    await cache.allIndices('east')

    cache.invalidate('east')
    await cache.allIndices()
    await cache.allIndices('east')

    expect(api.listIndices).toHaveBeenCalledTimes(3)
  })

  it('caches mappings per index', async () => {
    const { api, cache } = setup()

    expect(await cache.indexMapping('logs')).toEqual({
      ok: true,
      value: { logs: { mappings: { properties: {} } } }
    })
    await cache.indexMapping('logs')
    await cache.indexMapping('metrics')

    expect(api.getIndexMapping).toHaveBeenCalledTimes(2)
    expect(cache.size).toBe(2)

    cache.clear()
    expect(cache.size).toBe(0)
  })

  it('does not store a listing that was loading when the cluster was invalidated', async () => {
    let release: (value: unknown) => void = () => {}
    const listIndices = vi.fn()
      .mockImplementationOnce(async () => await new Promise((resolve) => { release = resolve }))
      .mockResolvedValueOnce(listing)
    const { cache } = setup(listIndices)

    const loading = cache.allIndices()
    await vi.waitFor(() => expect(listIndices).toHaveBeenCalledTimes(1))
    cache.invalidate()
    release([{ index: 'old-deleted' }])

    expect(await loading).toEqual({ ok: true, value: [{ index: 'old-deleted' }] })
    expect(cache.size).toBe(0)
    expect(await cache.allIndices()).toEqual({ ok: true, value: listing })
    expect(listIndices).toHaveBeenCalledTimes(2)
  })

  it('keeps every mapping from concurrent first loads', async () => {
    let release: () => void = () => {}
    const gate = new Promise<void>((resolve) => { release = resolve })
    const getIndexMapping = vi.fn(async (args: { index: string }) => {
      await gate
      return { [args.index]: { mappings: {} } }
    })
    const api = fakeClusterApi('2.13.0', { getIndexMapping })
    const cache = new ClusterMetadataCache(new ToolDispatcher(createDefaultRegistry(), api))

    const loads = Promise.all([cache.indexMapping('logs'), cache.indexMapping('metrics')])
    release()
    await loads

    expect(cache.size).toBe(2)
    await cache.indexMapping('logs')
    await cache.indexMapping('metrics')
    expect(getIndexMapping).toHaveBeenCalledTimes(2)
  })
})
