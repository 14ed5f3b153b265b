/*
 * Copyright Elasticsearch B.V. and contributors
 * SPDX-License-Identifier: Apache-2.0
 */

import type { DispatchOptions, ToolDispatcher } from './dispatch.js'
import { toolSuccess, type ToolResult } from './registry.js'

interface CacheEntry {
  value: unknown
}

const DEFAULT_CLUSTER_KEY = ''

/**
 * Per-cluster cache of slow-changing metadata (the detailed index listing
 * and index mappings). Entries are filled on the first successful load and
 * stay until `invalidate` drops them. Failed loads are never cached, and a
 * load that was in flight when its cluster was invalidated is returned to
 * its caller but not stored.
 */
export class ClusterMetadataCache {
  private readonly dispatcher: ToolDispatcher
  private readonly indices = new Map<string, CacheEntry>()
  private readonly mappings = new Map<string, Map<string, CacheEntry>>()
  private readonly generations = new Map<string, number>()
  private epoch = 0

  constructor (dispatcher: ToolDispatcher) {
    this.dispatcher = dispatcher
  }

  async allIndices (clusterName?: string, options?: DispatchOptions): Promise<ToolResult> {
    const key = clusterName ?? DEFAULT_CLUSTER_KEY
    const cached = this.indices.get(key)
    if (cached != null) return toolSuccess(cached.value)

    const stamp = this.stamp(key)
    const result = await this.dispatcher.dispatch(
      'ListIndexTool',
      { include_detail: true, opensearch_cluster_name: clusterName },
      options
    )
    if (result.ok && this.stamp(key) === stamp) {
      this.indices.set(key, { value: result.value })
    }
    return result
  }

  async indexMapping (index: string, clusterName?: string, options?: DispatchOptions): Promise<ToolResult> {
    const key = clusterName ?? DEFAULT_CLUSTER_KEY
    const cached = this.mappings.get(key)?.get(index)
    if (cached != null) return toolSuccess(cached.value)

    const stamp = this.stamp(key)
    const result = await this.dispatcher.dispatch(
      'IndexMappingTool',
      { index, opensearch_cluster_name: clusterName },
      options
    )
    if (result.ok && this.stamp(key) === stamp) {
      // Another load for this cluster may have created the map meanwhile.
      let clusterMappings = this.mappings.get(key)
      if (clusterMappings == null) {
        clusterMappings = new Map()
        this.mappings.set(key, clusterMappings)
      }
      clusterMappings.set(index, { value: result.value })
    }
    return result
  }

  /** Drops cached metadata for one cluster. Omitting the name means the default cluster. */
  invalidate (clusterName?: string): void {
    const key = clusterName ?? DEFAULT_CLUSTER_KEY
    this.generations.set(key, (this.generations.get(key) ?? 0) + 1)
    this.indices.delete(key)
    this.mappings.delete(key)
  }

  clear (): void {
    this.epoch++
    this.indices.clear()
    this.mappings.clear()
  }

  get size (): number {
    let total = this.indices.size
    for (const clusterMappings of this.mappings.values()) {
      total += clusterMappings.size
    }
    return total
  }

  private stamp (key: string): string {
    return `${this.epoch}:${this.generations.get(key) ?? 0}`
  }
}
