/*
 * Copyright Elasticsearch B.V. and contributors
 * SPDX-License-Identifier: Apache-2.0
 */

import { vi } from 'vitest'
import type { ClusterApi } from './cluster.js'

/** In-process stand-in for a cluster: every call resolves with an empty body. */
export function fakeClusterApi (version = '2.13.0', overrides: Partial<ClusterApi> = {}): ClusterApi {
  return {
    getVersion: vi.fn(async () => version),
    listIndices: vi.fn(async () => []),
    getIndex: vi.fn(async () => ({})),
    getIndexMapping: vi.fn(async () => ({})),
    searchIndex: vi.fn(async () => ({ hits: { hits: [] } })),
    getClusterState: vi.fn(async () => ({})),
    getIndexInfo: vi.fn(async () => ({})),
    getIndexStats: vi.fn(async () => ({})),
    getQueryInsights: vi.fn(async () => ({ top_queries: [] })),
    getShards: vi.fn(async () => []),
    getSegments: vi.fn(async () => []),
    catNodes: vi.fn(async () => []),
    getNodes: vi.fn(async () => ({})),
    getNodesHotThreads: vi.fn(async () => ''),
    getAllocation: vi.fn(async () => []),
    getLongRunningTasks: vi.fn(async () => []),
    request: vi.fn(async () => ({ acknowledged: true })),
    ...overrides
  }
}

export function abortError (): Error {
  return Object.assign(new Error('The operation was aborted'), { name: 'AbortError' })
}
