/*
 * Copyright Elasticsearch B.V. and contributors
 * SPDX-License-Identifier: Apache-2.0
 */

import { describe, expect, it, vi } from 'vitest'
import { z } from 'zod'
import { ToolDispatcher } from './dispatch.js'
import { createToolRegistry, defineTool } from './registry.js'
import { abortError, fakeClusterApi } from './test-support.js'
import { baseToolArgs } from './tool-args.js'
import { createDefaultRegistry } from './tools.js'

describe('ToolDispatcher', () => {
  it('advertises tools with their schema and verbs in registration order', () => {
    const dispatcher = new ToolDispatcher(createDefaultRegistry(), fakeClusterApi())
    const listing = dispatcher.listTools()

    expect(listing).toHaveLength(15)
    expect(listing[0]).toMatchObject({
      name: 'ListIndexTool',
      displayName: 'ListIndexTool',
      httpMethods: ['GET'],
      minVersion: '1.0.0',
      maxVersion: undefined
    })
    expect(listing.find((tool) => tool.name === 'SearchIndexTool')?.httpMethods).toEqual(['GET', 'POST'])
    expect(listing.find((tool) => tool.name === 'GetQueryInsightsTool')?.minVersion).toBe('2.12.0')
  })

  it('dispatches raw arguments to the named tool', async () => {
    const api = fakeClusterApi('2.13.0', { getIndexMapping: vi.fn(async () => ({ logs: { mappings: {} } })) })
    const dispatcher = new ToolDispatcher(createDefaultRegistry(), api)

    const result = await dispatcher.dispatch('IndexMappingTool', { index: 'logs' })

    expect(result).toEqual({ ok: true, value: { logs: { mappings: {} } } })
  })

  it('answers an unknown tool with a text payload', async () => {
    const dispatcher = new ToolDispatcher(createDefaultRegistry(), fakeClusterApi())

    expect(await dispatcher.dispatch('DropEverythingTool', {})).toEqual({
      ok: false,
      error: { type: 'text', text: 'Unknown tool: DropEverythingTool' }
    })
  })

  it('reshapes a fault that escaped a handler', async () => {
    const broken = defineTool({
      name: 'BrokenTool',
      description: 'throws past its own boundary',
      argsModel: z.object({ ...baseToolArgs }),
      httpMethods: ['GET'],
      handler: async () => { throw new Error('kaput') }
    })
    const dispatcher = new ToolDispatcher(createToolRegistry([broken]), fakeClusterApi())

    expect(await dispatcher.dispatch('BrokenTool', {})).toEqual({
      ok: false,
      error: { type: 'text', text: 'Error running BrokenTool: kaput' }
    })
  })

  it('lets cancellation through', async () => {
    const controller = new AbortController()
    const api = fakeClusterApi('2.13.0', {
      searchIndex: vi.fn(async () => {
        controller.abort()
        throw abortError()
      })
    })
    const dispatcher = new ToolDispatcher(createDefaultRegistry(), api)

    await expect(
      dispatcher.dispatch('SearchIndexTool', { index: 'logs', query: {} }, { signal: controller.signal })
    ).rejects.toThrow('The operation was aborted')
  })

  it('runs concurrent invocations independently', async () => {
    let release: () => void = () => {}
    const gate = new Promise<void>((resolve) => { release = resolve })
    const api = fakeClusterApi('2.13.0', {
      getShards: vi.fn(async () => {
        await gate
        return ['slow']
      }),
      getSegments: vi.fn(async () => ['fast'])
    })
    const dispatcher = new ToolDispatcher(createDefaultRegistry(), api)

    const slow = dispatcher.dispatch('GetShardsTool', {})
    const fast = await dispatcher.dispatch('GetSegmentsTool', {})
    expect(fast).toEqual({ ok: true, value: ['fast'] })

    release()
    expect(await slow).toEqual({ ok: true, value: ['slow'] })
  })
})
