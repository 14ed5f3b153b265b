/*
 * Copyright Elasticsearch B.V. and contributors
 * SPDX-License-Identifier: Apache-2.0
 */

import fs from 'fs'
import { Client, type ClientOptions } from '@opensearch-project/opensearch'
import { z } from 'zod'
import type { ClusterSettings } from './config.js'
import { ConfigError, UnknownClusterError, UpstreamCallError, errorMessage, isAbortError } from './errors.js'
import type { GenericApiArgs } from './generic-api.js'
import type {
  BaseToolArgs,
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

export interface CallOptions {
  signal?: AbortSignal
}

/**
 * The calls tool handlers make against a cluster. Every method resolves the
 * target cluster from `opensearch_cluster_name` and returns the response
 * body untouched.
 */
export interface ClusterApi {
  getVersion: (args: BaseToolArgs, options?: CallOptions) => Promise<string>
  listIndices: (args: ListIndicesArgs, options?: CallOptions) => Promise<unknown>
  getIndex: (args: ListIndicesArgs, options?: CallOptions) => Promise<unknown>
  getIndexMapping: (args: GetIndexMappingArgs, options?: CallOptions) => Promise<unknown>
  searchIndex: (args: SearchIndexArgs, options?: CallOptions) => Promise<unknown>
  getClusterState: (args: GetClusterStateArgs, options?: CallOptions) => Promise<unknown>
  getIndexInfo: (args: GetIndexInfoArgs, options?: CallOptions) => Promise<unknown>
  getIndexStats: (args: GetIndexStatsArgs, options?: CallOptions) => Promise<unknown>
  getQueryInsights: (args: GetQueryInsightsArgs, options?: CallOptions) => Promise<unknown>
  getShards: (args: GetShardsArgs, options?: CallOptions) => Promise<unknown>
  getSegments: (args: GetSegmentsArgs, options?: CallOptions) => Promise<unknown>
  catNodes: (args: CatNodesArgs, options?: CallOptions) => Promise<unknown>
  getNodes: (args: GetNodesArgs, options?: CallOptions) => Promise<unknown>
  getNodesHotThreads: (args: GetNodesHotThreadsArgs, options?: CallOptions) => Promise<unknown>
  getAllocation: (args: GetAllocationArgs, options?: CallOptions) => Promise<unknown>
  getLongRunningTasks: (args: GetLongRunningTasksArgs, options?: CallOptions) => Promise<unknown>
  request: (args: GenericApiArgs, options?: CallOptions) => Promise<unknown>
}

export type ClientFactory = (settings: ClusterSettings) => Client

// Named clusters are validated non-empty, so this key cannot collide.
const DEFAULT_CLUSTER_KEY = ''

export function createOpenSearchClient (settings: ClusterSettings, userAgent?: string): Client {
  const clientOptions: ClientOptions = {
    node: settings.url,
    requestTimeout: settings.requestTimeout,
    maxRetries: settings.maxRetries,
    ssl: {}
  }

  if (userAgent != null) {
    clientOptions.headers = { 'user-agent': userAgent }
  }

  if (settings.username != null && settings.password != null) {
    clientOptions.auth = { username: settings.username, password: settings.password }
  }

  if (settings.caCert != null && settings.caCert.length > 0) {
    try {
      clientOptions.ssl = { ...clientOptions.ssl, ca: fs.readFileSync(settings.caCert) }
    } catch (error) {
      throw new ConfigError(`Failed to read certificate file ${settings.caCert}: ${errorMessage(error)}`, { cause: error })
    }
  }

  if (settings.sslSkipVerify) {
    clientOptions.ssl = { ...clientOptions.ssl, rejectUnauthorized: false }
  }

  return new Client(clientOptions)
}

/**
 * Resolves cluster names to clients. Clients are created on first use and
 * kept until `close`.
 */
export class ClusterConnections {
  private readonly clients = new Map<string, Client>()
  private readonly defaultCluster: ClusterSettings
  private readonly namedClusters: Record<string, ClusterSettings>
  private readonly createClient: ClientFactory

  constructor (
    defaultCluster: ClusterSettings,
    namedClusters: Record<string, ClusterSettings> = {},
    createClient: ClientFactory = (settings) => createOpenSearchClient(settings)
  ) {
    this.defaultCluster = defaultCluster
    this.namedClusters = namedClusters
    this.createClient = createClient
  }

  get clusterNames (): string[] {
    return Object.keys(this.namedClusters)
  }

  settingsFor (clusterName?: string): ClusterSettings {
    if (clusterName == null) return this.defaultCluster

    const settings = this.namedClusters[clusterName]
    if (settings == null) {
      throw new UnknownClusterError(clusterName, this.clusterNames)
    }
    return settings
  }

  clientFor (clusterName?: string): Client {
    const key = clusterName ?? DEFAULT_CLUSTER_KEY
    const cached = this.clients.get(key)
    if (cached != null) return cached

    const client = this.createClient(this.settingsFor(clusterName))
    this.clients.set(key, client)
    return client
  }

  get cachedClientCount (): number {
    return this.clients.size
  }

  async close (): Promise<void> {
    const clients = [...this.clients.values()]
    this.clients.clear()
    await Promise.all(clients.map(async (client) => await client.close()))
  }
}

interface AbortableRequest<T> extends PromiseLike<T> {
  abort: () => void
}

interface UpstreamResponse {
  body: unknown
}

function abortable<T> (request: AbortableRequest<T>, signal?: AbortSignal): Promise<T> {
  if (signal == null) return Promise.resolve(request)

  // abort() returns the request itself; handing that thenable back to the
  // signal would leave its rejection unhandled.
  const onAbort = (): void => { request.abort() }
  signal.addEventListener('abort', onAbort, { once: true })
  return Promise.resolve(request).finally(() => signal.removeEventListener('abort', onAbort))
}

function statusCodeOf (error: unknown): number | undefined {
  if (typeof error === 'object' && error !== null && 'statusCode' in error && typeof error.statusCode === 'number') {
    return error.statusCode
  }
  return undefined
}

const InfoResponse = z.object({
  version: z.object({
    number: z.string().min(1)
  })
})

export class OpenSearchClusterApi implements ClusterApi {
  private readonly connections: ClusterConnections

  constructor (connections: ClusterConnections) {
    this.connections = connections
  }

  private async call (
    operation: string,
    args: BaseToolArgs,
    options: CallOptions | undefined,
    send: (client: Client) => AbortableRequest<UpstreamResponse>
  ): Promise<unknown> {
    options?.signal?.throwIfAborted()
    const client = this.connections.clientFor(args.opensearch_cluster_name)
    try {
      const response = await abortable(send(client), options?.signal)
      return response.body
    } catch (error) {
      if (isAbortError(error, options?.signal)) throw error
      throw new UpstreamCallError(operation, error, statusCodeOf(error))
    }
  }

  getVersion = async (args: BaseToolArgs, options?: CallOptions): Promise<string> => {
    const body = await this.call('Fetching cluster version', args, options, (client) => client.info())
    const parsed = InfoResponse.safeParse(body)
    if (!parsed.success) {
      throw new UpstreamCallError('Fetching cluster version', new Error('response carries no version.number'))
    }
    return parsed.data.version.number
  }

  listIndices = async (args: ListIndicesArgs, options?: CallOptions): Promise<unknown> =>
    await this.call('Listing indices', args, options, (client) => client.cat.indices({ format: 'json' }))

  getIndex = async (args: ListIndicesArgs, options?: CallOptions): Promise<unknown> =>
    await this.call('Fetching index', args, options, (client) => client.indices.get({ index: args.index }))

  getIndexMapping = async (args: GetIndexMappingArgs, options?: CallOptions): Promise<unknown> =>
    await this.call('Fetching mapping', args, options, (client) => client.indices.getMapping({ index: args.index }))

  searchIndex = async (args: SearchIndexArgs, options?: CallOptions): Promise<unknown> =>
    await this.call('Search', args, options, (client) => client.search({ index: args.index, body: args.query }))

  getClusterState = async (args: GetClusterStateArgs, options?: CallOptions): Promise<unknown> =>
    await this.call('Fetching cluster state', args, options, (client) =>
      client.cluster.state({ metric: args.metric, index: args.index })
    )

  getIndexInfo = async (args: GetIndexInfoArgs, options?: CallOptions): Promise<unknown> =>
    await this.call('Fetching index info', args, options, (client) => client.indices.get({ index: args.index }))

  getIndexStats = async (args: GetIndexStatsArgs, options?: CallOptions): Promise<unknown> =>
    await this.call('Fetching index stats', args, options, (client) =>
      client.indices.stats({ index: args.index, metric: args.metric })
    )

  getQueryInsights = async (args: GetQueryInsightsArgs, options?: CallOptions): Promise<unknown> =>
    await this.call('Fetching query insights', args, options, (client) =>
      client.transport.request({ method: 'GET', path: '/_insights/top_queries' })
    )

  getShards = async (args: GetShardsArgs, options?: CallOptions): Promise<unknown> =>
    await this.call('Fetching shards', args, options, (client) =>
      client.cat.shards({ index: args.index, format: 'json' })
    )

  getSegments = async (args: GetSegmentsArgs, options?: CallOptions): Promise<unknown> =>
    await this.call('Fetching segments', args, options, (client) =>
      client.cat.segments({ index: args.index, format: 'json' })
    )

  catNodes = async (args: CatNodesArgs, options?: CallOptions): Promise<unknown> =>
    await this.call('Listing nodes', args, options, (client) =>
      client.cat.nodes({ h: args.metrics, format: 'json' })
    )

  getNodes = async (args: GetNodesArgs, options?: CallOptions): Promise<unknown> =>
    await this.call('Fetching node info', args, options, (client) =>
      client.nodes.info({ node_id: args.node_id, metric: args.metric })
    )

  getNodesHotThreads = async (args: GetNodesHotThreadsArgs, options?: CallOptions): Promise<unknown> =>
    await this.call('Fetching hot threads', args, options, (client) =>
      client.nodes.hotThreads({ node_id: args.node_id })
    )

  getAllocation = async (args: GetAllocationArgs, options?: CallOptions): Promise<unknown> =>
    await this.call('Fetching allocation', args, options, (client) =>
      client.cat.allocation({ node_id: args.node_id, format: 'json' })
    )

  getLongRunningTasks = async (args: GetLongRunningTasksArgs, options?: CallOptions): Promise<unknown> => {
    const tasks = await this.call('Listing tasks', args, options, (client) =>
      client.cat.tasks({ format: 'json', detailed: true, s: 'running_time_ns:desc' })
    )
    return Array.isArray(tasks) ? tasks.slice(0, args.limit) : tasks
  }

  request = async (args: GenericApiArgs, options?: CallOptions): Promise<unknown> =>
    await this.call(`${args.method} ${args.path}`, args, options, (client) =>
      client.transport.request(
        {
          method: args.method,
          path: args.path,
          querystring: args.query_params,
          body: args.body
        },
        { headers: args.headers }
      )
    )
}
