/*
 * Copyright Elasticsearch B.V. and contributors
 * SPDX-License-Identifier: Apache-2.0
 */

import fs from 'fs'
import { z } from 'zod'
import { ConfigError, errorMessage } from './errors.js'
import { formatArgsIssues } from './tool-args.js'

export const TRANSPORT_MODES = ['stdio', 'http', 'sse'] as const
export type TransportMode = typeof TRANSPORT_MODES[number]

// Connection settings for one cluster, with auth options
export const ClusterSettingsSchema = z
  .object({
    url: z
      .string()
      .trim()
      .min(1, 'OpenSearch URL cannot be empty')
      .url('Invalid OpenSearch URL format')
      .describe('OpenSearch server URL'),

    username: z
      .string()
      .optional()
      .describe('Username for OpenSearch basic authentication'),

    password: z
      .string()
      .optional()
      .describe('Password for OpenSearch basic authentication'),

    caCert: z
      .string()
      .optional()
      .describe('Path to custom CA certificate for OpenSearch'),

    sslSkipVerify: z
      .boolean()
      .default(false)
      .describe('Skip SSL certificate verification'),

    requestTimeout: z
      .number()
      .int()
      .positive()
      .default(30000)
      .describe('Client request timeout in milliseconds'),

    maxRetries: z
      .number()
      .int()
      .min(0)
      .default(0)
      .describe('Retries the client performs on connection failures')
  })
  .refine(
    (data) => (data.username == null) === (data.password == null),
    {
      message: 'OPENSEARCH_USERNAME and OPENSEARCH_PASSWORD must be provided together, or neither for an unsecured cluster',
      path: ['username']
    }
  )

export type ClusterSettings = z.infer<typeof ClusterSettingsSchema>

const ClusterNameSchema = z.string().trim().min(1, 'Cluster name cannot be empty')

const ClustersFileSchema = z.object({
  clusters: z.record(ClusterNameSchema, ClusterSettingsSchema)
})

export const ConfigSchema = z.object({
  cluster: ClusterSettingsSchema.describe('Default cluster, used when a tool call names none'),

  clusters: z
    .record(ClusterNameSchema, ClusterSettingsSchema)
    .default({})
    .describe('Named clusters a tool call can select with opensearch_cluster_name'),

  transport: z
    .enum(TRANSPORT_MODES)
    .default('stdio')
    .describe('Transport the MCP server listens on'),

  namespace: z
    .string()
    .trim()
    .min(1)
    .default('opensearch_query')
    .describe('Namespace reported as part of the server name'),

  host: z.string().min(1).default('127.0.0.1').describe('HTTP listener host'),

  port: z.number().int().min(1).max(65535).default(8000).describe('HTTP listener port'),

  path: z
    .string()
    .startsWith('/', 'MCP path must start with /')
    .default('/mcp')
    .describe('HTTP path of the MCP endpoint'),

  allowedOrigins: z
    .array(z.string().min(1))
    .default([])
    .describe('Origins accepted by the HTTP transports; empty accepts any'),

  allowedHosts: z
    .array(z.string().min(1))
    .default([])
    .describe('Host headers accepted by the HTTP transports; empty accepts any')
})

export type ServerConfig = z.infer<typeof ConfigSchema>

type Env = Record<string, string | undefined>

function nonEmpty (value: string | undefined): string | undefined {
  return value == null || value.trim() === '' ? undefined : value
}

function integer (value: string | undefined): number | undefined {
  const present = nonEmpty(value)
  return present == null ? undefined : Number(present)
}

function flag (value: string | undefined): boolean {
  return value === '1' || value === 'true'
}

function list (value: string | undefined): string[] | undefined {
  const present = nonEmpty(value)
  if (present == null) return undefined
  return present
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0)
}

/** A bare `stdio`, `http` or `sse` command-line argument picks the transport. */
export function transportFromArgs (argv: readonly string[]): TransportMode | undefined {
  return TRANSPORT_MODES.find((mode) => argv.includes(mode))
}

export function readClustersFile (path: string): Record<string, ClusterSettings> {
  let raw: unknown
  try {
    raw = JSON.parse(fs.readFileSync(path, 'utf8'))
  } catch (error) {
    throw new ConfigError(`Failed to read clusters file ${path}: ${errorMessage(error)}`, { cause: error })
  }

  const parsed = ClustersFileSchema.safeParse(raw)
  if (!parsed.success) {
    throw new ConfigError(`Invalid clusters file ${path}: ${formatArgsIssues(parsed.error)}`)
  }
  return parsed.data.clusters
}

/**
 * Builds the server configuration from the environment and command line.
 * `OSQUERYMCP_TRANSPORT` and `OSQUERYMCP_NAMESPACE` are still read when
 * their `OPENSEARCH_MCP_*` counterparts are unset.
 */
export function loadConfig (env: Env = process.env, argv: readonly string[] = process.argv.slice(2)): ServerConfig {
  const clustersFile = nonEmpty(env.OPENSEARCH_CLUSTERS_FILE)

  const parsed = ConfigSchema.safeParse({
    cluster: {
      url: nonEmpty(env.OPENSEARCH_URL) ?? 'http://localhost:9200',
      username: nonEmpty(env.OPENSEARCH_USERNAME),
      password: nonEmpty(env.OPENSEARCH_PASSWORD),
      caCert: nonEmpty(env.OPENSEARCH_CA_CERT),
      sslSkipVerify: flag(env.OPENSEARCH_SSL_SKIP_VERIFY),
      requestTimeout: integer(env.OPENSEARCH_REQUEST_TIMEOUT),
      maxRetries: integer(env.OPENSEARCH_MAX_RETRIES)
    },
    clusters: clustersFile != null ? readClustersFile(clustersFile) : undefined,
    transport: transportFromArgs(argv) ?? nonEmpty(env.OPENSEARCH_MCP_TRANSPORT) ?? nonEmpty(env.OSQUERYMCP_TRANSPORT),
    namespace: nonEmpty(env.OPENSEARCH_MCP_NAMESPACE) ?? nonEmpty(env.OSQUERYMCP_NAMESPACE),
    host: nonEmpty(env.OPENSEARCH_MCP_HOST),
    port: integer(env.OPENSEARCH_MCP_PORT),
    path: nonEmpty(env.OPENSEARCH_MCP_PATH),
    allowedOrigins: list(env.OPENSEARCH_MCP_ALLOWED_ORIGINS),
    allowedHosts: list(env.OPENSEARCH_MCP_ALLOWED_HOSTS)
  })

  if (!parsed.success) {
    throw new ConfigError(`Invalid configuration: ${formatArgsIssues(parsed.error)}`)
  }
  return parsed.data
}
