/*
 * Copyright Elasticsearch B.V. and contributors
 * SPDX-License-Identifier: Apache-2.0
 */

import { z } from 'zod'
import { withCompatibilityGate } from './compatibility.js'
import { HTTP_METHODS, defineTool, type ToolDescriptor } from './registry.js'
import { baseToolArgs } from './tool-args.js'

export const GENERIC_API_TOOL = 'GenericOpenSearchApiTool'

export const GenericApiArgs = z.object({
  ...baseToolArgs,
  method: z
    .enum(HTTP_METHODS)
    .default('GET')
    .describe('HTTP method for the API call'),

  path: z
    .string()
    .trim()
    .min(1, 'API path is required')
    .transform((path) => (path.startsWith('/') ? path : `/${path}`))
    .describe('API path, e.g. "/_cluster/health" or "/my-index/_search"'),

  query_params: z
    .record(z.union([z.string(), z.number(), z.boolean()]))
    .optional()
    .describe('Query string parameters as key-value pairs'),

  body: z
    .union([z.record(z.unknown()), z.string()])
    .optional()
    .describe('Request body: a JSON object, or a raw string such as NDJSON for _bulk'),

  headers: z
    .record(z.string())
    .optional()
    .describe('Extra HTTP headers to send with the request')
})

export type GenericApiArgs = z.infer<typeof GenericApiArgs>

// Passthrough: the upstream body comes back as-is, with no per-endpoint shaping.
export const genericApiTool: ToolDescriptor = defineTool({
  name: GENERIC_API_TOOL,
  description:
    "A flexible tool for calling any OpenSearch API endpoint. Supports all HTTP methods with custom paths, query parameters, request bodies, and headers. Use this when you need to access OpenSearch APIs that don't have dedicated tools, or when you need more control over the request. Leverages your knowledge of OpenSearch API documentation to construct appropriate requests.",
  argsModel: GenericApiArgs,
  minVersion: '1.0.0',
  httpMethods: HTTP_METHODS,
  handler: withCompatibilityGate<GenericApiArgs>(
    GENERIC_API_TOOL,
    'calling OpenSearch API',
    async (args, { api }, options) => await api.request(args, options)
  )
})

/** Methods that may change cluster metadata. */
export function isMutatingMethod (method: GenericApiArgs['method']): boolean {
  return method !== 'GET' && method !== 'HEAD'
}
