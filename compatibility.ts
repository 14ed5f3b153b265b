/*
 * Copyright Elasticsearch B.V. and contributors
 * SPDX-License-Identifier: Apache-2.0
 */

import type { CallOptions } from './cluster.js'
import { CompatibilityRejectedError, VersionParseError, errorMessage, isAbortError } from './errors.js'
import { toolError, toolSuccess, type ToolContext, type ToolRegistry, type ToolResult } from './registry.js'
import type { BaseToolArgs } from './tool-args.js'
import { describeVersionRange, hasVersionBounds, isVersionInRange } from './version.js'

export type CompatibilityResult =
  | { ok: true }
  | { ok: false, reason: string }

/**
 * Decides whether a tool may run against a cluster reporting
 * `clusterVersion`. Throws `UnknownToolError` for names the registry does
 * not hold; every other outcome is returned as data.
 */
export function checkToolCompatibility (
  registry: ToolRegistry,
  toolName: string,
  clusterVersion: string
): CompatibilityResult {
  const tool = registry.get(toolName)
  if (!hasVersionBounds(tool)) {
    return { ok: true }
  }

  let compatible: boolean
  let parseFailure: string | undefined
  try {
    compatible = isVersionInRange(clusterVersion, tool)
  } catch (error) {
    if (!(error instanceof VersionParseError)) throw error
    compatible = false
    parseFailure = error.message
  }
  if (compatible) {
    return { ok: true }
  }

  let reason = `Tool '${tool.displayName}' is not supported for this OpenSearch version (current version: ${clusterVersion}).`
  const range = describeVersionRange(tool)
  if (range != null) {
    reason += ` Supported version: ${range}.`
  }
  if (parseFailure != null) {
    reason += ` ${parseFailure}.`
  }
  return { ok: false, reason }
}

export function assertToolCompatible (
  registry: ToolRegistry,
  toolName: string,
  clusterVersion: string
): void {
  const result = checkToolCompatibility(registry, toolName, clusterVersion)
  if (!result.ok) {
    throw new CompatibilityRejectedError(toolName, result.reason)
  }
}

/**
 * Wraps a capability call in the per-tool contract: probe the cluster
 * version, gate on it, make the call, and turn any failure into the text
 * error payload `Error <doing>: <message>`. Cancellation is rethrown.
 */
export function withCompatibilityGate<A extends BaseToolArgs> (
  toolName: string,
  doing: string,
  run: (args: A, context: ToolContext, options: CallOptions) => Promise<unknown>
): (args: A, context: ToolContext) => Promise<ToolResult> {
  return async (args, context) => {
    const { api, registry, signal } = context
    try {
      const version = await api.getVersion(args, { signal })
      assertToolCompatible(registry, toolName, version)

      return toolSuccess(await run(args, context, { signal }))
    } catch (error) {
      if (isAbortError(error, signal)) throw error
      console.error(`Failed ${doing}: ${errorMessage(error)}`)
      return toolError(`Error ${doing}: ${errorMessage(error)}`)
    }
  }
}
