/*
 * Copyright Elasticsearch B.V. and contributors
 * SPDX-License-Identifier: Apache-2.0
 */

export class VersionParseError extends Error {
  readonly version: string

  constructor (version: string, detail: string) {
    super(`Invalid version string '${version}': ${detail}`)
    this.name = 'VersionParseError'
    this.version = version
  }
}

/**
 * Base class for registry faults. Registration faults are configuration
 * defects and abort startup; lookup faults are reported to the caller.
 */
export class ToolRegistryError extends Error {
  constructor (message: string) {
    super(message)
    this.name = 'ToolRegistryError'
  }
}

export class DuplicateToolError extends ToolRegistryError {
  readonly toolName: string

  constructor (toolName: string) {
    super(`Tool '${toolName}' is already registered`)
    this.name = 'DuplicateToolError'
    this.toolName = toolName
  }
}

export class UnknownToolError extends ToolRegistryError {
  readonly toolName: string

  constructor (toolName: string) {
    super(`Unknown tool: ${toolName}`)
    this.name = 'UnknownToolError'
    this.toolName = toolName
  }
}

export class CompatibilityRejectedError extends Error {
  readonly toolName: string

  constructor (toolName: string, reason: string) {
    super(reason)
    this.name = 'CompatibilityRejectedError'
    this.toolName = toolName
  }
}

export class UpstreamCallError extends Error {
  readonly operation: string
  readonly statusCode?: number

  constructor (operation: string, cause: unknown, statusCode?: number) {
    super(`${operation} failed: ${errorMessage(cause)}`, { cause })
    this.name = 'UpstreamCallError'
    this.operation = operation
    this.statusCode = statusCode
  }
}

export class UnknownClusterError extends Error {
  readonly clusterName: string

  constructor (clusterName: string, known: readonly string[]) {
    super(
      `Unknown OpenSearch cluster '${clusterName}'` +
        (known.length > 0 ? ` (configured: ${known.join(', ')})` : ' (no named clusters configured)')
    )
    this.name = 'UnknownClusterError'
    this.clusterName = clusterName
  }
}

export class ConfigError extends Error {
  constructor (message: string, options?: ErrorOptions) {
    super(message, options)
    this.name = 'ConfigError'
  }
}

export function errorMessage (error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}

// Cancellation is not a failure: callers rethrow instead of reporting it.
export function isAbortError (error: unknown, signal?: AbortSignal): boolean {
  if (signal?.aborted === true) return true
  return error instanceof Error && (error.name === 'AbortError' || error.name === 'RequestAbortedError')
}
