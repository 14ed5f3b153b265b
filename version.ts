/*
 * Copyright Elasticsearch B.V. and contributors
 * SPDX-License-Identifier: Apache-2.0
 */

import { VersionParseError } from './errors.js'

/**
 * Inclusive bounds on the cluster versions a tool supports. Either side may
 * be left open.
 */
export interface VersionRange {
  minVersion?: string
  maxVersion?: string
}

export type VersionOrdering = -1 | 0 | 1

/**
 * Splits a dotted version such as `2.12.0` into numeric components.
 * Only digits are accepted in each component, so pre-release suffixes
 * like `3.0.0-beta1` are rejected. Components are bigints so that long
 * components compare exactly.
 */
export function parseVersion (version: string): bigint[] {
  const trimmed = version.trim()
  if (trimmed.length === 0) {
    throw new VersionParseError(version, 'version is empty')
  }

  return trimmed.split('.').map((component, position) => {
    if (!/^\d+$/.test(component)) {
      throw new VersionParseError(version, `component ${position + 1} ('${component}') is not numeric`)
    }
    return BigInt(component)
  })
}

/**
 * Component-wise numeric comparison. A missing trailing component counts as
 * zero, so `2.12` and `2.12.0` compare equal.
 */
export function compareVersions (a: string, b: string): VersionOrdering {
  const left = parseVersion(a)
  const right = parseVersion(b)
  const length = Math.max(left.length, right.length)

  for (let i = 0; i < length; i++) {
    const l = left[i] ?? 0n
    const r = right[i] ?? 0n
    if (l < r) return -1
    if (l > r) return 1
  }
  return 0
}

export function isVersionInRange (version: string, range: VersionRange): boolean {
  if (range.minVersion != null && compareVersions(version, range.minVersion) < 0) {
    return false
  }
  if (range.maxVersion != null && compareVersions(version, range.maxVersion) > 0) {
    return false
  }
  return true
}

export function hasVersionBounds (range: VersionRange): boolean {
  return range.minVersion != null || range.maxVersion != null
}

export function describeVersionRange (range: VersionRange): string | undefined {
  const { minVersion, maxVersion } = range
  if (minVersion != null && maxVersion != null) return `${minVersion} to ${maxVersion}`
  if (minVersion != null) return `${minVersion} or later`
  if (maxVersion != null) return `up to ${maxVersion}`
  return undefined
}
