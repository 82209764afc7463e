/**
 * Solution version parsing, formatting and ordering.
 */

import type { SolutionVersion } from '../types.js'
import { InvalidVersionError } from '../lib/errors.js'

const PART_PATTERN = /^\d+$/

/**
 * Parse "Major.Minor.Build.Revision". Anything other than exactly four
 * non-negative integer parts is rejected.
 */
export function parseSolutionVersion(value: string, source?: string): SolutionVersion {
  const trimmed = value.trim()
  const parts = trimmed.split('.')

  if (parts.length !== 4 || !parts.every(part => PART_PATTERN.test(part))) {
    throw new InvalidVersionError(value, source)
  }

  const [major, minor, build, revision] = parts.map(part => Number.parseInt(part, 10))
  if (![major, minor, build, revision].every(Number.isSafeInteger)) {
    throw new InvalidVersionError(value, source)
  }

  return { major, minor, build, revision }
}

export function formatSolutionVersion(version: SolutionVersion): string {
  return `${version.major}.${version.minor}.${version.build}.${version.revision}`
}

/**
 * Lexicographic comparison: -1 if a < b, 0 if equal, 1 if a > b
 */
export function compareSolutionVersions(a: SolutionVersion, b: SolutionVersion): -1 | 0 | 1 {
  const pairs: Array<[number, number]> = [
    [a.major, b.major],
    [a.minor, b.minor],
    [a.build, b.build],
    [a.revision, b.revision]
  ]

  for (const [left, right] of pairs) {
    if (left < right) return -1
    if (left > right) return 1
  }
  return 0
}

export function solutionVersionsEqual(a: SolutionVersion, b: SolutionVersion): boolean {
  return compareSolutionVersions(a, b) === 0
}

/** Same major and minor component */
export function sameMajorMinor(a: SolutionVersion, b: SolutionVersion): boolean {
  return a.major === b.major && a.minor === b.minor
}
