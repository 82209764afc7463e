/**
 * Version Bumper
 *
 * Decides how far a solution version moves after an exported change:
 *   additive change → revision + 1
 *   breaking change → minor + 1, build and revision reset
 *
 * Whether a change is additive is decided by the platform's component
 * comparison (is the new snapshot a compatible superset of the old one?).
 * No structural rules are reimplemented here.
 */

import type { SolutionSnapshot, SolutionVersion } from '../types.js'
import { SnapshotCompareError, toError } from '../lib/errors.js'

export type ChangeClassification = 'additive' | 'breaking'

/**
 * Returns true when `newer` keeps every component of `older` with a compatible
 * definition.
 */
export type ComponentComparer = (
  older: SolutionSnapshot,
  newer: SolutionSnapshot
) => Promise<boolean>

/**
 * Classify the change between two snapshots of the same solution.
 * Without a previous snapshot (first export) there is nothing to regress against.
 */
export async function classifyChange(
  oldSnapshot: SolutionSnapshot | undefined,
  newSnapshot: SolutionSnapshot,
  compare: ComponentComparer
): Promise<ChangeClassification> {
  if (!oldSnapshot || oldSnapshot.path === newSnapshot.path) {
    return 'additive'
  }

  let isAdditive: boolean
  try {
    isAdditive = await compare(oldSnapshot, newSnapshot)
  } catch (err) {
    const error = toError(err)
    throw new SnapshotCompareError(newSnapshot.solutionName, error.message, error)
  }

  return isAdditive ? 'additive' : 'breaking'
}

/**
 * Compute the version that follows `current` for the given classification.
 * Negative components are treated as 0.
 */
export function nextVersion(
  current: SolutionVersion,
  classification: ChangeClassification
): SolutionVersion {
  if (classification === 'additive') {
    return {
      major: current.major,
      minor: current.minor,
      build: Math.max(0, current.build),
      revision: Math.max(0, current.revision) + 1
    }
  }

  return {
    major: current.major,
    minor: Math.max(0, current.minor) + 1,
    build: 0,
    revision: 0
  }
}
