/**
 * Import Strategy Selector
 *
 * Chooses the cheapest safe way to bring a solution artifact into a target
 * environment. Rules are evaluated in order; the first match wins:
 *
 *   1. not installed                 → install
 *   2. unmanaged (development) target → update, unmanaged overwrite
 *   3. same version                  → skip
 *   4. same major.minor              → update (keeps unmanaged layers)
 *   5. major/minor differ, batch > 1 → upgrade via holding solution
 *   6. major/minor differ, batch = 1 → upgrade directly
 */

import type { SolutionVersion } from '../types.js'
import { ValidationError } from '../lib/errors.js'
import { formatSolutionVersion, sameMajorMinor, solutionVersionsEqual } from './version.js'

export type ImportAction = 'skip' | 'install' | 'update' | 'upgrade'

/**
 * - none: nothing is imported
 * - managed / unmanaged: plain import of that package type
 * - holding: staged side by side, upgraded later in reverse order
 * - direct: import and upgrade in one step
 */
export type ImportMode = 'none' | 'managed' | 'unmanaged' | 'holding' | 'direct'

export interface ImportDecision {
  action: ImportAction
  mode: ImportMode
  reason: string
}

export interface ImportStrategyInput {
  artifactVersion: SolutionVersion
  installedVersion?: SolutionVersion
  /** Development/import targets are always overwritten unmanaged */
  isUnmanagedTarget: boolean
  totalSolutionsInBatch: number
}

export function selectImportStrategy(input: ImportStrategyInput): ImportDecision {
  const { artifactVersion, installedVersion, isUnmanagedTarget, totalSolutionsInBatch } = input

  if (!Number.isInteger(totalSolutionsInBatch) || totalSolutionsInBatch < 1) {
    throw new ValidationError(
      `Batch size must be a positive integer, got ${totalSolutionsInBatch}`,
      'INVALID_BATCH_SIZE',
      { context: { totalSolutionsInBatch } }
    )
  }

  const artifact = formatSolutionVersion(artifactVersion)

  if (!installedVersion) {
    return {
      action: 'install',
      mode: isUnmanagedTarget ? 'unmanaged' : 'managed',
      reason: `not installed; installing ${artifact}`
    }
  }

  const installed = formatSolutionVersion(installedVersion)

  if (isUnmanagedTarget) {
    return {
      action: 'update',
      mode: 'unmanaged',
      reason: `unmanaged target; overwriting ${installed} with ${artifact}`
    }
  }

  if (solutionVersionsEqual(artifactVersion, installedVersion)) {
    return {
      action: 'skip',
      mode: 'none',
      reason: `${installed} already installed`
    }
  }

  if (sameMajorMinor(artifactVersion, installedVersion)) {
    return {
      action: 'update',
      mode: 'managed',
      reason: `same major.minor; updating ${installed} to ${artifact}`
    }
  }

  if (totalSolutionsInBatch > 1) {
    return {
      action: 'upgrade',
      mode: 'holding',
      reason: `major.minor changed (${installed} → ${artifact}); staging as holding solution`
    }
  }

  return {
    action: 'upgrade',
    mode: 'direct',
    reason: `major.minor changed (${installed} → ${artifact}); upgrading directly`
  }
}

/** Decisions that result in an import */
export function isImport(decision: ImportDecision): boolean {
  return decision.action !== 'skip'
}
