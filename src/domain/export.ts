/**
 * Export: pull every listed solution out of the development environment,
 * unpack it into source control and bump its version when it changed.
 *
 * Solutions are isolated from each other: one failing export is reported
 * but does not stop the others. Changed folders are committed once at the end.
 */

import fs from 'node:fs'
import os from 'node:os'
import path from 'node:path'
import type { ResolvedAlmConfig, RunLogger, SolutionConfig, SolutionSnapshot, SolutionVersion } from '../types.js'
import { silentLogger } from '../types.js'
import type { EnvironmentTarget, SolutionPlatform } from '../platform.js'
import type { GitClient } from '../lib/git.js'
import type { HookRunner } from '../lib/hooks.js'
import { noHooks } from '../lib/hooks.js'
import { getSolutionSourceDir, requireEnvironment } from '../lib/config-loader.js'
import { BatchOperationError, MissingInputError, SolutionNotInstalledError, toError } from '../lib/errors.js'
import { writeManifestVersion } from '../lib/solution-manifest.js'
import { classifyChange, nextVersion, type ChangeClassification } from './version-bumper.js'
import { formatSolutionVersion } from './version.js'

// ============================================================================
// Types
// ============================================================================

export type SolutionExportResult =
  | {
    solution: string
    status: 'bumped'
    classification: ChangeClassification
    previousVersion: SolutionVersion
    version: SolutionVersion
    changedFiles: number
  }
  | { solution: string; status: 'unchanged' }
  | { solution: string; status: 'failed'; error: Error }

export interface ExportSummary {
  environment: string
  results: SolutionExportResult[]
  committed: boolean
  pushed: boolean
}

export interface ExportOptions {
  platform: SolutionPlatform
  git: GitClient
  config: ResolvedAlmConfig
  commitMessage: string
  /** Source environment (default: config.devEnvironment) */
  environment?: string
  hooks?: HookRunner
  logger?: RunLogger
  /** Scratch directory for exported and re-packed zips (default: a fresh temp dir) */
  workDir?: string
}

// ============================================================================
// Export
// ============================================================================

export async function exportSolutions(options: ExportOptions): Promise<ExportSummary> {
  const {
    platform,
    git,
    config,
    hooks = noHooks,
    logger = silentLogger
  } = options

  const commitMessage = options.commitMessage.trim()
  if (!commitMessage) {
    throw new MissingInputError('commit message')
  }

  const environmentName = options.environment ?? config.devEnvironment
  const environment: EnvironmentTarget = {
    name: environmentName,
    url: requireEnvironment(config, environmentName).url
  }

  const ownsWorkDir = options.workDir === undefined
  const workDir = options.workDir ?? fs.mkdtempSync(path.join(os.tmpdir(), 'dvalm-export-'))

  await hooks.run('preExport', {
    environment: environment.name,
    solutions: config.solutions.map(s => s.name)
  })

  const results: SolutionExportResult[] = []

  try {
    for (const solution of config.solutions) {
      try {
        const result = await exportOne(solution, { platform, git, config, environment, workDir, logger })
        results.push(result)
      } catch (err) {
        const error = toError(err)
        logger.warn(`${solution.name}: export failed: ${error.message}`)
        results.push({ solution: solution.name, status: 'failed', error })
      }
    }
  } finally {
    if (ownsWorkDir) {
      fs.rmSync(workDir, { recursive: true, force: true })
    }
  }

  await hooks.run('postExport', {
    environment: environment.name,
    results: results.map(result => ({
      solution: result.solution,
      status: result.status,
      version: result.status === 'bumped' ? formatSolutionVersion(result.version) : undefined
    }))
  })

  let committed = false
  let pushed = false
  const changedDirs = results
    .filter(result => result.status === 'bumped')
    .map(result => getSolutionSourceDir(config, result.solution))

  if (config.git.enabled && changedDirs.length > 0) {
    committed = git.commit(commitMessage, changedDirs)
    if (committed && config.git.push) {
      git.push(config.git.remote)
      pushed = true
    }
  }

  const failures = results.flatMap(result =>
    result.status === 'failed' ? [{ key: result.solution, error: result.error.message }] : []
  )
  if (failures.length > 0) {
    throw new BatchOperationError('export', results.length - failures.length, failures)
  }

  return { environment: environment.name, results, committed, pushed }
}

async function exportOne(
  solution: SolutionConfig,
  ctx: {
    platform: SolutionPlatform
    git: GitClient
    config: ResolvedAlmConfig
    environment: EnvironmentTarget
    workDir: string
    logger: RunLogger
  }
): Promise<SolutionExportResult> {
  const { platform, git, config, environment, workDir, logger } = ctx
  const sourceDir = getSolutionSourceDir(config, solution.name)

  // Baseline: what is in source control right now
  let previous: SolutionSnapshot | undefined
  if (fs.existsSync(sourceDir)) {
    previous = await platform.pack({
      solutionName: solution.name,
      sourceDir,
      packageType: 'unmanaged',
      outputPath: path.join(workDir, `${solution.name}_previous.zip`)
    })
  }

  logger.info(`Exporting ${solution.name} from ${environment.name}`)
  const exported = await platform.exportSolution(environment, solution.name, workDir)

  try {
    await platform.unpack(exported, sourceDir)
    return await bumpExported(solution, previous, exported, { ...ctx, sourceDir })
  } catch (err) {
    // The next run packs its baseline from this folder
    try {
      git.restore(sourceDir)
    } catch (restoreErr) {
      logger.warn(`${solution.name}: could not restore ${sourceDir}: ${toError(restoreErr).message}`)
    }
    throw err
  }
}

async function bumpExported(
  solution: SolutionConfig,
  previous: SolutionSnapshot | undefined,
  exported: SolutionSnapshot,
  ctx: {
    platform: SolutionPlatform
    git: GitClient
    environment: EnvironmentTarget
    logger: RunLogger
    sourceDir: string
  }
): Promise<SolutionExportResult> {
  const { platform, git, environment, logger, sourceDir } = ctx

  const changed = git.changedFiles(sourceDir)
  if (changed.length === 0) {
    logger.verbose(`${solution.name}: no changes`)
    return { solution: solution.name, status: 'unchanged' }
  }

  const classification = await classifyChange(previous, exported, (older, newer) =>
    platform.compareComponents(older, newer)
  )

  const installed = await platform.getInstalledSolution(environment, solution.name)
  if (!installed) {
    throw new SolutionNotInstalledError(solution.name, environment.name)
  }

  const version = nextVersion(installed.installedVersion, classification)
  await platform.setVersion(environment, solution.name, version)
  writeManifestVersion(sourceDir, version)

  logger.info(
    `${solution.name}: ${classification} change, ${formatSolutionVersion(installed.installedVersion)} -> ${formatSolutionVersion(version)}`
  )

  return {
    solution: solution.name,
    status: 'bumped',
    classification,
    previousVersion: installed.installedVersion,
    version,
    changedFiles: changed.length
  }
}
