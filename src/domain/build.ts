/**
 * Build: pack every solution source folder into managed and unmanaged
 * artifacts and record them in <artifacts_dir>/manifest.json.
 *
 * No environment connection is needed; the version recorded for each
 * artifact is the one in the source manifest.
 */

import fs from 'node:fs'
import path from 'node:path'
import type { ResolvedAlmConfig, RunLogger, SolutionVersion } from '../types.js'
import { silentLogger } from '../types.js'
import type { SolutionPlatform } from '../platform.js'
import type { HookRunner } from '../lib/hooks.js'
import { noHooks } from '../lib/hooks.js'
import { getSolutionSourceDir } from '../lib/config-loader.js'
import { FileNotFoundError, InvalidConfigError, toError } from '../lib/errors.js'
import { readManifestVersion } from '../lib/solution-manifest.js'
import { formatSolutionVersion, parseSolutionVersion } from './version.js'

export const ARTIFACT_MANIFEST_FILE = 'manifest.json'

export interface ArtifactEntry {
  name: string
  version: string
  /** File names relative to the artifacts directory */
  managed: string
  unmanaged: string
}

export interface ArtifactManifest {
  generatedAt: string
  solutions: ArtifactEntry[]
}

export interface BuildOptions {
  platform: SolutionPlatform
  config: ResolvedAlmConfig
  hooks?: HookRunner
  logger?: RunLogger
}

/**
 * Artifact file name following the platform convention Name_1_2_3_4[_managed].zip
 */
export function artifactFileName(solutionName: string, version: SolutionVersion, managed: boolean): string {
  const versionPart = formatSolutionVersion(version).replace(/\./g, '_')
  return `${solutionName}_${versionPart}${managed ? '_managed' : ''}.zip`
}

export async function buildSolutions(options: BuildOptions): Promise<ArtifactManifest> {
  const { platform, config, hooks = noHooks, logger = silentLogger } = options
  const artifactsDir = config.artifactsDir

  await hooks.run('preBuild', {
    artifactsDir,
    solutions: config.solutions.map(s => s.name)
  })

  fs.mkdirSync(artifactsDir, { recursive: true })

  const entries: ArtifactEntry[] = []

  for (const solution of config.solutions) {
    const sourceDir = getSolutionSourceDir(config, solution.name)
    if (!fs.existsSync(sourceDir)) {
      throw new FileNotFoundError(sourceDir)
    }

    const version = readManifestVersion(sourceDir)
    const unmanaged = artifactFileName(solution.name, version, false)
    const managed = artifactFileName(solution.name, version, true)

    logger.info(`Packing ${solution.name} ${formatSolutionVersion(version)}`)

    await platform.pack({
      solutionName: solution.name,
      sourceDir,
      packageType: 'unmanaged',
      outputPath: path.join(artifactsDir, unmanaged)
    })
    await platform.pack({
      solutionName: solution.name,
      sourceDir,
      packageType: 'managed',
      outputPath: path.join(artifactsDir, managed)
    })

    entries.push({
      name: solution.name,
      version: formatSolutionVersion(version),
      managed,
      unmanaged
    })
  }

  const manifest: ArtifactManifest = {
    generatedAt: new Date().toISOString(),
    solutions: entries
  }
  writeArtifactManifest(artifactsDir, manifest)

  await hooks.run('postBuild', {
    artifactsDir,
    artifacts: entries.map(entry => ({
      solution: entry.name,
      version: entry.version,
      managed: path.join(artifactsDir, entry.managed),
      unmanaged: path.join(artifactsDir, entry.unmanaged)
    }))
  })

  return manifest
}

export function writeArtifactManifest(artifactsDir: string, manifest: ArtifactManifest): string {
  const manifestPath = path.join(artifactsDir, ARTIFACT_MANIFEST_FILE)
  fs.writeFileSync(manifestPath, JSON.stringify(manifest, null, 2) + '\n')
  return manifestPath
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value)
}

/**
 * Read and validate the manifest written by buildSolutions.
 * Versions are re-parsed so a hand-edited manifest fails before deploy starts.
 */
export function readArtifactManifest(artifactsDir: string): ArtifactManifest {
  const manifestPath = path.join(artifactsDir, ARTIFACT_MANIFEST_FILE)
  if (!fs.existsSync(manifestPath)) {
    throw new FileNotFoundError(manifestPath)
  }

  let parsed: unknown
  try {
    parsed = JSON.parse(fs.readFileSync(manifestPath, 'utf-8'))
  } catch (err) {
    const error = toError(err)
    throw new InvalidConfigError(error.message, manifestPath, error)
  }

  if (!isRecord(parsed) || !Array.isArray(parsed.solutions)) {
    throw new InvalidConfigError('expected an object with a "solutions" list', manifestPath)
  }

  const solutions = parsed.solutions.map((entry: unknown, index: number): ArtifactEntry => {
    if (
      !isRecord(entry) ||
      typeof entry.name !== 'string' ||
      typeof entry.version !== 'string' ||
      typeof entry.managed !== 'string' ||
      typeof entry.unmanaged !== 'string'
    ) {
      throw new InvalidConfigError(`solutions[${index}] must have name, version, managed and unmanaged`, manifestPath)
    }
    parseSolutionVersion(entry.version, manifestPath)
    return {
      name: entry.name,
      version: entry.version,
      managed: entry.managed,
      unmanaged: entry.unmanaged
    }
  })

  return {
    generatedAt: typeof parsed.generatedAt === 'string' ? parsed.generatedAt : '',
    solutions
  }
}
