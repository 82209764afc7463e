/**
 * Deploy Plan Computation
 *
 * Reads the installed state of every listed solution in the target
 * environment, pairs it with the built artifact, and runs the import
 * strategy selector. The result is read-only: nothing is imported here.
 *
 * This is the "plan" half of plan → deploy.
 */

import fs from 'node:fs'
import path from 'node:path'
import type {
  DeployedSolutionState,
  ResolvedAlmConfig,
  RunLogger,
  SolutionConfig,
  SolutionVersion
} from '../types.js'
import { silentLogger } from '../types.js'
import type { EnvironmentTarget, SolutionPlatform } from '../platform.js'
import { requireEnvironment } from '../lib/config-loader.js'
import { FileNotFoundError, InvalidConfigError } from '../lib/errors.js'
import type { ArtifactEntry, ArtifactManifest } from './build.js'
import type { ImportAction, ImportDecision } from './import-strategy.js'
import { selectImportStrategy } from './import-strategy.js'
import { compareSolutionVersions, formatSolutionVersion, parseSolutionVersion } from './version.js'

// ============================================================================
// Types
// ============================================================================

export interface DeployPlanEntry {
  solution: SolutionConfig
  artifactVersion: SolutionVersion
  /** Absolute path of the artifact that will be imported */
  artifactPath: string
  installed?: DeployedSolutionState
  decision: ImportDecision
  /** Artifact is older than the installed version */
  downgrade: boolean
}

export type DeployPlanSummary = Record<ImportAction, number>

export interface DeployPlan {
  id: string
  environment: EnvironmentTarget
  unmanaged: boolean
  generatedAt: string
  /** In manifest (dependency) order */
  entries: DeployPlanEntry[]
  summary: DeployPlanSummary
  /** Solutions imported, upstream first */
  stageOrder: string[]
  /** Holding solutions, in exact reverse of their staging order */
  upgradeOrder: string[]
}

export interface ComputeDeployPlanOptions {
  platform: SolutionPlatform
  config: ResolvedAlmConfig
  environment: string
  /** Development/import run: every solution is overwritten unmanaged */
  unmanaged: boolean
  artifacts: ArtifactManifest
  /** Directory the artifact file names are relative to (default: config.artifactsDir) */
  artifactsDir?: string
  logger?: RunLogger
}

// ============================================================================
// Plan Computation
// ============================================================================

function findArtifact(artifacts: ArtifactManifest, name: string): ArtifactEntry {
  const entry = artifacts.solutions.find(s => s.name === name)
  if (!entry) {
    throw new InvalidConfigError(`no built artifact for solution "${name}"; run build first`)
  }
  return entry
}

/**
 * Compute the import decision for every listed solution.
 *
 * Configuration problems (unknown environment, missing artifact) are raised
 * before the first platform call.
 */
export async function computeDeployPlan(options: ComputeDeployPlanOptions): Promise<DeployPlan> {
  const {
    platform,
    config,
    environment: environmentName,
    unmanaged,
    artifacts,
    artifactsDir = config.artifactsDir,
    logger = silentLogger
  } = options

  const environment: EnvironmentTarget = {
    name: environmentName,
    url: requireEnvironment(config, environmentName).url
  }

  // Resolve every artifact before talking to the environment
  const prepared = config.solutions.map(solution => {
    const artifact = findArtifact(artifacts, solution.name)
    const isUnmanagedTarget = unmanaged || solution.deployUnmanaged
    const artifactPath = path.resolve(artifactsDir, isUnmanagedTarget ? artifact.unmanaged : artifact.managed)
    if (!fs.existsSync(artifactPath)) {
      throw new FileNotFoundError(artifactPath)
    }
    return {
      solution,
      isUnmanagedTarget,
      artifactPath,
      artifactVersion: parseSolutionVersion(artifact.version, `artifact of ${solution.name}`)
    }
  })

  const entries: DeployPlanEntry[] = []

  for (const item of prepared) {
    const installed = await platform.getInstalledSolution(environment, item.solution.name)

    const decision = selectImportStrategy({
      artifactVersion: item.artifactVersion,
      installedVersion: installed?.installedVersion,
      isUnmanagedTarget: item.isUnmanagedTarget,
      totalSolutionsInBatch: prepared.length
    })

    const downgrade = installed !== undefined &&
      compareSolutionVersions(item.artifactVersion, installed.installedVersion) < 0

    if (downgrade && installed) {
      logger.warn(
        `${item.solution.name}: artifact ${formatSolutionVersion(item.artifactVersion)} is older than installed ${formatSolutionVersion(installed.installedVersion)}`
      )
    }
    logger.verbose(`${item.solution.name}: ${decision.action} (${decision.reason})`)

    entries.push({
      solution: item.solution,
      artifactVersion: item.artifactVersion,
      artifactPath: item.artifactPath,
      installed,
      decision,
      downgrade
    })
  }

  const summary: DeployPlanSummary = { skip: 0, install: 0, update: 0, upgrade: 0 }
  for (const entry of entries) {
    summary[entry.decision.action]++
  }

  const stageOrder = entries
    .filter(entry => entry.decision.action !== 'skip')
    .map(entry => entry.solution.name)

  const upgradeOrder = entries
    .filter(entry => entry.decision.mode === 'holding')
    .map(entry => entry.solution.name)
    .reverse()

  const now = new Date()

  return {
    id: generatePlanId(environment.name, now),
    environment,
    unmanaged,
    generatedAt: now.toISOString(),
    entries,
    summary,
    stageOrder,
    upgradeOrder
  }
}

// ============================================================================
// Rendering
// ============================================================================

/**
 * Plain-text summary, one line per solution
 */
export function formatDeployPlan(plan: DeployPlan): string {
  const lines: string[] = []
  lines.push(`Deploy plan for ${plan.environment.name}${plan.unmanaged ? ' (unmanaged)' : ''}`)

  for (const entry of plan.entries) {
    const installed = entry.installed ? formatSolutionVersion(entry.installed.installedVersion) : '-'
    const artifact = formatSolutionVersion(entry.artifactVersion)
    const mode = entry.decision.mode === 'none' ? '' : ` [${entry.decision.mode}]`
    lines.push(`  ${entry.solution.name}: ${installed} -> ${artifact} ${entry.decision.action}${mode}`)
  }

  lines.push(
    `Summary: ${plan.summary.install} install, ${plan.summary.update} update, ` +
    `${plan.summary.upgrade} upgrade, ${plan.summary.skip} skip`
  )
  if (plan.upgradeOrder.length > 0) {
    lines.push(`Upgrade order: ${plan.upgradeOrder.join(', ')}`)
  }
  return lines.join('\n')
}

export function buildDeployPlanMarkdown(plan: DeployPlan): string {
  const lines: string[] = []

  lines.push('# Deploy Plan')
  lines.push('')
  lines.push(`- **ID:** ${plan.id}`)
  lines.push(`- **Environment:** ${plan.environment.name}`)
  lines.push(`- **Unmanaged:** ${plan.unmanaged ? 'yes' : 'no'}`)
  lines.push(`- **Generated:** ${plan.generatedAt}`)
  lines.push('')

  lines.push('## Solutions')
  lines.push('')
  lines.push('| Solution | Installed | Artifact | Action | Mode |')
  lines.push('|----------|-----------|----------|--------|------|')
  for (const entry of plan.entries) {
    const installed = entry.installed ? formatSolutionVersion(entry.installed.installedVersion) : '-'
    lines.push(
      `| ${entry.solution.name} | ${installed} | ${formatSolutionVersion(entry.artifactVersion)} | ${entry.decision.action} | ${entry.decision.mode} |`
    )
  }

  if (plan.upgradeOrder.length > 0) {
    lines.push('')
    lines.push('## Upgrade order')
    lines.push('')
    plan.upgradeOrder.forEach((name, index) => {
      lines.push(`${index + 1}. ${name}`)
    })
  }

  return lines.join('\n')
}

export interface PlanArtifactPaths {
  json: string
  markdown: string
}

/**
 * Write the plan as JSON + Markdown for review
 */
export function writeDeployPlanArtifact(plan: DeployPlan, outputDir: string): PlanArtifactPaths {
  fs.mkdirSync(outputDir, { recursive: true })

  const jsonPath = path.join(outputDir, `${plan.id}.json`)
  const mdPath = path.join(outputDir, `${plan.id}.md`)

  fs.writeFileSync(jsonPath, JSON.stringify(plan, null, 2) + '\n')
  fs.writeFileSync(mdPath, buildDeployPlanMarkdown(plan) + '\n')

  return { json: jsonPath, markdown: mdPath }
}

function generatePlanId(environment: string, date: Date): string {
  const ts = date.toISOString().replace(/[:.]/g, '-')
  return `${sanitize(environment)}-${ts}`
}

function sanitize(value: string): string {
  return value
    .trim()
    .toLowerCase()
    .replace(/[^a-z0-9._-]+/g, '-')
    .replace(/^-+|-+$/g, '')
}
