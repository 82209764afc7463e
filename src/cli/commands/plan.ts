/**
 * `plan` Command
 *
 * Reads installed versions in the target environment and shows the import
 * decision for every solution. Nothing is imported.
 *
 * Usage:
 *   dvalm plan test                Managed plan
 *   dvalm plan dev --unmanaged     Plan for an unmanaged import
 *   dvalm plan prod --json         JSON output for CI
 */

import path from 'node:path'
import { readArtifactManifest } from '../../domain/build.js'
import {
  computeDeployPlan,
  writeDeployPlanArtifact,
  type DeployPlan
} from '../../domain/deploy-plan.js'
import { formatSolutionVersion } from '../../domain/version.js'
import type { ResolvedAlmConfig } from '../../types.js'
import { c, colorAction, colorEnv, symbols } from '../lib/colors.js'
import { createPlatform, requirePositional, type CommandContext } from '../lib/context.js'
import * as ui from '../ui.js'

export async function runPlan(context: CommandContext): Promise<void> {
  const { args, logger, jsonOutput } = context
  const config = context.loadConfig()
  const environment = requirePositional(args, 1, 'environment')

  const plan = await planDeploy(context, config, environment, args.unmanaged === true)

  if (jsonOutput) {
    ui.output(JSON.stringify(plan, null, 2))
    return
  }

  const paths = writeDeployPlanArtifact(plan, planArtifactDir(config))
  displayPlan(plan)

  ui.log('')
  ui.log(`${c.muted('Plan saved to:')}`)
  ui.log(`  ${c.muted('JSON:')} ${paths.json}`)
  ui.log(`  ${c.muted('Markdown:')} ${paths.markdown}`)
  logger.verbose(`Plan id ${plan.id}`)
}

/**
 * Compute the plan from the artifacts of the last build
 */
export async function planDeploy(
  context: CommandContext,
  config: ResolvedAlmConfig,
  environment: string,
  unmanaged: boolean
): Promise<DeployPlan> {
  ui.log(`${symbols.arrow} Computing plan for ${colorEnv(environment)}...`)

  return computeDeployPlan({
    platform: createPlatform(config),
    config,
    environment,
    unmanaged,
    artifacts: readArtifactManifest(config.artifactsDir),
    logger: context.logger
  })
}

export function planArtifactDir(config: ResolvedAlmConfig): string {
  return path.join(config.artifactsDir, 'plans')
}

export function displayPlan(plan: DeployPlan): void {
  ui.log('')
  ui.log(c.header(`Plan: ${plan.environment.name}${plan.unmanaged ? ' (unmanaged)' : ''}`))
  ui.log('')

  for (const entry of plan.entries) {
    const installed = entry.installed ? formatSolutionVersion(entry.installed.installedVersion) : '-'
    const mode = entry.decision.mode === 'none' ? '' : c.muted(` [${entry.decision.mode}]`)
    const downgrade = entry.downgrade ? ` ${c.warning('(downgrade)')}` : ''
    ui.log(
      `  ${c.solution(entry.solution.name)} ${c.version(installed)} ${symbols.arrow} ` +
      `${c.version(formatSolutionVersion(entry.artifactVersion))} ${colorAction(entry.decision.action)}${mode}${downgrade}`
    )
  }

  const { summary } = plan
  ui.log('')
  ui.log(
    `  ${summary.install} install, ${summary.update} update, ${summary.upgrade} upgrade, ${summary.skip} skip`
  )
  if (plan.upgradeOrder.length > 0) {
    ui.log(`  ${c.muted('Upgrade order:')} ${plan.upgradeOrder.join(', ')}`)
  }
}
