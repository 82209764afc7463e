/**
 * `deploy` / `import` Commands
 *
 * Usage:
 *   dvalm deploy test                 Plan and apply managed artifacts
 *   dvalm deploy test --dry-run       Show the plan only
 *   dvalm deploy dev --unmanaged      Overwrite everything unmanaged
 *   dvalm import dev                  build + deploy --unmanaged
 */

import { buildSolutions } from '../../domain/build.js'
import { executeDeploy, type DeployResult } from '../../domain/deploy.js'
import type { ResolvedAlmConfig } from '../../types.js'
import { colorEnv, symbols } from '../lib/colors.js'
import { createHooks, createPlatform, requirePositional, type CommandContext } from '../lib/context.js'
import * as ui from '../ui.js'
import { displayPlan, planDeploy } from './plan.js'

export async function runDeploy(context: CommandContext): Promise<void> {
  const config = context.loadConfig()
  const environment = requirePositional(context.args, 1, 'environment')
  await deployTo(context, config, environment, context.args.unmanaged === true)
}

/**
 * Development import: fresh build, then unmanaged deploy
 */
export async function runImport(context: CommandContext): Promise<void> {
  const config = context.loadConfig()
  const environment = requirePositional(context.args, 1, 'environment')

  if (context.dryRun) {
    context.logger.warn(dryRunImportNotice(config.artifactsDir))
  } else {
    await buildSolutions({
      platform: createPlatform(config),
      config,
      hooks: createHooks(config, context.logger),
      logger: context.logger
    })
  }
  await deployTo(context, config, environment, true)
}

/**
 * A dry-run import skips the build, so its plan reads whatever an earlier build left behind
 */
export function dryRunImportNotice(artifactsDir: string): string {
  return `Dry run skips the build: the plan uses the artifacts already in ${artifactsDir}, which may be stale`
}

async function deployTo(
  context: CommandContext,
  config: ResolvedAlmConfig,
  environment: string,
  unmanaged: boolean
): Promise<void> {
  const { logger, dryRun, jsonOutput } = context

  const plan = await planDeploy(context, config, environment, unmanaged)
  if (!jsonOutput) {
    displayPlan(plan)
  }

  if (dryRun) {
    if (jsonOutput) {
      ui.output(JSON.stringify(plan, null, 2))
    }
    ui.log('')
    ui.log(`${symbols.warning} Dry run: nothing was imported`)
    return
  }

  const result = await executeDeploy({
    platform: createPlatform(config),
    plan,
    config,
    hooks: createHooks(config, logger),
    logger
  })

  if (jsonOutput) {
    ui.output(JSON.stringify(result, null, 2))
    return
  }

  ui.output(formatDeployResult(result))
  ui.success(`Deployed to ${colorEnv(result.environment)}`)
}

export function formatDeployResult(result: DeployResult): string {
  const lines = Object.entries(result.states).map(([solution, state]) => `${solution}\t${state}`)
  const { reassigned, activated, unchanged } = result.processes
  lines.push(`processes\treassigned=${reassigned} activated=${activated} unchanged=${unchanged}`)
  return lines.join('\n')
}
