/**
 * Deploy Execution
 *
 * Executes a DeployPlan against its target environment as a sequence of
 * strictly ordered steps:
 *
 *   1. resolve service identities      (no side effects yet)
 *   2. preDeploy hooks
 *   3. stage every imported solution    manifest order, fail fast
 *   4. migrateData hooks                only when holding solutions exist
 *   5. upgrade holding solutions        reverse staging order
 *   6. reassign/activate processes      only where needed
 *   7. publish
 *   8. postDeploy hooks
 *
 * Nothing is rolled back on failure. Re-running the whole deploy is safe:
 * solutions already at the artifact version plan as 'skip'.
 */

import type { ResolvedAlmConfig, RunLogger } from '../types.js'
import { silentLogger } from '../types.js'
import type { PlatformProcess, PlatformUser, SolutionPlatform } from '../platform.js'
import type { HookRunner } from '../lib/hooks.js'
import { noHooks } from '../lib/hooks.js'
import { ExternalCallError, toError } from '../lib/errors.js'
import type { DeployPlan } from './deploy-plan.js'
import { DeployStateTracker, type SolutionDeployState } from './deploy-state.js'
import { resolveServiceIdentities } from './identity.js'
import { formatSolutionVersion } from './version.js'

// ============================================================================
// Types
// ============================================================================

export type DeployStepKind = 'stage' | 'migrate' | 'upgrade' | 'reassign' | 'activate' | 'publish'

export interface DeployStep {
  kind: DeployStepKind
  solution?: string
  detail?: string
}

export interface ProcessCounts {
  reassigned: number
  activated: number
  unchanged: number
}

export interface DeployResult {
  planId: string
  environment: string
  states: Record<string, SolutionDeployState>
  /** Every side-effecting step, in the order it ran */
  steps: DeployStep[]
  processes: ProcessCounts
}

export interface ExecuteDeployOptions {
  platform: SolutionPlatform
  plan: DeployPlan
  config: Pick<ResolvedAlmConfig, 'variables'>
  hooks?: HookRunner
  logger?: RunLogger
  /** Source of service account variables (default: process.env) */
  env?: NodeJS.ProcessEnv
}

// ============================================================================
// Execution
// ============================================================================

export async function executeDeploy(options: ExecuteDeployOptions): Promise<DeployResult> {
  const { platform, plan, config, hooks = noHooks, logger = silentLogger, env } = options
  const environment = plan.environment

  const tracker = new DeployStateTracker(plan.entries.map(entry => entry.solution.name))
  const steps: DeployStep[] = []
  const processes: ProcessCounts = { reassigned: 0, activated: 0, unchanged: 0 }

  const imported = plan.entries.filter(entry => entry.decision.action !== 'skip')
  const holding = imported.filter(entry => entry.decision.mode === 'holding')

  /**
   * Run one platform call; failures name the step and solution and carry
   * the states reached so far.
   */
  const guard = async <T>(kind: DeployStepKind, solution: string | undefined, action: () => Promise<T>): Promise<T> => {
    try {
      return await action()
    } catch (err) {
      const error = toError(err)
      const reason = err instanceof ExternalCallError && error.cause instanceof Error
        ? error.cause.message
        : error.message
      throw new ExternalCallError(kind, reason, {
        solution,
        environment: environment.name,
        cause: error,
        context: { states: tracker.snapshot() }
      })
    }
  }

  const step: StepFn = async (kind, solution, action, detail) => {
    await guard(kind, solution, action)
    steps.push({ kind, solution, detail })
  }

  // 1. Identities first: a missing service account must stop the run before any import
  const identities = imported.length > 0
    ? await resolveServiceIdentities({
      platform,
      environment,
      config,
      keys: [...new Set(imported.map(entry => entry.solution.serviceAccountKey))],
      env
    })
    : new Map<string, PlatformUser>()

  // 2. preDeploy
  await hooks.run('preDeploy', {
    environment: environment.name,
    unmanaged: plan.unmanaged,
    solutions: plan.entries.map(entry => ({
      solution: entry.solution.name,
      action: entry.decision.action,
      mode: entry.decision.mode
    }))
  })

  // 3. Stage in dependency order
  for (const entry of plan.entries) {
    const name = entry.solution.name

    if (entry.decision.action === 'skip') {
      logger.info(`${name}: ${entry.decision.reason}, skipping`)
      tracker.advance(name, 'skipped')
      continue
    }

    logger.info(`${name}: ${entry.decision.action} ${formatSolutionVersion(entry.artifactVersion)} (${entry.decision.mode})`)
    await step('stage', name, () => platform.stage(environment, entry.artifactPath, entry.decision.mode), entry.decision.mode)
    tracker.advance(name, 'staged')
  }

  // 4. Data migration while old and new components coexist
  if (holding.length > 0) {
    logger.verbose(`Running data migration for ${holding.length} holding solution(s)`)
    await hooks.run('migrateData', {
      environment: environment.name,
      holding: holding.map(entry => entry.solution.name)
    })
    steps.push({ kind: 'migrate' })
  }

  // 5. Upgrade in reverse order (most dependent first)
  for (const name of plan.upgradeOrder) {
    logger.info(`${name}: applying upgrade`)
    await step('upgrade', name, () => platform.upgrade(environment, name))
    tracker.advance(name, 'upgraded')
  }
  for (const entry of imported) {
    if (tracker.get(entry.solution.name) === 'staged') {
      tracker.advance(entry.solution.name, 'upgraded')
    }
  }

  // 6. Processes owned and active
  for (const entry of imported) {
    const owner = identities.get(entry.solution.serviceAccountKey)
    if (!owner) {
      // resolveServiceIdentities covered every imported solution's key
      throw new ExternalCallError('activate', `no identity resolved for ${entry.solution.serviceAccountKey}`, {
        solution: entry.solution.name,
        environment: environment.name
      })
    }
    const list = await guard('activate', entry.solution.name, () => platform.listProcesses(environment, entry.solution.name))
    await activateSolutionProcesses(entry.solution.name, list, owner, { platform, plan, step, counts: processes, logger })
    tracker.advance(entry.solution.name, 'processes-activated')
  }

  // 7. Publish
  if (imported.length > 0) {
    await step('publish', undefined, () => platform.publish(environment))
    for (const entry of imported) {
      tracker.advance(entry.solution.name, 'published')
    }
  }

  // 8. postDeploy
  const states = tracker.snapshot()
  await hooks.run('postDeploy', { environment: environment.name, states })

  return {
    planId: plan.id,
    environment: environment.name,
    states,
    steps,
    processes
  }
}

type StepFn = (
  kind: DeployStepKind,
  solution: string | undefined,
  action: () => Promise<void>,
  detail?: string
) => Promise<void>

/**
 * Reassign ownership only where the owner differs and activate only what is
 * inactive; correctly owned active processes are left alone.
 */
async function activateSolutionProcesses(
  solution: string,
  list: PlatformProcess[],
  owner: PlatformUser,
  ctx: {
    platform: SolutionPlatform
    plan: DeployPlan
    step: StepFn
    counts: ProcessCounts
    logger: RunLogger
  }
): Promise<void> {
  const { platform, plan, step, counts, logger } = ctx

  for (const proc of list) {
    let touched = false

    if (proc.ownerId !== owner.id) {
      await step('reassign', solution, () => platform.assignProcessOwner(plan.environment, proc.id, owner.id), proc.name)
      counts.reassigned++
      touched = true
    }

    if (!proc.active) {
      await step('activate', solution, () => platform.activateProcess(plan.environment, proc.id), proc.name)
      counts.activated++
      touched = true
    }

    if (!touched) {
      counts.unchanged++
      logger.verbose(`${solution}: process "${proc.name}" already owned by ${owner.upn} and active`)
    }
  }
}
