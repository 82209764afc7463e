/**
 * Hook runner.
 *
 * Scripts listed per phase in alm-config.yaml run in order, each as a child
 * process. The phase name and its typed context are handed over through the
 * environment:
 *
 *   ALM_HOOK_PHASE=migrateData
 *   ALM_HOOK_CONTEXT={"environment":"test","holding":["Core","Sales"]}
 */

import { execSync } from 'node:child_process'
import type { Environment, HookPhase, HookRegistry, RunLogger } from '../types.js'
import { silentLogger } from '../types.js'
import { HookFailedError, toError } from './errors.js'

export interface ExportHookResult {
  solution: string
  status: 'bumped' | 'unchanged' | 'failed'
  version?: string
}

export interface BuiltArtifact {
  solution: string
  version: string
  managed: string
  unmanaged: string
}

/** Context record passed to each phase */
export interface HookContextMap {
  preExport: { environment: Environment; solutions: string[] }
  postExport: { environment: Environment; results: ExportHookResult[] }
  preBuild: { artifactsDir: string; solutions: string[] }
  postBuild: { artifactsDir: string; artifacts: BuiltArtifact[] }
  preDeploy: {
    environment: Environment
    unmanaged: boolean
    solutions: Array<{ solution: string; action: string; mode: string }>
  }
  migrateData: { environment: Environment; holding: string[] }
  postDeploy: { environment: Environment; states: Record<string, string> }
}

/**
 * Runs one script. Must throw when the script fails.
 */
export type HookExecutor = (
  script: string,
  options: { cwd: string; env: NodeJS.ProcessEnv }
) => Promise<void>

export const execHookScript: HookExecutor = async (script, options) => {
  execSync(script, {
    cwd: options.cwd,
    stdio: 'inherit',
    env: options.env
  })
}

export interface HookRunner {
  run<P extends HookPhase>(phase: P, context: HookContextMap[P]): Promise<void>
}

export interface HookRunnerOptions {
  hooks: Readonly<HookRegistry>
  /** Working directory for scripts (the config root) */
  cwd: string
  executor?: HookExecutor
  logger?: RunLogger
}

export function createHookRunner(options: HookRunnerOptions): HookRunner {
  const { hooks, cwd, executor = execHookScript, logger = silentLogger } = options

  return {
    async run(phase, context) {
      const scripts = hooks[phase]
      if (scripts.length === 0) {
        return
      }

      const env: NodeJS.ProcessEnv = {
        ...process.env,
        ALM_HOOK_PHASE: phase,
        ALM_HOOK_CONTEXT: JSON.stringify(context)
      }

      for (const script of scripts) {
        logger.verbose(`Running ${phase} hook: ${script}`)
        try {
          await executor(script, { cwd, env })
        } catch (err) {
          throw new HookFailedError(phase, script, toError(err))
        }
      }
    }
  }
}

/** Runner with no scripts, for callers that do not use hooks */
export const noHooks: HookRunner = {
  async run() {}
}
