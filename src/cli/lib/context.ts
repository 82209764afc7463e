/**
 * Shared command context and service factories for CLI commands
 */

import type { CLIArgs, ResolvedAlmConfig, RunLogger } from '../../types.js'
import { CommandPlatform, type SolutionPlatform } from '../../platform.js'
import { requireDependency } from '../../lib/dependencies.js'
import { createHookRunner, type HookRunner } from '../../lib/hooks.js'
import { MissingInputError } from '../../lib/errors.js'

export interface CommandContext {
  args: CLIArgs
  /** Loaded lazily: `version next` works without a config */
  loadConfig: () => ResolvedAlmConfig
  verbose: boolean
  quiet: boolean
  dryRun: boolean
  jsonOutput: boolean
  logger: RunLogger
}

/**
 * Platform bridge configured from alm-config.yaml
 */
export function createPlatform(config: ResolvedAlmConfig): SolutionPlatform {
  return new CommandPlatform({
    config: config.platform,
    moduleVersion: requireDependency(config, config.platform.module),
    cwd: config.rootDir
  })
}

export function createHooks(config: ResolvedAlmConfig, logger: RunLogger): HookRunner {
  return createHookRunner({ hooks: config.hooks, cwd: config.rootDir, logger })
}

/**
 * Positional argument at `index` of args._ (0 is the command)
 */
export function requirePositional(args: CLIArgs, index: number, name: string): string {
  const value = args._[index]
  if (value === undefined || value.trim() === '') {
    throw new MissingInputError(name)
  }
  return value
}
