/**
 * Service identity resolution.
 *
 * Each solution names a variable (service_account_key) holding the UPN of
 * the identity that must own its processes. The variable is read from the
 * process environment first, then from `variables` in alm-config.yaml.
 */

import type { ResolvedAlmConfig } from '../types.js'
import type { EnvironmentTarget, PlatformUser, SolutionPlatform } from '../platform.js'
import { IdentityResolutionError } from '../lib/errors.js'

export function lookupVariable(
  config: Pick<ResolvedAlmConfig, 'variables'>,
  key: string,
  env: NodeJS.ProcessEnv = process.env
): string | undefined {
  const value = env[key] ?? config.variables[key]
  const trimmed = value?.trim()
  return trimmed ? trimmed : undefined
}

/**
 * Resolve each distinct key to exactly one user in the environment.
 * Unset, unknown and ambiguous identities all throw.
 */
export async function resolveServiceIdentities(options: {
  platform: SolutionPlatform
  environment: EnvironmentTarget
  config: Pick<ResolvedAlmConfig, 'variables'>
  keys: readonly string[]
  env?: NodeJS.ProcessEnv
}): Promise<Map<string, PlatformUser>> {
  const { platform, environment, config, keys, env = process.env } = options
  const resolved = new Map<string, PlatformUser>()

  for (const key of keys) {
    if (resolved.has(key)) continue

    const upn = lookupVariable(config, key, env)
    if (!upn) {
      throw new IdentityResolutionError(key, 'unset')
    }

    const users = await platform.findUsers(environment, upn)
    if (users.length === 0) {
      throw new IdentityResolutionError(key, 'not-found', upn)
    }
    if (users.length > 1) {
      throw new IdentityResolutionError(key, 'ambiguous', upn, users.length)
    }

    resolved.set(key, users[0])
  }

  return resolved
}
