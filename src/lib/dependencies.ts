/**
 * Dependency specifiers declared under `dependencies` in alm-config.yaml.
 */

import type { DependencySpec, ResolvedAlmConfig } from '../types.js'
import { MissingDependencyError } from './errors.js'

const PRERELEASE = 'prerelease'

export function parseDependencySpec(value: string): DependencySpec {
  const trimmed = value.trim()
  if (trimmed === '') {
    return { kind: 'latest' }
  }
  if (trimmed.toLowerCase() === PRERELEASE) {
    return { kind: 'prerelease' }
  }
  return { kind: 'exact', version: trimmed }
}

export function formatDependencySpec(spec: DependencySpec): string {
  switch (spec.kind) {
    case 'latest':
      return 'latest'
    case 'prerelease':
      return PRERELEASE
    case 'exact':
      return spec.version
  }
}

/**
 * Resolve a declared dependency. Undeclared names are a configuration error.
 */
export function requireDependency(
  config: Pick<ResolvedAlmConfig, 'dependencies'>,
  name: string
): DependencySpec {
  if (!Object.prototype.hasOwnProperty.call(config.dependencies, name)) {
    throw new MissingDependencyError(name)
  }
  return parseDependencySpec(config.dependencies[name])
}
