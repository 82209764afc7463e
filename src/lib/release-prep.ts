/**
 * Release preparation: stamp the setup script template with the release tag,
 * the pinned platform module version and the upstream repository.
 */

import fs from 'node:fs'
import path from 'node:path'
import type { ResolvedAlmConfig } from '../types.js'
import { requireDependency } from './dependencies.js'
import { FileNotFoundError, InvalidConfigError, MissingInputError, PlaceholderError } from './errors.js'

export const RELEASE_PLACEHOLDERS = {
  ref: '__ALM_REF__',
  moduleVersion: '__PLATFORM_MODULE_VERSION__',
  upstreamRepo: '__UPSTREAM_REPO__'
} as const

const PLACEHOLDER_PATTERN = new RegExp(Object.values(RELEASE_PLACEHOLDERS).join('|'), 'g')

export interface PrepareReleaseOptions {
  templatePath: string
  outputDir: string
  tag: string
  upstreamRepo: string
  dependencyVersion: string
}

export interface PreparedRelease {
  outputPath: string
  tag: string
  upstreamRepo: string
  dependencyVersion: string
}

/**
 * Version of the platform module a release pins. Floating specifiers
 * (latest, prerelease) cannot be released.
 */
export function releaseDependencyVersion(config: Pick<ResolvedAlmConfig, 'dependencies' | 'platform'>): string {
  const spec = requireDependency(config, config.platform.module)
  if (spec.kind !== 'exact') {
    throw new InvalidConfigError(
      `dependencies.${config.platform.module} must pin an exact version for a release (found ${spec.kind})`
    )
  }
  return spec.version
}

/**
 * Substitute every placeholder in one pass. Values are inserted literally,
 * so a value that itself contains a placeholder is reported as remaining.
 */
export function renderReleaseTemplate(
  template: string,
  values: { tag: string; upstreamRepo: string; dependencyVersion: string }
): string {
  const replacements: Record<string, string> = {
    [RELEASE_PLACEHOLDERS.ref]: values.tag,
    [RELEASE_PLACEHOLDERS.moduleVersion]: values.dependencyVersion,
    [RELEASE_PLACEHOLDERS.upstreamRepo]: values.upstreamRepo
  }
  return template.replace(PLACEHOLDER_PATTERN, match => replacements[match] ?? match)
}

export function findRemainingPlaceholders(content: string): Array<{ line: number; text: string }> {
  const remaining: Array<{ line: number; text: string }> = []
  content.split('\n').forEach((text, index) => {
    PLACEHOLDER_PATTERN.lastIndex = 0
    if (PLACEHOLDER_PATTERN.test(text)) {
      remaining.push({ line: index + 1, text })
    }
  })
  PLACEHOLDER_PATTERN.lastIndex = 0
  return remaining
}

export function prepareRelease(options: PrepareReleaseOptions): PreparedRelease {
  const tag = options.tag.trim()
  const upstreamRepo = options.upstreamRepo.trim()
  const dependencyVersion = options.dependencyVersion.trim()

  if (!tag) {
    throw new MissingInputError('release tag')
  }
  if (!upstreamRepo) {
    throw new MissingInputError('upstream repository')
  }
  if (!dependencyVersion) {
    throw new MissingInputError('platform module version')
  }
  if (!fs.existsSync(options.templatePath)) {
    throw new FileNotFoundError(options.templatePath)
  }

  const template = fs.readFileSync(options.templatePath, 'utf-8')
  const rendered = renderReleaseTemplate(template, { tag, upstreamRepo, dependencyVersion })

  fs.mkdirSync(options.outputDir, { recursive: true })
  const outputPath = path.join(options.outputDir, path.basename(options.templatePath))
  fs.writeFileSync(outputPath, rendered)

  const remaining = findRemainingPlaceholders(rendered)
  if (remaining.length > 0) {
    throw new PlaceholderError(outputPath, remaining)
  }

  return { outputPath, tag, upstreamRepo, dependencyVersion }
}
