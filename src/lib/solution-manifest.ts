/**
 * Version stored in an unpacked solution's Other/Solution.xml.
 *
 * Only the first <Version> element is read or replaced; the rest of the
 * document is left byte for byte as the platform wrote it.
 */

import fs from 'node:fs'
import path from 'node:path'
import type { SolutionVersion } from '../types.js'
import { formatSolutionVersion, parseSolutionVersion } from '../domain/version.js'
import { FileNotFoundError, InvalidVersionError } from './errors.js'

const VERSION_ELEMENT = /(<Version>)\s*([^<]*?)\s*(<\/Version>)/

export function getManifestPath(solutionDir: string): string {
  return path.join(solutionDir, 'Other', 'Solution.xml')
}

function readManifest(solutionDir: string): { manifestPath: string; content: string } {
  const manifestPath = getManifestPath(solutionDir)
  if (!fs.existsSync(manifestPath)) {
    throw new FileNotFoundError(manifestPath)
  }
  return { manifestPath, content: fs.readFileSync(manifestPath, 'utf-8') }
}

export function readManifestVersion(solutionDir: string): SolutionVersion {
  const { manifestPath, content } = readManifest(solutionDir)
  const match = VERSION_ELEMENT.exec(content)
  if (!match) {
    throw new InvalidVersionError('<missing>', manifestPath)
  }
  return parseSolutionVersion(match[2], manifestPath)
}

export function writeManifestVersion(solutionDir: string, version: SolutionVersion): void {
  const { manifestPath, content } = readManifest(solutionDir)
  if (!VERSION_ELEMENT.test(content)) {
    throw new InvalidVersionError('<missing>', manifestPath)
  }
  const updated = content.replace(VERSION_ELEMENT, `$1${formatSolutionVersion(version)}$3`)
  fs.writeFileSync(manifestPath, updated)
}
