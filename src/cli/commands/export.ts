/**
 * `export` Command
 *
 * Usage:
 *   dvalm export --message "Add invoice fields"
 *   dvalm export -m "Nightly" --env dev2
 */

import { exportSolutions, type SolutionExportResult } from '../../domain/export.js'
import { formatSolutionVersion } from '../../domain/version.js'
import { MissingInputError } from '../../lib/errors.js'
import { createGitClient } from '../../lib/git.js'
import { c, colorEnv, symbols } from '../lib/colors.js'
import { createHooks, createPlatform, type CommandContext } from '../lib/context.js'
import * as ui from '../ui.js'

export async function runExport(context: CommandContext): Promise<void> {
  const { args, logger, dryRun, jsonOutput } = context
  const config = context.loadConfig()

  const message = args.message?.trim()
  if (!message) {
    throw new MissingInputError('--message')
  }
  const environment = args.env ?? config.devEnvironment

  if (dryRun) {
    ui.log(`${symbols.arrow} Would export from ${colorEnv(environment)}:`)
    for (const solution of config.solutions) {
      ui.log(`  ${symbols.bullet} ${c.solution(solution.name)}`)
    }
    return
  }

  const summary = await exportSolutions({
    platform: createPlatform(config),
    git: createGitClient(config.rootDir),
    config,
    environment,
    commitMessage: message,
    hooks: createHooks(config, logger),
    logger
  })

  if (jsonOutput) {
    ui.output(JSON.stringify({
      environment: summary.environment,
      committed: summary.committed,
      pushed: summary.pushed,
      results: summary.results.map(toJsonResult)
    }, null, 2))
    return
  }

  for (const result of summary.results) {
    ui.output(formatExportResult(result))
  }
  if (summary.committed) {
    ui.success(`Committed${summary.pushed ? ' and pushed' : ''}: ${message}`)
  }
}

export function formatExportResult(result: SolutionExportResult): string {
  switch (result.status) {
    case 'bumped':
      return `${result.solution}\t${result.classification}\t${formatSolutionVersion(result.previousVersion)} -> ${formatSolutionVersion(result.version)}`
    case 'unchanged':
      return `${result.solution}\tunchanged`
    case 'failed':
      return `${result.solution}\tfailed\t${result.error.message}`
  }
}

function toJsonResult(result: SolutionExportResult): Record<string, unknown> {
  switch (result.status) {
    case 'bumped':
      return {
        solution: result.solution,
        status: result.status,
        classification: result.classification,
        previousVersion: formatSolutionVersion(result.previousVersion),
        version: formatSolutionVersion(result.version),
        changedFiles: result.changedFiles
      }
    case 'unchanged':
      return { solution: result.solution, status: result.status }
    case 'failed':
      return { solution: result.solution, status: result.status, error: result.error.message }
  }
}
