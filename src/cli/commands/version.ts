/**
 * `version` Command Group
 *
 * Usage:
 *   dvalm version next 1.2.3.4              -> 1.2.3.5
 *   dvalm version next 1.2.3.4 --breaking   -> 1.3.0.0
 *   dvalm version show                      Versions in the source folders
 */

import { getSolutionSourceDir } from '../../lib/config-loader.js'
import { MissingInputError } from '../../lib/errors.js'
import { readManifestVersion } from '../../lib/solution-manifest.js'
import { nextVersion } from '../../domain/version-bumper.js'
import { formatSolutionVersion, parseSolutionVersion } from '../../domain/version.js'
import { requirePositional, type CommandContext } from '../lib/context.js'
import * as ui from '../ui.js'

export async function runVersionGroup(context: CommandContext): Promise<void> {
  const subcommand = context.args._[1]

  switch (subcommand) {
    case 'next':
      runVersionNext(context)
      break

    case 'show':
      runVersionShow(context)
      break

    default:
      ui.log('Available subcommands: next, show')
      throw new MissingInputError(subcommand ? `known version subcommand (got "${subcommand}")` : 'version subcommand')
  }
}

function runVersionNext(context: CommandContext): void {
  const current = parseSolutionVersion(requirePositional(context.args, 2, 'version'), 'argument')
  const classification = context.args.breaking === true ? 'breaking' : 'additive'
  const next = formatSolutionVersion(nextVersion(current, classification))

  if (context.jsonOutput) {
    ui.output(JSON.stringify({ current: formatSolutionVersion(current), classification, next }))
    return
  }
  ui.output(next)
}

function runVersionShow(context: CommandContext): void {
  const config = context.loadConfig()
  const rows = config.solutions.map(solution => ({
    solution: solution.name,
    version: formatSolutionVersion(readManifestVersion(getSolutionSourceDir(config, solution.name)))
  }))

  if (context.jsonOutput) {
    ui.output(JSON.stringify(rows, null, 2))
    return
  }
  ui.output(ui.formatSimpleTable(['SOLUTION', 'VERSION'], rows.map(row => [row.solution, row.version])))
}
