/**
 * `release` Command Group
 *
 * Usage:
 *   dvalm release prepare v1.2.3 ./release
 *   dvalm release prepare v1.2.3 ./release https://example.com/org/alm.git
 */

import path from 'node:path'
import { MissingInputError } from '../../lib/errors.js'
import { prepareRelease, releaseDependencyVersion } from '../../lib/release-prep.js'
import { c } from '../lib/colors.js'
import { requirePositional, type CommandContext } from '../lib/context.js'
import * as ui from '../ui.js'

export async function runReleaseGroup(context: CommandContext): Promise<void> {
  const subcommand = context.args._[1]

  if (subcommand !== 'prepare') {
    ui.log('Available subcommands: prepare')
    throw new MissingInputError(subcommand ? `known release subcommand (got "${subcommand}")` : 'release subcommand')
  }

  runReleasePrepare(context)
}

function runReleasePrepare(context: CommandContext): void {
  const { args, logger, jsonOutput } = context
  const config = context.loadConfig()

  const tag = requirePositional(args, 2, 'tag')
  const outputDir = path.resolve(requirePositional(args, 3, 'output-dir'))
  const upstreamRepo = args._[4] ?? config.release.upstreamRepo

  logger.verbose(`Template: ${config.release.template}`)

  const prepared = prepareRelease({
    templatePath: config.release.template,
    outputDir,
    tag,
    upstreamRepo,
    dependencyVersion: releaseDependencyVersion(config)
  })

  if (jsonOutput) {
    ui.output(JSON.stringify(prepared, null, 2))
    return
  }

  ui.log(`${c.label('Tag:')}            ${prepared.tag}`)
  ui.log(`${c.label('Module version:')} ${prepared.dependencyVersion}`)
  ui.log(`${c.label('Upstream:')}       ${prepared.upstreamRepo}`)
  ui.output(prepared.outputPath)
  ui.success('All placeholders replaced')
}
