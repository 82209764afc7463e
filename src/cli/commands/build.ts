/**
 * `build` Command
 *
 * Packs every solution folder into managed and unmanaged zips under the
 * artifacts directory and writes manifest.json next to them.
 */

import path from 'node:path'
import { buildSolutions } from '../../domain/build.js'
import { c, symbols } from '../lib/colors.js'
import { createHooks, createPlatform, type CommandContext } from '../lib/context.js'
import * as ui from '../ui.js'

export async function runBuild(context: CommandContext): Promise<void> {
  const { logger, dryRun, jsonOutput } = context
  const config = context.loadConfig()

  if (dryRun) {
    ui.log(`${symbols.arrow} Would build into ${config.artifactsDir}:`)
    for (const solution of config.solutions) {
      ui.log(`  ${symbols.bullet} ${c.solution(solution.name)}`)
    }
    return
  }

  const manifest = await buildSolutions({
    platform: createPlatform(config),
    config,
    hooks: createHooks(config, logger),
    logger
  })

  if (jsonOutput) {
    ui.output(JSON.stringify(manifest, null, 2))
    return
  }

  ui.output(ui.formatSimpleTable(
    ['SOLUTION', 'VERSION', 'MANAGED', 'UNMANAGED'],
    manifest.solutions.map(entry => [
      entry.name,
      entry.version,
      path.join(config.artifactsDir, entry.managed),
      path.join(config.artifactsDir, entry.unmanaged)
    ])
  ))
  ui.success(`Built ${manifest.solutions.length} solution(s)`)
}
