/**
 * dvalm CLI - Config Command
 *
 * Show and validate the merged configuration
 */

import { findConfigFile } from '../../lib/config-loader.js'
import { ConfigNotFoundError, MissingInputError } from '../../lib/errors.js'
import { formatDependencySpec, parseDependencySpec } from '../../lib/dependencies.js'
import type { ResolvedAlmConfig } from '../../types.js'
import { HOOK_PHASES } from '../../types.js'
import { c, colorEnv, print, symbols } from '../lib/colors.js'
import type { CommandContext } from '../lib/context.js'
import * as ui from '../ui.js'

export async function runConfig(context: CommandContext): Promise<void> {
  const subcommand = context.args._[1]

  switch (subcommand) {
    case 'show':
    case undefined:
      runConfigShow(context)
      break

    case 'path':
      runConfigPath()
      break

    case 'validate':
      runConfigValidate(context)
      break

    default:
      ui.log('Available subcommands: show, path, validate')
      throw new MissingInputError(`known config subcommand (got "${subcommand}")`)
  }
}

function runConfigShow(context: CommandContext): void {
  const config = context.loadConfig()

  if (context.jsonOutput) {
    ui.output(JSON.stringify(config, null, 2))
    return
  }

  ui.output(formatConfigSummary(config))
}

function runConfigPath(): void {
  const configPath = findConfigFile()
  if (!configPath) {
    throw new ConfigNotFoundError(process.cwd())
  }
  ui.output(configPath)
}

function runConfigValidate(context: CommandContext): void {
  const config = context.loadConfig()

  if (context.jsonOutput) {
    ui.output(JSON.stringify({ valid: true, solutions: config.solutions.length }))
    return
  }
  print.success(`Configuration is valid (${config.solutions.length} solution(s))`)
}

export function formatConfigSummary(config: ResolvedAlmConfig): string {
  const lines: string[] = []

  lines.push(c.header('Configuration'))
  lines.push(`  ${c.label('Root:')}        ${config.rootDir}`)
  lines.push(`  ${c.label('Source:')}      ${config.sourceDir}`)
  lines.push(`  ${c.label('Artifacts:')}   ${config.artifactsDir}`)
  lines.push(`  ${c.label('Dev env:')}     ${colorEnv(config.devEnvironment)}`)
  lines.push('')

  lines.push(c.header('Solutions (deploy order)'))
  config.solutions.forEach((solution, index) => {
    const flags = solution.deployUnmanaged ? c.muted(' [unmanaged]') : ''
    lines.push(`  ${index + 1}. ${c.solution(solution.name)}${flags} ${c.muted(`owner: ${solution.serviceAccountKey}`)}`)
  })
  lines.push('')

  lines.push(c.header('Environments'))
  for (const [name, env] of Object.entries(config.environments)) {
    lines.push(`  ${symbols.bullet} ${colorEnv(name)} ${c.muted(env.url)}`)
  }
  lines.push('')

  lines.push(c.header('Dependencies'))
  for (const [name, value] of Object.entries(config.dependencies)) {
    lines.push(`  ${symbols.bullet} ${name} ${c.version(formatDependencySpec(parseDependencySpec(value)))}`)
  }

  const hookLines = HOOK_PHASES
    .filter(phase => config.hooks[phase].length > 0)
    .map(phase => `  ${phase}: ${config.hooks[phase].join(', ')}`)
  if (hookLines.length > 0) {
    lines.push('')
    lines.push(c.header('Hooks'))
    lines.push(...hookLines)
  }

  return lines.join('\n')
}
