#!/usr/bin/env node
/**
 * dvalm CLI
 *
 * Application lifecycle automation for Dataverse solutions:
 * export → build → deploy
 */

import { createCLI, type CommandParseResult, type CLISchema } from 'cli-args-parser'
import fs from 'node:fs'
import path from 'node:path'
import { fileURLToPath } from 'node:url'
import type { CLIArgs, ResolvedAlmConfig } from '../types.js'
import { loadConfig } from '../lib/config-loader.js'
import { formatErrorForCli, isAlmError } from '../lib/errors.js'
import { c, almFormatter, print } from './lib/colors.js'
import type { CommandContext } from './lib/context.js'
import * as ui from './ui.js'

import { runBuild } from './commands/build.js'
import { runConfig } from './commands/config.js'
import { runDeploy, runImport } from './commands/deploy.js'
import { runExport } from './commands/export.js'
import { runPlan } from './commands/plan.js'
import { runReleaseGroup } from './commands/release.js'
import { runVersionGroup } from './commands/version.js'

const VERSION = process.env.DVALM_VERSION || getPackageVersion() || '0.0.0'

function getPackageVersion(): string | undefined {
  // Walk up from dist/cli or src/cli to the package root
  let dir = path.dirname(fileURLToPath(import.meta.url))
  for (let i = 0; i < 5; i++) {
    const pkgPath = path.join(dir, 'package.json')
    if (fs.existsSync(pkgPath)) {
      const pkg: unknown = JSON.parse(fs.readFileSync(pkgPath, 'utf-8'))
      if (pkg !== null && typeof pkg === 'object' && 'version' in pkg && typeof pkg.version === 'string') {
        return pkg.version
      }
      return undefined
    }
    dir = path.dirname(dir)
  }
  return undefined
}

/**
 * CLI Schema definition
 */
const cliSchema: CLISchema = {
  name: 'dvalm',
  version: VERSION,
  description: 'Export, build and deploy Dataverse solutions',
  autoShort: false,
  strict: true,
  formatter: almFormatter,
  help: {
    includeGlobalOptionsInCommands: true
  },

  // Global options available to all commands
  options: {
    help: {
      short: 'h',
      type: 'boolean',
      default: false,
      description: 'Show help'
    },
    version: {
      type: 'boolean',
      default: false,
      description: 'Show version'
    },
    verbose: {
      short: 'v',
      type: 'boolean',
      default: false,
      description: 'Enable verbose output'
    },
    quiet: {
      short: 'q',
      type: 'boolean',
      default: false,
      description: 'Suppress progress output (warnings and errors still shown)'
    },
    json: {
      type: 'boolean',
      default: false,
      description: 'Output in JSON format'
    },
    'dry-run': {
      type: 'boolean',
      default: false,
      description: 'Show what would be done without making changes'
    },
    path: {
      type: 'string',
      description: 'Root path for alm-config.yaml discovery'
    }
  },

  commands: {
    export: {
      description: 'Export solutions from the development environment, bump versions and commit',
      options: {
        message: {
          short: 'm',
          type: 'string',
          description: 'Commit message (required)'
        },
        env: {
          short: 'e',
          type: 'string',
          description: 'Source environment (default: dev_environment)'
        }
      }
    },

    build: {
      description: 'Pack solution folders into managed and unmanaged artifacts'
    },

    plan: {
      description: 'Show the import decision for every solution',
      positional: [
        { name: 'environment', required: true, description: 'Target environment' }
      ],
      options: {
        unmanaged: {
          type: 'boolean',
          default: false,
          description: 'Plan an unmanaged import'
        }
      }
    },

    deploy: {
      description: 'Deploy built artifacts to an environment',
      positional: [
        { name: 'environment', required: true, description: 'Target environment' }
      ],
      options: {
        unmanaged: {
          type: 'boolean',
          default: false,
          description: 'Import every solution unmanaged'
        }
      }
    },

    import: {
      description: 'Build and deploy unmanaged (development environments)',
      positional: [
        { name: 'environment', required: true, description: 'Target environment' }
      ]
    },

    version: {
      description: 'Solution version helpers',
      commands: {
        next: {
          description: 'Print the version that follows a change',
          positional: [
            { name: 'version', required: true, description: 'Current version (Major.Minor.Build.Revision)' }
          ],
          options: {
            breaking: {
              type: 'boolean',
              default: false,
              description: 'Treat the change as breaking'
            }
          }
        },
        show: {
          description: 'Show versions recorded in the source folders'
        }
      }
    },

    release: {
      description: 'Release tooling',
      commands: {
        prepare: {
          description: 'Stamp the setup script template for a release',
          positional: [
            { name: 'tag', required: true, description: 'Release tag (e.g. v1.2.3)' },
            { name: 'output-dir', required: true, description: 'Directory for the processed script' },
            { name: 'upstream-repo', required: false, description: 'Upstream repository URL (default: release.upstream_repo)' }
          ]
        }
      }
    },

    config: {
      description: 'Show or validate configuration',
      commands: {
        show: { description: 'Show config summary (default)' },
        path: { description: 'Print the config file path' },
        validate: { description: 'Validate the merged configuration' }
      }
    },

    completion: {
      description: 'Generate shell completion script',
      positional: [
        { name: 'shell', required: true, description: 'bash, zsh or fish' }
      ]
    }
  }
}

const asString = (value: unknown): string | undefined => typeof value === 'string' ? value : undefined
const asBoolean = (value: unknown): boolean | undefined => typeof value === 'boolean' ? value : undefined

/**
 * Convert cli-args-parser result to CLIArgs format
 */
function toCliArgs(result: CommandParseResult): CLIArgs {
  const opts = result.options as Record<string, unknown>
  const pos = result.positional as Record<string, unknown>

  // Build the _ array: command + positional args + rest
  const args: string[] = [...result.command]
  for (const value of Object.values(pos)) {
    const str = asString(value)
    if (str !== undefined) {
      args.push(str)
    }
  }
  const rest: unknown = result.rest
  if (Array.isArray(rest)) {
    for (const value of rest) {
      const str = asString(value)
      if (str !== undefined) args.push(str)
    }
  }

  return {
    _: args,
    verbose: asBoolean(opts.verbose),
    quiet: asBoolean(opts.quiet),
    json: asBoolean(opts.json),
    'dry-run': asBoolean(opts['dry-run']),
    path: asString(opts.path),
    env: asString(opts.env),
    message: asString(opts.message),
    unmanaged: asBoolean(opts.unmanaged),
    breaking: asBoolean(opts.breaking)
  }
}

function buildContext(args: CLIArgs): CommandContext {
  const verbose = args.verbose === true
  const quiet = args.quiet === true

  let config: ResolvedAlmConfig | undefined
  return {
    args,
    loadConfig: () => {
      config ??= loadConfig()
      return config
    },
    verbose,
    quiet,
    dryRun: args['dry-run'] === true,
    jsonOutput: args.json === true,
    logger: ui.createRunLogger({ verbose, quiet })
  }
}

// Create CLI instance
const cli = createCLI(cliSchema)

/**
 * Main entry point
 */
async function main(): Promise<void> {
  const result = cli.parse(process.argv.slice(2))
  const args = toCliArgs(result)
  const opts = result.options as Record<string, unknown>

  // Apply working directory override before resolving config
  if (args.path) {
    const targetDir = path.resolve(args.path)
    if (!fs.existsSync(targetDir) || !fs.statSync(targetDir).isDirectory()) {
      print.error(`Path does not exist or is not a directory: ${targetDir}`)
      process.exit(1)
    }
    process.chdir(targetDir)
  }

  // Handle help first (before error check, so `deploy --help` works)
  if (opts.help || result.command.length === 0) {
    ui.output(cli.help(result.command))
    return
  }

  if (opts.version) {
    ui.output(`dvalm v${VERSION}`)
    return
  }

  if (result.errors.length > 0) {
    for (const error of result.errors) {
      print.error(error)
    }
    process.exit(1)
  }

  const command = result.command[0]
  const context = buildContext(args)

  try {
    switch (command) {
      case 'export':
        await runExport(context)
        break

      case 'build':
        await runBuild(context)
        break

      case 'plan':
        await runPlan(context)
        break

      case 'deploy':
        await runDeploy(context)
        break

      case 'import':
        await runImport(context)
        break

      case 'version':
        await runVersionGroup(context)
        break

      case 'release':
        await runReleaseGroup(context)
        break

      case 'config':
        await runConfig(context)
        break

      case 'completion': {
        const shell = args._[1]
        if (shell !== 'bash' && shell !== 'zsh' && shell !== 'fish') {
          print.error('Shell type required: bash, zsh, or fish')
          console.error(`  ${c.command('eval "$(dvalm completion bash)"')}`)
          process.exit(1)
        }
        ui.output(cli.completion(shell))
        break
      }

      default:
        print.error(`Unknown command: ${c.command(command)}`)
        ui.log(`Run "${c.command('dvalm --help')}" for usage information`)
        process.exit(1)
    }
  } catch (err) {
    if (isAlmError(err)) {
      print.error(err.message)
      if (err.suggestion) {
        ui.log(`  ${c.muted('Suggestion:')} ${err.suggestion}`)
      }
      if (context.verbose && err.context) {
        ui.log(`  ${c.muted('Context:')} ${JSON.stringify(err.context)}`)
      }
    } else if (err instanceof Error) {
      print.error(context.verbose && err.stack ? err.stack : err.message)
    } else {
      print.error(String(err))
    }
    process.exit(1)
  }
}

main().catch((err: unknown) => {
  print.error(isAlmError(err) ? formatErrorForCli(err) : `Fatal error: ${String(err)}`)
  process.exit(1)
})
