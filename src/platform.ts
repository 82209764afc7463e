/**
 * Solution Platform
 *
 * Everything that touches Dataverse goes through SolutionPlatform. The
 * shipped implementation, CommandPlatform, drives a bridge executable:
 *
 *   <command> [...args] <operation> '<json payload>'
 *
 * and expects a single JSON reply on stdout:
 *
 *   { "ok": true, "result": ... }   or   { "ok": false, "error": "..." }
 */

import { spawn } from 'node:child_process'
import type {
  DependencySpec,
  DeployedSolutionState,
  PackageType,
  PlatformConfig,
  SolutionSnapshot,
  SolutionVersion
} from './types.js'
import type { ImportMode } from './domain/import-strategy.js'
import { formatSolutionVersion, parseSolutionVersion } from './domain/version.js'
import { formatDependencySpec } from './lib/dependencies.js'
import { ExternalCallError, toError } from './lib/errors.js'
import { withTimeout } from './lib/timeout.js'

// ============================================================================
// Types
// ============================================================================

export interface EnvironmentTarget {
  name: string
  url: string
}

export interface PlatformUser {
  id: string
  upn: string
}

/** Workflow / cloud flow / business process owned by a solution */
export interface PlatformProcess {
  id: string
  name: string
  ownerId: string
  active: boolean
}

export interface PackOptions {
  solutionName: string
  sourceDir: string
  packageType: PackageType
  outputPath: string
}

export interface SolutionPlatform {
  /** Export the unmanaged solution from an environment into outputDir */
  exportSolution(environment: EnvironmentTarget, solutionName: string, outputDir: string): Promise<SolutionSnapshot>
  /** Pack an unpacked source folder into a solution zip */
  pack(options: PackOptions): Promise<SolutionSnapshot>
  /** Unpack a solution zip into a source folder, replacing its contents */
  unpack(snapshot: SolutionSnapshot, targetDir: string): Promise<void>
  /** True when `newer` contains every component of `older` with a compatible definition */
  compareComponents(older: SolutionSnapshot, newer: SolutionSnapshot): Promise<boolean>
  /** Import an artifact; with mode 'holding' the old components stay until upgrade() */
  stage(environment: EnvironmentTarget, artifactPath: string, mode: ImportMode): Promise<void>
  /** Apply a staged holding solution, deleting superseded components */
  upgrade(environment: EnvironmentTarget, solutionName: string): Promise<void>
  /** Publish all customizations */
  publish(environment: EnvironmentTarget): Promise<void>
  getInstalledSolution(environment: EnvironmentTarget, solutionName: string): Promise<DeployedSolutionState | undefined>
  setVersion(environment: EnvironmentTarget, solutionName: string, version: SolutionVersion): Promise<void>
  findUsers(environment: EnvironmentTarget, upn: string): Promise<PlatformUser[]>
  listProcesses(environment: EnvironmentTarget, solutionName: string): Promise<PlatformProcess[]>
  assignProcessOwner(environment: EnvironmentTarget, processId: string, userId: string): Promise<void>
  activateProcess(environment: EnvironmentTarget, processId: string): Promise<void>
}

// ============================================================================
// Command runner
// ============================================================================

export interface CommandResult {
  code: number
  stdout: string
  stderr: string
}

export type CommandRunner = (
  command: string,
  args: string[],
  options: { env: NodeJS.ProcessEnv; cwd?: string; signal?: AbortSignal }
) => Promise<CommandResult>

/**
 * Run a command without a shell and collect its output.
 * Aborting `signal` kills the child.
 */
export const spawnCommand: CommandRunner = (command, args, options) => {
  return new Promise((resolve, reject) => {
    const child = spawn(command, args, {
      cwd: options.cwd,
      env: options.env,
      signal: options.signal,
      stdio: ['ignore', 'pipe', 'pipe']
    })

    let stdout = ''
    let stderr = ''
    child.stdout.on('data', (chunk: Buffer) => { stdout += chunk.toString('utf-8') })
    child.stderr.on('data', (chunk: Buffer) => { stderr += chunk.toString('utf-8') })

    child.on('error', reject)
    child.on('close', code => {
      resolve({ code: code ?? 1, stdout, stderr })
    })
  })
}

// ============================================================================
// Reply parsing
// ============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value)
}

function expectString(value: unknown, field: string): string {
  if (typeof value !== 'string') {
    throw new Error(`reply field "${field}" must be a string`)
  }
  return value
}

function expectBoolean(value: unknown, field: string): boolean {
  if (typeof value !== 'boolean') {
    throw new Error(`reply field "${field}" must be a boolean`)
  }
  return value
}

function expectList(value: unknown, field: string): Record<string, unknown>[] {
  if (!Array.isArray(value) || !value.every(isRecord)) {
    throw new Error(`reply field "${field}" must be a list of objects`)
  }
  return value
}

/**
 * Extract `result` from a bridge reply. The last non-empty stdout line is the reply;
 * anything before it is progress output.
 */
export function parseBridgeReply(stdout: string): unknown {
  const lines = stdout.split(/\r?\n/).map(line => line.trim()).filter(Boolean)
  const last = lines[lines.length - 1]
  if (!last) {
    throw new Error('bridge produced no reply')
  }

  let reply: unknown
  try {
    reply = JSON.parse(last)
  } catch {
    throw new Error(`bridge reply is not JSON: ${last.slice(0, 200)}`)
  }

  if (!isRecord(reply) || typeof reply.ok !== 'boolean') {
    throw new Error('bridge reply must be an object with an "ok" field')
  }
  if (!reply.ok) {
    throw new Error(typeof reply.error === 'string' ? reply.error : 'bridge reported failure')
  }
  return reply.result
}

// ============================================================================
// CommandPlatform
// ============================================================================

export interface CommandPlatformOptions {
  config: PlatformConfig
  /** Resolved specifier of config.module, handed to the bridge */
  moduleVersion: DependencySpec
  runner?: CommandRunner
  cwd?: string
}

interface CallTarget {
  solution?: string
  environment?: string
}

export class CommandPlatform implements SolutionPlatform {
  private readonly config: PlatformConfig
  private readonly moduleVersion: DependencySpec
  private readonly runner: CommandRunner
  private readonly cwd?: string

  constructor(options: CommandPlatformOptions) {
    this.config = options.config
    this.moduleVersion = options.moduleVersion
    this.runner = options.runner ?? spawnCommand
    this.cwd = options.cwd
  }

  /**
   * Run one bridge operation and return its parsed result.
   * `parse` failures count as failures of the operation.
   */
  private async call<T>(
    operation: string,
    payload: Record<string, unknown>,
    target: CallTarget,
    parse: (result: unknown) => T
  ): Promise<T> {
    const args = [...this.config.args, operation, JSON.stringify(payload)]
    const env: NodeJS.ProcessEnv = {
      ...process.env,
      ALM_PLATFORM_MODULE: this.config.module,
      ALM_PLATFORM_MODULE_VERSION: formatDependencySpec(this.moduleVersion)
    }

    const controller = new AbortController()
    try {
      const result = await withTimeout(
        this.runner(this.config.command, args, { env, cwd: this.cwd, signal: controller.signal }),
        this.config.timeoutMs,
        operation,
        () => controller.abort()
      )

      if (result.code !== 0) {
        const detail = result.stderr.trim() || result.stdout.trim() || `exit code ${result.code}`
        throw new Error(detail)
      }

      return parse(parseBridgeReply(result.stdout))
    } catch (err) {
      const error = toError(err)
      throw new ExternalCallError(operation, error.message, {
        solution: target.solution,
        environment: target.environment,
        cause: error
      })
    }
  }

  async exportSolution(environment: EnvironmentTarget, solutionName: string, outputDir: string): Promise<SolutionSnapshot> {
    return this.call(
      'export',
      { url: environment.url, solution: solutionName, outputDir },
      { solution: solutionName, environment: environment.name },
      result => {
        const reply = isRecord(result) ? result : {}
        return { solutionName, path: expectString(reply.path, 'path') }
      }
    )
  }

  async pack(options: PackOptions): Promise<SolutionSnapshot> {
    return this.call(
      'pack',
      {
        solution: options.solutionName,
        sourceDir: options.sourceDir,
        packageType: options.packageType,
        outputPath: options.outputPath
      },
      { solution: options.solutionName },
      () => ({ solutionName: options.solutionName, path: options.outputPath })
    )
  }

  async unpack(snapshot: SolutionSnapshot, targetDir: string): Promise<void> {
    await this.call(
      'unpack',
      { path: snapshot.path, targetDir },
      { solution: snapshot.solutionName },
      () => undefined
    )
  }

  async compareComponents(older: SolutionSnapshot, newer: SolutionSnapshot): Promise<boolean> {
    return this.call(
      'compare',
      { older: older.path, newer: newer.path },
      { solution: newer.solutionName },
      result => expectBoolean(isRecord(result) ? result.isAdditive : undefined, 'isAdditive')
    )
  }

  async stage(environment: EnvironmentTarget, artifactPath: string, mode: ImportMode): Promise<void> {
    await this.call(
      'stage',
      { url: environment.url, path: artifactPath, mode },
      { environment: environment.name },
      () => undefined
    )
  }

  async upgrade(environment: EnvironmentTarget, solutionName: string): Promise<void> {
    await this.call(
      'upgrade',
      { url: environment.url, solution: solutionName },
      { solution: solutionName, environment: environment.name },
      () => undefined
    )
  }

  async publish(environment: EnvironmentTarget): Promise<void> {
    await this.call(
      'publish',
      { url: environment.url },
      { environment: environment.name },
      () => undefined
    )
  }

  async getInstalledSolution(environment: EnvironmentTarget, solutionName: string): Promise<DeployedSolutionState | undefined> {
    return this.call(
      'get-solution',
      { url: environment.url, solution: solutionName },
      { solution: solutionName, environment: environment.name },
      result => {
        if (result === null || result === undefined) {
          return undefined
        }
        if (!isRecord(result)) {
          throw new Error('reply must be an object or null')
        }
        return {
          uniqueName: expectString(result.uniqueName, 'uniqueName'),
          installedVersion: parseSolutionVersion(expectString(result.version, 'version'), `${environment.name}/${solutionName}`),
          isManaged: expectBoolean(result.isManaged, 'isManaged')
        }
      }
    )
  }

  async setVersion(environment: EnvironmentTarget, solutionName: string, version: SolutionVersion): Promise<void> {
    await this.call(
      'set-version',
      { url: environment.url, solution: solutionName, version: formatSolutionVersion(version) },
      { solution: solutionName, environment: environment.name },
      () => undefined
    )
  }

  async findUsers(environment: EnvironmentTarget, upn: string): Promise<PlatformUser[]> {
    return this.call(
      'find-users',
      { url: environment.url, upn },
      { environment: environment.name },
      result => expectList(result, 'users').map(user => ({
        id: expectString(user.id, 'id'),
        upn: expectString(user.upn, 'upn')
      }))
    )
  }

  async listProcesses(environment: EnvironmentTarget, solutionName: string): Promise<PlatformProcess[]> {
    return this.call(
      'list-processes',
      { url: environment.url, solution: solutionName },
      { solution: solutionName, environment: environment.name },
      result => expectList(result, 'processes').map(proc => ({
        id: expectString(proc.id, 'id'),
        name: expectString(proc.name, 'name'),
        ownerId: expectString(proc.ownerId, 'ownerId'),
        active: expectBoolean(proc.active, 'active')
      }))
    )
  }

  async assignProcessOwner(environment: EnvironmentTarget, processId: string, userId: string): Promise<void> {
    await this.call(
      'assign-owner',
      { url: environment.url, processId, userId },
      { environment: environment.name },
      () => undefined
    )
  }

  async activateProcess(environment: EnvironmentTarget, processId: string): Promise<void> {
    await this.call(
      'activate-process',
      { url: environment.url, processId },
      { environment: environment.name },
      () => undefined
    )
  }
}
