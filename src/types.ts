/**
 * dataverse-alm - Type Definitions
 */

// ============================================================================
// Environment Types
// ============================================================================

/**
 * Environment name - user-defined string, keyed into `environments` in
 * alm-config.yaml ('dev', 'test', 'uat', 'prod', ...)
 */
export type Environment = string

/** Environment the export pipeline reads from when none is configured */
export const DEFAULT_DEV_ENVIRONMENT = 'dev'

export interface EnvironmentConfig {
  /** Organisation URL handed to the platform bridge */
  url: string
}

// ============================================================================
// Solution Types
// ============================================================================

/**
 * Four-part solution version (Major.Minor.Build.Revision).
 * Ordering is lexicographic over the four components.
 */
export interface SolutionVersion {
  major: number
  minor: number
  build: number
  revision: number
}

/**
 * One entry of the solutions list. List order is dependency order:
 * a solution always comes after the solutions it depends on.
 */
export interface SolutionConfig {
  name: string
  /** Deploy the unmanaged artifact instead of the managed one. Default: false */
  deployUnmanaged: boolean
  /** Variable holding the UPN of the identity that owns the solution's processes */
  serviceAccountKey: string
}

export const DEFAULT_SERVICE_ACCOUNT_KEY = 'ServiceAccountUpn'

/**
 * Reference to a packaged solution (zip) on disk
 */
export interface SolutionSnapshot {
  solutionName: string
  path: string
}

/**
 * State of a solution as installed in a target environment.
 * Owned by the platform; read at deploy time only.
 */
export interface DeployedSolutionState {
  uniqueName: string
  installedVersion: SolutionVersion
  isManaged: boolean
}

export type PackageType = 'managed' | 'unmanaged'

// ============================================================================
// Hook Types
// ============================================================================

export const HOOK_PHASES = [
  'preExport',
  'postExport',
  'preBuild',
  'postBuild',
  'preDeploy',
  'migrateData',
  'postDeploy'
] as const

export type HookPhase = typeof HOOK_PHASES[number]

/** Phase → ordered list of script paths */
export type HookRegistry = Record<HookPhase, string[]>

// ============================================================================
// Dependency Types
// ============================================================================

/**
 * Version specifier of a required tool/module:
 * - exact version string ("2.1.0")
 * - empty string for the latest release
 * - "prerelease" for the latest prerelease
 */
export type DependencySpec =
  | { kind: 'latest' }
  | { kind: 'prerelease' }
  | { kind: 'exact'; version: string }

// ============================================================================
// Configuration Types
// ============================================================================

export interface PlatformConfig {
  /** Bridge executable that performs platform operations */
  command: string
  /** Extra arguments placed before the operation name */
  args: string[]
  /** Name of the platform module the bridge loads (must appear in dependencies) */
  module: string
  /** Timeout per bridge call */
  timeoutMs: number
}

export interface GitConfig {
  /** Commit exported changes */
  enabled: boolean
  /** Push after committing */
  push: boolean
  remote: string
}

export interface ReleaseConfig {
  /** Setup script template with placeholders */
  template: string
  upstreamRepo: string
}

/**
 * Fully merged, validated configuration. Immutable for the whole run.
 */
export interface ResolvedAlmConfig {
  version: string
  /** Directory containing alm-config.yaml (base for relative paths) */
  rootDir: string
  sourceDir: string
  artifactsDir: string
  devEnvironment: Environment
  environments: Readonly<Record<Environment, EnvironmentConfig>>
  solutions: readonly SolutionConfig[]
  hooks: Readonly<HookRegistry>
  dependencies: Readonly<Record<string, string>>
  platform: PlatformConfig
  variables: Readonly<Record<string, string>>
  git: GitConfig
  release: ReleaseConfig
}

/**
 * Raw shape of alm-config.yaml (one layer). Everything optional; layers are
 * merged before validation.
 */
export type AlmConfigFile = {
  version?: string
  extends?: string
  source_dir?: string
  artifacts_dir?: string
  dev_environment?: string
  environments?: Record<string, { url?: string }>
  solutions?: Array<{
    name?: string
    deploy_unmanaged?: boolean
    service_account_key?: string
  }>
  hooks?: Partial<Record<HookPhase, string[]>>
  dependencies?: Record<string, string | null>
  platform?: {
    command?: string
    args?: string[]
    module?: string
    timeout_ms?: number
  }
  variables?: Record<string, string>
  git?: {
    enabled?: boolean
    push?: boolean
    remote?: string
  }
  release?: {
    template?: string
    upstream_repo?: string
  }
}

// ============================================================================
// CLI Types
// ============================================================================

export interface CLIArgs {
  _: string[]
  verbose?: boolean
  quiet?: boolean
  json?: boolean
  'dry-run'?: boolean
  path?: string
  env?: string
  message?: string
  unmanaged?: boolean
  breaking?: boolean
}

// ============================================================================
// Logging
// ============================================================================

/**
 * Progress sink handed to domain operations. The CLI maps it onto its
 * TTY-aware output; library callers may omit it.
 */
export interface RunLogger {
  info(message: string): void
  warn(message: string): void
  verbose(message: string): void
}

export const silentLogger: RunLogger = {
  info: () => {},
  warn: () => {},
  verbose: () => {}
}
