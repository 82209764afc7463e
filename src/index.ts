/**
 * dataverse-alm - export, build and deploy automation for Dataverse solutions
 *
 * Main library exports for programmatic usage
 */

// Types
export type {
  Environment,
  EnvironmentConfig,
  SolutionVersion,
  SolutionConfig,
  SolutionSnapshot,
  DeployedSolutionState,
  PackageType,
  HookPhase,
  HookRegistry,
  DependencySpec,
  ResolvedAlmConfig,
  AlmConfigFile,
  RunLogger
} from './types.js'

export { HOOK_PHASES, DEFAULT_DEV_ENVIRONMENT, DEFAULT_SERVICE_ACCOUNT_KEY, silentLogger } from './types.js'

// Config
export {
  CONFIG_FILE,
  CONFIG_LOCAL_FILE,
  loadConfig,
  findConfigFile,
  configExists,
  mergeConfigLayers,
  resolveConfig,
  requireEnvironment,
  getSolutionSourceDir
} from './lib/config-loader.js'

export { parseDependencySpec, formatDependencySpec, requireDependency } from './lib/dependencies.js'

// Versioning
export {
  parseSolutionVersion,
  formatSolutionVersion,
  compareSolutionVersions,
  solutionVersionsEqual,
  sameMajorMinor
} from './domain/version.js'
export { classifyChange, nextVersion } from './domain/version-bumper.js'
export type { ChangeClassification, ComponentComparer } from './domain/version-bumper.js'

// Import strategy
export { selectImportStrategy, isImport } from './domain/import-strategy.js'
export type { ImportAction, ImportMode, ImportDecision, ImportStrategyInput } from './domain/import-strategy.js'

// Pipelines
export { exportSolutions } from './domain/export.js'
export type { ExportOptions, ExportSummary, SolutionExportResult } from './domain/export.js'

export { buildSolutions, readArtifactManifest, writeArtifactManifest, artifactFileName, ARTIFACT_MANIFEST_FILE } from './domain/build.js'
export type { ArtifactEntry, ArtifactManifest, BuildOptions } from './domain/build.js'

export { computeDeployPlan, formatDeployPlan, buildDeployPlanMarkdown, writeDeployPlanArtifact } from './domain/deploy-plan.js'
export type { DeployPlan, DeployPlanEntry, DeployPlanSummary, ComputeDeployPlanOptions } from './domain/deploy-plan.js'

export { executeDeploy } from './domain/deploy.js'
export type { DeployResult, DeployStep, DeployStepKind, ExecuteDeployOptions } from './domain/deploy.js'

export { DeployStateTracker, canTransition, isTerminal } from './domain/deploy-state.js'
export type { SolutionDeployState } from './domain/deploy-state.js'

export { resolveServiceIdentities, lookupVariable } from './domain/identity.js'

// Platform bridge
export { CommandPlatform, parseBridgeReply, spawnCommand } from './platform.js'
export type {
  SolutionPlatform,
  EnvironmentTarget,
  PlatformUser,
  PlatformProcess,
  PackOptions,
  CommandRunner,
  CommandResult
} from './platform.js'

// Hooks, git, release
export { createHookRunner, noHooks } from './lib/hooks.js'
export type { HookRunner, HookContextMap, HookExecutor } from './lib/hooks.js'
export { createGitClient, parsePorcelainStatus } from './lib/git.js'
export type { GitClient } from './lib/git.js'
export { prepareRelease, releaseDependencyVersion, RELEASE_PLACEHOLDERS } from './lib/release-prep.js'

// Errors
export * from './lib/errors.js'
