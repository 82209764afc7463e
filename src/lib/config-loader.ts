/**
 * dataverse-alm Config Loader
 *
 * Builds the run configuration from ordered layers:
 *
 *   DEFAULT_CONFIG → extends chain (parent first) → alm-config.yaml → alm-config.local.yaml
 *
 * Layers are merged by a pure function (arrays concatenate, maps merge,
 * scalars override) and then validated into a frozen ResolvedAlmConfig.
 */

import fs from 'node:fs'
import path from 'node:path'
import { parse as parseYaml } from 'yaml'
import type {
  AlmConfigFile,
  EnvironmentConfig,
  HookRegistry,
  ResolvedAlmConfig,
  SolutionConfig
} from '../types.js'
import { DEFAULT_DEV_ENVIRONMENT, DEFAULT_SERVICE_ACCOUNT_KEY, HOOK_PHASES } from '../types.js'
import {
  CircularExtendsError,
  ConfigNotFoundError,
  ExtendsDepthError,
  InvalidConfigError,
  InvalidEnvironmentError,
  toError
} from './errors.js'
import { requireDependency } from './dependencies.js'

export const CONFIG_FILE = 'alm-config.yaml'
export const CONFIG_LOCAL_FILE = 'alm-config.local.yaml'
const MAX_SEARCH_DEPTH = 5
const MAX_EXTENDS_DEPTH = 10

/** One parsed config layer */
export type ConfigLayer = Record<string, unknown>

/**
 * Expand environment variables in a string
 * Supports: ${VAR}, ${VAR:-default}, $VAR
 */
export function expandEnvVars(str: string, env: NodeJS.ProcessEnv = process.env): string {
  // Handle ${VAR:-default} syntax
  str = str.replace(/\$\{([^}:]+):-([^}]*)\}/g, (_, varName: string, defaultValue: string) => {
    return env[varName] || defaultValue
  })

  // Handle ${VAR} syntax
  str = str.replace(/\$\{([^}]+)\}/g, (_, varName: string) => {
    return env[varName] || ''
  })

  // Handle $VAR syntax (word boundary)
  str = str.replace(/\$([A-Z_][A-Z0-9_]*)/gi, (_, varName: string) => {
    return env[varName] || ''
  })

  return str
}

/**
 * Recursively expand env vars in every string of a parsed value
 */
function expandEnvVarsInValue(value: unknown): unknown {
  if (typeof value === 'string') {
    return expandEnvVars(value)
  }
  if (Array.isArray(value)) {
    return value.map(item => expandEnvVarsInValue(item))
  }
  if (isPlainObject(value)) {
    const result: ConfigLayer = {}
    for (const [key, item] of Object.entries(value)) {
      result[key] = expandEnvVarsInValue(item)
    }
    return result
  }
  return value
}

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value)
}

/**
 * Default configuration (lowest layer)
 */
export const DEFAULT_CONFIG: AlmConfigFile = {
  version: '1',
  source_dir: 'src',
  artifacts_dir: 'out/solutions',
  dev_environment: DEFAULT_DEV_ENVIRONMENT,
  environments: {},
  solutions: [],
  hooks: {
    preExport: [],
    postExport: [],
    preBuild: [],
    postBuild: [],
    preDeploy: [],
    migrateData: [],
    postDeploy: []
  },
  dependencies: {},
  platform: {
    command: 'dataverse-bridge',
    args: [],
    module: 'Rnwood.Dataverse.Data.PowerShell',
    timeout_ms: 30 * 60 * 1000
  },
  variables: {},
  git: {
    enabled: true,
    push: false,
    remote: 'origin'
  },
  release: {
    template: 'setup.ps1',
    upstream_repo: ''
  }
}

// ============================================================================
// Discovery
// ============================================================================

/**
 * Find alm-config.yaml by searching up from the start directory
 */
export function findConfigFile(startDir: string = process.cwd()): string | null {
  let currentDir = path.resolve(startDir)
  let depth = 0

  while (depth < MAX_SEARCH_DEPTH) {
    const configFile = path.join(currentDir, CONFIG_FILE)

    if (fs.existsSync(configFile)) {
      return configFile
    }

    const parentDir = path.dirname(currentDir)
    if (parentDir === currentDir) {
      // Reached root
      break
    }

    currentDir = parentDir
    depth++
  }

  return null
}

export function configExists(startDir?: string): boolean {
  return findConfigFile(startDir) !== null
}

// ============================================================================
// Layer loading
// ============================================================================

/**
 * Load a single config layer. A missing optional file is an empty layer.
 */
export function loadConfigFile(configPath: string, required: boolean = true): ConfigLayer {
  if (!fs.existsSync(configPath)) {
    if (required) {
      throw new InvalidConfigError('file does not exist', configPath)
    }
    return {}
  }

  let parsed: unknown
  try {
    parsed = parseYaml(fs.readFileSync(configPath, 'utf-8'))
  } catch (err) {
    const error = toError(err)
    throw new InvalidConfigError(error.message, configPath, error)
  }

  if (parsed === null || parsed === undefined) {
    return {}
  }
  if (!isPlainObject(parsed)) {
    throw new InvalidConfigError('top level must be a mapping', configPath)
  }

  const expanded = expandEnvVarsInValue(parsed)
  return isPlainObject(expanded) ? expanded : {}
}

/**
 * Load a layer and its "extends" ancestors, parent first.
 * The "extends" key itself is not part of any returned layer.
 */
export function loadLayerChain(
  configPath: string,
  visited: Set<string> = new Set(),
  depth: number = 0
): ConfigLayer[] {
  if (depth > MAX_EXTENDS_DEPTH) {
    throw new ExtendsDepthError(MAX_EXTENDS_DEPTH)
  }

  const absolutePath = path.resolve(configPath)

  if (visited.has(absolutePath)) {
    throw new CircularExtendsError(absolutePath)
  }

  visited.add(absolutePath)

  const { extends: parent, ...layer } = loadConfigFile(absolutePath)

  if (parent === undefined || parent === null || parent === '') {
    return [layer]
  }
  if (typeof parent !== 'string') {
    throw new InvalidConfigError('"extends" must be a file path', absolutePath)
  }

  const parentPath = path.resolve(path.dirname(absolutePath), parent)
  return [...loadLayerChain(parentPath, visited, depth + 1), layer]
}

// ============================================================================
// Merge
// ============================================================================

function mergeValues(base: unknown, override: unknown): unknown {
  if (override === undefined) {
    return base
  }
  if (Array.isArray(base) && Array.isArray(override)) {
    return [...base, ...override]
  }
  if (isPlainObject(base) && isPlainObject(override)) {
    const result: ConfigLayer = { ...base }
    for (const [key, value] of Object.entries(override)) {
      result[key] = mergeValues(base[key], value)
    }
    return result
  }
  return override
}

/**
 * Merge config layers in order. Later layers win for scalars, maps merge
 * key by key, arrays concatenate. Inputs are not modified.
 */
export function mergeConfigLayers(layers: readonly ConfigLayer[]): ConfigLayer {
  let result: ConfigLayer = {}
  for (const layer of layers) {
    const merged = mergeValues(result, layer)
    result = isPlainObject(merged) ? merged : result
  }
  return result
}

// ============================================================================
// Validation
// ============================================================================

function readString(layer: ConfigLayer, key: string, where: string, fallback?: string): string {
  const value = layer[key]
  if (value === undefined || value === null) {
    if (fallback !== undefined) return fallback
    throw new InvalidConfigError(`${where}${key} is required`)
  }
  if (typeof value === 'number') {
    return String(value)
  }
  if (typeof value !== 'string') {
    throw new InvalidConfigError(`${where}${key} must be a string`)
  }
  return value
}

function readBoolean(layer: ConfigLayer, key: string, where: string, fallback: boolean): boolean {
  const value = layer[key]
  if (value === undefined || value === null) return fallback
  if (typeof value !== 'boolean') {
    throw new InvalidConfigError(`${where}${key} must be true or false`)
  }
  return value
}

function readNumber(layer: ConfigLayer, key: string, where: string, fallback: number): number {
  const value = layer[key]
  if (value === undefined || value === null) return fallback
  if (typeof value !== 'number' || !Number.isFinite(value) || value <= 0) {
    throw new InvalidConfigError(`${where}${key} must be a positive number`)
  }
  return value
}

function readStringList(layer: ConfigLayer, key: string, where: string): string[] {
  const value = layer[key]
  if (value === undefined || value === null) return []
  if (!Array.isArray(value) || !value.every(item => typeof item === 'string')) {
    throw new InvalidConfigError(`${where}${key} must be a list of strings`)
  }
  return [...value]
}

function readMap(layer: ConfigLayer, key: string, where: string): ConfigLayer {
  const value = layer[key]
  if (value === undefined || value === null) return {}
  if (!isPlainObject(value)) {
    throw new InvalidConfigError(`${where}${key} must be a mapping`)
  }
  return value
}

function readStringMap(layer: ConfigLayer, key: string, where: string, allowNull = false): Record<string, string> {
  const map = readMap(layer, key, where)
  const result: Record<string, string> = {}
  for (const [name, value] of Object.entries(map)) {
    if (value === null && allowNull) {
      result[name] = ''
    } else if (typeof value === 'string' || typeof value === 'number') {
      result[name] = String(value)
    } else {
      throw new InvalidConfigError(`${where}${key}.${name} must be a string`)
    }
  }
  return result
}

function resolveSolutions(layer: ConfigLayer): SolutionConfig[] {
  const raw = layer.solutions
  if (raw === undefined || raw === null) {
    return []
  }
  if (!Array.isArray(raw)) {
    throw new InvalidConfigError('solutions must be a list')
  }

  const seen = new Set<string>()
  return raw.map((entry: unknown, index) => {
    const where = `solutions[${index}].`
    if (!isPlainObject(entry)) {
      throw new InvalidConfigError(`${where.slice(0, -1)} must be a mapping`)
    }

    const name = readString(entry, 'name', where).trim()
    if (!name) {
      throw new InvalidConfigError(`${where}name must not be empty`)
    }
    if (seen.has(name)) {
      throw new InvalidConfigError(`duplicate solution "${name}"`)
    }
    seen.add(name)

    return {
      name,
      deployUnmanaged: readBoolean(entry, 'deploy_unmanaged', where, false),
      serviceAccountKey: readString(entry, 'service_account_key', where, DEFAULT_SERVICE_ACCOUNT_KEY)
    }
  })
}

function resolveEnvironments(layer: ConfigLayer): Record<string, EnvironmentConfig> {
  const map = readMap(layer, 'environments', '')
  const result: Record<string, EnvironmentConfig> = {}
  for (const [name, value] of Object.entries(map)) {
    const entry = isPlainObject(value) ? value : {}
    result[name] = { url: readString(entry, 'url', `environments.${name}.`) }
  }
  return result
}

function resolveHooks(layer: ConfigLayer): HookRegistry {
  const map = readMap(layer, 'hooks', '')
  const known = new Set<string>(HOOK_PHASES)
  for (const phase of Object.keys(map)) {
    if (!known.has(phase)) {
      throw new InvalidConfigError(`unknown hook phase "${phase}" (expected one of ${HOOK_PHASES.join(', ')})`)
    }
  }

  return {
    preExport: readStringList(map, 'preExport', 'hooks.'),
    postExport: readStringList(map, 'postExport', 'hooks.'),
    preBuild: readStringList(map, 'preBuild', 'hooks.'),
    postBuild: readStringList(map, 'postBuild', 'hooks.'),
    preDeploy: readStringList(map, 'preDeploy', 'hooks.'),
    migrateData: readStringList(map, 'migrateData', 'hooks.'),
    postDeploy: readStringList(map, 'postDeploy', 'hooks.')
  }
}

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object') {
    for (const item of Object.values(value)) {
      deepFreeze(item)
    }
    Object.freeze(value)
  }
  return value
}

/**
 * Validate a merged layer into the immutable run configuration.
 * Relative directories resolve against rootDir.
 */
export function resolveConfig(layer: ConfigLayer, rootDir: string): ResolvedAlmConfig {
  const solutions = resolveSolutions(layer)
  if (solutions.length === 0) {
    throw new InvalidConfigError('at least one solution must be listed under solutions')
  }

  const platform = readMap(layer, 'platform', '')
  const git = readMap(layer, 'git', '')
  const release = readMap(layer, 'release', '')

  const config: ResolvedAlmConfig = {
    version: readString(layer, 'version', '', '1'),
    rootDir,
    sourceDir: path.resolve(rootDir, readString(layer, 'source_dir', '', 'src')),
    artifactsDir: path.resolve(rootDir, readString(layer, 'artifacts_dir', '', 'out/solutions')),
    devEnvironment: readString(layer, 'dev_environment', '', DEFAULT_DEV_ENVIRONMENT),
    environments: resolveEnvironments(layer),
    solutions,
    hooks: resolveHooks(layer),
    dependencies: readStringMap(layer, 'dependencies', '', true),
    platform: {
      command: readString(platform, 'command', 'platform.'),
      args: readStringList(platform, 'args', 'platform.'),
      module: readString(platform, 'module', 'platform.'),
      timeoutMs: readNumber(platform, 'timeout_ms', 'platform.', 30 * 60 * 1000)
    },
    variables: readStringMap(layer, 'variables', ''),
    git: {
      enabled: readBoolean(git, 'enabled', 'git.', true),
      push: readBoolean(git, 'push', 'git.', false),
      remote: readString(git, 'remote', 'git.', 'origin')
    },
    release: {
      template: path.resolve(rootDir, readString(release, 'template', 'release.', 'setup.ps1')),
      upstreamRepo: readString(release, 'upstream_repo', 'release.', '')
    }
  }

  // Throws MissingDependencyError when the platform module is undeclared
  requireDependency(config, config.platform.module)

  return deepFreeze(config)
}

// ============================================================================
// Entry points
// ============================================================================

/**
 * Load, merge and validate the configuration found from startDir.
 */
export function loadConfig(startDir: string = process.cwd()): ResolvedAlmConfig {
  const configPath = findConfigFile(startDir)

  if (!configPath) {
    throw new ConfigNotFoundError(path.resolve(startDir))
  }

  const rootDir = path.dirname(configPath)
  const layers: ConfigLayer[] = [
    { ...DEFAULT_CONFIG },
    ...loadLayerChain(configPath),
    loadConfigFile(path.join(rootDir, CONFIG_LOCAL_FILE), false)
  ]

  try {
    return resolveConfig(mergeConfigLayers(layers), rootDir)
  } catch (err) {
    if (err instanceof InvalidConfigError && !err.context?.configPath) {
      throw new InvalidConfigError(err.message.replace(/^Invalid config: /, ''), configPath, err)
    }
    throw err
  }
}

/**
 * Look up a target environment, rejecting names not declared in the config
 */
export function requireEnvironment(config: ResolvedAlmConfig, name: string): EnvironmentConfig {
  const environment = config.environments[name]
  if (!environment) {
    throw new InvalidEnvironmentError(name, Object.keys(config.environments))
  }
  return environment
}

/**
 * Folder holding the unpacked source of a solution
 */
export function getSolutionSourceDir(config: ResolvedAlmConfig, solutionName: string): string {
  return path.join(config.sourceDir, solutionName)
}
