/**
 * dataverse-alm Error Hierarchy
 *
 * Typed error classes shared by the CLI and programmatic usage.
 *
 * Hierarchy:
 *   AlmError (base)
 *   ├── ConfigError (configuration issues, raised before any platform call)
 *   │   ├── ConfigNotFoundError
 *   │   ├── InvalidConfigError
 *   │   ├── CircularExtendsError
 *   │   ├── ExtendsDepthError
 *   │   └── MissingDependencyError
 *   ├── ValidationError (input validation)
 *   │   ├── InvalidVersionError
 *   │   ├── InvalidEnvironmentError
 *   │   └── MissingInputError
 *   ├── PlatformError (calls into the data platform)
 *   │   ├── ExternalCallError
 *   │   └── SnapshotCompareError
 *   ├── IdentityError
 *   │   └── IdentityResolutionError
 *   └── OperationError (operational failures)
 *       ├── FileNotFoundError
 *       ├── SolutionNotInstalledError
 *       ├── InvalidTransitionError
 *       ├── HookFailedError
 *       ├── PlaceholderError
 *       └── BatchOperationError
 */

interface AlmErrorOptions {
  suggestion?: string
  context?: Record<string, unknown>
  cause?: Error
}

/**
 * Base error class for all dataverse-alm errors
 */
export class AlmError extends Error {
  /** Error code for programmatic handling */
  readonly code: string

  /** Suggestion for how to fix the error */
  readonly suggestion?: string

  /** Additional context/data about the error */
  readonly context?: Record<string, unknown>

  constructor(message: string, code: string, options?: AlmErrorOptions) {
    super(message, { cause: options?.cause })
    this.name = 'AlmError'
    this.code = code
    this.suggestion = options?.suggestion
    this.context = options?.context

    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor)
    }
  }

  /**
   * Format error for CLI output
   */
  toCliOutput(): string {
    const lines = [`Error: ${this.message}`]
    if (this.suggestion) {
      lines.push(`  Suggestion: ${this.suggestion}`)
    }
    return lines.join('\n')
  }

  /**
   * Convert to JSON for logging/debugging
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      suggestion: this.suggestion,
      context: this.context,
      stack: this.stack
    }
  }
}

// =============================================================================
// Configuration Errors
// =============================================================================

export class ConfigError extends AlmError {
  constructor(message: string, code: string, options?: AlmErrorOptions) {
    super(message, code, options)
    this.name = 'ConfigError'
  }
}

/**
 * Thrown when alm-config.yaml is not found
 */
export class ConfigNotFoundError extends ConfigError {
  constructor(searchedFrom?: string) {
    super(
      searchedFrom
        ? `No alm-config.yaml found from ${searchedFrom}`
        : 'No alm-config.yaml found',
      'CONFIG_NOT_FOUND',
      {
        suggestion: 'Create alm-config.yaml at the repository root or pass --path',
        context: searchedFrom ? { searchedFrom } : undefined
      }
    )
    this.name = 'ConfigNotFoundError'
  }
}

/**
 * Thrown when a config layer has invalid content
 */
export class InvalidConfigError extends ConfigError {
  constructor(message: string, configPath?: string, cause?: Error) {
    super(
      configPath ? `Invalid config in ${configPath}: ${message}` : `Invalid config: ${message}`,
      'INVALID_CONFIG',
      {
        suggestion: 'Check your alm-config.yaml',
        context: configPath ? { configPath } : undefined,
        cause
      }
    )
    this.name = 'InvalidConfigError'
  }
}

/**
 * Thrown when config inheritance creates a loop
 */
export class CircularExtendsError extends ConfigError {
  constructor(configPath: string) {
    super(
      `Circular config inheritance detected: ${configPath}`,
      'CIRCULAR_EXTENDS',
      {
        suggestion: 'Check your "extends" fields for circular references',
        context: { configPath }
      }
    )
    this.name = 'CircularExtendsError'
  }
}

/**
 * Thrown when config inheritance is too deep
 */
export class ExtendsDepthError extends ConfigError {
  constructor(maxDepth: number) {
    super(
      `Config inheritance depth exceeded (max ${maxDepth})`,
      'EXTENDS_DEPTH_EXCEEDED',
      {
        suggestion: 'Reduce nesting of "extends" in your config files',
        context: { maxDepth }
      }
    )
    this.name = 'ExtendsDepthError'
  }
}

/**
 * Thrown when a required tool/module has no entry under `dependencies`
 */
export class MissingDependencyError extends ConfigError {
  constructor(dependency: string) {
    super(
      `Dependency "${dependency}" is not declared`,
      'MISSING_DEPENDENCY',
      {
        suggestion: `Add "${dependency}" under dependencies in alm-config.yaml (exact version, "" for latest, or "prerelease")`,
        context: { dependency }
      }
    )
    this.name = 'MissingDependencyError'
  }
}

// =============================================================================
// Validation Errors
// =============================================================================

export class ValidationError extends AlmError {
  constructor(message: string, code: string, options?: AlmErrorOptions) {
    super(message, code, options)
    this.name = 'ValidationError'
  }
}

/**
 * Thrown when a version string is not four non-negative integers
 */
export class InvalidVersionError extends ValidationError {
  constructor(value: string, source?: string) {
    super(
      source
        ? `Invalid solution version "${value}" in ${source}`
        : `Invalid solution version "${value}"`,
      'INVALID_VERSION',
      {
        suggestion: 'Solution versions have four numeric parts: Major.Minor.Build.Revision',
        context: { value, source }
      }
    )
    this.name = 'InvalidVersionError'
  }
}

/**
 * Thrown when an unknown environment is specified
 */
export class InvalidEnvironmentError extends ValidationError {
  constructor(environment: string, validEnvironments: string[]) {
    super(
      `Invalid environment: "${environment}"`,
      'INVALID_ENVIRONMENT',
      {
        suggestion: validEnvironments.length > 0
          ? `Valid environments: ${validEnvironments.join(', ')}`
          : 'Declare environments in alm-config.yaml',
        context: { environment, validEnvironments }
      }
    )
    this.name = 'InvalidEnvironmentError'
  }
}

/**
 * Thrown when required input is missing
 */
export class MissingInputError extends ValidationError {
  constructor(inputName: string) {
    super(
      `Input required and not supplied: ${inputName}`,
      'MISSING_INPUT',
      {
        suggestion: `Provide the "${inputName}" parameter`,
        context: { inputName }
      }
    )
    this.name = 'MissingInputError'
  }
}

// =============================================================================
// Platform Errors
// =============================================================================

export class PlatformError extends AlmError {
  constructor(message: string, code: string, options?: AlmErrorOptions) {
    super(message, code, options)
    this.name = 'PlatformError'
  }
}

/**
 * Thrown when a platform operation (export, pack, stage, upgrade, publish...) fails
 */
export class ExternalCallError extends PlatformError {
  readonly step: string
  readonly solution?: string

  constructor(
    step: string,
    reason: string,
    options: { solution?: string; environment?: string; cause?: Error; context?: Record<string, unknown> } = {}
  ) {
    const target = options.solution ? ` for solution "${options.solution}"` : ''
    const where = options.environment ? ` in "${options.environment}"` : ''
    super(
      `${step} failed${target}${where}: ${reason}`,
      'EXTERNAL_CALL_FAILED',
      {
        suggestion: 'Fix the underlying problem and re-run the whole pipeline',
        context: {
          step,
          solution: options.solution,
          environment: options.environment,
          ...options.context
        },
        cause: options.cause
      }
    )
    this.name = 'ExternalCallError'
    this.step = step
    this.solution = options.solution
  }
}

/**
 * Thrown when two snapshots cannot be compared (corrupt archive, ...)
 */
export class SnapshotCompareError extends PlatformError {
  constructor(solution: string, reason: string, cause?: Error) {
    super(
      `Could not compare snapshots of "${solution}": ${reason}`,
      'SNAPSHOT_COMPARE_FAILED',
      {
        context: { solution },
        cause
      }
    )
    this.name = 'SnapshotCompareError'
  }
}

// =============================================================================
// Identity Errors
// =============================================================================

export class IdentityError extends AlmError {
  constructor(message: string, code: string, options?: AlmErrorOptions) {
    super(message, code, options)
    this.name = 'IdentityError'
  }
}

export type IdentityFailure = 'unset' | 'not-found' | 'ambiguous'

/**
 * Thrown when the service identity owning processes cannot be resolved
 */
export class IdentityResolutionError extends IdentityError {
  readonly reason: IdentityFailure

  constructor(key: string, reason: IdentityFailure, upn?: string, matches = 0) {
    const detail = reason === 'unset'
      ? `variable "${key}" is not set`
      : reason === 'not-found'
        ? `no user matches "${upn}"`
        : `${matches} users match "${upn}"`
    super(
      `Cannot resolve service identity ${key}: ${detail}`,
      'IDENTITY_RESOLUTION_FAILED',
      {
        suggestion: reason === 'unset'
          ? `Set ${key} in the environment or under variables in alm-config.yaml`
          : 'Check the service account exists exactly once in the target environment',
        context: { key, reason, upn, matches }
      }
    )
    this.name = 'IdentityResolutionError'
    this.reason = reason
  }
}

// =============================================================================
// Operation Errors
// =============================================================================

export class OperationError extends AlmError {
  constructor(message: string, code: string, options?: AlmErrorOptions) {
    super(message, code, options)
    this.name = 'OperationError'
  }
}

/**
 * Thrown when a required file is not found
 */
export class FileNotFoundError extends OperationError {
  constructor(filePath: string) {
    super(
      `File not found: ${filePath}`,
      'FILE_NOT_FOUND',
      {
        suggestion: 'Check if the file path is correct',
        context: { filePath }
      }
    )
    this.name = 'FileNotFoundError'
  }
}

/**
 * Thrown when a solution is expected in an environment but is not installed
 */
export class SolutionNotInstalledError extends OperationError {
  constructor(solution: string, environment: string) {
    super(
      `Solution "${solution}" is not installed in "${environment}"`,
      'SOLUTION_NOT_INSTALLED',
      {
        suggestion: 'Check the solution unique name in alm-config.yaml',
        context: { solution, environment }
      }
    )
    this.name = 'SolutionNotInstalledError'
  }
}

/**
 * Thrown when a solution is moved to a deploy state it cannot reach from its current one
 */
export class InvalidTransitionError extends OperationError {
  constructor(solution: string, from: string, to: string) {
    super(
      `Solution "${solution}" cannot move from ${from} to ${to}`,
      'INVALID_TRANSITION',
      {
        context: { solution, from, to }
      }
    )
    this.name = 'InvalidTransitionError'
  }
}

/**
 * Thrown when a hook script exits with an error
 */
export class HookFailedError extends OperationError {
  constructor(phase: string, script: string, cause?: Error) {
    super(
      `${phase} hook failed: ${script}`,
      'HOOK_FAILED',
      {
        context: { phase, script },
        cause
      }
    )
    this.name = 'HookFailedError'
  }
}

/**
 * Thrown when placeholders survive template substitution
 */
export class PlaceholderError extends OperationError {
  constructor(filePath: string, remaining: Array<{ line: number; text: string }>) {
    super(
      `Placeholders were not fully replaced in ${filePath}: lines ${remaining.map(r => r.line).join(', ')}`,
      'PLACEHOLDERS_REMAINING',
      {
        context: { filePath, remaining }
      }
    )
    this.name = 'PlaceholderError'
  }
}

/**
 * Thrown when some items of a per-solution batch fail
 */
export class BatchOperationError extends OperationError {
  /** Number of successful operations */
  readonly successCount: number

  /** Details of failed operations */
  readonly failures: Array<{ key: string; error: string }>

  constructor(
    operation: string,
    successCount: number,
    failures: Array<{ key: string; error: string }>
  ) {
    const failedKeys = failures.map(f => f.key).join(', ')
    super(
      `Failed to ${operation} some solutions: ${failedKeys}`,
      'BATCH_OPERATION_FAILED',
      {
        context: { operation, successCount, failures }
      }
    )
    this.name = 'BatchOperationError'
    this.successCount = successCount
    this.failures = failures
  }
}

// =============================================================================
// Type Guards
// =============================================================================

export function isAlmError(error: unknown): error is AlmError {
  return error instanceof AlmError
}

export function isConfigError(error: unknown): error is ConfigError {
  return error instanceof ConfigError
}

export function isValidationError(error: unknown): error is ValidationError {
  return error instanceof ValidationError
}

export function isPlatformError(error: unknown): error is PlatformError {
  return error instanceof PlatformError
}

export function isIdentityError(error: unknown): error is IdentityError {
  return error instanceof IdentityError
}

export function isOperationError(error: unknown): error is OperationError {
  return error instanceof OperationError
}

// =============================================================================
// Error Formatting Helpers
// =============================================================================

/**
 * Format any error for CLI output
 */
export function formatErrorForCli(error: unknown): string {
  if (isAlmError(error)) {
    return error.toCliOutput()
  }
  if (error instanceof Error) {
    return `Error: ${error.message}`
  }
  return `Error: ${String(error)}`
}

/**
 * Normalise an unknown thrown value into an Error
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error))
}
