/**
 * Stackseed Error Hierarchy
 *
 * Typed error classes shared by the derivation engine, the initializers and the CLI.
 *
 * Hierarchy:
 *   StackseedError (base)
 *   ├── ConfigError (configuration issues)
 *   │   ├── InvalidConfigError
 *   │   └── UnknownServiceError
 *   ├── InputError (bad or missing inputs)
 *   │   ├── TemplateNotFoundError
 *   │   ├── EnvFileNotFoundError
 *   │   ├── MissingVariableError
 *   │   ├── InvalidCredentialError
 *   │   └── CredentialUnavailableError
 *   ├── InitializationError (one-time setup failed)
 *   └── ReadinessTimeoutError (service never became query-capable)
 */

interface ErrorOptions {
  suggestion?: string
  context?: Record<string, unknown>
  cause?: Error
}

/** Process exit codes used by the CLI */
export const EXIT_CODES = {
  success: 0,
  failure: 1,
  input: 2,
  timeout: 3
} as const

/**
 * Base error class for all Stackseed errors
 */
export class StackseedError extends Error {
  /** Error code for programmatic handling */
  readonly code: string

  /** Suggestion for how to fix the error */
  readonly suggestion?: string

  /** Additional context/data about the error */
  readonly context?: Record<string, unknown>

  constructor(message: string, code: string, options?: ErrorOptions) {
    super(message, { cause: options?.cause })
    this.name = 'StackseedError'
    this.code = code
    this.suggestion = options?.suggestion
    this.context = options?.context

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor)
    }
  }

  /** Exit code the CLI should use when this error ends a run */
  get exitCode(): number {
    return EXIT_CODES.failure
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
      context: this.context
    }
  }
}

// =============================================================================
// Configuration Errors
// =============================================================================

export class ConfigError extends StackseedError {
  constructor(message: string, code: string, options?: ErrorOptions) {
    super(message, code, options)
    this.name = 'ConfigError'
  }

  override get exitCode(): number {
    return EXIT_CODES.input
  }
}

/**
 * Thrown when config.yaml has invalid content
 */
export class InvalidConfigError extends ConfigError {
  constructor(message: string, configPath?: string, cause?: Error) {
    super(
      configPath ? `Invalid config in ${configPath}: ${message}` : `Invalid config: ${message}`,
      'INVALID_CONFIG',
      {
        suggestion: 'Check your .stackseed/config.yaml syntax',
        context: configPath ? { configPath } : undefined,
        cause
      }
    )
    this.name = 'InvalidConfigError'
  }
}

/**
 * Thrown when init/batch names a service that is not configured
 */
export class UnknownServiceError extends ConfigError {
  constructor(kind: 'service' | 'batch', name: string, available: string[]) {
    super(`Unknown ${kind}: "${name}"`, 'UNKNOWN_SERVICE', {
      suggestion: available.length > 0
        ? `Configured ${kind === 'service' ? 'services' : 'batches'}: ${available.join(', ')}`
        : `Declare it under "${kind === 'service' ? 'services' : 'batches'}:" in .stackseed/config.yaml`,
      context: { kind, name, available }
    })
    this.name = 'UnknownServiceError'
  }
}

// =============================================================================
// Input Errors
// =============================================================================

export class InputError extends StackseedError {
  constructor(message: string, code: string, options?: ErrorOptions) {
    super(message, code, options)
    this.name = 'InputError'
  }

  override get exitCode(): number {
    return EXIT_CODES.input
  }
}

/**
 * Fatal: the template is the source of truth for keys, nothing can be generated without it
 */
export class TemplateNotFoundError extends InputError {
  constructor(templatePath: string) {
    super(`Template not found: ${templatePath}`, 'TEMPLATE_NOT_FOUND', {
      suggestion: 'Restore the checked-in template or point "template" in .stackseed/config.yaml at it',
      context: { templatePath }
    })
    this.name = 'TemplateNotFoundError'
  }
}

/**
 * Thrown when a command needs the generated environment and it was never generated
 */
export class EnvFileNotFoundError extends InputError {
  constructor(envFile: string) {
    super(`Environment file not found: ${envFile}`, 'ENV_FILE_NOT_FOUND', {
      suggestion: 'Run "stackseed generate" first',
      context: { envFile }
    })
    this.name = 'EnvFileNotFoundError'
  }
}

/**
 * Thrown when a placeholder or credential references an unset variable
 */
export class MissingVariableError extends InputError {
  constructor(names: string[], where: string) {
    super(`Missing variables for ${where}: ${names.join(', ')}`, 'MISSING_VARIABLE', {
      suggestion: 'Run "stackseed generate" and make sure the environment file is loaded',
      context: { names, where }
    })
    this.name = 'MissingVariableError'
  }
}

/**
 * Thrown when a combined credential lacks its delimiter
 */
export class InvalidCredentialError extends InputError {
  constructor(variable: string, delimiter: string) {
    super(`${variable} must have the form principal${delimiter}secret`, 'INVALID_CREDENTIAL', {
      context: { variable, delimiter }
    })
    this.name = 'InvalidCredentialError'
  }
}

/**
 * Thrown on first use of a credential that still holds the sentinel value
 */
export class CredentialUnavailableError extends InputError {
  constructor(key: string) {
    super(`Credential ${key} is not configured`, 'CREDENTIAL_UNAVAILABLE', {
      suggestion: `Place the value in the provided-secrets directory and run "stackseed generate"`,
      context: { key }
    })
    this.name = 'CredentialUnavailableError'
  }
}

// =============================================================================
// Initialization Errors
// =============================================================================

/**
 * The one-time setup procedure failed. The completion marker is not written.
 */
export class InitializationError extends StackseedError {
  constructor(service: string, reason: string, cause?: Error) {
    super(`Initialization of ${service} failed: ${reason}`, 'INITIALIZATION_FAILED', {
      suggestion: 'Fix the cause and rerun; initialization restarts from scratch',
      context: { service },
      cause
    })
    this.name = 'InitializationError'
  }
}

/**
 * The readiness budget ran out before the service accepted a query
 */
export class ReadinessTimeoutError extends StackseedError {
  readonly attempts: number
  readonly elapsedMs: number

  constructor(service: string, attempts: number, elapsedMs: number, cause?: Error) {
    super(
      `${service} not ready after ${attempts} attempt(s) in ${elapsedMs}ms`,
      'READINESS_TIMEOUT',
      {
        suggestion: 'Check the service logs, or raise retry.max_attempts / retry.max_duration_ms',
        context: { service, attempts, elapsedMs },
        cause
      }
    )
    this.name = 'ReadinessTimeoutError'
    this.attempts = attempts
    this.elapsedMs = elapsedMs
  }

  override get exitCode(): number {
    return EXIT_CODES.timeout
  }
}

// =============================================================================
// Type Guards
// =============================================================================

export function isStackseedError(error: unknown): error is StackseedError {
  return error instanceof StackseedError
}

export function isConfigError(error: unknown): error is ConfigError {
  return error instanceof ConfigError
}

export function isInputError(error: unknown): error is InputError {
  return error instanceof InputError
}

// =============================================================================
// Error Formatting Helpers
// =============================================================================

/**
 * Format any error for CLI output
 */
export function formatErrorForCli(error: unknown): string {
  if (isStackseedError(error)) {
    return error.toCliOutput()
  }
  if (error instanceof Error) {
    return `Error: ${error.message}`
  }
  return `Error: ${String(error)}`
}

/**
 * Wrap a generic error into a StackseedError if needed
 */
export function wrapError(error: unknown, defaultCode: string = 'UNKNOWN_ERROR'): StackseedError {
  if (isStackseedError(error)) {
    return error
  }
  if (error instanceof Error) {
    return new StackseedError(error.message, defaultCode, { cause: error })
  }
  return new StackseedError(String(error), defaultCode)
}

/** Normalize a thrown value to an Error */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error))
}

/**
 * Exit code for any error
 */
export function exitCodeFor(error: unknown): number {
  return isStackseedError(error) ? error.exitCode : EXIT_CODES.failure
}
