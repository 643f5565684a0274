/**
 * Stackseed - Type Definitions
 */

// ============================================================================
// Environment Derivation
// ============================================================================

/** Where a resolved value came from */
export type ValueOrigin = 'template' | 'provided' | 'sentinel' | 'derived' | 'composite'

export interface ProvidedSecret {
  /** Template key the secret maps to (e.g. ANTHROPIC_API_KEY) */
  key: string
  value: string
  /** Human-readable location, used in reports (e.g. secrets/api/anthropic) */
  origin: string
}

export interface ProvidedSourceConfig {
  /** Directory holding one file per secret */
  dir: string
  /** Appended to the upper-cased file name to build the template key */
  suffix: string
}

export interface DerivedSecretConfig {
  key: string
  /** Cache file name inside the derived-secret cache directory */
  file: string
  length: number
}

export type WarningCode =
  | 'unknown-secret'
  | 'missing-variable'
  | 'composite-unresolved'
  | 'composite-not-in-template'
  | 'descriptor-not-found'

/**
 * Non-fatal finding reported by the derivation engine.
 * Warnings never stop generation.
 */
export interface ValidationWarning {
  code: WarningCode
  key?: string
  message: string
}

// ============================================================================
// Readiness & Initialization
// ============================================================================

export type InitializerState =
  | 'NOT_STARTED'
  | 'CHECK_SENTINEL'
  | 'WAITING_READY'
  | 'INITIALIZING'
  | 'COMPLETED'
  | 'FAILED'

/**
 * Bounded polling budget. Delay grows by backoffMultiplier after every failed
 * attempt, capped at maxDelayMs. Either limit ends the wait; leaving both unset
 * polls until the process is terminated.
 */
export interface RetryPolicy {
  initialDelayMs: number
  backoffMultiplier: number
  maxDelayMs: number
  maxAttempts?: number
  maxDurationMs?: number
}

export type ProbeConfig =
  | { type: 'command'; command: string; args: string[] }
  | { type: 'http'; url: string }
  | { type: 's3'; endpoint: string; accessKey: string; secretKey: string; region: string }

export type SetupConfig =
  | { type: 'command'; command: string; args: string[] }
  | {
      type: 'buckets'
      endpoint: string
      accessKey: string
      secretKey: string
      region: string
      buckets: string[]
      publicRead: boolean
    }

export type UnitOperationConfig =
  | { type: 'command'; command: string; args: string[] }
  | { type: 'ollama'; baseUrl: string }

export interface CredentialConfig {
  /** Environment variable holding `principal<delimiter>secret` */
  var: string
  delimiter: string
}

export interface ServiceConfig {
  /** Completion marker on the service's persistent volume */
  marker: string
  credentials?: CredentialConfig
  probe: ProbeConfig
  setup: SetupConfig
  retry?: Partial<RetryPolicy>
}

export interface BatchConfig {
  /** Environment variable holding the comma-separated unit list */
  units: string
  probe?: ProbeConfig
  operation: UnitOperationConfig
  retry?: Partial<RetryPolicy>
}

// ============================================================================
// Configuration
// ============================================================================

export interface StackseedConfig {
  version: string
  /** Checked-in template (source of truth for keys) */
  template: string
  /** Generated environment file */
  output: string
  /** Orchestration descriptor scanned for ${VAR} references */
  descriptor: string
  secrets: {
    provided: ProvidedSourceConfig[]
    cacheDir: string
    derived: DerivedSecretConfig[]
  }
  credentials: {
    /** Credential-class keys; when unset, template keys ending in a provided suffix */
    keys?: string[]
    sentinel: string
  }
  /** Ordered KEY -> pattern map; patterns reference resolved values as ${NAME} */
  composites: Array<{ key: string; pattern: string }>
  validation: {
    ignore: string[]
  }
  retry: RetryPolicy
  services: Record<string, ServiceConfig>
  batches: Record<string, BatchConfig>
}

// ============================================================================
// CLI Types
// ============================================================================

export interface CLIArgs {
  _: string[]
  path?: string
  'env-file'?: string
  verbose?: boolean
  quiet?: boolean
  json?: boolean
  'dry-run'?: boolean
  force?: boolean
  strict?: boolean
}
