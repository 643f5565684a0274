/**
 * Stackseed - Stack bootstrap toolkit
 *
 * Main library exports for programmatic usage
 */

// Types
export type {
  ValueOrigin,
  ProvidedSecret,
  ProvidedSourceConfig,
  DerivedSecretConfig,
  WarningCode,
  ValidationWarning,
  InitializerState,
  RetryPolicy,
  ProbeConfig,
  SetupConfig,
  UnitOperationConfig,
  CredentialConfig,
  ServiceConfig,
  BatchConfig,
  StackseedConfig
} from './types.js'

// Config utilities
export { loadConfig, findConfigDir, normalizeConfig, DEFAULT_RAW_CONFIG } from './lib/config-loader.js'
export type { LoadedConfig } from './lib/config-loader.js'

// Environment derivation
export {
  resolveEnvironment,
  writeGeneratedEnvironment,
  optionsFromConfig,
  loadTemplate,
  credentialKeys,
  isSentinel,
  DEFAULT_SENTINEL
} from './lib/derive.js'
export type { ResolveOptions, ResolveResult, GeneratedEnvironment } from './lib/derive.js'

export {
  parseTemplateString,
  parseEnvValue,
  parseEnvString,
  formatEnvValue,
  renderTemplate,
  readEnvFile
} from './lib/env-parser.js'
export type { TemplateLine, ParsedEnv } from './lib/env-parser.js'

export { FileSecretStore, EphemeralSecretStore, generateSecret } from './lib/secret-store.js'
export type { SecretStore } from './lib/secret-store.js'

export { DirectorySecretSource, SecretSourceRegistry, createSourceRegistry, keyForFile } from './lib/secret-sources.js'
export type { SecretSource } from './lib/secret-sources.js'

export { extractRequiredVariables, findMissingVariables, checkDescriptor } from './lib/descriptor.js'
export { renderPlaceholders } from './lib/placeholders.js'

// Readiness & initialization
export { ServiceInitializer } from './lib/initializer.js'
export type { InitializerOptions, InitializerPlan, InitializerResult, InitializerOutcome } from './lib/initializer.js'

export {
  runBatch,
  runBatchInitializer,
  formatBatchResult,
  formatBatchResultJson,
  CommandUnitOperation,
  OllamaPullOperation
} from './lib/batch-runner.js'
export type { BatchResult, BatchRunResult, BatchInitializerOptions, BatchPlan, UnitOperation } from './lib/batch-runner.js'

export { pollUntilReady, delayFor, withTimeout, DEFAULT_RETRY_POLICY } from './lib/timeout.js'
export { CommandProbe, HttpProbe, S3Probe } from './lib/probes.js'
export type { ReadinessProbe } from './lib/probes.js'
export { CommandStep, BucketSetupStep } from './lib/steps.js'
export type { SetupStep } from './lib/steps.js'
export { S3BucketClient } from './lib/s3.js'
export type { BucketClient } from './lib/s3.js'
export { FileMarker } from './lib/marker.js'
export { parseCredentialPair, parseUnitList, requireCredential } from './lib/credentials.js'
export { createServiceInitializer, createBatchOptions, loadRuntimeEnv } from './lib/services.js'

// Errors
export * from './lib/errors.js'
