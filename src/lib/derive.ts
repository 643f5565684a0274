/**
 * Stackseed - Environment Derivation Engine
 *
 * template + provided secrets + derived secrets + composites → generated
 * environment. Steps run in a fixed order and each one only sees the values
 * resolved before it. The result is a structure that is serialized once;
 * the template file itself is never written.
 */

import fs from 'node:fs'
import path from 'node:path'
import type {
  DerivedSecretConfig,
  StackseedConfig,
  ValidationWarning,
  ValueOrigin
} from '../types.js'
import { TemplateNotFoundError } from './errors.js'
import { parseTemplateString, renderTemplate, toRecord, type ParsedEnv, type TemplateLine } from './env-parser.js'
import { EphemeralSecretStore, FileSecretStore, generateSecret, type SecretStore } from './secret-store.js'
import { createSourceRegistry, type SecretSourceRegistry } from './secret-sources.js'
import { layeredLookup, renderPlaceholders } from './placeholders.js'
import { checkDescriptor } from './descriptor.js'

export const DEFAULT_SENTINEL = 'NEED-API-KEY'

export interface ResolveOptions {
  templatePath: string
  sources: SecretSourceRegistry
  store: SecretStore
  derived: DerivedSecretConfig[]
  composites: Array<{ key: string; pattern: string }>
  credentials: {
    keys?: string[]
    sentinel: string
  }
  /** Orchestration descriptor; validation is skipped when omitted */
  descriptorPath?: string
  ignore?: string[]
}

export interface GeneratedEnvironment {
  /** Template layout the output is rendered from */
  lines: TemplateLine[]
  /** Values that differ from the template, by key */
  overrides: ReadonlyMap<string, string>
  provenance: ReadonlyMap<string, ValueOrigin>
  /** Fully resolved key/value map */
  values: ParsedEnv
  /** Serialized file content */
  content: string
}

export interface ResolveResult {
  environment: GeneratedEnvironment
  warnings: ValidationWarning[]
  /** Descriptor variables missing from the environment */
  missing: string[]
}

/**
 * Read and parse the template
 *
 * @throws TemplateNotFoundError when the file does not exist
 */
export function loadTemplate(templatePath: string): TemplateLine[] {
  if (!fs.existsSync(templatePath)) {
    throw new TemplateNotFoundError(templatePath)
  }
  return parseTemplateString(fs.readFileSync(templatePath, 'utf-8'))
}

/**
 * Credential-class keys present in the template. Without an explicit list,
 * every key ending in a provided-source suffix belongs to the class.
 */
export function credentialKeys(templateKeys: ReadonlySet<string>, keys: string[] | undefined, suffixes: string[]): string[] {
  if (keys) {
    return keys.filter(key => templateKeys.has(key))
  }
  return [...templateKeys].filter(key => suffixes.some(suffix => key.endsWith(suffix)))
}

/**
 * Whether a value is the "not configured" sentinel
 */
export function isSentinel(value: string | undefined, sentinel: string = DEFAULT_SENTINEL): boolean {
  return value === sentinel
}

/**
 * Run the derivation pipeline
 */
export function resolveEnvironment(options: ResolveOptions): ResolveResult {
  const lines = loadTemplate(options.templatePath)
  const templateValues = toRecord(lines)
  const templateKeys = new Set(Object.keys(templateValues))

  const warnings: ValidationWarning[] = []
  const overrides = new Map<string, string>()
  const provenance = new Map<string, ValueOrigin>()

  const assign = (key: string, value: string, origin: ValueOrigin) => {
    overrides.set(key, value)
    provenance.set(key, origin)
  }

  // Provided secrets
  for (const secret of options.sources.collect()) {
    if (!templateKeys.has(secret.key)) {
      warnings.push({
        code: 'unknown-secret',
        key: secret.key,
        message: `${secret.key} found in ${secret.origin} but not in template (skipped)`
      })
      continue
    }
    assign(secret.key, secret.value, 'provided')
  }

  // Credentials still unset get the sentinel
  const { sentinel } = options.credentials
  for (const key of credentialKeys(templateKeys, options.credentials.keys, options.sources.suffixes())) {
    const current = overrides.get(key) ?? templateValues[key]
    if (current === '' || current === sentinel) {
      assign(key, sentinel, 'sentinel')
    }
  }

  // Derived secrets, stable through the store
  const derivedValues: Record<string, string> = {}
  for (const definition of options.derived) {
    const value = options.store.getOrCreate(definition.file, () => generateSecret(definition.length))
    derivedValues[definition.key] = value
    if (templateKeys.has(definition.key)) {
      assign(definition.key, value, 'derived')
    }
  }

  // Composites from already resolved values
  const resolved: Record<string, string> = { ...templateValues, ...derivedValues, ...Object.fromEntries(overrides) }
  for (const composite of options.composites) {
    if (!templateKeys.has(composite.key)) {
      warnings.push({
        code: 'composite-not-in-template',
        key: composite.key,
        message: `Composite ${composite.key} is not declared in the template (skipped)`
      })
      continue
    }

    const rendered = renderPlaceholders(composite.pattern, layeredLookup(resolved))
    if (rendered.missing.length > 0) {
      warnings.push({
        code: 'composite-unresolved',
        key: composite.key,
        message: `Composite ${composite.key} references unresolved ${rendered.missing.join(', ')} (skipped)`
      })
      continue
    }

    assign(composite.key, rendered.value, 'composite')
    resolved[composite.key] = rendered.value
  }

  for (const key of templateKeys) {
    if (!provenance.has(key)) {
      provenance.set(key, 'template')
    }
  }

  const values: ParsedEnv = { ...templateValues, ...Object.fromEntries(overrides) }
  const environment: GeneratedEnvironment = {
    lines,
    overrides,
    provenance,
    values,
    content: renderTemplate(lines, overrides)
  }

  let missing: string[] = []
  if (options.descriptorPath) {
    const check = checkDescriptor(options.descriptorPath, Object.keys(values), options.ignore)
    missing = check.missing
    warnings.push(...check.warnings)
  }

  return { environment, warnings, missing }
}

/**
 * Options for a configured project. With `persist: false` new derived secrets
 * are generated for this run only and the cache is left untouched.
 */
export function optionsFromConfig(config: StackseedConfig, root: string, persist = true): ResolveOptions {
  const fileStore = new FileSecretStore(config.secrets.cacheDir)
  return {
    templatePath: config.template,
    sources: createSourceRegistry(config.secrets.provided, root),
    store: persist ? fileStore : new EphemeralSecretStore(fileStore),
    derived: config.secrets.derived,
    composites: config.composites,
    credentials: config.credentials,
    descriptorPath: config.descriptor,
    ignore: config.validation.ignore
  }
}

/**
 * Replace the environment file in one step (temp file + rename), so a failed
 * run never leaves a half-written file behind
 */
export function writeGeneratedEnvironment(filePath: string, environment: GeneratedEnvironment): void {
  fs.mkdirSync(path.dirname(filePath), { recursive: true })
  const tempPath = `${filePath}.${process.pid}.tmp`
  fs.writeFileSync(tempPath, environment.content, { mode: 0o600 })
  fs.renameSync(tempPath, filePath)
}
