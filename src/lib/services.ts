/**
 * Stackseed - Service wiring
 *
 * Turns the services/batches sections of the config into runnable
 * initializers. Every string in a probe, setup or operation may reference the
 * runtime environment as ${NAME}; services with a combined credential also
 * get ${principal} and ${secret}.
 */

import path from 'node:path'
import type {
  BatchConfig,
  ProbeConfig,
  ServiceConfig,
  SetupConfig,
  StackseedConfig,
  UnitOperationConfig
} from '../types.js'
import { CredentialUnavailableError, MissingVariableError, UnknownServiceError } from './errors.js'
import { readEnvFile } from './env-parser.js'
import { FileMarker } from './marker.js'
import { CommandProbe, HttpProbe, S3Probe, type ReadinessProbe } from './probes.js'
import { runCommand, type CommandRunner } from './process.js'
import { S3BucketClient, type BucketClient, type S3Location } from './s3.js'
import { BucketSetupStep, CommandStep, type BucketSetupOptions, type SetupStep } from './steps.js'
import { layeredLookup, renderPlaceholders, type Lookup } from './placeholders.js'
import { parseCredentialPair, parseUnitList, requireCredential } from './credentials.js'
import { resolvePolicy } from './timeout.js'
import { ServiceInitializer, type InitializerOptions } from './initializer.js'
import {
  CommandUnitOperation,
  OllamaPullOperation,
  type BatchInitializerOptions,
  type UnitOperation
} from './batch-runner.js'

export type RuntimeEnv = Readonly<Record<string, string | undefined>>

export interface ServiceContext {
  /** Directory relative marker paths are resolved against */
  root: string
  env: RuntimeEnv
  sentinel: string
  runner?: CommandRunner
  fetchImpl?: typeof fetch
  createBucketClient?: (location: S3Location) => BucketClient
  /** Reported for every bucket a bucket setup step handles */
  onBucket?: BucketSetupOptions['onBucket']
}

type Callbacks = Pick<InitializerOptions, 'onTransition' | 'onRetry' | 'sleep' | 'now'>

/**
 * Generated environment file with the process environment layered on top
 */
export function loadRuntimeEnv(envFile: string, processEnv: NodeJS.ProcessEnv = process.env): RuntimeEnv {
  const merged: Record<string, string | undefined> = { ...readEnvFile(envFile) }
  for (const [key, value] of Object.entries(processEnv)) {
    if (value !== undefined) {
      merged[key] = value
    }
  }
  return merged
}

export class Renderer {
  constructor(
    private readonly lookup: Lookup,
    private readonly where: string,
    private readonly sentinel: string
  ) {}

  render(pattern: string): string {
    const referenced: string[] = []
    const result = renderPlaceholders(pattern, name => {
      referenced.push(name)
      return this.lookup(name)
    })
    if (result.missing.length > 0) {
      throw new MissingVariableError(result.missing, this.where)
    }
    for (const name of referenced) {
      if (this.lookup(name) === this.sentinel) {
        throw new CredentialUnavailableError(name)
      }
    }
    return result.value
  }

  /** Renderer that resolves the given names first */
  extend(values: Readonly<Record<string, string>>): Renderer {
    const fallback = this.lookup
    return new Renderer(name => values[name] ?? fallback(name), this.where, this.sentinel)
  }

  renderAll(patterns: string[]): string[] {
    return patterns.map(pattern => this.render(pattern))
  }
}

function s3Location(renderer: Renderer, config: { endpoint: string; accessKey: string; secretKey: string; region: string }): S3Location {
  return {
    endpoint: renderer.render(config.endpoint),
    accessKey: renderer.render(config.accessKey),
    secretKey: renderer.render(config.secretKey),
    region: renderer.render(config.region)
  }
}

function bucketClient(ctx: ServiceContext, location: S3Location): BucketClient {
  return ctx.createBucketClient ? ctx.createBucketClient(location) : new S3BucketClient(location)
}

export function createProbe(config: ProbeConfig, renderer: Renderer, ctx: ServiceContext): ReadinessProbe {
  switch (config.type) {
    case 'command':
      return new CommandProbe(ctx.runner ?? runCommand, renderer.render(config.command), renderer.renderAll(config.args))
    case 'http':
      return new HttpProbe(renderer.render(config.url), ctx.fetchImpl)
    case 's3': {
      const location = s3Location(renderer, config)
      return new S3Probe(bucketClient(ctx, location), location.endpoint)
    }
  }
}

export function createSetupStep(config: SetupConfig, renderer: Renderer, ctx: ServiceContext): SetupStep {
  switch (config.type) {
    case 'command':
      return new CommandStep(ctx.runner ?? runCommand, renderer.render(config.command), renderer.renderAll(config.args))
    case 'buckets':
      return new BucketSetupStep(bucketClient(ctx, s3Location(renderer, config)), renderer.renderAll(config.buckets), {
        publicRead: config.publicRead,
        onBucket: ctx.onBucket
      })
  }
}

export function createUnitOperation(config: UnitOperationConfig, renderer: Renderer, ctx: ServiceContext): UnitOperation {
  switch (config.type) {
    case 'command':
      // ${unit} stays in place and is filled per unit
      return new CommandUnitOperation(
        ctx.runner ?? runCommand,
        renderer.render(config.command),
        renderer.extend({ unit: '${unit}' }).renderAll(config.args)
      )
    case 'ollama':
      return new OllamaPullOperation(renderer.render(config.baseUrl), ctx.fetchImpl)
  }
}

/**
 * Renderer for a service: credential parts first, then the environment
 */
function serviceRenderer(name: string, service: ServiceConfig, ctx: ServiceContext): Renderer {
  const layers: Array<Record<string, string | undefined>> = []
  if (service.credentials) {
    const raw = requireCredential(ctx.env, service.credentials.var, ctx.sentinel)
    const { principal, secret } = parseCredentialPair(raw, service.credentials.delimiter, service.credentials.var)
    layers.push({ principal, secret })
  }
  layers.push(ctx.env)
  return new Renderer(layeredLookup(...layers), `service ${name}`, ctx.sentinel)
}

export function getService(config: StackseedConfig, name: string): ServiceConfig {
  const service = config.services[name]
  if (!service) {
    throw new UnknownServiceError('service', name, Object.keys(config.services))
  }
  return service
}

export function getBatch(config: StackseedConfig, name: string): BatchConfig {
  const batch = config.batches[name]
  if (!batch) {
    throw new UnknownServiceError('batch', name, Object.keys(config.batches))
  }
  return batch
}

/**
 * Build the initializer for a configured service. Nothing is rendered until
 * the initializer has checked its marker.
 */
export function createServiceInitializer(
  config: StackseedConfig,
  name: string,
  ctx: ServiceContext,
  callbacks: Callbacks = {}
): ServiceInitializer {
  const service = getService(config, name)

  return new ServiceInitializer({
    name,
    marker: new FileMarker(path.resolve(ctx.root, service.marker)),
    plan: () => {
      const renderer = serviceRenderer(name, service, ctx)
      return {
        probe: createProbe(service.probe, renderer, ctx),
        setup: createSetupStep(service.setup, renderer, ctx)
      }
    },
    retry: resolvePolicy(config.retry, service.retry),
    ...callbacks
  })
}

/**
 * Build the options for a configured batch; the unit list comes from the
 * environment variable the batch names. Operation and probe are rendered
 * only once there is a unit to run.
 */
export function createBatchOptions(
  config: StackseedConfig,
  name: string,
  ctx: ServiceContext
): BatchInitializerOptions {
  const batch = getBatch(config, name)
  const renderer = new Renderer(layeredLookup(ctx.env), `batch ${name}`, ctx.sentinel)

  return {
    name,
    units: parseUnitList(ctx.env[batch.units]),
    plan: () => ({
      operation: createUnitOperation(batch.operation, renderer, ctx),
      probe: batch.probe ? createProbe(batch.probe, renderer, ctx) : undefined
    }),
    retry: resolvePolicy(config.retry, batch.retry)
  }
}
