/**
 * Stackseed `init` Command
 *
 * Runs the one-time initializer of a configured service:
 *   stackseed init neo4j
 *   stackseed init minio --json
 *
 * Exit codes: 0 completed or already initialized, 1 setup failed,
 * 2 configuration or credential problem, 3 service never became ready.
 */

import path from 'node:path'
import { EXIT_CODES } from '../../lib/errors.js'
import { FileMarker } from '../../lib/marker.js'
import { createServiceInitializer, getService, loadRuntimeEnv } from '../../lib/services.js'
import type { InitializerResult } from '../../lib/initializer.js'
import { c, print, symbols } from '../lib/colors.js'
import type { CommandContext } from '../lib/context.js'
import * as ui from '../ui.js'

function formatResult(result: InitializerResult): string {
  switch (result.outcome) {
    case 'skipped':
      return `${result.service} already initialized (marker present)`
    case 'completed':
      return `${result.service} initialized after ${result.attempts} readiness attempt(s) in ${result.durationMs}ms`
    default:
      return result.error ? result.error.message : `${result.service} ${result.outcome}`
  }
}

export async function runInit(context: CommandContext, name: string | undefined): Promise<number> {
  const { loaded, envFile, jsonOutput, dryRun } = context
  const { config } = loaded

  if (!name) {
    print.error('Service name required')
    ui.log(`Usage: ${c.command('stackseed init <service>')}`)
    const names = Object.keys(config.services)
    if (names.length > 0) {
      ui.log(`Configured services: ${names.map(c.service).join(', ')}`)
    }
    return EXIT_CODES.input
  }

  if (dryRun) {
    const service = getService(config, name)
    const marker = new FileMarker(path.resolve(loaded.root, service.marker))
    ui.log(`${c.service(name)}: marker ${c.path(marker.path)} ${marker.exists() ? 'present, nothing to do' : 'absent'}`)
    ui.log(`  probe: ${service.probe.type}, setup: ${service.setup.type}`)
    return EXIT_CODES.success
  }

  const initializer = createServiceInitializer(config, name, {
    root: loaded.root,
    env: loadRuntimeEnv(envFile),
    sentinel: config.credentials.sentinel,
    onBucket: (bucket, status) => {
      ui.log(`  ${symbols.bullet} ${c.value(bucket)} ${status === 'created' ? 'created' : c.muted('already exists')}`)
    }
  }, {
    onTransition: (from, to) => ui.verbose(`${name}: ${from} ${symbols.arrow} ${to}`),
    onRetry: (attempt, error, delayMs) => {
      ui.log(c.muted(`${name} not ready (attempt ${attempt}): ${error.message}; retrying in ${delayMs}ms`))
    }
  })

  ui.log(`Initializing ${c.service(name)}...`)
  const result = await initializer.run()

  if (jsonOutput) {
    ui.output(JSON.stringify({
      service: result.service,
      outcome: result.outcome,
      state: result.state,
      attempts: result.attempts,
      durationMs: result.durationMs,
      error: result.error?.toJSON()
    }, null, 2))
    return result.exitCode
  }

  if (result.exitCode === EXIT_CODES.success) {
    print.success(formatResult(result))
  } else {
    print.error(formatResult(result))
    if (result.error?.suggestion) {
      ui.log(`  ${c.muted('Suggestion:')} ${result.error.suggestion}`)
    }
  }

  return result.exitCode
}
