/**
 * Stackseed `status` Command
 *
 * Shows what a run would work with: config, template, generated file,
 * provided and derived secrets, unconfigured credentials and service markers.
 * Secret values are never printed.
 */

import fs from 'node:fs'
import path from 'node:path'
import { EXIT_CODES } from '../../lib/errors.js'
import { readEnvFile } from '../../lib/env-parser.js'
import { credentialKeys, isSentinel } from '../../lib/derive.js'
import { createSourceRegistry } from '../../lib/secret-sources.js'
import { FileSecretStore } from '../../lib/secret-store.js'
import { FileMarker } from '../../lib/marker.js'
import { parseUnitList } from '../../lib/credentials.js'
import { c, symbols } from '../lib/colors.js'
import { displayPath, type CommandContext } from '../lib/context.js'
import * as ui from '../ui.js'

export interface StatusReport {
  config: string | null
  template: { path: string; exists: boolean }
  envFile: { path: string; exists: boolean }
  provided: string[]
  derived: Array<{ key: string; file: string; cached: boolean }>
  unconfigured: string[]
  services: Array<{ name: string; marker: string; initialized: boolean }>
  batches: Array<{ name: string; variable: string; units: string[] }>
}

export function buildStatusReport(context: CommandContext): StatusReport {
  const { loaded, envFile } = context
  const { config, root } = loaded

  const store = new FileSecretStore(config.secrets.cacheDir)
  const env = readEnvFile(envFile)
  const suffixes = config.secrets.provided.map(source => source.suffix)

  return {
    config: loaded.configPath ?? null,
    template: { path: config.template, exists: fs.existsSync(config.template) },
    envFile: { path: envFile, exists: fs.existsSync(envFile) },
    provided: createSourceRegistry(config.secrets.provided, root).collect().map(secret => secret.key),
    derived: config.secrets.derived.map(definition => ({
      key: definition.key,
      file: definition.file,
      cached: store.has(definition.file)
    })),
    unconfigured: credentialKeys(new Set(Object.keys(env)), config.credentials.keys, suffixes)
      .filter(key => isSentinel(env[key], config.credentials.sentinel)),
    services: Object.entries(config.services).map(([name, service]) => {
      const marker = new FileMarker(path.resolve(root, service.marker))
      return { name, marker: marker.path, initialized: marker.exists() }
    }),
    batches: Object.entries(config.batches).map(([name, batch]) => ({
      name,
      variable: batch.units,
      units: parseUnitList(env[batch.units] ?? process.env[batch.units])
    }))
  }
}

function mark(ok: boolean): string {
  return ok ? symbols.success : symbols.error
}

export async function runStatus(context: CommandContext): Promise<number> {
  const report = buildStatusReport(context)

  if (context.jsonOutput) {
    ui.output(JSON.stringify(report, null, 2))
    return EXIT_CODES.success
  }

  ui.header('stackseed status')
  ui.log(ui.formatKeyValue([
    ['Config', report.config ? displayPath(context, report.config) : c.muted('(defaults)')],
    ['Template', `${mark(report.template.exists)} ${displayPath(context, report.template.path)}`],
    ['Environment', `${mark(report.envFile.exists)} ${displayPath(context, report.envFile.path)}`]
  ]))

  ui.header('Secrets')
  ui.log(`Provided: ${report.provided.length > 0 ? report.provided.map(c.key).join(', ') : c.muted('none')}`)
  for (const entry of report.derived) {
    ui.log(`  ${mark(entry.cached)} ${c.key(entry.key)} ${c.label(entry.cached ? 'cached' : 'generated on next run')}`)
  }
  if (report.unconfigured.length > 0) {
    ui.log(`Not configured: ${report.unconfigured.map(key => c.warning(key)).join(', ')}`)
  }

  if (report.services.length > 0) {
    ui.header('Services')
    for (const service of report.services) {
      ui.log(`  ${mark(service.initialized)} ${c.service(service.name)} ${c.label(service.initialized ? 'initialized' : 'pending')} ${c.muted(service.marker)}`)
    }
  }

  if (report.batches.length > 0) {
    ui.header('Batches')
    for (const batch of report.batches) {
      ui.log(`  ${symbols.bullet} ${c.service(batch.name)} ${c.label(`${batch.variable}=`)}${batch.units.join(',') || c.muted('(empty)')}`)
    }
  }

  return EXIT_CODES.success
}
