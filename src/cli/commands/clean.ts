/**
 * Stackseed `clean` Command
 *
 * Removes the generated environment file and the derived-secret cache.
 * Container volumes, and with them the completion markers, are left alone.
 * Without --force only lists what would be removed.
 */

import fs from 'node:fs'
import path from 'node:path'
import { EXIT_CODES } from '../../lib/errors.js'
import { FileSecretStore } from '../../lib/secret-store.js'
import { c, print } from '../lib/colors.js'
import { displayPath, type CommandContext } from '../lib/context.js'
import * as ui from '../ui.js'

export function cleanTargets(context: CommandContext): string[] {
  const { config } = context.loaded
  const targets: string[] = []

  if (fs.existsSync(context.envFile)) {
    targets.push(context.envFile)
  }

  const store = new FileSecretStore(config.secrets.cacheDir)
  for (const name of store.list()) {
    targets.push(path.join(config.secrets.cacheDir, name))
  }

  return targets
}

export async function runClean(context: CommandContext): Promise<number> {
  const { force, dryRun, jsonOutput } = context
  const targets = cleanTargets(context)
  const apply = force && !dryRun

  if (apply) {
    for (const target of targets) {
      fs.rmSync(target, { force: true })
    }
  }

  if (jsonOutput) {
    ui.output(JSON.stringify({ removed: apply, files: targets }, null, 2))
    return EXIT_CODES.success
  }

  if (targets.length === 0) {
    ui.log('Nothing to clean')
    return EXIT_CODES.success
  }

  for (const target of targets) {
    print.item(displayPath(context, target))
  }

  if (apply) {
    print.success(`Removed ${targets.length} file(s); derived secrets will be regenerated on the next run`)
  } else {
    ui.log(c.muted(`Would remove ${targets.length} file(s). Run with --force to delete.`))
  }

  return EXIT_CODES.success
}
