/**
 * Stackseed `generate` Command
 *
 * Usage:
 *   stackseed generate              Write .env from the template
 *   stackseed generate --dry-run    Print the result, write nothing
 *   stackseed generate --json       Machine-readable report
 */

import type { ValueOrigin } from '../../types.js'
import { EXIT_CODES } from '../../lib/errors.js'
import { optionsFromConfig, resolveEnvironment, writeGeneratedEnvironment } from '../../lib/derive.js'
import { c, print, symbols } from '../lib/colors.js'
import { displayPath, type CommandContext } from '../lib/context.js'
import * as ui from '../ui.js'

const ORIGINS: ValueOrigin[] = ['provided', 'sentinel', 'derived', 'composite', 'template']

export function countByOrigin(provenance: ReadonlyMap<string, ValueOrigin>): Record<ValueOrigin, number> {
  const counts: Record<ValueOrigin, number> = { template: 0, provided: 0, sentinel: 0, derived: 0, composite: 0 }
  for (const origin of provenance.values()) {
    counts[origin]++
  }
  return counts
}

export async function runGenerate(context: CommandContext): Promise<number> {
  const { loaded, envFile, dryRun, jsonOutput, verbose } = context

  const { environment, warnings, missing } = resolveEnvironment(
    optionsFromConfig(loaded.config, loaded.root, !dryRun)
  )

  if (!dryRun) {
    writeGeneratedEnvironment(envFile, environment)
  }

  const counts = countByOrigin(environment.provenance)

  if (jsonOutput) {
    ui.output(JSON.stringify({
      file: envFile,
      written: !dryRun,
      counts,
      provenance: Object.fromEntries(environment.provenance),
      warnings,
      missing
    }, null, 2))
    return EXIT_CODES.success
  }

  for (const warning of warnings) {
    print.warning(warning.message)
  }

  if (dryRun) {
    ui.outputRaw(environment.content)
    ui.log(c.muted(`Dry run: ${displayPath(context, envFile)} not written, derived secrets not cached`))
    return EXIT_CODES.success
  }

  if (verbose) {
    for (const [key, origin] of environment.provenance) {
      if (origin !== 'template') {
        ui.log(`  ${symbols.bullet} ${c.key(key)} ${c.label(`(${origin})`)}`)
      }
    }
  }

  const summary = ORIGINS
    .filter(origin => counts[origin] > 0)
    .map(origin => `${counts[origin]} ${origin}`)
    .join(', ')
  print.success(`Generated ${displayPath(context, envFile)} (${summary || 'empty template'})`)

  if (counts.sentinel > 0) {
    ui.log(c.muted(`${counts.sentinel} credential(s) not configured; add files under the provided-secrets directory`))
  }

  return EXIT_CODES.success
}
