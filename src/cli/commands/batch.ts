/**
 * Stackseed `batch` Command
 *
 * Runs a batch of independent units, e.g. model pulls:
 *   stackseed batch ollama
 *   stackseed pull ollama --json
 */

import { EXIT_CODES } from '../../lib/errors.js'
import { formatBatchResult, formatBatchResultJson, runBatchInitializer } from '../../lib/batch-runner.js'
import { createBatchOptions, loadRuntimeEnv } from '../../lib/services.js'
import { c, print, symbols } from '../lib/colors.js'
import type { CommandContext } from '../lib/context.js'
import * as ui from '../ui.js'

export async function runBatchCommand(context: CommandContext, name: string | undefined): Promise<number> {
  const { loaded, envFile, jsonOutput, dryRun } = context
  const { config } = loaded

  if (!name) {
    print.error('Batch name required')
    ui.log(`Usage: ${c.command('stackseed batch <name>')}`)
    return EXIT_CODES.input
  }

  const options = createBatchOptions(config, name, {
    root: loaded.root,
    env: loadRuntimeEnv(envFile),
    sentinel: config.credentials.sentinel
  })

  if (options.units.length === 0 && !jsonOutput) {
    ui.log(`No units listed in ${c.key(config.batches[name].units)}, nothing to do`)
    return EXIT_CODES.success
  }

  if (dryRun) {
    ui.log(`${c.service(name)}: ${options.plan().operation.description}`)
    for (const unit of options.units) {
      print.item(unit)
    }
    return EXIT_CODES.success
  }

  const result = await runBatchInitializer({
    ...options,
    onRetry: (attempt, error, delayMs) => {
      ui.log(c.muted(`${name} not ready (attempt ${attempt}): ${error.message}; retrying in ${delayMs}ms`))
    },
    onProgress: (completed, total, unit) => {
      ui.log(`[${completed + 1}/${total}] ${c.value(unit)}`)
    },
    onUnitDone: (op) => {
      if (op.error) {
        ui.log(`  ${symbols.error} ${op.unit}: ${op.error.message} (continuing)`)
      } else {
        ui.log(`  ${symbols.success} ${op.unit} ${c.muted(`${op.duration}ms`)}`)
      }
    }
  })

  if (jsonOutput) {
    ui.output(JSON.stringify({
      name,
      outcome: result.outcome,
      error: result.error?.toJSON(),
      ...formatBatchResultJson(result.batch)
    }, null, 2))
    return result.exitCode
  }

  if (result.error) {
    print.error(result.error.message)
    return result.exitCode
  }

  ui.log(formatBatchResult(result.batch))
  return result.exitCode
}
