/**
 * Stackseed `check` Command
 *
 * Validates an already generated environment file against the descriptor.
 * Missing variables are warnings; --strict turns them into a failure.
 */

import fs from 'node:fs'
import { EXIT_CODES, EnvFileNotFoundError } from '../../lib/errors.js'
import { readEnvFile } from '../../lib/env-parser.js'
import { checkDescriptor } from '../../lib/descriptor.js'
import { credentialKeys, isSentinel } from '../../lib/derive.js'
import { c, print } from '../lib/colors.js'
import { displayPath, type CommandContext } from '../lib/context.js'
import * as ui from '../ui.js'

export async function runCheck(context: CommandContext, strict: boolean): Promise<number> {
  const { loaded, envFile, jsonOutput } = context
  const { config } = loaded

  if (!fs.existsSync(envFile)) {
    throw new EnvFileNotFoundError(envFile)
  }

  const env = readEnvFile(envFile)
  const result = checkDescriptor(config.descriptor, Object.keys(env), config.validation.ignore)

  const suffixes = config.secrets.provided.map(source => source.suffix)
  const unconfigured = credentialKeys(new Set(Object.keys(env)), config.credentials.keys, suffixes)
    .filter(key => isSentinel(env[key], config.credentials.sentinel))

  const failed = strict && result.missing.length > 0
  const exitCode = failed ? EXIT_CODES.failure : EXIT_CODES.success

  if (jsonOutput) {
    ui.output(JSON.stringify({
      file: envFile,
      required: result.required ?? null,
      missing: result.missing,
      unconfigured,
      warnings: result.warnings,
      ok: !failed
    }, null, 2))
    return exitCode
  }

  for (const warning of result.warnings) {
    print.warning(warning.message)
  }

  for (const key of unconfigured) {
    ui.log(c.muted(`${key} is not configured (${config.credentials.sentinel})`))
  }

  if (result.required !== undefined && result.missing.length === 0) {
    print.success(`${displayPath(context, envFile)} provides all ${result.required.length} variable(s) referenced by ${displayPath(context, config.descriptor)}`)
  } else if (failed) {
    print.error(`${result.missing.length} variable(s) missing (--strict)`)
  }

  return exitCode
}
