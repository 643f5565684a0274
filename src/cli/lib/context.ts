/**
 * Stackseed CLI - Command context
 */

import path from 'node:path'
import type { CLIArgs } from '../../types.js'
import type { LoadedConfig } from '../../lib/config-loader.js'

export interface CommandContext {
  args: CLIArgs
  loaded: LoadedConfig
  /** Generated environment file (config output unless --env-file) */
  envFile: string
  verbose: boolean
  quiet: boolean
  jsonOutput: boolean
  dryRun: boolean
  force: boolean
}

/**
 * Path relative to the project root, for display
 */
export function displayPath(context: CommandContext, filePath: string): string {
  const relative = path.relative(context.loaded.root, filePath)
  return relative && !relative.startsWith('..') ? relative : filePath
}
