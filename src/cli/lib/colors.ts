/**
 * Stackseed CLI - Colors Utility
 *
 * Green theme, ANSI 256. Supports NO_COLOR and FORCE_COLOR.
 */

import type { Formatter } from 'cli-args-parser'

// Check if colors should be enabled
const isColorEnabled = (): boolean => {
  // Respect NO_COLOR standard
  if (process.env.NO_COLOR !== undefined) return false
  if (process.env.FORCE_COLOR !== undefined) return true
  // Diagnostics go to stderr, so that is the stream that decides
  return process.stderr.isTTY ?? false
}

const enabled = isColorEnabled()

/**
 * Palette (ANSI 256)
 *
 * - 35:  Sprout green  (#00AF5F): primary, commands
 * - 42:  Leaf green    (#00D787): keys, versions
 * - 71:  Moss          (#5FAF5F): secondary, services
 * - 151: Pale green    (#AFD7AF): values
 * - 245: Medium gray   (#8A8A8A): muted text
 */
const ansi = {
  bold: (s: string) => enabled ? `\x1b[1m${s}\x1b[22m` : s,
  dim: (s: string) => enabled ? `\x1b[2m${s}\x1b[22m` : s,

  sprout: (s: string) => enabled ? `\x1b[38;5;35m${s}\x1b[39m` : s,
  leaf: (s: string) => enabled ? `\x1b[38;5;42m${s}\x1b[39m` : s,
  moss: (s: string) => enabled ? `\x1b[38;5;71m${s}\x1b[39m` : s,
  paleGreen: (s: string) => enabled ? `\x1b[38;5;151m${s}\x1b[39m` : s,

  white: (s: string) => enabled ? `\x1b[97m${s}\x1b[39m` : s,
  gray: (s: string) => enabled ? `\x1b[38;5;245m${s}\x1b[39m` : s,
  lightGray: (s: string) => enabled ? `\x1b[38;5;252m${s}\x1b[39m` : s,

  // Semantic
  red: (s: string) => enabled ? `\x1b[91m${s}\x1b[39m` : s,
  green: (s: string) => enabled ? `\x1b[92m${s}\x1b[39m` : s,
  yellow: (s: string) => enabled ? `\x1b[93m${s}\x1b[39m` : s,
}

/**
 * Help/version formatter for cli-args-parser
 */
export const stackseedFormatter: Formatter = {
  'section-header': s => ansi.bold(ansi.white(s)),

  'program-name': s => ansi.bold(ansi.sprout(s)),
  'version': s => ansi.leaf(s),
  'description': s => ansi.lightGray(s),

  'command-name': s => ansi.sprout(s),
  'command-alias': s => ansi.gray(s),
  'command-description': s => ansi.lightGray(s),

  'option-flag': s => ansi.leaf(s),
  'option-type': s => ansi.moss(s),
  'option-default': s => ansi.dim(ansi.paleGreen(s)),
  'option-description': s => ansi.lightGray(s),

  'positional-name': s => ansi.moss(s),

  'error-header': s => ansi.bold(ansi.red(s)),
  'error-message': s => ansi.red(s),
  'error-option': s => ansi.sprout(s),
}

// Semantic colors
export const c = {
  command: (text: string) => ansi.bold(ansi.sprout(text)),
  key: (text: string) => ansi.leaf(text),
  value: (text: string) => ansi.paleGreen(text),
  service: (text: string) => ansi.moss(text),
  path: (text: string) => ansi.moss(text),

  success: (text: string) => ansi.green(text),
  error: (text: string) => ansi.red(text),
  warning: (text: string) => ansi.yellow(text),

  label: (text: string) => ansi.gray(text),
  muted: (text: string) => ansi.dim(text),
}

export const symbols = {
  success: enabled ? ansi.green('✓') : '[OK]',
  error: enabled ? ansi.red('✗') : '[ERROR]',
  warning: enabled ? ansi.yellow('⚠') : '[WARN]',
  bullet: enabled ? ansi.moss('•') : '*',
  arrow: enabled ? ansi.sprout('→') : '->',
}

/**
 * Status lines, all on stderr so stdout stays reserved for data
 */
export const print = {
  success: (msg: string) => console.error(`${symbols.success} ${c.success(msg)}`),
  error: (msg: string) => console.error(`${symbols.error} ${c.error(msg)}`),
  warning: (msg: string) => console.error(`${symbols.warning} ${c.warning(msg)}`),
  item: (text: string) => console.error(`  ${symbols.bullet} ${text}`),
}
