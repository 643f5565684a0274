/**
 * CLI UI utilities
 *
 * Data goes to stdout, everything else to stderr. Initializers usually run
 * in containers without a TTY, so diagnostics are written regardless of the
 * terminal and only --quiet silences them.
 */

let quiet = false
let verboseEnabled = false

export function setQuiet(value: boolean): void {
  quiet = value
}

export function setVerbose(value: boolean): void {
  verboseEnabled = value
}

/**
 * Output data to stdout (for pipes)
 * This is the ONLY function that should write to stdout for data
 */
export function output(data: string): void {
  process.stdout.write(data + '\n')
}

/**
 * Output raw data without newline
 */
export function outputRaw(data: string): void {
  process.stdout.write(data)
}

/**
 * Log message to stderr (doesn't interfere with pipes)
 */
export function log(message: string): void {
  if (!quiet) {
    console.error(message)
  }
}

/**
 * Log verbose message (only with --verbose)
 */
export function verbose(message: string): void {
  if (verboseEnabled && !quiet) {
    console.error(`[stackseed] ${message}`)
  }
}

/**
 * Format key-value pairs
 */
export function formatKeyValue(pairs: Array<[string, string]>, separator = ':'): string {
  if (pairs.length === 0) {
    return ''
  }
  const maxKeyLen = Math.max(...pairs.map(([k]) => k.length))
  return pairs
    .map(([k, v]) => `${k.padEnd(maxKeyLen)} ${separator} ${v}`)
    .join('\n')
}

/**
 * Print a styled header
 */
export function header(text: string): void {
  log(`\n${text}\n${'─'.repeat(text.length)}`)
}
