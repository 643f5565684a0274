/**
 * Stackseed - .env Template Parser
 *
 * Parses KEY=value files into an ordered line model so a template can be
 * re-emitted with its comments and layout intact, and owns the one escaping
 * routine every written value goes through.
 */

import fs from 'node:fs'

const KEY_LINE = /^\s*(?:export\s+)?([A-Za-z_][A-Za-z0-9_]*)\s*=(.*)$/

/** Characters that can be written without quotes */
const SAFE_VALUE = /^[A-Za-z0-9_\-.:/@+,%=]*$/

export type TemplateLine =
  | { kind: 'entry'; key: string; value: string; raw: string }
  | { kind: 'text'; raw: string }

export interface ParsedEnv {
  [key: string]: string
}

/**
 * Parse file content into ordered lines. Comments, blank lines and anything
 * that is not a declaration are kept verbatim as text lines.
 */
export function parseTemplateString(content: string): TemplateLine[] {
  const rawLines = content.split(/\r?\n/)
  if (rawLines.length > 0 && rawLines[rawLines.length - 1] === '') {
    rawLines.pop()
  }

  return rawLines.map((raw): TemplateLine => {
    const trimmed = raw.trim()
    if (!trimmed || trimmed.startsWith('#')) {
      return { kind: 'text', raw }
    }

    const match = raw.match(KEY_LINE)
    if (!match) {
      return { kind: 'text', raw }
    }

    return { kind: 'entry', key: match[1], value: parseEnvValue(match[2]), raw }
  })
}

/**
 * Decode the right-hand side of a declaration
 *
 * - "double quoted": \\ \" \n \r \t are unescaped
 * - 'single quoted': literal
 * - bare: trailing ` # comment` removed
 */
export function parseEnvValue(rawValue: string): string {
  const value = rawValue.trim()

  if (value.startsWith('"')) {
    let result = ''
    for (let i = 1; i < value.length; i++) {
      const char = value[i]
      if (char === '\\' && i + 1 < value.length) {
        const next = value[i + 1]
        switch (next) {
          case 'n':
            result += '\n'
            break
          case 'r':
            result += '\r'
            break
          case 't':
            result += '\t'
            break
          case '"':
          case '\\':
            result += next
            break
          default:
            result += char + next
        }
        i++
      } else if (char === '"') {
        return result
      } else {
        result += char
      }
    }
    // No closing quote, keep what we have
    return result
  }

  if (value.startsWith("'")) {
    const closing = value.indexOf("'", 1)
    return closing === -1 ? value.slice(1) : value.slice(1, closing)
  }

  const comment = value.search(/\s#/)
  return comment === -1 ? value : value.slice(0, comment).trim()
}

/**
 * Encode a value for the right-hand side of a declaration.
 *
 * Anything outside the safe set is double-quoted with backslash, quote, LF
 * and CR escaped, so a value always stays on its own line.
 */
export function formatEnvValue(value: string): string {
  if (SAFE_VALUE.test(value)) {
    return value
  }

  const escaped = value
    .replace(/\\/g, '\\\\')
    .replace(/"/g, '\\"')
    .replace(/\n/g, '\\n')
    .replace(/\r/g, '\\r')

  return `"${escaped}"`
}

/**
 * Emit template lines, replacing the value of every declaration whose key has
 * an override. Untouched lines are written exactly as they were read.
 */
export function renderTemplate(lines: TemplateLine[], overrides: ReadonlyMap<string, string>): string {
  const out = lines.map(line => {
    if (line.kind === 'entry') {
      const value = overrides.get(line.key)
      if (value !== undefined) {
        return `${line.key}=${formatEnvValue(value)}`
      }
    }
    return line.raw
  })

  return out.length > 0 ? out.join('\n') + '\n' : ''
}

/**
 * Collapse lines into a key/value map (last declaration wins)
 */
export function toRecord(lines: TemplateLine[]): ParsedEnv {
  const result: ParsedEnv = {}
  for (const line of lines) {
    if (line.kind === 'entry') {
      result[line.key] = line.value
    }
  }
  return result
}

/**
 * Parse a .env string into a key/value map
 */
export function parseEnvString(content: string): ParsedEnv {
  return toRecord(parseTemplateString(content))
}

/**
 * Parse a .env file; a missing file yields an empty map
 */
export function readEnvFile(filePath: string): ParsedEnv {
  if (!fs.existsSync(filePath)) {
    return {}
  }
  return parseEnvString(fs.readFileSync(filePath, 'utf-8'))
}
