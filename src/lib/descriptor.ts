/**
 * Stackseed - Orchestration Descriptor Scanner
 *
 * Extracts the variables a compose file references so the generated
 * environment can be checked for completeness. The descriptor is only read,
 * never interpreted.
 */

import fs from 'node:fs'
import type { ValidationWarning } from '../types.js'

/** ${NAME} not preceded by another $ ($${NAME} is a literal in compose files) */
const REFERENCE = /(?<!\$)\$\{([A-Za-z_][A-Za-z0-9_]*)\}/g

/**
 * Sorted, de-duplicated variable names referenced in content
 */
export function extractRequiredVariables(content: string, ignore: readonly string[] = []): string[] {
  const names = new Set<string>()
  for (const match of content.matchAll(REFERENCE)) {
    if (!ignore.includes(match[1])) {
      names.add(match[1])
    }
  }
  return [...names].sort()
}

/**
 * Read a descriptor file; undefined when it does not exist
 */
export function readRequiredVariables(filePath: string, ignore: readonly string[] = []): string[] | undefined {
  if (!fs.existsSync(filePath)) {
    return undefined
  }
  return extractRequiredVariables(fs.readFileSync(filePath, 'utf-8'), ignore)
}

/**
 * Required names absent from the available keys, each listed once
 */
export function findMissingVariables(required: readonly string[], available: Iterable<string>): string[] {
  const present = new Set(available)
  return [...new Set(required)].filter(name => !present.has(name)).sort()
}

export interface DescriptorCheck {
  /** Undefined when the descriptor file does not exist */
  required?: string[]
  missing: string[]
  warnings: ValidationWarning[]
}

/**
 * Compare the keys of an environment with what the descriptor references.
 * Findings are warnings only.
 */
export function checkDescriptor(
  descriptorPath: string,
  availableKeys: Iterable<string>,
  ignore: readonly string[] = []
): DescriptorCheck {
  const required = readRequiredVariables(descriptorPath, ignore)
  if (required === undefined) {
    return {
      missing: [],
      warnings: [{
        code: 'descriptor-not-found',
        message: `Descriptor ${descriptorPath} not found, required variables not checked`
      }]
    }
  }

  const missing = findMissingVariables(required, availableKeys)
  return {
    required,
    missing,
    warnings: missing.map(name => ({
      code: 'missing-variable' as const,
      key: name,
      message: `${name} is referenced by the descriptor but missing from the environment`
    }))
  }
}
