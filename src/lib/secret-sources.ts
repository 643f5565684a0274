/**
 * Stackseed - Provided Secret Sources
 *
 * The derivation engine asks a registry of sources for operator-provided
 * secrets. The directory convention (secrets/api/anthropic → ANTHROPIC_API_KEY)
 * is one implementation; others can be registered alongside it.
 */

import fs from 'node:fs'
import path from 'node:path'
import type { ProvidedSecret, ProvidedSourceConfig } from '../types.js'

export const DEFAULT_PROVIDED_SUFFIX = '_API_KEY'

export interface SecretSource {
  /** Label used in reports */
  readonly name: string
  /** Suffix of the keys this source produces, when it follows a naming convention */
  readonly suffix?: string
  list(): ProvidedSecret[]
}

/**
 * Map a directory entry name to its template key
 */
export function keyForFile(fileName: string, suffix: string = DEFAULT_PROVIDED_SUFFIX): string {
  return `${fileName.toUpperCase()}${suffix}`
}

/**
 * One file per secret in a directory; the file name picks the key, the
 * trimmed content is the value. A missing directory provides nothing.
 */
export class DirectorySecretSource implements SecretSource {
  readonly name: string

  constructor(
    readonly dir: string,
    readonly suffix: string = DEFAULT_PROVIDED_SUFFIX,
    label?: string
  ) {
    this.name = label ?? dir
  }

  list(): ProvidedSecret[] {
    if (!fs.existsSync(this.dir)) {
      return []
    }

    return fs.readdirSync(this.dir, { withFileTypes: true })
      .filter(entry => entry.isFile() && !entry.name.startsWith('.'))
      .map(entry => entry.name)
      .sort()
      .map(fileName => ({
        key: keyForFile(fileName, this.suffix),
        value: fs.readFileSync(path.join(this.dir, fileName), 'utf-8').trim(),
        origin: path.join(this.name, fileName)
      }))
  }
}

/**
 * Ordered collection of sources. When two sources provide the same key the
 * later registration wins.
 */
export class SecretSourceRegistry {
  private readonly sources: SecretSource[] = []

  register(source: SecretSource): this {
    this.sources.push(source)
    return this
  }

  all(): readonly SecretSource[] {
    return this.sources
  }

  /** Suffixes declared by the registered sources */
  suffixes(): string[] {
    const suffixes = new Set<string>()
    for (const source of this.sources) {
      if (source.suffix) {
        suffixes.add(source.suffix)
      }
    }
    return [...suffixes]
  }

  collect(): ProvidedSecret[] {
    return this.sources.flatMap(source => source.list())
  }
}

/**
 * Build a registry from configured directories, resolved against root
 */
export function createSourceRegistry(configs: ProvidedSourceConfig[], root: string): SecretSourceRegistry {
  const registry = new SecretSourceRegistry()
  for (const config of configs) {
    const dir = path.resolve(root, config.dir)
    registry.register(new DirectorySecretSource(dir, config.suffix, path.relative(root, dir) || '.'))
  }
  return registry
}
