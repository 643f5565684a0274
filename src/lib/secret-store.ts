/**
 * Stackseed - Derived Secret Store
 *
 * One file per generated value, content is the literal secret. Values are
 * published with an exclusive link: when two runs race on an empty cache,
 * exactly one write wins and both runs return the winner's value.
 */

import crypto from 'node:crypto'
import fs from 'node:fs'
import path from 'node:path'

const ALPHANUMERIC = 'ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz0123456789'

export const DEFAULT_SECRET_LENGTH = 32

export interface SecretStore {
  /** Return the cached value for name, creating it with generate() when absent */
  getOrCreate(name: string, generate: () => string): string
  /** Whether a value is cached for name */
  has(name: string): boolean
  /** Cached value names */
  list(): string[]
}

/**
 * Random [A-Za-z0-9] string from the CSPRNG
 */
export function generateSecret(length: number = DEFAULT_SECRET_LENGTH): string {
  if (!Number.isInteger(length) || length <= 0) {
    throw new RangeError(`Secret length must be a positive integer, got ${length}`)
  }

  let result = ''
  for (let i = 0; i < length; i++) {
    result += ALPHANUMERIC[crypto.randomInt(ALPHANUMERIC.length)]
  }
  return result
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error
}

/**
 * Directory-backed secret store
 */
export class FileSecretStore implements SecretStore {
  constructor(readonly dir: string) {}

  pathFor(name: string): string {
    if (!name || name !== path.basename(name) || name.startsWith('.')) {
      throw new Error(`Invalid secret name: "${name}"`)
    }
    return path.join(this.dir, name)
  }

  getOrCreate(name: string, generate: () => string): string {
    const filePath = this.pathFor(name)

    const cached = this.read(filePath)
    if (cached !== undefined) {
      return cached
    }

    fs.mkdirSync(this.dir, { recursive: true })
    const value = generate()

    // The value is written in full under a temporary name, then linked into
    // place; link fails with EEXIST, so the cache file never appears partial
    const tempPath = path.join(this.dir, `.${name}.${process.pid}.${crypto.randomUUID()}.tmp`)
    fs.writeFileSync(tempPath, value, { flag: 'wx', mode: 0o600 })
    try {
      fs.linkSync(tempPath, filePath)
      return value
    } catch (error) {
      if (isErrnoException(error) && error.code === 'EEXIST') {
        // Lost the race: another run created it first
        const winner = this.read(filePath)
        if (winner !== undefined) {
          return winner
        }
      }
      throw error
    } finally {
      fs.rmSync(tempPath, { force: true })
    }
  }

  has(name: string): boolean {
    return fs.existsSync(this.pathFor(name))
  }

  list(): string[] {
    if (!fs.existsSync(this.dir)) {
      return []
    }
    return fs.readdirSync(this.dir, { withFileTypes: true })
      .filter(entry => entry.isFile() && !entry.name.startsWith('.'))
      .map(entry => entry.name)
      .sort()
  }

  private read(filePath: string): string | undefined {
    try {
      return fs.readFileSync(filePath, 'utf-8').replace(/[\r\n]/g, '')
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        return undefined
      }
      throw error
    }
  }
}

/**
 * Read-through view of another store that never persists: cached values are
 * returned, missing ones are generated for this run only
 */
export class EphemeralSecretStore implements SecretStore {
  private readonly generated = new Map<string, string>()

  constructor(private readonly base: SecretStore) {}

  getOrCreate(name: string, generate: () => string): string {
    if (this.base.has(name)) {
      return this.base.getOrCreate(name, generate)
    }
    let value = this.generated.get(name)
    if (value === undefined) {
      value = generate()
      this.generated.set(name, value)
    }
    return value
  }

  has(name: string): boolean {
    return this.generated.has(name) || this.base.has(name)
  }

  list(): string[] {
    return [...new Set([...this.base.list(), ...this.generated.keys()])].sort()
  }
}
