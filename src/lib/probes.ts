/**
 * Stackseed - Readiness probes
 *
 * A probe performs one real query against a service and rejects while the
 * service cannot answer it. A process that is up but not yet serving must
 * fail the probe; that is the difference to a container healthcheck.
 */

import type { BucketClient } from './s3.js'
import { runChecked, type CommandRunner } from './process.js'
import { withTimeout } from './timeout.js'

/** Upper bound for a single probe attempt */
export const DEFAULT_PROBE_TIMEOUT_MS = 10000

export interface ReadinessProbe {
  /** Shown in progress output */
  readonly description: string
  check(): Promise<void>
}

/**
 * Ready when the command exits 0 (e.g. `cypher-shell ... "RETURN 1;"`)
 */
export class CommandProbe implements ReadinessProbe {
  readonly description: string

  constructor(
    private readonly runner: CommandRunner,
    private readonly command: string,
    private readonly args: string[],
    private readonly timeoutMs: number = DEFAULT_PROBE_TIMEOUT_MS
  ) {
    this.description = `command ${command}`
  }

  async check(): Promise<void> {
    await runChecked(this.runner, this.command, this.args, { timeoutMs: this.timeoutMs })
  }
}

/**
 * Ready on any 2xx response
 */
export class HttpProbe implements ReadinessProbe {
  readonly description: string

  constructor(
    private readonly url: string,
    private readonly fetchImpl: typeof fetch = fetch,
    private readonly timeoutMs: number = DEFAULT_PROBE_TIMEOUT_MS
  ) {
    this.description = `GET ${url}`
  }

  async check(): Promise<void> {
    const response = await this.fetchImpl(this.url, { signal: AbortSignal.timeout(this.timeoutMs) })
    if (!response.ok) {
      throw new Error(`${this.description} returned HTTP ${response.status}`)
    }
  }
}

/**
 * Ready when an authenticated bucket listing succeeds
 */
export class S3Probe implements ReadinessProbe {
  readonly description: string

  constructor(
    private readonly client: BucketClient,
    endpoint: string,
    private readonly timeoutMs: number = DEFAULT_PROBE_TIMEOUT_MS
  ) {
    this.description = `list buckets at ${endpoint}`
  }

  async check(): Promise<void> {
    await withTimeout(this.client.listBuckets(), this.timeoutMs, this.description)
  }
}
