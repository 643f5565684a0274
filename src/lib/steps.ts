/**
 * Stackseed - Setup steps
 *
 * The one-time procedure an initializer runs once its service is ready.
 * A step either completes or throws; partial work is redone on the next run,
 * so steps should tolerate objects that already exist.
 */

import type { BucketClient } from './s3.js'
import { runChecked, type CommandRunner } from './process.js'

export interface SetupStep {
  readonly description: string
  run(): Promise<void>
}

/**
 * Run a command, e.g. `cypher-shell ... --file /infra/init.cypher`
 */
export class CommandStep implements SetupStep {
  readonly description: string

  constructor(
    private readonly runner: CommandRunner,
    private readonly command: string,
    private readonly args: string[]
  ) {
    this.description = [command, ...args].join(' ')
  }

  async run(): Promise<void> {
    await runChecked(this.runner, this.command, this.args)
  }
}

export interface BucketSetupOptions {
  publicRead?: boolean
  onBucket?: (bucket: string, status: 'created' | 'exists') => void
}

/**
 * Create buckets, tolerating existing ones, and optionally open them for
 * anonymous reads
 */
export class BucketSetupStep implements SetupStep {
  readonly description: string

  constructor(
    private readonly client: BucketClient,
    private readonly buckets: string[],
    private readonly options: BucketSetupOptions = {}
  ) {
    this.description = `create buckets ${buckets.join(', ')}`
  }

  async run(): Promise<void> {
    for (const bucket of this.buckets) {
      const status = await this.client.createBucket(bucket)
      if (this.options.publicRead) {
        await this.client.setPublicRead(bucket)
      }
      this.options.onBucket?.(bucket, status)
    }
  }
}
