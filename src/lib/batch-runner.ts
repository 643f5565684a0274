/**
 * Batch Runner
 *
 * Runs one operation per unit (e.g. one model pull per name), sequentially.
 * A failing unit is recorded and the batch moves on; only the summary at the
 * end reports the overall result.
 */

import type { RetryPolicy } from '../types.js'
import { EXIT_CODES, ReadinessTimeoutError, StackseedError, toError, wrapError } from './errors.js'
import type { ReadinessProbe } from './probes.js'
import { runChecked, type CommandRunner } from './process.js'
import { renderPlaceholders } from './placeholders.js'
import { pollUntilReady } from './timeout.js'

export interface BatchOperation<T> {
  unit: string
  result?: T
  error?: Error
  duration: number
}

export interface BatchResult<T> {
  total: number
  successful: number
  failed: number
  operations: BatchOperation<T>[]
}

export type OperationFn<T> = (unit: string) => Promise<T>

/**
 * Run an operation for every unit, in order
 */
export async function runBatch<T>(
  units: string[],
  operation: OperationFn<T>,
  options: {
    onProgress?: (completed: number, total: number, current: string) => void
    onUnitDone?: (op: BatchOperation<T>) => void
    now?: () => number
  } = {}
): Promise<BatchResult<T>> {
  const { onProgress, onUnitDone, now = Date.now } = options

  const operations: BatchOperation<T>[] = []
  let successful = 0
  let failed = 0

  for (let i = 0; i < units.length; i++) {
    const unit = units[i]
    onProgress?.(i, units.length, unit)

    const startTime = now()
    let op: BatchOperation<T>

    try {
      const result = await operation(unit)
      op = { unit, result, duration: now() - startTime }
      successful++
    } catch (err) {
      op = { unit, error: toError(err), duration: now() - startTime }
      failed++
    }

    operations.push(op)
    onUnitDone?.(op)
  }

  return {
    total: units.length,
    successful,
    failed,
    operations
  }
}

/**
 * Format batch result for display
 */
export function formatBatchResult<T>(
  result: BatchResult<T>,
  formatItem?: (op: BatchOperation<T>) => string
): string {
  const lines: string[] = []

  lines.push('')
  lines.push(`Batch Summary:`)
  lines.push(`  Total:      ${result.total}`)
  lines.push(`  Successful: ${result.successful}`)
  lines.push(`  Failed:     ${result.failed}`)
  lines.push('')

  if (result.failed > 0) {
    lines.push('Failures:')
    for (const op of result.operations) {
      if (op.error) {
        lines.push(`  ✗ ${op.unit}: ${op.error.message}`)
      }
    }
    lines.push('')
  }

  if (formatItem) {
    lines.push('Details:')
    for (const op of result.operations) {
      lines.push(`  ${formatItem(op)}`)
    }
  }

  return lines.join('\n')
}

/**
 * Format batch result as JSON
 */
export function formatBatchResultJson<T>(result: BatchResult<T>): object {
  return {
    total: result.total,
    successful: result.successful,
    failed: result.failed,
    operations: result.operations.map(op => ({
      unit: op.unit,
      success: !op.error,
      error: op.error?.message,
      duration: op.duration
    }))
  }
}

// =============================================================================
// Unit operations
// =============================================================================

export interface UnitOperation {
  readonly description: string
  run(unit: string): Promise<void>
}

/**
 * Run a command per unit; `${unit}` in the arguments is replaced by the unit
 */
export class CommandUnitOperation implements UnitOperation {
  readonly description: string

  constructor(
    private readonly runner: CommandRunner,
    private readonly command: string,
    private readonly args: string[]
  ) {
    this.description = [command, ...args].join(' ')
  }

  async run(unit: string): Promise<void> {
    const args = this.args.map(arg => renderPlaceholders(arg, name => (name === 'unit' ? unit : undefined)).value)
    await runChecked(this.runner, this.command, args)
  }
}

/**
 * Pull a model through the Ollama HTTP API (POST /api/pull)
 */
export class OllamaPullOperation implements UnitOperation {
  readonly description: string

  constructor(
    private readonly baseUrl: string,
    private readonly fetchImpl: typeof fetch = fetch
  ) {
    this.description = `pull via ${baseUrl}`
  }

  async run(unit: string): Promise<void> {
    const url = `${this.baseUrl.replace(/\/+$/, '')}/api/pull`
    const response = await this.fetchImpl(url, {
      method: 'POST',
      headers: { 'content-type': 'application/json' },
      body: JSON.stringify({ model: unit, stream: false })
    })

    if (!response.ok) {
      const body = (await response.text()).trim()
      throw new Error(`pull of ${unit} failed with HTTP ${response.status}${body ? `: ${body}` : ''}`)
    }
  }
}

// =============================================================================
// Batch initializer
// =============================================================================

export type BatchOutcome = 'completed' | 'partial' | 'empty' | 'timeout' | 'failed'

/** What to wait on and run, resolved only when the unit list is not empty */
export interface BatchPlan {
  operation: UnitOperation
  /** Waited on once before the first unit */
  probe?: ReadinessProbe
}

export interface BatchInitializerOptions {
  name: string
  units: string[]
  plan: () => BatchPlan
  retry: RetryPolicy
  onRetry?: (attempt: number, error: Error, delayMs: number) => void
  onProgress?: (completed: number, total: number, current: string) => void
  onUnitDone?: (op: BatchOperation<void>) => void
  sleep?: (ms: number) => Promise<void>
  now?: () => number
}

export interface BatchRunResult {
  name: string
  outcome: BatchOutcome
  batch: BatchResult<void>
  /** Set when planning or readiness failed and no unit ran */
  error?: StackseedError
  exitCode: number
}

/**
 * Wait for readiness once, then run every unit. Exit code is non-zero when
 * readiness failed or any unit failed.
 */
export async function runBatchInitializer(options: BatchInitializerOptions): Promise<BatchRunResult> {
  const empty: BatchResult<void> = { total: 0, successful: 0, failed: 0, operations: [] }

  if (options.units.length === 0) {
    return { name: options.name, outcome: 'empty', batch: empty, exitCode: EXIT_CODES.success }
  }

  const fail = (error: unknown): BatchRunResult => {
    const wrapped = wrapError(error)
    return {
      name: options.name,
      outcome: error instanceof ReadinessTimeoutError ? 'timeout' : 'failed',
      batch: empty,
      error: wrapped,
      exitCode: wrapped.exitCode
    }
  }

  let plan: BatchPlan
  try {
    plan = options.plan()
  } catch (error) {
    return fail(error)
  }

  const probe = plan.probe
  if (probe) {
    try {
      await pollUntilReady(() => probe.check(), options.retry, {
        label: options.name,
        onRetry: options.onRetry,
        sleep: options.sleep,
        now: options.now
      })
    } catch (error) {
      return fail(error)
    }
  }

  const { operation } = plan
  const batch = await runBatch(options.units, unit => operation.run(unit), {
    onProgress: options.onProgress,
    onUnitDone: options.onUnitDone,
    now: options.now
  })

  return {
    name: options.name,
    outcome: batch.failed === 0 ? 'completed' : 'partial',
    batch,
    exitCode: batch.failed === 0 ? EXIT_CODES.success : EXIT_CODES.failure
  }
}
