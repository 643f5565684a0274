/**
 * Stackseed - Idempotent Service Initializer
 *
 * NOT_STARTED → CHECK_SENTINEL → WAITING_READY → INITIALIZING → COMPLETED
 *
 * Any state may fall to FAILED. A present completion marker short-circuits
 * CHECK_SENTINEL straight to COMPLETED without contacting the service, and
 * the marker is written only after the setup step succeeded, so a failed run
 * is retried from scratch next time.
 */

import type { InitializerState, RetryPolicy } from '../types.js'
import {
  EXIT_CODES,
  InitializationError,
  ReadinessTimeoutError,
  StackseedError,
  toError,
  wrapError
} from './errors.js'
import type { CompletionMarker } from './marker.js'
import type { ReadinessProbe } from './probes.js'
import type { SetupStep } from './steps.js'
import { pollUntilReady } from './timeout.js'

export type InitializerOutcome = 'completed' | 'skipped' | 'failed' | 'timeout'

const TRANSITIONS: Record<InitializerState, readonly InitializerState[]> = {
  NOT_STARTED: ['CHECK_SENTINEL'],
  CHECK_SENTINEL: ['WAITING_READY', 'COMPLETED', 'FAILED'],
  WAITING_READY: ['INITIALIZING', 'FAILED'],
  INITIALIZING: ['COMPLETED', 'FAILED'],
  COMPLETED: [],
  FAILED: []
}

/** What to probe and run, resolved only once the marker check has passed */
export interface InitializerPlan {
  probe: ReadinessProbe
  setup: SetupStep
}

export interface InitializerOptions {
  name: string
  marker: CompletionMarker
  /**
   * Builds probe and setup. Credentials are decoded here, so a malformed
   * credential fails the run before the service is contacted.
   */
  plan: () => InitializerPlan
  retry: RetryPolicy
  onTransition?: (from: InitializerState, to: InitializerState) => void
  onRetry?: (attempt: number, error: Error, delayMs: number) => void
  sleep?: (ms: number) => Promise<void>
  now?: () => number
}

export interface InitializerResult {
  service: string
  outcome: InitializerOutcome
  /** Final state, COMPLETED or FAILED */
  state: InitializerState
  /** Readiness attempts made (0 when skipped or failed before probing) */
  attempts: number
  durationMs: number
  error?: StackseedError
  exitCode: number
}

export class ServiceInitializer {
  private current: InitializerState = 'NOT_STARTED'

  constructor(private readonly options: InitializerOptions) {}

  get name(): string {
    return this.options.name
  }

  get state(): InitializerState {
    return this.current
  }

  private transition(to: InitializerState): void {
    const from = this.current
    if (!TRANSITIONS[from].includes(to)) {
      throw new Error(`Illegal initializer transition ${from} → ${to}`)
    }
    this.current = to
    this.options.onTransition?.(from, to)
  }

  async run(): Promise<InitializerResult> {
    const { name, marker } = this.options
    const now = this.options.now ?? Date.now
    const startedAt = now()
    let attempts = 0

    this.current = 'NOT_STARTED'

    const finish = (outcome: InitializerOutcome, error?: StackseedError): InitializerResult => ({
      service: name,
      outcome,
      state: this.current,
      attempts,
      durationMs: now() - startedAt,
      error,
      exitCode: error ? error.exitCode : EXIT_CODES.success
    })

    const fail = (error: StackseedError): InitializerResult => {
      this.transition('FAILED')
      return finish(error instanceof ReadinessTimeoutError ? 'timeout' : 'failed', error)
    }

    this.transition('CHECK_SENTINEL')
    if (marker.exists()) {
      this.transition('COMPLETED')
      return finish('skipped')
    }

    let plan: InitializerPlan
    try {
      plan = this.options.plan()
    } catch (error) {
      return fail(wrapError(error))
    }

    this.transition('WAITING_READY')
    try {
      const ready = await pollUntilReady(() => plan.probe.check(), this.options.retry, {
        label: name,
        onRetry: (attempt, error, delayMs) => {
          attempts = attempt
          this.options.onRetry?.(attempt, error, delayMs)
        },
        sleep: this.options.sleep,
        now: this.options.now
      })
      attempts = ready.attempts
    } catch (error) {
      if (error instanceof ReadinessTimeoutError) {
        attempts = error.attempts
      }
      return fail(wrapError(error))
    }

    this.transition('INITIALIZING')
    try {
      await plan.setup.run()
    } catch (error) {
      const cause = toError(error)
      return fail(new InitializationError(name, cause.message, cause))
    }

    try {
      marker.write()
    } catch (error) {
      const cause = toError(error)
      return fail(new InitializationError(name, `could not write completion marker ${marker.path}: ${cause.message}`, cause))
    }

    this.transition('COMPLETED')
    return finish('completed')
  }
}
