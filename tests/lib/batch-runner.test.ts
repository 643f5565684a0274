/**
 * Tests for batch-runner.ts
 */

import { describe, it, expect, vi } from 'vitest'
import {
  runBatch,
  runBatchInitializer,
  formatBatchResult,
  formatBatchResultJson,
  CommandUnitOperation,
  OllamaPullOperation,
  type BatchOperation,
  type BatchPlan,
  type OperationFn,
  type UnitOperation
} from '../../src/lib/batch-runner.js'
import type { CommandRunner } from '../../src/lib/process.js'
import type { ReadinessProbe } from '../../src/lib/probes.js'
import { EXIT_CODES, MissingVariableError, ReadinessTimeoutError } from '../../src/lib/errors.js'

const retry = { initialDelayMs: 10, backoffMultiplier: 2, maxDelayMs: 100, maxAttempts: 3 }

function recordingOperation(failing: string[] = []): UnitOperation & { seen: string[] } {
  const seen: string[] = []
  return {
    description: 'recording',
    seen,
    async run(unit: string) {
      seen.push(unit)
      if (failing.includes(unit)) {
        throw new Error(`model ${unit} not found`)
      }
    }
  }
}

function fakeResponse(status: number, body = ''): Response {
  return new Response(body, { status })
}

describe('batch-runner', () => {
  describe('runBatch', () => {
    it('should run the operation on every unit in order', async () => {
      const operation: OperationFn<string> = async (unit) => `pulled-${unit}`

      const result = await runBatch(['llama3.2:1b', 'nomic-embed-text'], operation)

      expect(result.total).toBe(2)
      expect(result.successful).toBe(2)
      expect(result.failed).toBe(0)
      expect(result.operations.map(op => op.result)).toEqual(['pulled-llama3.2:1b', 'pulled-nomic-embed-text'])
    })

    it('should keep going after a failed unit', async () => {
      const operation = recordingOperation(['qwen2.5:0.5b'])

      const result = await runBatch(['llama3.2:1b', 'qwen2.5:0.5b', 'nomic-embed-text'], unit => operation.run(unit))

      expect(operation.seen).toEqual(['llama3.2:1b', 'qwen2.5:0.5b', 'nomic-embed-text'])
      expect(result.successful).toBe(2)
      expect(result.failed).toBe(1)
      expect(result.operations[1].error?.message).toBe('model qwen2.5:0.5b not found')
    })

    it('should report progress and completed units', async () => {
      const onProgress = vi.fn()
      const done: BatchOperation<void>[] = []
      let clock = 0

      await runBatch(['a', 'b'], async () => { clock += 5 }, {
        onProgress,
        onUnitDone: op => done.push(op),
        now: () => clock
      })

      expect(onProgress.mock.calls).toEqual([[0, 2, 'a'], [1, 2, 'b']])
      expect(done.map(op => [op.unit, op.duration])).toEqual([['a', 5], ['b', 5]])
    })
  })

  describe('formatBatchResult', () => {
    it('should list totals and failures', () => {
      const text = formatBatchResult({
        total: 3,
        successful: 2,
        failed: 1,
        operations: [
          { unit: 'a', duration: 1 },
          { unit: 'b', error: new Error('boom'), duration: 1 },
          { unit: 'c', duration: 1 }
        ]
      })

      expect(text.split('\n')).toEqual([
        '',
        'Batch Summary:',
        '  Total:      3',
        '  Successful: 2',
        '  Failed:     1',
        '',
        'Failures:',
        '  ✗ b: boom',
        ''
      ])
    })

    it('should omit the failures section when everything succeeded', () => {
      const text = formatBatchResult({ total: 1, successful: 1, failed: 0, operations: [{ unit: 'a', duration: 2 }] })

      expect(text).not.toContain('Failures:')
    })
  })

  describe('formatBatchResultJson', () => {
    it('should flatten operations', () => {
      const json = formatBatchResultJson({
        total: 2,
        successful: 1,
        failed: 1,
        operations: [
          { unit: 'a', duration: 3 },
          { unit: 'b', error: new Error('boom'), duration: 4 }
        ]
      })

      expect(json).toEqual({
        total: 2,
        successful: 1,
        failed: 1,
        operations: [
          { unit: 'a', success: true, error: undefined, duration: 3 },
          { unit: 'b', success: false, error: 'boom', duration: 4 }
        ]
      })
    })
  })

  describe('CommandUnitOperation', () => {
    it('should substitute the unit into the arguments', async () => {
      const runner = vi.fn<CommandRunner>(async () => ({ exitCode: 0, output: '' }))
      const operation = new CommandUnitOperation(runner, 'ollama', ['pull', '${unit}'])

      await operation.run('llama3.2:1b')

      expect(runner).toHaveBeenCalledWith('ollama', ['pull', 'llama3.2:1b'], undefined)
      expect(operation.description).toBe('ollama pull ${unit}')
    })

    it('should fail with the command output on a non-zero exit', async () => {
      const runner: CommandRunner = async () => ({ exitCode: 1, output: 'pulling manifest\nError: file does not exist' })
      const operation = new CommandUnitOperation(runner, 'ollama', ['pull', '${unit}'])

      await expect(operation.run('missing-model')).rejects.toThrow(
        'ollama exited with code 1: pulling manifest Error: file does not exist'
      )
    })
  })

  describe('OllamaPullOperation', () => {
    it('should POST the model name to /api/pull', async () => {
      const fetchImpl = vi.fn<typeof fetch>(async () => fakeResponse(200, '{"status":"success"}'))
      const operation = new OllamaPullOperation('http://ollama:11434/', fetchImpl)

      await operation.run('nomic-embed-text')

      expect(fetchImpl).toHaveBeenCalledWith('http://ollama:11434/api/pull', {
        method: 'POST',
        headers: { 'content-type': 'application/json' },
        body: '{"model":"nomic-embed-text","stream":false}'
      })
    })

    it('should fail with the status and body on an error response', async () => {
      const fetchImpl = vi.fn<typeof fetch>(async () => fakeResponse(500, 'pull model manifest: file does not exist\n'))
      const operation = new OllamaPullOperation('http://ollama:11434', fetchImpl)

      await expect(operation.run('missing-model')).rejects.toThrow(
        'pull of missing-model failed with HTTP 500: pull model manifest: file does not exist'
      )
    })
  })

  describe('runBatchInitializer', () => {
    it('should do nothing for an empty unit list', async () => {
      const probe: ReadinessProbe = { description: 'probe', check: vi.fn(async () => {}) }
      const plan = vi.fn<() => BatchPlan>(() => ({ operation: recordingOperation(), probe }))

      const result = await runBatchInitializer({
        name: 'ollama-models',
        units: [],
        plan,
        retry
      })

      expect(result.outcome).toBe('empty')
      expect(result.exitCode).toBe(EXIT_CODES.success)
      expect(plan).not.toHaveBeenCalled()
      expect(probe.check).not.toHaveBeenCalled()
    })

    it('should fail without running units when the plan cannot be built', async () => {
      const result = await runBatchInitializer({
        name: 'ollama-models',
        units: ['a'],
        plan: () => {
          throw new MissingVariableError(['OLLAMA_URL'], 'batch ollama-models')
        },
        retry
      })

      expect(result.outcome).toBe('failed')
      expect(result.exitCode).toBe(EXIT_CODES.input)
      expect(result.error).toBeInstanceOf(MissingVariableError)
      expect(result.batch.total).toBe(0)
    })

    it('should wait for readiness once and then run every unit', async () => {
      let calls = 0
      const probe: ReadinessProbe = {
        description: 'probe',
        check: vi.fn(async () => {
          calls++
          if (calls === 1) throw new Error('connection refused')
        })
      }
      const operation = recordingOperation()

      const result = await runBatchInitializer({
        name: 'ollama-models',
        units: ['a', 'b'],
        plan: () => ({ operation, probe }),
        retry,
        sleep: async () => {}
      })

      expect(result.outcome).toBe('completed')
      expect(result.exitCode).toBe(EXIT_CODES.success)
      expect(probe.check).toHaveBeenCalledTimes(2)
      expect(operation.seen).toEqual(['a', 'b'])
    })

    it('should report a partial batch with a failure exit code', async () => {
      const operation = recordingOperation(['b'])

      const result = await runBatchInitializer({
        name: 'ollama-models',
        units: ['a', 'b', 'c'],
        plan: () => ({ operation }),
        retry
      })

      expect(result.outcome).toBe('partial')
      expect(result.exitCode).toBe(EXIT_CODES.failure)
      expect(operation.seen).toEqual(['a', 'b', 'c'])
      expect(result.batch.failed).toBe(1)
    })

    it('should run no unit when readiness times out', async () => {
      const probe: ReadinessProbe = {
        description: 'probe',
        check: async () => { throw new Error('connection refused') }
      }
      const operation = recordingOperation()

      const result = await runBatchInitializer({
        name: 'ollama-models',
        units: ['a'],
        plan: () => ({ operation, probe }),
        retry,
        sleep: async () => {}
      })

      expect(result.outcome).toBe('timeout')
      expect(result.exitCode).toBe(EXIT_CODES.timeout)
      expect(result.error).toBeInstanceOf(ReadinessTimeoutError)
      expect(operation.seen).toEqual([])
    })
  })
})
