/**
 * Stackseed - Child processes
 *
 * Probes and setup steps that shell out (cypher-shell, psql, ...) go through
 * runCommand so tests can swap the runner.
 */

import { spawn } from 'node:child_process'

export interface CommandResult {
  exitCode: number
  /** Combined output, kept for error messages */
  output: string
}

export interface RunOptions {
  /** Kill the child with SIGKILL and reject once this elapses */
  timeoutMs?: number
}

export type CommandRunner = (
  command: string,
  args: string[],
  options?: RunOptions
) => Promise<CommandResult>

/** Output kept per command; older output is dropped */
const MAX_OUTPUT = 64 * 1024

export const runCommand: CommandRunner = (command, args, options = {}) => {
  return new Promise((resolve, reject) => {
    const child = spawn(command, args, { stdio: ['ignore', 'pipe', 'pipe'] })

    let timedOut = false
    const timer = options.timeoutMs === undefined
      ? undefined
      : setTimeout(() => {
        timedOut = true
        child.kill('SIGKILL')
      }, options.timeoutMs)

    let output = ''
    const collect = (chunk: Buffer) => {
      output = (output + chunk.toString('utf-8')).slice(-MAX_OUTPUT)
    }
    child.stdout.on('data', collect)
    child.stderr.on('data', collect)

    child.on('error', (err) => {
      clearTimeout(timer)
      reject(new Error(`Failed to execute ${command}: ${err.message}`, { cause: err }))
    })

    child.on('close', (code) => {
      clearTimeout(timer)
      if (timedOut) {
        reject(new Error(`${command} timed out after ${options.timeoutMs}ms`))
        return
      }
      resolve({ exitCode: code ?? 1, output: output.trim() })
    })
  })
}

/**
 * Run a command and fail on a non-zero exit code
 */
export async function runChecked(
  runner: CommandRunner,
  command: string,
  args: string[],
  options?: RunOptions
): Promise<string> {
  const result = await runner(command, args, options)
  if (result.exitCode !== 0) {
    const detail = result.output ? `: ${result.output.split('\n').slice(-3).join(' ')}` : ''
    throw new Error(`${command} exited with code ${result.exitCode}${detail}`)
  }
  return result.output
}
