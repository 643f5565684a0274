#!/usr/bin/env node
/**
 * Stackseed CLI
 *
 * Derives the stack environment from its template and initializes services once
 */

import { createCLI, type CommandParseResult, type CLISchema } from 'cli-args-parser'
import fs from 'node:fs'
import path from 'node:path'
import { fileURLToPath } from 'node:url'
import type { CLIArgs } from '../types.js'
import { loadConfig } from '../lib/config-loader.js'
import { EXIT_CODES, exitCodeFor, formatErrorForCli, isStackseedError } from '../lib/errors.js'
import { c, print, stackseedFormatter } from './lib/colors.js'
import type { CommandContext } from './lib/context.js'
import * as ui from './ui.js'
import { runGenerate } from './commands/generate.js'
import { runCheck } from './commands/check.js'
import { runInit } from './commands/init.js'
import { runBatchCommand } from './commands/batch.js'
import { runStatus } from './commands/status.js'
import { runClean } from './commands/clean.js'

// Version is injected by the environment or read from package.json
const VERSION = process.env.STACKSEED_VERSION || getPackageVersion() || '0.0.0'

function getPackageVersion(): string | undefined {
  try {
    // Walk up from dist/cli or src/cli to the package root
    let dir = path.dirname(fileURLToPath(import.meta.url))
    for (let i = 0; i < 5; i++) {
      const pkgPath = path.join(dir, 'package.json')
      if (fs.existsSync(pkgPath)) {
        const pkg: unknown = JSON.parse(fs.readFileSync(pkgPath, 'utf-8'))
        if (pkg !== null && typeof pkg === 'object' && 'version' in pkg && typeof pkg.version === 'string') {
          return pkg.version
        }
        return undefined
      }
      dir = path.dirname(dir)
    }
    return undefined
  } catch (err) {
    ui.verbose(`Could not read package version: ${err instanceof Error ? err.message : String(err)}`)
    return undefined
  }
}

const cliSchema: CLISchema = {
  name: 'stackseed',
  version: VERSION,
  description: 'Derive stack environments from templates and initialize services exactly once',
  autoShort: false,
  strict: true,
  formatter: stackseedFormatter,
  help: {
    includeGlobalOptionsInCommands: true
  },

  // Global options available to all commands
  options: {
    help: {
      short: 'h',
      type: 'boolean',
      default: false,
      description: 'Show help'
    },
    version: {
      type: 'boolean',
      default: false,
      description: 'Show version'
    },
    path: {
      type: 'string',
      description: 'Project directory (default: current directory)'
    },
    'env-file': {
      type: 'string',
      description: 'Generated environment file (default: "output" from config, .env)'
    },
    verbose: {
      short: 'v',
      type: 'boolean',
      default: false,
      description: 'Enable verbose output'
    },
    quiet: {
      short: 'q',
      type: 'boolean',
      default: false,
      description: 'Suppress non-essential output (errors still shown)'
    },
    json: {
      type: 'boolean',
      default: false,
      description: 'Output in JSON format'
    },
    'dry-run': {
      type: 'boolean',
      default: false,
      description: 'Show what would be done without making changes'
    },
    force: {
      type: 'boolean',
      default: false,
      description: 'Confirm destructive operations'
    }
  },

  commands: {
    generate: {
      description: 'Generate the environment file from template and secrets',
      aliases: ['config']
    },
    check: {
      description: 'Validate the generated environment against the descriptor',
      options: {
        strict: {
          type: 'boolean',
          default: false,
          description: 'Exit 1 when referenced variables are missing'
        }
      }
    },
    init: {
      description: 'Wait for a service and run its one-time setup',
      positional: [
        { name: 'service', required: true, description: 'Service name from config' }
      ]
    },
    batch: {
      description: 'Run a batch operation for every listed unit',
      aliases: ['pull'],
      positional: [
        { name: 'name', required: true, description: 'Batch name from config' }
      ]
    },
    status: {
      description: 'Show secrets, generated file and service markers'
    },
    clean: {
      description: 'Remove the generated environment and derived-secret cache'
    }
  }
}

function optionRecord(values: object): Record<string, unknown> {
  return Object.fromEntries(Object.entries(values))
}

function stringOption(value: unknown): string | undefined {
  return typeof value === 'string' && value.length > 0 ? value : undefined
}

function booleanOption(value: unknown): boolean {
  return value === true
}

/**
 * Convert cli-args-parser result to CLIArgs format
 */
function toCliArgs(result: CommandParseResult): CLIArgs {
  const opts = optionRecord(result.options)
  const pos = optionRecord(result.positional)

  // Build the _ array: command + positional args
  const args: string[] = [...result.command]
  for (const value of Object.values(pos)) {
    if (typeof value === 'string') {
      args.push(value)
    }
  }

  return {
    _: args,
    path: stringOption(opts.path),
    'env-file': stringOption(opts['env-file']),
    verbose: booleanOption(opts.verbose),
    quiet: booleanOption(opts.quiet),
    json: booleanOption(opts.json),
    'dry-run': booleanOption(opts['dry-run']),
    force: booleanOption(opts.force),
    strict: booleanOption(opts.strict)
  }
}

// Create CLI instance
const cli = createCLI(cliSchema)

async function main(): Promise<number> {
  const result = cli.parse(process.argv.slice(2))
  const opts = optionRecord(result.options)
  const args = toCliArgs(result)

  // Apply working directory override before resolving config
  if (args.path) {
    const targetDir = path.resolve(args.path)
    if (!fs.existsSync(targetDir) || !fs.statSync(targetDir).isDirectory()) {
      print.error(`Path does not exist or is not a directory: ${targetDir}`)
      return EXIT_CODES.input
    }
    process.chdir(targetDir)
  }

  if (booleanOption(opts.version)) {
    ui.output(`stackseed v${VERSION}`)
    return EXIT_CODES.success
  }

  // Handle help before parse errors (before error check, so `init --help` works)
  if (booleanOption(opts.help) || result.command.length === 0) {
    ui.output(cli.help(result.command))
    return EXIT_CODES.success
  }

  if (result.errors.length > 0) {
    for (const error of result.errors) {
      print.error(error)
    }
    return EXIT_CODES.input
  }

  ui.setQuiet(args.quiet ?? false)
  ui.setVerbose(args.verbose ?? false)

  const loaded = loadConfig(process.cwd())
  ui.verbose(loaded.configPath ? `Config: ${loaded.configPath}` : `No config found, using defaults rooted at ${loaded.root}`)

  const context: CommandContext = {
    args,
    loaded,
    envFile: args['env-file'] ? path.resolve(args['env-file']) : loaded.config.output,
    verbose: args.verbose ?? false,
    quiet: args.quiet ?? false,
    jsonOutput: args.json ?? false,
    dryRun: args['dry-run'] ?? false,
    force: args.force ?? false
  }

  const [command, name] = args._
  switch (command) {
    case 'generate':
    case 'config':
      return runGenerate(context)

    case 'check':
      return runCheck(context, args.strict ?? false)

    case 'init':
      return runInit(context, name)

    case 'batch':
    case 'pull':
      return runBatchCommand(context, name)

    case 'status':
      return runStatus(context)

    case 'clean':
      return runClean(context)

    default:
      print.error(`Unknown command: ${c.command(command)}`)
      ui.log(`Run "${c.command('stackseed --help')}" for usage information`)
      return EXIT_CODES.input
  }
}

main()
  .then(code => {
    process.exitCode = code
  })
  .catch((err: unknown) => {
    if (isStackseedError(err)) {
      print.error(err.message)
      if (err.suggestion) {
        ui.log(`  ${c.muted('Suggestion:')} ${err.suggestion}`)
      }
      if (err.context) {
        ui.verbose(`Context: ${JSON.stringify(err.context)}`)
      }
    } else {
      print.error(formatErrorForCli(err))
    }
    process.exit(exitCodeFor(err))
  })
