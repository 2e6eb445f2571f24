#!/usr/bin/env node
/**
 * bilicache-tool CLI entry point
 *
 * Finds the entry.json files of a Bilibili cache directory and processes them
 */

import { realpathSync } from 'fs'
import { fileURLToPath } from 'url'
import { Command } from 'commander'
import { configureLogger, createLogger } from '../utils/logger.js'
import { toErrorMessage } from '../utils/errors.js'
import { createConfigLoader } from '../core/config/loader.js'
import { initCommand, DEFAULT_OUTPUT_FILENAME } from './commands/init.js'
import { registerRunCommand } from './commands/run.js'

/**
 * Exit codes for the CLI
 * - 0: run completed (per-file failures included)
 * - 1: bad arguments, missing input path, or unexpected error
 */
export const ExitCode = {
  SUCCESS: 0,
  ERROR: 1
} as const

export type ExitCodeType = (typeof ExitCode)[keyof typeof ExitCode]

/**
 * Global CLI options
 */
export interface GlobalOptions {
  verbose?: boolean
  quiet?: boolean
  config?: string
}

const logger = createLogger('cli')

/**
 * Create and configure the CLI program
 */
export function createProgram(): Command {
  const program = new Command()

  program
    .name('bct')
    .description('Batch processor for Bilibili cache entry.json files')
    .version('1.0.0')
    .option('-v, --verbose', 'Enable verbose output')
    .option('-q, --quiet', 'Suppress output except errors')
    .option('-c, --config <path>', 'Path to configuration file')
    .hook('preAction', () => {
      const globalOpts = program.opts<GlobalOptions>()
      configureLogger({
        quiet: globalOpts.quiet ?? false,
        level: globalOpts.verbose ? 'debug' : 'info'
      })
    })

  registerRunCommand(program)

  program
    .command('init')
    .description('Generate a default configuration file')
    .option('-o, --output <file>', 'Output file path', DEFAULT_OUTPUT_FILENAME)
    .option('--force', 'Overwrite existing file')
    .action(async (options: { output?: string; force?: boolean }) => {
      const globalOpts = program.opts<GlobalOptions>()

      const result = await initCommand({
        output: options.output,
        force: options.force
      })

      if (result.success) {
        if (!globalOpts.quiet) {
          logger.info(`Created configuration file: ${result.outputPath}`)
        }
        process.exit(ExitCode.SUCCESS)
      } else {
        logger.error(`Failed to create configuration file: ${result.error}`)
        process.exit(ExitCode.ERROR)
      }
    })

  program
    .command('validate <config>')
    .description('Validate a configuration file')
    .action(async (config: string) => {
      const globalOpts = program.opts<GlobalOptions>()
      const loader = createConfigLoader()
      const result = await loader.validate(config)

      if (result.valid) {
        if (!globalOpts.quiet) {
          logger.info(`✓ Configuration file is valid: ${config}`)
        }
        process.exit(ExitCode.SUCCESS)
      } else {
        logger.error(`✗ Configuration file is invalid: ${config}`)
        for (const error of result.errors) {
          logger.error(`  - ${error}`)
        }
        process.exit(ExitCode.ERROR)
      }
    })

  return program
}

/**
 * Run the CLI
 */
export async function run(args: string[] = process.argv): Promise<void> {
  const program = createProgram()

  try {
    await program.parseAsync(args)
  } catch (error) {
    logger.error(`CLI error: ${toErrorMessage(error)}`)
    process.exit(ExitCode.ERROR)
  }
}

/**
 * Whether this module is the script node was started with
 */
function isMainModule(): boolean {
  const script = process.argv[1]
  if (!script) {
    return false
  }
  try {
    return realpathSync(script) === realpathSync(fileURLToPath(import.meta.url))
  } catch {
    return false
  }
}

if (isMainModule()) {
  void run()
}
