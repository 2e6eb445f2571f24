/**
 * Run command implementation
 *
 * Orchestrates the full run flow:
 * Paths → Config → Discovery → Pipeline (sequential) → Summary → Report
 */

import { resolve } from 'path'
import type { Command } from 'commander'
import type { GlobalOptions } from '../index.js'
import { ExitCode } from '../index.js'
import { createLogger } from '../../utils/logger.js'
import { ConfigLoader } from '../../core/config/loader.js'
import { createOrchestrator } from '../../core/runner/index.js'
import { ConsoleReporter } from '../../core/reporter/console.js'
import { JsonReporter, buildRunReport } from '../../core/reporter/json.js'
import type { RunOptions } from '../../types/index.js'
import { MissingInputError, ConfigLoadError, toErrorMessage } from '../../utils/errors.js'

const logger = createLogger('run')

/**
 * Run command options
 */
export interface RunCommandOptions {
  input: string
  output: string
  report?: string
}

/**
 * Turn user-supplied paths into absolute run options
 */
export function resolveRunOptions(
  input: string,
  output: string,
  cwd: string = process.cwd()
): RunOptions {
  return {
    inputRoot: resolve(cwd, input),
    outputRoot: resolve(cwd, output)
  }
}

/**
 * Execute run command
 */
export async function executeRun(
  options: RunCommandOptions,
  globalOptions: GlobalOptions
): Promise<number> {
  const runOptions = resolveRunOptions(options.input, options.output)

  try {
    const loader = new ConfigLoader()
    const config = globalOptions.config
      ? await loader.load(globalOptions.config)
      : await loader.loadDefault()

    if (globalOptions.verbose) {
      logger.debug(`Entry file name: ${config.discovery.fileName}`)
      logger.debug(`Stages: ${config.pipeline.stages.join(', ')}`)
    }

    // The logger drops progress lines under --quiet; errors still come through
    const orchestrator = createOrchestrator(config, { reporter: new ConsoleReporter() })
    const result = await orchestrator.run(runOptions)

    if (options.report) {
      const reporter = new JsonReporter()
      const reportPath = resolve(options.report)
      await reporter.write(buildRunReport(runOptions, result), { output: reportPath })
      if (globalOptions.verbose) {
        logger.info(`Report written to ${reportPath}`)
      }
    }

    return ExitCode.SUCCESS
  } catch (error) {
    if (error instanceof MissingInputError || error instanceof ConfigLoadError) {
      logger.error(error.message)
    } else {
      logger.error(`Run failed: ${toErrorMessage(error)}`)
    }
    return ExitCode.ERROR
  }
}

/**
 * Register run command on the program
 */
export function registerRunCommand(program: Command): void {
  program
    .command('run', { isDefault: true })
    .description('Process every entry.json under the input directory')
    .requiredOption('-i, --input <path>', 'Input directory to scan')
    .requiredOption('-o, --output <path>', 'Output directory for processed files')
    .option('-r, --report <file>', 'Write a JSON run report to this file')
    .action(async (options: RunCommandOptions) => {
      const globalOpts = program.opts<GlobalOptions>()
      const exitCode = await executeRun(options, globalOpts)
      process.exit(exitCode)
    })
}
