import { writeFile, mkdir } from 'node:fs/promises'
import { dirname } from 'node:path'
import type { RunReport, ReportOptions, ReportedOutcome } from '../../types/report.js'
import type { ProcessingOutcome, RunOptions } from '../../types/run.js'
import type { DiscoveryResult } from '../../types/discovery.js'
import type { Reporter } from './base.js'

export const REPORT_VERSION = '1.0.0'

/**
 * Results of a run, as the orchestrator returns them
 */
export interface RunResultLike {
  discovery: DiscoveryResult
  outcomes: ProcessingOutcome[]
  summary: RunReport['summary']
  duration: number
}

function toReportedOutcome(outcome: ProcessingOutcome): ReportedOutcome {
  const reported: ReportedOutcome = {
    path: outcome.entry.relativePath,
    succeeded: outcome.succeeded,
    details: outcome.details,
    duration: outcome.duration
  }

  if (outcome.errorMessage !== undefined) {
    reported.error = outcome.errorMessage
  }
  if (outcome.failedStage !== undefined) {
    reported.failedStage = outcome.failedStage
  }
  if (outcome.file) {
    reported.sizeBytes = outcome.file.sizeBytes
    reported.lastModified = outcome.file.lastModified.toISOString()
    reported.contentHash = outcome.file.contentHash
  }

  return reported
}

/**
 * Assemble a run report
 */
export function buildRunReport(options: RunOptions, result: RunResultLike): RunReport {
  const { discovery } = result

  return {
    version: REPORT_VERSION,
    timestamp: new Date().toISOString(),
    input: options.inputRoot,
    output: options.outputRoot,
    discovery: {
      status: discovery.status,
      skipped: discovery.status === 'partial' ? discovery.skipped : [],
      ...(discovery.status === 'failed' ? { error: discovery.error } : {})
    },
    summary: result.summary,
    outcomes: result.outcomes.map(toReportedOutcome),
    duration: result.duration
  }
}

/**
 * JSON Reporter for run results
 */
export class JsonReporter implements Reporter {
  private readonly defaultOptions: ReportOptions = {
    pretty: true
  }

  /**
   * Generate JSON string from run report
   */
  generate(report: RunReport, options?: Partial<ReportOptions>): string {
    const opts = { ...this.defaultOptions, ...options }

    if (opts.pretty) {
      return JSON.stringify(report, null, 2)
    }

    return JSON.stringify(report)
  }

  /**
   * Write report to file or stdout
   */
  async write(report: RunReport, options?: Partial<ReportOptions>): Promise<void> {
    const opts = { ...this.defaultOptions, ...options }
    const json = this.generate(report, opts)

    if (opts.output) {
      await mkdir(dirname(opts.output), { recursive: true })
      await writeFile(opts.output, json + '\n', 'utf-8')
    } else if (!opts.quiet) {
      process.stdout.write(json + '\n')
    }
  }
}

/**
 * Create a new JSON reporter instance
 */
export function createJsonReporter(): JsonReporter {
  return new JsonReporter()
}
