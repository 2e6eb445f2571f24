import type { RunEvent } from '../../types/events.js'
import type { RunReport, ReportOptions } from '../../types/report.js'

/**
 * Receives run events as they happen
 */
export interface ProgressReporter {
  handle(event: RunEvent): void
}

/**
 * Reporter that ignores every event
 */
export const nullReporter: ProgressReporter = {
  handle: () => {}
}

/**
 * Base interface for reporters that render a finished run
 */
export interface Reporter {
  /**
   * Generate a report from run results
   */
  generate(report: RunReport, options?: Partial<ReportOptions>): string

  /**
   * Write report to file or stdout
   */
  write(report: RunReport, options?: Partial<ReportOptions>): Promise<void>
}
