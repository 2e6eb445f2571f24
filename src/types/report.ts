import type { DiscoveryStatus, SkippedPath } from './discovery.js'
import type { RunSummary, StageDetails } from './run.js'

/**
 * Per-entry line of a run report
 */
export interface ReportedOutcome {
  path: string
  succeeded: boolean
  error?: string
  failedStage?: string
  sizeBytes?: number
  lastModified?: string
  contentHash?: string
  details: StageDetails
  duration: number
}

/**
 * Complete run report
 */
export interface RunReport {
  /** Report version */
  version: string

  /** Timestamp of the run */
  timestamp: string

  input: string
  output: string

  discovery: {
    status: DiscoveryStatus
    skipped: SkippedPath[]
    error?: string
  }

  summary: RunSummary

  /** Outcomes in discovery order */
  outcomes: ReportedOutcome[]

  /** Run duration in milliseconds */
  duration: number
}

/**
 * Options for report generation
 */
export interface ReportOptions {
  output?: string
  quiet?: boolean
  pretty?: boolean
}
