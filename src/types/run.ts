/**
 * Options for a single run, fixed once the CLI input has been resolved
 */
export interface RunOptions {
  /** Absolute path of the directory to scan */
  readonly inputRoot: string

  /** Absolute path of the directory stages write into */
  readonly outputRoot: string
}

/**
 * An entry file found during discovery
 */
export interface DiscoveredEntry {
  /** Absolute path on filesystem */
  readonly absolutePath: string

  /** Path relative to the input root, always `/`-separated */
  readonly relativePath: string
}

/**
 * Read-only snapshot of an entry file, held only while it is processed
 */
export interface FileContext {
  readonly path: string
  readonly relativePath: string
  readonly contentBytes: Buffer

  /** UTF-8 decoding of contentBytes with any BOM removed */
  readonly text: string

  readonly sizeBytes: number
  readonly lastModified: Date

  /** Directory part of relativePath, `.` for files at the root */
  readonly relativeDir: string

  /** SHA-256 of contentBytes */
  readonly contentHash: string
}

/**
 * Values a stage reports about the file it processed
 */
export type StageDetails = Record<string, string | number>

/**
 * File facts kept on an outcome once the content has been released
 */
export interface FileDetails {
  sizeBytes: number
  lastModified: Date
  relativeDir: string
  contentHash: string
}

/**
 * Result of processing one discovered entry
 */
export interface ProcessingOutcome {
  entry: DiscoveredEntry
  succeeded: boolean

  /** Message of the failure (if failed) */
  errorMessage?: string

  /** `read` or the name of the stage that failed (if failed) */
  failedStage?: string

  /** Details merged from every stage that ran */
  details: StageDetails

  /** File facts (if the read succeeded) */
  file?: FileDetails

  /** Duration in milliseconds */
  duration: number
}

/**
 * Totals for one run
 */
export interface RunSummary {
  totalDiscovered: number
  totalSucceeded: number
  totalFailed: number
}
