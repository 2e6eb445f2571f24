import type {
  DiscoveredEntry,
  FileContext,
  ProcessingOutcome,
  RunOptions,
  RunSummary,
  StageDetails
} from '../../types/run.js'
import type { ProgressReporter } from '../reporter/base.js'
import { nullReporter } from '../reporter/base.js'
import { nodeFileSystem, type FileSystem } from '../fs/index.js'
import { readFileContext } from '../reader/index.js'
import { toErrorMessage } from '../../utils/errors.js'
import type { ProcessingStage, StageResult } from './base.js'

export const READ_STAGE = 'read'

export interface PipelineOptions {
  reporter?: ProgressReporter
  fs?: FileSystem
}

export interface PipelineResult {
  /** One outcome per entry, in input order */
  outcomes: ProcessingOutcome[]
  summary: RunSummary
  duration: number
}

/**
 * Compute run totals from outcomes
 */
export function summarize(outcomes: readonly ProcessingOutcome[]): RunSummary {
  const totalSucceeded = outcomes.filter(o => o.succeeded).length
  return {
    totalDiscovered: outcomes.length,
    totalSucceeded,
    totalFailed: outcomes.length - totalSucceeded
  }
}

/**
 * Feeds entries through the registered stages one at a time
 */
export class ProcessingPipeline {
  private stages: ProcessingStage[] = []
  private readonly reporter: ProgressReporter
  private readonly fs: FileSystem

  constructor(options: PipelineOptions = {}) {
    this.reporter = options.reporter ?? nullReporter
    this.fs = options.fs ?? nodeFileSystem
  }

  /**
   * Register a stage; stages run in registration order
   */
  register(stage: ProcessingStage): void {
    this.stages = [...this.stages, stage]
  }

  get stageCount(): number {
    return this.stages.length
  }

  get stageNames(): string[] {
    return this.stages.map(stage => stage.name)
  }

  /**
   * Process every entry in order. A failing item is recorded and the
   * loop moves on; nothing is retried.
   */
  async process(
    entries: readonly DiscoveredEntry[],
    options: RunOptions
  ): Promise<PipelineResult> {
    const start = Date.now()
    const outcomes: ProcessingOutcome[] = []
    const total = entries.length

    if (total === 0) {
      this.reporter.handle({ type: 'nothing-found' })
    }

    for (const [index, entry] of entries.entries()) {
      const position = index + 1
      this.reporter.handle({ type: 'item-started', position, total, entry })

      const outcome = await this.processEntry(entry, options, position, total)
      outcomes.push(outcome)

      this.reporter.handle({ type: 'item-completed', position, total, outcome })
    }

    const summary = summarize(outcomes)
    const duration = Date.now() - start
    this.reporter.handle({ type: 'run-completed', summary, duration })

    return { outcomes, summary, duration }
  }

  private async processEntry(
    entry: DiscoveredEntry,
    options: RunOptions,
    position: number,
    total: number
  ): Promise<ProcessingOutcome> {
    const start = Date.now()

    let context: FileContext
    try {
      context = await readFileContext(entry, this.fs)
    } catch (err) {
      return {
        entry,
        succeeded: false,
        errorMessage: toErrorMessage(err),
        failedStage: READ_STAGE,
        details: {},
        duration: Date.now() - start
      }
    }

    const file = {
      sizeBytes: context.sizeBytes,
      lastModified: context.lastModified,
      relativeDir: context.relativeDir,
      contentHash: context.contentHash
    }
    this.reporter.handle({ type: 'item-read', position, total, entry, file })

    let details: StageDetails = {}
    for (const stage of this.stages) {
      let result: StageResult
      try {
        result = await stage.execute(context, options)
      } catch (err) {
        return {
          entry,
          succeeded: false,
          errorMessage: toErrorMessage(err),
          failedStage: stage.name,
          details,
          file,
          duration: Date.now() - start
        }
      }
      details = { ...details, ...result.details }

      if (!result.succeeded) {
        return {
          entry,
          succeeded: false,
          errorMessage: result.error,
          failedStage: stage.name,
          details,
          file,
          duration: Date.now() - start
        }
      }
    }

    return { entry, succeeded: true, details, file, duration: Date.now() - start }
  }
}
