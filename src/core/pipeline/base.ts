import type { FileContext, RunOptions, StageDetails } from '../../types/run.js'

/**
 * Outcome of running one stage on one file
 */
export interface StageResult {
  stage: string
  succeeded: boolean
  details: StageDetails
  duration: number
  error?: string
}

/**
 * A transformation step applied to every entry file
 */
export interface ProcessingStage {
  /** Identifier used in configuration and outcomes */
  readonly name: string

  execute(context: FileContext, options: RunOptions): Promise<StageResult>
}

/**
 * Abstract base class for all stages
 * Implementations throw from process() to reject a file
 */
export abstract class BaseStage implements ProcessingStage {
  abstract readonly name: string

  /**
   * Perform the stage's work on one file
   * @param context - Snapshot of the entry file
   * @param options - Run options; stages write only under outputRoot
   * @returns Details to attach to the outcome
   */
  abstract process(context: FileContext, options: RunOptions): Promise<StageDetails | void>

  /**
   * Run process() with error handling and timing
   */
  async execute(context: FileContext, options: RunOptions): Promise<StageResult> {
    const start = Date.now()
    try {
      const details = await this.process(context, options)
      return {
        stage: this.name,
        succeeded: true,
        details: details ?? {},
        duration: Date.now() - start
      }
    } catch (error) {
      return {
        stage: this.name,
        succeeded: false,
        details: {},
        duration: Date.now() - start,
        error: error instanceof Error ? error.message : String(error)
      }
    }
  }
}
