import type { DiscoveryResult } from '../../types/discovery.js'
import type { ProcessingOutcome, RunOptions, RunSummary } from '../../types/run.js'
import { EntryDiscoverer } from '../discovery/index.js'
import { ProcessingPipeline, createStage, type ProcessingStage } from '../pipeline/index.js'
import { nullReporter, type ProgressReporter } from '../reporter/base.js'
import { nodeFileSystem, type FileSystem } from '../fs/index.js'
import type { Config } from '../config/schema.js'
import { MissingInputError, errorCode } from '../../utils/errors.js'

/**
 * Everything a run produced
 */
export interface RunResult {
  discovery: DiscoveryResult
  /** One per discovered entry, in discovery order */
  outcomes: ProcessingOutcome[]
  summary: RunSummary
  duration: number
}

export interface OrchestratorOptions {
  reporter?: ProgressReporter
  fs?: FileSystem
  /** Discovery file name and exclusions */
  discovery?: Partial<Config['discovery']>
  /** Stages to run; defaults to content validation only */
  stages?: ProcessingStage[]
}

/**
 * Ties discovery and the pipeline together for one run
 */
export class RunOrchestrator {
  private readonly reporter: ProgressReporter
  private readonly fs: FileSystem
  private readonly discoverer: EntryDiscoverer
  private readonly pipeline: ProcessingPipeline

  constructor(options: OrchestratorOptions = {}) {
    this.reporter = options.reporter ?? nullReporter
    this.fs = options.fs ?? nodeFileSystem
    this.discoverer = new EntryDiscoverer({ ...options.discovery, fs: this.fs })
    this.pipeline = new ProcessingPipeline({ reporter: this.reporter, fs: this.fs })

    const stages = options.stages ?? [createStage('content')]
    for (const stage of stages) {
      this.pipeline.register(stage)
    }
  }

  get stageNames(): string[] {
    return this.pipeline.stageNames
  }

  /**
   * Validate the input root, discover every entry, then process them.
   * Throws MissingInputError before discovery when the root is absent.
   */
  async run(options: RunOptions): Promise<RunResult> {
    const start = Date.now()
    this.reporter.handle({ type: 'run-started', options })

    await this.assertInputRoot(options.inputRoot)

    const discovery = await this.discoverer.discover(options.inputRoot)
    this.reporter.handle({
      type: 'discovery-completed',
      status: discovery.status,
      entries: discovery.entries,
      skipped: discovery.status === 'partial' ? discovery.skipped : [],
      ...(discovery.status === 'failed' ? { error: discovery.error } : {})
    })

    const { outcomes, summary } = await this.pipeline.process(discovery.entries, options)

    return { discovery, outcomes, summary, duration: Date.now() - start }
  }

  private async assertInputRoot(inputRoot: string): Promise<void> {
    try {
      const stats = await this.fs.stat(inputRoot)
      if (!stats.isDirectory()) {
        throw new MissingInputError(inputRoot, 'is not a directory')
      }
    } catch (err) {
      if (err instanceof MissingInputError) {
        throw err
      }
      if (errorCode(err) === 'ENOENT' || errorCode(err) === 'ENOTDIR') {
        throw new MissingInputError(inputRoot)
      }
      throw new MissingInputError(inputRoot, 'cannot be accessed')
    }
  }
}

/**
 * Build an orchestrator from a loaded configuration
 */
export function createOrchestrator(
  config: Config,
  options: Omit<OrchestratorOptions, 'discovery' | 'stages'> = {}
): RunOrchestrator {
  return new RunOrchestrator({
    ...options,
    discovery: config.discovery,
    stages: config.pipeline.stages.map(createStage)
  })
}
