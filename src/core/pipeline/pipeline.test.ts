import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { mkdtemp, mkdir, rm, writeFile } from 'fs/promises'
import { join } from 'path'
import { tmpdir } from 'os'
import { ProcessingPipeline, summarize, READ_STAGE } from './pipeline.js'
import { BaseStage, type ProcessingStage } from './base.js'
import { ContentValidationStage } from './content.js'
import { JsonStructureStage } from './json.js'
import { MemoryReporter } from '../reporter/memory.js'
import type {
  DiscoveredEntry,
  FileContext,
  ProcessingOutcome,
  RunOptions,
  StageDetails
} from '../../types/index.js'

class RecordingStage extends BaseStage {
  readonly calls: string[] = []
  readonly outputs: string[] = []

  constructor(
    readonly name: string,
    private readonly failOn: string[] = []
  ) {
    super()
  }

  async process(context: FileContext, options: RunOptions): Promise<StageDetails> {
    this.calls.push(context.relativePath)
    this.outputs.push(options.outputRoot)
    if (this.failOn.includes(context.relativePath)) {
      throw new Error(`${this.name} rejected ${context.relativePath}`)
    }
    return { [this.name]: 'ok' }
  }
}

describe('ProcessingPipeline', () => {
  let root: string
  let options: RunOptions
  let reporter: MemoryReporter

  async function createEntry(relativePath: string, content = '{}'): Promise<DiscoveredEntry> {
    const absolutePath = join(root, relativePath)
    await mkdir(join(absolutePath, '..'), { recursive: true })
    await writeFile(absolutePath, content)
    return { absolutePath, relativePath }
  }

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), 'bct-pipeline-test-'))
    options = { inputRoot: root, outputRoot: join(root, '..', 'out') }
    reporter = new MemoryReporter()
  })

  afterEach(async () => {
    await rm(root, { recursive: true, force: true })
  })

  describe('register', () => {
    it('should start with no stages', () => {
      const pipeline = new ProcessingPipeline()

      expect(pipeline.stageCount).toBe(0)
    })

    it('should keep stages in registration order', () => {
      const pipeline = new ProcessingPipeline()
      pipeline.register(new ContentValidationStage())
      pipeline.register(new JsonStructureStage())

      expect(pipeline.stageCount).toBe(2)
      expect(pipeline.stageNames).toEqual(['content', 'json'])
    })
  })

  describe('process', () => {
    it('should produce one successful outcome per entry in order', async () => {
      const entries = [
        await createEntry('a/entry.json', '{}'),
        await createEntry('b/c/entry.json', '{"x":1}')
      ]
      const pipeline = new ProcessingPipeline({ reporter })
      pipeline.register(new ContentValidationStage())

      const result = await pipeline.process(entries, options)

      expect(result.outcomes.map(o => o.entry)).toEqual(entries)
      expect(result.outcomes.map(o => o.succeeded)).toEqual([true, true])
      expect(result.outcomes[0].details).toEqual({ characters: 2 })
      expect(result.outcomes[1].details).toEqual({ characters: 7 })
      expect(result.outcomes[1].file?.sizeBytes).toBe(7)
      expect(result.outcomes[1].file?.relativeDir).toBe('b/c')
      expect(result.summary).toEqual({ totalDiscovered: 2, totalSucceeded: 2, totalFailed: 0 })
    })

    it('should emit progress events around every item', async () => {
      const entries = [await createEntry('a/entry.json'), await createEntry('b/entry.json')]
      const pipeline = new ProcessingPipeline({ reporter })
      pipeline.register(new ContentValidationStage())

      await pipeline.process(entries, options)

      expect(reporter.types).toEqual([
        'item-started',
        'item-read',
        'item-completed',
        'item-started',
        'item-read',
        'item-completed',
        'run-completed'
      ])
      expect(reporter.ofType('item-started').map(e => [e.position, e.total])).toEqual([
        [1, 2],
        [2, 2]
      ])
      expect(reporter.ofType('item-completed').map(e => e.outcome.entry.relativePath)).toEqual([
        'a/entry.json',
        'b/entry.json'
      ])
      expect(reporter.ofType('run-completed')[0].summary).toEqual({
        totalDiscovered: 2,
        totalSucceeded: 2,
        totalFailed: 0
      })
    })

    it('should report nothing found for zero entries', async () => {
      const pipeline = new ProcessingPipeline({ reporter })
      pipeline.register(new ContentValidationStage())

      const result = await pipeline.process([], options)

      expect(result.outcomes).toEqual([])
      expect(result.summary).toEqual({ totalDiscovered: 0, totalSucceeded: 0, totalFailed: 0 })
      expect(reporter.types).toEqual(['nothing-found', 'run-completed'])
    })

    it('should record a read failure and continue with the next entry', async () => {
      const entries = [
        await createEntry('a/entry.json'),
        await createEntry('b/entry.json'),
        await createEntry('c/entry.json')
      ]
      await rm(entries[1].absolutePath)
      const pipeline = new ProcessingPipeline({ reporter })
      const stage = new RecordingStage('record')
      pipeline.register(stage)

      const result = await pipeline.process(entries, options)

      expect(result.outcomes.map(o => o.succeeded)).toEqual([true, false, true])
      expect(result.outcomes[1].failedStage).toBe(READ_STAGE)
      expect(result.outcomes[1].errorMessage).toMatch(/^Failed to read b\/entry\.json: ENOENT/)
      expect(result.outcomes[1].file).toBeUndefined()
      expect(stage.calls).toEqual(['a/entry.json', 'c/entry.json'])
      expect(result.summary).toEqual({ totalDiscovered: 3, totalSucceeded: 2, totalFailed: 1 })
      expect(reporter.types).toEqual([
        'item-started',
        'item-read',
        'item-completed',
        'item-started',
        'item-completed',
        'item-started',
        'item-read',
        'item-completed',
        'run-completed'
      ])
    })

    it('should record a stage failure with the stage name', async () => {
      const entries = [await createEntry('a/entry.json', '   '), await createEntry('b/entry.json')]
      const pipeline = new ProcessingPipeline({ reporter })
      pipeline.register(new ContentValidationStage())

      const result = await pipeline.process(entries, options)

      expect(result.outcomes[0]).toMatchObject({
        succeeded: false,
        failedStage: 'content',
        errorMessage: 'Entry file is empty'
      })
      expect(result.outcomes[0].file?.sizeBytes).toBe(3)
      expect(result.outcomes[1].succeeded).toBe(true)
      expect(result.summary.totalFailed).toBe(1)
    })

    it('should stop an item at its first failing stage', async () => {
      const entries = [await createEntry('a/entry.json'), await createEntry('b/entry.json')]
      const first = new RecordingStage('first', ['a/entry.json'])
      const second = new RecordingStage('second')
      const pipeline = new ProcessingPipeline()
      pipeline.register(first)
      pipeline.register(second)

      const result = await pipeline.process(entries, options)

      expect(first.calls).toEqual(['a/entry.json', 'b/entry.json'])
      expect(second.calls).toEqual(['b/entry.json'])
      expect(result.outcomes[0]).toMatchObject({
        succeeded: false,
        failedStage: 'first',
        errorMessage: 'first rejected a/entry.json'
      })
      expect(result.outcomes[1].details).toEqual({ first: 'ok', second: 'ok' })
    })

    it('should isolate a stage whose execute throws', async () => {
      const entries = [await createEntry('a/entry.json'), await createEntry('b/entry.json')]
      const throwing: ProcessingStage = {
        name: 'decode',
        execute: async context => {
          if (context.relativePath === 'a/entry.json') {
            throw new Error('boom')
          }
          return { stage: 'decode', succeeded: true, details: { decoded: 1 }, duration: 0 }
        }
      }
      const pipeline = new ProcessingPipeline({ reporter })
      pipeline.register(throwing)

      const result = await pipeline.process(entries, options)

      expect(result.outcomes).toHaveLength(2)
      expect(result.outcomes[0]).toMatchObject({
        succeeded: false,
        failedStage: 'decode',
        errorMessage: 'boom',
        details: {}
      })
      expect(result.outcomes[1]).toMatchObject({ succeeded: true, details: { decoded: 1 } })
      expect(result.summary).toEqual({ totalDiscovered: 2, totalSucceeded: 1, totalFailed: 1 })
      expect(reporter.ofType('item-completed')).toHaveLength(2)
    })

    it('should attempt a failing item only once', async () => {
      const entries = [await createEntry('a/entry.json')]
      const stage = new RecordingStage('flaky', ['a/entry.json'])
      const pipeline = new ProcessingPipeline()
      pipeline.register(stage)

      await pipeline.process(entries, options)

      expect(stage.calls).toEqual(['a/entry.json'])
    })

    it('should merge details from every stage', async () => {
      const entries = [await createEntry('a/entry.json', '{"x":1}')]
      const pipeline = new ProcessingPipeline()
      pipeline.register(new ContentValidationStage())
      pipeline.register(new JsonStructureStage())

      const result = await pipeline.process(entries, options)

      expect(result.outcomes[0].details).toEqual({ characters: 7, keys: 1 })
    })

    it('should pass run options to every stage', async () => {
      const entries = [await createEntry('a/entry.json')]
      const stage = new RecordingStage('record')
      const pipeline = new ProcessingPipeline()
      pipeline.register(stage)

      await pipeline.process(entries, options)

      expect(stage.outputs).toEqual([options.outputRoot])
    })

    it('should succeed with no stages registered', async () => {
      const entries = [await createEntry('a/entry.json')]

      const result = await new ProcessingPipeline().process(entries, options)

      expect(result.outcomes[0]).toMatchObject({ succeeded: true, details: {} })
    })
  })
})

describe('summarize', () => {
  const entry: DiscoveredEntry = { absolutePath: '/in/entry.json', relativePath: 'entry.json' }
  const outcome = (succeeded: boolean): ProcessingOutcome => ({
    entry,
    succeeded,
    details: {},
    duration: 0
  })

  it('should count successes and failures', () => {
    expect(summarize([outcome(true), outcome(false), outcome(true)])).toEqual({
      totalDiscovered: 3,
      totalSucceeded: 2,
      totalFailed: 1
    })
  })

  it('should return zeros for no outcomes', () => {
    expect(summarize([])).toEqual({ totalDiscovered: 0, totalSucceeded: 0, totalFailed: 0 })
  })
})
