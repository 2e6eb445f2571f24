import { z } from 'zod'
import { BaseStage } from './base.js'
import type { FileContext, StageDetails } from '../../types/run.js'
import { ProcessingError, toErrorMessage } from '../../utils/errors.js'

const EntryObjectSchema = z.record(z.string(), z.unknown())

/**
 * Requires the entry file to hold a top-level JSON object
 */
export class JsonStructureStage extends BaseStage {
  readonly name = 'json'

  async process(context: FileContext): Promise<StageDetails> {
    let parsed: unknown
    try {
      parsed = JSON.parse(context.text)
    } catch (err) {
      throw new ProcessingError(`Invalid JSON: ${toErrorMessage(err)}`, context.relativePath)
    }

    const result = EntryObjectSchema.safeParse(parsed)
    if (!result.success) {
      throw new ProcessingError('Entry file is not a JSON object', context.relativePath)
    }

    return { keys: Object.keys(result.data).length }
  }
}
