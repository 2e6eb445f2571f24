import { BaseStage } from './base.js'
import type { FileContext, StageDetails } from '../../types/run.js'
import { ProcessingError } from '../../utils/errors.js'

/**
 * Rejects entry files with no content.
 * Placeholder for cache decoding; it writes nothing to the output root.
 */
export class ContentValidationStage extends BaseStage {
  readonly name = 'content'

  async process(context: FileContext): Promise<StageDetails> {
    if (context.text.trim().length === 0) {
      throw new ProcessingError('Entry file is empty', context.relativePath)
    }

    return { characters: context.text.length }
  }
}
