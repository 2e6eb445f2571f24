export { BaseStage, type ProcessingStage, type StageResult } from './base.js'
export { ContentValidationStage } from './content.js'
export { JsonStructureStage } from './json.js'
export {
  ProcessingPipeline,
  summarize,
  READ_STAGE,
  type PipelineOptions,
  type PipelineResult
} from './pipeline.js'

import type { ProcessingStage } from './base.js'
import { ContentValidationStage } from './content.js'
import { JsonStructureStage } from './json.js'

/**
 * Names of the stages that can be enabled in configuration
 */
export const STAGE_NAMES = ['content', 'json'] as const

export type StageName = (typeof STAGE_NAMES)[number]

/**
 * Build a stage from its configured name
 */
export function createStage(name: StageName): ProcessingStage {
  switch (name) {
    case 'content':
      return new ContentValidationStage()
    case 'json':
      return new JsonStructureStage()
  }
}
