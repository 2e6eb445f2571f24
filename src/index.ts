export type * from './types/index.js'
export { EntryDiscoverer, createDiscoverer, DEFAULT_ENTRY_FILE_NAME } from './core/discovery/index.js'
export { readFileContext } from './core/reader/index.js'
export {
  BaseStage,
  ContentValidationStage,
  JsonStructureStage,
  ProcessingPipeline,
  createStage,
  summarize,
  STAGE_NAMES,
  type ProcessingStage,
  type StageName,
  type StageResult
} from './core/pipeline/index.js'
export { RunOrchestrator, createOrchestrator, type RunResult } from './core/runner/index.js'
export {
  ConsoleReporter,
  MemoryReporter,
  JsonReporter,
  buildRunReport,
  type ProgressReporter
} from './core/reporter/index.js'
export { ConfigLoader, createConfigLoader, type Config } from './core/config/index.js'
export { nodeFileSystem, type FileSystem } from './core/fs/index.js'
export {
  CacheToolError,
  MissingInputError,
  ReadError,
  ProcessingError,
  ConfigLoadError
} from './utils/errors.js'
