export {
  nullReporter,
  type ProgressReporter,
  type Reporter
} from './base.js'
export { ConsoleReporter, formatEvent, type ConsoleLine } from './console.js'
export { MemoryReporter } from './memory.js'
export {
  JsonReporter,
  createJsonReporter,
  buildRunReport,
  REPORT_VERSION,
  type RunResultLike
} from './json.js'
