import type { SkippedPath, DiscoveryStatus } from './discovery.js'
import type {
  DiscoveredEntry,
  FileDetails,
  ProcessingOutcome,
  RunOptions,
  RunSummary
} from './run.js'

export interface RunStartedEvent {
  type: 'run-started'
  options: RunOptions
}

export interface DiscoveryCompletedEvent {
  type: 'discovery-completed'
  status: DiscoveryStatus
  entries: readonly DiscoveredEntry[]
  skipped: readonly SkippedPath[]
  error?: string
}

export interface NothingFoundEvent {
  type: 'nothing-found'
}

export interface ItemStartedEvent {
  type: 'item-started'
  /** 1-based position in discovery order */
  position: number
  total: number
  entry: DiscoveredEntry
}

export interface ItemReadEvent {
  type: 'item-read'
  position: number
  total: number
  entry: DiscoveredEntry
  file: FileDetails
}

export interface ItemCompletedEvent {
  type: 'item-completed'
  position: number
  total: number
  outcome: ProcessingOutcome
}

export interface RunCompletedEvent {
  type: 'run-completed'
  summary: RunSummary
  duration: number
}

/**
 * Everything the core tells the presentation layer about a run
 */
export type RunEvent =
  | RunStartedEvent
  | DiscoveryCompletedEvent
  | NothingFoundEvent
  | ItemStartedEvent
  | ItemReadEvent
  | ItemCompletedEvent
  | RunCompletedEvent

export type RunEventType = RunEvent['type']
