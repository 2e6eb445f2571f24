import type { DiscoveredEntry } from './run.js'

/**
 * Why a directory could not be listed
 */
export type SkipReason = 'permission-denied' | 'not-found' | 'error'

/**
 * A directory left out of discovery
 */
export interface SkippedPath {
  /** Path relative to the input root */
  path: string
  reason: SkipReason
  message: string
}

export interface CompleteDiscovery {
  status: 'complete'
  entries: DiscoveredEntry[]
}

/**
 * Some subdirectories could not be listed; entries holds what was reachable
 */
export interface PartialDiscovery {
  status: 'partial'
  entries: DiscoveredEntry[]
  skipped: SkippedPath[]
}

/**
 * The input root itself could not be listed
 */
export interface FailedDiscovery {
  status: 'failed'
  entries: []
  error: string
}

export type DiscoveryResult = CompleteDiscovery | PartialDiscovery | FailedDiscovery

export type DiscoveryStatus = DiscoveryResult['status']
