import { join } from 'path'
import { minimatch } from 'minimatch'
import type { DiscoveredEntry } from '../../types/run.js'
import type { DiscoveryResult, SkipReason, SkippedPath } from '../../types/discovery.js'
import { nodeFileSystem, type DirectoryEntry, type FileSystem } from '../fs/index.js'
import { errorCode, toErrorMessage } from '../../utils/errors.js'

export const DEFAULT_ENTRY_FILE_NAME = 'entry.json'

/**
 * Options for discovery
 */
export interface DiscovererOptions {
  /** File name to collect, matched exactly */
  fileName?: string

  /** Directories to skip (minimatch patterns against the relative path) */
  exclude?: string[]

  fs?: FileSystem
}

/**
 * Map a listing failure to a skip reason
 */
export function classifySkip(error: unknown): SkipReason {
  switch (errorCode(error)) {
    case 'EACCES':
    case 'EPERM':
      return 'permission-denied'
    case 'ENOENT':
    case 'ENOTDIR':
      return 'not-found'
    default:
      return 'error'
  }
}

const byName = (a: DirectoryEntry, b: DirectoryEntry): number =>
  a.name < b.name ? -1 : a.name > b.name ? 1 : 0

/**
 * Recursively collects entry files under an input root
 */
export class EntryDiscoverer {
  private readonly fileName: string
  private readonly exclude: string[]
  private readonly fs: FileSystem

  constructor(options: DiscovererOptions = {}) {
    this.fileName = options.fileName ?? DEFAULT_ENTRY_FILE_NAME
    this.exclude = options.exclude ?? []
    this.fs = options.fs ?? nodeFileSystem
  }

  /**
   * Walk inputRoot depth-first, each directory in name order.
   * Subdirectories that cannot be listed are skipped and reported.
   */
  async discover(inputRoot: string): Promise<DiscoveryResult> {
    let rootListing: DirectoryEntry[]
    try {
      rootListing = await this.fs.readdir(inputRoot)
    } catch (err) {
      return {
        status: 'failed',
        entries: [],
        error: `Cannot list ${inputRoot}: ${toErrorMessage(err)}`
      }
    }

    const entries: DiscoveredEntry[] = []
    const skipped: SkippedPath[] = []
    await this.walk(inputRoot, '', rootListing, entries, skipped)

    if (skipped.length > 0) {
      return { status: 'partial', entries, skipped }
    }
    return { status: 'complete', entries }
  }

  private async walk(
    dir: string,
    relativeDir: string,
    listing: DirectoryEntry[],
    entries: DiscoveredEntry[],
    skipped: SkippedPath[]
  ): Promise<void> {
    for (const item of [...listing].sort(byName)) {
      const absolutePath = join(dir, item.name)
      const relativePath = relativeDir ? `${relativeDir}/${item.name}` : item.name

      if (item.isDirectory()) {
        if (this.isExcluded(relativePath)) {
          continue
        }

        let children: DirectoryEntry[]
        try {
          children = await this.fs.readdir(absolutePath)
        } catch (err) {
          skipped.push({
            path: relativePath,
            reason: classifySkip(err),
            message: toErrorMessage(err)
          })
          continue
        }
        await this.walk(absolutePath, relativePath, children, entries, skipped)
      } else if (item.isFile() && item.name === this.fileName) {
        entries.push({ absolutePath, relativePath })
      }
    }
  }

  private isExcluded(relativePath: string): boolean {
    return this.exclude.some(pattern => minimatch(relativePath, pattern, { dot: true }))
  }
}

/**
 * Create a discoverer with the given options
 */
export function createDiscoverer(options?: DiscovererOptions): EntryDiscoverer {
  return new EntryDiscoverer(options)
}
