import type { DiscoveredEntry, FileContext } from '../../types/run.js'
import { nodeFileSystem, type FileSystem } from '../fs/index.js'
import { ReadError } from '../../utils/errors.js'
import { hashContent } from '../../utils/hash.js'
import { relativeDirOf } from '../../utils/format.js'

const decoder = new TextDecoder('utf-8', { fatal: true })

/**
 * Load the content and stat metadata of a discovered entry.
 * Any failure is wrapped in a ReadError naming the file.
 */
export async function readFileContext(
  entry: DiscoveredEntry,
  fs: FileSystem = nodeFileSystem
): Promise<FileContext> {
  try {
    const stats = await fs.stat(entry.absolutePath)
    if (!stats.isFile()) {
      throw new Error('not a regular file')
    }

    const contentBytes = await fs.readFile(entry.absolutePath)
    const text = decoder.decode(contentBytes)

    return {
      path: entry.absolutePath,
      relativePath: entry.relativePath,
      contentBytes,
      text,
      sizeBytes: contentBytes.byteLength,
      lastModified: stats.mtime,
      relativeDir: relativeDirOf(entry.relativePath),
      contentHash: hashContent(contentBytes)
    }
  } catch (err) {
    throw new ReadError(entry.relativePath, err)
  }
}
