import { readdir, readFile, stat } from 'fs/promises'

/**
 * A single name in a directory listing
 */
export interface DirectoryEntry {
  name: string
  isFile(): boolean
  isDirectory(): boolean
}

export interface FileStats {
  size: number
  mtime: Date
  isFile(): boolean
  isDirectory(): boolean
}

/**
 * Filesystem operations the core depends on
 */
export interface FileSystem {
  readdir(dirPath: string): Promise<DirectoryEntry[]>
  readFile(filePath: string): Promise<Buffer>
  stat(path: string): Promise<FileStats>
}

/**
 * FileSystem backed by fs/promises
 */
export const nodeFileSystem: FileSystem = {
  readdir: dirPath => readdir(dirPath, { withFileTypes: true }),
  readFile: filePath => readFile(filePath),
  stat: path => stat(path)
}
