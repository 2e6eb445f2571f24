import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { mkdtemp, mkdir, rm, writeFile, utimes } from 'fs/promises'
import { createHash } from 'crypto'
import { join } from 'path'
import { tmpdir } from 'os'
import { readFileContext } from './index.js'
import { ReadError } from '../../utils/errors.js'
import type { DiscoveredEntry } from '../../types/index.js'

describe('readFileContext', () => {
  let root: string

  async function createEntry(relativePath: string, content: string | Buffer): Promise<DiscoveredEntry> {
    const absolutePath = join(root, relativePath)
    await mkdir(join(absolutePath, '..'), { recursive: true })
    await writeFile(absolutePath, content)
    return { absolutePath, relativePath }
  }

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), 'bct-reader-test-'))
  })

  afterEach(async () => {
    await rm(root, { recursive: true, force: true })
  })

  it('should load content and metadata', async () => {
    const entry = await createEntry('b/c/entry.json', '{"x":1}')
    const modified = new Date('2024-01-02T03:04:05.000Z')
    await utimes(entry.absolutePath, modified, modified)

    const context = await readFileContext(entry)

    expect(context.path).toBe(entry.absolutePath)
    expect(context.relativePath).toBe('b/c/entry.json')
    expect(context.text).toBe('{"x":1}')
    expect(context.contentBytes.equals(Buffer.from('{"x":1}'))).toBe(true)
    expect(context.sizeBytes).toBe(7)
    expect(context.lastModified.getTime()).toBe(modified.getTime())
    expect(context.relativeDir).toBe('b/c')
    expect(context.contentHash).toBe(createHash('sha256').update('{"x":1}').digest('hex'))
  })

  it('should use . as the directory of a root-level file', async () => {
    const entry = await createEntry('entry.json', '{}')

    const context = await readFileContext(entry)

    expect(context.relativeDir).toBe('.')
  })

  it('should strip a UTF-8 byte order mark from the text', async () => {
    const entry = await createEntry(
      'a/entry.json',
      Buffer.concat([Buffer.from([0xef, 0xbb, 0xbf]), Buffer.from('{}')])
    )

    const context = await readFileContext(entry)

    expect(context.text).toBe('{}')
    expect(context.sizeBytes).toBe(5)
  })

  it('should decode multi-byte characters', async () => {
    const entry = await createEntry('a/entry.json', '{"title":"緩存"}')

    const context = await readFileContext(entry)

    expect(context.text).toBe('{"title":"緩存"}')
    expect(context.sizeBytes).toBe(Buffer.byteLength('{"title":"緩存"}'))
  })

  it('should throw ReadError for a file deleted after discovery', async () => {
    const entry = await createEntry('gone/entry.json', '{}')
    await rm(entry.absolutePath)

    const error = await readFileContext(entry).catch((err: unknown) => err)

    expect(error).toBeInstanceOf(ReadError)
    expect(error).toMatchObject({
      path: 'gone/entry.json',
      message: expect.stringMatching(/^Failed to read gone\/entry\.json: ENOENT/)
    })
  })

  it('should throw ReadError for invalid UTF-8', async () => {
    const entry = await createEntry('bad/entry.json', Buffer.from([0x7b, 0xff, 0xfe, 0x7d]))

    await expect(readFileContext(entry)).rejects.toThrow(ReadError)
  })

  it('should throw ReadError when the path is a directory', async () => {
    const absolutePath = join(root, 'dir', 'entry.json')
    await mkdir(absolutePath, { recursive: true })

    await expect(
      readFileContext({ absolutePath, relativePath: 'dir/entry.json' })
    ).rejects.toThrow('Failed to read dir/entry.json: not a regular file')
  })
})
