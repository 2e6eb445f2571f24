import { createHash } from 'crypto'

/**
 * Calculate SHA-256 hash of a string or buffer
 */
export function hashContent(content: string | Uint8Array): string {
  return createHash('sha256').update(content).digest('hex')
}
