/**
 * Base class for every error the tool raises on purpose
 */
export class CacheToolError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'CacheToolError'
  }
}

/**
 * The input root does not exist or is not a directory
 */
export class MissingInputError extends CacheToolError {
  constructor(public readonly inputPath: string, reason = 'does not exist') {
    super(`Input path ${reason}: ${inputPath}`)
    this.name = 'MissingInputError'
  }
}

/**
 * An entry file could not be read or decoded
 */
export class ReadError extends CacheToolError {
  constructor(public readonly path: string, cause: unknown) {
    super(`Failed to read ${path}: ${toErrorMessage(cause)}`, { cause })
    this.name = 'ReadError'
  }
}

/**
 * A stage rejected an entry file
 */
export class ProcessingError extends CacheToolError {
  constructor(message: string, public readonly path?: string) {
    super(message)
    this.name = 'ProcessingError'
  }
}

/**
 * A configuration file could not be read or failed validation
 */
export class ConfigLoadError extends CacheToolError {
  constructor(
    message: string,
    public readonly configPath: string,
    public readonly validationErrors: string[]
  ) {
    super(message)
    this.name = 'ConfigLoadError'
  }
}

/**
 * Error code of a Node.js system error, if it has one
 */
export function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code
  }
  return undefined
}

export function toErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}
