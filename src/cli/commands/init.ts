/**
 * init command - Generate a default configuration file
 */

import * as fs from 'fs'
import * as path from 'path'
import { getDefaultConfigPath } from '../../core/config/loader.js'
import { toErrorMessage } from '../../utils/errors.js'

export const DEFAULT_OUTPUT_FILENAME = 'bilicache.config.yaml'

export interface InitOptions {
  output?: string
  force?: boolean
  /** Directory relative outputs resolve against */
  cwd?: string
}

export interface InitResult {
  success: boolean
  outputPath?: string
  error?: string
}

/**
 * Execute the init command
 *
 * @param options - Command options
 * @returns Result of the operation
 */
export async function initCommand(options: InitOptions): Promise<InitResult> {
  const outputPath = path.resolve(
    options.cwd ?? process.cwd(),
    options.output ?? DEFAULT_OUTPUT_FILENAME
  )

  try {
    if (fs.existsSync(outputPath) && !options.force) {
      return {
        success: false,
        outputPath,
        error: `File already exists: ${outputPath}. Use --force to overwrite.`
      }
    }

    const configContent = fs.readFileSync(getDefaultConfigPath(), 'utf-8')

    fs.mkdirSync(path.dirname(outputPath), { recursive: true })
    fs.writeFileSync(outputPath, configContent, 'utf-8')

    return {
      success: true,
      outputPath
    }
  } catch (error) {
    return {
      success: false,
      outputPath,
      error: toErrorMessage(error)
    }
  }
}
