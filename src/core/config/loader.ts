import { readFile } from 'fs/promises'
import { join, dirname, resolve } from 'path'
import { fileURLToPath } from 'url'
import yaml from 'js-yaml'
import { type Config, validateConfig, validateConfigSafe, formatValidationErrors } from './schema.js'
import { ConfigLoadError, errorCode, toErrorMessage } from '../../utils/errors.js'

export interface LoaderOptions {
  basePath?: string
  allowExtends?: boolean
}

/**
 * Path of the configuration bundled with the package
 */
export function getDefaultConfigPath(): string {
  // src/core/config (or dist/core/config) -> config/default.yaml
  const here = dirname(fileURLToPath(import.meta.url))
  return resolve(here, '..', '..', '..', 'config', 'default.yaml')
}

export class ConfigLoader {
  private cache = new Map<string, Config>()
  /** Files whose extends chain is being resolved */
  private loading = new Set<string>()
  private basePath: string
  private allowExtends: boolean

  constructor(options: LoaderOptions = {}) {
    this.basePath = options.basePath || process.cwd()
    this.allowExtends = options.allowExtends ?? true
  }

  /**
   * Load configuration from file path
   */
  async load(configPath: string): Promise<Config> {
    const absolutePath = resolve(this.basePath, configPath)

    const cached = this.cache.get(absolutePath)
    if (cached) {
      return cached
    }

    if (this.loading.has(absolutePath)) {
      const chain = [...this.loading, absolutePath]
      throw new ConfigLoadError(
        `Circular extends in configuration file: ${absolutePath}`,
        absolutePath,
        [`Circular extends: ${chain.join(' -> ')}`]
      )
    }

    this.loading.add(absolutePath)
    try {
      const config = await this.loadUncached(configPath, absolutePath)
      this.cache.set(absolutePath, config)
      return config
    } finally {
      this.loading.delete(absolutePath)
    }
  }

  private async loadUncached(configPath: string, absolutePath: string): Promise<Config> {
    const content = await this.readConfigFile(absolutePath)
    const rawConfig = this.parseYaml(content, absolutePath)

    const validation = validateConfigSafe(rawConfig)
    if (!validation.success) {
      const errors = formatValidationErrors(validation.errors)
      throw new ConfigLoadError(
        `Invalid configuration file: ${configPath}\n${errors.join('\n')}`,
        absolutePath,
        errors
      )
    }

    let config = validation.data

    if (config.extends && this.allowExtends) {
      const baseConfig = await this.load(join(dirname(absolutePath), config.extends))
      config = this.mergeConfig(baseConfig, config, rawConfig)
    }

    return config
  }

  /**
   * Load the bundled default configuration
   */
  async loadDefault(): Promise<Config> {
    return this.load(getDefaultConfigPath())
  }

  /**
   * Load configuration from string content
   */
  loadFromString(content: string): Config {
    return validateConfig(yaml.load(content))
  }

  /**
   * Validate configuration file without loading
   */
  async validate(configPath: string): Promise<{
    valid: boolean
    errors: string[]
  }> {
    try {
      const absolutePath = resolve(this.basePath, configPath)
      const content = await this.readConfigFile(absolutePath)
      const validation = validateConfigSafe(this.parseYaml(content, absolutePath))

      if (validation.success) {
        return { valid: true, errors: [] }
      }

      return {
        valid: false,
        errors: formatValidationErrors(validation.errors)
      }
    } catch (error) {
      if (error instanceof ConfigLoadError) {
        return { valid: false, errors: error.validationErrors }
      }
      return { valid: false, errors: [toErrorMessage(error)] }
    }
  }

  /**
   * Clear the configuration cache
   */
  clearCache(): void {
    this.cache.clear()
  }

  private async readConfigFile(absolutePath: string): Promise<string> {
    try {
      return await readFile(absolutePath, 'utf-8')
    } catch (error) {
      throw new ConfigLoadError(
        `Failed to read configuration file: ${absolutePath}`,
        absolutePath,
        [errorCode(error) ?? 'UNKNOWN']
      )
    }
  }

  private parseYaml(content: string, absolutePath: string): unknown {
    try {
      return yaml.load(content)
    } catch (error) {
      throw new ConfigLoadError(
        `Invalid YAML in configuration file: ${absolutePath}`,
        absolutePath,
        [toErrorMessage(error)]
      )
    }
  }

  /**
   * Child values win; exclude patterns accumulate. Sections the child
   * file does not spell out come from the base.
   */
  private mergeConfig(base: Config, override: Config, rawOverride: unknown): Config {
    const written = isRecord(rawOverride) ? rawOverride : {}
    const discovery = isRecord(written.discovery) ? written.discovery : {}
    const pipeline = isRecord(written.pipeline) ? written.pipeline : {}

    return {
      ...override,
      discovery: {
        fileName: 'fileName' in discovery ? override.discovery.fileName : base.discovery.fileName,
        exclude: [...new Set([...base.discovery.exclude, ...override.discovery.exclude])]
      },
      pipeline: {
        stages: 'stages' in pipeline ? override.pipeline.stages : base.pipeline.stages
      }
    }
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/**
 * Create a default loader instance
 */
export function createConfigLoader(options?: LoaderOptions): ConfigLoader {
  return new ConfigLoader(options)
}
