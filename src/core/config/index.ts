export {
  ConfigSchema,
  DiscoveryConfigSchema,
  PipelineConfigSchema,
  StageNameSchema,
  validateConfig,
  validateConfigSafe,
  formatValidationErrors,
  type Config,
  type DiscoveryConfig,
  type PipelineConfig
} from './schema.js'
export {
  ConfigLoader,
  createConfigLoader,
  getDefaultConfigPath,
  type LoaderOptions
} from './loader.js'
