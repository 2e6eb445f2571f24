import { z } from 'zod'
import { STAGE_NAMES } from '../pipeline/index.js'
import { DEFAULT_ENTRY_FILE_NAME } from '../discovery/index.js'

/**
 * Names of the stages that can be enabled
 */
export const StageNameSchema = z.enum(STAGE_NAMES)

/**
 * Discovery configuration
 */
export const DiscoveryConfigSchema = z.object({
  fileName: z.string()
    .min(1, 'File name is required')
    .refine(name => !/[\\/]/.test(name), 'File name must not contain path separators')
    .default(DEFAULT_ENTRY_FILE_NAME)
    .describe('Exact name of the entry files to collect'),
  exclude: z.array(z.string().min(1, 'Exclude pattern must not be empty'))
    .default([])
    .describe('Glob patterns of directories that are never entered')
})

export type DiscoveryConfig = z.infer<typeof DiscoveryConfigSchema>

/**
 * Pipeline configuration
 */
export const PipelineConfigSchema = z.object({
  stages: z.array(StageNameSchema)
    .min(1, 'At least one stage is required')
    .default(['content'])
    .describe('Stages applied to every entry file, in order')
})

export type PipelineConfig = z.infer<typeof PipelineConfigSchema>

/**
 * Complete configuration schema
 */
export const ConfigSchema = z.object({
  version: z.string()
    .regex(/^\d+\.\d+(?:\.\d+)?$/, 'Version must be semver format')
    .describe('Configuration version in semver format'),

  extends: z.string()
    .optional()
    .describe('Base configuration to extend'),

  discovery: DiscoveryConfigSchema.default({}),

  pipeline: PipelineConfigSchema.default({})
})

export type Config = z.infer<typeof ConfigSchema>

/**
 * Validate configuration content
 */
export function validateConfig(data: unknown): Config {
  return ConfigSchema.parse(data)
}

/**
 * Validate configuration with detailed errors
 */
export function validateConfigSafe(
  data: unknown
): { success: true; data: Config } | { success: false; errors: z.ZodError } {
  const result = ConfigSchema.safeParse(data)
  if (result.success) {
    return { success: true, data: result.data }
  }
  return { success: false, errors: result.error }
}

/**
 * Format validation errors for display
 */
export function formatValidationErrors(errors: z.ZodError): string[] {
  return errors.errors.map(err => {
    const path = err.path.join('.')
    return path ? `${path}: ${err.message}` : err.message
  })
}
