import { z } from 'zod'

export const DEFAULT_CONCURRENCY = 5
export const DEFAULT_TOKEN_PATH = '~/.github/token'

/**
 * User configuration
 */
export const ConfigSchema = z.object({
  concurrency: z.number()
    .int('Concurrency must be an integer')
    .min(1, 'Concurrency must be >= 1')
    .default(DEFAULT_CONCURRENCY)
    .describe('Maximum number of files downloaded at once'),

  tokenPath: z.string()
    .min(1, 'Token path must not be empty')
    .default(DEFAULT_TOKEN_PATH)
    .describe('File holding an access token; ~ expands to the home directory'),

  apiBaseUrl: z.string()
    .url('API base URL must be a URL')
    .default('https://api.github.com')
    .describe('Base URL of the hosting REST API'),

  rawBaseUrl: z.string()
    .url('Raw base URL must be a URL')
    .default('https://raw.githubusercontent.com')
    .describe('Base URL raw file content is served from'),

  mediaBaseUrl: z.string()
    .url('Media base URL must be a URL')
    .default('https://media.githubusercontent.com')
    .describe('Base URL large-object content is served from'),

  timeout: z.number()
    .int('Timeout must be an integer')
    .min(1, 'Timeout must be >= 1')
    .default(30_000)
    .describe('Per-request timeout in milliseconds'),

  retries: z.number()
    .int('Retries must be an integer')
    .min(0, 'Retries must be >= 0')
    .max(10, 'Retries must be <= 10')
    .default(3)
    .describe('Retries for transient request failures'),

  exclude: z.array(z.string().min(1, 'Exclude pattern must not be empty'))
    .default([])
    .describe('Glob patterns of files to leave out, relative to the downloaded directory')
}).strict()

export type Config = z.infer<typeof ConfigSchema>

export type ConfigValidation =
  | { success: true; data: Config }
  | { success: false; errors: z.ZodError }

/**
 * Validate configuration data, throwing on failure
 */
export function validateConfig(data: unknown): Config {
  return ConfigSchema.parse(data ?? {})
}

/**
 * Validate configuration data with detailed errors
 *
 * An empty document is a valid configuration with every default.
 */
export function validateConfigSafe(data: unknown): ConfigValidation {
  const result = ConfigSchema.safeParse(data ?? {})
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
