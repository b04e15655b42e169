/**
 * Configuration module
 * Handles loading and validating configuration from environment
 */

import { z, ZodError } from 'zod';
import dotenv from 'dotenv';
import { resolve } from 'path';

/**
 * Configuration schema with zod validation
 * All options have sensible defaults
 */
export const ConfigSchema = z.object({
  // Output
  outputDir: z
    .string()
    .default('.')
    .describe('Directory the dataset file is written to'),

  // Context window
  maxContextLines: z
    .coerce
    .number()
    .int()
    .min(1)
    .max(100)
    .default(5)
    .describe('Maximum prior messages collected into one prompt'),
  windowMinutes: z
    .coerce
    .number()
    .positive()
    .default(10)
    .describe('How far back from the reference time a context line may be'),

  // Archive handling
  onInvalidFile: z
    .enum(['fail', 'skip'])
    .default('fail')
    .describe('Abort on a malformed message file, or skip it with a warning'),

  // Logging Configuration
  logLevel: z
    .enum(['debug', 'info', 'warn', 'error', 'silent'])
    .default('info')
    .describe('Logging verbosity level'),
  logFormat: z
    .enum(['json', 'pretty'])
    .default('pretty')
    .describe('Log output format'),
});

export type Config = z.infer<typeof ConfigSchema>;

export type InvalidFilePolicy = Config['onInvalidFile'];

/**
 * Configuration error with helpful messages
 */
export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly issues: z.ZodIssue[] = []
  ) {
    super(message);
    this.name = 'ConfigError';
  }

  static fromZodError(error: ZodError): ConfigError {
    const messages = error.issues.map(
      (issue) => `  - ${issue.path.join('.')}: ${issue.message}`
    );
    return new ConfigError(
      `Configuration validation failed:\n${messages.join('\n')}`,
      error.issues
    );
  }
}

/**
 * Load .env and .env.local from the working directory
 */
export function loadEnvFile(): void {
  dotenv.config({ path: resolve(process.cwd(), '.env') });
  dotenv.config({ path: resolve(process.cwd(), '.env.local') });
}

/**
 * Build raw config object from environment variables
 */
function buildRawConfig(): Record<string, unknown> {
  return {
    outputDir: process.env.SFT_OUTPUT_DIR,
    maxContextLines: process.env.SFT_MAX_CONTEXT_LINES,
    windowMinutes: process.env.SFT_WINDOW_MINUTES,
    onInvalidFile: process.env.SFT_ON_INVALID_FILE,
    logLevel: process.env.SFT_LOG_LEVEL,
    logFormat: process.env.SFT_LOG_FORMAT,
  };
}

/**
 * Load and validate configuration from environment
 * @throws ConfigError if validation fails
 */
export function loadConfig(): Config {
  loadEnvFile();

  const result = ConfigSchema.safeParse(buildRawConfig());

  if (!result.success) {
    throw ConfigError.fromZodError(result.error);
  }

  return result.data;
}

/**
 * Validate a partial config object
 */
export function validateConfig(config: unknown): Config {
  const result = ConfigSchema.safeParse(config);

  if (!result.success) {
    throw ConfigError.fromZodError(result.error);
  }

  return result.data;
}

/**
 * Get default configuration values
 */
export function getDefaultConfig(): Config {
  return ConfigSchema.parse({});
}

// Singleton config instance
let _config: Config | null = null;

/**
 * Get the global configuration instance (singleton)
 * Loads from environment on first access
 */
export function getConfig(): Config {
  if (!_config) {
    _config = loadConfig();
  }
  return _config;
}

/**
 * Set the global configuration instance
 * Useful for testing or programmatic configuration
 */
export function setConfig(config: Config): void {
  _config = validateConfig(config);
}

/**
 * Reset the global configuration instance
 * Forces reload on next getConfig() call
 */
export function resetConfig(): void {
  _config = null;
}

/**
 * Window length in milliseconds
 */
export function windowMs(config: Config): number {
  return Math.round(config.windowMinutes * 60_000);
}
