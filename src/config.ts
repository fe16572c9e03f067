/**
 * Configuration management using Zod for validation.
 */

import { z } from 'zod';
import dotenv from 'dotenv';
import { fileURLToPath } from 'url';
import { dirname, join } from 'path';
import { existsSync } from 'fs';
import type { Knex } from 'knex';

// Get directory name in ES modules
const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);
const rootDir = join(__dirname, '..');

// Load .env file if it exists
const envPath = join(rootDir, '.env');
if (existsSync(envPath)) {
  dotenv.config({ path: envPath });
}

/**
 * Configuration schema with validation and defaults.
 */
export const ConfigSchema = z.object({
  // LLM Provider Configuration
  LLM_PROVIDER: z.enum(['openai', 'anthropic']).default('openai'),
  LLM_MODEL: z.string().default('gpt-4o-mini'),
  LLM_MAX_TOKENS: z.coerce.number().int().positive().default(2048),
  LLM_MAX_RETRIES: z.coerce.number().int().positive().default(1),

  // API Keys (provider-specific, checked when the model is first used)
  OPENAI_API_KEY: z.string().optional(),
  ANTHROPIC_API_KEY: z.string().optional(),

  // Database Configuration
  DATABASE_TYPE: z.enum(['sqlite3', 'pg']).default('sqlite3'),
  DATABASE_PATH: z.string().default('./database.db'),
  DATABASE_URL: z.string().optional(),

  // Source workbooks for provisioning
  DATA_DIR: z.string().default('./data'),

  // Server Configuration
  LOG_LEVEL: z
    .enum(['DEBUG', 'INFO', 'WARN', 'ERROR', 'FATAL', 'SILENT'])
    .default('INFO'),
  HOST: z.string().default('0.0.0.0'),
  PORT: z.coerce.number().int().positive().default(8000),
});

/**
 * Type for base configuration object.
 */
type BaseConfig = z.infer<typeof ConfigSchema>;

export type DatabaseType = BaseConfig['DATABASE_TYPE'];

export interface LLMConfig {
  provider: BaseConfig['LLM_PROVIDER'];
  model: string;
  apiKey?: string;
  maxTokens: number;
  maxRetries: number;
}

/**
 * Extended configuration with parsed KNEX_CONFIG and LLM_CONFIG.
 */
export interface Config
  extends Omit<
    BaseConfig,
    | 'DATABASE_PATH'
    | 'DATABASE_URL'
    | 'LLM_PROVIDER'
    | 'LLM_MODEL'
    | 'LLM_MAX_TOKENS'
    | 'LLM_MAX_RETRIES'
    | 'OPENAI_API_KEY'
    | 'ANTHROPIC_API_KEY'
  > {
  KNEX_CONFIG: Knex.Config;
  LLM_CONFIG: LLMConfig;
}

/**
 * Build the configuration object from an environment map.
 * Throws ZodError on invalid values and Error on missing connection settings.
 */
export function buildConfig(env: NodeJS.ProcessEnv): Config {
  const baseConfig = ConfigSchema.parse(env);

  // Build Knex config based on database type
  let knexConfig: Knex.Config;

  switch (baseConfig.DATABASE_TYPE) {
    case 'sqlite3':
      knexConfig = {
        client: 'better-sqlite3',
        connection: {
          filename: baseConfig.DATABASE_PATH,
        },
        useNullAsDefault: true,
      };
      break;

    case 'pg':
      if (!baseConfig.DATABASE_URL) {
        throw new Error('DATABASE_URL is required when DATABASE_TYPE is pg');
      }
      knexConfig = {
        client: 'pg',
        connection: baseConfig.DATABASE_URL,
        pool: { min: 0, max: 5 },
      };
      break;
  }

  const llmConfig: LLMConfig = {
    provider: baseConfig.LLM_PROVIDER,
    model: baseConfig.LLM_MODEL,
    apiKey:
      baseConfig.LLM_PROVIDER === 'openai'
        ? baseConfig.OPENAI_API_KEY
        : baseConfig.ANTHROPIC_API_KEY,
    maxTokens: baseConfig.LLM_MAX_TOKENS,
    maxRetries: baseConfig.LLM_MAX_RETRIES,
  };

  const {
    DATABASE_PATH,
    DATABASE_URL,
    LLM_PROVIDER,
    LLM_MODEL,
    LLM_MAX_TOKENS,
    LLM_MAX_RETRIES,
    OPENAI_API_KEY,
    ANTHROPIC_API_KEY,
    ...rest
  } = baseConfig;

  return {
    ...rest,
    KNEX_CONFIG: knexConfig,
    LLM_CONFIG: llmConfig,
  };
}

/**
 * Parse and validate configuration from environment variables.
 */
function loadConfig(): Config {
  try {
    return buildConfig(process.env);
  } catch (error) {
    if (error instanceof z.ZodError) {
      console.error('Configuration validation failed:');
      for (const issue of error.issues) {
        console.error(`  - ${issue.path.join('.')}: ${issue.message}`);
      }
      process.exit(1);
    }
    if (error instanceof Error) {
      console.error(error.message);
      process.exit(1);
    }
    throw error;
  }
}

/**
 * Global configuration instance.
 */
export const config = loadConfig();
