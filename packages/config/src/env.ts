import { z } from 'zod';
import { config as dotenvConfig } from 'dotenv';
import { ConfigError } from './errors.js';
import { ModelRequestShape, resolveRequestShape } from './model-shape.js';

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

  // Model API
  OPENAI_API_KEY: z
    .string()
    .min(1)
    .refine((key) => key.startsWith('sk-'), 'OpenAI API key must start with "sk-"'),
  OPENAI_MODEL: z.string().min(1).default('gpt-4o-mini'),
  OPENAI_MAX_TOKENS: z.coerce.number().int().min(100).max(4000).default(4000),
  OPENAI_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.1),
  OPENAI_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),
  OPENAI_MAX_RETRIES: z.coerce.number().int().min(0).max(5).default(2),

  // Classification
  CLASSIFICATION_CONCURRENCY: z.coerce.number().int().min(1).max(20).default(5),
  MAX_EMAILS_PER_RUN: z.coerce.number().int().min(1).max(1000).default(100),
  CACHE_MAX_SIZE: z.coerce.number().int().min(1).default(1000),
  CATEGORIES_FILE: z.string().min(1).default('config/categories.yaml'),

  // Logging
  LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),
});

export type Env = z.infer<typeof envSchema>;

export interface OpenAIConfig {
  readonly apiKey: string;
  readonly model: string;
  readonly requestShape: ModelRequestShape;
  readonly maxTokens: number;
  readonly temperature: number;
  readonly timeoutMs: number;
  readonly maxRetries: number;
}

export interface ClassificationSettings {
  readonly concurrency: number;
  readonly maxEmailsPerRun: number;
  readonly cacheMaxSize: number;
  readonly categoriesFile: string;
}

export interface AppConfig {
  readonly nodeEnv: Env['NODE_ENV'];
  readonly logLevel: Env['LOG_LEVEL'];
  readonly openai: OpenAIConfig;
  readonly classification: ClassificationSettings;
}

export type EnvSource = Record<string, string | undefined>;

export function parseEnv(source: EnvSource): Env {
  const parsed = envSchema.safeParse(source);
  if (!parsed.success) {
    throw ConfigError.fromZod('Invalid environment variables', parsed.error);
  }
  return parsed.data;
}

export function toAppConfig(env: Env): AppConfig {
  return {
    nodeEnv: env.NODE_ENV,
    logLevel: env.LOG_LEVEL,
    openai: {
      apiKey: env.OPENAI_API_KEY,
      model: env.OPENAI_MODEL,
      // Decided once here so request building never re-inspects the model name
      requestShape: resolveRequestShape(env.OPENAI_MODEL),
      maxTokens: env.OPENAI_MAX_TOKENS,
      temperature: env.OPENAI_TEMPERATURE,
      timeoutMs: env.OPENAI_TIMEOUT_MS,
      maxRetries: env.OPENAI_MAX_RETRIES,
    },
    classification: {
      concurrency: env.CLASSIFICATION_CONCURRENCY,
      maxEmailsPerRun: env.MAX_EMAILS_PER_RUN,
      cacheMaxSize: env.CACHE_MAX_SIZE,
      categoriesFile: env.CATEGORIES_FILE,
    },
  };
}

export interface LoadConfigOptions {
  // Defaults to process.env
  source?: EnvSource;
  // .env file merged into process.env first; false skips it
  envFile?: string | false;
}

/**
 * Build the application configuration. Each call returns a fresh object that
 * callers pass on explicitly; nothing is cached at module level.
 */
export function loadConfig(options: LoadConfigOptions = {}): AppConfig {
  const { source, envFile } = options;

  if (source === undefined && envFile !== false) {
    dotenvConfig(envFile ? { path: envFile } : undefined);
  }

  return toAppConfig(parseEnv(source ?? process.env));
}
