import { config as loadEnv } from 'dotenv';
import { z } from 'zod';

loadEnv();

const logLevels = [
  'fatal',
  'error',
  'warn',
  'info',
  'debug',
  'trace',
  'silent'
] as const;

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  LOG_LEVEL: z.enum(logLevels).default('info'),
  OPENAI_API_KEY: z
    .string()
    .optional()
    .describe('API key for the vision model; only needed when images are analyzed'),
  OPENAI_BASE_URL: z.string().url('OPENAI_BASE_URL must be a valid URL').optional(),
  OPENAI_MODEL: z.string().min(1).default('gpt-4o-mini'),
  VISION_MAX_IMAGE_EDGE: z
    .string()
    .default('1024')
    .transform(value => Number(value))
    .pipe(
      z
        .number()
        .int()
        .min(64)
        .max(4096)
        .describe('VISION_MAX_IMAGE_EDGE must be within 64-4096')
    ),
  EXIFTOOL_TIMEOUT_MS: z
    .string()
    .default('30000')
    .transform(value => Number(value))
    .pipe(
      z
        .number()
        .int()
        .min(1000)
        .max(600000)
        .describe('EXIFTOOL_TIMEOUT_MS must be within 1000-600000ms')
    ),
  METADATA_MIN_DESCRIPTION_LENGTH: z
    .string()
    .default('10')
    .transform(value => Number(value))
    .pipe(
      z
        .number()
        .int()
        .min(0)
        .describe('METADATA_MIN_DESCRIPTION_LENGTH must be a non-negative integer')
    ),
  METADATA_PLACEHOLDER_COMMENTS: z
    .string()
    .default('Screenshot')
    .transform(value =>
      value
        .split(',')
        .map(entry => entry.trim())
        .filter(entry => entry.length > 0)
    ),
  REINDEX_COMMAND: z.string().min(1).default('mdimport')
});

const parseResult = envSchema.safeParse(process.env);

if (!parseResult.success) {
  const formatted = parseResult.error.flatten();
  const errors = Object.entries(formatted.fieldErrors)
    .map(([field, messages]) => `${field}: ${messages?.join(', ')}`)
    .join('\n');

  throw new Error(`Environment validation failed:\n${errors}`);
}

const data = parseResult.data;

export const env = {
  ...data,
  isDevelopment: data.NODE_ENV === 'development',
  isProduction: data.NODE_ENV === 'production',
  isTest: data.NODE_ENV === 'test'
};

export type AppEnvironment = typeof env;
