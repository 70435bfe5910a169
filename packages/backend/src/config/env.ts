import dotenv from 'dotenv';
import { z } from 'zod';

// Load .env file before validation
dotenv.config();

const positiveInt = (fallback: string) =>
  z
    .string()
    .default(fallback)
    .transform(Number)
    .pipe(z.number().int().positive());

const booleanFlag = (fallback: 'true' | 'false') =>
  z
    .enum(['true', 'false'])
    .default(fallback)
    .transform((val) => val === 'true');

const commaList = (fallback: string) =>
  z
    .string()
    .default(fallback)
    .transform((val) => val.split(',').map((s) => s.trim()).filter(Boolean));

const envSchema = z.object({
  PORT: positiveInt('3000'),

  DATABASE_URL: z
    .string({ required_error: 'DATABASE_URL is required' })
    .url('DATABASE_URL must be a valid URL')
    .startsWith('postgresql://', 'DATABASE_URL must be a PostgreSQL connection URL'),

  JWT_SECRET: z
    .string({ required_error: 'JWT_SECRET is required' })
    .min(32, 'JWT_SECRET must be at least 32 characters'),

  CORS_ORIGINS: commaList('http://localhost:5173'),

  NODE_ENV: z
    .enum(['development', 'production', 'test'])
    .default('development'),

  LOG_LEVEL: z
    .enum(['debug', 'info', 'warn', 'error'])
    .default('info'),

  // OpenSearch
  OPENSEARCH_NODE_URLS: commaList('http://localhost:9200'),

  OPENSEARCH_USERNAME: z
    .string()
    .optional(),

  OPENSEARCH_PASSWORD: z
    .string()
    .optional(),

  OPENSEARCH_REQUEST_TIMEOUT_MS: positiveInt('30000'),

  OPENSEARCH_MAX_RETRIES: z
    .string()
    .default('5')
    .transform(Number)
    .pipe(z.number().int().min(0)),

  OPENSEARCH_SSL_CERT_PATH: z
    .string()
    .optional(),

  // Stacker indexing
  STACKER_COUNTS_TTL_MS: positiveInt('180000'),

  STACKER_BULK_CHUNK_SIZE: positiveInt('5000'),

  STACKER_WORKER_ENABLED: booleanFlag('true'),

  // Signed street view links on the property detail panel
  GOOGLE_STREET_VIEW_API_KEY: z
    .string()
    .optional(),

  GOOGLE_STREET_VIEW_SECRET: z
    .string()
    .optional(),

  // Redis (JWT revocation list)
  REDIS_URL: z
    .string()
    .optional(),
});

export type Env = z.infer<typeof envSchema>;

function validateEnv(): Env {
  const result = envSchema.safeParse(process.env);

  if (!result.success) {
    const formatted = result.error.issues
      .map((issue) => `  - ${issue.path.join('.')}: ${issue.message}`)
      .join('\n');

    console.error('Environment validation failed:\n' + formatted);
    process.exit(1);
  }

  return result.data;
}

export const env = validateEnv();
