/**
 * Environment configuration for scripts and workers.
 */

import { z } from 'zod';

const PLACEHOLDERS = ['MISSING', 'PLACEHOLDER', 'your-key', 'changeme'];

const envSchema = z.object({
  INPUT_DIR: z.string().min(1).default('output/estimates'),
  OUTPUT_DIR: z.string().min(1).default('output'),
  EXTRACTION_CONCURRENCY: z.coerce.number().int().min(1).max(32).default(4),
  REDIS_URL: z.string().default('redis://localhost:6379'),
  CLOUD_STORAGE_ENABLED: z.string().default('').transform((v) => v.trim().toLowerCase()),
  CI: z.string().default(''),
  CLOUDFLARE_R2_ACCOUNT_ID: z.string().default(''),
  CLOUDFLARE_R2_ACCESS_KEY: z.string().default(''),
  CLOUDFLARE_R2_SECRET_KEY: z.string().default(''),
  CLOUDFLARE_R2_BUCKET: z.string().default(''),
});

export interface R2Config {
  accountId: string;
  accessKeyId: string;
  secretAccessKey: string;
  bucket: string;
}

export interface AppConfig {
  inputDir: string;
  outputDir: string;
  concurrency: number;
  redisUrl: string;
  /** Null when cloud storage is disabled or not fully configured */
  r2: R2Config | null;
}

function isRealValue(value: string): boolean {
  return value.trim().length > 0 && !PLACEHOLDERS.some((p) => value.includes(p));
}

/**
 * Cloud storage is on when explicitly enabled, or on CI when credentials
 * are present; local runs stay local unless asked otherwise.
 */
function resolveR2(env: z.infer<typeof envSchema>): R2Config | null {
  const r2: R2Config = {
    accountId: env.CLOUDFLARE_R2_ACCOUNT_ID,
    accessKeyId: env.CLOUDFLARE_R2_ACCESS_KEY,
    secretAccessKey: env.CLOUDFLARE_R2_SECRET_KEY,
    bucket: env.CLOUDFLARE_R2_BUCKET,
  };
  const complete = Object.values(r2).every(isRealValue);

  if (env.CLOUD_STORAGE_ENABLED === 'false') return null;
  if (env.CLOUD_STORAGE_ENABLED === 'true') return complete ? r2 : null;
  return env.CI.toLowerCase() === 'true' && complete ? r2 : null;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new Error(`Invalid environment configuration: ${issues}`);
  }

  const parsed = result.data;
  return {
    inputDir: parsed.INPUT_DIR,
    outputDir: parsed.OUTPUT_DIR,
    concurrency: parsed.EXTRACTION_CONCURRENCY,
    redisUrl: parsed.REDIS_URL,
    r2: resolveR2(parsed),
  };
}
