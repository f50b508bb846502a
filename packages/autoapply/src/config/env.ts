import { z } from 'zod';

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .transform((v) => v === 'true' || v === '1');

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'staging', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).optional(),
  ANTHROPIC_API_KEY: z.string().min(1).optional(),
  AUTOAPPLY_ORACLE_MODEL: z.string().min(1).default('claude-haiku-4-5-20251001'),
  AUTOAPPLY_ORACLE_TIMEOUT_MS: z.coerce.number().int().positive().default(60_000),
  AUTOAPPLY_RECOMMENDER: z.enum(['heuristic', 'oracle', 'hybrid']).default('hybrid'),
  AUTOAPPLY_MAX_ITERATIONS: z.coerce.number().int().positive().max(100).default(20),
  AUTOAPPLY_MAX_ATTEMPTS: z.coerce.number().int().positive().max(10).default(3),
  AUTOAPPLY_HEADLESS: booleanFlag.default('false'),
  AUTOAPPLY_BROWSER_EXECUTABLE: z.string().min(1).optional(),
  AUTOAPPLY_PAGE_LOAD_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  AUTOAPPLY_ELEMENT_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
  AUTOAPPLY_COOKIE_DIR: z.string().min(1).default('cookies'),
  AUTOAPPLY_PATTERN_STORE: z.string().min(1).optional(),
  AUTOAPPLY_ATTEMPT_LOG: z.string().min(1).optional(),
  AUTOAPPLY_SCREENSHOT_DIR: z.string().min(1).optional(),
  AUTOAPPLY_MIN_COMPATIBILITY: z.coerce.number().min(0).max(100).optional(),
  AUTOAPPLY_CONCURRENCY: z.coerce.number().int().positive().max(16).default(1),
});

export type Env = z.infer<typeof envSchema>;

let _env: Env | null = null;

export function getEnv(): Env {
  if (!_env) {
    _env = envSchema.parse(process.env);
  }
  return _env;
}

/** Parse an explicit environment map without touching the cached process env. */
export function parseEnv(source: Record<string, string | undefined>): Env {
  return envSchema.parse(source);
}

export function resetEnvCache(): void {
  _env = null;
}
