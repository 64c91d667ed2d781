import { z } from 'zod';
import { ConfigError } from './errors';
import type { LogLevelName } from './utils/logger';

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1');

const optionalSecret = z
  .string()
  .optional()
  .transform((value) => (value && value.trim() ? value.trim() : undefined));

const envSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(4000),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  ENABLE_ML: booleanFlag.default('true'),
  GROQ_API_KEY: optionalSecret,
  GROQ_MODEL: z.string().min(1).default('llama-3.1-8b-instant'),
  HF_API_TOKEN: optionalSecret,
  ZERO_SHOT_MODEL: z.string().min(1).default('facebook/bart-large-mnli'),
  ML_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
  ANALYSIS_CONCURRENCY: z.coerce.number().int().min(1).max(64).default(4),
  COMPLAINT_THRESHOLD: z.coerce.number().min(0).max(1).default(0.5),
});

export type AppConfig = {
  port: number;
  logLevel: LogLevelName;
  enableMl: boolean;
  groqApiKey?: string;
  groqModel: string;
  hfApiToken?: string;
  zeroShotModel: string;
  mlTimeoutMs: number;
  analysisConcurrency: number;
  complaintThreshold: number;
};

/**
 * Validates environment variables and applies defaults. Empty strings are
 * treated as unset so a blank line in .env does not fail validation.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const present: Record<string, string> = {};
  for (const key of Object.keys(envSchema.shape)) {
    const value = env[key];
    if (value !== undefined && value !== '') present[key] = value;
  }

  const parsed = envSchema.safeParse(present);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map(
        (issue) => `${issue.path.join('.')}: ${issue.message}`,
      ),
    );
  }

  const values = parsed.data;
  return {
    port: values.PORT,
    logLevel: values.LOG_LEVEL,
    enableMl: values.ENABLE_ML,
    groqApiKey: values.GROQ_API_KEY,
    groqModel: values.GROQ_MODEL,
    hfApiToken: values.HF_API_TOKEN,
    zeroShotModel: values.ZERO_SHOT_MODEL,
    mlTimeoutMs: values.ML_TIMEOUT_MS,
    analysisConcurrency: values.ANALYSIS_CONCURRENCY,
    complaintThreshold: values.COMPLAINT_THRESHOLD,
  };
}
