import { z } from 'zod';

// Reads directly from process.env; every value has a default so a bare
// `next dev` runs with in-memory stores and an in-process worker pool.

const flag = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1');

const envSchema = z.object({
  MONGODB_URI: z.string().min(1).optional(),
  REDIS_URL: z.string().min(1).optional(),
  WORKER_CONCURRENCY: z.coerce.number().int().min(1).max(64).default(4),
  JOB_TIMEOUT_MS: z.coerce.number().int().positive().default(180_000),
  VALIDATION_THRESHOLD: z.coerce.number().int().min(0).max(100).default(90),
  VALIDATE_COLLECTIONS: flag.default('true'),
  ALLOWED_SOURCE_HOSTS: z.string().default(''),
  COLLABORATOR_URL: z.string().url().default('http://localhost:8100'),
  COLLABORATOR_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  COLLABORATOR_RETRIES: z.coerce.number().int().min(0).max(5).default(2),
  PRIORITY_HINT_COUNT: z.coerce.number().int().min(0).max(100).default(10)
});

export interface AppConfig {
  mongodbUri?: string;
  redisUrl?: string;
  workerConcurrency: number;
  pipeline: {
    jobTimeoutMs: number;
    validationThreshold: number;
    validateCollections: boolean;
    priorityHintCount: number;
  };
  allowedSourceHosts: string[];
  collaborator: {
    baseUrl: string;
    timeoutMs: number;
    maxRetries: number;
  };
}

export type EnvSource = Record<string, string | undefined>;

function blankToUndefined(env: EnvSource): EnvSource {
  const out: EnvSource = {};
  for (const [key, value] of Object.entries(env)) {
    out[key] = value === undefined || value.trim() === '' ? undefined : value.trim();
  }
  return out;
}

export function getAppConfig(env: EnvSource = process.env): AppConfig {
  const parsed = envSchema.safeParse(blankToUndefined(env));
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new Error(`Invalid environment: ${issue?.path.join('.') ?? 'unknown'} ${issue?.message ?? ''}`.trim());
  }
  const vars = parsed.data;

  return {
    mongodbUri: vars.MONGODB_URI,
    redisUrl: vars.REDIS_URL,
    workerConcurrency: vars.WORKER_CONCURRENCY,
    pipeline: {
      jobTimeoutMs: vars.JOB_TIMEOUT_MS,
      validationThreshold: vars.VALIDATION_THRESHOLD,
      validateCollections: vars.VALIDATE_COLLECTIONS,
      priorityHintCount: vars.PRIORITY_HINT_COUNT
    },
    allowedSourceHosts: vars.ALLOWED_SOURCE_HOSTS.split(',')
      .map((host) => host.trim().toLowerCase())
      .filter(Boolean),
    collaborator: {
      baseUrl: vars.COLLABORATOR_URL.replace(/\/+$/, ''),
      timeoutMs: vars.COLLABORATOR_TIMEOUT_MS,
      maxRetries: vars.COLLABORATOR_RETRIES
    }
  };
}
