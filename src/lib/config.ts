/**
 * FeedSync — Configuration
 *
 * Reads settings from the environment (and .env via dotenv).
 * Validated once with zod; invalid settings fail at startup.
 */

import 'dotenv/config';
import { z } from 'zod';
import { InvalidInputError } from './errors';

const positiveInt = (fallback: number) =>
  z.coerce.number().int().positive().default(fallback);

const EnvSchema = z
  .object({
    FETCH_TIMEOUT_MS: positiveInt(10_000),
    SYNC_CONCURRENCY: positiveInt(4),
    USER_AGENT: z.string().min(1).default('FeedSync/1.0'),
    STORAGE_BACKEND: z.enum(['memory', 'supabase']).default('memory'),
    SUPABASE_URL: z.string().url().optional(),
    SUPABASE_SERVICE_ROLE_KEY: z.string().min(1).optional(),
  })
  .superRefine((env, ctx) => {
    if (env.STORAGE_BACKEND !== 'supabase') return;
    if (!env.SUPABASE_URL) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['SUPABASE_URL'],
        message: 'required when STORAGE_BACKEND=supabase',
      });
    }
    if (!env.SUPABASE_SERVICE_ROLE_KEY) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['SUPABASE_SERVICE_ROLE_KEY'],
        message: 'required when STORAGE_BACKEND=supabase',
      });
    }
  });

export type StorageConfig =
  | { backend: 'memory' }
  | { backend: 'supabase'; url: string; serviceRoleKey: string };

export interface FeedSyncConfig {
  fetchTimeoutMs: number;
  syncConcurrency: number;
  userAgent: string;
  storage: StorageConfig;
}

/**
 * Build the config from an env map. Empty strings count as unset.
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env
): FeedSyncConfig {
  const cleaned = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== '')
  );

  const parsed = EnvSchema.safeParse(cleaned);
  if (!parsed.success) {
    const problems = parsed.error.issues
      .map(issue => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new InvalidInputError(`Invalid configuration: ${problems}`);
  }

  const data = parsed.data;
  const storage: StorageConfig =
    data.STORAGE_BACKEND === 'supabase' && data.SUPABASE_URL && data.SUPABASE_SERVICE_ROLE_KEY
      ? {
          backend: 'supabase',
          url: data.SUPABASE_URL,
          serviceRoleKey: data.SUPABASE_SERVICE_ROLE_KEY,
        }
      : { backend: 'memory' };

  return {
    fetchTimeoutMs: data.FETCH_TIMEOUT_MS,
    syncConcurrency: data.SYNC_CONCURRENCY,
    userAgent: data.USER_AGENT,
    storage,
  };
}
