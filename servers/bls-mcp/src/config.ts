import { z } from 'zod';

const HOUR_MS = 60 * 60 * 1000;

export const DEFAULT_CACHE_TTL_HOURS = 24;
export const DEFAULT_CACHE_TTL_MS = DEFAULT_CACHE_TTL_HOURS * HOUR_MS;

const envSchema = z.object({
  BLS_API_KEY: z.string().optional(),
  BLS_CACHE_TTL_HOURS: z.coerce.number().positive().optional()
});

export interface BlsConfig {
  /** Registration key for the v2 API; undefined selects the public v1 API. */
  apiKey?: string;
  cacheTtlMs: number;
}

/**
 * Blank keys and unfilled template placeholders such as `<your-key>`
 * count as no key at all.
 */
export function normalizeApiKey(raw: string | undefined): string | undefined {
  const key = raw?.trim();
  if (!key || key.startsWith('<')) return undefined;
  return key;
}

export function loadBlsConfig(env: NodeJS.ProcessEnv = process.env): BlsConfig {
  const parsed = envSchema.safeParse({
    BLS_API_KEY: env.BLS_API_KEY,
    BLS_CACHE_TTL_HOURS: env.BLS_CACHE_TTL_HOURS || undefined
  });
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new Error(`Invalid BLS configuration (${issue.path.join('.')}): ${issue.message}`);
  }

  return {
    apiKey: normalizeApiKey(parsed.data.BLS_API_KEY),
    cacheTtlMs: parsed.data.BLS_CACHE_TTL_HOURS === undefined
      ? DEFAULT_CACHE_TTL_MS
      : parsed.data.BLS_CACHE_TTL_HOURS * HOUR_MS
  };
}
