import { homedir } from "node:os";
import { join } from "node:path";
import { z } from "zod";

export const SOURCIFY_HOST = "repo.sourcify.dev";

const rateLimitSchema = z.object({
  /** Tokens added per second. */
  rate: z.number().positive(),
  capacity: z.number().int().positive(),
});

export type RateLimit = z.infer<typeof rateLimitSchema>;

export const fetchServiceConfigSchema = z.object({
  /** Directory of the on-disk response cache; no caching when unset. */
  cacheDir: z.string().min(1).optional(),
  cacheTtlSeconds: z.number().int().nonnegative().default(7 * 24 * 3600),
  timeoutMs: z.number().int().positive().default(10_000),
  /** Token buckets, keyed by host. */
  rateLimits: z.record(rateLimitSchema).default({ [SOURCIFY_HOST]: { rate: 10, capacity: 10 } }),
  maxRateLimitRetries: z.number().int().nonnegative().default(3),
  sourcifyApiHost: z.string().min(1).optional(),
  sourcifyApiKey: z.string().min(1).optional(),
});

export type FetchServiceConfig = z.infer<typeof fetchServiceConfigSchema>;
export type FetchServiceConfigInput = z.input<typeof fetchServiceConfigSchema>;

const envSchema = z.object({
  CLEARSIGN_CACHE_DIR: z.string().min(1).optional(),
  CLEARSIGN_CACHE_TTL: z.coerce.number().int().nonnegative().optional(),
  CLEARSIGN_HTTP_TIMEOUT_MS: z.coerce.number().int().positive().optional(),
  SOURCIFY_API_HOST: z.string().min(1).optional(),
  SOURCIFY_API_KEY: z.string().min(1).optional(),
  XDG_CACHE_HOME: z.string().min(1).optional(),
});

export function defaultCacheDir(env: NodeJS.ProcessEnv = process.env): string {
  return join(env.XDG_CACHE_HOME || join(homedir(), ".cache"), "clearsign");
}

/**
 * Build the fetch service configuration from environment variables.
 *
 * @throws {z.ZodError} if a variable holds an invalid value
 */
export function loadFetchServiceConfig(env: NodeJS.ProcessEnv = process.env): FetchServiceConfig {
  const vars = envSchema.parse(env);
  return fetchServiceConfigSchema.parse({
    cacheDir: vars.CLEARSIGN_CACHE_DIR ?? defaultCacheDir(env),
    cacheTtlSeconds: vars.CLEARSIGN_CACHE_TTL,
    timeoutMs: vars.CLEARSIGN_HTTP_TIMEOUT_MS,
    sourcifyApiHost: vars.SOURCIFY_API_HOST,
    sourcifyApiKey: vars.SOURCIFY_API_KEY,
  });
}
