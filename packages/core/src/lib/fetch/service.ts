import { z } from "zod";
import { abiSchema, type AbiEntry } from "../abi/types";
import { FetchError } from "../output/errors";
import type { OutputSink } from "../output/types";
import { DiskCache } from "./cache";
import { SOURCIFY_HOST, loadFetchServiceConfig, type FetchServiceConfig } from "./config";
import { TokenBucket, systemClock, type Clock } from "./rate-limit";

/** Source of JSON documents referenced by URL from a descriptor. */
export interface Fetcher {
  getJson<T>(url: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T>;
}

const GITHUB_HOST = "github.com";
const GITHUB_RAW_HOST = "raw.githubusercontent.com";

/** Point GitHub file pages at their raw content. */
export function rewriteGithubUrl(url: string): string {
  const parsed = new URL(url);
  if (parsed.host !== GITHUB_HOST) return url;
  parsed.host = GITHUB_RAW_HOST;
  parsed.pathname = parsed.pathname.replace("/blob/", "/");
  return parsed.toString();
}

const sourcifyMetadataSchema = z.object({
  output: z.object({ abi: abiSchema }),
});

function retryDelayMs(response: Response, attempt: number): number {
  const retryAfter = Number(response.headers.get("retry-after"));
  return Number.isFinite(retryAfter) && retryAfter > 0 ? retryAfter * 1000 : 2 ** attempt * 1000;
}

/**
 * HTTP access for descriptor resolution: GitHub URL rewriting, an on-disk
 * cache, per-host rate limiting with retries on HTTP 429.
 */
export class FetchService implements Fetcher {
  private readonly cache?: DiskCache;
  private readonly buckets = new Map<string, TokenBucket>();

  /** @param sink receives warnings about the on-disk cache */
  constructor(
    private readonly config: FetchServiceConfig,
    private readonly clock: Clock = systemClock,
    sink?: OutputSink
  ) {
    if (config.cacheDir !== undefined) {
      this.cache = new DiskCache(config.cacheDir, config.cacheTtlSeconds, clock, sink);
    }
    for (const [host, limit] of Object.entries(config.rateLimits)) {
      this.buckets.set(host, new TokenBucket(limit.rate, limit.capacity, clock));
    }
  }

  static fromEnv(env: NodeJS.ProcessEnv = process.env, sink?: OutputSink): FetchService {
    return new FetchService(loadFetchServiceConfig(env), systemClock, sink);
  }

  async getJson<T>(url: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T> {
    const body = await this.getText(url);
    let json: unknown;
    try {
      json = JSON.parse(body);
    } catch (err) {
      throw new FetchError(url, `response is not JSON: ${err instanceof Error ? err.message : String(err)}`);
    }
    const result = schema.safeParse(json);
    if (!result.success) {
      throw new FetchError(url, `unexpected response: ${result.error.issues.map((issue) => issue.message).join("; ")}`);
    }
    return result.data;
  }

  /** ABIs of a verified contract, from Sourcify. */
  async getContractAbis(chainId: number, address: string): Promise<AbiEntry[]> {
    const url = `https://${SOURCIFY_HOST}/contracts/full_match/${chainId}/${address}/metadata.json`;
    const metadata = await this.getJson(url, sourcifyMetadataSchema);
    return metadata.output.abi;
  }

  private async getText(url: string): Promise<string> {
    const target = rewriteGithubUrl(url);
    // Sourcify redirects to content that must not be cached under the original URL.
    const cacheable = new URL(target).host !== SOURCIFY_HOST;

    if (cacheable) {
      const cached = await this.cache?.get(target);
      if (cached !== undefined) return cached;
    }

    const body = await this.request(target);
    if (cacheable) await this.cache?.set(target, body);
    return body;
  }

  private withSourcifyOptions(url: string): string {
    const parsed = new URL(url);
    if (parsed.host !== SOURCIFY_HOST) return url;
    if (this.config.sourcifyApiHost !== undefined) parsed.host = this.config.sourcifyApiHost;
    if (this.config.sourcifyApiKey !== undefined) parsed.searchParams.set("apikey", this.config.sourcifyApiKey);
    return parsed.toString();
  }

  private async request(url: string): Promise<string> {
    const bucket = this.buckets.get(new URL(url).host);
    const target = this.withSourcifyOptions(url);

    for (let attempt = 0; ; attempt++) {
      await bucket?.take();

      let response: Response;
      try {
        response = await fetch(target, { signal: AbortSignal.timeout(this.config.timeoutMs) });
      } catch (err) {
        throw new FetchError(url, err instanceof Error ? err.message : String(err));
      }

      if (response.status === 429 && attempt < this.config.maxRateLimitRetries) {
        await this.clock.sleep(retryDelayMs(response, attempt));
        continue;
      }
      if (!response.ok) {
        throw new FetchError(url, `${response.status} ${response.statusText}`, response.status);
      }
      try {
        return await response.text();
      } catch (err) {
        throw new FetchError(url, `failed to read response: ${err instanceof Error ? err.message : String(err)}`);
      }
    }
  }
}
