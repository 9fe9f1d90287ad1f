import { mkdir, readFile, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { keccak256, toBytes } from "viem";
import { z } from "zod";
import type { OutputSink } from "../output/types";
import type { Clock } from "./rate-limit";

const entrySchema = z.object({
  url: z.string(),
  storedAt: z.number(),
  body: z.string(),
});

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Response bodies on disk, one file per URL, expiring after `ttlSeconds`.
 * IO failures are reported to `sink` as warnings; reads then miss and writes are skipped.
 */
export class DiskCache {
  constructor(
    private readonly dir: string,
    private readonly ttlSeconds: number,
    private readonly clock: Clock,
    private readonly sink?: OutputSink
  ) {}

  private warn(title: string, message: string): void {
    this.sink?.add({ level: "warning", kind: "fetch", title, message });
  }

  private fileFor(url: string): string {
    return join(this.dir, `${keccak256(toBytes(url)).slice(2)}.json`);
  }

  async get(url: string): Promise<string | undefined> {
    let raw: string;
    try {
      raw = await readFile(this.fileFor(url), "utf-8");
    } catch (err) {
      if (!(err instanceof Error && "code" in err && err.code === "ENOENT")) {
        this.warn("Cache read failed", `Ignoring cached response for ${url}: ${errorMessage(err)}`);
      }
      return undefined;
    }
    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch {
      // Truncated write; refetch.
      return undefined;
    }
    const entry = entrySchema.safeParse(parsed);
    if (!entry.success || entry.data.url !== url) return undefined;
    if (this.clock.now() - entry.data.storedAt > this.ttlSeconds * 1000) return undefined;
    return entry.data.body;
  }

  async set(url: string, body: string): Promise<void> {
    const entry: z.infer<typeof entrySchema> = { url, storedAt: this.clock.now(), body };
    try {
      await mkdir(this.dir, { recursive: true });
      await writeFile(this.fileFor(url), JSON.stringify(entry));
    } catch (err) {
      this.warn("Cache write failed", `Response for ${url} was not cached: ${errorMessage(err)}`);
    }
  }
}
