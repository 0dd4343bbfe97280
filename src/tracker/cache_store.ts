import { readFile, readdir, unlink } from "node:fs/promises";
import path from "node:path";
import { z } from "zod";

import { CacheError } from "./errors.js";
import { errorMessage } from "./error_utils.js";
import { KeyedSerializer, isNotFound, writeJsonAtomic } from "./json_file.js";
import { logger as rootLogger } from "./logger.js";
import { PLATFORMS } from "./types.js";
import type { CacheEntry, CacheKey, CollectionMode, Platform, Post, SourceLabel } from "./types.js";
import { keywordSlug, safeJsonParse } from "./utils.js";

const logger = rootLogger.child({ component: "cache_store" });

const MODES: readonly CollectionMode[] = ["historical", "hot"];
const MAX_DIAGNOSTICS = 50;

const PostSchema = z.object({
  platform: z.enum(PLATFORMS),
  id: z.string().min(1),
  title: z.string().optional(),
  body: z.string().optional(),
  author: z.string().optional(),
  timestamp: z.string().refine((value) => !Number.isNaN(Date.parse(value)), "invalid timestamp"),
  interactionCount: z.number().int().nonnegative(),
  url: z.string().optional(),
});

const CacheEntrySchema = z.object({
  version: z.literal(1),
  platform: z.enum(PLATFORMS),
  mode: z.enum(["historical", "hot"]),
  keyword: z.string(),
  keywordNormalized: z.string().min(1),
  sourceLabel: z.enum(["historical_archive", "historical_search", "time_all", "hot_listing"]),
  collectedAt: z.string().refine((value) => !Number.isNaN(Date.parse(value)), "invalid collectedAt"),
  posts: z.array(PostSchema),
});

/** Pure mapping from key to file; platform and mode are separate path segments so keys cannot collide. */
export function cacheKeyPath(rootDir: string, key: CacheKey): string {
  return path.join(rootDir, key.platform, key.mode, `${keywordSlug(key.keywordNormalized)}.json`);
}

export function cacheKeyId(key: CacheKey): string {
  return `${key.platform}/${key.mode}/${key.keywordNormalized}`;
}

export type CacheLookup =
  | { status: "hit"; entry: CacheEntry }
  | { status: "miss" }
  | { status: "corrupt" | "io_failure"; error: CacheError };

export interface PlatformCacheStats {
  entries: number;
  posts: number;
  keywords: string[];
  lastCollectedAt: string | null;
}

export interface CacheStats {
  totalEntries: number;
  totalPosts: number;
  lastCollectedAt: string | null;
  platforms: Record<Platform, PlatformCacheStats>;
}

function emptyPlatformStats(): PlatformCacheStats {
  return { entries: 0, posts: 0, keywords: [], lastCollectedAt: null };
}

function latest(a: string | null, b: string): string {
  return a === null || Date.parse(b) > Date.parse(a) ? b : a;
}

export class CacheStore {
  private readonly writes = new KeyedSerializer();
  private readonly recentDiagnostics: CacheError[] = [];

  constructor(private readonly rootDir: string) {}

  get directory(): string {
    return this.rootDir;
  }

  async read(key: CacheKey): Promise<CacheLookup> {
    const file = cacheKeyPath(this.rootDir, key);

    let raw: string;
    try {
      raw = await readFile(file, "utf-8");
    } catch (error) {
      if (isNotFound(error)) {
        return { status: "miss" };
      }
      const cacheError = new CacheError("io_failure", `Failed to read cache entry: ${errorMessage(error)}`, file, {
        cause: error,
      });
      this.recordDiagnostic(cacheError);
      return { status: "io_failure", error: cacheError };
    }

    const parsed = CacheEntrySchema.safeParse(safeJsonParse(raw));
    if (!parsed.success) {
      return this.corrupt(file, parsed.error.issues.map((issue) => `${issue.path.join(".") || "root"}: ${issue.message}`).join("; "));
    }

    const entry = parsed.data;
    if (entry.platform !== key.platform || entry.mode !== key.mode || entry.keywordNormalized !== key.keywordNormalized) {
      return this.corrupt(file, "entry does not belong to the requested key");
    }

    return { status: "hit", entry };
  }

  /** Unreadable and corrupt entries read as a miss; see `diagnostics()`. */
  async get(key: CacheKey): Promise<CacheEntry | null> {
    const lookup = await this.read(key);
    return lookup.status === "hit" ? lookup.entry : null;
  }

  /**
   * Replaces the entry for `key` wholesale. Writes go to a temp file that is
   * renamed over the target, and writes to the same key run one at a time.
   */
  put(key: CacheKey, posts: readonly Post[], sourceLabel: SourceLabel, keyword: string, collectedAt = new Date()): Promise<CacheEntry> {
    const entry: CacheEntry = {
      version: 1,
      platform: key.platform,
      mode: key.mode,
      keyword,
      keywordNormalized: key.keywordNormalized,
      sourceLabel,
      collectedAt: collectedAt.toISOString(),
      posts: posts.map((post) => ({ ...post })),
    };

    return this.writes.run(cacheKeyId(key), async () => {
      const file = cacheKeyPath(this.rootDir, key);
      try {
        await writeJsonAtomic(file, entry);
      } catch (error) {
        throw new CacheError("io_failure", `Failed to write cache entry: ${errorMessage(error)}`, file, { cause: error });
      }
      logger.debug({ key: cacheKeyId(key), posts: entry.posts.length, sourceLabel }, "Cache entry written");
      return entry;
    });
  }

  isStale(entry: CacheEntry, maxAgeMs: number, now: number = Date.now()): boolean {
    const collectedAt = Date.parse(entry.collectedAt);
    return Number.isNaN(collectedAt) || now - collectedAt > maxAgeMs;
  }

  async list(): Promise<CacheEntry[]> {
    const entries: CacheEntry[] = [];

    for (const platform of PLATFORMS) {
      for (const mode of MODES) {
        const dir = path.join(this.rootDir, platform, mode);
        let files: string[];
        try {
          files = await readdir(dir);
        } catch (error) {
          if (isNotFound(error)) continue;
          throw new CacheError("io_failure", `Failed to list cache directory: ${errorMessage(error)}`, dir, { cause: error });
        }

        for (const file of files) {
          if (!file.endsWith(".json")) continue;
          const raw = await readFile(path.join(dir, file), "utf-8").catch((error: unknown) => {
            logger.warn({ file, error: errorMessage(error) }, "Skipping unreadable cache entry");
            return null;
          });
          const parsed = raw === null ? null : CacheEntrySchema.safeParse(safeJsonParse(raw));
          if (parsed && parsed.success) {
            entries.push(parsed.data);
          }
        }
      }
    }

    return entries;
  }

  async stats(): Promise<CacheStats> {
    const platforms: Record<Platform, PlatformCacheStats> = {
      hackernews: emptyPlatformStats(),
      reddit: emptyPlatformStats(),
      youtube: emptyPlatformStats(),
      discord: emptyPlatformStats(),
    };

    let totalPosts = 0;
    let lastCollectedAt: string | null = null;
    const entries = await this.list();

    for (const entry of entries) {
      const bucket = platforms[entry.platform];
      bucket.entries += 1;
      bucket.posts += entry.posts.length;
      if (!bucket.keywords.includes(entry.keywordNormalized)) {
        bucket.keywords.push(entry.keywordNormalized);
      }
      bucket.lastCollectedAt = latest(bucket.lastCollectedAt, entry.collectedAt);
      totalPosts += entry.posts.length;
      lastCollectedAt = latest(lastCollectedAt, entry.collectedAt);
    }

    for (const bucket of Object.values(platforms)) {
      bucket.keywords.sort();
    }

    return { totalEntries: entries.length, totalPosts, lastCollectedAt, platforms };
  }

  /** Removes every entry for one keyword, or the whole cache. Returns the number of files removed. */
  async clear(keywordNormalized?: string): Promise<number> {
    let removed = 0;

    for (const platform of PLATFORMS) {
      for (const mode of MODES) {
        const key = keywordNormalized === undefined ? null : { platform, mode, keywordNormalized };
        const dir = path.join(this.rootDir, platform, mode);
        let files: string[];
        try {
          files = key ? [path.basename(cacheKeyPath(this.rootDir, key))] : (await readdir(dir)).filter((file) => file.endsWith(".json"));
        } catch (error) {
          if (isNotFound(error)) continue;
          throw error;
        }

        for (const file of files) {
          const remove = () => unlink(path.join(dir, file));
          try {
            await (key ? this.writes.run(cacheKeyId(key), remove) : remove());
            removed += 1;
          } catch (error) {
            if (!isNotFound(error)) {
              throw new CacheError("io_failure", `Failed to remove cache entry: ${errorMessage(error)}`, file, { cause: error });
            }
          }
        }
      }
    }

    logger.info({ keyword: keywordNormalized ?? "*", removed }, "Cache cleared");
    return removed;
  }

  diagnostics(): readonly CacheError[] {
    return [...this.recentDiagnostics];
  }

  private corrupt(file: string, reason: string): CacheLookup {
    const error = new CacheError("corrupt", `Corrupt cache entry: ${reason}`, file);
    this.recordDiagnostic(error);
    return { status: "corrupt", error };
  }

  private recordDiagnostic(error: CacheError): void {
    logger.warn({ kind: error.kind, file: error.file, reason: error.message }, "Cache entry treated as miss");
    this.recentDiagnostics.push(error);
    if (this.recentDiagnostics.length > MAX_DIAGNOSTICS) {
      this.recentDiagnostics.shift();
    }
  }
}
