import pLimit from "p-limit";

import type { CacheStats, CacheStore } from "./cache_store.js";
import { cacheKeyId } from "./cache_store.js";
import type { CollectorRegistry, RawRecord } from "./collectors/types.js";
import { CacheError, CollectorError, NoPlatformsAvailableError } from "./errors.js";
import { errorMessage, logRecoverableError } from "./error_utils.js";
import { logger as rootLogger } from "./logger.js";
import { filterMatches, normalizeKeyword } from "./match_engine.js";
import {
  cacheWriteFailuresTotal,
  collectDurationSeconds,
  collectorRetriesTotal,
  fetchLatencySeconds,
  platformCollectionsTotal,
} from "./metrics.js";
import { normalizeBatch } from "./normalizer.js";
import { PLATFORMS, isPlatform } from "./types.js";
import type {
  CacheKey,
  CollectionMode,
  CollectionResult,
  FailureReason,
  Keyword,
  MatchPolicy,
  Platform,
  PlatformOutcome,
  Post,
  SourceLabel,
} from "./types.js";
import { TimeoutError, linkedAbort, measureAsync, raceAbort, sleep } from "./utils.js";

const logger = rootLogger.child({ component: "collection_orchestrator" });

export interface CollectRequest {
  keyword: string;
  /** Defaults to every platform. Names without a registered collector are reported as not supported. */
  platforms?: readonly string[];
  mode: CollectionMode;
  policy: MatchPolicy;
  forceRefresh?: boolean;
  signal?: AbortSignal;
}

export type MatchCachedRequest = Omit<CollectRequest, "forceRefresh" | "signal">;

export interface OrchestratorOptions {
  maxAgeMs: Record<CollectionMode, number>;
  limits: Record<CollectionMode, number>;
  platformTimeoutMs: number;
  collectTimeoutMs: number;
  retryBackoffMs: number;
  concurrency: number;
  now?: () => Date;
}

export function sourceLabelFor(platform: Platform, mode: CollectionMode): SourceLabel {
  if (mode === "hot") {
    return "hot_listing";
  }
  switch (platform) {
    case "discord":
      return "historical_archive";
    case "hackernews":
      return "historical_search";
    case "reddit":
    case "youtube":
      return "time_all";
  }
}

interface Resolution {
  outcome: PlatformOutcome;
  posts: Post[];
}

function failed(reason: FailureReason, message: string): Resolution {
  return { outcome: { status: "failed", reason, message, postCount: 0, matchedCount: 0 }, posts: [] };
}

function requestedPlatforms(platforms: readonly string[] | undefined): string[] {
  const requested = platforms && platforms.length > 0 ? platforms : PLATFORMS;
  return Array.from(new Set(requested.map((platform) => platform.trim().toLowerCase())));
}

class CancelledError extends Error {
  constructor(reason: unknown) {
    super(reason instanceof TimeoutError ? `collection timed out after ${reason.timeoutMs}ms` : "collection cancelled");
    this.name = "CancelledError";
  }
}

/**
 * Fans a keyword out over the platform collectors, consulting the cache first,
 * and merges the matched posts. A platform failure only ever marks that
 * platform failed; the call rejects when no platform produced data.
 */
export class CollectionOrchestrator {
  private readonly limit: ReturnType<typeof pLimit>;
  private readonly now: () => Date;

  constructor(
    private readonly collectors: CollectorRegistry,
    private readonly cache: CacheStore,
    private readonly options: OrchestratorOptions,
  ) {
    this.limit = pLimit(Math.max(1, options.concurrency));
    this.now = options.now ?? (() => new Date());
  }

  async collect(request: CollectRequest): Promise<CollectionResult> {
    const keyword = normalizeKeyword(request.keyword);
    const startedAt = this.now();
    const warnings: string[] = [];
    const overall = linkedAbort([request.signal], this.options.collectTimeoutMs);

    try {
      const { result: resolutions, durationMs } = await measureAsync(() =>
        Promise.all(
          requestedPlatforms(request.platforms).map((name) =>
            this.limit(() => this.resolvePlatform(name, keyword, request, overall.signal, warnings)),
          ),
        ),
      );
      collectDurationSeconds.observe(durationMs / 1000);

      const result = this.buildResult(keyword, request, startedAt, resolutions, warnings);
      logger.info(
        {
          keyword: keyword.normalized,
          mode: request.mode,
          policy: request.policy,
          matched: result.posts.length,
          ok: result.ok,
          durationMs: Number(durationMs.toFixed(2)),
        },
        "Collection finished",
      );

      if (!result.ok) {
        throw new NoPlatformsAvailableError(result);
      }
      return result;
    } finally {
      overall.dispose();
    }
  }

  /** Re-filters whatever the cache holds, stale or not, without fetching. */
  async matchCached(request: MatchCachedRequest): Promise<CollectionResult> {
    const keyword = normalizeKeyword(request.keyword);
    const startedAt = this.now();
    const warnings: string[] = [];

    const resolutions = await Promise.all(
      requestedPlatforms(request.platforms).map(async (name): Promise<[string, Resolution]> => {
        if (!isPlatform(name)) {
          return [name, failed("not_supported", `unknown platform "${name}"`)];
        }
        const key: CacheKey = { platform: name, keywordNormalized: keyword.normalized, mode: request.mode };
        const lookup = await this.cache.read(key);
        if (lookup.status === "hit") {
          return [name, this.matched(lookup.entry.posts, "cache_hit", lookup.entry.sourceLabel, lookup.entry.collectedAt, keyword, request.policy)];
        }
        if (lookup.status !== "miss") {
          warnings.push(`${cacheKeyId(key)}: cache entry unreadable (${lookup.status})`);
        }
        return [name, failed("cache_miss", "no cached entry")];
      }),
    );

    return this.buildResult(keyword, request, startedAt, resolutions, warnings);
  }

  cacheStats(): Promise<CacheStats> {
    return this.cache.stats();
  }

  private buildResult(
    keyword: Keyword,
    request: MatchCachedRequest,
    startedAt: Date,
    resolutions: Array<[string, Resolution]>,
    warnings: string[],
  ): CollectionResult {
    const platforms: CollectionResult["platforms"] = {};
    const posts: Post[] = [];

    for (const [name, resolution] of resolutions) {
      if (isPlatform(name)) {
        platforms[name] = resolution.outcome;
      } else {
        warnings.push(`unknown platform "${name}" ignored`);
      }
      for (const post of resolution.posts) {
        posts.push(post);
      }
    }

    return {
      keyword,
      mode: request.mode,
      policy: request.policy,
      startedAt: startedAt.toISOString(),
      finishedAt: this.now().toISOString(),
      ok: Object.values(platforms).some((outcome) => outcome !== undefined && outcome.status !== "failed"),
      platforms,
      posts,
      warnings,
    };
  }

  private matched(
    posts: readonly Post[],
    status: "success" | "cache_hit",
    sourceLabel: SourceLabel,
    collectedAt: string,
    keyword: Keyword,
    policy: MatchPolicy,
  ): Resolution {
    const matched = filterMatches(posts, keyword.normalized, policy);
    return {
      outcome: { status, postCount: posts.length, matchedCount: matched.length, sourceLabel, collectedAt },
      posts: matched,
    };
  }

  private async resolvePlatform(
    name: string,
    keyword: Keyword,
    request: CollectRequest,
    signal: AbortSignal,
    warnings: string[],
  ): Promise<[string, Resolution]> {
    if (!isPlatform(name)) {
      return [name, failed("not_supported", `unknown platform "${name}"`)];
    }
    const resolution = await this.resolveKnownPlatform(name, keyword, request, signal, warnings);
    platformCollectionsTotal.inc({
      platform: name,
      mode: request.mode,
      status: resolution.outcome.status === "failed" ? `failed_${resolution.outcome.reason}` : resolution.outcome.status,
    });
    return [name, resolution];
  }

  private async resolveKnownPlatform(
    platform: Platform,
    keyword: Keyword,
    request: CollectRequest,
    signal: AbortSignal,
    warnings: string[],
  ): Promise<Resolution> {
    const { mode, policy } = request;
    const collector: CollectorRegistry[Platform] = this.collectors[platform];
    if (!collector) {
      return failed("not_supported", `no collector registered for ${platform}`);
    }
    if (signal.aborted) {
      return failed("cancelled", new CancelledError(signal.reason).message);
    }

    const key: CacheKey = { platform, keywordNormalized: keyword.normalized, mode };

    if (!request.forceRefresh) {
      const lookup = await this.cache.read(key);
      if (lookup.status === "hit") {
        const { entry } = lookup;
        if (!this.cache.isStale(entry, this.options.maxAgeMs[mode], this.now().getTime())) {
          logger.debug({ key: cacheKeyId(key), posts: entry.posts.length }, "Cache hit");
          return this.matched(entry.posts, "cache_hit", entry.sourceLabel, entry.collectedAt, keyword, policy);
        }
        logger.debug({ key: cacheKeyId(key), collectedAt: entry.collectedAt }, "Cache entry stale; refetching");
      } else if (lookup.status !== "miss") {
        warnings.push(`${cacheKeyId(key)}: cache entry unreadable (${lookup.status}); refetched`);
      }
    }

    let records: RawRecord[];
    try {
      const { result, durationMs } = await measureAsync(() => this.fetchWithRetry(collector, keyword, mode, signal));
      fetchLatencySeconds.observe({ platform }, durationMs / 1000);
      records = result;
    } catch (error) {
      if (error instanceof CancelledError) {
        logger.warn({ platform, keyword: keyword.normalized }, error.message);
        return failed("cancelled", error.message);
      }
      const collectorError = error instanceof CollectorError ? error : null;
      if (collectorError?.kind === "not_supported") {
        logger.debug({ platform, mode, keyword: keyword.normalized }, collectorError.message);
      } else {
        logRecoverableError(logger, error, { location: "collect", keyword: keyword.normalized, platform }, "Platform collection failed");
      }
      return failed(collectorError ? collectorError.kind : "unknown", errorMessage(error));
    }

    const batch = normalizeBatch(records);
    if (batch.dropped > 0) {
      warnings.push(`${platform}: dropped ${batch.dropped} record(s) that could not be normalized`);
    }

    // An abort that lands after the fetch still must not leave a cache write behind.
    if (signal.aborted) {
      return failed("cancelled", new CancelledError(signal.reason).message);
    }

    const sourceLabel = sourceLabelFor(platform, mode);
    const collectedAt = this.now();
    try {
      await this.cache.put(key, batch.posts, sourceLabel, keyword.raw, collectedAt);
    } catch (error) {
      if (!(error instanceof CacheError)) {
        throw error;
      }
      cacheWriteFailuresTotal.inc();
      warnings.push(`${cacheKeyId(key)}: cache write failed (${error.message}); results not cached`);
      logRecoverableError(logger, error, { location: "cache.put", keyword: keyword.normalized, platform }, "Cache write failed");
    }

    return this.matched(batch.posts, "success", sourceLabel, collectedAt.toISOString(), keyword, policy);
  }

  /** One retry, after a fixed backoff, for transient failures only. */
  private async fetchWithRetry(
    collector: NonNullable<CollectorRegistry[Platform]>,
    keyword: Keyword,
    mode: CollectionMode,
    signal: AbortSignal,
  ): Promise<RawRecord[]> {
    try {
      return await this.attempt(collector, keyword, mode, signal);
    } catch (error) {
      if (!(error instanceof CollectorError) || !error.retryable) {
        throw error;
      }
      collectorRetriesTotal.inc({ platform: collector.platform });
      logger.warn(
        { platform: collector.platform, kind: error.kind, backoffMs: this.options.retryBackoffMs },
        "Transient collector failure; retrying once",
      );
      try {
        await sleep(this.options.retryBackoffMs, signal);
      } catch {
        throw new CancelledError(signal.reason);
      }
      return this.attempt(collector, keyword, mode, signal);
    }
  }

  private async attempt(
    collector: NonNullable<CollectorRegistry[Platform]>,
    keyword: Keyword,
    mode: CollectionMode,
    signal: AbortSignal,
  ): Promise<RawRecord[]> {
    const attempt = linkedAbort([signal], this.options.platformTimeoutMs);
    try {
      const request = { keyword: keyword.raw.trim(), mode, limit: this.options.limits[mode], signal: attempt.signal };
      return await raceAbort<RawRecord[]>(collector.fetch(request), attempt.signal);
    } catch (error) {
      if (signal.aborted) {
        throw new CancelledError(signal.reason);
      }
      if (attempt.signal.aborted && attempt.signal.reason instanceof TimeoutError) {
        throw new CollectorError("network_error", `${collector.platform} timed out after ${this.options.platformTimeoutMs}ms`, {
          cause: error,
        });
      }
      if (error instanceof CollectorError) {
        throw error;
      }
      throw new CollectorError("network_error", `${collector.platform} fetch failed: ${errorMessage(error)}`, { cause: error });
    } finally {
      attempt.dispose();
    }
  }
}
