import { NoPlatformsAvailableError } from "./errors.js";
import { errorMessage } from "./error_utils.js";
import type { MonitorStats } from "./event_monitor.js";
import { PLATFORMS } from "./types.js";
import type { CollectionMode, CollectionResult, FailureReason, Platform, PlatformOutcome } from "./types.js";

export interface KeywordHealth {
  keyword: string;
  mode: CollectionMode;
  ok: boolean;
  finishedAt: string;
  matched: number;
  failedPlatforms: Platform[];
  error?: string;
}

export interface PlatformHealth {
  status: PlatformOutcome["status"];
  reason?: FailureReason;
  at: string;
}

export interface HealthReport {
  status: "ok" | "degraded";
  uptimeSeconds: number;
  collections: number;
  inFlight: string[];
  lastCollectedAt: string | null;
  platforms: Partial<Record<Platform, PlatformHealth>>;
  keywords: KeywordHealth[];
  monitor: MonitorStats;
}

/**
 * Latest collection outcome per keyword and per platform, as served by
 * `GET /health`. A keyword is degraded until its next collection succeeds.
 */
export class CollectionHealth {
  private readonly startedAt: number;
  private readonly inFlight = new Map<string, number>();
  private readonly keywords = new Map<string, KeywordHealth>();
  private readonly platforms: Partial<Record<Platform, PlatformHealth>> = {};
  private collections = 0;
  private lastCollectedAt: string | null = null;

  constructor(private readonly now: () => Date = () => new Date()) {
    this.startedAt = now().getTime();
  }

  async track(keyword: string, mode: CollectionMode, task: () => Promise<CollectionResult>): Promise<CollectionResult> {
    this.inFlight.set(keyword, (this.inFlight.get(keyword) ?? 0) + 1);
    try {
      const result = await task();
      this.record(result);
      return result;
    } catch (error) {
      if (error instanceof NoPlatformsAvailableError) {
        this.record(error.result, error.message);
      } else {
        this.recordFailure(keyword, mode, errorMessage(error));
      }
      throw error;
    } finally {
      const remaining = (this.inFlight.get(keyword) ?? 1) - 1;
      if (remaining > 0) {
        this.inFlight.set(keyword, remaining);
      } else {
        this.inFlight.delete(keyword);
      }
    }
  }

  record(result: CollectionResult, error?: string): void {
    const failedPlatforms: Platform[] = [];
    for (const platform of PLATFORMS) {
      const outcome = result.platforms[platform];
      if (!outcome) continue;
      this.platforms[platform] =
        outcome.status === "failed"
          ? { status: outcome.status, reason: outcome.reason, at: result.finishedAt }
          : { status: outcome.status, at: result.finishedAt };
      if (outcome.status === "failed") {
        failedPlatforms.push(platform);
      }
    }

    this.keywords.set(result.keyword.normalized, {
      keyword: result.keyword.normalized,
      mode: result.mode,
      ok: result.ok,
      finishedAt: result.finishedAt,
      matched: result.posts.length,
      failedPlatforms,
      ...(error === undefined ? {} : { error }),
    });
    this.finish(result.finishedAt);
  }

  report(monitor: MonitorStats): HealthReport {
    const keywords = Array.from(this.keywords.values()).sort((a, b) => a.keyword.localeCompare(b.keyword));
    const degraded = keywords.some((entry) => !entry.ok) || monitor.lastError !== null;
    return {
      status: degraded ? "degraded" : "ok",
      uptimeSeconds: Math.round((this.now().getTime() - this.startedAt) / 1000),
      collections: this.collections,
      inFlight: Array.from(this.inFlight.keys()).sort(),
      lastCollectedAt: this.lastCollectedAt,
      platforms: { ...this.platforms },
      keywords,
      monitor,
    };
  }

  private recordFailure(keyword: string, mode: CollectionMode, error: string): void {
    const finishedAt = this.now().toISOString();
    this.keywords.set(keyword, { keyword, mode, ok: false, finishedAt, matched: 0, failedPlatforms: [], error });
    this.finish(finishedAt);
  }

  private finish(finishedAt: string): void {
    this.collections += 1;
    if (this.lastCollectedAt === null || finishedAt > this.lastCollectedAt) {
      this.lastCollectedAt = finishedAt;
    }
  }
}
