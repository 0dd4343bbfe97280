export const PLATFORMS = ["hackernews", "reddit", "youtube", "discord"] as const;

export type Platform = (typeof PLATFORMS)[number];

/** Platforms with a live listing; the discord archive only serves historical collection. */
export const HOT_PLATFORMS: readonly Platform[] = ["hackernews", "reddit", "youtube"];

export type CollectionMode = "historical" | "hot";

export type MatchPolicy = "exact" | "fuzzy";

export type SourceLabel = "historical_archive" | "historical_search" | "time_all" | "hot_listing";

export interface Keyword {
  raw: string;
  normalized: string;
}

export interface Post {
  platform: Platform;
  id: string;
  title?: string;
  body?: string;
  author?: string;
  /** ISO-8601, always UTC. */
  timestamp: string;
  interactionCount: number;
  url?: string;
}

export interface CacheKey {
  platform: Platform;
  keywordNormalized: string;
  mode: CollectionMode;
}

export interface CacheEntry extends CacheKey {
  version: 1;
  keyword: string;
  sourceLabel: SourceLabel;
  collectedAt: string;
  posts: Post[];
}

export type CollectorErrorKind = "rate_limited" | "auth_invalid" | "network_error" | "not_supported";

export type FailureReason = CollectorErrorKind | "cancelled" | "cache_miss" | "unknown";

export type PlatformOutcome =
  | {
      status: "success" | "cache_hit";
      postCount: number;
      matchedCount: number;
      sourceLabel: SourceLabel;
      collectedAt: string;
    }
  | {
      status: "failed";
      reason: FailureReason;
      message: string;
      postCount: 0;
      matchedCount: 0;
    };

export interface CollectionResult {
  keyword: Keyword;
  mode: CollectionMode;
  policy: MatchPolicy;
  startedAt: string;
  finishedAt: string;
  ok: boolean;
  platforms: Partial<Record<Platform, PlatformOutcome>>;
  posts: Post[];
  warnings: string[];
}

export type TrendGranularity = "day" | "month";

export interface TrendPoint {
  bucket: string;
  mentions: number;
  interactions: number;
}

export interface Contributor {
  author: string;
  mentions: number;
  interactions: number;
  firstMentionAt: string;
}

export interface PlatformSubtotal {
  mentions: number;
  uniqueAuthors: number;
  interactions: number;
}

export interface Metrics {
  totalMentions: number;
  uniqueAuthors: number;
  totalInteractions: number;
  granularity: TrendGranularity;
  dateRange: { start: string; end: string } | null;
  trend: TrendPoint[];
  topContributors: Contributor[];
  platforms: Partial<Record<Platform, PlatformSubtotal>>;
  insights: string[];
}

export interface KeywordSummary {
  keyword: string;
  generatedAt: string;
  totalMentions: number;
  uniqueAuthors: number;
  totalInteractions: number;
  busiestPlatform: Platform | null;
  topContributors: string[];
  summary: string;
}

/** Wire shape consumed by alert delivery channels; field names are stable. */
export interface NotificationEvent {
  keyword: string;
  platform: Platform;
  post: {
    title: string | null;
    body: string | null;
    author: string | null;
    interaction_count: number;
    url: string | null;
    timestamp: string;
  };
  found_at: string;
}

export interface NotifiedState {
  version: 1;
  /** `${platform}:${id}` mapped to the ISO time it was first notified. */
  entries: Record<string, string>;
}

export interface TrackedKeyword {
  keyword: string;
  normalized: string;
  platforms: Platform[];
  enabled: boolean;
  createdAt: string;
}

export function isPlatform(value: string): value is Platform {
  return (PLATFORMS as readonly string[]).includes(value);
}
