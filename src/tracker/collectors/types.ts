import type { CollectionMode, Platform } from "../types.js";

/** Algolia Hacker News search hit. */
export interface HackerNewsRecord {
  platform: "hackernews";
  objectID?: string | null;
  title?: string | null;
  story_text?: string | null;
  comment_text?: string | null;
  author?: string | null;
  created_at?: string | null;
  points?: number | null;
  num_comments?: number | null;
  url?: string | null;
}

export interface RedditRecord {
  platform: "reddit";
  id?: string | null;
  title?: string | null;
  selftext?: string | null;
  author?: string | null;
  /** Seconds since the epoch. */
  created_utc?: number | null;
  score?: number | null;
  num_comments?: number | null;
  permalink?: string | null;
  subreddit?: string | null;
}

export interface YouTubeRecord {
  platform: "youtube";
  id?: string | null;
  snippet?: {
    title?: string | null;
    description?: string | null;
    channelTitle?: string | null;
    publishedAt?: string | null;
  } | null;
  statistics?: {
    viewCount?: string | number | null;
    likeCount?: string | number | null;
    commentCount?: string | number | null;
  } | null;
}

export interface DiscordRecord {
  platform: "discord";
  id?: string | null;
  channel?: string | null;
  timestamp?: string | null;
  content?: string | null;
  author?: { name?: string | null; nickname?: string | null } | string | null;
  reactions?: Array<{ count?: number | null }> | null;
}

export type RawRecord = HackerNewsRecord | RedditRecord | YouTubeRecord | DiscordRecord;

export type RawRecordFor<P extends Platform> = Extract<RawRecord, { platform: P }>;

export interface FetchRequest {
  keyword: string;
  mode: CollectionMode;
  limit: number;
  signal?: AbortSignal;
}

/**
 * Uniform fetch capability over one platform. Implementations reject with a
 * `CollectorError`; any other rejection is treated as a network error.
 */
export interface PlatformCollector<P extends Platform = Platform> {
  readonly platform: P;
  fetch(request: FetchRequest): Promise<RawRecordFor<P>[]>;
}

export type CollectorRegistry = { [P in Platform]?: PlatformCollector<P> };
