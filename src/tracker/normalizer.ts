import { logger as rootLogger } from "./logger.js";
import { NormalizationError } from "./errors.js";
import { logRecoverableError } from "./error_utils.js";
import type { DiscordRecord, HackerNewsRecord, RawRecord, RedditRecord, YouTubeRecord } from "./collectors/types.js";
import type { Post } from "./types.js";

const logger = rootLogger.child({ component: "normalizer" });

/**
 * Per-platform interaction weighting, version 1. Every listed field counts once;
 * the resulting `interactionCount` is comparable within a platform only.
 */
export const INTERACTION_WEIGHTS = {
  version: 1,
  hackernews: { points: 1, num_comments: 1 },
  reddit: { score: 1, num_comments: 1 },
  youtube: { viewCount: 1, likeCount: 1, commentCount: 1 },
  discord: { reactions: 1 },
} as const;

const UNKNOWN_AUTHORS = new Set(["[deleted]", "[removed]", "unknown"]);

function count(value: unknown): number {
  const parsed = typeof value === "string" ? Number(value) : value;
  if (typeof parsed !== "number" || !Number.isFinite(parsed) || parsed < 0) {
    return 0;
  }
  return Math.floor(parsed);
}

function cleanText(value: string | null | undefined): string | undefined {
  if (typeof value !== "string") return undefined;
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

function cleanAuthor(value: string | null | undefined): string | undefined {
  const author = cleanText(value);
  if (!author || UNKNOWN_AUTHORS.has(author.toLowerCase())) {
    return undefined;
  }
  return author;
}

const HTML_ENTITIES: Record<string, string> = {
  "&amp;": "&",
  "&lt;": "<",
  "&gt;": ">",
  "&quot;": '"',
  "&#x27;": "'",
  "&#39;": "'",
  "&#x2F;": "/",
  "&nbsp;": " ",
};

export function stripHtml(value: string): string {
  return value
    .replace(/<[^>]+>/g, " ")
    .replace(/&(?:amp|lt|gt|quot|nbsp|#x27|#39|#x2F);/g, (entity) => HTML_ENTITIES[entity] ?? entity)
    .replace(/\s+/g, " ")
    .trim();
}

const ISO_PREFIX = /^\d{4}-\d{2}-\d{2}/;
const HAS_ZONE = /(?:Z|[+-]\d{2}:?\d{2})$/i;
// Upper bound for plausible post times; a millisecond epoch read as seconds lands far past it.
const LATEST_TIMESTAMP_MS = Date.UTC(2100, 0, 1);

function plausibleDate(millis: number): Date | null {
  if (!Number.isFinite(millis) || millis <= 0 || millis >= LATEST_TIMESTAMP_MS) return null;
  const date = new Date(millis);
  return Number.isNaN(date.getTime()) ? null : date;
}

/**
 * Parses ISO-like strings as UTC when they carry no zone designator, and
 * epoch seconds when given a number. Returns null for anything unparsable
 * or outside 1970..2100.
 */
export function parseTimestamp(value: string | number | null | undefined): Date | null {
  if (typeof value === "number") {
    return plausibleDate(value * 1000);
  }
  if (typeof value !== "string") return null;

  let text = value.trim();
  if (!ISO_PREFIX.test(text)) return null;

  text = text.replace(/^(\d{4}-\d{2}-\d{2})[ T]/, "$1T");
  text = text.replace(/(\.\d{3})\d+/, "$1");
  if (text.length === 10) {
    text = `${text}T00:00:00`;
  }
  if (!HAS_ZONE.test(text)) {
    text = `${text}Z`;
  }

  return plausibleDate(Date.parse(text));
}

function requireId(value: string | null | undefined, platform: string): string {
  const id = cleanText(value);
  if (!id) {
    throw new NormalizationError(`${platform} record has no id`, "id");
  }
  return id;
}

function requireTimestamp(value: string | number | null | undefined, platform: string, id: string): string {
  const parsed = parseTimestamp(value);
  if (!parsed) {
    throw new NormalizationError(`${platform} record ${id} has no usable timestamp`, "timestamp");
  }
  return parsed.toISOString();
}

function normalizeHackerNews(raw: HackerNewsRecord): Post {
  const id = requireId(raw.objectID, raw.platform);
  const weights = INTERACTION_WEIGHTS.hackernews;
  const text = cleanText(raw.story_text) ?? cleanText(raw.comment_text);
  return {
    platform: "hackernews",
    id,
    title: cleanText(raw.title),
    body: text ? stripHtml(text) : undefined,
    author: cleanAuthor(raw.author),
    timestamp: requireTimestamp(raw.created_at, raw.platform, id),
    interactionCount: weights.points * count(raw.points) + weights.num_comments * count(raw.num_comments),
    url: cleanText(raw.url) ?? `https://news.ycombinator.com/item?id=${encodeURIComponent(id)}`,
  };
}

function normalizeReddit(raw: RedditRecord): Post {
  const id = requireId(raw.id, raw.platform);
  const weights = INTERACTION_WEIGHTS.reddit;
  const permalink = cleanText(raw.permalink);
  return {
    platform: "reddit",
    id,
    title: cleanText(raw.title),
    body: cleanText(raw.selftext),
    author: cleanAuthor(raw.author),
    timestamp: requireTimestamp(raw.created_utc, raw.platform, id),
    interactionCount: weights.score * count(raw.score) + weights.num_comments * count(raw.num_comments),
    url: permalink ? `https://www.reddit.com${permalink}` : undefined,
  };
}

function normalizeYouTube(raw: YouTubeRecord): Post {
  const id = requireId(raw.id, raw.platform);
  const weights = INTERACTION_WEIGHTS.youtube;
  const statistics = raw.statistics ?? {};
  return {
    platform: "youtube",
    id,
    title: cleanText(raw.snippet?.title),
    body: cleanText(raw.snippet?.description),
    author: cleanAuthor(raw.snippet?.channelTitle),
    timestamp: requireTimestamp(raw.snippet?.publishedAt, raw.platform, id),
    interactionCount:
      weights.viewCount * count(statistics.viewCount) +
      weights.likeCount * count(statistics.likeCount) +
      weights.commentCount * count(statistics.commentCount),
    url: `https://www.youtube.com/watch?v=${encodeURIComponent(id)}`,
  };
}

function discordAuthor(author: DiscordRecord["author"]): string | undefined {
  if (typeof author === "string") return cleanAuthor(author);
  if (!author) return undefined;
  return cleanAuthor(author.nickname) ?? cleanAuthor(author.name);
}

function normalizeDiscord(raw: DiscordRecord): Post {
  const id = requireId(raw.id, raw.platform);
  const reactions = (raw.reactions ?? []).reduce((acc, reaction) => acc + count(reaction.count), 0);
  const channel = cleanText(raw.channel);
  return {
    platform: "discord",
    id,
    body: cleanText(raw.content),
    author: discordAuthor(raw.author),
    timestamp: requireTimestamp(raw.timestamp, raw.platform, id),
    interactionCount: INTERACTION_WEIGHTS.discord.reactions * reactions,
    url: channel ? `discord://${encodeURIComponent(channel)}/${encodeURIComponent(id)}` : undefined,
  };
}

export function normalize(raw: RawRecord): Post {
  switch (raw.platform) {
    case "hackernews":
      return normalizeHackerNews(raw);
    case "reddit":
      return normalizeReddit(raw);
    case "youtube":
      return normalizeYouTube(raw);
    case "discord":
      return normalizeDiscord(raw);
  }
}

export interface NormalizedBatch {
  posts: Post[];
  dropped: number;
  duplicates: number;
}

/** Drops records that fail normalization and repeated ids; a single bad record never fails the batch. */
export function normalizeBatch(records: readonly RawRecord[]): NormalizedBatch {
  const posts: Post[] = [];
  const seen = new Set<string>();
  let dropped = 0;
  let duplicates = 0;

  for (const record of records) {
    let post: Post;
    try {
      post = normalize(record);
    } catch (error) {
      dropped += 1;
      if (error instanceof NormalizationError) {
        logger.warn({ platform: record.platform, field: error.field, reason: error.message }, "Dropped record during normalization");
      } else {
        logRecoverableError(logger, error, { location: "normalizeBatch", platform: record.platform }, "Dropped record that failed to normalize");
      }
      continue;
    }

    if (seen.has(post.id)) {
      duplicates += 1;
      continue;
    }
    seen.add(post.id);
    posts.push(post);
  }

  return { posts, dropped, duplicates };
}
