import { PLATFORMS } from "./types.js";
import type { Contributor, Metrics, Platform, PlatformSubtotal, Post, TrendGranularity, TrendPoint } from "./types.js";

export interface AnalyzeOptions {
  granularity?: TrendGranularity;
  topContributorsLimit?: number;
}

const TREND_WINDOW = 7;
const GROWTH_RATIO = 1.2;
const DECLINE_RATIO = 0.8;

function authorOf(post: Post): string | null {
  const author = post.author?.trim();
  return author ? author : null;
}

function bucketStart(millis: number, granularity: TrendGranularity): Date {
  const date = new Date(millis);
  return granularity === "day"
    ? new Date(Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate()))
    : new Date(Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), 1));
}

function nextBucket(bucket: Date, granularity: TrendGranularity): Date {
  return granularity === "day"
    ? new Date(Date.UTC(bucket.getUTCFullYear(), bucket.getUTCMonth(), bucket.getUTCDate() + 1))
    : new Date(Date.UTC(bucket.getUTCFullYear(), bucket.getUTCMonth() + 1, 1));
}

export function bucketKey(bucket: Date, granularity: TrendGranularity): string {
  const iso = bucket.toISOString();
  return granularity === "day" ? iso.slice(0, 10) : iso.slice(0, 7);
}

/** Every bucket between the first and last mention, zero-filled. */
function buildTrend(posts: readonly Post[], granularity: TrendGranularity): TrendPoint[] {
  if (posts.length === 0) return [];

  const counts = new Map<string, TrendPoint>();
  let min = Infinity;
  let max = -Infinity;

  for (const post of posts) {
    const millis = Date.parse(post.timestamp);
    min = Math.min(min, millis);
    max = Math.max(max, millis);
    const key = bucketKey(bucketStart(millis, granularity), granularity);
    const point = counts.get(key) ?? { bucket: key, mentions: 0, interactions: 0 };
    point.mentions += 1;
    point.interactions += post.interactionCount;
    counts.set(key, point);
  }

  const trend: TrendPoint[] = [];
  const last = bucketStart(max, granularity).getTime();
  for (let bucket = bucketStart(min, granularity); bucket.getTime() <= last; bucket = nextBucket(bucket, granularity)) {
    const key = bucketKey(bucket, granularity);
    trend.push(counts.get(key) ?? { bucket: key, mentions: 0, interactions: 0 });
  }
  return trend;
}

/** Ranked by mention count, then by who mentioned the keyword first. */
function rankContributors(posts: readonly Post[], limit: number): Contributor[] {
  const byAuthor = new Map<string, Contributor>();

  for (const post of posts) {
    const author = authorOf(post);
    if (!author) continue;

    const existing = byAuthor.get(author);
    if (!existing) {
      byAuthor.set(author, { author, mentions: 1, interactions: post.interactionCount, firstMentionAt: post.timestamp });
      continue;
    }
    existing.mentions += 1;
    existing.interactions += post.interactionCount;
    if (Date.parse(post.timestamp) < Date.parse(existing.firstMentionAt)) {
      existing.firstMentionAt = post.timestamp;
    }
  }

  return Array.from(byAuthor.values())
    .sort(
      (a, b) =>
        b.mentions - a.mentions ||
        Date.parse(a.firstMentionAt) - Date.parse(b.firstMentionAt) ||
        a.author.localeCompare(b.author),
    )
    .slice(0, Math.max(0, limit));
}

function subtotals(posts: readonly Post[]): Partial<Record<Platform, PlatformSubtotal>> {
  const result: Partial<Record<Platform, PlatformSubtotal>> = {};
  const authors = new Map<Platform, Set<string>>();

  for (const post of posts) {
    const subtotal = result[post.platform] ?? { mentions: 0, uniqueAuthors: 0, interactions: 0 };
    subtotal.mentions += 1;
    subtotal.interactions += post.interactionCount;
    result[post.platform] = subtotal;

    const author = authorOf(post);
    if (author) {
      const seen = authors.get(post.platform) ?? new Set<string>();
      seen.add(author);
      authors.set(post.platform, seen);
      subtotal.uniqueAuthors = seen.size;
    }
  }

  return result;
}

function plural(count: number, noun: string): string {
  return count === 1 ? noun : `${noun}s`;
}

function mean(values: readonly number[]): number {
  return values.length === 0 ? 0 : values.reduce((acc, value) => acc + value, 0) / values.length;
}

function sampleStdDev(values: readonly number[]): number {
  const avg = mean(values);
  const variance = values.reduce((acc, value) => acc + (value - avg) ** 2, 0) / (values.length - 1);
  return Math.sqrt(variance);
}

function trendInsights(trend: readonly TrendPoint[]): string[] {
  const insights: string[] = [];
  const series = trend.map((point) => point.mentions);

  const earlier = mean(series.slice(0, TREND_WINDOW));
  const recent = mean(series.slice(-TREND_WINDOW));
  if (recent > earlier * GROWTH_RATIO) {
    insights.push(`Growing trend: mentions increased by ${((recent / earlier - 1) * 100).toFixed(1)}% recently`);
  } else if (recent < earlier * DECLINE_RATIO) {
    insights.push(`Declining trend: mentions decreased by ${((1 - recent / earlier) * 100).toFixed(1)}% recently`);
  }

  const peak = trend.reduce((best, point) => (point.mentions > best.mentions ? point : best));
  insights.push(`Peak activity: ${peak.mentions} mentions on ${peak.bucket}`);

  if (series.length > 1) {
    const variation = sampleStdDev(series) / mean(series);
    if (variation < 0.3) {
      insights.push("Consistent activity: low variation in mentions per period");
    } else if (variation > 0.8) {
      insights.push("Variable activity: high variation in mentions per period");
    }
  }

  return insights;
}

function platformInsights(posts: readonly Post[], platforms: Partial<Record<Platform, PlatformSubtotal>>): string[] {
  const active = PLATFORMS.filter((platform) => (platforms[platform]?.mentions ?? 0) > 0);
  const top = active.reduce<Platform | null>(
    (best, platform) => (best === null || (platforms[platform]?.mentions ?? 0) > (platforms[best]?.mentions ?? 0) ? platform : best),
    null,
  );
  const insights: string[] = [];
  if (top) {
    insights.push(`Most active platform: ${top} with ${platforms[top]?.mentions ?? 0} mentions`);
  }

  const platformsByAuthor = new Map<string, Set<Platform>>();
  for (const post of posts) {
    const author = authorOf(post);
    if (!author) continue;
    const seen = platformsByAuthor.get(author) ?? new Set<Platform>();
    seen.add(post.platform);
    platformsByAuthor.set(author, seen);
  }
  const crossPlatform = Array.from(platformsByAuthor.values()).filter((seen) => seen.size > 1).length;
  if (crossPlatform > 0) {
    insights.push(`Cross-platform users: ${crossPlatform} ${plural(crossPlatform, "author")} active on multiple platforms`);
  }

  insights.push(`Platform diversity: active on ${active.length} ${plural(active.length, "platform")}`);
  return insights;
}

/**
 * Derives volume, trend and contributor metrics from a matched post set.
 * Interaction counts are summed as-is; each platform's count follows its own
 * weighting, so cross-platform totals are indicative only.
 */
export function analyze(posts: readonly Post[], options: AnalyzeOptions = {}): Metrics {
  const granularity = options.granularity ?? "day";
  const topContributorsLimit = options.topContributorsLimit ?? 10;

  const valid = posts.filter((post) => !Number.isNaN(Date.parse(post.timestamp)));
  const authors = new Set(valid.map(authorOf).filter((author): author is string => author !== null));
  const trend = buildTrend(valid, granularity);
  const platforms = subtotals(valid);

  let dateRange: Metrics["dateRange"] = null;
  if (valid.length > 0) {
    const times = valid.map((post) => Date.parse(post.timestamp));
    dateRange = {
      start: new Date(times.reduce((a, b) => Math.min(a, b))).toISOString(),
      end: new Date(times.reduce((a, b) => Math.max(a, b))).toISOString(),
    };
  }

  return {
    totalMentions: valid.length,
    uniqueAuthors: authors.size,
    totalInteractions: valid.reduce((acc, post) => acc + post.interactionCount, 0),
    granularity,
    dateRange,
    trend,
    topContributors: rankContributors(valid, topContributorsLimit),
    platforms,
    insights: valid.length === 0 ? ["No mentions found for this keyword"] : [...trendInsights(trend), ...platformInsights(valid, platforms)],
  };
}
