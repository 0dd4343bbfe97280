import { config as loadEnv } from "dotenv";
import path from "node:path";
import { z } from "zod";

loadEnv();

const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;

const booleanFromEnv = z
  .enum(["true", "false", "1", "0", "yes", "no"])
  .transform((value) => value === "true" || value === "1" || value === "yes");

const listFromEnv = z
  .string()
  .transform((value) =>
    value
      .split(",")
      .map((entry) => entry.trim())
      .filter((entry) => entry.length > 0),
  );

const EnvSchema = z.object({
  NODE_ENV: z.string().default("development"),
  LOG_LEVEL: z.enum(LOG_LEVELS).default("info"),
  DATA_DIR: z.string().min(1).default("./data"),
  CACHE_DIR: z.string().min(1).optional(),
  STATE_DIR: z.string().min(1).optional(),
  DISCORD_ARCHIVE_DIR: z.string().min(1).optional(),
  HTTP_PORT: z.coerce.number().int().min(1).max(65535).default(9000),
  HTTP_HOST: z.string().default("0.0.0.0"),
  CACHE_MAX_AGE_HISTORICAL_MS: z.coerce.number().int().min(0).default(24 * 60 * 60 * 1000),
  CACHE_MAX_AGE_HOT_MS: z.coerce.number().int().min(0).default(15 * 60 * 1000),
  HISTORICAL_LIMIT: z.coerce.number().int().min(1).max(1000).default(100),
  HOT_LIMIT: z.coerce.number().int().min(1).max(500).default(50),
  PLATFORM_TIMEOUT_MS: z.coerce.number().int().min(100).default(20_000),
  COLLECT_TIMEOUT_MS: z.coerce.number().int().min(100).default(60_000),
  RETRY_BACKOFF_MS: z.coerce.number().int().min(0).default(2_000),
  COLLECT_CONCURRENCY: z.coerce.number().int().min(1).default(4),
  MONITOR_ENABLED: booleanFromEnv.default("true"),
  MONITOR_INTERVAL_MS: z.coerce.number().int().min(1_000).default(6 * 60 * 60 * 1000),
  MONITOR_POLICY: z.enum(["exact", "fuzzy"]).default("exact"),
  NOTIFIED_RETENTION_DAYS: z.coerce.number().int().min(1).default(30),
  TREND_GRANULARITY: z.enum(["day", "month"]).default("day"),
  TOP_CONTRIBUTORS_LIMIT: z.coerce.number().int().min(1).default(10),
  KEYWORDS: listFromEnv.default(""),
  REDIS_URL: z.string().url().optional(),
  ALERT_CHANNEL_PREFIX: z.string().min(1).default("mention-tracker:alerts"),
  YOUTUBE_API_KEY: z.string().optional(),
  REDDIT_USER_AGENT: z.string().min(1).default("mention-tracker/0.1"),
  REDDIT_HOT_SUBREDDITS: listFromEnv.default("technology,programming,IoT"),
});

type EnvValues = z.infer<typeof EnvSchema>;

const warnings: string[] = [];

function parseEnv(source: NodeJS.ProcessEnv): EnvValues {
  const cleaned: Record<string, string> = {};
  for (const [key, value] of Object.entries(source)) {
    if (value !== undefined && value.trim() !== "") {
      cleaned[key] = value;
    }
  }

  const parsed = EnvSchema.safeParse(cleaned);
  if (parsed.success) {
    return parsed.data;
  }

  // Reset only the offending keys to their defaults.
  for (const issue of parsed.error.issues) {
    const key = issue.path[0];
    if (typeof key === "string") {
      warnings.push(`${key} is invalid (${issue.message}); using default.`);
      delete cleaned[key];
    }
  }
  return EnvSchema.parse(cleaned);
}

const values = parseEnv(process.env);

if (!values.YOUTUBE_API_KEY) {
  warnings.push("YOUTUBE_API_KEY is not set; YouTube collection will report auth_invalid.");
}

const dataDir = path.resolve(values.DATA_DIR);

export interface TrackerConfig {
  readonly nodeEnv: string;
  readonly logLevel: (typeof LOG_LEVELS)[number];
  readonly dataDir: string;
  readonly cacheDir: string;
  readonly stateDir: string;
  readonly discordArchiveDir: string;
  readonly http: { readonly port: number; readonly host: string };
  readonly cache: { readonly maxAgeHistoricalMs: number; readonly maxAgeHotMs: number };
  readonly collection: {
    readonly historicalLimit: number;
    readonly hotLimit: number;
    readonly platformTimeoutMs: number;
    readonly collectTimeoutMs: number;
    readonly retryBackoffMs: number;
    readonly concurrency: number;
  };
  readonly monitor: {
    readonly enabled: boolean;
    readonly intervalMs: number;
    readonly policy: "exact" | "fuzzy";
    readonly retentionDays: number;
    readonly seedKeywords: readonly string[];
  };
  readonly analysis: {
    readonly granularity: "day" | "month";
    readonly topContributorsLimit: number;
  };
  readonly alerts: { readonly redisUrl?: string; readonly channelPrefix: string };
  readonly youtube: { readonly apiKey?: string };
  readonly reddit: { readonly userAgent: string; readonly hotSubreddits: readonly string[] };
  readonly warnings: readonly string[];
}

export const config: TrackerConfig = {
  nodeEnv: values.NODE_ENV,
  logLevel: values.LOG_LEVEL,
  dataDir,
  cacheDir: path.resolve(values.CACHE_DIR ?? path.join(dataDir, "cache")),
  stateDir: path.resolve(values.STATE_DIR ?? path.join(dataDir, "state")),
  discordArchiveDir: path.resolve(values.DISCORD_ARCHIVE_DIR ?? path.join(dataDir, "discord")),
  http: { port: values.HTTP_PORT, host: values.HTTP_HOST },
  cache: {
    maxAgeHistoricalMs: values.CACHE_MAX_AGE_HISTORICAL_MS,
    maxAgeHotMs: values.CACHE_MAX_AGE_HOT_MS,
  },
  collection: {
    historicalLimit: values.HISTORICAL_LIMIT,
    hotLimit: values.HOT_LIMIT,
    platformTimeoutMs: values.PLATFORM_TIMEOUT_MS,
    collectTimeoutMs: values.COLLECT_TIMEOUT_MS,
    retryBackoffMs: values.RETRY_BACKOFF_MS,
    concurrency: values.COLLECT_CONCURRENCY,
  },
  monitor: {
    enabled: values.MONITOR_ENABLED,
    intervalMs: values.MONITOR_INTERVAL_MS,
    policy: values.MONITOR_POLICY,
    retentionDays: values.NOTIFIED_RETENTION_DAYS,
    seedKeywords: values.KEYWORDS,
  },
  analysis: {
    granularity: values.TREND_GRANULARITY,
    topContributorsLimit: values.TOP_CONTRIBUTORS_LIMIT,
  },
  alerts: { redisUrl: values.REDIS_URL, channelPrefix: values.ALERT_CHANNEL_PREFIX },
  youtube: { apiKey: values.YOUTUBE_API_KEY },
  reddit: { userAgent: values.REDDIT_USER_AGENT, hotSubreddits: values.REDDIT_HOT_SUBREDDITS },
  warnings,
};
