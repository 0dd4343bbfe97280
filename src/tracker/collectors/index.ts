import type { TrackerConfig } from "../config.js";
import { DiscordArchiveCollector } from "./discord_archive.js";
import { HackerNewsCollector } from "./hackernews.js";
import { RedditCollector } from "./reddit.js";
import type { CollectorRegistry } from "./types.js";
import { YouTubeCollector } from "./youtube.js";

export function createCollectors(config: TrackerConfig): CollectorRegistry {
  const timeoutMs = config.collection.platformTimeoutMs;
  return {
    hackernews: HackerNewsCollector.create(timeoutMs),
    reddit: RedditCollector.create(timeoutMs, config.reddit.userAgent, config.reddit.hotSubreddits),
    youtube: YouTubeCollector.create(timeoutMs, config.youtube.apiKey),
    discord: new DiscordArchiveCollector(config.discordArchiveDir),
  };
}

export type { CollectorRegistry, FetchRequest, PlatformCollector, RawRecord } from "./types.js";
