import type { Logger } from "pino";

import type { NotificationSink } from "./event_monitor.js";
import { logger as rootLogger } from "./logger.js";
import { normalizeKeyword } from "./match_engine.js";
import type { NotificationEvent } from "./types.js";
import { keywordSlug } from "./utils.js";

/** The one call the Redis sink needs; ioredis clients satisfy it. */
export interface Publisher {
  publish(channel: string, message: string): Promise<number>;
}

export class LogNotificationSink implements NotificationSink {
  readonly name = "log";

  constructor(private readonly logger: Logger = rootLogger.child({ component: "notifications" })) {}

  async publish(events: readonly NotificationEvent[]): Promise<void> {
    for (const event of events) {
      this.logger.info(
        { keyword: event.keyword, platform: event.platform, title: event.post.title, url: event.post.url, foundAt: event.found_at },
        "New mention",
      );
    }
  }
}

export function alertChannel(prefix: string, keyword: string): string {
  return `${prefix}:${keywordSlug(normalizeKeyword(keyword).normalized)}`;
}

/** Publishes each event as JSON on the keyword's channel. */
export class RedisNotificationSink implements NotificationSink {
  readonly name = "redis";

  constructor(
    private readonly publisher: Publisher,
    private readonly channelPrefix: string,
  ) {}

  async publish(events: readonly NotificationEvent[]): Promise<void> {
    for (const event of events) {
      await this.publisher.publish(alertChannel(this.channelPrefix, event.keyword), JSON.stringify(event));
    }
  }
}
