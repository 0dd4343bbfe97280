import type { FastifyInstance } from "fastify";
import closeWithGrace from "close-with-grace";
import path from "node:path";

import { CacheStore } from "./cache_store.js";
import { CollectionOrchestrator } from "./collection_orchestrator.js";
import { createCollectors } from "./collectors/index.js";
import { config } from "./config.js";
import type { TrackerConfig } from "./config.js";
import { EventMonitor } from "./event_monitor.js";
import type { NotificationSink } from "./event_monitor.js";
import { CollectionHealth } from "./health.js";
import { KeywordRegistry } from "./keyword_registry.js";
import { logger } from "./logger.js";
import { LogNotificationSink, RedisNotificationSink } from "./notification_sinks.js";
import { NotifiedStore } from "./notified_store.js";
import { disconnectRedis, getRedisClient } from "./redis_client.js";
import { buildServer } from "./server.js";

function createSinks(settings: TrackerConfig): NotificationSink[] {
  const sinks: NotificationSink[] = [new LogNotificationSink()];
  if (settings.alerts.redisUrl) {
    sinks.push(new RedisNotificationSink(getRedisClient(settings.alerts.redisUrl), settings.alerts.channelPrefix));
  }
  return sinks;
}

export class TrackerApp {
  private readonly cache: CacheStore;
  private readonly orchestrator: CollectionOrchestrator;
  private readonly keywords: KeywordRegistry;
  private readonly monitor: EventMonitor;
  private readonly health = new CollectionHealth();
  private httpServer: FastifyInstance | null = null;
  private running = false;

  constructor(private readonly settings: TrackerConfig = config) {
    this.cache = new CacheStore(settings.cacheDir);
    this.orchestrator = new CollectionOrchestrator(createCollectors(settings), this.cache, {
      maxAgeMs: { historical: settings.cache.maxAgeHistoricalMs, hot: settings.cache.maxAgeHotMs },
      limits: { historical: settings.collection.historicalLimit, hot: settings.collection.hotLimit },
      platformTimeoutMs: settings.collection.platformTimeoutMs,
      collectTimeoutMs: settings.collection.collectTimeoutMs,
      retryBackoffMs: settings.collection.retryBackoffMs,
      concurrency: settings.collection.concurrency,
    });
    this.keywords = new KeywordRegistry(path.join(settings.stateDir, "keywords.json"));
    this.monitor = new EventMonitor({
      collector: this.orchestrator,
      store: new NotifiedStore(path.join(settings.stateDir, "notified.json")),
      targets: async () =>
        (await this.keywords.listEnabled()).map((entry) => ({
          keyword: entry.keyword,
          platforms: entry.platforms.length > 0 ? entry.platforms : undefined,
        })),
      sinks: createSinks(settings),
      policy: settings.monitor.policy,
      retentionDays: settings.monitor.retentionDays,
    });
  }

  async start(): Promise<void> {
    if (this.running) {
      return;
    }
    this.running = true;

    this.settings.warnings.forEach((warning) => {
      logger.warn({ warning }, "Configuration warning");
    });

    if (this.settings.monitor.seedKeywords.length > 0) {
      await this.keywords.seed(this.settings.monitor.seedKeywords);
    }

    await this.startHttpServer();

    if (this.settings.monitor.enabled) {
      this.monitor.start(this.settings.monitor.intervalMs);
    }

    closeWithGrace({ delay: 500 }, async ({ signal, err }) => {
      if (err) {
        logger.error({ err, signal }, "Graceful shutdown due to error");
      } else {
        logger.info({ signal }, "Graceful shutdown initiated");
      }
      await this.stop();
    });
  }

  async stop(): Promise<void> {
    if (!this.running) {
      return;
    }
    this.running = false;

    await this.monitor.stop();
    if (this.httpServer) {
      await this.httpServer.close();
      this.httpServer = null;
    }
    await disconnectRedis();
    logger.info("Tracker stopped");
  }

  private async startHttpServer(): Promise<void> {
    if (this.httpServer) return;

    const server = await buildServer({
      orchestrator: this.orchestrator,
      cache: this.cache,
      keywords: this.keywords,
      monitor: this.monitor,
      health: this.health,
      analysis: this.settings.analysis,
    });

    await server.listen({ port: this.settings.http.port, host: this.settings.http.host });
    logger.info({ port: this.settings.http.port }, "HTTP server listening");
    this.httpServer = server;
  }
}
