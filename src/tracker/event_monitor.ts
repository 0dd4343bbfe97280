import type { CollectionOrchestrator } from "./collection_orchestrator.js";
import { NoPlatformsAvailableError } from "./errors.js";
import { errorMessage, logRecoverableError } from "./error_utils.js";
import { logger as rootLogger } from "./logger.js";
import { monitorCyclesTotal, notificationsEmittedTotal, notifiedEntriesGauge } from "./metrics.js";
import { notifiedKey, pruneNotified } from "./notified_store.js";
import type { NotifiedStore } from "./notified_store.js";
import { HOT_PLATFORMS, PLATFORMS } from "./types.js";
import type { CollectionResult, MatchPolicy, NotificationEvent, NotifiedState, Platform, Post } from "./types.js";
import { sleep } from "./utils.js";

const logger = rootLogger.child({ component: "event_monitor" });

export interface MonitorTarget {
  keyword: string;
  platforms?: readonly Platform[];
}

export interface NotificationSink {
  readonly name: string;
  publish(events: readonly NotificationEvent[]): Promise<void>;
}

export type MonitorStatus = "idle" | "checking" | "notifying";

export interface CheckOutcome {
  keyword: string;
  ok: boolean;
  matched: number;
  newEvents: number;
  failedPlatforms: Platform[];
  error?: string;
}

export interface CheckResult {
  events: NotificationEvent[];
  state: NotifiedState;
  outcomes: CheckOutcome[];
}

export interface EventMonitorOptions {
  collector: Pick<CollectionOrchestrator, "collect">;
  store: Pick<NotifiedStore, "load" | "save">;
  targets: () => Promise<readonly MonitorTarget[]>;
  sinks: readonly NotificationSink[];
  policy: MatchPolicy;
  retentionDays: number;
  now?: () => Date;
}

export interface MonitorStats {
  status: MonitorStatus;
  running: boolean;
  cycles: number;
  lastCheckAt: string | null;
  lastEventCount: number;
  lastError: string | null;
  notifiedEntries: number | null;
}

export function toNotificationEvent(keyword: string, post: Post, foundAt: string): NotificationEvent {
  return {
    keyword,
    platform: post.platform,
    post: {
      title: post.title ?? null,
      body: post.body ?? null,
      author: post.author ?? null,
      interaction_count: post.interactionCount,
      url: post.url ?? null,
      timestamp: post.timestamp,
    },
    found_at: foundAt,
  };
}

function failedPlatforms(result: CollectionResult): Platform[] {
  return PLATFORMS.filter((platform) => {
    const outcome = result.platforms[platform];
    if (outcome?.status !== "failed") return false;
    logger.warn(
      { keyword: result.keyword.normalized, platform, reason: outcome.reason, message: outcome.message },
      "Platform unavailable this cycle",
    );
    return true;
  });
}

/**
 * Runs hot-mode collection for every monitored keyword and turns matches not
 * seen before into notification events. The notified set is passed into and
 * returned from each `check`; `runOnce` keeps the current set in memory.
 */
export class EventMonitor {
  private readonly now: () => Date;
  private currentStatus: MonitorStatus = "idle";
  private state: NotifiedState | null = null;
  private inFlight = false;
  private controller: AbortController | null = null;
  private loop: Promise<void> | null = null;
  private cycles = 0;
  private lastCheckAt: string | null = null;
  private lastEventCount = 0;
  private lastError: string | null = null;

  constructor(private readonly options: EventMonitorOptions) {
    this.now = options.now ?? (() => new Date());
  }

  get status(): MonitorStatus {
    return this.currentStatus;
  }

  /**
   * One monitor cycle. Rejects with `NotifiedStateError` when the new notified
   * set cannot be saved; in that case no event is published.
   */
  async check(state: NotifiedState, now: Date = this.now(), signal?: AbortSignal): Promise<CheckResult> {
    this.currentStatus = "checking";
    try {
      const pruned = pruneNotified(state, now, this.options.retentionDays);
      const entries: Record<string, string> = { ...pruned.entries };
      const foundAt = now.toISOString();
      const events: NotificationEvent[] = [];
      const outcomes: CheckOutcome[] = [];

      for (const target of await this.options.targets()) {
        let result: CollectionResult;
        try {
          result = await this.options.collector.collect({
            keyword: target.keyword,
            platforms: target.platforms ?? HOT_PLATFORMS,
            mode: "hot",
            policy: this.options.policy,
            signal,
          });
        } catch (error) {
          logRecoverableError(
            logger,
            error,
            { location: "event_monitor.check", keyword: target.keyword },
            "Monitor collection failed; keyword skipped this cycle",
          );
          outcomes.push({
            keyword: target.keyword,
            ok: false,
            matched: 0,
            newEvents: 0,
            failedPlatforms: error instanceof NoPlatformsAvailableError ? failedPlatforms(error.result) : [],
            error: errorMessage(error),
          });
          continue;
        }

        let fresh = 0;
        for (const post of result.posts) {
          const key = notifiedKey(post.platform, post.id);
          if (Object.hasOwn(entries, key)) continue;
          entries[key] = foundAt;
          events.push(toNotificationEvent(target.keyword, post, foundAt));
          fresh += 1;
        }
        outcomes.push({
          keyword: target.keyword,
          ok: true,
          matched: result.posts.length,
          newEvents: fresh,
          failedPlatforms: failedPlatforms(result),
        });
      }

      const next: NotifiedState = { version: 1, entries };
      if (events.length > 0 || pruned !== state) {
        await this.options.store.save(next);
      }

      if (events.length > 0) {
        this.currentStatus = "notifying";
        await this.publish(events);
      }

      notifiedEntriesGauge.set(Object.keys(entries).length);
      monitorCyclesTotal.inc({ result: outcomes.every((outcome) => outcome.ok) ? "ok" : "degraded" });
      logger.info({ keywords: outcomes.length, events: events.length, notified: Object.keys(entries).length }, "Monitor check finished");
      return { events, state: next, outcomes };
    } catch (error) {
      monitorCyclesTotal.inc({ result: "failed" });
      throw error;
    } finally {
      this.currentStatus = "idle";
    }
  }

  /** Runs a cycle against the in-memory notified set. Resolves to null when a cycle is already running. */
  async runOnce(signal?: AbortSignal): Promise<CheckResult | null> {
    if (this.inFlight) {
      logger.warn("Monitor check already in progress; skipping");
      monitorCyclesTotal.inc({ result: "skipped" });
      return null;
    }

    this.inFlight = true;
    try {
      const state = this.state ?? (await this.options.store.load());
      this.state = state;
      const result = await this.check(state, this.now(), signal);
      this.state = result.state;
      this.lastEventCount = result.events.length;
      this.lastError = null;
      return result;
    } catch (error) {
      this.lastError = errorMessage(error);
      throw error;
    } finally {
      this.inFlight = false;
      this.cycles += 1;
      this.lastCheckAt = this.now().toISOString();
    }
  }

  start(intervalMs: number): void {
    if (this.loop) return;
    const controller = new AbortController();
    this.controller = controller;
    this.loop = this.runLoop(intervalMs, controller.signal).catch((error: unknown) => {
      logRecoverableError(logger, error, { location: "event_monitor.runLoop" }, "Monitor loop crashed");
    });
    logger.info({ intervalMs }, "Monitor loop started");
  }

  async stop(): Promise<void> {
    if (!this.loop || !this.controller) return;
    this.controller.abort();
    await this.loop;
    this.loop = null;
    this.controller = null;
    logger.info("Monitor loop stopped");
  }

  stats(): MonitorStats {
    return {
      status: this.currentStatus,
      running: this.loop !== null,
      cycles: this.cycles,
      lastCheckAt: this.lastCheckAt,
      lastEventCount: this.lastEventCount,
      lastError: this.lastError,
      notifiedEntries: this.state ? Object.keys(this.state.entries).length : null,
    };
  }

  private async runLoop(intervalMs: number, signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      try {
        await this.runOnce(signal);
      } catch (error) {
        logRecoverableError(logger, error, { location: "event_monitor.runLoop" }, "Monitor check failed; retrying next interval");
      }

      await sleep(intervalMs, signal).catch((error: unknown) => {
        if (!signal.aborted) throw error;
      });
    }
  }

  /** Sink failures are logged; the notified set has already been saved. */
  private async publish(events: readonly NotificationEvent[]): Promise<void> {
    const results = await Promise.allSettled(this.options.sinks.map((sink) => sink.publish(events)));
    results.forEach((result, index) => {
      if (result.status === "rejected") {
        logRecoverableError(
          logger,
          result.reason,
          { location: "event_monitor.publish", metadata: { sink: this.options.sinks[index]?.name } },
          "Notification sink failed",
        );
      }
    });
    for (const event of events) {
      notificationsEmittedTotal.inc({ platform: event.platform });
    }
  }
}
