import { describe, expect, it, vi } from "vitest";

import type { CollectRequest } from "../src/tracker/collection_orchestrator.js";
import { NoPlatformsAvailableError, NotifiedStateError } from "../src/tracker/errors.js";
import { EventMonitor, toNotificationEvent } from "../src/tracker/event_monitor.js";
import type { MonitorTarget, NotificationSink } from "../src/tracker/event_monitor.js";
import { emptyNotifiedState } from "../src/tracker/notified_store.js";
import type { CollectionResult, NotificationEvent, NotifiedState, Post } from "../src/tracker/types.js";

const NOW = new Date("2024-03-10T12:00:00.000Z");

function post(id: string, overrides: Partial<Post> = {}): Post {
  return {
    platform: "reddit",
    id,
    title: `MQTT news ${id}`,
    author: "alice",
    timestamp: "2024-03-10T08:00:00.000Z",
    interactionCount: 3,
    url: `https://example.test/${id}`,
    ...overrides,
  };
}

function collected(keyword: string, posts: Post[]): CollectionResult {
  return {
    keyword: { raw: keyword, normalized: keyword.toLowerCase() },
    mode: "hot",
    policy: "exact",
    startedAt: NOW.toISOString(),
    finishedAt: NOW.toISOString(),
    ok: true,
    platforms: {
      reddit: { status: "success", postCount: posts.length, matchedCount: posts.length, sourceLabel: "hot_listing", collectedAt: NOW.toISOString() },
    },
    posts,
    warnings: [],
  };
}

class MemoryStore {
  readonly saved: NotifiedState[] = [];
  failSave = false;

  constructor(private readonly initial: NotifiedState = emptyNotifiedState()) {}

  async load(): Promise<NotifiedState> {
    return this.initial;
  }

  async save(state: NotifiedState): Promise<void> {
    if (this.failSave) {
      throw new NotifiedStateError("disk full");
    }
    this.saved.push(state);
  }
}

class MemorySink implements NotificationSink {
  readonly published: NotificationEvent[][] = [];

  constructor(readonly name = "memory") {}

  async publish(events: readonly NotificationEvent[]): Promise<void> {
    this.published.push([...events]);
  }
}

function setup(targets: MonitorTarget[] = [{ keyword: "mqtt" }], initial?: NotifiedState) {
  const collect = vi.fn<(request: CollectRequest) => Promise<CollectionResult>>();
  const store = new MemoryStore(initial);
  const sink = new MemorySink();
  const monitor = new EventMonitor({
    collector: { collect },
    store,
    targets: async () => targets,
    sinks: [sink],
    policy: "exact",
    retentionDays: 30,
    now: () => NOW,
  });
  return { collect, store, sink, monitor };
}

describe("toNotificationEvent", () => {
  it("uses the snake_case wire shape with nulls for missing fields", () => {
    expect(toNotificationEvent("mqtt", post("p1", { body: undefined, author: undefined }), "2024-03-10T12:00:00.000Z")).toEqual({
      keyword: "mqtt",
      platform: "reddit",
      post: {
        title: "MQTT news p1",
        body: null,
        author: null,
        interaction_count: 3,
        url: "https://example.test/p1",
        timestamp: "2024-03-10T08:00:00.000Z",
      },
      found_at: "2024-03-10T12:00:00.000Z",
    });
  });
});

describe("EventMonitor", () => {
  it("collects hot listings with the configured policy", async () => {
    const { collect, monitor } = setup([{ keyword: "mqtt", platforms: ["reddit", "hackernews"] }]);
    collect.mockResolvedValue(collected("mqtt", []));

    await monitor.runOnce();

    expect(collect).toHaveBeenCalledWith({
      keyword: "mqtt",
      platforms: ["reddit", "hackernews"],
      mode: "hot",
      policy: "exact",
      signal: undefined,
    });
  });

  it("leaves the archive-only platform out of hot checks for keywords without platforms", async () => {
    const { collect, monitor } = setup([{ keyword: "mqtt" }]);
    collect.mockResolvedValue(collected("mqtt", []));

    const result = await monitor.runOnce();

    expect(collect).toHaveBeenCalledWith(expect.objectContaining({ platforms: ["hackernews", "reddit", "youtube"], mode: "hot" }));
    expect(result?.outcomes[0]?.failedPlatforms).toEqual([]);
  });

  it("notifies each new post once across cycles", async () => {
    const { collect, store, sink, monitor } = setup();
    collect.mockResolvedValue(collected("mqtt", [post("p1"), post("p2")]));

    const first = await monitor.runOnce();
    const second = await monitor.runOnce();

    expect(first?.events.map((event) => event.post.url)).toEqual(["https://example.test/p1", "https://example.test/p2"]);
    expect(second?.events).toEqual([]);
    expect(sink.published).toHaveLength(1);
    expect(store.saved).toEqual([
      {
        version: 1,
        entries: { "reddit:p1": "2024-03-10T12:00:00.000Z", "reddit:p2": "2024-03-10T12:00:00.000Z" },
      },
    ]);
  });

  it("lets the first keyword claim a post matched by several", async () => {
    const { collect, monitor } = setup([{ keyword: "mqtt" }, { keyword: "broker" }]);
    collect.mockResolvedValue(collected("any", [post("p1")]));

    const result = await monitor.runOnce();

    expect(result?.events.map((event) => event.keyword)).toEqual(["mqtt"]);
    expect(result?.outcomes.map((outcome) => outcome.newEvents)).toEqual([1, 0]);
  });

  it("publishes nothing and keeps its state when saving fails", async () => {
    const { collect, store, sink, monitor } = setup();
    collect.mockResolvedValue(collected("mqtt", [post("p1")]));
    store.failSave = true;

    await expect(monitor.runOnce()).rejects.toBeInstanceOf(NotifiedStateError);
    expect(sink.published).toEqual([]);
    expect(monitor.stats().lastError).toBe("disk full");

    store.failSave = false;
    const retry = await monitor.runOnce();
    expect(retry?.events).toHaveLength(1);
  });

  it("degrades a keyword whose platforms all failed", async () => {
    const { collect, monitor } = setup([{ keyword: "mqtt" }, { keyword: "broker" }]);
    const failedResult: CollectionResult = {
      ...collected("mqtt", []),
      ok: false,
      platforms: { reddit: { status: "failed", reason: "network_error", message: "reddit timed out after 20ms", postCount: 0, matchedCount: 0 } },
    };
    collect
      .mockRejectedValueOnce(new NoPlatformsAvailableError(failedResult))
      .mockResolvedValueOnce(collected("broker", [post("p9")]));

    const result = await monitor.runOnce();

    expect(result?.outcomes[0]).toEqual({
      keyword: "mqtt",
      ok: false,
      matched: 0,
      newEvents: 0,
      failedPlatforms: ["reddit"],
      error: 'No platforms available for keyword "mqtt"',
    });
    expect(result?.events.map((event) => event.keyword)).toEqual(["broker"]);
  });

  it("prunes expired entries before diffing", async () => {
    const { collect, store, monitor } = setup();
    collect.mockResolvedValue(collected("mqtt", [post("p1")]));
    const state: NotifiedState = {
      version: 1,
      entries: { "reddit:p1": "2024-03-09T00:00:00.000Z", "reddit:old": "2024-01-01T00:00:00.000Z" },
    };

    const result = await monitor.check(state, NOW);

    expect(result.events).toEqual([]);
    expect(result.state.entries).toEqual({ "reddit:p1": "2024-03-09T00:00:00.000Z" });
    expect(store.saved).toHaveLength(1);
  });

  it("advances its state even when a sink fails", async () => {
    const collect = vi.fn<(request: CollectRequest) => Promise<CollectionResult>>().mockResolvedValue(collected("mqtt", [post("p1")]));
    const store = new MemoryStore();
    const healthy = new MemorySink("healthy");
    const broken: NotificationSink = { name: "broken", publish: () => Promise.reject(new Error("connection refused")) };
    const monitor = new EventMonitor({
      collector: { collect },
      store,
      targets: async () => [{ keyword: "mqtt" }],
      sinks: [broken, healthy],
      policy: "exact",
      retentionDays: 30,
      now: () => NOW,
    });

    const result = await monitor.runOnce();

    expect(result?.events).toHaveLength(1);
    expect(healthy.published).toHaveLength(1);
    expect(store.saved).toHaveLength(1);
  });

  it("skips a run while another is in progress", async () => {
    const { collect, monitor } = setup();
    let release: (result: CollectionResult) => void = () => undefined;
    collect.mockReturnValue(
      new Promise<CollectionResult>((resolve) => {
        release = resolve;
      }),
    );

    const first = monitor.runOnce();
    expect(await monitor.runOnce()).toBeNull();
    await vi.waitFor(() => expect(collect).toHaveBeenCalledTimes(1));
    expect(monitor.status).toBe("checking");

    release(collected("mqtt", []));
    expect((await first)?.events).toEqual([]);
    expect(monitor.status).toBe("idle");
  });

  it("runs on a schedule until stopped", async () => {
    const { collect, monitor } = setup();
    collect.mockResolvedValue(collected("mqtt", []));

    monitor.start(60_000);
    await vi.waitFor(() => expect(collect).toHaveBeenCalledTimes(1));
    expect(monitor.stats().running).toBe(true);

    await monitor.stop();

    expect(monitor.stats().running).toBe(false);
    expect(collect).toHaveBeenCalledTimes(1);
  });
});
