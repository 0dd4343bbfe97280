import { describe, expect, it } from "vitest";

import { NoPlatformsAvailableError } from "../src/tracker/errors.js";
import type { MonitorStats } from "../src/tracker/event_monitor.js";
import { CollectionHealth } from "../src/tracker/health.js";
import type { CollectionResult } from "../src/tracker/types.js";

const MONITOR: MonitorStats = {
  status: "idle",
  running: true,
  cycles: 3,
  lastCheckAt: "2024-03-10T11:55:00.000Z",
  lastEventCount: 0,
  lastError: null,
  notifiedEntries: 4,
};

function result(keyword: string, finishedAt: string, overrides: Partial<CollectionResult> = {}): CollectionResult {
  return {
    keyword: { raw: keyword, normalized: keyword },
    mode: "hot",
    policy: "exact",
    startedAt: finishedAt,
    finishedAt,
    ok: true,
    platforms: {
      reddit: { status: "cache_hit", postCount: 4, matchedCount: 2, sourceLabel: "hot_listing", collectedAt: finishedAt },
      discord: { status: "failed", reason: "not_supported", message: "discord archive has no hot listing", postCount: 0, matchedCount: 0 },
    },
    posts: [],
    warnings: [],
    ...overrides,
  };
}

describe("CollectionHealth", () => {
  const clock = () => new Date("2024-03-10T12:00:00.000Z");

  it("starts healthy with nothing collected", () => {
    const health = new CollectionHealth(clock);

    expect(health.report(MONITOR)).toEqual({
      status: "ok",
      uptimeSeconds: 0,
      collections: 0,
      inFlight: [],
      lastCollectedAt: null,
      platforms: {},
      keywords: [],
      monitor: MONITOR,
    });
  });

  it("keeps the latest outcome per keyword and per platform", () => {
    const health = new CollectionHealth(clock);

    health.record(result("zigbee", "2024-03-10T11:00:00.000Z"));
    health.record(result("mqtt", "2024-03-10T10:00:00.000Z"));

    const report = health.report(MONITOR);
    expect(report.status).toBe("ok");
    expect(report.collections).toBe(2);
    expect(report.lastCollectedAt).toBe("2024-03-10T11:00:00.000Z");
    expect(report.platforms).toEqual({
      reddit: { status: "cache_hit", at: "2024-03-10T10:00:00.000Z" },
      discord: { status: "failed", reason: "not_supported", at: "2024-03-10T10:00:00.000Z" },
    });
    expect(report.keywords.map((entry) => [entry.keyword, entry.failedPlatforms])).toEqual([
      ["mqtt", ["discord"]],
      ["zigbee", ["discord"]],
    ]);
  });

  it("lists a keyword as in flight until its collection settles", async () => {
    const health = new CollectionHealth(clock);
    let release: (value: CollectionResult) => void = () => undefined;

    const pending = health.track(
      "mqtt",
      "hot",
      () =>
        new Promise<CollectionResult>((resolve) => {
          release = resolve;
        }),
    );

    expect(health.report(MONITOR).inFlight).toEqual(["mqtt"]);
    release(result("mqtt", "2024-03-10T11:59:00.000Z"));
    await pending;
    expect(health.report(MONITOR).inFlight).toEqual([]);
  });

  it("degrades on a collection where every platform failed and recovers on the next success", async () => {
    const health = new CollectionHealth(clock);
    const failed = result("mqtt", "2024-03-10T11:00:00.000Z", {
      ok: false,
      platforms: { reddit: { status: "failed", reason: "rate_limited", message: "reddit rate limited the request", postCount: 0, matchedCount: 0 } },
    });

    await expect(health.track("mqtt", "hot", () => Promise.reject(new NoPlatformsAvailableError(failed)))).rejects.toBeInstanceOf(
      NoPlatformsAvailableError,
    );

    const degraded = health.report(MONITOR);
    expect(degraded.status).toBe("degraded");
    expect(degraded.keywords).toEqual([
      {
        keyword: "mqtt",
        mode: "hot",
        ok: false,
        finishedAt: "2024-03-10T11:00:00.000Z",
        matched: 0,
        failedPlatforms: ["reddit"],
        error: 'No platforms available for keyword "mqtt"',
      },
    ]);

    await health.track("mqtt", "hot", async () => result("mqtt", "2024-03-10T11:30:00.000Z"));
    expect(health.report(MONITOR).status).toBe("ok");
  });

  it("records unexpected errors against the keyword", async () => {
    const health = new CollectionHealth(clock);

    await expect(health.track("mqtt", "historical", () => Promise.reject(new Error("boom")))).rejects.toThrow("boom");

    expect(health.report(MONITOR).keywords).toEqual([
      {
        keyword: "mqtt",
        mode: "historical",
        ok: false,
        finishedAt: "2024-03-10T12:00:00.000Z",
        matched: 0,
        failedPlatforms: [],
        error: "boom",
      },
    ]);
  });

  it("reports a monitor failure as degraded", () => {
    const health = new CollectionHealth(clock);

    expect(health.report({ ...MONITOR, lastError: "disk full" }).status).toBe("degraded");
  });
});
