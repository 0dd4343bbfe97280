import pino from "pino";
import { describe, expect, it, vi } from "vitest";

import { LogNotificationSink, RedisNotificationSink, alertChannel } from "../src/tracker/notification_sinks.js";
import type { NotificationEvent } from "../src/tracker/types.js";

function event(keyword: string, url: string): NotificationEvent {
  return {
    keyword,
    platform: "hackernews",
    post: {
      title: "Show HN: an MQTT broker",
      body: null,
      author: "sam",
      interaction_count: 12,
      url,
      timestamp: "2024-03-10T08:00:00.000Z",
    },
    found_at: "2024-03-10T12:00:00.000Z",
  };
}

describe("alertChannel", () => {
  it("uses the keyword slug under the prefix", () => {
    expect(alertChannel("alerts", "Unified  Namespace")).toBe("alerts:unified~20namespace");
  });
});

describe("RedisNotificationSink", () => {
  it("publishes each event as JSON on its keyword channel", async () => {
    const publish = vi.fn<(channel: string, message: string) => Promise<number>>().mockResolvedValue(1);
    const first = event("MQTT", "https://example.test/1");
    const second = event("opc ua", "https://example.test/2");

    await new RedisNotificationSink({ publish }, "tracker:alerts").publish([first, second]);

    expect(publish.mock.calls).toEqual([
      ["tracker:alerts:mqtt", JSON.stringify(first)],
      ["tracker:alerts:opc~20ua", JSON.stringify(second)],
    ]);
  });

  it("rejects when the publisher fails", async () => {
    const publish = vi.fn<(channel: string, message: string) => Promise<number>>().mockRejectedValue(new Error("connection refused"));

    await expect(new RedisNotificationSink({ publish }, "alerts").publish([event("mqtt", "https://example.test/1")])).rejects.toThrow(
      "connection refused",
    );
  });
});

describe("LogNotificationSink", () => {
  it("logs one line per event", async () => {
    const lines: string[] = [];
    const logger = pino({ level: "info", base: null }, { write: (line: string) => lines.push(line) });

    await new LogNotificationSink(logger).publish([event("mqtt", "https://example.test/1")]);

    expect(lines).toHaveLength(1);
    expect(JSON.parse(lines[0] ?? "{}")).toMatchObject({
      msg: "New mention",
      keyword: "mqtt",
      platform: "hackernews",
      title: "Show HN: an MQTT broker",
      url: "https://example.test/1",
      foundAt: "2024-03-10T12:00:00.000Z",
    });
  });
});
