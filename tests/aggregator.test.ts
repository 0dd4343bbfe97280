import { describe, expect, it } from "vitest";

import { analyze } from "../src/tracker/aggregator.js";
import { summarize } from "../src/tracker/summary_generator.js";
import type { Platform, Post } from "../src/tracker/types.js";

let sequence = 0;

function post(platform: Platform, timestamp: string, author: string | undefined, interactionCount = 0): Post {
  sequence += 1;
  return { platform, id: `p${sequence}`, title: "mqtt", author, timestamp, interactionCount };
}

describe("analyze", () => {
  const posts: Post[] = [
    post("reddit", "2024-03-01T10:00:00.000Z", "alice", 5),
    post("reddit", "2024-03-01T12:00:00.000Z", "bob", 1),
    post("hackernews", "2024-03-03T08:00:00.000Z", "bob", 2),
    post("hackernews", "2024-03-03T09:00:00.000Z", "alice", 0),
    post("youtube", "2024-03-03T23:59:59.000Z", undefined, 10),
  ];

  it("computes volume, authors and interactions", () => {
    const metrics = analyze(posts);

    expect(metrics.totalMentions).toBe(5);
    expect(metrics.uniqueAuthors).toBe(2);
    expect(metrics.totalInteractions).toBe(18);
    expect(metrics.dateRange).toEqual({ start: "2024-03-01T10:00:00.000Z", end: "2024-03-03T23:59:59.000Z" });
  });

  it("zero-fills days without mentions", () => {
    expect(analyze(posts).trend).toEqual([
      { bucket: "2024-03-01", mentions: 2, interactions: 6 },
      { bucket: "2024-03-02", mentions: 0, interactions: 0 },
      { bucket: "2024-03-03", mentions: 3, interactions: 12 },
    ]);
  });

  it("buckets by calendar month", () => {
    const metrics = analyze(
      [post("reddit", "2024-01-15T00:00:00.000Z", "alice"), post("reddit", "2024-03-02T00:00:00.000Z", "alice")],
      { granularity: "month" },
    );

    expect(metrics.granularity).toBe("month");
    expect(metrics.trend.map((point) => [point.bucket, point.mentions])).toEqual([
      ["2024-01", 1],
      ["2024-02", 0],
      ["2024-03", 1],
    ]);
  });

  it("partitions the matched set by platform", () => {
    expect(analyze(posts).platforms).toEqual({
      reddit: { mentions: 2, uniqueAuthors: 2, interactions: 6 },
      hackernews: { mentions: 2, uniqueAuthors: 2, interactions: 2 },
      youtube: { mentions: 1, uniqueAuthors: 0, interactions: 10 },
    });
  });

  it("ranks contributors and excludes unknown authors", () => {
    expect(analyze(posts).topContributors).toEqual([
      { author: "alice", mentions: 2, interactions: 5, firstMentionAt: "2024-03-01T10:00:00.000Z" },
      { author: "bob", mentions: 2, interactions: 3, firstMentionAt: "2024-03-01T12:00:00.000Z" },
    ]);
  });

  it("breaks contributor ties by the earliest first mention", () => {
    const tied = [
      post("reddit", "2024-03-02T00:00:00.000Z", "bob"),
      post("reddit", "2024-03-02T01:00:00.000Z", "bob"),
      post("reddit", "2024-03-02T02:00:00.000Z", "bob"),
      post("reddit", "2024-03-05T00:00:00.000Z", "alice"),
      post("reddit", "2024-03-01T00:00:00.000Z", "alice"),
      post("reddit", "2024-03-06T00:00:00.000Z", "alice"),
    ];

    const metrics = analyze(tied, { topContributorsLimit: 1 });

    expect(metrics.topContributors).toEqual([
      { author: "alice", mentions: 3, interactions: 0, firstMentionAt: "2024-03-01T00:00:00.000Z" },
    ]);
  });

  it("derives trend, peak and platform insights", () => {
    expect(analyze(posts).insights).toEqual([
      "Peak activity: 3 mentions on 2024-03-03",
      "Variable activity: high variation in mentions per period",
      "Most active platform: hackernews with 2 mentions",
      "Cross-platform users: 2 authors active on multiple platforms",
      "Platform diversity: active on 3 platforms",
    ]);
  });

  it("compares the last seven periods against the first seven", () => {
    const daily = (counts: number[]) =>
      counts.flatMap((count, day) =>
        Array.from({ length: count }, () => post("reddit", new Date(Date.UTC(2024, 0, day + 1)).toISOString(), "alice")),
      );

    const rising = analyze(daily([1, 1, 1, 1, 1, 1, 1, 2, 2, 2, 2, 2, 2, 2]));
    expect(rising.insights[0]).toBe("Growing trend: mentions increased by 100.0% recently");

    const falling = analyze(daily([2, 2, 2, 2, 2, 2, 2, 1, 1, 1, 1, 1, 1, 1]));
    expect(falling.insights[0]).toBe("Declining trend: mentions decreased by 50.0% recently");
  });

  it("handles an empty set", () => {
    expect(analyze([])).toEqual({
      totalMentions: 0,
      uniqueAuthors: 0,
      totalInteractions: 0,
      granularity: "day",
      dateRange: null,
      trend: [],
      topContributors: [],
      platforms: {},
      insights: ["No mentions found for this keyword"],
    });
  });
});

describe("summarize", () => {
  it("renders a short text summary", () => {
    const metrics = analyze([
      post("reddit", "2024-03-01T10:00:00.000Z", "alice", 4),
      post("reddit", "2024-03-02T10:00:00.000Z", "bob", 1),
      post("discord", "2024-03-02T11:00:00.000Z", "alice", 0),
    ]);

    const summary = summarize("mqtt", metrics, new Date("2024-03-10T00:00:00.000Z"));

    expect(summary.generatedAt).toBe("2024-03-10T00:00:00.000Z");
    expect(summary.busiestPlatform).toBe("reddit");
    expect(summary.topContributors).toEqual(["alice", "bob"]);
    expect(summary.summary).toBe(
      [
        '"mqtt" was mentioned 3 times by 2 authors with 5 interactions.',
        "Mentions span 2024-03-01 to 2024-03-02.",
        "Most mentions come from reddit.",
        "Top contributors: alice, bob.",
        "Highlights:",
        "1. Peak activity: 2 mentions on 2024-03-02.",
        "2. Most active platform: reddit with 2 mentions.",
        "3. Cross-platform users: 1 author active on multiple platforms.",
      ].join(" "),
    );
  });

  it("says so when nothing was found", () => {
    const summary = summarize("mqtt", analyze([]));
    expect(summary.summary).toBe('No mentions of "mqtt" were found.');
    expect(summary.busiestPlatform).toBeNull();
  });
});
