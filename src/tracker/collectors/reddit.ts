import { z } from "zod";

import type { FetchRequest, PlatformCollector, RedditRecord } from "./types.js";
import { AxiosJsonClient, createHttpClient, parseResponse, type JsonClient } from "./http.js";

const REDDIT_BASE_URL = "https://www.reddit.com";
const MAX_PAGE_SIZE = 100;

const SubmissionSchema = z.object({
  id: z.string().nullish(),
  title: z.string().nullish(),
  selftext: z.string().nullish(),
  author: z.string().nullish(),
  created_utc: z.number().nullish(),
  score: z.number().nullish(),
  num_comments: z.number().nullish(),
  permalink: z.string().nullish(),
  subreddit: z.string().nullish(),
});

const ListingSchema = z.object({
  data: z.object({
    after: z.string().nullish(),
    children: z.array(z.object({ data: SubmissionSchema })),
  }),
});

export interface RedditCollectorOptions {
  hotSubreddits: readonly string[];
}

export class RedditCollector implements PlatformCollector<"reddit"> {
  readonly platform = "reddit" as const;

  constructor(
    private readonly client: JsonClient,
    private readonly options: RedditCollectorOptions,
  ) {}

  static create(timeoutMs: number, userAgent: string, hotSubreddits: readonly string[]): RedditCollector {
    const http = createHttpClient({ baseURL: REDDIT_BASE_URL, timeoutMs, headers: { "User-Agent": userAgent } });
    return new RedditCollector(new AxiosJsonClient("reddit", http), { hotSubreddits });
  }

  async fetch({ keyword, mode, limit, signal }: FetchRequest): Promise<RedditRecord[]> {
    if (limit <= 0) return [];
    const path = mode === "historical" ? "/search.json" : `/r/${this.options.hotSubreddits.join("+") || "all"}/hot.json`;
    const baseParams: Record<string, string> = mode === "historical" ? { q: keyword, sort: "relevance", t: "all" } : {};

    const records: RedditRecord[] = [];
    let after: string | null | undefined;

    // Listings are paged; follow `after` until the limit is met or the listing ends.
    do {
      const pageSize = Math.min(MAX_PAGE_SIZE, limit - records.length);
      const params: Record<string, string | number> = { ...baseParams, limit: pageSize, raw_json: 1 };
      if (after) {
        params.after = after;
      }

      const body = await this.client.getJson(path, { params, signal });
      const listing = parseResponse(this.platform, ListingSchema, body);
      for (const child of listing.data.children.slice(0, pageSize)) {
        records.push({ platform: this.platform, ...child.data });
      }

      after = listing.data.children.length > 0 ? listing.data.after : null;
    } while (after && records.length < limit);

    return records;
  }
}
