import { z } from "zod";

import type { FetchRequest, HackerNewsRecord, PlatformCollector } from "./types.js";
import { AxiosJsonClient, createHttpClient, parseResponse, type JsonClient } from "./http.js";

const ALGOLIA_BASE_URL = "https://hn.algolia.com/api/v1";
const MAX_HITS_PER_PAGE = 1000;

const HitSchema = z.object({
  objectID: z.string().nullish(),
  title: z.string().nullish(),
  story_text: z.string().nullish(),
  comment_text: z.string().nullish(),
  author: z.string().nullish(),
  created_at: z.string().nullish(),
  points: z.number().nullish(),
  num_comments: z.number().nullish(),
  url: z.string().nullish(),
});

const SearchResponseSchema = z.object({
  hits: z.array(HitSchema),
});

/**
 * Historical mode runs a full-text story search; hot mode reads the current
 * front page and leaves matching to the caller.
 */
export class HackerNewsCollector implements PlatformCollector<"hackernews"> {
  readonly platform = "hackernews" as const;

  constructor(private readonly client: JsonClient) {}

  static create(timeoutMs: number): HackerNewsCollector {
    return new HackerNewsCollector(
      new AxiosJsonClient("hackernews", createHttpClient({ baseURL: ALGOLIA_BASE_URL, timeoutMs })),
    );
  }

  async fetch({ keyword, mode, limit, signal }: FetchRequest): Promise<HackerNewsRecord[]> {
    const hitsPerPage = Math.max(1, Math.min(limit, MAX_HITS_PER_PAGE));
    const params: Record<string, string | number> =
      mode === "historical" ? { query: keyword, tags: "story", hitsPerPage } : { tags: "front_page", hitsPerPage };

    const body = await this.client.getJson("/search", { params, signal });
    const { hits } = parseResponse(this.platform, SearchResponseSchema, body);

    return hits.slice(0, limit).map((hit) => ({ platform: this.platform, ...hit }));
  }
}
