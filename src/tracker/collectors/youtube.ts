import { z } from "zod";

import { CollectorError } from "../errors.js";
import type { FetchRequest, PlatformCollector, YouTubeRecord } from "./types.js";
import { AxiosJsonClient, createHttpClient, parseResponse, type JsonClient } from "./http.js";

const YOUTUBE_BASE_URL = "https://www.googleapis.com/youtube/v3";
const MAX_PAGE_SIZE = 50;

const counter = z.union([z.string(), z.number()]).nullish();

const VideoSchema = z.object({
  id: z.string().nullish(),
  snippet: z
    .object({
      title: z.string().nullish(),
      description: z.string().nullish(),
      channelTitle: z.string().nullish(),
      publishedAt: z.string().nullish(),
    })
    .nullish(),
  statistics: z
    .object({
      viewCount: counter,
      likeCount: counter,
      commentCount: counter,
    })
    .nullish(),
});

const VideoListSchema = z.object({
  nextPageToken: z.string().nullish(),
  items: z.array(VideoSchema),
});

const SearchListSchema = z.object({
  nextPageToken: z.string().nullish(),
  items: z.array(z.object({ id: z.object({ videoId: z.string().nullish() }).nullish() })),
});

export class YouTubeCollector implements PlatformCollector<"youtube"> {
  readonly platform = "youtube" as const;

  constructor(
    private readonly client: JsonClient,
    private readonly apiKey: string | undefined,
  ) {}

  static create(timeoutMs: number, apiKey: string | undefined): YouTubeCollector {
    return new YouTubeCollector(
      new AxiosJsonClient("youtube", createHttpClient({ baseURL: YOUTUBE_BASE_URL, timeoutMs })),
      apiKey,
    );
  }

  async fetch({ keyword, mode, limit, signal }: FetchRequest): Promise<YouTubeRecord[]> {
    if (!this.apiKey) {
      throw new CollectorError("auth_invalid", "youtube API key is not configured");
    }
    if (limit <= 0) return [];

    const videos = mode === "historical" ? await this.search(this.apiKey, keyword, limit, signal) : await this.mostPopular(this.apiKey, limit, signal);
    return videos.map((video) => ({ platform: this.platform, ...video }));
  }

  /** Search returns ids only; statistics come from a follow-up `videos` call per page. */
  private async search(key: string, keyword: string, limit: number, signal?: AbortSignal) {
    const videos: z.infer<typeof VideoSchema>[] = [];
    let pageToken: string | null | undefined;

    do {
      const maxResults = Math.min(MAX_PAGE_SIZE, limit - videos.length);
      const params: Record<string, string | number> = { part: "id", type: "video", order: "relevance", q: keyword, maxResults, key };
      if (pageToken) params.pageToken = pageToken;

      const page = parseResponse(this.platform, SearchListSchema, await this.client.getJson("/search", { params, signal }));
      const ids = page.items.flatMap((item) => (item.id?.videoId ? [item.id.videoId] : [])).slice(0, maxResults);
      if (ids.length > 0) {
        const details = await this.client.getJson("/videos", {
          params: { part: "snippet,statistics", id: ids.join(","), maxResults: ids.length, key },
          signal,
        });
        for (const video of parseResponse(this.platform, VideoListSchema, details).items) {
          videos.push(video);
        }
      }

      pageToken = page.items.length > 0 ? page.nextPageToken : null;
    } while (pageToken && videos.length < limit);

    return videos;
  }

  private async mostPopular(key: string, limit: number, signal?: AbortSignal) {
    const videos: z.infer<typeof VideoSchema>[] = [];
    let pageToken: string | null | undefined;

    do {
      const maxResults = Math.min(MAX_PAGE_SIZE, limit - videos.length);
      const params: Record<string, string | number> = { part: "snippet,statistics", chart: "mostPopular", maxResults, key };
      if (pageToken) params.pageToken = pageToken;

      const page = parseResponse(this.platform, VideoListSchema, await this.client.getJson("/videos", { params, signal }));
      for (const video of page.items.slice(0, maxResults)) {
        videos.push(video);
      }
      pageToken = page.items.length > 0 ? page.nextPageToken : null;
    } while (pageToken && videos.length < limit);

    return videos;
  }
}
