import { readFile } from "node:fs/promises";
import { z } from "zod";

import { AppError } from "./errors.js";
import { errorMessage } from "./error_utils.js";
import { KeyedSerializer, isNotFound, writeJsonAtomic } from "./json_file.js";
import { logger as rootLogger } from "./logger.js";
import { normalizeKeyword } from "./match_engine.js";
import { PLATFORMS } from "./types.js";
import type { Platform, TrackedKeyword } from "./types.js";
import { safeJsonParse } from "./utils.js";

const logger = rootLogger.child({ component: "keyword_registry" });

const RegistryFileSchema = z.object({
  keywords: z.record(
    z.object({
      keyword: z.string().min(1),
      platforms: z.array(z.enum(PLATFORMS)),
      enabled: z.boolean(),
      createdAt: z.string(),
    }),
  ),
});

type RegistryFile = z.infer<typeof RegistryFileSchema>;

export interface AddKeywordInput {
  keyword: string;
  /** Empty or absent means every platform. */
  platforms?: readonly Platform[];
  enabled?: boolean;
}

function dedupePlatforms(platforms: readonly Platform[] | undefined): Platform[] {
  return PLATFORMS.filter((platform) => platforms?.includes(platform));
}

/** Keywords the monitor watches, stored as one JSON document keyed by normalized form. */
export class KeywordRegistry {
  private readonly writes = new KeyedSerializer();

  constructor(
    private readonly file: string,
    private readonly now: () => Date = () => new Date(),
  ) {}

  async list(): Promise<TrackedKeyword[]> {
    const data = await this.read();
    return Object.entries(data.keywords)
      .map(([normalized, entry]) => ({ ...entry, normalized }))
      .sort((a, b) => a.normalized.localeCompare(b.normalized));
  }

  async listEnabled(): Promise<TrackedKeyword[]> {
    return (await this.list()).filter((entry) => entry.enabled);
  }

  /** Adds or replaces a keyword; an existing entry keeps its creation time. */
  add(input: AddKeywordInput): Promise<TrackedKeyword> {
    const keyword = normalizeKeyword(input.keyword);
    const platforms = dedupePlatforms(input.platforms);

    return this.update((data) => {
      const existing = data.keywords[keyword.normalized];
      const entry = {
        keyword: keyword.raw.trim(),
        platforms,
        enabled: input.enabled ?? true,
        createdAt: existing?.createdAt ?? this.now().toISOString(),
      };
      data.keywords[keyword.normalized] = entry;
      logger.info({ keyword: keyword.normalized, platforms }, existing ? "Keyword updated" : "Keyword registered");
      return { ...entry, normalized: keyword.normalized };
    });
  }

  /** Resolves to false when the keyword was not registered. */
  remove(rawKeyword: string): Promise<boolean> {
    const keyword = normalizeKeyword(rawKeyword);
    return this.update((data) => {
      if (!Object.hasOwn(data.keywords, keyword.normalized)) {
        return false;
      }
      delete data.keywords[keyword.normalized];
      logger.info({ keyword: keyword.normalized }, "Keyword removed");
      return true;
    });
  }

  /** Registers any seed keyword that is not registered yet. Returns how many were added. */
  seed(keywords: readonly string[]): Promise<number> {
    return this.update((data) => {
      let added = 0;
      for (const raw of keywords) {
        if (raw.trim().length === 0) continue;
        const keyword = normalizeKeyword(raw);
        if (Object.hasOwn(data.keywords, keyword.normalized)) continue;
        data.keywords[keyword.normalized] = {
          keyword: keyword.raw.trim(),
          platforms: [],
          enabled: true,
          createdAt: this.now().toISOString(),
        };
        added += 1;
      }
      if (added > 0) {
        logger.info({ added }, "Seed keywords registered");
      }
      return added;
    });
  }

  private update<T>(mutate: (data: RegistryFile) => T): Promise<T> {
    return this.writes.run(this.file, async () => {
      const data = await this.read();
      const result = mutate(data);
      try {
        await writeJsonAtomic(this.file, data);
      } catch (error) {
        throw new AppError(`Failed to save keyword registry: ${errorMessage(error)}`, 500, { cause: error });
      }
      return result;
    });
  }

  private async read(): Promise<RegistryFile> {
    let raw: string;
    try {
      raw = await readFile(this.file, "utf-8");
    } catch (error) {
      if (isNotFound(error)) {
        return { keywords: {} };
      }
      throw new AppError(`Failed to read keyword registry: ${errorMessage(error)}`, 500, { cause: error });
    }

    const parsed = RegistryFileSchema.safeParse(safeJsonParse(raw));
    if (!parsed.success) {
      throw new AppError(`Keyword registry at ${this.file} is invalid`, 500);
    }
    return parsed.data;
  }
}
