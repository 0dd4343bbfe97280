import { readFile, readdir } from "node:fs/promises";
import path from "node:path";
import { z } from "zod";

import { CollectorError } from "../errors.js";
import { errorMessage } from "../error_utils.js";
import { logger as rootLogger } from "../logger.js";
import { safeJsonParse } from "../utils.js";
import type { DiscordRecord, FetchRequest, PlatformCollector } from "./types.js";

const logger = rootLogger.child({ component: "discord_archive" });

const MessageSchema = z.object({
  id: z.union([z.string(), z.number()]).transform(String).nullish(),
  timestamp: z.string().nullish(),
  content: z.string().nullish(),
  author: z
    .union([z.string(), z.object({ name: z.string().nullish(), nickname: z.string().nullish() })])
    .nullish(),
  reactions: z.array(z.object({ count: z.number().nullish() })).nullish(),
});

const ChannelExportSchema = z.object({
  channel: z.object({ name: z.string().nullish() }).nullish(),
  messages: z.array(z.unknown()),
});

const GuildExportSchema = z.object({
  channels: z.array(z.object({ name: z.string().nullish(), messages: z.array(z.unknown()).nullish() })),
});

interface ChannelMessages {
  channel: string;
  messages: unknown[];
}

/**
 * Accepts a DiscordChatExporter channel export, a guild export with nested
 * channels, or a bare array of messages.
 */
export function extractChannels(data: unknown, fallbackChannel: string): ChannelMessages[] {
  if (Array.isArray(data)) {
    return [{ channel: fallbackChannel, messages: data }];
  }

  const channelExport = ChannelExportSchema.safeParse(data);
  if (channelExport.success) {
    return [{ channel: channelExport.data.channel?.name || fallbackChannel, messages: channelExport.data.messages }];
  }

  const guildExport = GuildExportSchema.safeParse(data);
  if (guildExport.success) {
    return guildExport.data.channels.map((channel) => ({
      channel: channel.name || fallbackChannel,
      messages: channel.messages ?? [],
    }));
  }

  return [];
}

/**
 * Reads exported chat history from local JSON files. The archive has no live
 * feed, so hot collection is not supported; historical collection returns the
 * whole corpus and leaves matching to the caller.
 */
export class DiscordArchiveCollector implements PlatformCollector<"discord"> {
  readonly platform = "discord" as const;

  constructor(private readonly archiveDir: string) {}

  async fetch({ mode, signal }: FetchRequest): Promise<DiscordRecord[]> {
    if (mode === "hot") {
      throw new CollectorError("not_supported", "discord archive has no hot listing");
    }

    const files = await this.listArchiveFiles();
    const records: DiscordRecord[] = [];

    for (const file of files) {
      signal?.throwIfAborted();
      for (const record of await this.readArchiveFile(file)) {
        records.push(record);
      }
    }

    logger.debug({ files: files.length, records: records.length }, "Discord archive read");
    return records;
  }

  private async listArchiveFiles(): Promise<string[]> {
    let names: string[];
    try {
      names = await readdir(this.archiveDir);
    } catch (error) {
      if (error instanceof Error && "code" in error && error.code === "ENOENT") {
        logger.warn({ archiveDir: this.archiveDir }, "Discord archive directory does not exist");
        return [];
      }
      throw new CollectorError("network_error", `Failed to list discord archive: ${errorMessage(error)}`, { cause: error });
    }

    return names
      .filter((name) => name.toLowerCase().endsWith(".json"))
      .sort()
      .map((name) => path.join(this.archiveDir, name));
  }

  private async readArchiveFile(file: string): Promise<DiscordRecord[]> {
    let raw: string;
    try {
      raw = await readFile(file, "utf-8");
    } catch (error) {
      logger.warn({ file, error: errorMessage(error) }, "Skipping unreadable discord archive file");
      return [];
    }

    const data = safeJsonParse(raw);
    if (data === null) {
      logger.warn({ file }, "Skipping discord archive file that is not valid JSON");
      return [];
    }

    const records: DiscordRecord[] = [];
    let skipped = 0;
    for (const { channel, messages } of extractChannels(data, path.basename(file, path.extname(file)))) {
      for (const message of messages) {
        const parsed = MessageSchema.safeParse(message);
        if (!parsed.success) {
          skipped += 1;
          continue;
        }
        records.push({ platform: this.platform, channel, ...parsed.data });
      }
    }

    if (skipped > 0) {
      logger.warn({ file, skipped }, "Skipped malformed discord messages");
    }
    return records;
  }
}
