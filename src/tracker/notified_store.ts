import { readFile, rename } from "node:fs/promises";
import { z } from "zod";

import { NotifiedStateError } from "./errors.js";
import { errorMessage } from "./error_utils.js";
import { KeyedSerializer, isNotFound, writeJsonAtomic } from "./json_file.js";
import { logger as rootLogger } from "./logger.js";
import type { NotifiedState, Platform } from "./types.js";
import { safeJsonParse } from "./utils.js";

const logger = rootLogger.child({ component: "notified_store" });

const DAY_MS = 24 * 60 * 60 * 1000;

const NotifiedStateSchema = z.object({
  version: z.literal(1),
  entries: z.record(z.string()),
});

export function emptyNotifiedState(): NotifiedState {
  return { version: 1, entries: {} };
}

export function notifiedKey(platform: Platform, id: string): string {
  return `${platform}:${id}`;
}

/**
 * Drops entries notified more than `retentionDays` before `now`. Entries with an
 * unparseable timestamp are dropped too. Returns the input unchanged when
 * nothing was pruned.
 */
export function pruneNotified(state: NotifiedState, now: Date, retentionDays: number): NotifiedState {
  const cutoff = now.getTime() - retentionDays * DAY_MS;
  const kept: Record<string, string> = {};
  let dropped = 0;

  for (const [key, notifiedAt] of Object.entries(state.entries)) {
    const millis = Date.parse(notifiedAt);
    if (Number.isNaN(millis) || millis < cutoff) {
      dropped += 1;
    } else {
      kept[key] = notifiedAt;
    }
  }

  return dropped === 0 ? state : { version: 1, entries: kept };
}

export class NotifiedStore {
  private readonly writes = new KeyedSerializer();

  constructor(private readonly file: string) {}

  get path(): string {
    return this.file;
  }

  /** A missing file is an empty set; an unreadable one is moved aside to `<file>.corrupt`. */
  async load(): Promise<NotifiedState> {
    let raw: string;
    try {
      raw = await readFile(this.file, "utf-8");
    } catch (error) {
      if (isNotFound(error)) {
        return emptyNotifiedState();
      }
      throw new NotifiedStateError(`Failed to read notified state: ${errorMessage(error)}`, { cause: error });
    }

    const parsed = NotifiedStateSchema.safeParse(safeJsonParse(raw));
    if (parsed.success) {
      return parsed.data;
    }

    const quarantine = `${this.file}.corrupt`;
    try {
      await rename(this.file, quarantine);
    } catch (error) {
      throw new NotifiedStateError(`Notified state is corrupt and could not be moved aside: ${errorMessage(error)}`, {
        cause: error,
      });
    }
    logger.error({ file: this.file, quarantine }, "Notified state was corrupt; starting from an empty set");
    return emptyNotifiedState();
  }

  save(state: NotifiedState): Promise<void> {
    return this.writes.run(this.file, async () => {
      try {
        await writeJsonAtomic(this.file, state);
      } catch (error) {
        throw new NotifiedStateError(`Failed to persist notified state: ${errorMessage(error)}`, { cause: error });
      }
      logger.debug({ entries: Object.keys(state.entries).length }, "Notified state saved");
    });
  }
}
