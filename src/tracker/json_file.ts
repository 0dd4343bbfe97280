import { randomUUID } from "node:crypto";
import { mkdir, rename, rm, writeFile } from "node:fs/promises";
import path from "node:path";

import { errorMessage } from "./error_utils.js";
import { logger } from "./logger.js";

export function isNotFound(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

/** Pretty-printed JSON written to a sibling temp file, then renamed over the target. */
export async function writeJsonAtomic(file: string, data: unknown): Promise<void> {
  const tempFile = `${file}.${randomUUID()}.tmp`;
  try {
    await mkdir(path.dirname(file), { recursive: true });
    await writeFile(tempFile, `${JSON.stringify(data, null, 2)}\n`, "utf-8");
    await rename(tempFile, file);
  } catch (error) {
    await rm(tempFile, { force: true }).catch((cleanupError: unknown) => {
      logger.warn({ tempFile, error: errorMessage(cleanupError) }, "Failed to remove temporary file");
    });
    throw error;
  }
}

/** Runs tasks for the same key one after another; different keys never wait on each other. */
export class KeyedSerializer {
  private readonly chains = new Map<string, Promise<void>>();

  run<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = this.chains.get(key) ?? Promise.resolve();
    const run = previous.then(task);
    const settled = run.then(
      () => undefined,
      () => undefined,
    );
    this.chains.set(key, settled);
    void settled.then(() => {
      if (this.chains.get(key) === settled) {
        this.chains.delete(key);
      }
    });
    return run;
  }
}
