import { config } from "./tracker/config.js";
import { logger } from "./tracker/logger.js";
import { TrackerApp } from "./tracker/app.js";

async function main(): Promise<void> {
  const app = new TrackerApp();

  try {
    await app.start();
    logger.info(
      {
        httpPort: config.http.port,
        monitorEnabled: config.monitor.enabled,
        monitorIntervalMs: config.monitor.intervalMs,
        cacheDir: config.cacheDir,
      },
      "Mention tracker started",
    );
  } catch (error) {
    logger.error({ error }, "Failed to start mention tracker");
    process.exit(1);
  }
}

void main();
