import pino from "pino";
import { config } from "./config.js";

const isDevelopment = config.nodeEnv === "development";

export const logger = pino({
  level: config.logLevel,
  timestamp: pino.stdTimeFunctions.isoTime,
  base: {
    service: "mention-tracker",
  },
  transport: isDevelopment
    ? {
        target: "pino-pretty",
        options: {
          colorize: true,
          singleLine: true,
          translateTime: "SYS:standard",
        },
      }
    : undefined,
});
