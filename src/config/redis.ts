import { Redis } from "ioredis";
import { AppConfig } from "./env";
import { createLogger, errorFields } from "../utils/logger";

const logger = createLogger("redis");

/**
 * Commands fail fast instead of queueing while disconnected, so a store
 * outage reaches the throttle's failure strategy within the command timeout.
 */
export function createRedisClient(config: AppConfig["redis"]): Redis {
  const client = new Redis(config.url, {
    commandTimeout: config.commandTimeoutMs,
    maxRetriesPerRequest: 1,
    enableOfflineQueue: false,
    lazyConnect: true,
  });

  client.on("error", (err) => {
    logger.error("redis_client_error", errorFields(err));
  });
  client.on("ready", () => {
    logger.info("redis_ready", { url: redactUrl(config.url) });
  });

  return client;
}

export function redactUrl(url: string): string {
  const parsed = new URL(url);
  if (parsed.password) {
    parsed.password = "***";
  }
  return parsed.toString();
}
