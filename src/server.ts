import { createApp } from "./app";
import { loadConfig } from "./config/env";
import { createRedisClient } from "./config/redis";
import { ThrottleLimiter } from "./limiter/throttle";
import { RedisStore } from "./store/redisStore";
import { createLogger, errorFields, setLogLevel } from "./utils/logger";

const logger = createLogger("server");

async function main() {
  const config = loadConfig();
  setLogLevel(config.logLevel);

  const redis = createRedisClient(config.redis);
  await redis.connect();

  const limiter = new ThrottleLimiter(new RedisStore(redis), {
    keyPrefix: config.throttle.keyPrefix,
  });
  const app = createApp(limiter, config.throttle);

  const server = app.listen(config.port, () => {
    logger.info("server_listening", { port: config.port });
  });

  const shutdown = (signal: string) => {
    logger.info("server_shutdown", { signal });
    server.close(() => {
      redis
        .quit()
        .catch((err: unknown) => logger.error("redis_quit_failed", errorFields(err)))
        .finally(() => process.exit(0));
    });
  };
  process.on("SIGTERM", () => shutdown("SIGTERM"));
  process.on("SIGINT", () => shutdown("SIGINT"));
}

main().catch((err: unknown) => {
  logger.error("server_start_failed", errorFields(err));
  process.exit(1);
});
