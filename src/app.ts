import express from "express";
import { throttle } from "./middleware/throttle.middleware";
import { RateLimiter } from "./limiter/rateLimiter";
import { AppConfig } from "./config/env";
import { getMetrics } from "./utils/metrics";

export function createApp(limiter: RateLimiter, config: AppConfig["throttle"]) {
  const app = express();
  app.use(express.json());

  app.set("trust proxy", true);

  app.get("/metrics", (_req, res) => {
    res.json(getMetrics());
  });

  app.get(
    "/api/test",
    throttle(limiter, {
      name: "api-test",
      rps: config.rps,
      burst: config.burst,
      window: config.window,
      knobsTtl: config.knobsTtl,
      failureStrategy: config.failureStrategy,
    }),
    (_req, res) => {
      res.json({ message: "Request successful" });
    }
  );

  app.get("/health", (_req, res) => {
    res.json({ status: "ok" });
  });

  return app;
}
