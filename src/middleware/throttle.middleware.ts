import { NextFunction } from "express";
import { RateLimiter } from "../limiter/rateLimiter";
import { LocalFallbackLimiter } from "../limiter/localFallback";
import { StoreUnavailableError } from "../errors";
import { HttpThrottlePolicy } from "../types/policy";
import { ThrottleDecision } from "../types/decision";
import { getThrottleName, IdentifiableRequest } from "../utils/identifier";
import { createLogger, errorFields } from "../utils/logger";
import {
  recordAllowed,
  recordDenied,
  recordFallbackDecision,
  recordStoreError,
} from "../utils/metrics";

export interface ThrottledResponse {
  setHeader(name: string, value: string | number): unknown;
  status(code: number): { json(body: unknown): unknown };
}

const logger = createLogger("throttle-middleware");
const defaultFallback = new LocalFallbackLimiter();

export function throttle(
  limiter: RateLimiter,
  policy: HttpThrottlePolicy,
  fallback: RateLimiter = defaultFallback
) {
  const strategy = policy.failureStrategy ?? "fail-open";

  return async (req: IdentifiableRequest, res: ThrottledResponse, next: NextFunction) => {
    const name = getThrottleName(req, policy.name);
    let decision: ThrottleDecision;

    try {
      decision = await limiter.consume(name, policy);
    } catch (err) {
      if (!(err instanceof StoreUnavailableError)) {
        next(err);
        return;
      }

      recordStoreError();
      logger.error("throttle_store_unavailable", { throttle: name, strategy, ...errorFields(err) });

      if (strategy === "fail-closed") {
        res.status(503).json({ message: "Rate limiting unavailable" });
        return;
      }
      if (strategy === "fail-open") {
        next();
        return;
      }

      try {
        decision = await fallback.consume(name, policy);
      } catch (fallbackErr) {
        next(fallbackErr);
        return;
      }
      recordFallbackDecision();
    }

    setHeaders(res, decision);

    if (!decision.allowed) {
      recordDenied();
      res.setHeader("Retry-After", Math.ceil(decision.secondsUntilCapacity));
      res.status(429).json({ message: "Too many requests" });
      return;
    }

    recordAllowed();
    next();
  };
}

function setHeaders(res: ThrottledResponse, decision: ThrottleDecision) {
  res.setHeader("X-RateLimit-Remaining", decision.tokens);
  res.setHeader("X-RateLimit-Reset", decision.secondsUntilCapacity.toFixed(6));
}
