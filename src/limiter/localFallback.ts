import { ThrottleLimiter } from "./throttle";
import { MemoryStore } from "../store/memoryStore";
import { Clock, systemClock } from "../store/clock";

/**
 * Throttles held in this process only. Each process enforces the full rate
 * on its own, so a fleet falling back together admits N times the limit.
 */
export class LocalFallbackLimiter extends ThrottleLimiter {
  constructor(clock: Clock = systemClock) {
    super(new MemoryStore(clock), { keyPrefix: "local" });
  }
}
