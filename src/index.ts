export { ThrottleLimiter } from "./limiter/throttle";
export {
  THROTTLE_BURST_DEFAULT,
  THROTTLE_KNOBS_TTL_DEFAULT,
  THROTTLE_REQUESTED_TOKENS_DEFAULT,
  THROTTLE_WINDOW_DEFAULT,
} from "./limiter/throttle";
export type { ThrottleLimiterOptions, WaitOptions } from "./limiter/throttle";
export { LocalFallbackLimiter } from "./limiter/localFallback";
export { RunningCounter } from "./limiter/runningCounter";
export type { RunningCounterOptions } from "./limiter/runningCounter";
export type { RateLimiter } from "./limiter/rateLimiter";
export { RedisStore } from "./store/redisStore";
export type { RedisCommands, RedisStoreOptions } from "./store/redisStore";
export { MemoryStore } from "./store/memoryStore";
export type { AtomicStore } from "./store/atomicStore";
export { FrozenClock, systemClock } from "./store/clock";
export type { Clock, ClockReading } from "./store/clock";
export { throttle } from "./middleware/throttle.middleware";
export {
  InvalidConfigurationError,
  StoreUnavailableError,
  ThrottleError,
  ThrottleNotFoundError,
} from "./errors";
export type * from "./types/policy";
export type * from "./types/decision";
