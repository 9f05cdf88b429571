import { InvalidConfigurationError } from "../errors";
import { Knobs, ThrottleMode } from "../types/policy";

export interface BucketState {
  tokens: number;
  refreshed: number;
}

export interface BucketCheck {
  allowed: boolean;
  refreshed: number;   // window start after refilling
  filledTokens: number;
  newTokens: number;   // tokens left once this request is settled
}

/**
 * Turns resolved knobs into a mode. rps 0 and -1 are sentinels and skip the
 * bucket entirely, so burst and window are only checked for real rates.
 */
export function resolveMode(knobs: Knobs): ThrottleMode {
  const { rps, burst, window } = knobs;

  if (!Number.isFinite(rps) || !Number.isFinite(burst) || !Number.isFinite(window)) {
    throw new InvalidConfigurationError("Throttle knobs must be numbers");
  }
  if (rps === 0) {
    return { kind: "denied", window };
  }
  if (rps === -1) {
    return { kind: "unlimited" };
  }
  if (rps < 0) {
    throw new InvalidConfigurationError(`Invalid rps ${rps}: use a positive rate, 0 or -1`);
  }
  if (window <= 0) {
    throw new InvalidConfigurationError(`Invalid window ${window}: must be positive`);
  }
  if (burst <= 0) {
    throw new InvalidConfigurationError(`Invalid burst ${burst}: must be positive`);
  }

  return { kind: "rate_limited", rps, burst, window };
}

export function assertRequestedTokens(requestedTokens: number): void {
  if (!Number.isFinite(requestedTokens) || requestedTokens <= 0) {
    throw new InvalidConfigurationError(
      `Invalid requested tokens ${requestedTokens}: must be positive`
    );
  }
}

export function capacityOf(rps: number, burst: number, window: number): number {
  return Math.ceil(rps * burst * window);
}

/**
 * Refills by whole elapsed windows only and decides the request. Missing
 * fields mean a bucket that never existed: full, with refreshed = 0.
 */
export function checkBucket(
  last: Partial<BucketState>,
  mode: Extract<ThrottleMode, { kind: "rate_limited" }>,
  now: number,
  requestedTokens: number
): BucketCheck {
  const { rps, burst, window } = mode;
  const capacity = capacityOf(rps, burst, window);

  const lastTokens = last.tokens ?? capacity;
  const lastRefreshed = last.refreshed ?? 0;

  const age = Math.max(0, now - lastRefreshed);
  const elapsedWindows = Math.floor(age / window);
  const addTokens = Math.ceil(elapsedWindows * rps * window);

  const filledTokens = Math.min(capacity, lastTokens + addTokens);
  const allowed = filledTokens >= requestedTokens;

  let refreshed = lastRefreshed;
  if (addTokens > 0) {
    // Advance by whole windows so the phase never drifts towards `now`.
    refreshed = lastRefreshed === 0 ? now : lastRefreshed + elapsedWindows * window;
  }

  const newTokens = allowed
    ? Math.max(0, filledTokens - requestedTokens)
    : filledTokens;

  return { allowed, refreshed, filledTokens, newTokens };
}

export function secondsUntilCapacity(
  window: number,
  refreshed: number,
  now: number,
  microseconds: number
): number {
  const diff = Math.max(0, now - refreshed);
  const seconds = window - diff - 1 + (1_000_000 - microseconds) / 1_000_000;
  return Number(seconds.toFixed(6));
}

// Twice the useful burst horizon.
export function bucketTtl(burst: number, window: number): number {
  return Math.ceil(burst * window * 2);
}
