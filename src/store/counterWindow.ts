import { InvalidConfigurationError } from "../errors";

// Extra lifetime so readers that already fetched the bucket names can still
// read the accumulators.
export const COUNTER_GRACE_SECONDS = 60;

export function assertCounterWindow(interval: number, periods: number): void {
  if (!Number.isFinite(interval) || interval <= 0) {
    throw new InvalidConfigurationError(`Invalid counter interval ${interval}: must be positive`);
  }
  if (!Number.isInteger(periods) || periods <= 0) {
    throw new InvalidConfigurationError(`Invalid counter periods ${periods}: must be a positive integer`);
  }
}

export function bucketIndex(now: number, interval: number): number {
  return Math.floor(now / interval);
}

// Highest bucket index that has fallen out of retention.
export function retentionFloor(bucket: number, periods: number): number {
  return bucket - periods;
}

// Group members last incremented before this second are dropped.
export function groupHorizon(now: number, window: number): number {
  return now - window;
}

export function counterTtl(interval: number, periods: number): number {
  return periods * interval + COUNTER_GRACE_SECONDS;
}

export function bucketKey(key: string, bucket: number | string): string {
  return `${key}:${bucket}`;
}
