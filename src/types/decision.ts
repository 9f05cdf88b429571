export interface ThrottleDecision {
  allowed: boolean;
  tokens: number;
  secondsUntilCapacity: number; // decimal seconds until the next window starts
}

export interface ThrottleState {
  tokens: number | null;
  refreshed: number | null; // unix timestamp (seconds) of the current window start
  rps: number | null;
  burst: number | null;
  window: number | null;
}

export interface CounterBuckets {
  currentBucket: number;
  buckets: string[];
}

export interface BucketCount {
  bucket: number;
  count: number;
}
