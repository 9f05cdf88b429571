export interface Knobs {
  rps: number;     // requests per second; 0 denies everything, -1 allows everything
  burst: number;   // burst multiplier
  window: number;  // refill window in seconds
}

export type ThrottleMode =
  | { kind: "denied"; window: number }
  | { kind: "unlimited" }
  | { kind: "rate_limited"; rps: number; burst: number; window: number };

export type FailureStrategy = "fail-open" | "fail-closed" | "local-fallback";

export interface ThrottlePolicy {
  rps: number;
  burst?: number;
  window?: number;
  requestedTokens?: number;
  knobsTtl?: number; // seconds, 0 leaves the knobs TTL alone
}

export interface EvaluateRequest {
  bucketKey: string;
  knobsKey: string;
  defaults: Knobs;
  requestedTokens: number;
  knobsTtl: number;
}

export interface IncrementRequest {
  key: string;
  interval: number;
  periods: number;
  amount: number;
  // Also records `member` in this index set, scored by the same bucket.
  group?: { key: string; member: string };
}

export interface HttpThrottlePolicy extends ThrottlePolicy {
  name: string; // prefix of every caller's throttle name
  failureStrategy?: FailureStrategy;
}
