import { EvaluateRequest, IncrementRequest, Knobs } from "../types/policy";
import { CounterBuckets, ThrottleDecision, ThrottleState } from "../types/decision";

/**
 * Shared state behind throttles and running counters.
 *
 * Every method runs as one indivisible unit against the store and takes
 * "now" from the store's own clock, never from the caller.
 */
export interface AtomicStore {
  evaluate(request: EvaluateRequest): Promise<ThrottleDecision>;

  increment(request: IncrementRequest): Promise<void>;

  liveBuckets(key: string, interval: number, periods: number): Promise<CounterBuckets>;

  // Group members incremented within the last `window` seconds.
  liveMembers(setKey: string, window: number): Promise<string[]>;

  readCounters(keys: string[]): Promise<Array<number | null>>;

  readThrottle(bucketKey: string, knobsKey: string): Promise<ThrottleState>;

  // Writes only the knob fields that are not stored yet.
  seedKnobs(knobsKey: string, defaults: Knobs): Promise<void>;

  writeKnobs(knobsKey: string, knobs: Partial<Knobs>, ttlSeconds?: number): Promise<void>;

  discard(setKey: string, member: string): Promise<void>;

  remove(keys: string[]): Promise<void>;
}
