import { AtomicStore } from "./atomicStore";
import { Clock, ClockReading, systemClock } from "./clock";
import {
  assertCounterWindow,
  bucketIndex,
  bucketKey,
  counterTtl,
  groupHorizon,
  retentionFloor,
} from "./counterWindow";
import { StoreUnavailableError } from "../errors";
import {
  assertRequestedTokens,
  bucketTtl,
  checkBucket,
  resolveMode,
  secondsUntilCapacity,
} from "../limiter/tokenBucket";
import { EvaluateRequest, IncrementRequest, Knobs } from "../types/policy";
import { CounterBuckets, ThrottleDecision, ThrottleState } from "../types/decision";

type StoredValue =
  | { kind: "hash"; fields: Map<string, number> }
  | { kind: "number"; value: number }
  | { kind: "sorted_set"; members: Map<string, number> };

interface Entry {
  value: StoredValue;
  expiresAt: number | null;
}

const KNOB_FIELDS = ["rps", "burst", "window"] as const;

// Writes between sweeps of expired entries.
export const SWEEP_INTERVAL = 1000;

/**
 * Process-local AtomicStore. Each operation runs to completion without
 * yielding, which makes it atomic for every caller in this process and for
 * no one else. Expiry is measured on the injected clock.
 */
export class MemoryStore implements AtomicStore {
  private readonly entries = new Map<string, Entry>();
  private writes = 0;

  constructor(private readonly clock: Clock = systemClock) {}

  async evaluate(request: EvaluateRequest): Promise<ThrottleDecision> {
    assertRequestedTokens(request.requestedTokens);
    const reading = this.clock.now();
    this.countWrite(reading);
    const knobsHash = this.hash(request.knobsKey, reading);
    const bucketHash = this.hash(request.bucketKey, reading);

    const storedRps = knobsHash?.get("rps");
    const knobs: Knobs =
      storedRps === undefined
        ? request.defaults
        : {
            rps: storedRps,
            burst: knobsHash?.get("burst") ?? Number.NaN,
            window: knobsHash?.get("window") ?? Number.NaN,
          };
    const mode = resolveMode(knobs);

    if (storedRps !== undefined && request.knobsTtl > 0) {
      this.expire(request.knobsKey, request.knobsTtl, reading);
    }

    if (mode.kind === "denied") {
      return { allowed: false, tokens: 0, secondsUntilCapacity: mode.window };
    }
    if (mode.kind === "unlimited") {
      return { allowed: true, tokens: 1, secondsUntilCapacity: 0 };
    }

    const check = checkBucket(
      { tokens: bucketHash?.get("tokens"), refreshed: bucketHash?.get("refreshed") },
      mode,
      reading.seconds,
      request.requestedTokens
    );

    const fields = bucketHash ?? this.createHash(request.bucketKey);
    fields.set("tokens", check.newTokens);
    fields.set("refreshed", check.refreshed);
    this.expire(request.bucketKey, bucketTtl(mode.burst, mode.window), reading);

    return {
      allowed: check.allowed,
      tokens: Math.trunc(check.newTokens),
      secondsUntilCapacity: secondsUntilCapacity(
        mode.window,
        check.refreshed,
        reading.seconds,
        reading.microseconds
      ),
    };
  }

  async increment(request: IncrementRequest): Promise<void> {
    const { key, interval, periods, amount, group } = request;
    assertCounterWindow(interval, periods);

    const reading = this.clock.now();
    this.countWrite(reading);
    const bucket = bucketIndex(reading.seconds, interval);
    const accumulator = bucketKey(key, bucket);

    // Every type check runs before anything is created.
    const current = this.number(accumulator, reading);
    const existingIndex = this.sortedSet(key, reading);
    const existingMembers = group ? this.sortedSet(group.key, reading) : undefined;
    const index = existingIndex ?? this.createSortedSet(key);

    this.entries.set(accumulator, {
      value: { kind: "number", value: (current ?? 0) + amount },
      expiresAt: null,
    });
    index.set(String(bucket), bucket);
    this.prune(key, index, retentionFloor(bucket, periods));

    const ttl = counterTtl(interval, periods);
    this.expire(accumulator, ttl, reading);
    this.expire(key, ttl, reading);

    if (group) {
      const members = existingMembers ?? this.createSortedSet(group.key);
      members.set(group.member, reading.seconds);
      this.pruneBefore(group.key, members, groupHorizon(reading.seconds, interval * periods));
      this.expire(group.key, ttl, reading);
    }
  }

  async liveBuckets(key: string, interval: number, periods: number): Promise<CounterBuckets> {
    assertCounterWindow(interval, periods);

    const reading = this.clock.now();
    const bucket = bucketIndex(reading.seconds, interval);
    const index = this.sortedSet(key, reading);
    if (!index) {
      return { currentBucket: bucket, buckets: [] };
    }

    this.prune(key, index, retentionFloor(bucket, periods));
    return { currentBucket: bucket, buckets: byScore(index) };
  }

  async liveMembers(setKey: string, window: number): Promise<string[]> {
    const reading = this.clock.now();
    const members = this.sortedSet(setKey, reading);
    if (!members) {
      return [];
    }

    this.pruneBefore(setKey, members, groupHorizon(reading.seconds, window));
    return byScore(members);
  }

  async readCounters(keys: string[]): Promise<Array<number | null>> {
    const reading = this.clock.now();
    return keys.map((key) => this.number(key, reading) ?? null);
  }

  async readThrottle(bucketKey: string, knobsKey: string): Promise<ThrottleState> {
    const reading = this.clock.now();
    const bucket = this.hash(bucketKey, reading);
    const knobs = this.hash(knobsKey, reading);

    return {
      tokens: bucket?.get("tokens") ?? null,
      refreshed: bucket?.get("refreshed") ?? null,
      rps: knobs?.get("rps") ?? null,
      burst: knobs?.get("burst") ?? null,
      window: knobs?.get("window") ?? null,
    };
  }

  async seedKnobs(knobsKey: string, defaults: Knobs): Promise<void> {
    const reading = this.clock.now();
    const fields = this.hash(knobsKey, reading) ?? this.createHash(knobsKey);
    for (const field of KNOB_FIELDS) {
      if (!fields.has(field)) {
        fields.set(field, defaults[field]);
      }
    }
  }

  async writeKnobs(knobsKey: string, knobs: Partial<Knobs>, ttlSeconds?: number): Promise<void> {
    const reading = this.clock.now();
    const fields = this.hash(knobsKey, reading) ?? this.createHash(knobsKey);
    for (const field of KNOB_FIELDS) {
      const value = knobs[field];
      if (value !== undefined) {
        fields.set(field, value);
      }
    }
    if (ttlSeconds) {
      this.expire(knobsKey, ttlSeconds, reading);
    }
  }

  async discard(setKey: string, member: string): Promise<void> {
    const members = this.sortedSet(setKey, this.clock.now());
    if (!members) {
      return;
    }
    members.delete(member);
    if (members.size === 0) {
      this.entries.delete(setKey);
    }
  }

  async remove(keys: string[]): Promise<void> {
    for (const key of keys) {
      this.entries.delete(key);
    }
  }

  /** Number of entries held, expired ones included until swept. */
  get size(): number {
    return this.entries.size;
  }

  /** Remaining lifetime in seconds, -1 without expiry, -2 when absent. */
  ttl(key: string): number {
    const reading = this.clock.now();
    const entry = this.live(key, reading);
    if (!entry) {
      return -2;
    }
    if (entry.expiresAt === null) {
      return -1;
    }
    return Math.round(entry.expiresAt - instant(reading));
  }

  private live(key: string, reading: ClockReading): Entry | undefined {
    const entry = this.entries.get(key);
    if (entry && entry.expiresAt !== null && entry.expiresAt <= instant(reading)) {
      this.entries.delete(key);
      return undefined;
    }
    return entry;
  }

  private hash(key: string, reading: ClockReading): Map<string, number> | undefined {
    const entry = this.live(key, reading);
    if (!entry) {
      return undefined;
    }
    if (entry.value.kind !== "hash") {
      throw wrongType(key);
    }
    return entry.value.fields;
  }

  private number(key: string, reading: ClockReading): number | undefined {
    const entry = this.live(key, reading);
    if (!entry) {
      return undefined;
    }
    if (entry.value.kind !== "number") {
      throw wrongType(key);
    }
    return entry.value.value;
  }

  private sortedSet(key: string, reading: ClockReading): Map<string, number> | undefined {
    const entry = this.live(key, reading);
    if (!entry) {
      return undefined;
    }
    if (entry.value.kind !== "sorted_set") {
      throw wrongType(key);
    }
    return entry.value.members;
  }

  private createHash(key: string): Map<string, number> {
    const fields = new Map<string, number>();
    this.entries.set(key, { value: { kind: "hash", fields }, expiresAt: null });
    return fields;
  }

  private createSortedSet(key: string): Map<string, number> {
    const members = new Map<string, number>();
    this.entries.set(key, { value: { kind: "sorted_set", members }, expiresAt: null });
    return members;
  }

  private prune(key: string, members: Map<string, number>, floor: number): void {
    for (const [member, score] of members) {
      if (score <= floor) {
        members.delete(member);
      }
    }
    if (members.size === 0) {
      this.entries.delete(key);
    }
  }

  // Drops members scored strictly below `horizon`.
  private pruneBefore(key: string, members: Map<string, number>, horizon: number): void {
    for (const [member, score] of members) {
      if (score < horizon) {
        members.delete(member);
      }
    }
    if (members.size === 0) {
      this.entries.delete(key);
    }
  }

  // Keys that are never read again would otherwise stay forever.
  private countWrite(reading: ClockReading): void {
    this.writes += 1;
    if (this.writes % SWEEP_INTERVAL !== 0) {
      return;
    }
    for (const key of [...this.entries.keys()]) {
      this.live(key, reading);
    }
  }

  private expire(key: string, ttlSeconds: number, reading: ClockReading): void {
    const entry = this.entries.get(key);
    if (!entry) {
      return;
    }
    if (ttlSeconds <= 0) {
      this.entries.delete(key);
      return;
    }
    entry.expiresAt = instant(reading) + ttlSeconds;
  }
}

function byScore(members: Map<string, number>): string[] {
  return [...members.entries()]
    .sort(([a, scoreA], [b, scoreB]) => scoreA - scoreB || (a < b ? -1 : a > b ? 1 : 0))
    .map(([member]) => member);
}

function instant(reading: ClockReading): number {
  return reading.seconds + reading.microseconds / 1_000_000;
}

function wrongType(key: string): StoreUnavailableError {
  return new StoreUnavailableError(
    `WRONGTYPE Operation against key ${key} holding the wrong kind of value`
  );
}
