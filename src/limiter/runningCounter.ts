import { AtomicStore } from "../store/atomicStore";
import { assertCounterWindow, bucketKey } from "../store/counterWindow";
import { InvalidConfigurationError } from "../errors";
import { BucketCount } from "../types/decision";

export interface RunningCounterOptions {
  interval: number; // seconds per bucket
  periods: number;  // buckets kept
  name?: string;
  groupName?: string;
  keyPrefix?: string;
}

/**
 * Keeps a count per interval for the last `periods` intervals. Buckets are
 * addressed by floor(epoch seconds / interval), so with hour intervals
 * 2019-02-19T01:23:09Z (1550539389) lands in bucket 430705.
 *
 * A counter is either bound to one name, or is a group: a family of named
 * counters that can be listed and summed together.
 */
export class RunningCounter {
  readonly interval: number;
  readonly periods: number;
  readonly name?: string;
  readonly groupName?: string;
  private readonly keyPrefix: string;

  constructor(private readonly store: AtomicStore, options: RunningCounterOptions) {
    assertCounterWindow(options.interval, options.periods);
    if (options.name !== undefined && options.groupName !== undefined) {
      throw new InvalidConfigurationError("A running counter takes a name or a groupName, not both");
    }

    this.interval = options.interval;
    this.periods = options.periods;
    this.name = options.name;
    this.groupName = options.groupName;
    this.keyPrefix = options.keyPrefix ?? "counter";
  }

  get window(): number {
    return this.interval * this.periods;
  }

  async inc(amount = 1, name?: string): Promise<void> {
    const counterName = this.resolveName(name);
    await this.store.increment({
      key: this.key(counterName),
      interval: this.interval,
      periods: this.periods,
      amount,
      group:
        this.groupName === undefined
          ? undefined
          : { key: this.groupKey(), member: counterName },
    });
  }

  /** Live buckets and their values, newest first. */
  async bucketsCounts(name?: string, recentBuckets?: number): Promise<BucketCount[]> {
    this.assertRecentBuckets(recentBuckets);
    const key = this.key(this.resolveName(name));

    const { currentBucket, buckets } = await this.store.liveBuckets(
      key,
      this.interval,
      this.periods
    );
    const oldest = currentBucket - (recentBuckets ?? this.periods);
    const wanted = buckets.map(Number).filter((bucket) => bucket > oldest);
    const values = await this.store.readCounters(wanted.map((bucket) => bucketKey(key, bucket)));

    const counts: BucketCount[] = [];
    wanted.forEach((bucket, i) => {
      const count = values[i];
      // The accumulator may expire between the two reads.
      if (count !== null && count !== undefined) {
        counts.push({ bucket, count });
      }
    });
    return counts.sort((a, b) => b.bucket - a.bucket);
  }

  async count(name?: string, recentBuckets?: number): Promise<number> {
    const counts = await this.bucketsCounts(name, recentBuckets);
    return counts.reduce((total, { count }) => total + count, 0);
  }

  async group(): Promise<string[]> {
    const names = await this.store.liveMembers(this.groupKey(), this.window);
    return [...names].sort();
  }

  async groupCounts(recentBuckets?: number): Promise<Record<string, number>> {
    this.assertRecentBuckets(recentBuckets);
    const counts: Record<string, number> = {};
    for (const name of await this.group()) {
      counts[name] = await this.count(name, recentBuckets);
    }
    return counts;
  }

  async delete(name?: string): Promise<void> {
    const counterName = this.resolveName(name);
    const key = this.key(counterName);
    const { buckets } = await this.store.liveBuckets(key, this.interval, this.periods);

    await this.store.remove([key, ...buckets.map((bucket) => bucketKey(key, bucket))]);
    if (this.groupName !== undefined) {
      await this.store.discard(this.groupKey(), counterName);
    }
  }

  async deleteGroup(): Promise<void> {
    for (const name of await this.group()) {
      await this.delete(name);
    }
    await this.store.remove([this.groupKey()]);
  }

  private resolveName(name: string | undefined): string {
    if (this.groupName !== undefined) {
      if (name === undefined) {
        throw new InvalidConfigurationError(`Group counter ${this.groupName} needs a counter name`);
      }
      return name;
    }
    if (this.name !== undefined && name !== undefined && name !== this.name) {
      throw new InvalidConfigurationError(
        `Counter is bound to ${this.name}, use a group counter for several names`
      );
    }
    const resolved = name ?? this.name;
    if (resolved === undefined) {
      throw new InvalidConfigurationError("Counter name is required");
    }
    return resolved;
  }

  private assertRecentBuckets(recentBuckets: number | undefined): void {
    if (
      recentBuckets !== undefined &&
      (!Number.isInteger(recentBuckets) || recentBuckets < 1 || recentBuckets > this.periods)
    ) {
      throw new InvalidConfigurationError(
        `recentBuckets must be between 1 and ${this.periods}, got ${recentBuckets}`
      );
    }
  }

  private key(name: string): string {
    return this.groupName === undefined
      ? `${this.keyPrefix}:${name}`
      : `${this.groupKey()}:${name}`;
  }

  private groupKey(): string {
    if (this.groupName === undefined) {
      throw new InvalidConfigurationError("Counter has no groupName");
    }
    return `${this.keyPrefix}:group:${this.groupName}`;
  }
}
