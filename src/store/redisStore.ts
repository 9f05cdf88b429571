import fs from "fs";
import path from "path";
import { ChainableCommander } from "ioredis";
import { z } from "zod";
import { AtomicStore } from "./atomicStore";
import { assertCounterWindow } from "./counterWindow";
import {
  InvalidConfigurationError,
  StoreUnavailableError,
  ThrottleError,
} from "../errors";
import { EvaluateRequest, IncrementRequest, Knobs } from "../types/policy";
import { CounterBuckets, ThrottleDecision, ThrottleState } from "../types/decision";
import { createLogger, errorFields } from "../utils/logger";

const logger = createLogger("redis-store");

// Resolves to <root>/lua from both src/store and dist/store.
const SCRIPT_DIR = path.join(__dirname, "..", "..", "lua");

export type ScriptName =
  | "throttle"
  | "runningCounter"
  | "runningCounterGet"
  | "runningCounterGroup";

export const CLOCK_READ = 'local time = redis.call("TIME")';

// Reads the clock from frozen_second / frozen_microsecond when they exist.
export const FREEZABLE_CLOCK_READ = [
  "local time",
  'if redis.call("EXISTS", "frozen_second") == 1 then',
  '  time = redis.call("MGET", "frozen_second", "frozen_microsecond")',
  "else",
  '  time = redis.call("TIME")',
  "end",
].join("\n");

const INVALID_CONFIGURATION = /INVALID_CONFIGURATION (.*)$/;

const throttleReply = z.tuple([z.number(), z.number(), z.string()]);
const liveBucketsReply = z.tuple([z.number(), z.array(z.string())]);
const membersReply = z.array(z.string());
const shaReply = z.string();

/** The slice of an ioredis client the store talks to. */
export interface RedisCommands {
  script(subcommand: "LOAD", source: string): Promise<unknown>;
  evalsha(sha: string, numKeys: number, ...args: Array<string | number>): Promise<unknown>;
  mget(...keys: string[]): Promise<Array<string | null>>;
  hmget(key: string, ...fields: string[]): Promise<Array<string | null>>;
  mset(values: Record<string, number>): Promise<unknown>;
  zrem(key: string, member: string): Promise<unknown>;
  del(...keys: string[]): Promise<unknown>;
  multi(): ChainableCommander;
}

export interface RedisStoreOptions {
  /** Let freezeTime() pin the clock the scripts read. Never enable in production. */
  freezableTime?: boolean;
}

/**
 * AtomicStore on Redis. Each atomic unit is a Lua script run with EVALSHA;
 * the scripts read Redis TIME so every caller shares one clock.
 */
export class RedisStore implements AtomicStore {
  private readonly sources = new Map<ScriptName, string>();
  private readonly shas = new Map<ScriptName, string>();

  constructor(
    private readonly client: RedisCommands,
    private readonly options: RedisStoreOptions = {}
  ) {}

  async evaluate(request: EvaluateRequest): Promise<ThrottleDecision> {
    const { defaults } = request;
    const reply = await this.guard("evaluate", () =>
      this.runScript(
        "throttle",
        [request.bucketKey, request.knobsKey],
        [defaults.rps, defaults.burst, defaults.window, request.requestedTokens, request.knobsTtl]
      )
    );

    const [allowed, tokens, seconds] = this.parse("evaluate", throttleReply, reply);
    return {
      allowed: allowed === 1,
      tokens,
      secondsUntilCapacity: Number(seconds),
    };
  }

  async increment(request: IncrementRequest): Promise<void> {
    const { key, interval, periods, amount, group } = request;
    assertCounterWindow(interval, periods);

    const keys = group ? [key, group.key] : [key];
    const args = group ? [interval, periods, amount, group.member] : [interval, periods, amount];
    await this.guard("increment", () => this.runScript("runningCounter", keys, args));
  }

  async liveBuckets(key: string, interval: number, periods: number): Promise<CounterBuckets> {
    assertCounterWindow(interval, periods);

    const reply = await this.guard("liveBuckets", () =>
      this.runScript("runningCounterGet", [key], [interval, periods])
    );
    const [currentBucket, buckets] = this.parse("liveBuckets", liveBucketsReply, reply);
    return { currentBucket, buckets };
  }

  async liveMembers(setKey: string, window: number): Promise<string[]> {
    const reply = await this.guard("liveMembers", () =>
      this.runScript("runningCounterGroup", [setKey], [window])
    );
    return this.parse("liveMembers", membersReply, reply);
  }

  async readCounters(keys: string[]): Promise<Array<number | null>> {
    if (keys.length === 0) {
      return [];
    }
    const values = await this.guard("readCounters", () => this.client.mget(...keys));
    return values.map(toNumber);
  }

  async readThrottle(bucketKey: string, knobsKey: string): Promise<ThrottleState> {
    const [[tokens, refreshed], [rps, burst, window]] = await this.guard("readThrottle", () =>
      Promise.all([
        this.client.hmget(bucketKey, "tokens", "refreshed"),
        this.client.hmget(knobsKey, "rps", "burst", "window"),
      ])
    );

    return {
      tokens: toNumber(tokens),
      refreshed: toNumber(refreshed),
      rps: toNumber(rps),
      burst: toNumber(burst),
      window: toNumber(window),
    };
  }

  async seedKnobs(knobsKey: string, defaults: Knobs): Promise<void> {
    await this.guard("seedKnobs", () =>
      this.exec(
        this.client
          .multi()
          .hsetnx(knobsKey, "rps", defaults.rps)
          .hsetnx(knobsKey, "burst", defaults.burst)
          .hsetnx(knobsKey, "window", defaults.window)
      )
    );
  }

  async writeKnobs(knobsKey: string, knobs: Partial<Knobs>, ttlSeconds?: number): Promise<void> {
    const fields: Record<string, number> = {};
    for (const [field, value] of Object.entries(knobs)) {
      if (value !== undefined) {
        fields[field] = value;
      }
    }

    const multi = this.client.multi();
    if (Object.keys(fields).length > 0) {
      multi.hset(knobsKey, fields);
    }
    if (ttlSeconds) {
      multi.expire(knobsKey, ttlSeconds);
    }
    await this.guard("writeKnobs", () => this.exec(multi));
  }

  async discard(setKey: string, member: string): Promise<void> {
    await this.guard("discard", () => this.client.zrem(setKey, member));
  }

  async remove(keys: string[]): Promise<void> {
    if (keys.length === 0) {
      return;
    }
    await this.guard("remove", () => this.client.del(...keys));
  }

  async freezeTime(seconds: number, microseconds = 0): Promise<void> {
    if (!this.options.freezableTime) {
      throw new InvalidConfigurationError("freezeTime needs a RedisStore created with freezableTime");
    }
    await this.guard("freezeTime", () =>
      this.client.mset({ frozen_second: seconds, frozen_microsecond: microseconds })
    );
  }

  async unfreezeTime(): Promise<void> {
    await this.guard("unfreezeTime", () => this.client.del("frozen_second", "frozen_microsecond"));
  }

  private async runScript(
    name: ScriptName,
    keys: string[],
    args: Array<string | number>
  ): Promise<unknown> {
    const argv: Array<string | number> = [...keys, ...args];
    const sha = await this.loadScript(name);

    try {
      return await this.client.evalsha(sha, keys.length, ...argv);
    } catch (err) {
      if (!isNoScript(err)) {
        throw err;
      }
      // Script cache was flushed (restart, failover, SCRIPT FLUSH)
      logger.info("script_reload", { script: name });
      this.shas.delete(name);
      const reloaded = await this.loadScript(name);
      return this.client.evalsha(reloaded, keys.length, ...argv);
    }
  }

  private async loadScript(name: ScriptName): Promise<string> {
    const cached = this.shas.get(name);
    if (cached) {
      return cached;
    }

    const sha = shaReply.parse(await this.client.script("LOAD", this.scriptSource(name)));
    this.shas.set(name, sha);
    return sha;
  }

  scriptSource(name: ScriptName): string {
    let source = this.sources.get(name);
    if (source === undefined) {
      source = fs.readFileSync(path.join(SCRIPT_DIR, `${name}.lua`), "utf8");
      if (this.options.freezableTime) {
        source = source.split(CLOCK_READ).join(FREEZABLE_CLOCK_READ);
      }
      this.sources.set(name, source);
    }
    return source;
  }

  private async exec(multi: ChainableCommander): Promise<void> {
    const results = await multi.exec();
    if (results === null) {
      throw new Error("Transaction aborted");
    }
    for (const [err] of results) {
      if (err) {
        throw err;
      }
    }
  }

  private parse<T>(operation: string, schema: z.ZodType<T>, reply: unknown): T {
    const parsed = schema.safeParse(reply);
    if (!parsed.success) {
      throw new StoreUnavailableError(
        `Redis ${operation} returned an unexpected reply: ${JSON.stringify(reply)}`
      );
    }
    return parsed.data;
  }

  private async guard<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (err) {
      if (err instanceof ThrottleError) {
        throw err;
      }

      const message = err instanceof Error ? err.message : String(err);
      const invalid = INVALID_CONFIGURATION.exec(message);
      if (invalid) {
        throw new InvalidConfigurationError(invalid[1], { cause: err });
      }

      logger.warn("store_unavailable", { operation, ...errorFields(err) });
      throw new StoreUnavailableError(`Redis ${operation} failed: ${message}`, { cause: err });
    }
  }
}

function isNoScript(err: unknown): boolean {
  return err instanceof Error && err.message.startsWith("NOSCRIPT");
}

function toNumber(value: string | null): number | null {
  if (value === null) {
    return null;
  }
  const parsed = Number(value);
  return Number.isNaN(parsed) ? null : parsed;
}
