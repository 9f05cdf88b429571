import { setTimeout as sleep } from "timers/promises";
import { RateLimiter } from "./rateLimiter";
import { AtomicStore } from "../store/atomicStore";
import { InvalidConfigurationError, ThrottleNotFoundError } from "../errors";
import { Knobs, ThrottlePolicy } from "../types/policy";
import { ThrottleDecision, ThrottleState } from "../types/decision";
import { assertRequestedTokens, resolveMode } from "./tokenBucket";
import { createLogger } from "../utils/logger";

export const THROTTLE_BURST_DEFAULT = 1;
export const THROTTLE_WINDOW_DEFAULT = 5;
export const THROTTLE_REQUESTED_TOKENS_DEFAULT = 1;
// Each use pushes the knobs' expiry out by a week.
export const THROTTLE_KNOBS_TTL_DEFAULT = 60 * 60 * 24 * 7;

const logger = createLogger("throttle");

export interface ThrottleLimiterOptions {
  keyPrefix?: string;
}

export interface WaitOptions {
  maxWaitSeconds?: number;
  sleep?: (seconds: number) => Promise<void>;
  now?: () => number; // milliseconds
}

/**
 * Named token bucket throttles shared by every process that talks to the
 * same store.
 *
 * The first use of a throttle publishes the caller's rps, burst and window
 * as its knobs. From then on the stored knobs win over whatever defaults
 * callers pass, so operators can retune a running fleet with set().
 *
 * rps 0 denies every request with a full window wait, rps -1 allows every
 * request.
 */
export class ThrottleLimiter implements RateLimiter {
  private readonly keyPrefix: string;

  constructor(
    private readonly store: AtomicStore,
    options: ThrottleLimiterOptions = {}
  ) {
    this.keyPrefix = options.keyPrefix ?? "throttle";
  }

  async consume(name: string, policy: ThrottlePolicy): Promise<ThrottleDecision> {
    const bucketKey = this.bucketKey(name);
    const knobsKey = this.knobsKey(name);
    const defaults: Knobs = {
      rps: policy.rps,
      burst: policy.burst ?? THROTTLE_BURST_DEFAULT,
      window: policy.window ?? THROTTLE_WINDOW_DEFAULT,
    };
    const requestedTokens = policy.requestedTokens ?? THROTTLE_REQUESTED_TOKENS_DEFAULT;

    // Seeded knobs outlive this call, so bad defaults must never reach them.
    resolveMode(defaults);
    assertRequestedTokens(requestedTokens);

    await this.store.seedKnobs(knobsKey, defaults);
    const decision = await this.store.evaluate({
      bucketKey,
      knobsKey,
      defaults,
      requestedTokens,
      knobsTtl: policy.knobsTtl ?? THROTTLE_KNOBS_TTL_DEFAULT,
    });

    logger.debug("throttle_evaluated", { throttle: name, ...decision });
    return decision;
  }

  /**
   * Consumes, sleeping out each denial, until allowed. Without maxWaitSeconds
   * this may wait forever; with it, the last denied decision is returned once
   * the time is up.
   */
  async wait(
    name: string,
    policy: ThrottlePolicy,
    options: WaitOptions = {}
  ): Promise<ThrottleDecision> {
    const pause = options.sleep ?? ((seconds: number) => sleep(seconds * 1000));
    const now = options.now ?? Date.now;
    const start = now();

    let decision = await this.consume(name, policy);
    while (!decision.allowed) {
      if (
        options.maxWaitSeconds !== undefined &&
        (now() - start) / 1000 > options.maxWaitSeconds
      ) {
        break;
      }
      await pause(decision.secondsUntilCapacity);
      decision = await this.consume(name, policy);
    }
    return decision;
  }

  /**
   * Overrides knobs for a throttle. Fields left out must already be stored.
   * When knobsTtl is given here, consume with knobsTtl 0 so evaluation does
   * not reset it.
   */
  async set(name: string, knobs: Partial<Knobs>, knobsTtl?: number): Promise<void> {
    for (const [field, value] of Object.entries(knobs)) {
      if (value === undefined) {
        continue;
      }
      if (!Number.isFinite(value) || (value < 0 && !(field === "rps" && value === -1))) {
        throw new InvalidConfigurationError(
          `"${value}" is not a valid throttle ${field}: use a number >= 0`
        );
      }
    }

    const knobsKey = this.knobsKey(name);
    const stored = await this.get(name);
    const missing = (["rps", "burst", "window"] as const).filter(
      (field) => knobs[field] === undefined && stored[field] === null
    );
    if (missing.length > 0) {
      throw new ThrottleNotFoundError(
        `Throttle knob ${knobsKey} has no ${missing.join(", ")}`
      );
    }

    await this.store.writeKnobs(knobsKey, knobs, knobsTtl);
    logger.info("throttle_knobs_set", { throttle: name, ...knobs, knobsTtl });
  }

  async get(name: string): Promise<ThrottleState> {
    return this.store.readThrottle(this.bucketKey(name), this.knobsKey(name));
  }

  async delete(name: string): Promise<void> {
    await this.store.remove([this.bucketKey(name), this.knobsKey(name)]);
  }

  // Drops the knobs; the next consume publishes its own defaults again.
  async reset(name: string): Promise<void> {
    await this.store.remove([this.knobsKey(name)]);
  }

  bucketKey(name: string): string {
    return `${this.keyPrefix}:${name}`;
  }

  knobsKey(name: string): string {
    return `${this.bucketKey(name)}:knobs`;
  }
}
