import { ThrottleLimiter, THROTTLE_KNOBS_TTL_DEFAULT } from "../throttle";
import { LocalFallbackLimiter } from "../localFallback";
import { MemoryStore } from "../../store/memoryStore";
import { FrozenClock } from "../../store/clock";
import { InvalidConfigurationError, ThrottleNotFoundError } from "../../errors";

describe("ThrottleLimiter", () => {
  let clock: FrozenClock;
  let store: MemoryStore;
  let limiter: ThrottleLimiter;

  beforeEach(() => {
    clock = new FrozenClock(1000, 0);
    store = new MemoryStore(clock);
    limiter = new ThrottleLimiter(store);
  });

  describe("consume", () => {
    it("should publish the defaults as knobs on first use", async () => {
      const decision = await limiter.consume("test", { rps: 5, burst: 2, window: 6 });

      expect(decision).toEqual({ allowed: true, tokens: 59, secondsUntilCapacity: 6 });
      expect(await limiter.get("test")).toEqual({
        tokens: 59,
        refreshed: 1000,
        rps: 5,
        burst: 2,
        window: 6,
      });
      expect(store.ttl("throttle:test:knobs")).toBe(THROTTLE_KNOBS_TTL_DEFAULT);
    });

    it("should fall back to burst 1 and a 5 second window", async () => {
      const decision = await limiter.consume("test", { rps: 2 });

      expect(decision.tokens).toBe(9);
      expect(await limiter.get("test")).toMatchObject({ burst: 1, window: 5 });
    });

    it("should follow knob changes and ignore later defaults", async () => {
      expect((await limiter.consume("test", { rps: 5, burst: 1, window: 5 })).tokens).toBe(24);

      await limiter.set("test", { rps: 10, burst: 1, window: 5 });
      expect((await limiter.consume("test", { rps: 100, burst: 100, window: 100 })).tokens).toBe(23);

      clock.set(1006);
      await limiter.set("test", { rps: 10, burst: 1, window: 10 });
      expect((await limiter.consume("test", { rps: 5, burst: 1, window: 5 })).tokens).toBe(22);

      clock.set(1011);
      expect((await limiter.consume("test", { rps: 5, burst: 1, window: 5 })).tokens).toBe(99);
      expect((await limiter.get("test")).refreshed).toBe(1010);
    });

    it("should keep throttles apart", async () => {
      await limiter.consume("one", { rps: 1, burst: 1, window: 1, requestedTokens: 1 });

      expect(await limiter.consume("one", { rps: 1, burst: 1, window: 1 })).toMatchObject({
        allowed: false,
        tokens: 0,
      });
      expect(await limiter.consume("two", { rps: 1, burst: 1, window: 1 })).toMatchObject({
        allowed: true,
        tokens: 0,
      });
    });
  });

  describe("invalid defaults", () => {
    const empty = { tokens: null, refreshed: null, rps: null, burst: null, window: null };

    it("should store nothing when the defaults are rejected", async () => {
      await expect(limiter.consume("test", { rps: 5, burst: 0, window: 5 })).rejects.toThrow(
        InvalidConfigurationError
      );
      expect(await limiter.get("test")).toEqual(empty);

      const decision = await limiter.consume("test", { rps: 5, burst: 1, window: 5 });
      expect(decision).toEqual({ allowed: true, tokens: 24, secondsUntilCapacity: 5 });
    });

    it("should reject a non-positive token request", async () => {
      await expect(
        limiter.consume("test", { rps: 5, requestedTokens: -2 })
      ).rejects.toThrow(InvalidConfigurationError);
      await expect(
        limiter.consume("test", { rps: 5, requestedTokens: 0 })
      ).rejects.toThrow(InvalidConfigurationError);
      expect(await limiter.get("test")).toEqual(empty);
    });
  });

  describe("set", () => {
    it("should reject negative values other than rps -1", async () => {
      await limiter.consume("test", { rps: 5 });

      await expect(limiter.set("test", { burst: -1 })).rejects.toThrow(InvalidConfigurationError);
      await expect(limiter.set("test", { rps: -2 })).rejects.toThrow(InvalidConfigurationError);
      await expect(limiter.set("test", { rps: -1 })).resolves.toBeUndefined();
      expect((await limiter.get("test")).rps).toBe(-1);
    });

    it("should require missing fields to exist already", async () => {
      await expect(limiter.set("missing", { rps: 5 })).rejects.toThrow(ThrottleNotFoundError);
      await expect(limiter.set("missing", { rps: 5, burst: 1, window: 5 })).resolves.toBeUndefined();
    });

    it("should set the knobs ttl when given one", async () => {
      await limiter.set("test", { rps: 5, burst: 1, window: 5 }, 30);

      expect(store.ttl("throttle:test:knobs")).toBe(30);
    });
  });

  it("should delete the bucket and the knobs", async () => {
    await limiter.consume("test", { rps: 5 });
    await limiter.delete("test");

    expect(await limiter.get("test")).toEqual({
      tokens: null,
      refreshed: null,
      rps: null,
      burst: null,
      window: null,
    });
  });

  it("should reset only the knobs", async () => {
    await limiter.consume("test", { rps: 5, burst: 2, window: 6 });
    await limiter.reset("test");

    expect(await limiter.get("test")).toMatchObject({ tokens: 59, rps: null });
  });

  describe("wait", () => {
    it("should sleep out a denial and retry", async () => {
      const policy = { rps: 1, burst: 1, window: 2 };
      await limiter.consume("test", policy);
      await limiter.consume("test", policy);

      const sleeps: number[] = [];
      const decision = await limiter.wait("test", policy, {
        sleep: async (seconds) => {
          sleeps.push(seconds);
          clock.advance(Math.ceil(seconds));
        },
      });

      expect(sleeps).toEqual([2]);
      expect(decision).toEqual({ allowed: true, tokens: 1, secondsUntilCapacity: 2 });
    });

    it("should give up after maxWaitSeconds", async () => {
      const sleep = jest.fn(async () => undefined);
      const now = jest.fn().mockReturnValueOnce(0).mockReturnValue(1000);

      const decision = await limiter.wait("test", { rps: 0, window: 3 }, {
        maxWaitSeconds: 0,
        sleep,
        now,
      });

      expect(decision).toEqual({ allowed: false, tokens: 0, secondsUntilCapacity: 3 });
      expect(sleep).not.toHaveBeenCalled();
    });
  });
});

describe("LocalFallbackLimiter", () => {
  it("should throttle within the process", async () => {
    const limiter = new LocalFallbackLimiter(new FrozenClock(1000, 0));
    const policy = { rps: 1, burst: 1, window: 2 };

    expect((await limiter.consume("api", policy)).allowed).toBe(true);
    expect((await limiter.consume("api", policy)).allowed).toBe(true);
    expect((await limiter.consume("api", policy)).allowed).toBe(false);
  });
});
