import { ChainableCommander } from "ioredis";
import { CLOCK_READ, FREEZABLE_CLOCK_READ, RedisStore, ScriptName } from "../redisStore";
import { InvalidConfigurationError, StoreUnavailableError } from "../../errors";
import { EvaluateRequest } from "../../types/policy";
import { setLogLevel } from "../../utils/logger";

function fakeClient() {
  return {
    script: jest.fn<Promise<unknown>, [string, string]>().mockResolvedValue("sha"),
    evalsha: jest.fn<Promise<unknown>, [string, number, ...Array<string | number>]>(),
    mget: jest.fn<Promise<Array<string | null>>, string[]>(),
    hmget: jest.fn<Promise<Array<string | null>>, [string, ...string[]]>(),
    mset: jest.fn<Promise<unknown>, [Record<string, number>]>().mockResolvedValue("OK"),
    zrem: jest.fn<Promise<unknown>, [string, string]>().mockResolvedValue(1),
    del: jest.fn<Promise<unknown>, string[]>().mockResolvedValue(1),
    multi: jest.fn<ChainableCommander, []>(),
  };
}

const request: EvaluateRequest = {
  bucketKey: "throttle:t",
  knobsKey: "throttle:t:knobs",
  defaults: { rps: 5, burst: 2, window: 8 },
  requestedTokens: 1,
  knobsTtl: 0,
};

describe("RedisStore", () => {
  let client: ReturnType<typeof fakeClient>;
  let store: RedisStore;

  beforeAll(() => setLogLevel("silent"));

  beforeEach(() => {
    client = fakeClient();
    store = new RedisStore(client);
  });

  describe("evaluate", () => {
    it("should run the throttle script with keys and knobs", async () => {
      client.evalsha.mockResolvedValue([1, 8, "4.250000"]);

      const decision = await store.evaluate(request);

      expect(decision).toEqual({ allowed: true, tokens: 8, secondsUntilCapacity: 4.25 });
      expect(client.evalsha).toHaveBeenCalledWith(
        "sha", 2, "throttle:t", "throttle:t:knobs", 5, 2, 8, 1, 0
      );
      expect(client.script).toHaveBeenCalledWith("LOAD", store.scriptSource("throttle"));
    });

    it("should load each script once", async () => {
      client.evalsha.mockResolvedValue([0, 0, "1.000000"]);

      await store.evaluate(request);
      await store.evaluate(request);

      expect(client.script).toHaveBeenCalledTimes(1);
      expect(client.evalsha).toHaveBeenCalledTimes(2);
    });

    it("should reload a script flushed from the server", async () => {
      client.script.mockResolvedValueOnce("old-sha").mockResolvedValueOnce("new-sha");
      client.evalsha
        .mockRejectedValueOnce(new Error("NOSCRIPT No matching script. Please use EVAL."))
        .mockResolvedValueOnce([0, 0, "1.000000"]);

      const decision = await store.evaluate(request);

      expect(decision).toEqual({ allowed: false, tokens: 0, secondsUntilCapacity: 1 });
      expect(client.script).toHaveBeenCalledTimes(2);
      expect(client.evalsha.mock.calls[1][0]).toBe("new-sha");
    });

    it("should report rejected knobs as invalid configuration", async () => {
      client.evalsha.mockRejectedValue(
        new Error("INVALID_CONFIGURATION Throttle window must be a number > 0")
      );

      const err = await store.evaluate(request).catch((e: unknown) => e);

      expect(err).toBeInstanceOf(InvalidConfigurationError);
      expect(err).toHaveProperty("message", "Throttle window must be a number > 0");
    });

    it("should report connection failures as a retryable outage", async () => {
      client.evalsha.mockRejectedValue(new Error("Connection is closed."));

      const err = await store.evaluate(request).catch((e: unknown) => e);

      expect(err).toBeInstanceOf(StoreUnavailableError);
      expect(err).toHaveProperty("message", "Redis evaluate failed: Connection is closed.");
      expect(err).toHaveProperty("retryable", true);
    });

    it("should refuse a malformed reply", async () => {
      client.evalsha.mockResolvedValue(["x"]);

      await expect(store.evaluate(request)).rejects.toThrow(
        'Redis evaluate returned an unexpected reply: ["x"]'
      );
    });
  });

  describe("counters", () => {
    it("should list live buckets", async () => {
      client.evalsha.mockResolvedValue([2000, ["1999", "2000"]]);

      const live = await store.liveBuckets("counter:a", 5, 10);

      expect(live).toEqual({ currentBucket: 2000, buckets: ["1999", "2000"] });
      expect(client.evalsha).toHaveBeenCalledWith("sha", 1, "counter:a", 5, 10);
    });

    it("should list live group members", async () => {
      client.evalsha.mockResolvedValue(["a", "b"]);

      expect(await store.liveMembers("counter:group:g", 100)).toEqual(["a", "b"]);
      expect(client.evalsha).toHaveBeenCalledWith("sha", 1, "counter:group:g", 100);
    });

    it("should pass the group index and member", async () => {
      client.evalsha.mockResolvedValue(2000);

      await store.increment({
        key: "counter:group:g:a",
        interval: 5,
        periods: 10,
        amount: 1.5,
        group: { key: "counter:group:g", member: "a" },
      });

      expect(client.evalsha).toHaveBeenCalledWith(
        "sha", 2, "counter:group:g:a", "counter:group:g", 5, 10, 1.5, "a"
      );
    });

    it("should refuse a bad window before calling Redis", async () => {
      await expect(
        store.increment({ key: "counter:a", interval: 5, periods: 0, amount: 1 })
      ).rejects.toThrow(InvalidConfigurationError);
      expect(client.evalsha).not.toHaveBeenCalled();
    });

    it("should read accumulators as numbers", async () => {
      client.mget.mockResolvedValue(["3", null, "2.5"]);

      expect(await store.readCounters(["a:1", "a:2", "a:3"])).toEqual([3, null, 2.5]);
      expect(client.mget).toHaveBeenCalledWith("a:1", "a:2", "a:3");
    });

    it("should skip the round trip for no keys", async () => {
      expect(await store.readCounters([])).toEqual([]);
      expect(client.mget).not.toHaveBeenCalled();
    });
  });

  it("should read a throttle's bucket and knobs", async () => {
    client.hmget.mockResolvedValueOnce(["59", "1000"]).mockResolvedValueOnce(["5", "2", null]);

    const state = await store.readThrottle("throttle:t", "throttle:t:knobs");

    expect(state).toEqual({ tokens: 59, refreshed: 1000, rps: 5, burst: 2, window: null });
    expect(client.hmget).toHaveBeenCalledWith("throttle:t", "tokens", "refreshed");
    expect(client.hmget).toHaveBeenCalledWith("throttle:t:knobs", "rps", "burst", "window");
  });

  it("should read the server clock exactly once per script", () => {
    const names: ScriptName[] = [
      "throttle",
      "runningCounter",
      "runningCounterGet",
      "runningCounterGroup",
    ];

    for (const name of names) {
      expect(store.scriptSource(name).split(CLOCK_READ)).toHaveLength(2);
    }
  });

  describe("freezable time", () => {
    it("should read the frozen clock keys", () => {
      const freezable = new RedisStore(client, { freezableTime: true });
      const source = freezable.scriptSource("throttle");

      expect(source).not.toContain(CLOCK_READ);
      expect(source).toContain(FREEZABLE_CLOCK_READ);
    });

    it("should pin the clock", async () => {
      const freezable = new RedisStore(client, { freezableTime: true });

      await freezable.freezeTime(1000, 250);
      await freezable.unfreezeTime();

      expect(client.mset).toHaveBeenCalledWith({ frozen_second: 1000, frozen_microsecond: 250 });
      expect(client.del).toHaveBeenCalledWith("frozen_second", "frozen_microsecond");
    });

    it("should refuse to freeze a store without the option", async () => {
      await expect(store.freezeTime(1000)).rejects.toThrow(InvalidConfigurationError);
      expect(client.mset).not.toHaveBeenCalled();
    });
  });
});
