import { loadConfig } from "../env";
import { redactUrl } from "../redis";

describe("loadConfig", () => {
  it("should fall back to defaults", () => {
    expect(loadConfig({})).toEqual({
      port: 3000,
      logLevel: "info",
      redis: { url: "redis://localhost:6379", commandTimeoutMs: 1000 },
      throttle: {
        keyPrefix: "throttle",
        knobsTtl: 604800,
        failureStrategy: "fail-open",
        rps: 5,
        burst: 2,
        window: 10,
      },
    });
  });

  it("should coerce overrides", () => {
    const config = loadConfig({
      PORT: "8080",
      REDIS_URL: "redis://cache:6380",
      THROTTLE_RPS: "-1",
      THROTTLE_FAILURE_STRATEGY: "local-fallback",
    });

    expect(config.port).toBe(8080);
    expect(config.redis.url).toBe("redis://cache:6380");
    expect(config.throttle.rps).toBe(-1);
    expect(config.throttle.failureStrategy).toBe("local-fallback");
  });

  it("should name the variable that is invalid", () => {
    expect(() => loadConfig({ THROTTLE_WINDOW: "0" })).toThrow(/THROTTLE_WINDOW/);
    expect(() => loadConfig({ THROTTLE_FAILURE_STRATEGY: "retry" })).toThrow(
      /THROTTLE_FAILURE_STRATEGY/
    );
  });
});

describe("redactUrl", () => {
  it("should hide the password", () => {
    expect(redactUrl("redis://:test-secret@localhost:6379")).toBe("redis://:***@localhost:6379");
  });

  it("should leave urls without a password alone", () => {
    expect(redactUrl("redis://localhost:6379")).toBe("redis://localhost:6379");
  });
});
