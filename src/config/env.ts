import { z } from "zod";

const envSchema = z.object({
  REDIS_URL: z.string().url().default("redis://localhost:6379"),
  REDIS_COMMAND_TIMEOUT_MS: z.coerce.number().int().positive().default(1000),
  PORT: z.coerce.number().int().min(0).max(65535).default(3000),
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error", "silent"]).default("info"),
  THROTTLE_KEY_PREFIX: z.string().min(1).default("throttle"),
  THROTTLE_KNOBS_TTL: z.coerce.number().int().min(0).default(60 * 60 * 24 * 7),
  THROTTLE_FAILURE_STRATEGY: z
    .enum(["fail-open", "fail-closed", "local-fallback"])
    .default("fail-open"),
  THROTTLE_RPS: z.coerce.number().min(-1).default(5),
  THROTTLE_BURST: z.coerce.number().positive().default(2),
  THROTTLE_WINDOW: z.coerce.number().positive().default(10),
});

export type Env = z.infer<typeof envSchema>;

export interface AppConfig {
  port: number;
  logLevel: Env["LOG_LEVEL"];
  redis: {
    url: string;
    commandTimeoutMs: number;
  };
  throttle: {
    keyPrefix: string;
    knobsTtl: number;
    failureStrategy: Env["THROTTLE_FAILURE_STRATEGY"];
    rps: number;
    burst: number;
    window: number;
  };
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid environment: ${problems}`);
  }

  const e = parsed.data;
  return {
    port: e.PORT,
    logLevel: e.LOG_LEVEL,
    redis: {
      url: e.REDIS_URL,
      commandTimeoutMs: e.REDIS_COMMAND_TIMEOUT_MS,
    },
    throttle: {
      keyPrefix: e.THROTTLE_KEY_PREFIX,
      knobsTtl: e.THROTTLE_KNOBS_TTL,
      failureStrategy: e.THROTTLE_FAILURE_STRATEGY,
      rps: e.THROTTLE_RPS,
      burst: e.THROTTLE_BURST,
      window: e.THROTTLE_WINDOW,
    },
  };
}
