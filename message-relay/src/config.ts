import path from "path";
import { z } from "zod";
import { ValidationError } from "./errors";

// ---------------------------------------------------------------------------
// RelayConfig — everything the daemon reads from the environment
// ---------------------------------------------------------------------------

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const envSchema = z.object({
  RELAY_PORT: z.coerce.number().int().min(0).max(65535).default(3100),
  RELAY_DATA_DIR: z.string().min(1).default("./data"),
  RELAY_LOG_DIR: z.string().min(1).optional(),
  RELAY_HEARTBEAT_INTERVAL_MS: positiveInt(15_000),
  RELAY_HEARTBEAT_TIMEOUT_MS: positiveInt(45_000),
  RELAY_PUSH_TIMEOUT_MS: positiveInt(5_000),
  RELAY_BACKLOG_LIMIT: positiveInt(500),
  RELAY_BACKLOG_MAX_AGE_MS: positiveInt(7 * 24 * 60 * 60 * 1000),
  RELAY_CACHE_CAPACITY: positiveInt(200),
  RELAY_CACHE_MAX_CONVERSATIONS: positiveInt(1_000),
  RELAY_PAGE_DEFAULT_LIMIT: positiveInt(20),
  RELAY_PAGE_MAX_LIMIT: positiveInt(100),
  RELAY_TYPING_TTL_MS: positiveInt(5_000),
  RELAY_TYPING_REANNOUNCE_MS: positiveInt(3_000),
  RELAY_TYPING_SWEEP_MS: positiveInt(1_000),
});

export interface RelayConfig {
  port: number;
  dataDir: string;
  logDir: string;
  heartbeat: { intervalMs: number; timeoutMs: number };
  delivery: { pushTimeoutMs: number; backlogLimit: number; backlogMaxAgeMs: number };
  cache: { capacity: number; maxConversations: number };
  pagination: { defaultLimit: number; maxLimit: number };
  typing: { ttlMs: number; reannounceMs: number; sweepIntervalMs: number };
}

/**
 * Read the configuration from an environment map. Empty strings count as
 * unset. Throws a ValidationError naming the first offending variable.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): RelayConfig {
  const present = Object.fromEntries(
    Object.entries(env).filter(([key, value]) => key.startsWith("RELAY_") && value !== ""),
  );
  const parsed = envSchema.safeParse(present);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const name = issue ? issue.path.join(".") : "environment";
    throw new ValidationError(`config: ${name} ${issue?.message ?? "is invalid"}`);
  }

  const e = parsed.data;
  if (e.RELAY_HEARTBEAT_TIMEOUT_MS <= e.RELAY_HEARTBEAT_INTERVAL_MS) {
    throw new ValidationError(
      "config: RELAY_HEARTBEAT_TIMEOUT_MS must be greater than RELAY_HEARTBEAT_INTERVAL_MS",
    );
  }
  if (e.RELAY_PAGE_DEFAULT_LIMIT > e.RELAY_PAGE_MAX_LIMIT) {
    throw new ValidationError("config: RELAY_PAGE_DEFAULT_LIMIT must not exceed RELAY_PAGE_MAX_LIMIT");
  }

  return {
    port: e.RELAY_PORT,
    dataDir: e.RELAY_DATA_DIR,
    logDir: e.RELAY_LOG_DIR ?? path.join(process.cwd(), "logs"),
    heartbeat: {
      intervalMs: e.RELAY_HEARTBEAT_INTERVAL_MS,
      timeoutMs: e.RELAY_HEARTBEAT_TIMEOUT_MS,
    },
    delivery: {
      pushTimeoutMs: e.RELAY_PUSH_TIMEOUT_MS,
      backlogLimit: e.RELAY_BACKLOG_LIMIT,
      backlogMaxAgeMs: e.RELAY_BACKLOG_MAX_AGE_MS,
    },
    cache: {
      capacity: e.RELAY_CACHE_CAPACITY,
      maxConversations: e.RELAY_CACHE_MAX_CONVERSATIONS,
    },
    pagination: {
      defaultLimit: e.RELAY_PAGE_DEFAULT_LIMIT,
      maxLimit: e.RELAY_PAGE_MAX_LIMIT,
    },
    typing: {
      ttlMs: e.RELAY_TYPING_TTL_MS,
      reannounceMs: e.RELAY_TYPING_REANNOUNCE_MS,
      sweepIntervalMs: e.RELAY_TYPING_SWEEP_MS,
    },
  };
}
