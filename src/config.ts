import path from "path";
import { ConfigError } from "./errors";
import { BackoffPolicy } from "./utils/retry";

export interface AppConfig {
  databasePath: string;
  port: number;
  lookup: {
    dporBaseUrl: string;
    timeoutMs: number;
    minIntervalMs: number;
  };
  retry: BackoffPolicy;
  matching: {
    nameThreshold: number;
  };
}

type Env = Record<string, string | undefined>;

function env(source: Env, key: string, fallback: string): string {
  const val = source[key];
  return val === undefined || val === "" ? fallback : val;
}

function envNum(source: Env, key: string, fallback: number): number {
  const val = source[key];
  if (val === undefined || val === "") return fallback;
  const parsed = Number(val);
  if (!Number.isFinite(parsed) || parsed < 0) {
    throw new ConfigError(`${key} must be a non-negative number, got "${val}"`);
  }
  return parsed;
}

function envInt(source: Env, key: string, fallback: number): number {
  const parsed = envNum(source, key, fallback);
  if (!Number.isInteger(parsed)) {
    throw new ConfigError(`${key} must be a whole number, got "${source[key]}"`);
  }
  return parsed;
}

export function loadConfig(source: Env = process.env): AppConfig {
  const nameThreshold = envNum(source, "NAME_MATCH_THRESHOLD", 0.75);
  if (nameThreshold > 1) {
    throw new ConfigError(`NAME_MATCH_THRESHOLD must be between 0 and 1, got ${nameThreshold}`);
  }

  return {
    databasePath: env(
      source,
      "DB_PATH",
      path.join(process.cwd(), "data/db/verification.db")
    ),
    port: envInt(source, "PORT", 8080),
    lookup: {
      dporBaseUrl: env(source, "DPOR_BASE_URL", "https://dporweb.dpor.virginia.gov/LicenseLookup"),
      timeoutMs: envNum(source, "LOOKUP_TIMEOUT_MS", 15000),
      minIntervalMs: envNum(source, "LOOKUP_MIN_INTERVAL_MS", 1200)
    },
    retry: {
      maxAttempts: envInt(source, "RETRY_MAX_ATTEMPTS", 3),
      baseDelayMs: envNum(source, "RETRY_BASE_DELAY_MS", 2000),
      factor: 2,
      maxDelayMs: envNum(source, "RETRY_MAX_DELAY_MS", 30000)
    },
    matching: {
      nameThreshold
    }
  };
}
