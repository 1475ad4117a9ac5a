// shared/config.ts
import { ConfigurationError } from "./errors";

export const DEFAULT_CONNECTION_ENV = "AzureWebJobsStorage";

export type Env = Record<string, string | undefined>;

export interface DetectionConfig {
  endpoint: string;
  timeoutMs: number;
  maxRetries: number;
  backoffMs: number;
}

/** Read per invocation so a missing setting fails the request instead of the host. */
export function loadDetectionConfig(env: Env = process.env): DetectionConfig {
  const endpoint = env["DETECT_ENDPOINT"];
  if (!endpoint) throw new ConfigurationError("DETECT_ENDPOINT is not set");
  return {
    endpoint,
    timeoutMs: intSetting(env, "DETECT_TIMEOUT_MS", 60000),
    maxRetries: Math.max(1, intSetting(env, "DETECT_MAX_RETRIES", 3)),
    backoffMs: intSetting(env, "DETECT_BACKOFF_MS", 500)
  };
}

export function connectionString(envVar: string, env: Env = process.env): string {
  const conn = env[envVar];
  if (!conn) throw new ConfigurationError(`${envVar} is not set`);
  return conn;
}

function intSetting(env: Env, name: string, fallback: number): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === "") return fallback;
  const value = parseInt(raw, 10);
  if (Number.isNaN(value) || value < 0) throw new ConfigurationError(`${name} must be a non-negative integer, got "${raw}"`);
  return value;
}
