/**
 * Environment configuration
 *
 * Resolves AppConfig from process.env. The CLI loads .env first via
 * `import "dotenv/config"`; library code never touches dotenv.
 */

import type { AppConfig, ProviderKind } from "@/types";
import {
  DEFAULT_CAPABILITY_TIMEOUT_MS,
  DEFAULT_COMPLETION_MODEL,
  DEFAULT_EMBEDDING_MODEL,
  DEFAULT_LOG_LEVEL,
  DEFAULT_MAX_BULLETS_PER_ROLE,
  DEFAULT_OPENAI_BASE_URL,
} from "@/constants";
import { ConfigError } from "@/errors";
import { isLogLevel } from "@/logger";

const PROVIDER_KINDS: readonly ProviderKind[] = ["mock", "openai"];

/** Largest delay setTimeout accepts; above it the timer fires after ~1ms */
const MAX_TIMER_DELAY_MS = 2_147_483_647;

function readString(env: NodeJS.ProcessEnv, key: string): string | null {
  const value = env[key]?.trim();
  return value ? value : null;
}

function readPositiveInt(
  env: NodeJS.ProcessEnv,
  key: string,
  fallback: number,
): number {
  const raw = readString(env, key);
  if (raw === null) {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new ConfigError(`${key} must be a positive integer, got "${raw}"`);
  }
  if (value > MAX_TIMER_DELAY_MS) {
    throw new ConfigError(`${key} must be at most ${MAX_TIMER_DELAY_MS}, got "${raw}"`);
  }
  return value;
}

function readProvider(env: NodeJS.ProcessEnv): ProviderKind {
  const raw = (readString(env, "PROVIDER") ?? "mock").toLowerCase();
  const kind = PROVIDER_KINDS.find((k) => k === raw);
  if (!kind) {
    throw new ConfigError(
      `PROVIDER must be one of ${PROVIDER_KINDS.join(", ")}, got "${raw}"`,
    );
  }
  return kind;
}

/**
 * Build configuration from environment variables.
 *
 * @throws {ConfigError} On malformed values, or PROVIDER=openai without a key
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const provider = readProvider(env);
  const openaiApiKey = readString(env, "OPENAI_API_KEY");

  if (provider === "openai" && !openaiApiKey) {
    throw new ConfigError("OPENAI_API_KEY is required when PROVIDER=openai");
  }

  const rawLevel = (readString(env, "LOG_LEVEL") ?? DEFAULT_LOG_LEVEL).toLowerCase();

  return {
    provider,
    openaiApiKey,
    openaiBaseUrl: readString(env, "OPENAI_BASE_URL") ?? DEFAULT_OPENAI_BASE_URL,
    embeddingModel: readString(env, "EMBEDDING_MODEL") ?? DEFAULT_EMBEDDING_MODEL,
    completionModel: readString(env, "COMPLETION_MODEL") ?? DEFAULT_COMPLETION_MODEL,
    capabilityTimeoutMs: readPositiveInt(
      env,
      "CAPABILITY_TIMEOUT_MS",
      DEFAULT_CAPABILITY_TIMEOUT_MS,
    ),
    maxBulletsPerRole: readPositiveInt(
      env,
      "MAX_BULLETS_PER_ROLE",
      DEFAULT_MAX_BULLETS_PER_ROLE,
    ),
    dbPath: readString(env, "DB_PATH"),
    logLevel: isLogLevel(rawLevel) ? rawLevel : DEFAULT_LOG_LEVEL,
  };
}
