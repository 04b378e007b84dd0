/**
 * @mirrorline/node — Configuration.
 *
 * Loads and validates configuration from environment variables using Zod.
 */

import { z } from "zod";

// =============================================================================
// Schema
// =============================================================================

const BaseConfigSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  HOST: z.string().default("0.0.0.0"),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),

  // Replica
  PARTITION_KEY: z.string().min(1).default("0"),
  DATA_DIR: z.string().min(1).default("./data"),
  MALFORMED_EVENT_POLICY: z.enum(["fail", "skip"]).default("fail"),
  OPERATION_TIMEOUT_MS: z.coerce.number().int().min(1).default(10_000),
  LIVE_POLL_INTERVAL_MS: z.coerce.number().int().min(1).default(250),

  // Reconnect backoff
  RECONNECT_BASE_DELAY_MS: z.coerce.number().int().min(0).default(250),
  RECONNECT_MAX_DELAY_MS: z.coerce.number().int().min(0).default(30_000),
  RECONNECT_JITTER_MS: z.coerce.number().int().min(0).default(250),

  // Snapshots
  SNAPSHOT_INTERVAL_SECONDS: z.coerce.number().int().min(0).default(60),
  SNAPSHOT_EVENT_THRESHOLD: z.coerce.number().int().min(0).default(1000),
  SNAPSHOT_KEEP: z.coerce.number().int().min(1).optional(),
});

export const ConfigSchema = BaseConfigSchema.superRefine((config, ctx) => {
  if (config.SNAPSHOT_INTERVAL_SECONDS === 0 && config.SNAPSHOT_EVENT_THRESHOLD === 0) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ["SNAPSHOT_INTERVAL_SECONDS"],
      message: "SNAPSHOT_INTERVAL_SECONDS and SNAPSHOT_EVENT_THRESHOLD cannot both be 0",
    });
  }
  if (config.RECONNECT_MAX_DELAY_MS < config.RECONNECT_BASE_DELAY_MS) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ["RECONNECT_MAX_DELAY_MS"],
      message: "RECONNECT_MAX_DELAY_MS must be at least RECONNECT_BASE_DELAY_MS",
    });
  }
});

export type AppConfig = z.infer<typeof ConfigSchema>;

// =============================================================================
// Loader
// =============================================================================

/**
 * Load and validate configuration from process.env.
 *
 * @throws {z.ZodError} if env vars are invalid
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): AppConfig {
  return ConfigSchema.parse(env);
}
