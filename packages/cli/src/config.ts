/**
 * @settle/cli — Configuration.
 *
 * Loads and validates configuration from environment variables using Zod.
 */

import { z } from "zod";
import { DEFAULT_CHANNEL_CAPACITY } from "@settle/engine";

// =============================================================================
// Schema
// =============================================================================

export const ConfigSchema = z.object({
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("warn"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("production"),

  // Engine
  CHANNEL_CAPACITY: z.coerce.number().int().min(1).default(DEFAULT_CHANNEL_CAPACITY),
});

export type CliConfig = z.infer<typeof ConfigSchema>;

// =============================================================================
// Loader
// =============================================================================

/**
 * Load and validate configuration from process.env.
 *
 * @throws {Error} naming every invalid variable
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): CliConfig {
  const result = ConfigSchema.safeParse(env);
  if (!result.success) {
    const issues = result.error.issues.map(
      (issue) => `${issue.path.join(".")}: ${issue.message}`,
    );
    throw new Error(`Invalid configuration: ${issues.join("; ")}`);
  }
  return result.data;
}
