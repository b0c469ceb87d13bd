/**
 * Configuration Management
 *
 * Resolves connection settings for the CLI. Flags win over environment
 * variables, which win over defaults.
 */

import { z } from "zod";

import { ConfigError } from "../lib/errors.js";
import { LOG_LEVEL_NAMES } from "../lib/logger.js";
import { ok, err } from "../lib/result.js";
import { IdentifierSchema } from "../migration/plan.schema.js";

import type { Result } from "../lib/result.js";

export const DEFAULT_CONNECT_TIMEOUT_MS = 10_000;

/**
 * Settings schema
 */
const SettingsSchema = z.object({
  databaseUrl: z
    .string({ required_error: "No database URL: pass --database-url or set REAPPLY_DATABASE_URL" })
    .regex(/^postgres(ql)?:\/\//, "Database URL must start with postgres:// or postgresql://"),
  /** Overrides the plan's schema when set */
  schema: IdentifierSchema.optional(),
  logLevel: z.enum(LOG_LEVEL_NAMES).default("info"),
  connectTimeoutMs: z.coerce.number().int().positive().default(DEFAULT_CONNECT_TIMEOUT_MS),
});

export type Settings = z.infer<typeof SettingsSchema>;

/**
 * Values taken from command-line flags
 */
export interface SettingsFlags {
  databaseUrl?: string;
  schema?: string;
  logLevel?: string;
}

type Environment = Record<string, string | undefined>;

function firstNonEmpty(...values: (string | undefined)[]): string | undefined {
  return values.find((value) => value !== undefined && value.trim().length > 0)?.trim();
}

/**
 * Resolve settings from flags and environment
 */
export function resolveSettings(
  flags: SettingsFlags = {},
  env: Environment = process.env
): Result<Settings, ConfigError> {
  const raw = {
    databaseUrl: firstNonEmpty(flags.databaseUrl, env["REAPPLY_DATABASE_URL"], env["DATABASE_URL"]),
    schema: firstNonEmpty(flags.schema, env["REAPPLY_SCHEMA"]),
    logLevel: firstNonEmpty(flags.logLevel, env["REAPPLY_LOG_LEVEL"]),
    connectTimeoutMs: firstNonEmpty(env["REAPPLY_CONNECT_TIMEOUT_MS"]),
  };

  const result = SettingsSchema.safeParse(raw);
  if (!result.success) {
    const first = result.error.errors[0];
    return err(
      new ConfigError(first ? `${first.path.join(".")}: ${first.message}` : "Invalid configuration", {
        errors: result.error.errors.map((issue) => ({
          path: issue.path.join("."),
          message: issue.message,
        })),
      })
    );
  }
  return ok(result.data);
}

/**
 * Mask the password in a connection string for display
 */
export function maskDatabaseUrl(url: string): string {
  return url.replace(/^(postgres(?:ql)?:\/\/[^:/@]+:)[^@]*@/, "$1****@");
}
