/**
 * Process configuration for the warehouse connection.
 *
 * Read once from the environment and validated with zod. The SQL Warehouse
 * ID is mapped from the app's sql-warehouse resource binding via app.yaml;
 * the host is injected by the Databricks Apps platform (or .env.local for
 * local development).
 *
 * `loadConfig` never throws -- it returns a typed result so startup code can
 * decide how to fail. `getConfig` is the accessor used by request code and
 * throws the ConfigurationError when the environment is unusable.
 */

import { z } from "zod/v4";

export interface ExplorerConfig {
  host: string; // always includes https://
  warehouseId: string;
  cacheTtlMs: number;
}

export class ConfigurationError extends Error {
  constructor(
    message: string,
    public readonly missing: string[] = []
  ) {
    super(message);
    this.name = "ConfigurationError";
  }
}

export type ConfigResult =
  | { ok: true; config: ExplorerConfig }
  | { ok: false; error: ConfigurationError };

export const DEFAULT_CACHE_TTL_SECONDS = 60;

const REQUIRED_VARS = ["DATABRICKS_HOST", "DATABRICKS_WAREHOUSE_ID"] as const;

const EnvSchema = z.object({
  DATABRICKS_HOST: z
    .string({ error: "DATABRICKS_HOST is not set" })
    .trim()
    .min(1, "DATABRICKS_HOST is not set"),
  DATABRICKS_WAREHOUSE_ID: z
    .string({ error: "DATABRICKS_WAREHOUSE_ID is not set" })
    .trim()
    .min(1, "DATABRICKS_WAREHOUSE_ID is not set"),
  METADATA_CACHE_TTL_SECONDS: z.coerce
    .number()
    .int("METADATA_CACHE_TTL_SECONDS must be a whole number of seconds")
    .min(0, "METADATA_CACHE_TTL_SECONDS cannot be negative")
    .default(DEFAULT_CACHE_TTL_SECONDS),
});

export function normaliseHost(raw: string): string {
  let h = raw.trim().replace(/\/+$/, "");
  if (!h.startsWith("https://") && !h.startsWith("http://")) {
    h = `https://${h}`;
  }
  return h;
}

/**
 * Validate an environment map. Empty strings count as unset.
 */
export function loadConfig(env: Partial<NodeJS.ProcessEnv> = process.env): ConfigResult {
  const input = {
    DATABRICKS_HOST: env.DATABRICKS_HOST || undefined,
    DATABRICKS_WAREHOUSE_ID: env.DATABRICKS_WAREHOUSE_ID || undefined,
    METADATA_CACHE_TTL_SECONDS: env.METADATA_CACHE_TTL_SECONDS || undefined,
  };

  const parsed = EnvSchema.safeParse(input);
  if (!parsed.success) {
    const missing = REQUIRED_VARS.filter((key) =>
      parsed.error.issues.some((issue) => issue.path[0] === key)
    );
    const messages = parsed.error.issues.map((issue) => issue.message).join("; ");
    return {
      ok: false,
      error: new ConfigurationError(
        `${messages}. Ensure app.yaml maps the sql-warehouse resource, ` +
          "or set the variables in .env.local for local development.",
        missing
      ),
    };
  }

  return {
    ok: true,
    config: {
      host: normaliseHost(parsed.data.DATABRICKS_HOST),
      warehouseId: parsed.data.DATABRICKS_WAREHOUSE_ID,
      cacheTtlMs: parsed.data.METADATA_CACHE_TTL_SECONDS * 1_000,
    },
  };
}

let _config: ExplorerConfig | null = null;

/**
 * Returns the configuration, reading from env vars on first call.
 * Throws ConfigurationError if required variables are missing.
 */
export function getConfig(): ExplorerConfig {
  if (_config) return _config;
  const result = loadConfig();
  if (!result.ok) throw result.error;
  _config = result.config;
  return _config;
}

/**
 * Startup check run once from instrumentation. Throws so the server
 * refuses to start without a warehouse to talk to.
 */
export function assertStartupConfig(env: Partial<NodeJS.ProcessEnv> = process.env): ExplorerConfig {
  const result = loadConfig(env);
  if (!result.ok) throw result.error;
  return result.config;
}
