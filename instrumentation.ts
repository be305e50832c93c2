/**
 * Next.js Instrumentation -- runs once when the server starts.
 *
 * Validates the warehouse configuration before the first request: without
 * DATABRICKS_WAREHOUSE_ID there is nothing to query, so `register` throws
 * and the server does not start.
 *
 * Also registers a SIGTERM handler so Databricks Apps can stop the process
 * within its 15-second timeout.
 */

export async function register() {
  if (process.env.NEXT_RUNTIME !== "nodejs") return;

  const { assertStartupConfig, ConfigurationError } = await import("@/lib/dbx/config");
  const { logger } = await import("@/lib/logger");
  const log = logger.child("startup");

  try {
    const config = assertStartupConfig();
    log.info("Configuration validated", {
      host: config.host,
      cacheTtlMs: config.cacheTtlMs,
    });
  } catch (error) {
    if (error instanceof ConfigurationError) {
      log.error("Refusing to start", {
        error: error.message,
        missing: error.missing,
      });
    }
    throw error;
  }

  process.on("SIGTERM", () => {
    logger.child("shutdown").info("SIGTERM received, exiting.");
    process.exit(0);
  });
}
