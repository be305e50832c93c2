/**
 * Fetch wrapper with AbortController-based timeout.
 *
 * Prevents indefinite hangs when Databricks APIs are unresponsive, and turns
 * transport failures into WarehouseConnectionError so callers only ever see
 * the warehouse error taxonomy.
 */

import { WarehouseConnectionError } from "./errors";

export class FetchTimeoutError extends WarehouseConnectionError {
  constructor(url: string, timeoutMs: number) {
    super(`Request to ${new URL(url).pathname} timed out after ${timeoutMs}ms`);
    this.name = "FetchTimeoutError";
  }
}

/**
 * Fetch with an automatic timeout. If the request doesn't complete within
 * `timeoutMs`, the request is aborted and a FetchTimeoutError is thrown.
 * Any other network failure becomes a WarehouseConnectionError.
 */
export async function fetchWithTimeout(
  url: string,
  init: RequestInit,
  timeoutMs: number
): Promise<Response> {
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), timeoutMs);

  try {
    return await fetch(url, {
      ...init,
      signal: controller.signal,
    });
  } catch (error) {
    if (error instanceof DOMException && error.name === "AbortError") {
      throw new FetchTimeoutError(url, timeoutMs);
    }
    const reason = error instanceof Error ? error.message : String(error);
    throw new WarehouseConnectionError(
      `Request to ${new URL(url).pathname} failed: ${reason}`
    );
  } finally {
    clearTimeout(timer);
  }
}

// Default timeouts by operation type
export const TIMEOUTS = {
  /** OAuth token exchange */
  AUTH: 15_000,
  /** SQL statement submission (must exceed server-side wait_timeout of 50s) */
  SQL_SUBMIT: 60_000,
  /** SQL statement polling */
  SQL_POLL: 15_000,
  /** SQL chunk fetching */
  SQL_CHUNK: 30_000,
  /** Statement cancellation */
  SQL_CANCEL: 10_000,
} as const;
