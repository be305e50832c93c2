/**
 * SQL Statement Execution API helpers.
 *
 * Executes SQL on a Databricks SQL Warehouse via the Statement Execution API.
 * Handles polling for async results and collects every result chunk.
 *
 * Each call owns its statement: if the call fails while the statement is
 * still pending or running on the warehouse, the statement is cancelled
 * before the error is rethrown.
 *
 * Docs: https://docs.databricks.com/api/workspace/statementexecution
 */

import { getConfig } from "./config";
import { getHeaders } from "./client";
import { WarehouseQueryError, errorFromResponse } from "./errors";
import { fetchWithTimeout, TIMEOUTS } from "./fetch-with-timeout";
import { logger } from "@/lib/logger";

const log = logger.child("sql");

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

type StatementState =
  | "PENDING"
  | "RUNNING"
  | "SUCCEEDED"
  | "FAILED"
  | "CANCELED"
  | "CLOSED";

interface StatementResponse {
  statement_id: string;
  status: {
    state: StatementState;
    error?: {
      error_code: string;
      message: string;
    };
    sql_state?: string;
  };
  manifest?: {
    schema: {
      columns?: Array<{
        name: string;
        type_name: string;
        position: number;
      }>;
    };
    total_chunk_count: number;
    total_row_count: number;
  };
  result?: {
    chunk_index: number;
    row_offset: number;
    row_count: number;
    data_array?: (string | null)[][];
    next_chunk_index?: number;
    next_chunk_internal_link?: string;
  };
}

interface ResultChunk {
  data_array?: (string | null)[][];
  next_chunk_internal_link?: string;
}

export interface SqlColumn {
  name: string;
  typeName: string;
  position: number;
}

export interface SqlResult {
  columns: SqlColumn[];
  rows: (string | null)[][];
  totalRowCount: number;
}

/** Signature of the executor, so accessors can take a fake in tests. */
export type SqlExecutor = (sql: string) => Promise<SqlResult>;

// ---------------------------------------------------------------------------
// Execution
// ---------------------------------------------------------------------------

const POLL_INTERVAL_MS = 1_000;
const MAX_POLL_ATTEMPTS = 600; // 10 minutes max

export interface ExecuteSQLOptions {
  /**
   * Server-side wait_timeout for the Statement Execution API. "0s" returns
   * immediately with a statement_id and we poll for results.
   *
   * Default: "50s".
   */
  waitTimeout?: string;
  /**
   * Client-side fetch timeout (ms) for the statement submission. Must be
   * greater than `waitTimeout`.
   *
   * Default: TIMEOUTS.SQL_SUBMIT (60s).
   */
  submitTimeoutMs?: number;
  /** Delay between status polls. Default: 1s. */
  pollIntervalMs?: number;
}

function isActive(state: StatementState): boolean {
  return state === "PENDING" || state === "RUNNING";
}

/**
 * Execute a SQL statement and return all result rows.
 */
export async function executeSQL(
  sql: string,
  options?: ExecuteSQLOptions
): Promise<SqlResult> {
  if (!sql.trim()) {
    throw new WarehouseQueryError("SQL statement is empty");
  }

  const config = getConfig();
  const url = `${config.host}/api/2.0/sql/statements/`;

  const waitTimeout = options?.waitTimeout ?? "50s";
  const submitTimeoutMs = options?.submitTimeoutMs ?? TIMEOUTS.SQL_SUBMIT;
  const pollIntervalMs = options?.pollIntervalMs ?? POLL_INTERVAL_MS;

  const body = {
    warehouse_id: config.warehouseId,
    statement: sql,
    wait_timeout: waitTimeout,
    on_wait_timeout: "CONTINUE",
    disposition: "INLINE",
    format: "JSON_ARRAY",
  };

  const headers = await getHeaders();
  const response = await fetchWithTimeout(
    url,
    { method: "POST", headers, body: JSON.stringify(body) },
    submitTimeoutMs
  );

  if (!response.ok) {
    const text = await response.text();
    throw errorFromResponse(
      response.status,
      text,
      "SQL Statement Execution API error"
    );
  }

  let result: StatementResponse = await response.json();
  const statementId = result.statement_id;

  try {
    let attempts = 0;
    while (isActive(result.status.state) && attempts < MAX_POLL_ATTEMPTS) {
      await sleep(pollIntervalMs);
      result = await pollStatement(statementId);
      attempts++;
    }
  } catch (error) {
    await cancelStatement(statementId);
    throw error;
  }

  if (isActive(result.status.state)) {
    await cancelStatement(statementId);
    throw new WarehouseQueryError(
      `SQL execution did not finish after ${MAX_POLL_ATTEMPTS} polls`,
      statementId
    );
  }

  if (result.status.state === "FAILED") {
    throw new WarehouseQueryError(
      `SQL execution failed: ${result.status.error?.message ?? "Unknown error"}`,
      statementId,
      result.status.sql_state
    );
  }

  if (result.status.state === "CANCELED") {
    throw new WarehouseQueryError("SQL execution was canceled", statementId);
  }

  if (result.status.state !== "SUCCEEDED") {
    throw new WarehouseQueryError(
      `Unexpected statement state: ${result.status.state}`,
      statementId
    );
  }

  const columns: SqlColumn[] =
    result.manifest?.schema?.columns?.map((c) => ({
      name: c.name,
      typeName: c.type_name,
      position: c.position,
    })) ?? [];

  let allRows: (string | null)[][] = result.result?.data_array ?? [];

  let nextLink = result.result?.next_chunk_internal_link;
  while (nextLink) {
    const chunk = await fetchChunk(`${config.host}${nextLink}`);
    if (chunk.data_array) {
      allRows = allRows.concat(chunk.data_array);
    }
    nextLink = chunk.next_chunk_internal_link;
  }

  return {
    columns,
    rows: allRows,
    totalRowCount: result.manifest?.total_row_count ?? allRows.length,
  };
}

// ---------------------------------------------------------------------------
// Internal helpers
// ---------------------------------------------------------------------------

async function pollStatement(statementId: string): Promise<StatementResponse> {
  const config = getConfig();
  const url = `${config.host}/api/2.0/sql/statements/${statementId}`;
  const headers = await getHeaders();
  const response = await fetchWithTimeout(
    url,
    { method: "GET", headers },
    TIMEOUTS.SQL_POLL
  );
  if (!response.ok) {
    const text = await response.text();
    throw errorFromResponse(response.status, text, "Poll error");
  }
  return response.json();
}

async function fetchChunk(url: string): Promise<ResultChunk> {
  const headers = await getHeaders();
  const response = await fetchWithTimeout(
    url,
    { method: "GET", headers },
    TIMEOUTS.SQL_CHUNK
  );
  if (!response.ok) {
    const text = await response.text();
    throw errorFromResponse(response.status, text, "Result chunk error");
  }
  return response.json();
}

/**
 * Best-effort cancel of a statement we are abandoning. A failure here is
 * logged and never replaces the error that caused the cancel.
 */
async function cancelStatement(statementId: string): Promise<void> {
  try {
    const config = getConfig();
    const headers = await getHeaders();
    const response = await fetchWithTimeout(
      `${config.host}/api/2.0/sql/statements/${statementId}/cancel`,
      { method: "POST", headers },
      TIMEOUTS.SQL_CANCEL
    );
    if (!response.ok) {
      log.warn("Statement cancel rejected", {
        statementId,
        status: response.status,
      });
    }
  } catch (error) {
    log.warn("Statement cancel failed", {
      statementId,
      error: error instanceof Error ? error.message : String(error),
    });
  }
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
