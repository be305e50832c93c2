/**
 * Error taxonomy for warehouse calls.
 *
 * Nothing here is retried: every error propagates to the route handler,
 * which maps `code` to an HTTP status.
 */

export type WarehouseErrorCode =
  | "WAREHOUSE_UNAVAILABLE"
  | "AUTH_FAILED"
  | "QUERY_FAILED";

export abstract class WarehouseError extends Error {
  abstract readonly code: WarehouseErrorCode;
}

/** Network failure, client timeout, or a non-auth HTTP error from the API. */
export class WarehouseConnectionError extends WarehouseError {
  readonly code = "WAREHOUSE_UNAVAILABLE";

  constructor(
    message: string,
    public readonly status?: number
  ) {
    super(message);
    this.name = "WarehouseConnectionError";
  }
}

/** Missing credentials, failed token exchange, or 401/403 from the API. */
export class WarehouseAuthError extends WarehouseError {
  readonly code = "AUTH_FAILED";

  constructor(
    message: string,
    public readonly status?: number
  ) {
    super(message);
    this.name = "WarehouseAuthError";
  }
}

/** The statement reached the warehouse and did not succeed. */
export class WarehouseQueryError extends WarehouseError {
  readonly code = "QUERY_FAILED";

  constructor(
    message: string,
    public readonly statementId?: string,
    public readonly sqlState?: string
  ) {
    super(message);
    this.name = "WarehouseQueryError";
  }
}

/**
 * Classify a non-2xx response from a Databricks REST endpoint.
 */
export function errorFromResponse(
  status: number,
  body: string,
  context: string
): WarehouseAuthError | WarehouseConnectionError {
  const message = `${context} (${status}): ${body}`;
  if (status === 401 || status === 403) {
    return new WarehouseAuthError(message, status);
  }
  return new WarehouseConnectionError(message, status);
}
