/**
 * Map thrown errors to JSON API responses.
 *
 * Route handlers never recover from a warehouse error; they log it and
 * hand the caller `{ error, errorCode }` with a matching status.
 */

import { NextResponse } from "next/server";
import { logger } from "@/lib/logger";
import { ConfigurationError } from "@/lib/dbx/config";
import { WarehouseAuthError, WarehouseError } from "@/lib/dbx/errors";
import { IdentifierValidationError } from "@/lib/validation";

const apiLog = logger.child("api");

export type ApiErrorCode =
  | "INVALID_REQUEST"
  | "CONFIGURATION_ERROR"
  | "AUTH_FAILED"
  | "QUERY_FAILED"
  | "WAREHOUSE_UNAVAILABLE";

export interface ApiErrorBody {
  error: string;
  errorCode: ApiErrorCode;
}

export function classifyError(error: unknown): { status: number; body: ApiErrorBody } {
  if (error instanceof IdentifierValidationError) {
    return { status: 400, body: { error: error.message, errorCode: "INVALID_REQUEST" } };
  }
  if (error instanceof ConfigurationError) {
    return { status: 500, body: { error: error.message, errorCode: "CONFIGURATION_ERROR" } };
  }
  if (error instanceof WarehouseAuthError) {
    const status = error.status === 403 ? 403 : 401;
    return { status, body: { error: error.message, errorCode: error.code } };
  }
  if (error instanceof WarehouseError) {
    return { status: 502, body: { error: error.message, errorCode: error.code } };
  }
  return {
    status: 502,
    body: {
      error: error instanceof Error ? error.message : "Failed to fetch metadata",
      errorCode: "WAREHOUSE_UNAVAILABLE",
    },
  };
}

export function metadataErrorResponse(
  error: unknown,
  context: Record<string, unknown>
): NextResponse<ApiErrorBody> {
  const { status, body } = classifyError(error);
  const log = status < 500 ? apiLog.warn : apiLog.error;
  log("Failed to fetch metadata", {
    ...context,
    error: body.error,
    errorCode: body.errorCode,
    status,
  });
  return NextResponse.json(body, { status });
}
