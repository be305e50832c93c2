import { describe, it, expect } from "vitest";
import { classifyError, metadataErrorResponse } from "@/lib/api-errors";
import { ConfigurationError } from "@/lib/dbx/config";
import {
  WarehouseAuthError,
  WarehouseConnectionError,
  WarehouseQueryError,
} from "@/lib/dbx/errors";
import { FetchTimeoutError } from "@/lib/dbx/fetch-with-timeout";
import { IdentifierValidationError } from "@/lib/validation";

describe("classifyError", () => {
  it("maps identifier errors to 400", () => {
    expect(classifyError(new IdentifierValidationError("catalog cannot be empty"))).toEqual({
      status: 400,
      body: { error: "catalog cannot be empty", errorCode: "INVALID_REQUEST" },
    });
  });

  it("maps configuration errors to 500", () => {
    const { status, body } = classifyError(
      new ConfigurationError("DATABRICKS_WAREHOUSE_ID is not set", ["DATABRICKS_WAREHOUSE_ID"])
    );
    expect(status).toBe(500);
    expect(body.errorCode).toBe("CONFIGURATION_ERROR");
  });

  it("keeps 403 for forbidden and uses 401 otherwise", () => {
    expect(classifyError(new WarehouseAuthError("denied", 403)).status).toBe(403);
    expect(classifyError(new WarehouseAuthError("no token")).status).toBe(401);
    expect(classifyError(new WarehouseAuthError("no token")).body.errorCode).toBe(
      "AUTH_FAILED"
    );
  });

  it("maps warehouse failures to 502 with their code", () => {
    expect(classifyError(new WarehouseQueryError("SQL execution failed: boom"))).toEqual({
      status: 502,
      body: { error: "SQL execution failed: boom", errorCode: "QUERY_FAILED" },
    });
    expect(classifyError(new WarehouseConnectionError("reset", 503)).body.errorCode).toBe(
      "WAREHOUSE_UNAVAILABLE"
    );
  });

  it("treats a client timeout as an unavailable warehouse", () => {
    const error = new FetchTimeoutError(
      "https://example.cloud.databricks.com/api/2.0/sql/statements/",
      100
    );
    expect(classifyError(error)).toEqual({
      status: 502,
      body: {
        error: "Request to /api/2.0/sql/statements/ timed out after 100ms",
        errorCode: "WAREHOUSE_UNAVAILABLE",
      },
    });
  });

  it("has a generic message for non-Error values", () => {
    expect(classifyError("oops").body).toEqual({
      error: "Failed to fetch metadata",
      errorCode: "WAREHOUSE_UNAVAILABLE",
    });
  });
});

describe("metadataErrorResponse", () => {
  it("returns the classified body with its status", async () => {
    const res = metadataErrorResponse(new WarehouseAuthError("denied", 403), {
      type: "catalogs",
    });
    expect(res.status).toBe(403);
    expect(await res.json()).toEqual({ error: "denied", errorCode: "AUTH_FAILED" });
  });
});
