import { describe, it, expect } from "vitest";
import {
  assertStartupConfig,
  ConfigurationError,
  loadConfig,
  normaliseHost,
} from "@/lib/dbx/config";

const BASE = {
  DATABRICKS_HOST: "example.cloud.databricks.com",
  DATABRICKS_WAREHOUSE_ID: "wh-123",
};

describe("normaliseHost", () => {
  it("adds the scheme and strips trailing slashes", () => {
    expect(normaliseHost("example.cloud.databricks.com//")).toBe(
      "https://example.cloud.databricks.com"
    );
    expect(normaliseHost("http://localhost:8080/")).toBe("http://localhost:8080");
  });
});

describe("loadConfig", () => {
  it("reads host, warehouse and the default freshness window", () => {
    expect(loadConfig(BASE)).toEqual({
      ok: true,
      config: {
        host: "https://example.cloud.databricks.com",
        warehouseId: "wh-123",
        cacheTtlMs: 60_000,
      },
    });
  });

  it("reads the freshness window in seconds", () => {
    const result = loadConfig({ ...BASE, METADATA_CACHE_TTL_SECONDS: "120" });
    expect(result.ok && result.config.cacheTtlMs).toBe(120_000);
  });

  it("names the missing warehouse id", () => {
    const result = loadConfig({ DATABRICKS_HOST: BASE.DATABRICKS_HOST });
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(ConfigurationError);
      expect(result.error.missing).toEqual(["DATABRICKS_WAREHOUSE_ID"]);
      expect(result.error.message).toMatch(/^DATABRICKS_WAREHOUSE_ID is not set\. /);
    }
  });

  it("treats empty and blank values as unset", () => {
    const result = loadConfig({ DATABRICKS_HOST: "  ", DATABRICKS_WAREHOUSE_ID: "" });
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.missing).toEqual(["DATABRICKS_HOST", "DATABRICKS_WAREHOUSE_ID"]);
    }
  });

  it("rejects a negative freshness window", () => {
    const result = loadConfig({ ...BASE, METADATA_CACHE_TTL_SECONDS: "-5" });
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.missing).toEqual([]);
      expect(result.error.message).toContain(
        "METADATA_CACHE_TTL_SECONDS cannot be negative"
      );
    }
  });
});

describe("assertStartupConfig", () => {
  it("throws when the warehouse is not configured", () => {
    expect(() => assertStartupConfig({})).toThrow(ConfigurationError);
  });

  it("returns the configuration when complete", () => {
    expect(assertStartupConfig(BASE).warehouseId).toBe("wh-123");
  });
});
