import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { register } from "@/instrumentation";
import { ConfigurationError } from "@/lib/dbx/config";

beforeEach(() => {
  vi.stubEnv("NEXT_RUNTIME", "nodejs");
  vi.stubEnv("DATABRICKS_HOST", "example.cloud.databricks.com");
  vi.stubEnv("DATABRICKS_WAREHOUSE_ID", "wh-123");
  vi.spyOn(console, "log").mockImplementation(() => {});
  vi.spyOn(console, "error").mockImplementation(() => {});
});

afterEach(() => {
  vi.unstubAllEnvs();
  vi.restoreAllMocks();
});

describe("register", () => {
  it("refuses to start without a warehouse id", async () => {
    vi.stubEnv("DATABRICKS_WAREHOUSE_ID", "");
    const on = vi.spyOn(process, "on").mockImplementation(() => process);

    await expect(register()).rejects.toBeInstanceOf(ConfigurationError);
    expect(String(vi.mocked(console.error).mock.calls[0][0])).toContain(
      '[startup] Refusing to start {"error":"DATABRICKS_WAREHOUSE_ID is not set.'
    );
    expect(on).not.toHaveBeenCalled();
  });

  it("installs the SIGTERM handler once configuration is valid", async () => {
    const on = vi.spyOn(process, "on").mockImplementation(() => process);

    await expect(register()).resolves.toBeUndefined();
    expect(on).toHaveBeenCalledWith("SIGTERM", expect.any(Function));
  });

  it("skips validation outside the Node.js runtime", async () => {
    vi.stubEnv("NEXT_RUNTIME", "edge");
    vi.stubEnv("DATABRICKS_WAREHOUSE_ID", "");

    await expect(register()).resolves.toBeUndefined();
  });
});
