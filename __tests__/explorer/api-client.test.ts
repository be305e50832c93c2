import { describe, it, expect, vi } from "vitest";
import {
  fetchMetadata,
  metadataUrl,
  MetadataRequestError,
} from "@/lib/explorer/api-client";

function respondWith(body: string, status = 200) {
  return vi.fn(
    async (_input: string | URL | Request, _init?: RequestInit) =>
      new Response(body, { status, headers: { "Content-Type": "application/json" } })
  );
}

describe("metadataUrl", () => {
  it("builds the catalogs URL", () => {
    expect(metadataUrl({ resource: "catalogs" })).toBe("/api/metadata?type=catalogs");
  });

  it("carries the scope of a tables request", () => {
    expect(metadataUrl({ resource: "tables", catalog: "main", schema: "sales" })).toBe(
      "/api/metadata?type=tables&catalog=main&schema=sales"
    );
  });

  it("carries the limit of a preview request", () => {
    expect(
      metadataUrl({ resource: "preview", catalog: "c", schema: "s", table: "t", limit: 25 })
    ).toBe("/api/metadata?type=preview&catalog=c&schema=s&table=t&limit=25");
  });
});

describe("fetchMetadata", () => {
  it("returns the parsed payload", async () => {
    const fetchImpl = respondWith(
      JSON.stringify({
        schemas: [{ catalog: "main", databaseName: "sales" }],
        _meta: { latencyMs: 12 },
      })
    );

    const payload = await fetchMetadata({ resource: "schemas", catalog: "main" }, fetchImpl);

    expect(fetchImpl).toHaveBeenCalledWith("/api/metadata?type=schemas&catalog=main");
    expect(payload).toEqual({
      resource: "schemas",
      data: [{ catalog: "main", databaseName: "sales" }],
    });
  });

  it("surfaces the server's error and code", async () => {
    const fetchImpl = respondWith(
      JSON.stringify({ error: "Warehouse is stopped", errorCode: "WAREHOUSE_UNAVAILABLE" }),
      502
    );

    const error = await fetchMetadata({ resource: "catalogs" }, fetchImpl).catch(
      (e: unknown) => e
    );

    expect(error).toBeInstanceOf(MetadataRequestError);
    expect(error).toHaveProperty("message", "Warehouse is stopped");
    expect(error).toHaveProperty("status", 502);
    expect(error).toHaveProperty("errorCode", "WAREHOUSE_UNAVAILABLE");
  });

  it("falls back to the status when the error body is not JSON", async () => {
    const fetchImpl = respondWith("upstream timed out", 504);

    const error = await fetchMetadata({ resource: "catalogs" }, fetchImpl).catch(
      (e: unknown) => e
    );

    expect(error).toHaveProperty("message", "Request failed (504)");
    expect(error).toHaveProperty("errorCode", null);
  });

  it("rejects a body of the wrong shape", async () => {
    const fetchImpl = respondWith(JSON.stringify({ schemas: "nope" }));

    await expect(
      fetchMetadata({ resource: "schemas", catalog: "main" }, fetchImpl)
    ).rejects.toThrow("Unexpected response shape for schemas");
  });
});
