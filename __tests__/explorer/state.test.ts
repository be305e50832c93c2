import { describe, it, expect } from "vitest";
import {
  explorerPhase,
  explorerReducer,
  initialExplorerState,
  requiredFetches,
  scopeKey,
  type ExplorerEvent,
  type ExplorerState,
  type LoadedPayload,
} from "@/lib/explorer/state";

function apply(state: ExplorerState, ...events: ExplorerEvent[]): ExplorerState {
  return events.reduce(explorerReducer, state);
}

const CATALOGS_KEY = scopeKey({ resource: "catalogs" });
const schemasKey = (catalog: string) => scopeKey({ resource: "schemas", catalog });

const catalogsLoaded = apply(
  initialExplorerState,
  { type: "loadStarted", resource: "catalogs", key: CATALOGS_KEY },
  {
    type: "loadSucceeded",
    key: CATALOGS_KEY,
    payload: { resource: "catalogs", data: [{ catalog: "A" }, { catalog: "B" }] },
  }
);

const tableSelected = apply(
  catalogsLoaded,
  { type: "catalogSelected", catalog: "A" },
  { type: "schemaSelected", schema: "S" },
  { type: "tableSelected", table: "T" }
);

describe("scopeKey", () => {
  it("includes every scope component", () => {
    expect(
      scopeKey({ resource: "preview", catalog: "c", schema: "s", table: "t", limit: 10 })
    ).toBe('["preview","c","s","t",10]');
    expect(scopeKey({ resource: "tables", catalog: "c", schema: "s" })).toBe(
      '["tables","c","s"]'
    );
  });
});

describe("explorerPhase", () => {
  it("follows the selection depth", () => {
    expect(explorerPhase(initialExplorerState)).toBe("no-catalog");
    expect(explorerPhase(apply(catalogsLoaded, { type: "catalogSelected", catalog: "A" }))).toBe(
      "catalog-selected"
    );
    expect(explorerPhase(tableSelected)).toBe("table-selected");
  });
});

describe("requiredFetches", () => {
  it("asks only for catalogs at start", () => {
    expect(requiredFetches(initialExplorerState)).toEqual([{ resource: "catalogs" }]);
  });

  it("asks for nothing while a load is in flight", () => {
    const loading = apply(initialExplorerState, {
      type: "loadStarted",
      resource: "catalogs",
      key: CATALOGS_KEY,
    });
    expect(loading.catalogs).toEqual({ status: "loading", key: CATALOGS_KEY });
    expect(requiredFetches(loading)).toEqual([]);
  });

  it("asks for schemas once a catalog is chosen", () => {
    const state = apply(catalogsLoaded, { type: "catalogSelected", catalog: "A" });
    expect(requiredFetches(state)).toEqual([{ resource: "schemas", catalog: "A" }]);
  });

  it("asks for the lists and the preview of a full selection", () => {
    expect(requiredFetches(tableSelected)).toEqual([
      { resource: "schemas", catalog: "A" },
      { resource: "tables", catalog: "A", schema: "S" },
      { resource: "preview", catalog: "A", schema: "S", table: "T", limit: 10 },
    ]);
  });
});

describe("explorerReducer selections", () => {
  it("resets everything below a changed catalog", () => {
    const state = apply(tableSelected, { type: "catalogSelected", catalog: "B" });
    expect(state.catalog).toBe("B");
    expect(state.schema).toBeNull();
    expect(state.table).toBeNull();
    expect(state.schemas).toEqual({ status: "idle" });
    expect(state.preview).toEqual({ status: "idle" });
    expect(state.catalogs.status).toBe("ready");
  });

  it("treats re-selecting the same catalog as a no-op", () => {
    expect(explorerReducer(tableSelected, { type: "catalogSelected", catalog: "A" })).toBe(
      tableSelected
    );
  });

  it("ignores a schema selection without a catalog", () => {
    expect(
      explorerReducer(initialExplorerState, { type: "schemaSelected", schema: "S" })
    ).toBe(initialExplorerState);
  });

  it("ignores a table selection without a schema", () => {
    const state = apply(catalogsLoaded, { type: "catalogSelected", catalog: "A" });
    expect(explorerReducer(state, { type: "tableSelected", table: "T" })).toBe(state);
  });

  it("reloads only the preview when the limit changes", () => {
    const state = apply(tableSelected, { type: "previewLimitChanged", limit: 50 });
    expect(state.previewLimit).toBe(50);
    expect(state.table).toBe("T");
    expect(requiredFetches(state)).toContainEqual({
      resource: "preview",
      catalog: "A",
      schema: "S",
      table: "T",
      limit: 50,
    });
  });

  it("toggles the metadata panels without touching the selection", () => {
    const state = apply(
      tableSelected,
      { type: "schemaMetadataToggled", show: true },
      { type: "tableMetadataToggled", show: true }
    );
    expect(state.showSchemaMetadata).toBe(true);
    expect(state.showTableMetadata).toBe(true);
    expect(state.table).toBe("T");
  });
});

describe("explorerReducer loads", () => {
  it("drops a late response for a catalog that is no longer selected", () => {
    let state = apply(
      catalogsLoaded,
      { type: "catalogSelected", catalog: "A" },
      { type: "loadStarted", resource: "schemas", key: schemasKey("A") },
      { type: "catalogSelected", catalog: "B" },
      { type: "loadStarted", resource: "schemas", key: schemasKey("B") },
      {
        type: "loadSucceeded",
        key: schemasKey("B"),
        payload: { resource: "schemas", data: [{ catalog: "B", databaseName: "b1" }] },
      }
    );

    state = explorerReducer(state, {
      type: "loadSucceeded",
      key: schemasKey("A"),
      payload: { resource: "schemas", data: [{ catalog: "A", databaseName: "a1" }] },
    });

    expect(state.schemas).toEqual({
      status: "ready",
      key: schemasKey("B"),
      data: [{ catalog: "B", databaseName: "b1" }],
    });
  });

  it("drops a stale failure", () => {
    const state = apply(
      catalogsLoaded,
      { type: "catalogSelected", catalog: "B" },
      { type: "loadStarted", resource: "schemas", key: schemasKey("B") },
      {
        type: "loadFailed",
        resource: "schemas",
        key: schemasKey("A"),
        error: "boom",
        errorCode: "QUERY_FAILED",
      }
    );
    expect(state.schemas).toEqual({ status: "loading", key: schemasKey("B") });
  });

  it("records a failure and clears it on retry", () => {
    const failed = apply(
      catalogsLoaded,
      { type: "catalogSelected", catalog: "A" },
      { type: "loadStarted", resource: "schemas", key: schemasKey("A") },
      {
        type: "loadFailed",
        resource: "schemas",
        key: schemasKey("A"),
        error: "Warehouse is stopped",
        errorCode: "WAREHOUSE_UNAVAILABLE",
      }
    );
    expect(failed.schemas).toEqual({
      status: "error",
      key: schemasKey("A"),
      error: "Warehouse is stopped",
      errorCode: "WAREHOUSE_UNAVAILABLE",
    });
    expect(requiredFetches(failed)).toEqual([]);

    const retried = explorerReducer(failed, { type: "retryRequested", resource: "schemas" });
    expect(retried.schemas).toEqual({ status: "idle" });
    expect(requiredFetches(retried)).toEqual([{ resource: "schemas", catalog: "A" }]);
  });

  it("ignores retry for a resource that has not failed", () => {
    expect(
      explorerReducer(catalogsLoaded, { type: "retryRequested", resource: "catalogs" })
    ).toBe(catalogsLoaded);
  });
});

describe("refreshRequested", () => {
  it("marks every settled resource idle so it is fetched again", () => {
    const state = apply(
      tableSelected,
      { type: "loadStarted", resource: "schemas", key: schemasKey("A") },
      {
        type: "loadSucceeded",
        key: schemasKey("A"),
        payload: { resource: "schemas", data: [{ catalog: "A", databaseName: "S" }] },
      },
      { type: "refreshRequested" }
    );

    expect(state.catalogs).toEqual({ status: "idle" });
    expect(state.schemas).toEqual({ status: "idle" });
    expect(state.table).toBe("T");
    expect(requiredFetches(state)[0]).toEqual({ resource: "catalogs" });
  });

  it("leaves an in-flight load alone", () => {
    const loading = apply(initialExplorerState, {
      type: "loadStarted",
      resource: "catalogs",
      key: CATALOGS_KEY,
    });
    expect(explorerReducer(loading, { type: "refreshRequested" }).catalogs).toEqual({
      status: "loading",
      key: CATALOGS_KEY,
    });
  });
});

describe("default selection", () => {
  const tablesKey = scopeKey({ resource: "tables", catalog: "main", schema: "bronze" });

  function loaded(state: ExplorerState, key: string, payload: LoadedPayload): ExplorerState {
    return explorerReducer(state, { type: "loadSucceeded", key, payload });
  }

  it("selects the first catalog and asks for its schemas", () => {
    const state = loaded(initialExplorerState, CATALOGS_KEY, {
      resource: "catalogs",
      data: [{ catalog: "main" }, { catalog: "samples" }],
    });

    expect(state.catalog).toBe("main");
    expect(requiredFetches(state)).toEqual([{ resource: "schemas", catalog: "main" }]);
  });

  it("cascades down to a preview of the first table", () => {
    let state = loaded(initialExplorerState, CATALOGS_KEY, {
      resource: "catalogs",
      data: [{ catalog: "main" }],
    });
    state = loaded(state, schemasKey("main"), {
      resource: "schemas",
      data: [
        { catalog: "main", databaseName: "bronze" },
        { catalog: "main", databaseName: "silver" },
      ],
    });
    state = loaded(state, tablesKey, {
      resource: "tables",
      data: [
        { catalog: "main", database: "bronze", tableName: "orders", isTemporary: false },
        { catalog: "main", database: "bronze", tableName: "users", isTemporary: false },
      ],
    });

    expect(explorerPhase(state)).toBe("table-selected");
    expect(state.table).toBe("orders");
    expect(requiredFetches(state)).toEqual([
      { resource: "preview", catalog: "main", schema: "bronze", table: "orders", limit: 10 },
    ]);
  });

  it("picks the first schema again after the catalog changes", () => {
    let state = loaded(initialExplorerState, CATALOGS_KEY, {
      resource: "catalogs",
      data: [{ catalog: "main" }, { catalog: "samples" }],
    });
    state = loaded(state, schemasKey("main"), {
      resource: "schemas",
      data: [{ catalog: "main", databaseName: "bronze" }],
    });
    state = explorerReducer(state, { type: "catalogSelected", catalog: "samples" });
    expect(state.schema).toBeNull();

    state = loaded(state, schemasKey("samples"), {
      resource: "schemas",
      data: [{ catalog: "samples", databaseName: "tpch" }],
    });

    expect(state.schema).toBe("tpch");
  });

  it("keeps a user's choice when its list reloads", () => {
    let state = loaded(initialExplorerState, CATALOGS_KEY, {
      resource: "catalogs",
      data: [{ catalog: "main" }, { catalog: "samples" }],
    });
    state = explorerReducer(state, { type: "catalogSelected", catalog: "samples" });
    state = explorerReducer(state, { type: "refreshRequested" });
    state = loaded(state, CATALOGS_KEY, {
      resource: "catalogs",
      data: [{ catalog: "main" }, { catalog: "samples" }],
    });

    expect(state.catalog).toBe("samples");
  });
});

describe("empty lists", () => {
  it("stays in no-catalog when there are no catalogs", () => {
    const state = explorerReducer(initialExplorerState, {
      type: "loadSucceeded",
      key: CATALOGS_KEY,
      payload: { resource: "catalogs", data: [] },
    });

    expect(state.catalogs).toEqual({ status: "ready", key: CATALOGS_KEY, data: [] });
    expect(explorerPhase(state)).toBe("no-catalog");
    expect(requiredFetches(state)).toEqual([]);
  });

  it("stops at catalog-selected for a catalog without schemas", () => {
    const state = apply(
      initialExplorerState,
      { type: "catalogSelected", catalog: "empty" },
      {
        type: "loadSucceeded",
        key: schemasKey("empty"),
        payload: { resource: "schemas", data: [] },
      }
    );

    expect(state.schemas).toEqual({ status: "ready", key: schemasKey("empty"), data: [] });
    expect(explorerPhase(state)).toBe("catalog-selected");
    expect(requiredFetches(state)).toEqual([{ resource: "catalogs" }]);
  });

  it("stops at schema-selected for a schema without tables", () => {
    const key = scopeKey({ resource: "tables", catalog: "main", schema: "empty" });
    const state = apply(
      initialExplorerState,
      { type: "catalogSelected", catalog: "main" },
      { type: "schemaSelected", schema: "empty" },
      { type: "loadSucceeded", key, payload: { resource: "tables", data: [] } }
    );

    expect(explorerPhase(state)).toBe("schema-selected");
    expect(state.table).toBeNull();
    expect(requiredFetches(state).map((r) => r.resource)).toEqual(["catalogs", "schemas"]);
  });
});

describe("refresh with a vanished selection", () => {
  it("drops a catalog that is no longer listed and resets its children", () => {
    let state = apply(
      tableSelected,
      { type: "refreshRequested" },
      {
        type: "loadSucceeded",
        key: CATALOGS_KEY,
        payload: { resource: "catalogs", data: [{ catalog: "B" }] },
      }
    );

    expect(state.catalog).toBe("B");
    expect(state.schema).toBeNull();
    expect(state.table).toBeNull();

    state = explorerReducer(state, {
      type: "loadSucceeded",
      key: CATALOGS_KEY,
      payload: { resource: "catalogs", data: [] },
    });
    expect(state.catalog).toBeNull();
  });

  it("drops a table that is no longer listed", () => {
    const key = scopeKey({ resource: "tables", catalog: "A", schema: "S" });
    const state = explorerReducer(tableSelected, {
      type: "loadSucceeded",
      key,
      payload: {
        resource: "tables",
        data: [{ catalog: "A", database: "S", tableName: "other", isTemporary: false }],
      },
    });

    expect(state.table).toBe("other");
    expect(state.preview).toEqual({ status: "idle" });
  });
});
