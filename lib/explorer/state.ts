/**
 * Selection cascade for the metadata explorer.
 *
 * The explorer is a small state machine:
 *
 *   no-catalog -> catalog-selected -> schema-selected -> table-selected
 *
 * `explorerReducer` applies user events (selections, toggles) and load
 * events (started / succeeded / failed). Changing a selection resets every
 * selection and list below it. Load events carry the scope key of the
 * request they answer; a result whose key no longer matches the current
 * selection is dropped, so a late response for an old catalog can never
 * overwrite the lists of the new one.
 *
 * When a list arrives, the selection at its level is reconciled with it:
 * an unset or vanished selection moves to the first entry (or to null for
 * an empty list), and that selection cascades like a user pick.
 *
 * `requiredFetches` derives which loads the current state still needs.
 * The UI issues exactly those and nothing else.
 */

import { DEFAULT_PREVIEW_LIMIT } from "@/lib/validation";
import type {
  CatalogRow,
  SchemaRow,
  TablePreview,
  TableRow,
} from "@/lib/domain/types";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type Loadable<T> =
  | { status: "idle" }
  | { status: "loading"; key: string }
  | { status: "ready"; key: string; data: T }
  | { status: "error"; key: string; error: string; errorCode: string | null };

export type ExplorerResource = "catalogs" | "schemas" | "tables" | "preview";

export interface ExplorerState {
  catalogs: Loadable<CatalogRow[]>;
  catalog: string | null;
  schemas: Loadable<SchemaRow[]>;
  schema: string | null;
  tables: Loadable<TableRow[]>;
  table: string | null;
  preview: Loadable<TablePreview>;
  previewLimit: number;
  showSchemaMetadata: boolean;
  showTableMetadata: boolean;
}

export type FetchRequest =
  | { resource: "catalogs" }
  | { resource: "schemas"; catalog: string }
  | { resource: "tables"; catalog: string; schema: string }
  | {
      resource: "preview";
      catalog: string;
      schema: string;
      table: string;
      limit: number;
    };

export type LoadedPayload =
  | { resource: "catalogs"; data: CatalogRow[] }
  | { resource: "schemas"; data: SchemaRow[] }
  | { resource: "tables"; data: TableRow[] }
  | { resource: "preview"; data: TablePreview };

export type ExplorerEvent =
  | { type: "catalogSelected"; catalog: string | null }
  | { type: "schemaSelected"; schema: string | null }
  | { type: "tableSelected"; table: string | null }
  | { type: "previewLimitChanged"; limit: number }
  | { type: "schemaMetadataToggled"; show: boolean }
  | { type: "tableMetadataToggled"; show: boolean }
  | { type: "retryRequested"; resource: ExplorerResource }
  | { type: "refreshRequested" }
  | { type: "loadStarted"; resource: ExplorerResource; key: string }
  | { type: "loadSucceeded"; key: string; payload: LoadedPayload }
  | {
      type: "loadFailed";
      resource: ExplorerResource;
      key: string;
      error: string;
      errorCode: string | null;
    };

export type ExplorerPhase =
  | "no-catalog"
  | "catalog-selected"
  | "schema-selected"
  | "table-selected";

const IDLE = { status: "idle" } as const;

export const initialExplorerState: ExplorerState = {
  catalogs: IDLE,
  catalog: null,
  schemas: IDLE,
  schema: null,
  tables: IDLE,
  table: null,
  preview: IDLE,
  previewLimit: DEFAULT_PREVIEW_LIMIT,
  showSchemaMetadata: false,
  showTableMetadata: false,
};

// ---------------------------------------------------------------------------
// Derivations
// ---------------------------------------------------------------------------

export function explorerPhase(state: ExplorerState): ExplorerPhase {
  if (!state.catalog) return "no-catalog";
  if (!state.schema) return "catalog-selected";
  if (!state.table) return "schema-selected";
  return "table-selected";
}

/**
 * The request a resource needs under the current selection, or null when
 * its parent is not selected yet.
 */
export function requestFor(
  state: ExplorerState,
  resource: ExplorerResource
): FetchRequest | null {
  const { catalog, schema, table } = state;
  switch (resource) {
    case "catalogs":
      return { resource };
    case "schemas":
      return catalog ? { resource, catalog } : null;
    case "tables":
      return catalog && schema ? { resource, catalog, schema } : null;
    case "preview":
      return catalog && schema && table
        ? { resource, catalog, schema, table, limit: state.previewLimit }
        : null;
  }
}

/** Stable identity of a request: resource plus its full scope. */
export function scopeKey(request: FetchRequest): string {
  switch (request.resource) {
    case "catalogs":
      return JSON.stringify(["catalogs"]);
    case "schemas":
      return JSON.stringify(["schemas", request.catalog]);
    case "tables":
      return JSON.stringify(["tables", request.catalog, request.schema]);
    case "preview":
      return JSON.stringify([
        "preview",
        request.catalog,
        request.schema,
        request.table,
        request.limit,
      ]);
  }
}

function currentKey(state: ExplorerState, resource: ExplorerResource): string | null {
  const request = requestFor(state, resource);
  return request ? scopeKey(request) : null;
}

const RESOURCES: readonly ExplorerResource[] = [
  "catalogs",
  "schemas",
  "tables",
  "preview",
];

/**
 * Loads the current state needs and has not started: every idle resource
 * whose parents are selected, in cascade order.
 */
export function requiredFetches(state: ExplorerState): FetchRequest[] {
  const out: FetchRequest[] = [];
  for (const resource of RESOURCES) {
    if (state[resource].status !== "idle") continue;
    const request = requestFor(state, resource);
    if (request) out.push(request);
  }
  return out;
}

/** Data of a ready loadable, or an empty fallback. */
export function loadedOr<T>(loadable: Loadable<T>, fallback: T): T {
  return loadable.status === "ready" ? loadable.data : fallback;
}

// ---------------------------------------------------------------------------
// Reducer
// ---------------------------------------------------------------------------

type StatusOnly = Exclude<Loadable<never>, { status: "ready" }>;

function withStatus(
  state: ExplorerState,
  resource: ExplorerResource,
  value: StatusOnly
): ExplorerState {
  switch (resource) {
    case "catalogs":
      return { ...state, catalogs: value };
    case "schemas":
      return { ...state, schemas: value };
    case "tables":
      return { ...state, tables: value };
    case "preview":
      return { ...state, preview: value };
  }
}

function withLoadable(
  state: ExplorerState,
  payload: LoadedPayload,
  key: string
): ExplorerState {
  switch (payload.resource) {
    case "catalogs":
      return { ...state, catalogs: { status: "ready", key, data: payload.data } };
    case "schemas":
      return { ...state, schemas: { status: "ready", key, data: payload.data } };
    case "tables":
      return { ...state, tables: { status: "ready", key, data: payload.data } };
    case "preview":
      return { ...state, preview: { status: "ready", key, data: payload.data } };
  }
}

function pick(current: string | null, names: string[]): string | null {
  if (current !== null && names.includes(current)) return current;
  return names[0] ?? null;
}

function reconcileSelection(state: ExplorerState, payload: LoadedPayload): ExplorerState {
  switch (payload.resource) {
    case "catalogs":
      return explorerReducer(state, {
        type: "catalogSelected",
        catalog: pick(state.catalog, payload.data.map((c) => c.catalog)),
      });
    case "schemas":
      return explorerReducer(state, {
        type: "schemaSelected",
        schema: pick(state.schema, payload.data.map((s) => s.databaseName)),
      });
    case "tables":
      return explorerReducer(state, {
        type: "tableSelected",
        table: pick(state.table, payload.data.map((t) => t.tableName)),
      });
    case "preview":
      return state;
  }
}

export function explorerReducer(
  state: ExplorerState,
  event: ExplorerEvent
): ExplorerState {
  switch (event.type) {
    case "catalogSelected": {
      if (event.catalog === state.catalog) return state;
      return {
        ...state,
        catalog: event.catalog,
        schemas: IDLE,
        schema: null,
        tables: IDLE,
        table: null,
        preview: IDLE,
      };
    }

    case "schemaSelected": {
      if (!state.catalog || event.schema === state.schema) return state;
      return {
        ...state,
        schema: event.schema,
        tables: IDLE,
        table: null,
        preview: IDLE,
      };
    }

    case "tableSelected": {
      if (!state.catalog || !state.schema || event.table === state.table) {
        return state;
      }
      return { ...state, table: event.table, preview: IDLE };
    }

    case "previewLimitChanged": {
      if (event.limit === state.previewLimit) return state;
      return { ...state, previewLimit: event.limit, preview: IDLE };
    }

    case "schemaMetadataToggled":
      return { ...state, showSchemaMetadata: event.show };

    case "tableMetadataToggled":
      return { ...state, showTableMetadata: event.show };

    case "retryRequested": {
      if (state[event.resource].status !== "error") return state;
      return withStatus(state, event.resource, IDLE);
    }

    case "refreshRequested": {
      // In-flight loads keep running; everything settled is fetched again.
      let next = state;
      for (const resource of RESOURCES) {
        const { status } = next[resource];
        if (status === "ready" || status === "error") {
          next = withStatus(next, resource, IDLE);
        }
      }
      return next;
    }

    case "loadStarted": {
      if (currentKey(state, event.resource) !== event.key) return state;
      return withStatus(state, event.resource, { status: "loading", key: event.key });
    }

    case "loadSucceeded": {
      if (currentKey(state, event.payload.resource) !== event.key) return state;
      return reconcileSelection(withLoadable(state, event.payload, event.key), event.payload);
    }

    case "loadFailed": {
      if (currentKey(state, event.resource) !== event.key) return state;
      return withStatus(state, event.resource, {
        status: "error",
        key: event.key,
        error: event.error,
        errorCode: event.errorCode,
      });
    }
  }
}
