/**
 * SQL queries for Unity Catalog metadata browsing.
 *
 * All raw SQL lives here -- route handlers import the accessors rather than
 * writing SQL inline. Every identifier is allow-listed and backtick-quoted
 * before it is placed in a statement.
 *
 * Results are memoized per accessor and argument tuple for the configured
 * freshness window (60 s by default).
 */

import {
  executeSQL,
  type ExecuteSQLOptions,
  type SqlColumn,
  type SqlExecutor,
  type SqlResult,
} from "@/lib/dbx/sql";
import { getConfig } from "@/lib/dbx/config";
import { TtlCache, type Clock } from "@/lib/cache/ttl-cache";
import {
  DEFAULT_PREVIEW_LIMIT,
  quoteIdentifier,
  validateIdentifier,
  validatePreviewLimit,
} from "@/lib/validation";
import { logger } from "@/lib/logger";
import type {
  CatalogRow,
  MetadataAccessors,
  SchemaRow,
  TablePreview,
  TableRow,
} from "@/lib/domain/types";

const log = logger.child("metadata");

// ---------------------------------------------------------------------------
// Warehouse readiness
// ---------------------------------------------------------------------------

export interface WarehouseStatus {
  ready: boolean;
  latencyMs: number;
  error?: string;
}

/**
 * Wake the SQL warehouse and verify it can execute queries.
 *
 * Uses `waitTimeout: "0s"` so the server returns immediately with a
 * statement_id and we poll -- a cold warehouse gets the full polling window
 * to start without hitting client-side fetch timeouts. Not retried.
 */
export async function ensureWarehouseReady(
  execute: (sql: string, options?: ExecuteSQLOptions) => Promise<SqlResult> = executeSQL
): Promise<WarehouseStatus> {
  const start = Date.now();
  try {
    await execute("SELECT 1", { waitTimeout: "0s", submitTimeoutMs: 30_000 });
    return { ready: true, latencyMs: Date.now() - start };
  } catch (error) {
    log.warn("warehouse warmup failed", {
      error: error instanceof Error ? error.message : String(error),
    });
    return {
      ready: false,
      latencyMs: Date.now() - start,
      error: error instanceof Error ? error.message : "Warehouse unreachable",
    };
  }
}

// ---------------------------------------------------------------------------
// Statements
// ---------------------------------------------------------------------------

export function showCatalogsSql(): string {
  return "SHOW CATALOGS";
}

export function showSchemasSql(catalog: string): string {
  return `SHOW SCHEMAS IN ${quoteIdentifier(catalog, "catalog")}`;
}

export function showTablesSql(catalog: string, schema: string): string {
  return `SHOW TABLES IN ${quoteIdentifier(catalog, "catalog")}.${quoteIdentifier(schema, "schema")}`;
}

export function previewTableSql(
  catalog: string,
  schema: string,
  table: string,
  limit: number
): string {
  const fqn = [
    quoteIdentifier(catalog, "catalog"),
    quoteIdentifier(schema, "schema"),
    quoteIdentifier(table, "table"),
  ].join(".");
  return `SELECT * FROM ${fqn} LIMIT ${validatePreviewLimit(limit)}`;
}

// ---------------------------------------------------------------------------
// Row Mappers
// ---------------------------------------------------------------------------

/**
 * Find a column index by any of `names` (case-insensitive), falling back
 * to a positional index when the warehouse renames the column.
 */
function columnIndex(
  columns: SqlColumn[],
  names: string[],
  fallback: number
): number {
  const wanted = names.map((n) => n.toLowerCase());
  const idx = columns.findIndex((c) => wanted.includes(c.name.toLowerCase()));
  return idx >= 0 ? idx : fallback;
}

export function mapCatalogRows(result: SqlResult): CatalogRow[] {
  const idx = columnIndex(result.columns, ["catalog", "catalog_name"], 0);
  return result.rows
    .map((row) => row[idx])
    .filter((name): name is string => !!name)
    .map((catalog) => ({ catalog }));
}

export function mapSchemaRows(catalog: string, result: SqlResult): SchemaRow[] {
  const idx = columnIndex(result.columns, ["databaseName", "namespace", "schema_name"], 0);
  return result.rows
    .map((row) => row[idx])
    .filter((name): name is string => !!name)
    .map((databaseName) => ({ catalog, databaseName }));
}

export function mapTableRows(
  catalog: string,
  schema: string,
  result: SqlResult
): TableRow[] {
  const dbIdx = columnIndex(result.columns, ["database", "namespace"], 0);
  const nameIdx = columnIndex(result.columns, ["tableName", "table_name"], 1);
  const tempIdx = columnIndex(result.columns, ["isTemporary", "is_temporary"], 2);

  return result.rows
    .filter((row) => !!row[nameIdx])
    .map((row) => ({
      catalog,
      database: row[dbIdx] || schema,
      tableName: row[nameIdx] ?? "",
      isTemporary: (row[tempIdx] ?? "").toLowerCase() === "true",
    }));
}

export function mapPreview(
  scope: { catalog: string; schema: string; table: string; limit: number },
  result: SqlResult
): TablePreview {
  const rows = result.rows.slice(0, scope.limit).map((row) => {
    const record: Record<string, string | null> = {};
    result.columns.forEach((col, i) => {
      record[col.name] = row[i] ?? null;
    });
    return record;
  });
  return { ...scope, columns: result.columns, rows };
}

// ---------------------------------------------------------------------------
// Accessors
// ---------------------------------------------------------------------------

/** One cache per accessor; together they form the (function, args) map. */
export interface MetadataCache {
  catalogs: TtlCache<CatalogRow[]>;
  schemas: TtlCache<SchemaRow[]>;
  tables: TtlCache<TableRow[]>;
  preview: TtlCache<TablePreview>;
}

/** Previews hold up to 1000 rows each, so fewer of them are kept. */
export const MAX_CACHED_PREVIEWS = 100;

export function createMetadataCache(options: {
  ttlMs: number;
  clock?: Clock;
}): MetadataCache {
  return {
    catalogs: new TtlCache(options),
    schemas: new TtlCache(options),
    tables: new TtlCache(options),
    preview: new TtlCache({ ...options, maxEntries: MAX_CACHED_PREVIEWS }),
  };
}

export interface MetadataAccessorDeps {
  execute: SqlExecutor;
  cache: MetadataCache;
}

async function memo<T>(
  cache: TtlCache<T>,
  name: string,
  args: readonly unknown[],
  compute: () => Promise<T>
): Promise<T> {
  const key = TtlCache.key(name, args);
  if (cache.has(key)) {
    log.debug("cache hit", { key });
  } else {
    log.debug("cache miss", { key });
  }
  return cache.getOrCompute(key, compute);
}

/**
 * Build the four cached accessors over an executor and a cache.
 *
 * Arguments are validated before the cache is consulted, so an invalid
 * identifier never reaches the warehouse or occupies a cache slot.
 */
export function createMetadataAccessors({
  execute,
  cache,
}: MetadataAccessorDeps): MetadataAccessors {
  return {
    async listCatalogs() {
      return memo(cache.catalogs, "listCatalogs", [], async () =>
        mapCatalogRows(await execute(showCatalogsSql()))
      );
    },

    async listSchemas(catalog) {
      const safeCatalog = validateIdentifier(catalog, "catalog");
      return memo(cache.schemas, "listSchemas", [safeCatalog], async () =>
        mapSchemaRows(safeCatalog, await execute(showSchemasSql(safeCatalog)))
      );
    },

    async listTables(catalog, schema) {
      const safeCatalog = validateIdentifier(catalog, "catalog");
      const safeSchema = validateIdentifier(schema, "schema");
      return memo(cache.tables, "listTables", [safeCatalog, safeSchema], async () =>
        mapTableRows(
          safeCatalog,
          safeSchema,
          await execute(showTablesSql(safeCatalog, safeSchema))
        )
      );
    },

    async previewTable(catalog, schema, table, limit = DEFAULT_PREVIEW_LIMIT) {
      const scope = {
        catalog: validateIdentifier(catalog, "catalog"),
        schema: validateIdentifier(schema, "schema"),
        table: validateIdentifier(table, "table"),
        limit: validatePreviewLimit(limit),
      };
      return memo(
        cache.preview,
        "previewTable",
        [scope.catalog, scope.schema, scope.table, scope.limit],
        async () =>
          mapPreview(
            scope,
            await execute(
              previewTableSql(scope.catalog, scope.schema, scope.table, scope.limit)
            )
          )
      );
    },
  };
}

// ---------------------------------------------------------------------------
// Process-wide instance
// ---------------------------------------------------------------------------

/**
 * The accessors used by route handlers. Built once per process and kept on
 * `globalThis` so dev-mode HMR reloads do not reset the cache.
 */
const globalForMetadata = globalThis as unknown as {
  __metadataAccessors: MetadataAccessors | undefined;
};

export function getMetadataAccessors(): MetadataAccessors {
  if (!globalForMetadata.__metadataAccessors) {
    const { cacheTtlMs } = getConfig();
    globalForMetadata.__metadataAccessors = createMetadataAccessors({
      execute: (sql) => executeSQL(sql),
      cache: createMetadataCache({ ttlMs: cacheTtlMs }),
    });
    log.info("accessors initialised", { cacheTtlMs });
  }
  return globalForMetadata.__metadataAccessors;
}
