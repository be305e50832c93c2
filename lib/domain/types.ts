/**
 * Core domain types for the metadata explorer.
 *
 * Rows mirror the result columns of the SHOW statements they come from,
 * plus the parent scope they were listed under.
 */

import type { SqlColumn } from "@/lib/dbx/sql";

// ---------------------------------------------------------------------------
// Metadata rows
// ---------------------------------------------------------------------------

/** One row of `SHOW CATALOGS`. */
export interface CatalogRow {
  catalog: string;
}

/** One row of `SHOW SCHEMAS IN <catalog>`. */
export interface SchemaRow {
  catalog: string;
  databaseName: string;
}

/** One row of `SHOW TABLES IN <catalog>.<schema>`. */
export interface TableRow {
  catalog: string;
  database: string;
  tableName: string;
  isTemporary: boolean;
}

// ---------------------------------------------------------------------------
// Preview
// ---------------------------------------------------------------------------

export type PreviewRow = Record<string, string | null>;

export interface TablePreview {
  catalog: string;
  schema: string;
  table: string;
  limit: number;
  columns: SqlColumn[];
  rows: PreviewRow[];
}

// ---------------------------------------------------------------------------
// Accessors
// ---------------------------------------------------------------------------

export interface MetadataAccessors {
  listCatalogs(): Promise<CatalogRow[]>;
  listSchemas(catalog: string): Promise<SchemaRow[]>;
  listTables(catalog: string, schema: string): Promise<TableRow[]>;
  previewTable(
    catalog: string,
    schema: string,
    table: string,
    limit?: number
  ): Promise<TablePreview>;
}
