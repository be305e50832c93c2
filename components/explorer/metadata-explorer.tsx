"use client";

import { useEffect, useMemo, useReducer, type ReactNode } from "react";
import {
  AlertCircle,
  Clock,
  Database,
  FolderOpen,
  Layers,
  Navigation,
  RefreshCw,
  TableProperties,
} from "lucide-react";
import { Badge } from "@/components/ui/badge";
import { Button } from "@/components/ui/button";
import { Card, CardContent, CardDescription, CardHeader, CardTitle } from "@/components/ui/card";
import { Checkbox } from "@/components/ui/checkbox";
import { Label } from "@/components/ui/label";
import {
  Select,
  SelectContent,
  SelectItem,
  SelectTrigger,
  SelectValue,
} from "@/components/ui/select";
import { Separator } from "@/components/ui/separator";
import { Skeleton } from "@/components/ui/skeleton";
import { CascadeSelect } from "./cascade-select";
import { ResultTable } from "./result-table";
import { fetchMetadata, MetadataRequestError } from "@/lib/explorer/api-client";
import {
  explorerPhase,
  explorerReducer,
  initialExplorerState,
  loadedOr,
  requiredFetches,
  scopeKey,
  type ExplorerResource,
  type Loadable,
} from "@/lib/explorer/state";
import type { SchemaRow, TableRow } from "@/lib/domain/types";

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

const PREVIEW_LIMITS = [10, 25, 50, 100] as const;

const SCHEMA_COLUMNS = [{ name: "databaseName" }];
const TABLE_COLUMNS = [
  { name: "database" },
  { name: "tableName" },
  { name: "isTemporary" },
];

// ---------------------------------------------------------------------------
// Component
// ---------------------------------------------------------------------------

interface MetadataExplorerProps {
  /** Server-side freshness window, shown to the user. */
  cacheTtlSeconds: number;
}

export function MetadataExplorer({ cacheTtlSeconds }: MetadataExplorerProps) {
  const [state, dispatch] = useReducer(explorerReducer, initialExplorerState);
  const phase = explorerPhase(state);

  // ── Issue exactly the loads the current selection still needs ──────────
  const fetches = useMemo(() => requiredFetches(state), [state]);

  useEffect(() => {
    for (const request of fetches) {
      const key = scopeKey(request);
      dispatch({ type: "loadStarted", resource: request.resource, key });
      void fetchMetadata(request)
        .then((payload) => dispatch({ type: "loadSucceeded", key, payload }))
        .catch((err: unknown) =>
          dispatch({
            type: "loadFailed",
            resource: request.resource,
            key,
            error: err instanceof Error ? err.message : "Request failed",
            errorCode: err instanceof MetadataRequestError ? err.errorCode : null,
          })
        );
    }
  }, [fetches]);

  const retry = (resource: ExplorerResource) =>
    dispatch({ type: "retryRequested", resource });

  const schemaRows = loadedOr<SchemaRow[]>(state.schemas, []);
  const tableRows = loadedOr<TableRow[]>(state.tables, []);

  return (
    <div className="flex flex-col gap-6 md:flex-row">
      {/* ── Sidebar ─────────────────────────────────────────────────────── */}
      <aside className="w-full shrink-0 md:w-72">
        <Card className="bg-muted/40">
          <CardHeader>
            <div className="flex items-center justify-between">
              <CardTitle className="flex items-center gap-2">
                <Navigation className="h-4 w-4" />
                Navigation Panel
              </CardTitle>
              <Button
                variant="ghost"
                size="icon"
                aria-label="Refresh metadata"
                onClick={() => dispatch({ type: "refreshRequested" })}
              >
                <RefreshCw className="h-4 w-4" />
              </Button>
            </div>
            <CardDescription>
              Use the selectors below to explore the metadata.
            </CardDescription>
          </CardHeader>
          <CardContent className="space-y-5">
            <CascadeSelect
              id="catalog"
              label="Select a Catalog"
              icon={<Database className="h-4 w-4 text-orange-500" />}
              source={state.catalogs}
              optionValue={(c) => c.catalog}
              value={state.catalog}
              onChange={(catalog) => dispatch({ type: "catalogSelected", catalog })}
              onRetry={() => retry("catalogs")}
              placeholder="Choose a catalog..."
              emptyMessage="No catalogs found"
            />
            <CascadeSelect
              id="schema"
              label="Select a Schema"
              icon={<Layers className="h-4 w-4 text-blue-500" />}
              source={state.schemas}
              optionValue={(s) => s.databaseName}
              value={state.schema}
              onChange={(schema) => dispatch({ type: "schemaSelected", schema })}
              onRetry={() => retry("schemas")}
              placeholder={state.catalog ? "Choose a schema..." : "Select a catalog first"}
              emptyMessage="No schemas found"
            />
            <CascadeSelect
              id="table"
              label="Select a Table"
              icon={<TableProperties className="h-4 w-4 text-green-600" />}
              source={state.tables}
              optionValue={(t) => t.tableName}
              value={state.table}
              onChange={(table) => dispatch({ type: "tableSelected", table })}
              onRetry={() => retry("tables")}
              placeholder={state.schema ? "Choose a table..." : "Select a schema first"}
              emptyMessage="No tables found"
            />

            <div className="space-y-2">
              <Label htmlFor="preview-limit">Preview rows</Label>
              <Select
                value={String(state.previewLimit)}
                onValueChange={(v) =>
                  dispatch({ type: "previewLimitChanged", limit: Number(v) })
                }
              >
                <SelectTrigger id="preview-limit" className="bg-background">
                  <SelectValue />
                </SelectTrigger>
                <SelectContent>
                  {PREVIEW_LIMITS.map((n) => (
                    <SelectItem key={n} value={String(n)}>
                      {n}
                    </SelectItem>
                  ))}
                </SelectContent>
              </Select>
            </div>

            <Separator />

            <label className="flex items-center gap-2 text-sm">
              <Checkbox
                checked={state.showSchemaMetadata}
                onCheckedChange={(checked) =>
                  dispatch({ type: "schemaMetadataToggled", show: checked === true })
                }
              />
              Show Schemas Metadata
            </label>
            <label className="flex items-center gap-2 text-sm">
              <Checkbox
                checked={state.showTableMetadata}
                onCheckedChange={(checked) =>
                  dispatch({ type: "tableMetadataToggled", show: checked === true })
                }
              />
              Show Tables Metadata
            </label>
          </CardContent>
        </Card>
      </aside>

      {/* ── Main panel ──────────────────────────────────────────────────── */}
      <section className="min-w-0 flex-1 space-y-6">
        {phase === "table-selected" ? (
          <div className="space-y-3">
            <div className="flex items-center gap-2">
              <h2 className="text-lg font-semibold">
                Data Preview:{" "}
                <code className="rounded bg-muted px-1.5 py-0.5 text-base">
                  {state.catalog}.{state.schema}.{state.table}
                </code>
              </h2>
              {state.preview.status === "ready" && (
                <Badge variant="secondary" className="text-xs">
                  {state.preview.data.rows.length} row
                  {state.preview.data.rows.length !== 1 ? "s" : ""}
                </Badge>
              )}
            </div>
            <LoadablePanel
              source={state.preview}
              onRetry={() => retry("preview")}
              skeletonClass="h-[400px]"
            >
              {(preview) => (
                <ResultTable
                  columns={preview.columns}
                  rows={preview.rows.map((row) =>
                    preview.columns.map((c) => row[c.name] ?? null)
                  )}
                  emptyMessage="This table has no rows"
                />
              )}
            </LoadablePanel>
          </div>
        ) : (
          <div className="flex min-h-[200px] items-center justify-center rounded-md border border-dashed text-sm text-muted-foreground">
            {phase === "no-catalog" && "Select a catalog to begin."}
            {phase === "catalog-selected" && "Select a schema to list its tables."}
            {phase === "schema-selected" && "Select a table to preview its data."}
          </div>
        )}

        <div className="grid gap-6 md:grid-cols-2">
          {state.showSchemaMetadata && state.catalog && (
            <div className="space-y-3">
              <h3 className="flex items-center gap-2 font-semibold">
                <FolderOpen className="h-4 w-4" />
                Schemas in <code className="rounded bg-muted px-1.5 py-0.5">{state.catalog}</code>
              </h3>
              <LoadablePanel
                source={state.schemas}
                onRetry={() => retry("schemas")}
                skeletonClass="h-[300px]"
              >
                {() => (
                  <ResultTable
                    columns={SCHEMA_COLUMNS}
                    rows={schemaRows.map((s) => [s.databaseName])}
                    maxHeightClass="max-h-[300px]"
                    emptyMessage="No schemas found"
                  />
                )}
              </LoadablePanel>
            </div>
          )}

          {state.showTableMetadata && state.catalog && state.schema && (
            <div className="space-y-3">
              <h3 className="flex items-center gap-2 font-semibold">
                <TableProperties className="h-4 w-4" />
                Tables in{" "}
                <code className="rounded bg-muted px-1.5 py-0.5">
                  {state.catalog}.{state.schema}
                </code>
              </h3>
              <LoadablePanel
                source={state.tables}
                onRetry={() => retry("tables")}
                skeletonClass="h-[300px]"
              >
                {() => (
                  <ResultTable
                    columns={TABLE_COLUMNS}
                    rows={tableRows.map((t) => [
                      t.database,
                      t.tableName,
                      String(t.isTemporary),
                    ])}
                    maxHeightClass="max-h-[300px]"
                    emptyMessage="No tables found"
                  />
                )}
              </LoadablePanel>
            </div>
          )}
        </div>

        <p className="flex items-center gap-1 text-xs text-muted-foreground">
          <Clock className="h-3 w-3" />
          Metadata and previews are cached on the server for {cacheTtlSeconds} seconds.
        </p>
      </section>
    </div>
  );
}

// ---------------------------------------------------------------------------
// Loadable panel
// ---------------------------------------------------------------------------

function LoadablePanel<T>({
  source,
  onRetry,
  skeletonClass,
  children,
}: {
  source: Loadable<T>;
  onRetry: () => void;
  skeletonClass: string;
  children: (data: T) => ReactNode;
}) {
  switch (source.status) {
    case "idle":
    case "loading":
      return <Skeleton className={skeletonClass} />;
    case "error":
      return (
        <div className="flex items-start gap-3 rounded-md border border-destructive/50 bg-destructive/5 p-4 text-sm">
          <AlertCircle className="mt-0.5 h-4 w-4 shrink-0 text-destructive" />
          <div className="min-w-0 flex-1 space-y-1">
            <p className="font-medium text-destructive">
              {source.errorCode ?? "Request failed"}
            </p>
            <p className="break-words font-mono text-xs text-muted-foreground">
              {source.error}
            </p>
          </div>
          <Button variant="outline" size="sm" onClick={onRetry}>
            Retry
          </Button>
        </div>
      );
    case "ready":
      return <>{children(source.data)}</>;
  }
}
