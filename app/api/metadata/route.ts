/**
 * API: /api/metadata
 *
 * GET -- browse Unity Catalog metadata (catalogs, schemas, tables, preview)
 *
 * Query params:
 *   ?type=warmup                                  -- wake the SQL warehouse + report status
 *   ?type=catalogs                                -- list catalogs
 *   ?type=schemas&catalog=X                       -- list schemas in catalog X
 *   ?type=tables&catalog=X&schema=Y               -- list tables in X.Y
 *   ?type=preview&catalog=X&schema=Y&table=Z[&limit=N] -- first N rows of X.Y.Z
 */

import { NextRequest, NextResponse } from "next/server";
import { logger } from "@/lib/logger";
import { ensureWarehouseReady, getMetadataAccessors } from "@/lib/queries/metadata";
import { metadataErrorResponse } from "@/lib/api-errors";
import { parseMetadataQuery } from "@/lib/validation";

export const dynamic = "force-dynamic";

export async function GET(request: NextRequest) {
  const { searchParams } = new URL(request.url);
  const parsed = parseMetadataQuery(searchParams);

  if (!parsed.success) {
    logger.child("api").warn("Invalid metadata request", {
      error: parsed.error,
      queryParams: Object.fromEntries(searchParams),
    });
    return NextResponse.json(
      { error: parsed.error, errorCode: "INVALID_REQUEST" },
      { status: 400 }
    );
  }

  const query = parsed.data;
  const start = Date.now();

  try {
    switch (query.type) {
      case "warmup": {
        const status = await ensureWarehouseReady();
        return NextResponse.json(status, {
          status: status.ready ? 200 : 503,
        });
      }
      case "catalogs": {
        const catalogs = await getMetadataAccessors().listCatalogs();
        return NextResponse.json({
          catalogs,
          _meta: { latencyMs: Date.now() - start },
        });
      }
      case "schemas": {
        const schemas = await getMetadataAccessors().listSchemas(query.catalog);
        return NextResponse.json({
          schemas,
          _meta: { latencyMs: Date.now() - start },
        });
      }
      case "tables": {
        const tables = await getMetadataAccessors().listTables(
          query.catalog,
          query.schema
        );
        return NextResponse.json({
          tables,
          _meta: { latencyMs: Date.now() - start },
        });
      }
      case "preview": {
        const preview = await getMetadataAccessors().previewTable(
          query.catalog,
          query.schema,
          query.table,
          query.limit
        );
        return NextResponse.json({
          preview,
          _meta: { latencyMs: Date.now() - start },
        });
      }
    }
  } catch (error) {
    return metadataErrorResponse(error, { path: "/api/metadata", type: query.type });
  }
}
