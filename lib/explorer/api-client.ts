/**
 * Browser-side client for `/api/metadata`.
 *
 * Turns a FetchRequest from the selection cascade into one API call and
 * validates the JSON body before it reaches the reducer.
 */

import { z } from "zod/v4";
import type { FetchRequest, LoadedPayload } from "./state";

const CatalogRowSchema = z.object({ catalog: z.string() });
const SchemaRowSchema = z.object({ catalog: z.string(), databaseName: z.string() });
const TableRowSchema = z.object({
  catalog: z.string(),
  database: z.string(),
  tableName: z.string(),
  isTemporary: z.boolean(),
});
const TablePreviewSchema = z.object({
  catalog: z.string(),
  schema: z.string(),
  table: z.string(),
  limit: z.number(),
  columns: z.array(
    z.object({ name: z.string(), typeName: z.string(), position: z.number() })
  ),
  rows: z.array(z.record(z.string(), z.string().nullable())),
});

const ErrorBodySchema = z.object({
  error: z.string(),
  errorCode: z.string().optional(),
});

export class MetadataRequestError extends Error {
  constructor(
    message: string,
    public readonly status: number,
    public readonly errorCode: string | null
  ) {
    super(message);
    this.name = "MetadataRequestError";
  }
}

export function metadataUrl(request: FetchRequest): string {
  const params = new URLSearchParams({ type: request.resource });
  switch (request.resource) {
    case "catalogs":
      break;
    case "schemas":
      params.set("catalog", request.catalog);
      break;
    case "tables":
      params.set("catalog", request.catalog);
      params.set("schema", request.schema);
      break;
    case "preview":
      params.set("catalog", request.catalog);
      params.set("schema", request.schema);
      params.set("table", request.table);
      params.set("limit", String(request.limit));
      break;
  }
  return `/api/metadata?${params.toString()}`;
}

async function readJson(res: Response): Promise<unknown> {
  try {
    return await res.json();
  } catch {
    return null;
  }
}

const CatalogsBody = z.object({ catalogs: z.array(CatalogRowSchema) });
const SchemasBody = z.object({ schemas: z.array(SchemaRowSchema) });
const TablesBody = z.object({ tables: z.array(TableRowSchema) });
const PreviewBody = z.object({ preview: TablePreviewSchema });

function parseBody(request: FetchRequest, body: unknown): LoadedPayload | null {
  switch (request.resource) {
    case "catalogs": {
      const r = CatalogsBody.safeParse(body);
      return r.success ? { resource: "catalogs", data: r.data.catalogs } : null;
    }
    case "schemas": {
      const r = SchemasBody.safeParse(body);
      return r.success ? { resource: "schemas", data: r.data.schemas } : null;
    }
    case "tables": {
      const r = TablesBody.safeParse(body);
      return r.success ? { resource: "tables", data: r.data.tables } : null;
    }
    case "preview": {
      const r = PreviewBody.safeParse(body);
      return r.success ? { resource: "preview", data: r.data.preview } : null;
    }
  }
}

/**
 * Fetch one resource. Throws MetadataRequestError carrying the server's
 * `errorCode` when the API answers with an error status.
 */
export async function fetchMetadata(
  request: FetchRequest,
  fetchImpl: typeof fetch = fetch
): Promise<LoadedPayload> {
  const res = await fetchImpl(metadataUrl(request));
  const body = await readJson(res);

  if (!res.ok) {
    const parsed = ErrorBodySchema.safeParse(body);
    throw new MetadataRequestError(
      parsed.success ? parsed.data.error : `Request failed (${res.status})`,
      res.status,
      parsed.success ? parsed.data.errorCode ?? null : null
    );
  }

  const payload = parseBody(request, body);
  if (!payload) {
    throw new MetadataRequestError(
      `Unexpected response shape for ${request.resource}`,
      res.status,
      "INVALID_RESPONSE"
    );
  }
  return payload;
}
