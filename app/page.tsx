import { MetadataExplorer } from "@/components/explorer/metadata-explorer";
import { DEFAULT_CACHE_TTL_SECONDS, loadConfig } from "@/lib/dbx/config";

export const dynamic = "force-dynamic";

export default function ExplorerPage() {
  const config = loadConfig();
  const cacheTtlSeconds = config.ok
    ? Math.round(config.config.cacheTtlMs / 1000)
    : DEFAULT_CACHE_TTL_SECONDS;

  return (
    <div className="space-y-6">
      <div>
        <h1 className="text-2xl font-bold tracking-tight">Metadata Explorer</h1>
        <p className="mt-1 text-muted-foreground">
          Browse catalogs, schemas, and tables interactively with Databricks SQL.
        </p>
      </div>
      <MetadataExplorer cacheTtlSeconds={cacheTtlSeconds} />
    </div>
  );
}
