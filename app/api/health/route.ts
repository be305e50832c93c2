/**
 * API: /api/health
 *
 * GET -- health check for load balancers and monitoring.
 *
 * Checks:
 *   - Configuration (required environment variables)
 *   - Databricks SQL Warehouse reachability
 *   - Application version
 */

import { NextResponse } from "next/server";
import { loadConfig } from "@/lib/dbx/config";
import { getCurrentUserEmail } from "@/lib/dbx/client";
import { ensureWarehouseReady } from "@/lib/queries/metadata";
import packageJson from "@/package.json";

export const dynamic = "force-dynamic";

interface CheckResult {
  status: "ok" | "error";
  latencyMs: number;
  error?: string;
}

interface HealthCheck {
  status: "healthy" | "unhealthy";
  version: string;
  uptime: number;
  timestamp: string;
  host: string | null;
  userEmail: string | null;
  checks: {
    configuration: CheckResult;
    warehouse: CheckResult;
  };
}

const startTime = Date.now();

export async function GET() {
  const config = loadConfig();

  const configuration: CheckResult = config.ok
    ? { status: "ok", latencyMs: 0 }
    : { status: "error", latencyMs: 0, error: config.error.message };

  let warehouse: CheckResult = {
    status: "error",
    latencyMs: 0,
    error: "Skipped: configuration is incomplete",
  };
  if (config.ok) {
    const ready = await ensureWarehouseReady();
    warehouse = ready.ready
      ? { status: "ok", latencyMs: ready.latencyMs }
      : { status: "error", latencyMs: ready.latencyMs, error: ready.error };
  }

  const healthy = configuration.status === "ok" && warehouse.status === "ok";

  const health: HealthCheck = {
    status: healthy ? "healthy" : "unhealthy",
    version: packageJson.version,
    uptime: Math.floor((Date.now() - startTime) / 1000),
    timestamp: new Date().toISOString(),
    host: config.ok ? config.config.host : null,
    userEmail: await getCurrentUserEmail(),
    checks: { configuration, warehouse },
  };

  return NextResponse.json(health, {
    status: healthy ? 200 : 503,
    headers: {
      "Cache-Control": "no-store",
    },
  });
}
