import { NextResponse } from "next/server";
import type { CatalogStats } from "../../../types/catalog";
import { apiRoute } from "../../../lib/route";
import { getServices } from "../../../lib/services";

// GET /api/health/database: store connectivity plus record counts.
export const GET = apiRoute(async () => {
  const { store, logger } = getServices();

  let connected = false;
  try {
    connected = await store.ping();
  } catch (err) {
    logger.error("Database ping failed", { error: err });
  }

  let statistics: CatalogStats | { error: string } | null = null;
  if (connected) {
    try {
      statistics = await store.stats();
    } catch (err) {
      logger.error("Failed to gather database statistics", { error: err });
      statistics = { error: "Stats unavailable" };
    }
  }

  return NextResponse.json({
    status: connected ? "healthy" : "unhealthy",
    timestamp: new Date().toISOString(),
    database: {
      connected,
      connection_info: store.describe(),
      statistics,
    },
  });
});
