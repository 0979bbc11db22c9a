import os from "node:os";
import { NextResponse } from "next/server";
import { ENDPOINTS } from "../../lib/endpoints";
import { apiRoute } from "../../lib/route";
import { getServices } from "../../lib/services";

const MB = 1024 * 1024;

function round(n: number, digits = 2): number {
  const f = 10 ** digits;
  return Math.round(n * f) / f;
}

// GET /api/health: detailed status. Internal failures still answer 200.
export const GET = apiRoute(async () => {
  const { config, logger, startedAt } = getServices();
  const timestamp = new Date().toISOString();

  try {
    const mem = process.memoryUsage();
    const [load1, load5, load15] = os.loadavg();
    return NextResponse.json({
      status: "healthy",
      timestamp,
      version: config.version,
      app_name: config.appName,
      environment: config.debug ? "development" : "production",
      uptime_seconds: Math.floor((Date.now() - startedAt) / 1000),
      features: {
        authentication: true,
        rate_limiting: true,
        store: config.store,
        cors: true,
      },
      endpoints: ENDPOINTS,
      system: {
        platform: os.platform(),
        release: os.release(),
        arch: os.arch(),
        hostname: os.hostname(),
        cpu_count: os.cpus().length,
        node_version: process.version,
      },
      memory: {
        rss_mb: round(mem.rss / MB),
        heap_used_mb: round(mem.heapUsed / MB),
        heap_total_mb: round(mem.heapTotal / MB),
        system_total_mb: round(os.totalmem() / MB),
        system_free_mb: round(os.freemem() / MB),
      },
      load_average: { "1m": round(load1), "5m": round(load5), "15m": round(load15) },
    });
  } catch (err) {
    logger.error("Health check failed", { error: err });
    return NextResponse.json({
      status: "unhealthy",
      timestamp,
      error: err instanceof Error ? err.message : String(err),
    });
  }
});
