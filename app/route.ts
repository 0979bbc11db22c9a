import { NextResponse } from "next/server";
import { ENDPOINTS } from "./lib/endpoints";
import { apiRoute } from "./lib/route";
import { getServices } from "./lib/services";

// GET /: welcome document. Exempt from admission like the liveness probe.
export const GET = apiRoute(
  async () => {
    const { config } = getServices();
    return NextResponse.json({
      message: `Welcome to ${config.appName}`,
      description: "Catalog API for discovered code projects and the content written about them",
      version: config.version,
      status: "running",
      timestamp: new Date().toISOString(),
      endpoints: ENDPOINTS,
    });
  },
  { tier: "exempt" },
);
