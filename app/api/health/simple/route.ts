import { NextResponse } from "next/server";
import { apiRoute } from "../../../lib/route";

// Liveness probe; never throttled.
export const GET = apiRoute(
  async () =>
    NextResponse.json({
      status: "healthy",
      timestamp: new Date().toISOString(),
      message: "Service is running",
    }),
  { tier: "exempt" },
);
