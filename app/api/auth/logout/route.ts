import { NextResponse } from "next/server";
import { apiRoute } from "../../../lib/route";

// POST /api/auth/logout: tokens are stateless, so the client just discards it.
export const POST = apiRoute(async () => {
  return NextResponse.json({
    ok: true,
    message: "Logout successful. Please discard your access token.",
    logged_out: true,
  });
});
