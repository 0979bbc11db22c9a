import { NextResponse } from "next/server";
import { requireUser } from "../../../lib/apiAuth";
import { apiRoute } from "../../../lib/route";

// GET /api/auth/me: identity carried by the caller's token
export const GET = apiRoute(async (req) => {
  const user = await requireUser(req);
  return NextResponse.json({
    ok: true,
    user: { username: user.username, permissions: user.permissions, authenticated: true },
  });
});
