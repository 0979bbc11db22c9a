import { NextResponse, type NextRequest } from "next/server";
import { parseList } from "./app/lib/config";

const ALLOW_METHODS = "GET, POST, PUT, DELETE, OPTIONS";
const ALLOW_HEADERS = "Authorization, Content-Type";

/**
 * Pick the Access-Control-Allow-Origin value. A wildcard list allows any
 * origin; otherwise the request origin is echoed only when listed.
 */
export function resolveOrigin(origin: string | null, allowed: string[]): string | null {
  if (allowed.includes("*")) return "*";
  if (origin && allowed.includes(origin)) return origin;
  return null;
}

function corsHeaders(request: NextRequest): Headers {
  const allowed = parseList(process.env.ALLOWED_ORIGINS);
  const origin = resolveOrigin(request.headers.get("origin"), allowed.length > 0 ? allowed : ["*"]);

  const headers = new Headers();
  if (origin) {
    headers.set("Access-Control-Allow-Origin", origin);
    if (origin !== "*") headers.set("Vary", "Origin");
  }
  headers.set("Access-Control-Allow-Methods", ALLOW_METHODS);
  headers.set("Access-Control-Allow-Headers", ALLOW_HEADERS);
  return headers;
}

export function middleware(request: NextRequest) {
  const headers = corsHeaders(request);

  if (request.method === "OPTIONS") {
    return new NextResponse(null, { status: 204, headers });
  }

  const response = NextResponse.next();
  headers.forEach((value, key) => response.headers.set(key, value));
  return response;
}

export const config = {
  matcher: ["/api/:path*"],
};
