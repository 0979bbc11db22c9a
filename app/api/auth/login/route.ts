/**
 * POST /api/auth/login: exchange username/password for a bearer token.
 *
 * Accepts JSON `{ username, password }` or the same fields form-encoded
 * (OAuth2 password grant style). Admitted through the strict limiter tier.
 */

import { NextRequest, NextResponse } from "next/server";
import { AuthenticationError, ValidationError } from "../../../lib/errors";
import { apiRoute } from "../../../lib/route";
import { loginSchema, parseOrThrow } from "../../../lib/schemas";
import { getServices } from "../../../lib/services";

async function readCredentials(req: NextRequest): Promise<unknown> {
  const contentType = req.headers.get("content-type") ?? "";
  const raw = await req.text();
  if (contentType.includes("application/x-www-form-urlencoded")) {
    return Object.fromEntries(new URLSearchParams(raw));
  }
  try {
    return JSON.parse(raw);
  } catch {
    throw new ValidationError("Invalid JSON body.", { body: "must be valid JSON" });
  }
}

export const POST = apiRoute(
  async (req) => {
    const { credentials, tokens, logger } = getServices();
    const { username, password } = parseOrThrow(loginSchema, await readCredentials(req));

    const principal = await credentials.verify(username, password);
    if (!principal) {
      logger.warn("Login failed", { username });
      throw new AuthenticationError("Incorrect username or password");
    }
    if (!principal.active) {
      logger.warn("Login refused for inactive account", { username });
      throw new AuthenticationError("User account is inactive");
    }

    const token = await tokens.issue(principal);
    logger.info(`User logged in: ${principal.username}`, {
      username: principal.username,
      permissions: principal.permissions,
    });

    return NextResponse.json({ ok: true, ...token });
  },
  { tier: "strict" },
);
