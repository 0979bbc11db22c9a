/**
 * Shared server-side auth helpers for API routes.
 *
 * Extracts a Bearer token from the Authorization header and verifies it with
 * the container's TokenService. Routes pick one of:
 *   requireUser       -> 401 without a valid token
 *   optionalUser      -> anonymous (null) when the token is absent or invalid
 *   requirePermission -> 403 when the verified identity lacks a permission
 */

import type { NextRequest } from "next/server";
import { AuthenticationError, AuthorizationError } from "./errors";
import type { Identity } from "./auth/tokens";
import { getServices } from "./services";

export function bearerToken(req: NextRequest): string | null {
  const authHeader = req.headers.get("authorization");
  if (!authHeader) return null;
  const match = authHeader.match(/^Bearer\s+(\S+)$/i);
  return match ? match[1] : null;
}

export async function requireUser(req: NextRequest): Promise<Identity> {
  const token = bearerToken(req);
  if (!token) throw new AuthenticationError("Not authenticated");
  return getServices().tokens.verify(token);
}

/**
 * Anonymous access is allowed. A present-but-invalid credential is treated
 * as anonymous too; the fallback is logged so misconfigured clients show up.
 */
export async function optionalUser(req: NextRequest): Promise<Identity | null> {
  if (!req.headers.get("authorization")) return null;
  const { tokens, logger } = getServices();
  const token = bearerToken(req);
  if (!token) {
    logger.warn("Malformed Authorization header, continuing as anonymous", { path: req.nextUrl.pathname });
    return null;
  }
  try {
    return await tokens.verify(token);
  } catch (err) {
    if (!(err instanceof AuthenticationError)) throw err;
    logger.warn("Invalid credential on optional-auth route, continuing as anonymous", {
      path: req.nextUrl.pathname,
    });
    return null;
  }
}

export function requirePermission(identity: Identity, permission: string): Identity {
  if (!identity.permissions.includes(permission)) {
    throw new AuthorizationError(`Permission '${permission}' required`);
  }
  return identity;
}

/** requireUser + requirePermission in one step. */
export async function requireUserWith(req: NextRequest, permission: string): Promise<Identity> {
  return requirePermission(await requireUser(req), permission);
}
