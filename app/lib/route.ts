import type { NextRequest, NextResponse } from "next/server";
import { RateLimitError, ValidationError, toErrorResponse } from "./errors";
import { clientKey } from "./rateLimit";
import { getServices, type AdmissionTier } from "./services";

export type RouteContext<P> = { params: Promise<P> };

type Handler<P> = (req: NextRequest, context: RouteContext<P>) => Promise<NextResponse>;

export interface ApiRouteOptions {
  /** Limiter tier; "exempt" skips admission entirely. Default "standard". */
  tier?: AdmissionTier | "exempt";
}

/**
 * Wraps a route handler with request admission, error mapping and the
 * per-request completion log line.
 */
export function apiRoute<P = Record<string, never>>(handler: Handler<P>, options: ApiRouteOptions = {}): Handler<P> {
  const tier = options.tier ?? "standard";

  return async (req, context) => {
    const { limiters, logger } = getServices();
    const started = Date.now();
    const path = req.nextUrl.pathname;

    let response: NextResponse;
    try {
      if (tier !== "exempt") {
        const key = clientKey(req.headers);
        const admission = limiters[tier].check(key);
        if (admission.limited) {
          logger.warn("Rate limit exceeded", { client: key, tier, path });
          throw new RateLimitError(admission.retryAfterMs);
        }
      }
      response = await handler(req, context);
    } catch (err) {
      response = toErrorResponse(err, logger, { method: req.method, url: req.url });
    }

    logger.info("Request completed", {
      method: req.method,
      path,
      status_code: response.status,
      process_time_ms: Date.now() - started,
    });
    return response;
  };
}

/** Parse a positive integer path segment or throw 422. */
export function parseId(raw: string, label: string): number {
  const id = /^\d+$/.test(raw) ? parseInt(raw, 10) : NaN;
  if (!Number.isSafeInteger(id) || id < 1) {
    throw new ValidationError(`Invalid ${label} ID.`, { [`${label}_id`]: "must be a positive integer" });
  }
  return id;
}

/** Read a JSON body or throw 422. */
export async function readJson(req: NextRequest): Promise<unknown> {
  try {
    return await req.json();
  } catch {
    throw new ValidationError("Invalid JSON body.", { body: "must be valid JSON" });
  }
}
