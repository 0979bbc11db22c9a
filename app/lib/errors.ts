import { NextResponse } from "next/server";
import type { Logger } from "./logger";

export const ErrorCode = {
  VALIDATION_FAILED: "VALIDATION_FAILED",
  NOT_FOUND: "NOT_FOUND",
  CONFLICT: "CONFLICT",
  UNAUTHENTICATED: "UNAUTHENTICATED",
  FORBIDDEN: "FORBIDDEN",
  RATE_LIMITED: "RATE_LIMITED",
  INTERNAL: "INTERNAL",
} as const;

export type ErrorCodeValue = (typeof ErrorCode)[keyof typeof ErrorCode];

/** Base for every error the API maps to a specific status code. */
export class ApiError extends Error {
  constructor(
    readonly status: number,
    readonly code: ErrorCodeValue,
    message: string,
  ) {
    super(message);
    this.name = new.target.name;
  }

  headers(): Record<string, string> {
    return {};
  }
}

export class ValidationError extends ApiError {
  constructor(
    message: string,
    readonly fields: Record<string, string> = {},
  ) {
    super(422, ErrorCode.VALIDATION_FAILED, message);
  }
}

export class NotFoundError extends ApiError {
  constructor(message: string) {
    super(404, ErrorCode.NOT_FOUND, message);
  }
}

export class ConflictError extends ApiError {
  constructor(message: string) {
    super(409, ErrorCode.CONFLICT, message);
  }
}

export class AuthenticationError extends ApiError {
  constructor(message = "Could not validate credentials") {
    super(401, ErrorCode.UNAUTHENTICATED, message);
  }

  override headers(): Record<string, string> {
    return { "WWW-Authenticate": "Bearer" };
  }
}

export class AuthorizationError extends ApiError {
  constructor(message = "Not enough permissions") {
    super(403, ErrorCode.FORBIDDEN, message);
  }
}

export class RateLimitError extends ApiError {
  constructor(readonly retryAfterMs: number) {
    super(429, ErrorCode.RATE_LIMITED, "Rate limit exceeded. Please try again later.");
  }

  override headers(): Record<string, string> {
    return { "Retry-After": String(Math.ceil(this.retryAfterMs / 1000)) };
  }
}

export interface RequestInfo {
  method: string;
  url: string;
}

/**
 * Map a thrown value to the JSON error envelope. Anything that is not an
 * ApiError is logged in full and answered with a generic 500.
 */
export function toErrorResponse(err: unknown, logger: Logger, request?: RequestInfo): NextResponse {
  if (err instanceof ApiError) {
    const body: Record<string, unknown> = { ok: false, error: err.message, code: err.code };
    if (err instanceof ValidationError && Object.keys(err.fields).length > 0) {
      body.fields = err.fields;
    }
    return NextResponse.json(body, { status: err.status, headers: err.headers() });
  }

  logger.error("Request failed", {
    method: request?.method,
    url: request?.url,
    error_type: err instanceof Error ? err.name : typeof err,
    error: err instanceof Error ? err.message : String(err),
    stack: err instanceof Error ? err.stack : undefined,
  });

  return NextResponse.json(
    { ok: false, error: "Internal server error", code: ErrorCode.INTERNAL },
    { status: 500 },
  );
}
