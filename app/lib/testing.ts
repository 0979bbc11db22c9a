import { NextRequest } from "next/server";
import type { AppConfig } from "./config";
import type { CredentialStore } from "./auth/credentials";
import { MemoryCatalogStore } from "./db/memoryStore";
import type { RouteContext } from "./route";
import { createServices, setServices, type Services } from "./services";

type RequestInit = ConstructorParameters<typeof NextRequest>[1];

export interface TestHarness {
  services: Services;
  store: MemoryCatalogStore;
  advance(ms: number): void;
  /** Authorization header value for a token carrying `permissions`. */
  bearer(username: string, permissions: string[]): Promise<string>;
}

/**
 * Install a container backed by the in-memory store and a fixed clock.
 * Route handlers pick it up through getServices().
 */
export function installTestServices(
  options: { config?: Partial<AppConfig>; credentials?: CredentialStore } = {},
): TestHarness {
  let t = Date.UTC(2026, 0, 1);
  const now = () => t;
  const store = new MemoryCatalogStore(now);
  const services = createServices({
    env: {},
    now,
    store,
    credentials: options.credentials,
    config: { jwtSecret: "test-secret", logLevel: "error", ...options.config },
  });
  setServices(services);

  return {
    services,
    store,
    advance: (ms) => {
      t += ms;
    },
    bearer: async (username, permissions) => {
      const { access_token } = await services.tokens.issue({ username, permissions });
      return `Bearer ${access_token}`;
    },
  };
}

export function apiRequest(path: string, init?: RequestInit): NextRequest {
  return new NextRequest(new URL(path, "http://localhost"), init);
}

export function jsonRequest(path: string, method: string, body: unknown, authorization?: string): NextRequest {
  const headers: Record<string, string> = { "content-type": "application/json" };
  if (authorization) headers.authorization = authorization;
  return apiRequest(path, { method, headers, body: JSON.stringify(body) });
}

export function routeContext<P>(params: P): RouteContext<P> {
  return { params: Promise.resolve(params) };
}

export const noParams: RouteContext<Record<string, never>> = routeContext({});
