import { DEMO_USERS, parseUserRecords, StaticCredentialStore, type CredentialStore } from "./auth/credentials";
import { TokenService } from "./auth/tokens";
import { loadConfig, type AppConfig } from "./config";
import type { CatalogStore } from "./db/catalogStore";
import { MemoryCatalogStore } from "./db/memoryStore";
import { SupabaseCatalogStore } from "./db/supabaseStore";
import { createLogger, type Logger } from "./logger";
import { RateLimiter, type Clock } from "./rateLimit";

export type AdmissionTier = "standard" | "strict";

/** Everything a route handler needs, owned by one explicit container. */
export interface Services {
  config: AppConfig;
  logger: Logger;
  store: CatalogStore;
  credentials: CredentialStore;
  tokens: TokenService;
  limiters: Record<AdmissionTier, RateLimiter>;
  startedAt: number;
}

export interface CreateServicesOptions {
  env?: Record<string, string | undefined>;
  config?: Partial<AppConfig>;
  now?: Clock;
  store?: CatalogStore;
  credentials?: CredentialStore;
}

export function createServices(options: CreateServicesOptions = {}): Services {
  const config: AppConfig = { ...loadConfig(options.env), ...options.config };
  const now = options.now ?? Date.now;
  const logger = createLogger("codebridge", { level: config.logLevel, format: config.logFormat });

  const store =
    options.store ??
    (config.store === "memory"
      ? new MemoryCatalogStore(now)
      : new SupabaseCatalogStore({ url: config.supabaseUrl, serviceKey: config.supabaseServiceKey }));

  const credentials =
    options.credentials ??
    new StaticCredentialStore(config.authUsers ? parseUserRecords(config.authUsers) : DEMO_USERS);

  const tokens = new TokenService({
    secret: config.jwtSecret,
    expireMinutes: config.accessTokenExpireMinutes,
    now,
    logger: logger.child("auth"),
  });

  const limiters: Record<AdmissionTier, RateLimiter> = {
    standard: new RateLimiter({ limit: config.rateLimitPerMinute, windowMs: config.rateLimitWindowMs, now }),
    strict: new RateLimiter({ limit: config.strictRateLimitPerMinute, windowMs: config.rateLimitWindowMs, now }),
  };

  return { config, logger, store, credentials, tokens, limiters, startedAt: now() };
}

// Hard singleton even if the module is evaluated multiple times (dev HMR).
const g = globalThis as unknown as {
  __codebridge_services__?: Services | null;
};

export function getServices(): Services {
  return g.__codebridge_services__ ?? (g.__codebridge_services__ = createServices());
}

/** Install a container (tests) or clear it so the next call rebuilds from env. */
export function setServices(services: Services | null): void {
  g.__codebridge_services__ = services;
}
