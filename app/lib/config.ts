/**
 * Runtime configuration, read once from the environment.
 *
 * Every value has a fallback so a bare `next dev` boots. Malformed numeric
 * values fall back to the default rather than failing startup.
 */

export type LogLevel = "debug" | "info" | "warn" | "error";
export type LogFormat = "json" | "text";
export type StoreKind = "supabase" | "memory";

export interface AppConfig {
  appName: string;
  version: string;
  debug: boolean;
  jwtSecret: string;
  accessTokenExpireMinutes: number;
  rateLimitPerMinute: number;
  strictRateLimitPerMinute: number;
  rateLimitWindowMs: number;
  logLevel: LogLevel;
  logFormat: LogFormat;
  store: StoreKind;
  supabaseUrl: string;
  supabaseServiceKey: string;
  allowedOrigins: string[];
  authUsers: string | null;
}

type Env = Record<string, string | undefined>;

const DEV_JWT_SECRET = "codebridge-dev-secret-change-me";

export function getLimit(env: Env, key: string, fallback: number): number {
  const v = env[key];
  if (!v) return fallback;
  const n = parseInt(v, 10);
  return Number.isFinite(n) && n > 0 ? n : fallback;
}

function getFlag(env: Env, key: string): boolean {
  const v = (env[key] ?? "").trim().toLowerCase();
  return v === "true" || v === "1" || v === "yes";
}

function pick<T extends string>(value: string | undefined, allowed: readonly T[], fallback: T): T {
  const v = (value ?? "").trim().toLowerCase();
  return allowed.find((a) => a === v) ?? fallback;
}

export function parseList(value: string | undefined): string[] {
  return (value ?? "")
    .split(",")
    .map((s) => s.trim())
    .filter(Boolean);
}

export function loadConfig(env: Env = process.env): AppConfig {
  const origins = parseList(env.ALLOWED_ORIGINS);
  return {
    appName: env.APP_NAME?.trim() || "CodeBridge",
    version: env.APP_VERSION?.trim() || "0.1.0",
    debug: getFlag(env, "DEBUG"),
    jwtSecret: env.JWT_SECRET || DEV_JWT_SECRET,
    accessTokenExpireMinutes: getLimit(env, "ACCESS_TOKEN_EXPIRE_MINUTES", 30),
    rateLimitPerMinute: getLimit(env, "RATE_LIMIT_PER_MINUTE", 60),
    strictRateLimitPerMinute: getLimit(env, "STRICT_RATE_LIMIT_PER_MINUTE", 10),
    rateLimitWindowMs: getLimit(env, "RATE_LIMIT_WINDOW_MS", 60_000),
    logLevel: pick(env.LOG_LEVEL, ["debug", "info", "warn", "error"] as const, "info"),
    logFormat: pick(env.LOG_FORMAT, ["json", "text"] as const, "json"),
    store: pick(env.CATALOG_STORE, ["supabase", "memory"] as const, "supabase"),
    supabaseUrl: (env.NEXT_PUBLIC_SUPABASE_URL ?? "").replace(/\/+$/, ""),
    supabaseServiceKey: env.SUPABASE_SERVICE_ROLE_KEY ?? "",
    allowedOrigins: origins.length > 0 ? origins : ["*"],
    authUsers: env.AUTH_USERS?.trim() || null,
  };
}
