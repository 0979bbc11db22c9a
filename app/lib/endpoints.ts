// Endpoint map advertised by the index and health routes.
export const ENDPOINTS = {
  health: "/api/health",
  health_simple: "/api/health/simple",
  health_database: "/api/health/database",
  login: "/api/auth/login",
  me: "/api/auth/me",
  logout: "/api/auth/logout",
  projects: "/api/projects",
  content: "/api/content",
  content_by_slug: "/api/content/by-slug/{slug}",
} as const;
