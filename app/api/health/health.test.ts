import { afterEach, describe, expect, it } from "vitest";
import { MemoryCatalogStore } from "../../lib/db/memoryStore";
import { createServices, setServices } from "../../lib/services";
import { apiRequest, installTestServices, noParams } from "../../lib/testing";
import { GET as health } from "./route";
import { GET as database } from "./database/route";
import { GET as simple } from "./simple/route";
import { GET as index } from "../../route";
import type { CatalogStats } from "../../types/catalog";

afterEach(() => setServices(null));

describe("health routes", () => {
  it("reports detailed status", async () => {
    installTestServices({ config: { version: "1.2.3" } });
    const body = await (await health(apiRequest("/api/health"), noParams)).json();
    expect(body).toMatchObject({
      status: "healthy",
      version: "1.2.3",
      app_name: "CodeBridge",
      environment: "production",
      features: { store: "supabase" },
      endpoints: { health_simple: "/api/health/simple" },
    });
    expect(typeof body.system.cpu_count).toBe("number");
  });

  it("answers the liveness probe without admission", async () => {
    installTestServices({ config: { rateLimitPerMinute: 1 } });
    for (let i = 0; i < 3; i++) {
      const res = await simple(apiRequest("/api/health/simple"), noParams);
      expect(res.status).toBe(200);
      expect(await res.json()).toMatchObject({ status: "healthy", message: "Service is running" });
    }
  });

  it("reports store connectivity and statistics", async () => {
    const harness = installTestServices();
    await harness.store.createProject({
      platform: "kaggle",
      url: "https://kaggle.com/example/data",
      name: "data",
      description: null,
      stars: 0,
      language: null,
      topics: [],
      quality_score: null,
      status: "processed",
    });

    const body = await (await database(apiRequest("/api/health/database"), noParams)).json();
    expect(body).toMatchObject({
      status: "healthy",
      database: {
        connected: true,
        connection_info: { backend: "memory", projects: 1, content: 0 },
        statistics: {
          total_projects: 1,
          total_content: 0,
          project_statuses: { processed: 1 },
          content_statuses: {},
        },
      },
    });
  });

  it("degrades when statistics fail", async () => {
    class FailingStatsStore extends MemoryCatalogStore {
      override async stats(): Promise<CatalogStats> {
        throw new Error("boom");
      }
    }
    setServices(
      createServices({ env: {}, store: new FailingStatsStore(), config: { logLevel: "error", jwtSecret: "test-secret" } }),
    );

    const body = await (await database(apiRequest("/api/health/database"), noParams)).json();
    expect(body.database).toMatchObject({ connected: true, statistics: { error: "Stats unavailable" } });
  });
});

describe("GET /", () => {
  it("returns the welcome document", async () => {
    installTestServices();
    const body = await (await index(apiRequest("/"), noParams)).json();
    expect(body).toMatchObject({
      message: "Welcome to CodeBridge",
      version: "0.1.0",
      status: "running",
      endpoints: { projects: "/api/projects" },
    });
  });
});
