import { describe, expect, it } from "vitest";
import type { ContentInput } from "../../types/catalog";
import { ConflictError, NotFoundError } from "../errors";
import { StoreError, SupabaseCatalogStore, createServiceClient } from "./supabaseStore";

const URL_BASE = "https://catalog.example.co";

interface Reply {
  status: number;
  body?: unknown;
  headers?: Record<string, string>;
}

interface SeenRequest {
  method: string;
  url: URL;
}

/**
 * Stand-in for the PostgREST endpoint: `route` answers each request the
 * client sends, and every request is recorded in `calls`.
 */
function fakePostgrest(route: (req: SeenRequest) => Reply) {
  const calls: SeenRequest[] = [];
  const fetchImpl: typeof fetch = async (input, init) => {
    const href = typeof input === "string" ? input : input instanceof URL ? input.href : input.url;
    const req: SeenRequest = { method: init?.method ?? "GET", url: new URL(href) };
    calls.push(req);
    const reply = route(req);
    const body = req.method === "HEAD" || reply.body === undefined ? null : JSON.stringify(reply.body);
    return new Response(body, {
      status: reply.status,
      headers: { "content-type": "application/json", ...reply.headers },
    });
  };
  const store = new SupabaseCatalogStore({ url: URL_BASE, serviceKey: "test-secret", fetch: fetchImpl });
  return { store, calls };
}

const projectRecord = {
  id: 1,
  platform: "github",
  url: "https://github.com/example/repo-1",
  name: "repo-1",
  description: null,
  stars: 3,
  language: "TypeScript",
  topics: ["cli"],
  quality_score: 7.5,
  status: "analyzed",
  scraped_at: "2026-01-01T00:00:00+00:00",
};

const contentInput: ContentInput = {
  project_id: 7,
  content_type: "blog",
  title: "Post",
  slug: "post",
  raw_content: "body",
  enhanced_content: null,
  meta_description: null,
  tags: [],
  status: "draft",
};

const rangeNotSatisfiable: Reply = {
  status: 416,
  body: {
    code: "PGRST103",
    details: "An offset of 100 was requested, but there are only 25 rows.",
    hint: null,
    message: "Requested range not satisfiable",
  },
};

describe("SupabaseCatalogStore queries", () => {
  it("reads a page and the exact count", async () => {
    const { store, calls } = fakePostgrest(() => ({
      status: 200,
      body: [projectRecord],
      headers: { "content-range": "0-0/25" },
    }));

    const page = await store.listProjects({ platform: "github" }, { skip: 0, limit: 10 });
    expect(page.total).toBe(25);
    expect(page.rows.map((p) => p.name)).toEqual(["repo-1"]);

    const params = calls[0]?.url.searchParams;
    expect(params?.get("platform")).toBe("eq.github");
    expect(params?.get("order")).toBe("id.asc");
    expect(params?.get("offset")).toBe("0");
    expect(params?.get("limit")).toBe("10");
  });

  it("returns an empty project page with the total when skip is past the end", async () => {
    const { store, calls } = fakePostgrest((req) =>
      req.method === "HEAD" ? { status: 200, headers: { "content-range": "*/25" } } : rangeNotSatisfiable,
    );

    await expect(store.listProjects({ status: "analyzed" }, { skip: 100, limit: 10 })).resolves.toEqual({
      rows: [],
      total: 25,
    });
    expect(calls.map((c) => c.method)).toEqual(["GET", "HEAD"]);
    expect(calls[1]?.url.searchParams.get("status")).toBe("eq.analyzed");
  });

  it("returns an empty content page with the total when skip is past the end", async () => {
    const { store } = fakePostgrest((req) =>
      req.method === "HEAD" ? { status: 200, headers: { "content-range": "*/4" } } : rangeNotSatisfiable,
    );

    await expect(store.listContent({ project_id: 2 }, { skip: 100, limit: 10 })).resolves.toEqual({
      rows: [],
      total: 4,
    });
  });

  it("returns null for a missing row", async () => {
    const { store } = fakePostgrest(() => ({ status: 200, body: [] }));
    await expect(store.getProject(9)).resolves.toBeNull();
  });

  it("returns null when an update matches no rows", async () => {
    const { store } = fakePostgrest(() => ({
      status: 406,
      body: {
        code: "PGRST116",
        details: "The result contains 0 rows",
        hint: null,
        message: "JSON object requested, multiple (or no) rows returned",
      },
    }));
    await expect(store.updateProject(9, { stars: 1 })).resolves.toBeNull();
  });

  it("maps a unique violation to ConflictError", async () => {
    const { store } = fakePostgrest(() => ({
      status: 409,
      body: {
        code: "23505",
        details: "Key (url)=(https://github.com/example/repo-1) already exists.",
        hint: null,
        message: 'duplicate key value violates unique constraint "projects_url_key"',
      },
    }));

    const { id: _id, scraped_at: _at, ...input } = projectRecord;
    await expect(
      store.createProject({ ...input, platform: "github", status: "analyzed" }),
    ).rejects.toThrow(new ConflictError("Project with URL 'https://github.com/example/repo-1' already exists"));
  });

  it("maps a foreign key violation to NotFoundError", async () => {
    const { store } = fakePostgrest(() => ({
      status: 409,
      body: {
        code: "23503",
        details: 'Key (project_id)=(7) is not present in table "projects".',
        hint: null,
        message: 'insert or update on table "content" violates foreign key constraint "content_project_id_fkey"',
      },
    }));
    await expect(store.createContent(contentInput)).rejects.toThrow(new NotFoundError("Project with ID 7 not found"));
  });

  it("wraps any other database error in StoreError", async () => {
    const { store } = fakePostgrest(() => ({ status: 500, body: { code: "XX000", message: "boom" } }));

    const failure = store.getProject(1);
    await expect(failure).rejects.toBeInstanceOf(StoreError);
    await expect(failure).rejects.toThrow("getProject failed: boom");
  });

  it("reports whether a delete removed a row", async () => {
    const removed = fakePostgrest(() => ({ status: 200, body: [{ id: 1 }] }));
    await expect(removed.store.deleteProject(1)).resolves.toBe(true);
    expect(removed.calls[0]?.method).toBe("DELETE");

    const missing = fakePostgrest(() => ({ status: 200, body: [] }));
    await expect(missing.store.deleteContent(1)).resolves.toBe(false);
  });

  it("pings with a head request", async () => {
    const up = fakePostgrest(() => ({ status: 200, headers: { "content-range": "*/0" } }));
    await expect(up.store.ping()).resolves.toBe(true);
    expect(up.calls[0]?.method).toBe("HEAD");

    const down = fakePostgrest(() => ({ status: 503 }));
    await expect(down.store.ping()).resolves.toBe(false);
  });

  it("tallies statuses for stats", async () => {
    const { store } = fakePostgrest((req) =>
      req.url.pathname.endsWith("/projects")
        ? { status: 200, body: [{ status: "analyzed" }, { status: "analyzed" }, { status: "archived" }] }
        : { status: 200, body: [{ status: "draft" }] },
    );

    await expect(store.stats()).resolves.toEqual({
      total_projects: 3,
      total_content: 1,
      project_statuses: { analyzed: 2, archived: 1 },
      content_statuses: { draft: 1 },
    });
  });
});

describe("SupabaseCatalogStore", () => {
  it("describes the connection without credentials", () => {
    const store = new SupabaseCatalogStore({ url: URL_BASE, serviceKey: "test-secret" });
    expect(store.describe()).toEqual({ backend: "supabase", host: "catalog.example.co" });
  });

  it("reports an unknown host for a missing url", () => {
    const store = new SupabaseCatalogStore({ url: "", serviceKey: "" });
    expect(store.describe()).toEqual({ backend: "supabase", host: "unknown" });
  });

  it("defers the configuration error until first use", async () => {
    const store = new SupabaseCatalogStore({ url: "", serviceKey: "" });
    await expect(store.getProject(1)).rejects.toThrow(/^Missing NEXT_PUBLIC_SUPABASE_URL or SUPABASE_SERVICE_ROLE_KEY/);
  });
});

describe("createServiceClient", () => {
  it("requires both url and key", () => {
    expect(() => createServiceClient({ url: URL_BASE, serviceKey: "" })).toThrow(/SUPABASE_SERVICE_ROLE_KEY/);
  });

  it("builds a client from a url and key", () => {
    const client = createServiceClient({ url: URL_BASE, serviceKey: "test-secret" });
    expect(typeof client.from).toBe("function");
  });
});
