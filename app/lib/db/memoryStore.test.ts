import { describe, it, expect, beforeEach } from "vitest";
import type { ContentInput, ProjectInput } from "../../types/catalog";
import { ConflictError, NotFoundError } from "../errors";
import { MemoryCatalogStore } from "./memoryStore";

const NOW = Date.UTC(2026, 0, 1);

function project(n: number, overrides: Partial<ProjectInput> = {}): ProjectInput {
  return {
    platform: "github",
    url: `https://github.com/example/repo-${n}`,
    name: `repo-${n}`,
    description: null,
    stars: n,
    language: "TypeScript",
    topics: [],
    quality_score: null,
    status: "discovered",
    ...overrides,
  };
}

function content(projectId: number, slug: string): ContentInput {
  return {
    project_id: projectId,
    content_type: "blog",
    title: slug,
    slug,
    raw_content: "body",
    enhanced_content: null,
    meta_description: null,
    tags: [],
    status: "draft",
  };
}

describe("MemoryCatalogStore", () => {
  let store: MemoryCatalogStore;

  beforeEach(() => {
    store = new MemoryCatalogStore(() => NOW);
  });

  it("assigns increasing ids and a creation timestamp", async () => {
    const a = await store.createProject(project(1));
    const b = await store.createProject(project(2));
    expect([a.id, b.id]).toEqual([1, 2]);
    expect(a.scraped_at).toBe("2026-01-01T00:00:00.000Z");
  });

  it("rejects a duplicate url with ConflictError", async () => {
    await store.createProject(project(1));
    await expect(store.createProject(project(1))).rejects.toThrow(
      new ConflictError("Project with URL 'https://github.com/example/repo-1' already exists"),
    );
  });

  it("pages and filters projects in id order", async () => {
    for (let i = 1; i <= 25; i++) {
      await store.createProject(project(i, { status: i % 2 === 0 ? "analyzed" : "discovered" }));
    }
    const first = await store.listProjects({}, { skip: 0, limit: 10 });
    expect(first.total).toBe(25);
    expect(first.rows.map((p) => p.id)).toEqual([1, 2, 3, 4, 5, 6, 7, 8, 9, 10]);

    const last = await store.listProjects({}, { skip: 20, limit: 10 });
    expect(last.rows.map((p) => p.id)).toEqual([21, 22, 23, 24, 25]);

    const analyzed = await store.listProjects({ status: "analyzed" }, { skip: 0, limit: 100 });
    expect(analyzed.total).toBe(12);
  });

  it("applies partial updates and ignores undefined fields", async () => {
    const created = await store.createProject(project(1));
    const updated = await store.updateProject(created.id, { stars: 99, name: undefined });
    expect(updated?.stars).toBe(99);
    expect(updated?.name).toBe("repo-1");
    expect(await store.updateProject(42, { stars: 1 })).toBeNull();
  });

  it("rejects an update that takes another project's url", async () => {
    await store.createProject(project(1));
    const b = await store.createProject(project(2));
    await expect(store.updateProject(b.id, { url: "https://github.com/example/repo-1" })).rejects.toBeInstanceOf(
      ConflictError,
    );
  });

  it("returns copies so callers cannot mutate stored rows", async () => {
    const created = await store.createProject(project(1, { topics: ["a"] }));
    created.topics.push("b");
    expect((await store.getProject(created.id))?.topics).toEqual(["a"]);
  });

  it("requires the parent project for content", async () => {
    await expect(store.createContent(content(7, "orphan"))).rejects.toThrow(
      new NotFoundError("Project with ID 7 not found"),
    );
  });

  it("rejects a duplicate slug", async () => {
    const p = await store.createProject(project(1));
    await store.createContent(content(p.id, "intro"));
    await expect(store.createContent(content(p.id, "intro"))).rejects.toBeInstanceOf(ConflictError);
  });

  it("cascades project deletes to content", async () => {
    const keep = await store.createProject(project(1));
    const drop = await store.createProject(project(2));
    await store.createContent(content(keep.id, "kept"));
    await store.createContent(content(drop.id, "gone-1"));
    await store.createContent(content(drop.id, "gone-2"));

    expect(await store.deleteProject(drop.id)).toBe(true);
    expect(await store.getContentBySlug("gone-1")).toBeNull();
    const remaining = await store.listContent({}, { skip: 0, limit: 100 });
    expect(remaining.rows.map((c) => c.slug)).toEqual(["kept"]);
    expect(await store.deleteProject(drop.id)).toBe(false);
  });

  it("reports stats by status", async () => {
    const p = await store.createProject(project(1, { status: "published" }));
    await store.createProject(project(2));
    await store.createContent(content(p.id, "one"));

    expect(await store.stats()).toEqual({
      total_projects: 2,
      total_content: 1,
      project_statuses: { published: 1, discovered: 1 },
      content_statuses: { draft: 1 },
    });
    expect(store.describe()).toEqual({ backend: "memory", projects: 2, content: 1 });
  });
});
