import type {
  CatalogStats,
  Content,
  ContentFilters,
  ContentInput,
  ContentPatch,
  PageRequest,
  PageResult,
  Project,
  ProjectFilters,
  ProjectInput,
  ProjectPatch,
} from "../../types/catalog";
import { ConflictError, NotFoundError } from "../errors";
import type { Clock } from "../rateLimit";
import {
  type CatalogStore,
  duplicateSlugMessage,
  duplicateUrlMessage,
  missingProjectMessage,
  tally,
} from "./catalogStore";

function page<T>(rows: T[], { skip, limit }: PageRequest): PageResult<T> {
  return { rows: rows.slice(skip, skip + limit), total: rows.length };
}

// Keys explicitly set to undefined must not clobber stored values.
function applyPatch<T extends object>(current: T, patch: Partial<T>): T {
  const next: T = { ...current };
  for (const key in patch) {
    const value = patch[key];
    if (value !== undefined) next[key] = structuredClone(value);
  }
  return next;
}

/**
 * In-process catalog for local runs (CATALOG_STORE=memory) and tests.
 * Mirrors the Postgres constraints in supabase/migrations.
 */
export class MemoryCatalogStore implements CatalogStore {
  private readonly projects = new Map<number, Project>();
  private readonly content = new Map<number, Content>();
  private nextProjectId = 1;
  private nextContentId = 1;

  constructor(private readonly now: Clock = Date.now) {}

  async listProjects(filters: ProjectFilters, req: PageRequest): Promise<PageResult<Project>> {
    const rows = [...this.projects.values()].filter(
      (p) =>
        (filters.platform === undefined || p.platform === filters.platform) &&
        (filters.status === undefined || p.status === filters.status) &&
        (filters.language === undefined || p.language === filters.language),
    );
    return page(rows.map((p) => structuredClone(p)), req);
  }

  async getProject(id: number): Promise<Project | null> {
    const p = this.projects.get(id);
    return p ? structuredClone(p) : null;
  }

  async getProjectByUrl(url: string): Promise<Project | null> {
    for (const p of this.projects.values()) {
      if (p.url === url) return structuredClone(p);
    }
    return null;
  }

  async createProject(input: ProjectInput): Promise<Project> {
    if (await this.getProjectByUrl(input.url)) {
      throw new ConflictError(duplicateUrlMessage(input.url));
    }
    const project: Project = {
      ...structuredClone(input),
      id: this.nextProjectId++,
      scraped_at: new Date(this.now()).toISOString(),
    };
    this.projects.set(project.id, project);
    return structuredClone(project);
  }

  async updateProject(id: number, patch: ProjectPatch): Promise<Project | null> {
    const current = this.projects.get(id);
    if (!current) return null;
    if (patch.url !== undefined && patch.url !== current.url) {
      const holder = await this.getProjectByUrl(patch.url);
      if (holder && holder.id !== id) throw new ConflictError(duplicateUrlMessage(patch.url));
    }
    const next: Project = { ...applyPatch<Project>(current, patch), id };
    this.projects.set(id, next);
    return structuredClone(next);
  }

  async deleteProject(id: number): Promise<boolean> {
    if (!this.projects.delete(id)) return false;
    for (const [cid, c] of this.content) {
      if (c.project_id === id) this.content.delete(cid);
    }
    return true;
  }

  async listContent(filters: ContentFilters, req: PageRequest): Promise<PageResult<Content>> {
    const rows = [...this.content.values()].filter(
      (c) =>
        (filters.project_id === undefined || c.project_id === filters.project_id) &&
        (filters.content_type === undefined || c.content_type === filters.content_type) &&
        (filters.status === undefined || c.status === filters.status),
    );
    return page(rows.map((c) => structuredClone(c)), req);
  }

  async getContent(id: number): Promise<Content | null> {
    const c = this.content.get(id);
    return c ? structuredClone(c) : null;
  }

  async getContentBySlug(slug: string): Promise<Content | null> {
    for (const c of this.content.values()) {
      if (c.slug === slug) return structuredClone(c);
    }
    return null;
  }

  async createContent(input: ContentInput): Promise<Content> {
    if (!this.projects.has(input.project_id)) {
      throw new NotFoundError(missingProjectMessage(input.project_id));
    }
    if (await this.getContentBySlug(input.slug)) {
      throw new ConflictError(duplicateSlugMessage(input.slug));
    }
    const item: Content = {
      ...structuredClone(input),
      id: this.nextContentId++,
      created_at: new Date(this.now()).toISOString(),
    };
    this.content.set(item.id, item);
    return structuredClone(item);
  }

  async updateContent(id: number, patch: ContentPatch): Promise<Content | null> {
    const current = this.content.get(id);
    if (!current) return null;
    if (patch.project_id !== undefined && !this.projects.has(patch.project_id)) {
      throw new NotFoundError(missingProjectMessage(patch.project_id));
    }
    if (patch.slug !== undefined && patch.slug !== current.slug) {
      const holder = await this.getContentBySlug(patch.slug);
      if (holder && holder.id !== id) throw new ConflictError(duplicateSlugMessage(patch.slug));
    }
    const next: Content = { ...applyPatch<Content>(current, patch), id };
    this.content.set(id, next);
    return structuredClone(next);
  }

  async deleteContent(id: number): Promise<boolean> {
    return this.content.delete(id);
  }

  async ping(): Promise<boolean> {
    return true;
  }

  async stats(): Promise<CatalogStats> {
    return {
      total_projects: this.projects.size,
      total_content: this.content.size,
      project_statuses: tally(this.projects.values()),
      content_statuses: tally(this.content.values()),
    };
  }

  describe(): Record<string, string | number> {
    return { backend: "memory", projects: this.projects.size, content: this.content.size };
  }
}
