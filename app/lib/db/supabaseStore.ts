import { createClient, type PostgrestError } from "@supabase/supabase-js";
import { z } from "zod";
import {
  CONTENT_STATUSES,
  CONTENT_TYPES,
  PLATFORMS,
  PROJECT_STATUSES,
  type CatalogStats,
  type Content,
  type ContentFilters,
  type ContentInput,
  type ContentPatch,
  type PageRequest,
  type PageResult,
  type Project,
  type ProjectFilters,
  type ProjectInput,
  type ProjectPatch,
} from "../../types/catalog";
import { ConflictError, NotFoundError } from "../errors";
import {
  type CatalogStore,
  duplicateSlugMessage,
  duplicateUrlMessage,
  missingProjectMessage,
  tally,
} from "./catalogStore";

const UNIQUE_VIOLATION = "23505";
const FOREIGN_KEY_VIOLATION = "23503";
// PostgREST: .single() matched zero rows
const NO_ROWS = "PGRST116";
// PostgREST: .range() offset past the last row (HTTP 416)
const RANGE_NOT_SATISFIABLE = "PGRST103";

const projectRow = z.object({
  id: z.number().int(),
  platform: z.enum(PLATFORMS),
  url: z.string(),
  name: z.string(),
  description: z.string().nullable(),
  stars: z.number().int().nullable().transform((v) => v ?? 0),
  language: z.string().nullable(),
  topics: z.array(z.string()).nullable().transform((v) => v ?? []),
  quality_score: z.coerce.number().nullable(),
  status: z.enum(PROJECT_STATUSES),
  scraped_at: z.string(),
});

const contentRow = z.object({
  id: z.number().int(),
  project_id: z.number().int(),
  content_type: z.enum(CONTENT_TYPES),
  title: z.string(),
  slug: z.string(),
  raw_content: z.string(),
  enhanced_content: z.string().nullable(),
  meta_description: z.string().nullable(),
  tags: z.array(z.string()).nullable().transform((v) => v ?? []),
  status: z.enum(CONTENT_STATUSES),
  created_at: z.string(),
});

const statusRow = z.object({ status: z.string() });

export class StoreError extends Error {
  constructor(
    operation: string,
    readonly pgError: PostgrestError,
  ) {
    super(`${operation} failed: ${pgError.message}`);
    this.name = "StoreError";
  }
}

type ServiceClient = ReturnType<typeof createClient>;

export interface SupabaseStoreOptions {
  url: string;
  serviceKey: string;
  /** Replaces the global fetch for every request the client makes. */
  fetch?: typeof fetch;
}

/**
 * Service-role client: bypasses RLS. Route handlers gate access themselves
 * through apiAuth before reaching the store.
 */
export function createServiceClient({ url, serviceKey, fetch }: SupabaseStoreOptions): ServiceClient {
  if (!url || !serviceKey) {
    throw new Error(
      "Missing NEXT_PUBLIC_SUPABASE_URL or SUPABASE_SERVICE_ROLE_KEY. Set CATALOG_STORE=memory to run without Supabase.",
    );
  }
  return createClient(url, serviceKey, {
    auth: { autoRefreshToken: false, persistSession: false },
    global: fetch ? { fetch } : {},
  });
}

export class SupabaseCatalogStore implements CatalogStore {
  private client: ServiceClient | null = null;

  constructor(private readonly options: SupabaseStoreOptions) {}

  // Created on first use so a misconfigured deployment still serves /health.
  private db(): ServiceClient {
    if (!this.client) this.client = createServiceClient(this.options);
    return this.client;
  }

  private projectQuery(filters: ProjectFilters, head = false) {
    let query = this.db().from("projects").select("*", { count: "exact", head });
    if (filters.platform !== undefined) query = query.eq("platform", filters.platform);
    if (filters.status !== undefined) query = query.eq("status", filters.status);
    if (filters.language !== undefined) query = query.eq("language", filters.language);
    return query;
  }

  async listProjects(filters: ProjectFilters, { skip, limit }: PageRequest): Promise<PageResult<Project>> {
    const { data, error, count } = await this.projectQuery(filters)
      .order("id", { ascending: true })
      .range(skip, skip + limit - 1);
    if (error) {
      if (error.code === RANGE_NOT_SATISFIABLE) {
        return { rows: [], total: await this.countOnly("listProjects", this.projectQuery(filters, true)) };
      }
      throw new StoreError("listProjects", error);
    }
    return { rows: z.array(projectRow).parse(data ?? []), total: count ?? 0 };
  }

  async getProject(id: number): Promise<Project | null> {
    return this.maybeOne("getProject", projectRow, this.db().from("projects").select("*").eq("id", id).maybeSingle());
  }

  async getProjectByUrl(url: string): Promise<Project | null> {
    return this.maybeOne("getProjectByUrl", projectRow, this.db().from("projects").select("*").eq("url", url).maybeSingle());
  }

  async createProject(input: ProjectInput): Promise<Project> {
    const { data, error } = await this.db().from("projects").insert(input).select().single();
    if (error) {
      if (error.code === UNIQUE_VIOLATION) throw new ConflictError(duplicateUrlMessage(input.url));
      throw new StoreError("createProject", error);
    }
    return projectRow.parse(data);
  }

  async updateProject(id: number, patch: ProjectPatch): Promise<Project | null> {
    const { data, error } = await this.db().from("projects").update(patch).eq("id", id).select().maybeSingle();
    if (error) {
      if (error.code === UNIQUE_VIOLATION) throw new ConflictError(duplicateUrlMessage(patch.url ?? ""));
      throw new StoreError("updateProject", error);
    }
    return data ? projectRow.parse(data) : null;
  }

  async deleteProject(id: number): Promise<boolean> {
    // content rows go with it through ON DELETE CASCADE
    const { data, error } = await this.db().from("projects").delete().eq("id", id).select("id");
    if (error) throw new StoreError("deleteProject", error);
    return (data ?? []).length > 0;
  }

  private contentQuery(filters: ContentFilters, head = false) {
    let query = this.db().from("content").select("*", { count: "exact", head });
    if (filters.project_id !== undefined) query = query.eq("project_id", filters.project_id);
    if (filters.content_type !== undefined) query = query.eq("content_type", filters.content_type);
    if (filters.status !== undefined) query = query.eq("status", filters.status);
    return query;
  }

  async listContent(filters: ContentFilters, { skip, limit }: PageRequest): Promise<PageResult<Content>> {
    const { data, error, count } = await this.contentQuery(filters)
      .order("id", { ascending: true })
      .range(skip, skip + limit - 1);
    if (error) {
      if (error.code === RANGE_NOT_SATISFIABLE) {
        return { rows: [], total: await this.countOnly("listContent", this.contentQuery(filters, true)) };
      }
      throw new StoreError("listContent", error);
    }
    return { rows: z.array(contentRow).parse(data ?? []), total: count ?? 0 };
  }

  async getContent(id: number): Promise<Content | null> {
    return this.maybeOne("getContent", contentRow, this.db().from("content").select("*").eq("id", id).maybeSingle());
  }

  async getContentBySlug(slug: string): Promise<Content | null> {
    return this.maybeOne("getContentBySlug", contentRow, this.db().from("content").select("*").eq("slug", slug).maybeSingle());
  }

  async createContent(input: ContentInput): Promise<Content> {
    const { data, error } = await this.db().from("content").insert(input).select().single();
    if (error) {
      if (error.code === UNIQUE_VIOLATION) throw new ConflictError(duplicateSlugMessage(input.slug));
      if (error.code === FOREIGN_KEY_VIOLATION) throw new NotFoundError(missingProjectMessage(input.project_id));
      throw new StoreError("createContent", error);
    }
    return contentRow.parse(data);
  }

  async updateContent(id: number, patch: ContentPatch): Promise<Content | null> {
    const { data, error } = await this.db().from("content").update(patch).eq("id", id).select().maybeSingle();
    if (error) {
      if (error.code === UNIQUE_VIOLATION) throw new ConflictError(duplicateSlugMessage(patch.slug ?? ""));
      if (error.code === FOREIGN_KEY_VIOLATION) {
        throw new NotFoundError(missingProjectMessage(patch.project_id ?? 0));
      }
      throw new StoreError("updateContent", error);
    }
    return data ? contentRow.parse(data) : null;
  }

  async deleteContent(id: number): Promise<boolean> {
    const { data, error } = await this.db().from("content").delete().eq("id", id).select("id");
    if (error) throw new StoreError("deleteContent", error);
    return (data ?? []).length > 0;
  }

  async ping(): Promise<boolean> {
    const { error } = await this.db().from("projects").select("id", { count: "exact", head: true });
    return !error;
  }

  async stats(): Promise<CatalogStats> {
    const [projects, content] = await Promise.all([
      this.db().from("projects").select("status"),
      this.db().from("content").select("status"),
    ]);
    if (projects.error) throw new StoreError("stats", projects.error);
    if (content.error) throw new StoreError("stats", content.error);

    const projectRows = z.array(statusRow).parse(projects.data ?? []);
    const contentRows = z.array(statusRow).parse(content.data ?? []);
    return {
      total_projects: projectRows.length,
      total_content: contentRows.length,
      project_statuses: tally(projectRows),
      content_statuses: tally(contentRows),
    };
  }

  describe(): Record<string, string | number> {
    const host = /^https?:\/\/([^/?#]+)/.exec(this.options.url)?.[1] ?? "unknown";
    return { backend: "supabase", host };
  }

  // Count-only (HEAD) request for a page that starts past the last row.
  private async countOnly(
    operation: string,
    request: PromiseLike<{ error: PostgrestError | null; count: number | null }>,
  ): Promise<number> {
    const { error, count } = await request;
    if (error) throw new StoreError(operation, error);
    return count ?? 0;
  }

  private async maybeOne<S extends z.ZodTypeAny>(
    operation: string,
    schema: S,
    request: PromiseLike<{ data: unknown; error: PostgrestError | null }>,
  ): Promise<z.output<S> | null> {
    const { data, error } = await request;
    if (error) {
      if (error.code === NO_ROWS) return null;
      throw new StoreError(operation, error);
    }
    return data == null ? null : schema.parse(data);
  }
}
