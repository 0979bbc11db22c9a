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

/**
 * Persistence seam for projects and content.
 *
 * Implementations enforce the natural-key uniqueness (project url, content
 * slug) by throwing ConflictError, reject content pointing at a missing
 * project with NotFoundError, and cascade project deletes to its content.
 * Lists are ordered by id ascending.
 */
export interface CatalogStore {
  listProjects(filters: ProjectFilters, page: PageRequest): Promise<PageResult<Project>>;
  getProject(id: number): Promise<Project | null>;
  getProjectByUrl(url: string): Promise<Project | null>;
  createProject(input: ProjectInput): Promise<Project>;
  /** Returns null when the id does not exist. */
  updateProject(id: number, patch: ProjectPatch): Promise<Project | null>;
  /** Returns false when the id does not exist. */
  deleteProject(id: number): Promise<boolean>;

  listContent(filters: ContentFilters, page: PageRequest): Promise<PageResult<Content>>;
  getContent(id: number): Promise<Content | null>;
  getContentBySlug(slug: string): Promise<Content | null>;
  createContent(input: ContentInput): Promise<Content>;
  updateContent(id: number, patch: ContentPatch): Promise<Content | null>;
  deleteContent(id: number): Promise<boolean>;

  ping(): Promise<boolean>;
  stats(): Promise<CatalogStats>;
  /** Connection summary for health output. Never includes credentials. */
  describe(): Record<string, string | number>;
}

export function duplicateUrlMessage(url: string): string {
  return `Project with URL '${url}' already exists`;
}

export function duplicateSlugMessage(slug: string): string {
  return `Content with slug '${slug}' already exists`;
}

export function missingProjectMessage(id: number): string {
  return `Project with ID ${id} not found`;
}

/** Count rows per status value. */
export function tally(rows: Iterable<{ status: string }>): Record<string, number> {
  const out: Record<string, number> = {};
  for (const r of rows) out[r.status] = (out[r.status] ?? 0) + 1;
  return out;
}
