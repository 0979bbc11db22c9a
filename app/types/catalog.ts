export const PLATFORMS = ["github", "huggingface", "gitlab", "kaggle", "bitbucket"] as const;
export type Platform = (typeof PLATFORMS)[number];

export const PROJECT_STATUSES = ["discovered", "analyzed", "processed", "published", "archived"] as const;
export type ProjectStatus = (typeof PROJECT_STATUSES)[number];

export const CONTENT_TYPES = ["blog", "article", "tutorial", "guide", "review"] as const;
export type ContentType = (typeof CONTENT_TYPES)[number];

export const CONTENT_STATUSES = ["draft", "enhanced", "published", "archived"] as const;
export type ContentStatus = (typeof CONTENT_STATUSES)[number];

export interface Project {
  id: number;
  platform: Platform;
  url: string;
  name: string;
  description: string | null;
  stars: number;
  language: string | null;
  topics: string[];
  quality_score: number | null;
  status: ProjectStatus;
  scraped_at: string;
}

export type ProjectInput = Omit<Project, "id" | "scraped_at">;
export type ProjectPatch = Partial<ProjectInput>;

export interface Content {
  id: number;
  project_id: number;
  content_type: ContentType;
  title: string;
  slug: string;
  raw_content: string;
  enhanced_content: string | null;
  meta_description: string | null;
  tags: string[];
  status: ContentStatus;
  created_at: string;
}

export type ContentInput = Omit<Content, "id" | "created_at">;
export type ContentPatch = Partial<ContentInput>;

export interface ProjectFilters {
  platform?: string;
  status?: string;
  language?: string;
}

export interface ContentFilters {
  project_id?: number;
  content_type?: string;
  status?: string;
}

export interface PageRequest {
  skip: number;
  limit: number;
}

export interface PageResult<T> {
  rows: T[];
  total: number;
}

export interface CatalogStats {
  total_projects: number;
  total_content: number;
  project_statuses: Record<string, number>;
  content_statuses: Record<string, number>;
}
