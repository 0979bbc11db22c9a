import type { CatalogStore } from "./db/catalogStore";
import type { Logger } from "./logger";
import type { ContentInput, ProjectInput } from "../types/catalog";

export interface SeedResult {
  projects: { created: number; skipped: number };
  content: { created: number; skipped: number };
}

const SAMPLE_PROJECTS: ProjectInput[] = [
  {
    platform: "github",
    url: "https://github.com/example/markdown-lint",
    name: "markdown-lint",
    description: "Pluggable linter for Markdown documents",
    stars: 4200,
    language: "TypeScript",
    topics: ["markdown", "linter", "cli"],
    quality_score: 8.9,
    status: "analyzed",
  },
  {
    platform: "gitlab",
    url: "https://gitlab.com/example/queue-runner",
    name: "queue-runner",
    description: "Small job queue with retries and dead-lettering",
    stars: 860,
    language: "Go",
    topics: ["queue", "jobs", "workers"],
    quality_score: 7.4,
    status: "discovered",
  },
  {
    platform: "huggingface",
    url: "https://huggingface.co/example/tiny-summarizer",
    name: "tiny-summarizer",
    description: "Compact abstractive summarization model",
    stars: 120,
    language: "Python",
    topics: ["nlp", "summarization"],
    quality_score: 6.8,
    status: "discovered",
  },
];

type SampleContent = Omit<ContentInput, "project_id"> & { projectUrl: string };

const SAMPLE_CONTENT: SampleContent[] = [
  {
    projectUrl: "https://github.com/example/markdown-lint",
    content_type: "blog",
    title: "Keeping Docs Tidy with markdown-lint",
    slug: "keeping-docs-tidy-markdown-lint",
    raw_content: "# markdown-lint\n\nA linter for Markdown files...",
    enhanced_content: "# Keeping Docs Tidy\n\nConsistent docs start with a linter...",
    meta_description: "How markdown-lint keeps documentation consistent.",
    tags: ["markdown", "docs", "tooling"],
    status: "published",
  },
  {
    projectUrl: "https://gitlab.com/example/queue-runner",
    content_type: "tutorial",
    title: "Your First Job with queue-runner",
    slug: "first-job-queue-runner",
    raw_content: "# queue-runner tutorial\n\nDefine a job, enqueue it...",
    enhanced_content: null,
    meta_description: "Enqueue and retry jobs with queue-runner.",
    tags: ["queue", "tutorial"],
    status: "draft",
  },
];

/** Insert demo records, skipping any whose url or slug is already present. */
export async function seedCatalog(store: CatalogStore, logger?: Logger): Promise<SeedResult> {
  const result: SeedResult = {
    projects: { created: 0, skipped: 0 },
    content: { created: 0, skipped: 0 },
  };
  const idsByUrl = new Map<string, number>();

  for (const input of SAMPLE_PROJECTS) {
    const existing = await store.getProjectByUrl(input.url);
    if (existing) {
      idsByUrl.set(input.url, existing.id);
      result.projects.skipped++;
      continue;
    }
    const project = await store.createProject(input);
    idsByUrl.set(input.url, project.id);
    result.projects.created++;
    logger?.debug(`Seeded project: ${project.name}`, { project_id: project.id });
  }

  for (const { projectUrl, ...input } of SAMPLE_CONTENT) {
    const projectId = idsByUrl.get(projectUrl);
    if (projectId === undefined || (await store.getContentBySlug(input.slug))) {
      result.content.skipped++;
      continue;
    }
    const content = await store.createContent({ ...input, project_id: projectId });
    result.content.created++;
    logger?.debug(`Seeded content: ${content.title}`, { content_id: content.id });
  }

  logger?.info("Catalog seeding completed", { ...result });
  return result;
}
