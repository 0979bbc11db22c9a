import type { Content } from "../types/catalog";

export interface PageMeta {
  total: number;
  page: number;
  per_page: number;
  pages: number;
}

export function pageMeta(total: number, skip: number, limit: number): PageMeta {
  return {
    total,
    page: Math.floor(skip / limit) + 1,
    per_page: limit,
    pages: Math.ceil(total / limit),
  };
}

type ContentSummary = Omit<Content, "raw_content" | "enhanced_content"> & {
  raw_content_length: number;
  enhanced_content_length: number;
};

// Length in code points, so an emoji counts once.
function charCount(s: string): number {
  return [...s].length;
}

// List rows carry body lengths, not bodies.
export function contentSummary(c: Content): ContentSummary {
  const { raw_content, enhanced_content, ...rest } = c;
  return {
    ...rest,
    raw_content_length: charCount(raw_content),
    enhanced_content_length: enhanced_content ? charCount(enhanced_content) : 0,
  };
}

export function contentDetail(
  c: Content,
  include: { include_raw: boolean; include_enhanced: boolean },
): ContentSummary & { raw_content?: string; enhanced_content?: string } {
  const out: ContentSummary & { raw_content?: string; enhanced_content?: string } = contentSummary(c);
  if (include.include_raw && c.raw_content) out.raw_content = c.raw_content;
  if (include.include_enhanced && c.enhanced_content) out.enhanced_content = c.enhanced_content;
  return out;
}
