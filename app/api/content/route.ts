/**
 * GET  /api/content: list content (optional auth), filterable by
 *                     project_id, content_type and status. Rows carry body
 *                     lengths instead of bodies.
 * POST /api/content: create content for an existing project (requires "write").
 */

import { NextResponse } from "next/server";
import { optionalUser, requireUserWith } from "../../lib/apiAuth";
import { ConflictError, NotFoundError, ValidationError } from "../../lib/errors";
import { duplicateSlugMessage, missingProjectMessage } from "../../lib/db/catalogStore";
import { apiRoute, readJson } from "../../lib/route";
import { contentCreateSchema, paginationSchema, parseOrThrow } from "../../lib/schemas";
import { contentSummary, pageMeta } from "../../lib/serialize";
import { getServices } from "../../lib/services";
import type { ContentFilters } from "../../types/catalog";

export const GET = apiRoute(async (req) => {
  const { store, logger } = getServices();
  const params = req.nextUrl.searchParams;
  const { skip, limit } = parseOrThrow(
    paginationSchema,
    { skip: params.get("skip"), limit: params.get("limit") },
    "Invalid pagination parameters",
  );
  const user = await optionalUser(req);

  const filters: ContentFilters = {};
  const projectId = params.get("project_id");
  const contentType = params.get("content_type");
  const status = params.get("status");
  if (projectId) {
    if (!/^\d+$/.test(projectId)) {
      throw new ValidationError("Invalid filter parameters", { project_id: "must be an integer" });
    }
    const id = parseInt(projectId, 10);
    // project_id=0 names no project and leaves the list unfiltered
    if (id > 0) filters.project_id = id;
  }
  if (contentType) filters.content_type = contentType.toLowerCase();
  if (status) filters.status = status.toLowerCase();

  const { rows, total } = await store.listContent(filters, { skip, limit });

  logger.info(`Listed ${rows.length} content items`, {
    user: user?.username ?? "anonymous",
    filters,
    pagination: { skip, limit },
  });

  return NextResponse.json({
    ok: true,
    content: rows.map(contentSummary),
    ...pageMeta(total, skip, limit),
  });
});

export const POST = apiRoute(async (req) => {
  const user = await requireUserWith(req, "write");
  const { store, logger } = getServices();
  const input = parseOrThrow(contentCreateSchema, await readJson(req));

  if (!(await store.getProject(input.project_id))) {
    throw new NotFoundError(missingProjectMessage(input.project_id));
  }
  if (await store.getContentBySlug(input.slug)) {
    throw new ConflictError(duplicateSlugMessage(input.slug));
  }
  const content = await store.createContent(input);

  logger.info(`Created new content: ${content.title}`, {
    user: user.username,
    content_id: content.id,
    project_id: content.project_id,
    content_type: content.content_type,
  });

  return NextResponse.json({ ok: true, content }, { status: 201 });
});
