/**
 * GET  /api/projects: list projects (optional auth), filterable by
 *                      platform, status and language, paginated by skip/limit.
 * POST /api/projects: create a project (requires "write").
 */

import { NextResponse } from "next/server";
import { optionalUser, requireUserWith } from "../../lib/apiAuth";
import { ConflictError } from "../../lib/errors";
import { duplicateUrlMessage } from "../../lib/db/catalogStore";
import { apiRoute, readJson } from "../../lib/route";
import { paginationSchema, parseOrThrow, projectCreateSchema } from "../../lib/schemas";
import { pageMeta } from "../../lib/serialize";
import { getServices } from "../../lib/services";
import type { ProjectFilters } from "../../types/catalog";

export const GET = apiRoute(async (req) => {
  const { store, logger } = getServices();
  const params = req.nextUrl.searchParams;
  const { skip, limit } = parseOrThrow(
    paginationSchema,
    { skip: params.get("skip"), limit: params.get("limit") },
    "Invalid pagination parameters",
  );
  const user = await optionalUser(req);

  const filters: ProjectFilters = {};
  const platform = params.get("platform");
  const status = params.get("status");
  const language = params.get("language");
  if (platform) filters.platform = platform.toLowerCase();
  if (status) filters.status = status.toLowerCase();
  if (language) filters.language = language;

  const { rows, total } = await store.listProjects(filters, { skip, limit });

  logger.info(`Listed ${rows.length} projects`, {
    user: user?.username ?? "anonymous",
    filters,
    pagination: { skip, limit },
  });

  return NextResponse.json({ ok: true, projects: rows, ...pageMeta(total, skip, limit) });
});

export const POST = apiRoute(async (req) => {
  const user = await requireUserWith(req, "write");
  const { store, logger } = getServices();
  const input = parseOrThrow(projectCreateSchema, await readJson(req));

  if (await store.getProjectByUrl(input.url)) {
    throw new ConflictError(duplicateUrlMessage(input.url));
  }
  const project = await store.createProject(input);

  logger.info(`Created new project: ${project.name}`, {
    user: user.username,
    project_id: project.id,
    platform: project.platform,
  });

  return NextResponse.json({ ok: true, project }, { status: 201 });
});
