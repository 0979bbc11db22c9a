import { z } from "zod";
import {
  CONTENT_STATUSES,
  CONTENT_TYPES,
  PLATFORMS,
  PROJECT_STATUSES,
} from "../types/catalog";
import { ValidationError } from "./errors";

const platform = z
  .string()
  .trim()
  .min(1)
  .max(50)
  .transform((v) => v.toLowerCase())
  .pipe(z.enum(PLATFORMS, { errorMap: () => ({ message: `Platform must be one of: ${PLATFORMS.join(", ")}` }) }));

const contentType = z
  .string()
  .trim()
  .min(1)
  .max(50)
  .transform((v) => v.toLowerCase())
  .pipe(
    z.enum(CONTENT_TYPES, { errorMap: () => ({ message: `Content type must be one of: ${CONTENT_TYPES.join(", ")}` }) }),
  );

const url = z
  .string()
  .trim()
  .min(1)
  .refine((v) => v.startsWith("http://") || v.startsWith("https://"), {
    message: "URL must start with http:// or https://",
  });

const slug = z
  .string()
  .min(1)
  .max(255)
  .regex(/^[a-z0-9-]+$/, "Slug must contain only lowercase letters, numbers, and hyphens");

const stringList = z.array(z.string());

export const projectCreateSchema = z.object({
  platform,
  url,
  name: z.string().trim().min(1).max(255),
  description: z.string().nullable().default(null),
  stars: z.number().int().min(0).default(0),
  language: z.string().max(50).nullable().default(null),
  topics: stringList.default([]),
  quality_score: z.number().min(0).max(10).nullable().default(null),
  status: z.enum(PROJECT_STATUSES).default("discovered"),
});

export const projectUpdateSchema = z
  .object({
    platform,
    url,
    name: z.string().trim().min(1).max(255),
    description: z.string().nullable(),
    stars: z.number().int().min(0),
    language: z.string().max(50).nullable(),
    topics: stringList,
    quality_score: z.number().min(0).max(10).nullable(),
    status: z.enum(PROJECT_STATUSES),
  })
  .partial();

export const contentCreateSchema = z.object({
  project_id: z.number().int().positive(),
  content_type: contentType,
  title: z.string().trim().min(1).max(255),
  slug,
  raw_content: z.string().min(1),
  enhanced_content: z.string().nullable().default(null),
  meta_description: z.string().max(160).nullable().default(null),
  tags: stringList.default([]),
  status: z.enum(CONTENT_STATUSES).default("draft"),
});

export const contentUpdateSchema = z
  .object({
    project_id: z.number().int().positive(),
    content_type: contentType,
    title: z.string().trim().min(1).max(255),
    slug,
    raw_content: z.string().min(1),
    enhanced_content: z.string().nullable(),
    meta_description: z.string().max(160).nullable(),
    tags: stringList,
    status: z.enum(CONTENT_STATUSES),
  })
  .partial();

export const loginSchema = z.object({
  username: z.string().min(1, "username is required"),
  password: z.string().min(1, "password is required"),
});

const queryInt = (min: number, max: number, fallback: number) =>
  z
    .string()
    .nullable()
    .transform((v, ctx) => {
      if (v === null || v === "") return fallback;
      if (!/^-?\d+$/.test(v)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: "must be an integer" });
        return z.NEVER;
      }
      return parseInt(v, 10);
    })
    .pipe(z.number().int().min(min).max(max));

export const paginationSchema = z.object({
  skip: queryInt(0, Number.MAX_SAFE_INTEGER, 0),
  limit: queryInt(1, 1000, 100),
});

const queryBool = (fallback: boolean) =>
  z
    .string()
    .nullable()
    .transform((v, ctx) => {
      if (v === null || v === "") return fallback;
      const s = v.toLowerCase();
      if (s === "true" || s === "1") return true;
      if (s === "false" || s === "0") return false;
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: "must be true or false" });
      return z.NEVER;
    });

export const contentIncludeSchema = (defaults: { raw: boolean; enhanced: boolean }) =>
  z.object({
    include_raw: queryBool(defaults.raw),
    include_enhanced: queryBool(defaults.enhanced),
  });

/** Collapse zod issues into `{ field: message }`. */
export function fieldErrors(error: z.ZodError): Record<string, string> {
  const fields: Record<string, string> = {};
  for (const issue of error.issues) {
    const key = issue.path.length > 0 ? issue.path.join(".") : "body";
    if (!(key in fields)) fields[key] = issue.message;
  }
  return fields;
}

/** Parse or throw a 422 ValidationError carrying per-field messages. */
export function parseOrThrow<S extends z.ZodTypeAny>(
  schema: S,
  input: unknown,
  message = "Validation failed",
): z.output<S> {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw new ValidationError(message, fieldErrors(result.error));
  }
  return result.data;
}
