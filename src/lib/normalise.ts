import { z } from "zod";
import { MalformedRecord, SourceRejected } from "./errors";
import type { RawDocument, RawHighlight } from "./types";

const timestampValue = z.union([z.string(), z.number()]).nullish();

// Descriptive fields fall back to their defaults instead of rejecting the record.
const optionalText = z.union([z.string(), z.number()]).nullish().catch(null);
const optionalCount = z.number().nullish().catch(null);

const tagsSchema = z
  .union([
    z.array(z.union([z.string(), z.object({ name: z.string() }).passthrough()])),
    z.record(z.unknown())
  ])
  .nullish()
  .catch(null);

const documentSchema = z
  .object({
    title: optionalText,
    author: optionalText,
    source: optionalText,
    category: optionalText,
    location: optionalText,
    word_count: optionalCount,
    source_url: optionalText,
    site_name: optionalText,
    published_date: optionalText,
    summary: optionalText,
    last_moved_at: timestampValue,
    updated_at: timestampValue,
    created_at: timestampValue,
    saved_at: timestampValue,
    tags: tagsSchema
  })
  .passthrough();

const highlightSchema = z
  .object({
    text: optionalText,
    note: optionalText,
    location: optionalText,
    highlighted_at: timestampValue,
    book_id: optionalCount,
    readwise_url: optionalText
  })
  .passthrough();

export const readerPageSchema = z
  .object({
    results: z.array(z.unknown()),
    nextPageCursor: z.string().nullish()
  })
  .passthrough();

export const highlightPageSchema = z
  .object({
    results: z.array(z.unknown()),
    next: z.string().nullish()
  })
  .passthrough();

export function parsePage<S extends z.ZodTypeAny>(schema: S, body: unknown, endpoint: string): z.infer<S> {
  const result = schema.safeParse(body);
  if (!result.success) {
    throw new SourceRejected(`${endpoint} returned an unexpected page shape: ${describeIssues(result.error)}`, 200);
  }
  return result.data;
}

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const path = issue.path.length > 0 ? issue.path.join(".") : "<root>";
      return `${path}: ${issue.message}`;
    })
    .join("; ");
}

function text(value: string | number | null | undefined): string {
  if (value === null || value === undefined) return "";
  return String(value);
}

export function parseTimestamp(value: string | number | null | undefined, field: string): Date | null {
  if (value === null || value === undefined || value === "") {
    return null;
  }
  const date = new Date(value);
  if (Number.isNaN(date.getTime())) {
    throw new MalformedRecord(`${field} is not a valid timestamp: ${String(value)}`, field, value);
  }
  return date;
}

function normaliseTags(tags: z.infer<typeof tagsSchema>): string[] {
  if (!tags) return [];
  if (Array.isArray(tags)) {
    return tags.map((tag) => (typeof tag === "string" ? tag : tag.name)).filter((tag) => tag.length > 0);
  }
  return Object.keys(tags).filter((tag) => tag.length > 0);
}

export function normaliseDocument(raw: unknown): RawDocument {
  const result = documentSchema.safeParse(raw);
  if (!result.success) {
    throw new MalformedRecord(`Document record is malformed: ${describeIssues(result.error)}`, "document", raw);
  }
  const doc = result.data;
  return {
    title: text(doc.title).trim() || "Untitled",
    author: text(doc.author),
    source: text(doc.source),
    category: text(doc.category),
    location: text(doc.location),
    wordCount: doc.word_count ?? 0,
    sourceUrl: text(doc.source_url),
    siteName: text(doc.site_name),
    publishedDate: text(doc.published_date),
    summary: text(doc.summary),
    lastMovedAt: parseTimestamp(doc.last_moved_at, "last_moved_at"),
    updatedAt: parseTimestamp(doc.updated_at, "updated_at"),
    createdAt: parseTimestamp(doc.created_at, "created_at"),
    savedAt: parseTimestamp(doc.saved_at, "saved_at"),
    tags: normaliseTags(doc.tags)
  };
}

export function normaliseHighlight(raw: unknown): RawHighlight {
  const result = highlightSchema.safeParse(raw);
  if (!result.success) {
    throw new MalformedRecord(`Highlight record is malformed: ${describeIssues(result.error)}`, "highlight", raw);
  }
  const highlight = result.data;
  return {
    text: text(highlight.text),
    note: text(highlight.note),
    location: text(highlight.location),
    highlightedAt: parseTimestamp(highlight.highlighted_at, "highlighted_at"),
    bookId: highlight.book_id ?? null,
    readwiseUrl: text(highlight.readwise_url)
  };
}
