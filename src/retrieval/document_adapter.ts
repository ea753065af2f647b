import type { Document, RawDocument } from "./types";

/** Body fields in priority order. */
export const BODY_FIELDS = [
  "text",
  "body",
  "content",
  "description",
  "summary",
] as const;

export const TITLE_FIELDS = ["title", "headline"] as const;

export function isRawDocument(value: unknown): value is RawDocument {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function firstNonEmpty(
  record: RawDocument,
  fields: readonly string[]
): string | undefined {
  for (const field of fields) {
    const value = record[field];
    if (typeof value !== "string") continue;
    const trimmed = value.trim();
    if (trimmed.length > 0) return trimmed;
  }
  return undefined;
}

/**
 * Maps a raw record to a Document. When no body field carries text the
 * title doubles as the body. Returns undefined when nothing indexable remains.
 */
export function normalizeDocument(raw: unknown): Document | undefined {
  if (!isRawDocument(raw)) return undefined;

  const title = firstNonEmpty(raw, TITLE_FIELDS);
  const body = firstNonEmpty(raw, BODY_FIELDS) ?? title;
  if (!body) return undefined;

  return title ? { title, body } : { body };
}

export function composeIndexedText(doc: Document): string {
  return doc.title ? `${doc.title}. ${doc.body}` : doc.body;
}
