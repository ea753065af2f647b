/** Shared retrieval types. */

/**
 * A raw record as handed over by a news source. Field names vary by source
 * (text/body/content/description/summary, title/headline).
 */
export type RawDocument = Record<string, unknown>;

/** Normalized document produced by the adapter. */
export interface Document {
  title?: string;
  body: string;
}

export interface ScoredResult {
  text: string;
  /** Count of distinct query words found in the document. */
  score: number;
}
