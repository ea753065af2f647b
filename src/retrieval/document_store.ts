import { getLogger } from "@src/util/logger";
import { composeIndexedText, normalizeDocument } from "./document_adapter";

/**
 * Request-scoped corpus of indexed texts.
 *
 * Create one per logical request: `index` replaces the whole corpus and
 * `retrieve` (see ranker.ts) reads a snapshot of it. Nothing is shared
 * between contexts.
 */
export class RetrievalContext {
  private texts: readonly string[] = [];
  private readonly logger = getLogger("retrieval/document_store");

  /**
   * Replaces the corpus with the indexable texts of `documents`.
   * Records without text are dropped. Never throws: on failure the corpus is
   * left empty.
   */
  index(documents: Iterable<unknown>): void {
    try {
      const next: string[] = [];
      let dropped = 0;
      for (const raw of documents) {
        const doc = normalizeDocument(raw);
        const text = doc ? composeIndexedText(doc) : "";
        if (text.trim().length === 0) {
          dropped++;
          continue;
        }
        next.push(text);
      }
      this.texts = Object.freeze(next);
      this.logger.debug(
        { indexed: next.length, dropped },
        "corpus replaced"
      );
    } catch (err) {
      this.texts = [];
      this.logger.error({ err }, "indexing failed; corpus cleared");
    }
  }

  /** Read-only snapshot in insertion order. */
  get corpus(): readonly string[] {
    return this.texts;
  }

  get size(): number {
    return this.texts.length;
  }
}

export function createRetrievalContext(
  documents?: Iterable<unknown>
): RetrievalContext {
  const context = new RetrievalContext();
  if (documents) context.index(documents);
  return context;
}
