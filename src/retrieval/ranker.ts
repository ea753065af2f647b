import { getLogger } from "@src/util/logger";
import type { RetrievalContext } from "./document_store";
import type { ScoredResult } from "./types";

/**
 * Lowercased, whitespace-delimited word set. Punctuation stays attached to
 * its word ("deliveries." and "deliveries" are different words).
 */
export function tokenize(text: string): Set<string> {
  const words = new Set<string>();
  for (const word of text.toLowerCase().split(/\s+/)) {
    if (word.length > 0) words.add(word);
  }
  return words;
}

export function overlapScore(
  queryWords: ReadonlySet<string>,
  text: string
): number {
  if (queryWords.size === 0) return 0;
  let score = 0;
  for (const word of tokenize(text)) {
    if (queryWords.has(word)) score++;
  }
  return score;
}

/**
 * Keyword-overlap retrieval over the context's corpus.
 *
 * - score = |query words ∩ document words|
 * - ordered by score desc; equal scores keep corpus order
 * - zero-score documents are dropped, unless nothing scores above zero, in
 *   which case the first k documents come back in corpus order with score 0
 *
 * Returns [] for an empty corpus or a k that is not a positive integer.
 * Never throws.
 */
export function retrieve(
  context: RetrievalContext,
  query: string,
  k: number
): ScoredResult[] {
  const logger = getLogger("retrieval/ranker");
  try {
    const corpus = context.corpus;
    if (corpus.length === 0 || !Number.isInteger(k) || k < 1) return [];

    const queryWords = tokenize(query);
    const scored: ScoredResult[] = corpus.map(text => ({
      text,
      score: overlapScore(queryWords, text),
    }));

    // Array.prototype.sort is stable, which gives the corpus-order tie-break
    const matches = scored
      .filter(r => r.score > 0)
      .sort((a, b) => b.score - a.score)
      .slice(0, k);

    const results = matches.length > 0 ? matches : scored.slice(0, k);
    logger.debug(
      {
        corpusSize: corpus.length,
        queryWords: queryWords.size,
        returned: results.length,
        fallback: matches.length === 0,
      },
      "retrieval result"
    );
    return results;
  } catch (err) {
    logger.error({ err }, "retrieval failed");
    return [];
  }
}
