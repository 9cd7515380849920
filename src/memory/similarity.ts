/**
 * Scores how relevant stored content is to a query, in [0, 1]. Swap in an
 * embedding-backed scorer through `EpisodicMemoryOptions.scorer`.
 */
export interface SimilarityScorer {
  score(query: string, content: string): number;
}

const STOP_WORDS = new Set(["a", "an", "and", "are", "for", "in", "is", "of", "on", "or", "the", "to", "with"]);

export function tokenizeTerms(text: string): Set<string> {
  const terms = new Set<string>();
  for (const raw of text.toLowerCase().split(/[^\p{L}\p{N}]+/u)) {
    if (raw.length === 0 || STOP_WORDS.has(raw)) {
      continue;
    }
    terms.add(raw);
  }
  return terms;
}

/** Jaccard overlap of the two term sets. */
export class TermOverlapScorer implements SimilarityScorer {
  score(query: string, content: string): number {
    const queryTerms = tokenizeTerms(query);
    const contentTerms = tokenizeTerms(content);
    if (queryTerms.size === 0 || contentTerms.size === 0) {
      return 0;
    }
    let shared = 0;
    for (const term of queryTerms) {
      if (contentTerms.has(term)) {
        shared += 1;
      }
    }
    const union = queryTerms.size + contentTerms.size - shared;
    return shared / union;
  }
}

export const defaultScorer: SimilarityScorer = new TermOverlapScorer();
