const TOKEN = /[\p{L}\p{N}]+/gu;
const MIN_TERM_LENGTH = 3;
const MAX_TERMS = 8;

export function queryTerms(query: string): string[] {
  const terms = new Set<string>();
  for (const match of query.toLowerCase().matchAll(TOKEN)) {
    if (match[0].length >= MIN_TERM_LENGTH) {
      terms.add(match[0]);
    }
    if (terms.size >= MAX_TERMS) {
      break;
    }
  }
  return [...terms];
}

/** Term-frequency score of `content` against the query terms. */
export function termScore(content: string, terms: string[]): number {
  if (terms.length === 0) {
    return 0;
  }
  const counts = new Map<string, number>();
  for (const match of content.toLowerCase().matchAll(TOKEN)) {
    counts.set(match[0], (counts.get(match[0]) ?? 0) + 1);
  }
  let score = 0;
  for (const term of terms) {
    const count = counts.get(term) ?? 0;
    // Sub-linear so one repeated term cannot outweigh coverage.
    score += count > 0 ? 1 + Math.log(count) : 0;
  }
  return score;
}

export function rankByTerms<T extends { content: string }>(
  candidates: T[],
  terms: string[],
): T[] {
  return candidates
    .map((candidate, index) => ({
      candidate,
      index,
      score: termScore(candidate.content, terms),
    }))
    .filter((entry) => entry.score > 0)
    .sort((a, b) => b.score - a.score || a.index - b.index)
    .map((entry) => entry.candidate);
}
