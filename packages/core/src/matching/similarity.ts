import type { KnowledgeEntry } from "../domain/Knowledge.js";

export function normalize(text: string): string {
  return text.trim().toLowerCase();
}

function tokenSet(text: string): Set<string> {
  return new Set(text.split(/\s+/).filter(Boolean));
}

function jaccard(a: Set<string>, b: Set<string>): number {
  if (a.size === 0 || b.size === 0) return 0;
  let shared = 0;
  for (const t of a) if (b.has(t)) shared++;
  return shared / (a.size + b.size - shared);
}

/**
 * Lexical similarity of two normalized strings in [0, 1].
 *
 * Token overlap (Jaccard) competes with a blend that also rewards similar
 * length and prefix relations, so truncated or slightly misspelled questions
 * still score well. Whichever is higher wins.
 */
export function similarity(query: string, candidate: string): number {
  if (!query || !candidate) return 0;

  const a = tokenSet(query);
  const b = tokenSet(candidate);
  if (a.size === 0 || b.size === 0) return 0;

  const j = jaccard(a, b);
  const prefix = query.startsWith(candidate) || candidate.startsWith(query) ? 1 : 0;
  // code points, not UTF-16 units
  const qLen = [...query].length;
  const cLen = [...candidate].length;
  const lengthRatio = Math.min(qLen, cLen) / Math.max(qLen, cLen);

  const blended = 0.6 * lengthRatio + 0.4 * j + 0.15 * prefix;
  return Math.min(1, Math.max(j, blended));
}

/** Best score over the canonical question and every alias. */
export function scoreEntry(query: string, entry: KnowledgeEntry): number {
  let best = 0;
  for (const candidate of [entry.question, ...entry.aliases]) {
    const s = similarity(query, normalize(candidate));
    if (s > best) best = s;
  }
  return best;
}
