import type { MatchResult } from "../domain/Knowledge.js";
import type { KnowledgeStore } from "../knowledge/KnowledgeStore.js";
import { normalize, scoreEntry } from "./similarity.js";

const NO_MATCH: MatchResult = { entry: null, score: 0 };

/**
 * Ranks every entry against the query and returns the best one.
 * Ties keep the earlier entry. No threshold is applied here.
 */
export function match(query: string, store: KnowledgeStore): MatchResult {
  const q = normalize(query);
  if (!q) return { ...NO_MATCH };

  let best: MatchResult | undefined;
  for (const entry of store.entries) {
    const score = scoreEntry(q, entry);
    if (!best || score > best.score) best = { entry, score };
  }
  return best ?? { ...NO_MATCH };
}
