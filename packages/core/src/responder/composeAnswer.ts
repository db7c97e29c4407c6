import type { ChatAnswer, ResponseType } from "../domain/Chat.js";
import type { LinkItem, MatchResult } from "../domain/Knowledge.js";
import type { KnowledgeStore } from "../knowledge/KnowledgeStore.js";

export interface ComposeOptions {
  minScore: number;
  maxSources: number; // 0 yields no sources
}

const round3 = (n: number) => Math.round(n * 1000) / 1000;

export function composeAnswer(store: KnowledgeStore, m: MatchResult, opts: ComposeOptions): ChatAnswer {
  const { fallback } = store;

  if (!m.entry || m.score < opts.minScore) {
    return {
      templateAnswer: fallback.answer,
      ...(fallback.instruction !== undefined && { instruction: fallback.instruction }),
      links: [...fallback.links],
      sources: [],
    };
  }

  const entry = m.entry;
  const sources = [{ source: store.citation(entry), snippet: null, score: round3(m.score) }];
  return {
    templateAnswer: entry.answer || fallback.answer,
    ...(entry.instruction !== undefined && { instruction: entry.instruction }),
    ...(entry.clarify !== undefined && { clarify: entry.clarify }),
    links: [...entry.links],
    sources: sources.slice(0, Math.max(0, opts.maxSources)),
  };
}

export function responseTypeFor(links: readonly LinkItem[]): ResponseType {
  return links.length > 0 ? "text_with_links" : "text";
}
