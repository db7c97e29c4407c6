export interface LinkItem {
  label: string; // short description of the destination
  url: string;
}

/** One FAQ record as it lives in the store. */
export interface KnowledgeEntry {
  readonly id: string;
  readonly question: string; // canonical phrasing
  readonly aliases: readonly string[];
  readonly answer: string; // template answer, may be empty
  readonly instruction?: string;
  readonly clarify?: string;
  readonly links: readonly LinkItem[];
}

export interface FallbackContent {
  readonly answer: string;
  readonly instruction?: string;
  readonly links: readonly LinkItem[];
}

export interface MatchResult {
  entry: KnowledgeEntry | null;
  score: number; // 0-1
}
