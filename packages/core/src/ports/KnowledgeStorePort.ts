import type { KnowledgeStore } from "../knowledge/KnowledgeStore.js";

export interface KnowledgeStoreProvider {
  get(): Promise<KnowledgeStore>;
}
