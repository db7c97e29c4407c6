import type { KnowledgeStoreProvider } from "../ports/KnowledgeStorePort.js";
import type { KnowledgeStore } from "./KnowledgeStore.js";

/**
 * First caller triggers the load, concurrent callers await the same promise.
 * A rejected load is dropped so the next call tries again.
 */
export function createKnowledgeStoreProvider(load: () => Promise<KnowledgeStore>): KnowledgeStoreProvider {
  let pending: Promise<KnowledgeStore> | undefined;

  return {
    get(): Promise<KnowledgeStore> {
      if (!pending) {
        pending = load().catch((err: unknown) => {
          pending = undefined;
          throw err;
        });
      }
      return pending;
    },
  };
}

export function staticStoreProvider(store: KnowledgeStore): KnowledgeStoreProvider {
  const ready = Promise.resolve(store);
  return { get: () => ready };
}
