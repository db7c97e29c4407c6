import { readFile } from "node:fs/promises";
import path from "node:path";
import type { FallbackContent, KnowledgeEntry } from "../domain/Knowledge.js";
import { LoadError, errorMessage } from "../domain/errors.js";
import { moduleLogger, type Logger } from "../telemetry/logger.js";
import { parseKnowledgeDocument, type SkippedEntry } from "./schema.js";

export interface LoadOptions {
  logger?: Logger;
}

/** Read-only FAQ collection. Built once, shared by every request. */
export class KnowledgeStore {
  readonly entries: readonly KnowledgeEntry[];
  readonly fallback: FallbackContent;
  readonly sourceName: string; // prefix for source citations
  readonly skipped: readonly SkippedEntry[];

  constructor(
    entries: readonly KnowledgeEntry[],
    fallback: FallbackContent,
    sourceName: string,
    skipped: readonly SkippedEntry[] = []
  ) {
    this.entries = Object.freeze([...entries]);
    this.fallback = fallback;
    this.sourceName = sourceName;
    this.skipped = Object.freeze([...skipped]);
  }

  get size(): number {
    return this.entries.length;
  }

  citation(entry: KnowledgeEntry): string {
    return `${this.sourceName}::${entry.id}`;
  }

  /** Builds a store from an already-decoded document. */
  static fromDocument(raw: unknown, sourceName: string, opts: LoadOptions = {}): KnowledgeStore {
    const log = opts.logger ?? moduleLogger("knowledge");
    const { entries, fallback, skipped } = parseKnowledgeDocument(raw);

    for (const s of skipped) {
      log.warn(`Skipping FAQ entry at index ${s.index}: ${s.reason}`, { source: sourceName });
    }
    if (entries.length === 0) {
      log.warn(`Knowledge base loaded with zero FAQ entries from ${sourceName}`);
    }
    log.info(`Knowledge base loaded ${entries.length} FAQ entries from ${sourceName}`);

    return new KnowledgeStore(entries, fallback, sourceName, skipped);
  }
}

export async function loadKnowledgeStore(file: string, opts: LoadOptions = {}): Promise<KnowledgeStore> {
  let text: string;
  try {
    text = await readFile(file, "utf8");
  } catch (err) {
    const reason = isNotFound(err) ? "not found" : "could not be read";
    throw new LoadError(`Knowledge base file '${file}' ${reason}.`, { cause: err });
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new LoadError(`Knowledge base file '${file}' is not valid JSON: ${errorMessage(err)}`, { cause: err });
  }

  return KnowledgeStore.fromDocument(raw, path.basename(file), opts);
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}
