import { z } from "zod";
import type { FallbackContent, KnowledgeEntry, LinkItem } from "../domain/Knowledge.js";
import { LoadError } from "../domain/errors.js";

export const DEFAULT_FALLBACK_ANSWER =
  "I could not find any relevant entries in the knowledge base for that question. " +
  "Please refine the query or update the FAQ content.";

// Scalars are stringified; anything else (null, objects, arrays) reads as empty.
const Text = z.unknown().transform((v): string => {
  if (typeof v === "string") return v.trim();
  if (typeof v === "number" || typeof v === "boolean") return v ? String(v).trim() : "";
  return "";
});

const OptionalText = z
  .unknown()
  .transform((v): string | undefined => (typeof v === "string" ? v.trim() : undefined));

const LinkSchema = z
  .object({ label: Text, url: Text })
  .refine((l) => l.label !== "" && l.url !== "", "link needs both label and url");

function parseLink(raw: unknown): LinkItem | undefined {
  const r = LinkSchema.safeParse(raw);
  return r.success ? { label: r.data.label, url: r.data.url } : undefined;
}

const Links = z.unknown().transform((v): LinkItem[] =>
  Array.isArray(v) ? v.map(parseLink).filter((l): l is LinkItem => l !== undefined) : []
);

const Aliases = z.unknown().transform((v): string[] =>
  Array.isArray(v)
    ? v.filter((a): a is string => typeof a === "string").map((a) => a.trim()).filter(Boolean)
    : []
);

export const EntryRecordSchema = z.object({
  id: Text,
  question: Text,
  aliases: Aliases,
  answer: Text,
  instruction: OptionalText,
  clarify: OptionalText,
  links: Links,
});

export const FallbackRecordSchema = z.object({
  ask: Text,
  instruction: OptionalText,
  contact: z.unknown().transform(parseLink),
});

export const KnowledgeDocumentSchema = z.object({
  faqs: z.array(z.unknown(), {
    required_error: "knowledge document must contain a 'faqs' array",
    invalid_type_error: "knowledge document must contain a 'faqs' array",
  }),
  fallback: z.unknown().optional(),
});

export interface SkippedEntry {
  index: number;
  reason: string;
}

export interface ParsedKnowledgeDocument {
  entries: KnowledgeEntry[];
  fallback: FallbackContent;
  skipped: SkippedEntry[];
}

function describe(value: unknown): string {
  if (value === null) return "null";
  if (Array.isArray(value)) return "array";
  return typeof value;
}

function defaultEntryId(index: number): string {
  return `entry_${String(index).padStart(3, "0")}`;
}

function toEntry(raw: unknown, index: number): KnowledgeEntry | SkippedEntry {
  const r = EntryRecordSchema.safeParse(raw);
  if (!r.success) {
    return { index, reason: `expected object, received ${describe(raw)}` };
  }
  const e = r.data;
  return {
    id: e.id || defaultEntryId(index),
    question: e.question,
    aliases: e.aliases,
    answer: e.answer,
    ...(e.instruction !== undefined && { instruction: e.instruction }),
    ...(e.clarify !== undefined && { clarify: e.clarify }),
    links: e.links,
  };
}

export function parseFallback(raw: unknown): FallbackContent {
  const r = FallbackRecordSchema.safeParse(raw ?? {});
  if (!r.success) return { answer: DEFAULT_FALLBACK_ANSWER, links: [] };
  const f = r.data;
  return {
    answer: f.ask || DEFAULT_FALLBACK_ANSWER,
    ...(f.instruction !== undefined && { instruction: f.instruction }),
    links: f.contact ? [f.contact] : [],
  };
}

/**
 * Validates a decoded knowledge document. Only the top-level shape is fatal;
 * bad entries end up in `skipped` and bad fallback blocks become the default.
 */
export function parseKnowledgeDocument(raw: unknown): ParsedKnowledgeDocument {
  const doc = KnowledgeDocumentSchema.safeParse(raw);
  if (!doc.success) {
    const issue = doc.error.issues[0];
    const message =
      issue && issue.path.length > 0 ? issue.message : "knowledge document must be a JSON object";
    throw new LoadError(message);
  }

  const entries: KnowledgeEntry[] = [];
  const skipped: SkippedEntry[] = [];
  doc.data.faqs.forEach((item, index) => {
    const parsed = toEntry(item, index);
    if ("reason" in parsed) skipped.push(parsed);
    else entries.push(parsed);
  });

  return { entries, fallback: parseFallback(doc.data.fallback), skipped };
}
