import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { fileURLToPath } from "node:url";
import { KnowledgeStore, loadKnowledgeStore } from "../KnowledgeStore.js";
import { match } from "../../matching/matcher.js";
import { LoadError } from "../../domain/errors.js";
import { sampleDoc, silentLogger } from "../../__tests__/fixtures.js";

describe("loadKnowledgeStore", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "faqbot-store-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("loads entries, fallback and source name", async () => {
    const file = join(dir, "faq.json");
    await writeFile(file, JSON.stringify(sampleDoc));

    const store = await loadKnowledgeStore(file, { logger: silentLogger() });

    expect(store.size).toBe(3);
    expect(store.sourceName).toBe("faq.json");
    expect(store.fallback.answer).toBe("No idea, sorry.");
    expect(store.citation(store.entries[1])).toBe("faq.json::create_account");
  });

  it("fails with LoadError when the file is missing", async () => {
    const file = join(dir, "nope.json");
    const err = await loadKnowledgeStore(file, { logger: silentLogger() }).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(LoadError);
    expect(err).toHaveProperty("message", `Knowledge base file '${file}' not found.`);
  });

  it("fails with LoadError on invalid JSON", async () => {
    const file = join(dir, "faq.json");
    await writeFile(file, "{ faqs: [");
    await expect(loadKnowledgeStore(file, { logger: silentLogger() })).rejects.toThrow(
      `Knowledge base file '${file}' is not valid JSON:`
    );
  });

  it("fails with LoadError when faqs is not a list", async () => {
    const file = join(dir, "faq.json");
    await writeFile(file, JSON.stringify({ faqs: "none" }));
    await expect(loadKnowledgeStore(file, { logger: silentLogger() })).rejects.toBeInstanceOf(LoadError);
  });
});

describe("bundled knowledge base", () => {
  const file = fileURLToPath(new URL("../../../../../context_docs/faq.json", import.meta.url));

  it("loads and answers a known question", async () => {
    const store = await loadKnowledgeStore(file, { logger: silentLogger() });

    expect(store.size).toBe(5);
    expect(store.skipped).toEqual([]);
    expect(store.fallback.links).toEqual([{ label: "Contact", url: "/contact" }]);
    expect(match("forgot password", store).entry?.id).toBe("reset_password");
  });
});

describe("KnowledgeStore.fromDocument", () => {
  it("warns about skipped records and an empty store", () => {
    const logger = silentLogger();
    const warn = vi.spyOn(logger, "warn");

    const store = KnowledgeStore.fromDocument({ faqs: [5] }, "faq.json", { logger });

    expect(store.size).toBe(0);
    expect(store.skipped).toEqual([{ index: 0, reason: "expected object, received number" }]);
    expect(warn).toHaveBeenCalledWith("Skipping FAQ entry at index 0: expected object, received number", {
      source: "faq.json",
    });
    expect(warn).toHaveBeenCalledWith("Knowledge base loaded with zero FAQ entries from faq.json");
  });

  it("does not expose a mutable entry list", () => {
    const store = KnowledgeStore.fromDocument(sampleDoc, "faq.json", { logger: silentLogger() });
    expect(Object.isFrozen(store.entries)).toBe(true);
  });
});
