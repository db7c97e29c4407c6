import { describe, expect, it } from "vitest";
import { match } from "../matcher.js";
import { passwordDoc, sampleDoc, storeOf } from "../../__tests__/fixtures.js";

describe("match", () => {
  it("matches the canonical question case-insensitively", () => {
    const result = match("how do i reset my password", storeOf(passwordDoc));
    expect(result.entry?.id).toBe("reset_password");
    expect(result.score).toBe(1);
  });

  it("returns no entry for a blank query", () => {
    expect(match("   ", storeOf(sampleDoc))).toEqual({ entry: null, score: 0 });
  });

  it("returns no entry when the store is empty", () => {
    expect(match("how do i reset my password", storeOf({ faqs: [] }))).toEqual({ entry: null, score: 0 });
  });

  it("picks the entry whose alias fits best", () => {
    const result = match("Sign up", storeOf(sampleDoc));
    expect(result.entry?.id).toBe("create_account");
    expect(result.score).toBe(1);
  });

  it("keeps the earliest entry on a tie", () => {
    const store = storeOf({
      faqs: [
        { id: "first", question: "opening hours", answer: "9 to 5" },
        { id: "second", question: "opening hours", answer: "8 to 4" },
      ],
    });
    expect(match("opening hours", store).entry?.id).toBe("first");
  });

  it("returns the best entry even when it scores low", () => {
    const store = storeOf({ faqs: [{ id: "only", question: "completely different wording here", answer: "x" }] });
    const result = match("pricing", store);
    expect(result.entry?.id).toBe("only");
    expect(result.score).toBeLessThan(0.45);
  });
});
