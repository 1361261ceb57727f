// ============================================
// Knowledge Store Tests — distance and prefix helpers
// ============================================

import { describe, it, expect } from "vitest";
import { distanceToSimilarity, normalizePrefix } from "../src/db/knowledgeStore.js";

describe("distanceToSimilarity", () => {
  it("inverts cosine distance", () => {
    expect(distanceToSimilarity(0.25)).toBe(0.75);
  });

  it("clamps to [0, 1]", () => {
    expect(distanceToSimilarity(1.4)).toBe(0);
    expect(distanceToSimilarity(-0.1)).toBe(1);
  });
});

describe("normalizePrefix", () => {
  it("adds a trailing slash once", () => {
    expect(normalizePrefix("faq")).toBe("faq/");
    expect(normalizePrefix("faq/")).toBe("faq/");
  });
});
