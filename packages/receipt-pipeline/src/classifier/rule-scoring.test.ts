import { EXPENSE_CATEGORIES } from "@expense-scan/receipt-contracts";
import { describe, expect, it } from "vitest";
import { loadKeywordTables, normalizeClassifierText } from "./keyword-tables.js";
import {
  amountBandNudges,
  applyNudges,
  contextNudges,
  pickVerdict,
  scoreCategories,
  scoreKeywordTable,
} from "./rule-scoring.js";

const tables = loadKeywordTables();

describe("normalizeClassifierText", () => {
  it("drops apostrophes and replaces punctuation with spaces", () => {
    expect(normalizeClassifierText("  Joe's   Corner-Shop! ")).toBe("joes corner shop");
    expect(normalizeClassifierText("PG&E Bill")).toBe("pg e bill");
  });
});

describe("loadKeywordTables", () => {
  it("loads a table for every category except Other, in enumeration order", () => {
    expect(tables.map((table) => table.category)).toEqual(
      EXPENSE_CATEGORIES.filter((category) => category !== "Other"),
    );
  });

  it("rejects tables keyed by unknown categories", () => {
    expect(() => loadKeywordTables({ Pets: ["vet"] })).toThrow();
  });
});

describe("scoreKeywordTable", () => {
  it("matches whole words only", () => {
    expect(scoreKeywordTable("business office", ["bus"])).toBe(0);
  });

  it("saturates on several long matches", () => {
    expect(scoreKeywordTable("business office", ["business", "office", "ups", "fedex"])).toBe(1);
  });

  it("weights a single hit by keyword length and table size", () => {
    // 0.4 / (sqrt(12) * 0.25) * (1 + 0.2 / 12)
    const keywords = ["shop", ...Array.from({ length: 11 }, (_, index) => `filler${index}`)];
    expect(scoreKeywordTable("joes corner shop", keywords)).toBeCloseTo(0.4696, 4);
  });
});

describe("scoreCategories", () => {
  it("scores only categories with hits", () => {
    const scores = scoreCategories(tables, "Business Office");
    expect(Object.keys(scores)).toEqual(["Business"]);
    expect(scores.Business).toBe(1);
  });
});

describe("nudges", () => {
  it("maps amount bands", () => {
    expect(amountBandNudges(4.5)).toEqual([{ category: "Food & Dining", boost: 0.1 }]);
    expect(amountBandNudges(50)).toEqual([]);
    expect(amountBandNudges(200).map((nudge) => nudge.category)).toEqual([
      "Shopping",
      "Travel",
      "Healthcare",
    ]);
    expect(amountBandNudges(800).map((nudge) => nudge.category)).toEqual([
      "Travel",
      "Insurance",
      "Home & Garden",
    ]);
  });

  it("maps description context", () => {
    expect(contextNudges("Ride to the airport").map((nudge) => nudge.category)).toEqual([
      "Travel",
      "Transportation",
    ]);
  });

  it("clamps nudged scores to 1", () => {
    expect(applyNudges({ Groceries: 0.95 }, [{ category: "Groceries", boost: 0.1 }])).toEqual({
      Groceries: 1,
    });
  });
});

describe("pickVerdict", () => {
  it("breaks ties toward the earlier category", () => {
    expect(pickVerdict({ Shopping: 0.5, Groceries: 0.5 }, EXPENSE_CATEGORIES).category).toBe(
      "Groceries",
    );
  });

  it("returns Other at zero without scores", () => {
    expect(pickVerdict({}, EXPENSE_CATEGORIES)).toEqual({
      category: "Other",
      confidence: 0,
      candidateScores: {},
    });
  });
});
