import type { CandidateScores, ExpenseCategory } from "@expense-scan/receipt-contracts";
import { clamp, roundTo } from "../util/numbers.js";
import { type KeywordTable, normalizeClassifierText } from "./keyword-tables.js";

export type RuleVerdict = {
  category: ExpenseCategory;
  confidence: number;
  candidateScores: CandidateScores;
};

type Nudge = { category: ExpenseCategory; boost: number };

const CONTEXT_NUDGES: ReadonlyArray<{ pattern: RegExp; nudges: Nudge[] }> = [
  {
    pattern: /\b(?:breakfast|brunch|lunch|dinner|meal|takeout)\b/,
    nudges: [{ category: "Food & Dining", boost: 0.15 }],
  },
  {
    pattern: /\b(?:airport|hotel|flight|boarding|resort)\b/,
    nudges: [{ category: "Travel", boost: 0.15 }],
  },
  {
    pattern: /\b(?:fill up|fuel|parking|ride|commute)\b/,
    nudges: [{ category: "Transportation", boost: 0.15 }],
  },
  {
    pattern: /\b(?:prescription|copay|checkup|clinic)\b/,
    nudges: [{ category: "Healthcare", boost: 0.15 }],
  },
  {
    pattern: /\b(?:groceries|produce|weekly shop)\b/,
    nudges: [{ category: "Groceries", boost: 0.15 }],
  },
  {
    pattern: /\b(?:renewal|monthly plan|auto renew)\b/,
    nudges: [{ category: "Subscriptions", boost: 0.1 }],
  },
];

/**
 * Scores `text` against one keyword table. Keywords match as whole words or
 * phrases; longer keywords weigh more, and several corroborating hits earn a
 * small multiplicative boost.
 */
export function scoreKeywordTable(normalizedText: string, keywords: readonly string[]): number {
  if (keywords.length === 0) {
    return 0;
  }

  const padded = ` ${normalizedText} `;
  let weight = 0;
  let matches = 0;
  for (const keyword of keywords) {
    if (padded.includes(` ${keyword} `)) {
      weight += keyword.length / 10;
      matches += 1;
    }
  }
  if (matches === 0) {
    return 0;
  }

  const base = clamp(weight / (Math.sqrt(keywords.length) * 0.25));
  return roundTo(clamp(base * (1 + (matches / keywords.length) * 0.2)), 4);
}

export function scoreCategories(
  tables: readonly KeywordTable[],
  merchantName: string,
  description?: string,
): CandidateScores {
  const text = normalizeClassifierText(`${merchantName} ${description ?? ""}`);
  const scores: CandidateScores = {};
  for (const table of tables) {
    const score = scoreKeywordTable(text, table.keywords);
    if (score > 0) {
      scores[table.category] = score;
    }
  }
  return scores;
}

export function amountBandNudges(amount: number): Nudge[] {
  if (amount < 10) {
    return [{ category: "Food & Dining", boost: 0.1 }];
  }
  if (amount >= 500) {
    return [
      { category: "Travel", boost: 0.1 },
      { category: "Insurance", boost: 0.1 },
      { category: "Home & Garden", boost: 0.1 },
    ];
  }
  if (amount >= 150) {
    return [
      { category: "Shopping", boost: 0.05 },
      { category: "Travel", boost: 0.05 },
      { category: "Healthcare", boost: 0.05 },
    ];
  }
  return [];
}

export function contextNudges(description: string): Nudge[] {
  const text = normalizeClassifierText(description);
  return CONTEXT_NUDGES.filter((entry) => entry.pattern.test(text)).flatMap(
    (entry) => entry.nudges,
  );
}

export function applyNudges(scores: CandidateScores, nudges: readonly Nudge[]): CandidateScores {
  const adjusted: CandidateScores = { ...scores };
  for (const nudge of nudges) {
    adjusted[nudge.category] = roundTo(clamp((adjusted[nudge.category] ?? 0) + nudge.boost), 4);
  }
  return adjusted;
}

/** Highest score wins; ties go to the category listed first in `order`. */
export function pickVerdict(
  scores: CandidateScores,
  order: readonly ExpenseCategory[],
): RuleVerdict {
  let category: ExpenseCategory = "Other";
  let confidence = 0;
  for (const candidate of order) {
    const score = scores[candidate] ?? 0;
    if (score > confidence) {
      category = candidate;
      confidence = score;
    }
  }
  return { category, confidence, candidateScores: scores };
}
