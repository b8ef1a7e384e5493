import {
  EXPENSE_CATEGORIES,
  ExpenseCategorySchema,
  type ExpenseCategory,
} from "@expense-scan/receipt-contracts";
import { z } from "zod";
import keywordsJson from "./category-keywords.json" with { type: "json" };

export type KeywordTable = {
  category: ExpenseCategory;
  keywords: string[];
};

const KeywordTablesSchema = z.partialRecord(ExpenseCategorySchema, z.array(z.string().min(1)));

/** Lowercases, drops apostrophes and turns other punctuation into spaces. */
export function normalizeClassifierText(text: string): string {
  return text
    .toLowerCase()
    .replace(/['’]/g, "")
    .replace(/[^\p{L}\p{N}\s]/gu, " ")
    .replace(/\s+/g, " ")
    .trim();
}

export function loadKeywordTables(source: unknown = keywordsJson): KeywordTable[] {
  const parsed = KeywordTablesSchema.parse(source);
  return EXPENSE_CATEGORIES.flatMap((category) => {
    const keywords = parsed[category];
    if (!keywords || keywords.length === 0) {
      return [];
    }
    return [{ category, keywords: keywords.map(normalizeClassifierText) }];
  });
}
