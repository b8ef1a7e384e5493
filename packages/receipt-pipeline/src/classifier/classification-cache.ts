import type { ClassificationResult } from "@expense-scan/receipt-contracts";

export type CacheStats = {
  size: number;
  hits: number;
  misses: number;
};

/**
 * Merchant-keyed store of finished classifications. Entries are never
 * mutated; writing an existing key replaces it with an equivalent result.
 */
export class ClassificationCache {
  private readonly entries = new Map<string, ClassificationResult>();
  private hits = 0;
  private misses = 0;

  get(key: string): ClassificationResult | undefined {
    const entry = this.entries.get(key);
    if (entry) {
      this.hits += 1;
    } else {
      this.misses += 1;
    }
    return entry;
  }

  set(key: string, result: ClassificationResult): void {
    this.entries.set(key, result);
  }

  clear(): void {
    this.entries.clear();
    this.hits = 0;
    this.misses = 0;
  }

  stats(): CacheStats {
    return { size: this.entries.size, hits: this.hits, misses: this.misses };
  }
}
