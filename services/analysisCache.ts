import { AnalysisResult } from '../types';

export interface AnalysisCacheKey {
  itemId: string;
  contentHash: string;
  configHash: string;
}

type StoredAnalysis = Omit<AnalysisResult, 'fromCache'>;

/**
 * Memo table for successful analyses. Entries are grouped by item so a new upload
 * or a reset can drop everything that belonged to a discarded item.
 */
export class AnalysisCache {
  private entries = new Map<string, Map<string, StoredAnalysis>>();

  private static variantKey(key: AnalysisCacheKey): string {
    return `${key.contentHash}:${key.configHash}`;
  }

  get(key: AnalysisCacheKey): StoredAnalysis | undefined {
    return this.entries.get(key.itemId)?.get(AnalysisCache.variantKey(key));
  }

  set(key: AnalysisCacheKey, value: StoredAnalysis): void {
    let variants = this.entries.get(key.itemId);
    if (!variants) {
      variants = new Map();
      this.entries.set(key.itemId, variants);
    }
    variants.set(AnalysisCache.variantKey(key), value);
  }

  has(itemId: string): boolean {
    return this.entries.has(itemId);
  }

  forget(itemId: string): void {
    this.entries.delete(itemId);
  }

  retainOnly(itemId: string): void {
    for (const id of [...this.entries.keys()]) {
      if (id !== itemId) this.entries.delete(id);
    }
  }

  get size(): number {
    let total = 0;
    for (const variants of this.entries.values()) total += variants.size;
    return total;
  }
}
