import { UnknownCategoryError } from '../errors.js';
import {
  CATEGORIES,
  isCategory,
  type Category,
  type MemoryEntry,
  type MemorySnapshot,
  type RestoreReport,
} from './types.js';

export const DEFAULT_BAN_THRESHOLD = 0.7;

// Stored scores sit at least this far below the ban line.
export const BOUNDARY_MARGIN = 0.01;

/**
 * Category-partitioned text -> score store. Only scores below the ban line
 * are ever admitted; iteration follows insertion order.
 */
export class ContentMemory {
  private partitions: Record<Category, Map<string, number>> = {
    words: new Map(),
    phrases: new Map(),
    game_ideas: new Map(),
  };

  constructor(readonly banThreshold: number = DEFAULT_BAN_THRESHOLD) {}

  isBanned(score: number): boolean {
    return score >= this.banThreshold;
  }

  add(category: string, text: string, score: number): boolean {
    if (!Number.isFinite(score) || this.isBanned(score)) {
      return false;
    }
    if (!isCategory(category)) {
      return false;
    }

    this.partitions[category].set(text, Math.min(score, this.banThreshold - BOUNDARY_MARGIN));
    return true;
  }

  get(category: Category, text: string): number | undefined {
    return this.partition(category).get(text);
  }

  has(category: Category, text: string): boolean {
    return this.partition(category).has(text);
  }

  getAllowed(category: Category): Map<string, number> {
    const allowed = new Map<string, number>();
    for (const [text, score] of this.partition(category)) {
      if (!this.isBanned(score)) {
        allowed.set(text, score);
      }
    }
    return allowed;
  }

  remove(category: Category, text: string): boolean {
    return this.partition(category).delete(text);
  }

  size(category?: Category): number {
    if (category) {
      return this.partition(category).size;
    }
    return CATEGORIES.reduce((total, c) => total + this.partitions[c].size, 0);
  }

  entries(): MemoryEntry[] {
    return CATEGORIES.flatMap((category) =>
      Array.from(this.partitions[category], ([text, score]) => ({ category, text, score }))
    );
  }

  clear(): void {
    for (const category of CATEGORIES) {
      this.partitions[category].clear();
    }
  }

  snapshot(): MemorySnapshot {
    return {
      words: Object.fromEntries(this.partitions.words),
      phrases: Object.fromEntries(this.partitions.phrases),
      game_ideas: Object.fromEntries(this.partitions.game_ideas),
    };
  }

  /**
   * Replace the whole store with `snapshot`. Entries at or above the ban line
   * are dropped.
   */
  restore(snapshot: MemorySnapshot): RestoreReport {
    this.clear();
    const report: RestoreReport = { restored: 0, dropped: 0 };

    for (const category of CATEGORIES) {
      for (const [text, score] of Object.entries(snapshot[category])) {
        if (this.add(category, text, score)) {
          report.restored++;
        } else {
          report.dropped++;
        }
      }
    }

    return report;
  }

  private partition(category: Category): Map<string, number> {
    if (!isCategory(category)) {
      throw new UnknownCategoryError(category);
    }
    return this.partitions[category];
  }
}
