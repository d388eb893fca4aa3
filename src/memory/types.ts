// Content partitions. Closed set: not extensible at runtime.

import { UnknownCategoryError } from '../errors.js';

export const CATEGORIES = ['words', 'phrases', 'game_ideas'] as const;

export type Category = (typeof CATEGORIES)[number];

export const DEFAULT_CATEGORY: Category = 'phrases';

export interface MemoryEntry {
  category: Category;
  text: string;
  score: number;
}

// On-disk layout: one text -> score map per category.
export type MemorySnapshot = Record<Category, Record<string, number>>;

export interface RestoreReport {
  restored: number;
  dropped: number;
}

export function isCategory(value: string): value is Category {
  return CATEGORIES.some((category) => category === value);
}

export function parseCategory(value: string): Category {
  if (!isCategory(value)) {
    throw new UnknownCategoryError(value);
  }
  return value;
}

export function categoryLabel(category: Category): string {
  switch (category) {
    case 'words':
      return 'Words';
    case 'phrases':
      return 'Phrases';
    case 'game_ideas':
      return 'Game ideas';
  }
}
