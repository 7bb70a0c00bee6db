/**
 * Ranked category suggestions for an unmapped raw category.
 *
 * score = 0.40·full + 0.30·tokenSort + 0.20·partial + 0.10·hierarchy
 *
 * The hierarchy bonus rewards a similar leaf segment (0.7 × its similarity)
 * and every leading path segment that matches above 80 before the first
 * mismatch (+10 each).
 */

import { fullRatio, partialRatio, tokenSortRatio } from '../utils/fuzzyRatios.js';

export interface CategorySuggestion {
  category: string;
  /** 0–100 */
  score: number;
}

export const DEFAULT_SUGGESTION_LIMIT = 5;
const SEGMENT_MATCH_THRESHOLD = 80;

export function splitCategoryPath(category: string): string[] {
  return category
    .split(/[/|>]/)
    .map(segment => segment.trim())
    .filter(Boolean);
}

export function hierarchicalBonus(a: string, b: string): number {
  const left = splitCategoryPath(a.toLowerCase());
  const right = splitCategoryPath(b.toLowerCase());
  if (left.length === 0 || right.length === 0) return 0;

  const leafSimilarity = fullRatio(left[left.length - 1], right[right.length - 1]);

  let leadingMatches = 0;
  const depth = Math.min(left.length, right.length);
  for (let i = 0; i < depth; i++) {
    if (fullRatio(left[i], right[i]) <= SEGMENT_MATCH_THRESHOLD) break;
    leadingMatches++;
  }

  return 0.7 * leafSimilarity + 10 * leadingMatches;
}

export function scoreCategory(raw: string, candidate: string): number {
  const a = raw.toLowerCase();
  const b = candidate.toLowerCase();

  return (
    0.4 * fullRatio(a, b) +
    0.3 * tokenSortRatio(a, b) +
    0.2 * partialRatio(a, b) +
    0.1 * hierarchicalBonus(a, b)
  );
}

export function suggestCategories(
  raw: string,
  candidates: Iterable<string>,
  limit = DEFAULT_SUGGESTION_LIMIT
): CategorySuggestion[] {
  if (!raw.trim()) return [];

  const scored: CategorySuggestion[] = [];
  for (const category of new Set(candidates)) {
    const score = scoreCategory(raw, category);
    if (score > 0) scored.push({ category, score });
  }

  // Array.prototype.sort is stable: equal scores keep first-seen order
  return scored.sort((x, y) => y.score - x.score).slice(0, limit);
}
