/**
 * Category listing and search over a record table.
 */

import Fuse from 'fuse.js';
import type { ProductRecord } from '../types/Product.js';

export type CategoryField = 'rawCategory' | 'resolvedCategory' | 'canonicalCategory';

/** Sorted, unique, non-empty */
export function extractCategories(
  records: ProductRecord[],
  field: CategoryField = 'canonicalCategory'
): string[] {
  const categories = new Set<string>();
  for (const record of records) {
    const category = record[field].trim();
    if (category) categories.add(category);
  }
  return [...categories].sort();
}

/** An empty selection keeps every record */
export function filterByCategories(
  records: ProductRecord[],
  selected: string[],
  field: CategoryField = 'canonicalCategory'
): ProductRecord[] {
  if (selected.length === 0) return records;
  const wanted = new Set(selected.map(category => category.trim()));
  return records.filter(record => wanted.has(record[field].trim()));
}

/**
 * Case-insensitive substring search; when nothing contains the query,
 * fall back to fuzzy matching so "Vitriny" still finds "Vitríny".
 */
export function searchCategories(categories: string[], query: string): string[] {
  const needle = query.trim().toLowerCase();
  if (!needle) return [...categories];

  const direct = categories.filter(category => category.toLowerCase().includes(needle));
  if (direct.length > 0) return direct;

  const fuse = new Fuse(categories, {
    threshold: 0.4,
    ignoreLocation: true,
    includeScore: true,
  });
  return fuse.search(query.trim()).map(result => result.item);
}
