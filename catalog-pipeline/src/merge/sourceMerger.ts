/**
 * ════════════════════════════════════════════════════════════════════════════════
 * FILE: sourceMerger.ts
 * PURPOSE: Merge the primary catalog with secondary feeds into one table keyed by code
 * ════════════════════════════════════════════════════════════════════════════════
 *
 * Merge policy per secondary record:
 * - Unknown code → added as a new record, tagged with the feed name
 * - Known code with MORE images → images and price taken from the feed,
 *   every other field stays with the existing record
 * - Known code otherwise → only the price follows the feed, and only when
 *   it differs numerically ("100.00" and "100" are the same price)
 *
 * Sources are processed in the order given; merging the same feed twice
 * leaves the table as it was after the first pass.
 */

import type {
  MergeStatistics,
  ProductRecord,
  SourceMergeCounts,
  SourceTable,
  SourceRow,
} from '../types/Product.js';
import {
  getField,
  hasField,
  readExtraColumns,
  readImageSlots,
} from '../utils/tableColumns.js';
import { parseDecimal } from '../utils/units.js';

// ============================================================================
// TYPES
// ============================================================================

export interface MergeOptions {
  /** Source tag for primary records */
  primaryName?: string;
  /**
   * Category-filtered merge: primary records outside these raw categories are
   * dropped unless some feed supplied the same code
   */
  selectedCategories?: string[];
  now?: () => Date;
}

export interface MergeResult {
  records: ProductRecord[];
  stats: MergeStatistics;
}

export type SecondarySources = Map<string, SourceTable> | Array<[string, SourceTable]>;

interface DedupeResult {
  records: ProductRecord[];
  duplicatesDropped: number;
  skipped: number;
}

// ============================================================================
// RECORD HELPERS
// ============================================================================

/** Numeric price, or null for blank/unparseable values */
export function parsePrice(value: string | null): number | null {
  if (value === null) return null;
  return parseDecimal(value.replace(/[\s€]/g, ''));
}

export function countImages(images: string[]): number {
  return images.filter(image => image.trim() !== '').length;
}

function pricesDiffer(current: string | null, next: string | null): boolean {
  const nextValue = parsePrice(next);
  if (nextValue === null) return false;
  const currentValue = parsePrice(current);
  return currentValue === null || currentValue !== nextValue;
}

export function toProductRecord(row: SourceRow, sourceTag: string): ProductRecord {
  const rawCategory = getField(row, 'category');
  const price = getField(row, 'price');
  const parentCode = getField(row, 'parentCode').toUpperCase();

  return {
    code: getField(row, 'code').toUpperCase(),
    name: getField(row, 'name'),
    rawCategory,
    resolvedCategory: rawCategory,
    canonicalCategory: rawCategory,
    price: price === '' ? null : price,
    images: readImageSlots(row),
    parameters: getField(row, 'parameters'),
    manufacturer: getField(row, 'manufacturer'),
    attributes: {},
    parentCode: parentCode === '' ? null : parentCode,
    sourceTag,
    lastUpdated: null,
    extra: readExtraColumns(row),
  };
}

/**
 * Convert a source to records, keeping the first row per code but giving it
 * the price of the last row that carried one.
 */
export function dedupeSource(table: SourceTable, sourceTag: string): DedupeResult {
  const byCode = new Map<string, ProductRecord>();
  let duplicatesDropped = 0;
  let skipped = 0;

  for (const row of table.rows) {
    const record = toProductRecord(row, sourceTag);
    if (!record.code) {
      skipped++;
      continue;
    }

    const first = byCode.get(record.code);
    if (!first) {
      byCode.set(record.code, record);
      continue;
    }

    duplicatesDropped++;
    if (record.price !== null) first.price = record.price;
  }

  return { records: [...byCode.values()], duplicatesDropped, skipped };
}

/** Apply the image/price policy; true when the stored record changed */
function applyIncoming(existing: ProductRecord, incoming: ProductRecord): boolean {
  let changed = false;

  if (countImages(incoming.images) > countImages(existing.images)) {
    existing.images = [...incoming.images];
    changed = true;
  }
  if (pricesDiffer(existing.price, incoming.price)) {
    existing.price = incoming.price;
    changed = true;
  }

  return changed;
}

function emptyCounts(): SourceMergeCounts {
  return { added: 0, updated: 0, skipped: 0, duplicatesDropped: 0 };
}

// ============================================================================
// MERGE
// ============================================================================

export function mergeSources(
  primary: SourceTable,
  secondary: SecondarySources,
  options: MergeOptions = {}
): MergeResult {
  const primaryName = options.primaryName ?? 'primary';
  const now = options.now ?? (() => new Date());
  const feeds = secondary instanceof Map ? [...secondary.entries()] : secondary;

  const stats: MergeStatistics = {
    primary: primaryName,
    primaryCount: 0,
    duplicatesDropped: 0,
    sources: {},
    skippedSources: [],
    total: 0,
  };

  if (primary.rows.length > 0 && !hasField(primary, 'code')) {
    console.warn(`⚠️  [sourceMerger] ${primaryName} has no code column - returning it unchanged`);
    const records = primary.rows.map(row => toProductRecord(row, primaryName));
    stats.skippedSources.push(primaryName);
    stats.primaryCount = records.length;
    stats.total = records.length;
    return { records, stats };
  }
  if (primary.rows.length > 0 && !hasField(primary, 'name')) {
    console.warn(`⚠️  [sourceMerger] ${primaryName} has no name column`);
  }

  const base = dedupeSource(primary, primaryName);
  if (base.skipped > 0) {
    console.warn(`⚠️  [sourceMerger] ${primaryName}: ${base.skipped} rows without a code skipped`);
  }
  const index = new Map<string, ProductRecord>(base.records.map(record => [record.code, record]));
  stats.primaryCount = index.size;
  stats.duplicatesDropped = base.duplicatesDropped;

  // Codes some feed supplied, for the category-filtered merge
  const touched = new Set<string>();

  for (const [sourceName, table] of feeds) {
    const counts = emptyCounts();
    stats.sources[sourceName] = counts;

    if (!hasField(table, 'code')) {
      console.warn(`⚠️  [sourceMerger] ${sourceName} has no code column - skipping source`);
      stats.skippedSources.push(sourceName);
      continue;
    }

    const incoming = dedupeSource(table, sourceName);
    counts.duplicatesDropped = incoming.duplicatesDropped;
    counts.skipped = incoming.skipped;

    for (const record of incoming.records) {
      touched.add(record.code);
      const existing = index.get(record.code);

      if (!existing) {
        index.set(record.code, record);
        counts.added++;
        continue;
      }

      if (applyIncoming(existing, record)) {
        existing.lastUpdated = now().toISOString();
        counts.updated++;
      }
    }

    console.log(`   [sourceMerger] ${sourceName}: +${counts.added} added, ${counts.updated} updated`);
  }

  let records = [...index.values()];

  if (options.selectedCategories) {
    const selected = new Set(options.selectedCategories.map(category => category.trim()));
    const before = records.length;
    records = records.filter(record =>
      record.sourceTag !== primaryName || touched.has(record.code) || selected.has(record.rawCategory)
    );
    const removed = before - records.length;
    stats.categoryFilter = {
      selected: [...selected],
      kept: records.filter(record => record.sourceTag === primaryName).length,
      removed,
    };
    console.log(`   [sourceMerger] Category filter: ${removed} primary records removed`);
  }

  stats.total = records.length;
  console.log(`✅ [sourceMerger] ${stats.total} records after merging ${feeds.length} sources`);

  return { records, stats };
}
