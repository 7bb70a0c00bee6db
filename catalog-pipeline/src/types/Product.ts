/**
 * Core record types shared by the merge, category and variant stages.
 */

/** A raw row as handed over by a feed reader (CSV/XLSX/XML collaborators). */
export interface SourceRow {
  [column: string]: string | null | undefined;
}

export interface SourceTable {
  /** Column names present in the source, in source order */
  columns: string[];
  rows: SourceRow[];
}

export const IMAGE_SLOT_COUNT = 8;

export type VariantAttribute = 'width' | 'length' | 'height' | 'power' | 'volume' | 'variantLabel';

export type VariantAttributes = Partial<Record<VariantAttribute, string>>;

export interface ProductRecord {
  /** Uppercased catalog code, unique within a canonical table */
  code: string;
  name: string;
  /** Category text exactly as the source delivered it */
  rawCategory: string;
  /** Category after mapping, before the output path format is applied */
  resolvedCategory: string;
  canonicalCategory: string;
  /** Price as delivered; compared numerically, never rewritten */
  price: string | null;
  /** Always IMAGE_SLOT_COUNT slots, '' for an empty slot */
  images: string[];
  /** Free-text parameter blob (short description) */
  parameters: string;
  manufacturer: string;
  attributes: VariantAttributes;
  parentCode: string | null;
  sourceTag: string;
  lastUpdated: string | null;
  /** Remaining source columns, carried through untouched */
  extra: Record<string, string>;
}

export interface SourceMergeCounts {
  added: number;
  updated: number;
  skipped: number;
  duplicatesDropped: number;
}

export interface MergeStatistics {
  primary: string;
  primaryCount: number;
  duplicatesDropped: number;
  sources: Record<string, SourceMergeCounts>;
  /** Sources skipped entirely, e.g. for a missing code column */
  skippedSources: string[];
  /** Set only for a category-filtered merge */
  categoryFilter?: {
    selected: string[];
    kept: number;
    removed: number;
  };
  total: number;
}

export interface VariantMember {
  code: string;
  name: string;
  baseName: string;
  isParent: boolean;
}

export interface VariantGroup {
  id: number;
  parentCode: string;
  members: VariantMember[];
}

export interface CategoryMapping {
  oldCategory: string;
  newCategory: string;
}
