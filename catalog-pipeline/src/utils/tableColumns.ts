/**
 * Column lookup for feed rows.
 *
 * Feeds arrive with either the English export headers or the Slovak ones,
 * so every field is read through a list of accepted names.
 */

import { IMAGE_SLOT_COUNT, type SourceRow, type SourceTable } from '../types/Product.js';

export const COLUMN_ALIASES = {
  code: ['code', 'Kat. číslo'],
  name: ['name', 'Názov tovaru'],
  price: ['price', 'Bežná cena'],
  category: ['defaultCategory', 'Hlavna kategória'],
  parameters: ['shortDescription', 'Krátky popis'],
  manufacturer: ['manufacturer', 'Výrobca'],
  parentCode: ['parentCode', 'Kat. číslo rodiča'],
} as const;

export type ColumnField = keyof typeof COLUMN_ALIASES;

/** Accepted names for each image slot, defaultImage first */
export const IMAGE_COLUMN_ALIASES: string[][] = Array.from({ length: IMAGE_SLOT_COUNT }, (_, slot) => {
  if (slot === 0) return ['defaultImage', 'Obrázok'];
  if (slot === 1) return ['image', 'Obrázok 2'];
  return [`image${slot}`, `Obrázok ${slot + 1}`];
});

const KNOWN_COLUMNS = new Set<string>([
  ...Object.values(COLUMN_ALIASES).flat(),
  ...IMAGE_COLUMN_ALIASES.flat(),
]);

/** Spreadsheet readers hand over empty cells as "nan"/"None" */
export function isBlankValue(value: string | null | undefined): boolean {
  if (value === null || value === undefined) return true;
  const trimmed = value.trim();
  return trimmed === '' || trimmed.toLowerCase() === 'nan' || trimmed.toLowerCase() === 'none';
}

/**
 * Get a value from a row with multiple possible column names
 */
export function getColumn(row: SourceRow, ...names: readonly string[]): string {
  for (const name of names) {
    const value = row[name];
    if (!isBlankValue(value)) {
      return (value ?? '').trim();
    }
  }
  return '';
}

export function getField(row: SourceRow, field: ColumnField): string {
  return getColumn(row, ...COLUMN_ALIASES[field]);
}

export function hasField(table: SourceTable, field: ColumnField): boolean {
  const names: readonly string[] = COLUMN_ALIASES[field];
  return table.columns.some(column => names.includes(column));
}

export function readImageSlots(row: SourceRow): string[] {
  return IMAGE_COLUMN_ALIASES.map(names => getColumn(row, ...names));
}

/** Columns the record model does not name, kept as-is */
export function readExtraColumns(row: SourceRow): Record<string, string> {
  const extra: Record<string, string> = {};
  for (const [column, value] of Object.entries(row)) {
    if (KNOWN_COLUMNS.has(column) || value === null || value === undefined) continue;
    extra[column] = value;
  }
  return extra;
}
