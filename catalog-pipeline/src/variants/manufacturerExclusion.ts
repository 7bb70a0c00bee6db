/**
 * Manufacturer block-list for variant detection.
 *
 * Some manufacturers name every model alike ("Chladnička ... 300 l",
 * "Chladnička ... 350 l") although the models are not variants of each
 * other; their products are kept out of grouping.
 */

import type { ProductRecord } from '../types/Product.js';

export const DEFAULT_EXCLUDED_MANUFACTURERS = ['Liebherr'];

export type ProductExclusion = (record: ProductRecord) => boolean;

/** Case-insensitive substring match on the manufacturer field */
export function isExcludedManufacturer(manufacturer: string, blocklist: Iterable<string>): boolean {
  const value = manufacturer.trim().toLowerCase();
  if (!value) return false;
  for (const blocked of blocklist) {
    const needle = blocked.trim().toLowerCase();
    if (needle && value.includes(needle)) return true;
  }
  return false;
}

export function createManufacturerExclusion(
  blocklist: string[] = DEFAULT_EXCLUDED_MANUFACTURERS
): ProductExclusion {
  const entries = [...blocklist];
  return record => isExcludedManufacturer(record.manufacturer, entries);
}
