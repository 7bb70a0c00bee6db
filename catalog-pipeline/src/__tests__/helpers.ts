import { toProductRecord } from '../merge/sourceMerger.js';
import type { ProductRecord, SourceRow, SourceTable } from '../types/Product.js';

export function sourceTable(rows: SourceRow[], columns?: string[]): SourceTable {
  const seen = new Set<string>(columns ?? []);
  if (!columns) {
    for (const row of rows) Object.keys(row).forEach(column => seen.add(column));
  }
  return { columns: [...seen], rows };
}

export function product(code: string, name: string, fields: SourceRow = {}): ProductRecord {
  return toProductRecord({ code, name, ...fields }, 'test');
}

export const quiet = (): void => {};
