/**
 * Variant grouping - greedy, single pass, in table order.
 *
 * Each unvisited record with a long enough base name opens a group; every
 * later unvisited record whose base name is nearly identical to the opener's
 * joins it and is not considered again. Groups of one are dropped, and the
 * member with the naturally smallest code becomes the parent.
 */

import type { ProductRecord, VariantGroup, VariantMember } from '../types/Product.js';
import { naturalMin } from '../utils/naturalSort.js';
import { similarityRatio } from '../utils/sequenceMatcher.js';
import { textLength } from '../utils/textNormalize.js';
import { extractBaseName } from './baseName.js';
import type { ProductExclusion } from './manufacturerExclusion.js';

export interface GroupingThresholds {
  /** Shorter base names are too generic to group */
  minBaseNameLength: number;
  /** Similarity must be strictly greater than this */
  similarityThreshold: number;
  /** Shorter/longer base name length */
  minLengthRatio: number;
}

export const DEFAULT_GROUPING_THRESHOLDS: GroupingThresholds = {
  minBaseNameLength: 8,
  similarityThreshold: 0.98,
  minLengthRatio: 0.5,
};

interface GroupingEntry {
  record: ProductRecord;
  baseName: string;
  length: number;
}

/**
 * Records eligible for grouping: no parent yet, not a parent already, not
 * excluded, with both a code and a name.
 */
export function selectCandidates(records: ProductRecord[], exclude?: ProductExclusion): ProductRecord[] {
  const usedAsParent = new Set<string>();
  for (const record of records) {
    if (record.parentCode) usedAsParent.add(record.parentCode);
  }

  return records.filter(record =>
    record.code !== '' &&
    record.name.trim() !== '' &&
    !record.parentCode &&
    !usedAsParent.has(record.code) &&
    !(exclude?.(record) ?? false)
  );
}

function isCompatible(a: GroupingEntry, b: GroupingEntry, thresholds: GroupingThresholds): boolean {
  const lengthRatio = Math.min(a.length, b.length) / Math.max(a.length, b.length);
  if (lengthRatio < thresholds.minLengthRatio) return false;
  return similarityRatio(a.baseName, b.baseName) > thresholds.similarityThreshold;
}

export function groupByBaseName(
  candidates: ProductRecord[],
  thresholds: GroupingThresholds = DEFAULT_GROUPING_THRESHOLDS
): VariantGroup[] {
  const entries: GroupingEntry[] = [];
  for (const record of candidates) {
    const baseName = extractBaseName(record.name);
    if (baseName) entries.push({ record, baseName, length: textLength(baseName) });
  }

  const visited = new Array<boolean>(entries.length).fill(false);
  const groups: VariantGroup[] = [];

  for (let i = 0; i < entries.length; i++) {
    const opener = entries[i];
    if (visited[i] || opener.length < thresholds.minBaseNameLength) continue;
    visited[i] = true;

    const members: GroupingEntry[] = [opener];
    for (let j = i + 1; j < entries.length; j++) {
      const candidate = entries[j];
      if (visited[j] || candidate.length < thresholds.minBaseNameLength) continue;
      if (!isCompatible(opener, candidate, thresholds)) continue;
      visited[j] = true;
      members.push(candidate);
    }

    if (members.length < 2) continue;

    const parentCode = naturalMin(members.map(member => member.record.code)) ?? opener.record.code;
    groups.push({
      id: groups.length + 1,
      parentCode,
      members: members.map((member): VariantMember => ({
        code: member.record.code,
        name: member.record.name,
        baseName: member.baseName,
        isParent: member.record.code === parentCode,
      })),
    });
  }

  return groups;
}
