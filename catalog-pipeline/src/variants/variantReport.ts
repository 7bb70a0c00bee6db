/**
 * ════════════════════════════════════════════════════════════════════════════════
 * FILE: variantReport.ts
 * PURPOSE: Read a (possibly hand-edited) variant groups report back into assignments
 * ════════════════════════════════════════════════════════════════════════════════
 *
 * Reviewers edit the groups report: they move products between groups, drop
 * lines, or replace codes with patterns such as "LX-xxxx". Re-applying never
 * fails on a bad token - unmatched, ambiguous and conflicting entries are
 * collected in the AssignmentSummary and the rest is applied.
 *
 * Hierarchies stay one level deep: a group's parent loses its own parent
 * (or the group is skipped when overriding is off), and a product that
 * still has children is never made a child.
 */

import type { ProductRecord, VariantGroup, VariantMember } from '../types/Product.js';
import { naturalMin } from '../utils/naturalSort.js';
import { extractBaseName } from './baseName.js';
import { CatalogCodeIndex } from './catalogPattern.js';

// ============================================================================
// TYPES
// ============================================================================

export interface ReportProductLine {
  token: string;
  name: string;
  isParent: boolean;
  baseName: string | null;
}

export interface ReportGroup {
  id: number;
  parentToken: string;
  products: ReportProductLine[];
}

export interface TokenEntry {
  groupId: number;
  token: string;
}

export interface AmbiguousEntry extends TokenEntry {
  matchCount: number;
  /** Parent tokens only: the code that was used */
  selected?: string;
}

export interface OverriddenConflict {
  groupId: number;
  code: string;
  oldParent: string;
  newParent: string;
}

export interface SkippedConflict {
  groupId: number;
  code: string;
  existingParent: string;
  desiredParent: string;
}

export interface HierarchyConflict {
  groupId: number;
  code: string;
  /**
   * parent-is-child: the group's parent had a parent of its own.
   * member-is-parent: a member still has children of its own.
   */
  kind: 'parent-is-child' | 'member-is-parent';
  resolution: 'cleared' | 'skipped';
}

export interface AssignmentSummary {
  groupsProcessed: number;
  productsConsidered: number;
  assignmentsMade: number;
  unmatchedParents: TokenEntry[];
  unmatchedProducts: TokenEntry[];
  ambiguousParents: AmbiguousEntry[];
  ambiguousProducts: AmbiguousEntry[];
  conflictsOverridden: OverriddenConflict[];
  conflictsSkipped: SkippedConflict[];
  hierarchyConflicts: HierarchyConflict[];
}

export interface ReapplyOptions {
  /** Overwrite a different existing parent (default true) */
  override?: boolean;
  /** 'first' keeps the naturally smallest match of an ambiguous product token, 'expand' keeps all */
  ambiguousProducts?: 'first' | 'expand';
}

export interface ReapplyResult {
  summary: AssignmentSummary;
  /** Groups as resolved against the live catalog */
  groups: VariantGroup[];
}

// ============================================================================
// PARSING
// ============================================================================

const GROUP_HEADER = /^Group\s*#\s*(\d+)\s*-\s*Parent catalog:\s*(.+?)\s*$/;
const PRODUCT_LINE = /^\s*\d+\.\s*(\[\s*PARENT\s*\])?\s*(\S+)\s*-\s*(.+?)\s*$/;
const BASE_NAME_LINE = /^\s*Base name:\s*(.+?)\s*$/;

export function parseVariantReport(text: string): ReportGroup[] {
  const groups: ReportGroup[] = [];
  let current: ReportGroup | null = null;

  for (const line of text.split(/\r?\n/)) {
    const header = GROUP_HEADER.exec(line);
    if (header) {
      current = { id: Number(header[1]), parentToken: header[2], products: [] };
      groups.push(current);
      continue;
    }
    if (!current) continue;

    const product = PRODUCT_LINE.exec(line);
    if (product) {
      current.products.push({
        token: product[2],
        name: product[3],
        isParent: product[1] !== undefined,
        baseName: null,
      });
      continue;
    }

    const baseName = BASE_NAME_LINE.exec(line);
    const last = current.products[current.products.length - 1];
    if (baseName && last) last.baseName = baseName[1];
  }

  return groups;
}

// ============================================================================
// RE-APPLICATION
// ============================================================================

export function emptyAssignmentSummary(): AssignmentSummary {
  return {
    groupsProcessed: 0,
    productsConsidered: 0,
    assignmentsMade: 0,
    unmatchedParents: [],
    unmatchedProducts: [],
    ambiguousParents: [],
    ambiguousProducts: [],
    conflictsOverridden: [],
    conflictsSkipped: [],
    hierarchyConflicts: [],
  };
}

export function applyVariantReport(
  records: ProductRecord[],
  reportGroups: ReportGroup[],
  options: ReapplyOptions = {}
): ReapplyResult {
  const override = options.override ?? true;
  const expand = options.ambiguousProducts === 'expand';
  const summary = emptyAssignmentSummary();
  const applied: Array<{ id: number; parentCode: string; memberCodes: string[] }> = [];

  const byCode = new Map<string, ProductRecord>();
  for (const record of records) {
    if (record.code && !byCode.has(record.code)) byCode.set(record.code, record);
  }
  const index = new CatalogCodeIndex(byCode.keys());

  const childCount = new Map<string, number>();
  const link = (record: ProductRecord, parentCode: string | null): void => {
    if (record.parentCode) childCount.set(record.parentCode, (childCount.get(record.parentCode) ?? 1) - 1);
    record.parentCode = parentCode;
    if (parentCode) childCount.set(parentCode, (childCount.get(parentCode) ?? 0) + 1);
  };
  for (const record of byCode.values()) {
    if (record.parentCode) childCount.set(record.parentCode, (childCount.get(record.parentCode) ?? 0) + 1);
  }

  for (const group of reportGroups) {
    summary.groupsProcessed++;

    const memberCodes: string[] = [];
    const addMember = (code: string): void => {
      if (!memberCodes.includes(code)) memberCodes.push(code);
    };

    for (const product of group.products) {
      summary.productsConsidered++;
      const matches = index.resolve(product.token);

      if (matches.length === 0) {
        summary.unmatchedProducts.push({ groupId: group.id, token: product.token });
        continue;
      }
      if (matches.length > 1) {
        summary.ambiguousProducts.push({ groupId: group.id, token: product.token, matchCount: matches.length });
        if (expand) {
          matches.forEach(addMember);
          continue;
        }
      }
      addMember(matches[0]);
    }

    const parentMatches = index.resolve(group.parentToken);
    let parentCode: string | null;
    if (parentMatches.length === 0) {
      summary.unmatchedParents.push({ groupId: group.id, token: group.parentToken });
      parentCode = naturalMin(memberCodes);
    } else {
      parentCode = parentMatches[0];
      if (parentMatches.length > 1) {
        summary.ambiguousParents.push({
          groupId: group.id,
          token: group.parentToken,
          matchCount: parentMatches.length,
          selected: parentCode,
        });
      }
    }

    if (parentCode === null) {
      console.warn(`⚠️  [variantReport] Group #${group.id}: nothing resolved - skipped`);
      continue;
    }

    const parentRecord = byCode.get(parentCode);
    if (parentRecord?.parentCode) {
      if (!override) {
        console.warn(`⚠️  [variantReport] Group #${group.id}: parent ${parentCode} is itself a child - skipped`);
        summary.hierarchyConflicts.push({ groupId: group.id, code: parentCode, kind: 'parent-is-child', resolution: 'skipped' });
        continue;
      }
      summary.hierarchyConflicts.push({ groupId: group.id, code: parentCode, kind: 'parent-is-child', resolution: 'cleared' });
      link(parentRecord, null);
    }

    for (const code of memberCodes) {
      if (code === parentCode) continue;
      const record = byCode.get(code);
      if (!record) continue;

      const existing = record.parentCode;
      if (existing === parentCode) continue;

      if ((childCount.get(code) ?? 0) > 0) {
        summary.hierarchyConflicts.push({ groupId: group.id, code, kind: 'member-is-parent', resolution: 'skipped' });
        continue;
      }
      if (existing && !override) {
        summary.conflictsSkipped.push({ groupId: group.id, code, existingParent: existing, desiredParent: parentCode });
        continue;
      }
      if (existing) {
        summary.conflictsOverridden.push({ groupId: group.id, code, oldParent: existing, newParent: parentCode });
      }
      link(record, parentCode);
      summary.assignmentsMade++;
    }

    applied.push({ id: group.id, parentCode, memberCodes });
  }

  // Built from the final hierarchy, so a group undone by a later one is left out
  const resolvedGroups: VariantGroup[] = [];
  for (const { id, parentCode, memberCodes } of applied) {
    const parent = byCode.get(parentCode);
    if (!parent || parent.parentCode) continue;

    const members: VariantMember[] = [
      { code: parentCode, name: parent.name, baseName: extractBaseName(parent.name), isParent: true },
    ];
    for (const code of memberCodes) {
      const record = byCode.get(code);
      if (!record || record.parentCode !== parentCode) continue;
      members.push({ code, name: record.name, baseName: extractBaseName(record.name), isParent: false });
    }
    if (members.length >= 2) resolvedGroups.push({ id, parentCode, members });
  }

  return { summary, groups: resolvedGroups };
}
