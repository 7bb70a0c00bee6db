/**
 * ════════════════════════════════════════════════════════════════════════════════
 * FILE: reportWriter.ts
 * PURPOSE: Plain-text audit reports for merge, variant groups, differences and
 *          report re-application
 * ════════════════════════════════════════════════════════════════════════════════
 *
 * The groups report is also an input: reviewers edit it and it is read back
 * by parseVariantReport(), so its line formats must stay in step with the
 * patterns there.
 */

import { ATTRIBUTE_LABELS } from '../config/variantSchema.js';
import type { MergeStatistics, ProductRecord, VariantGroup, VariantMember } from '../types/Product.js';
import { formatTimestamp } from '../utils/timestamp.js';
import type { AmbiguousEntry, AssignmentSummary } from '../variants/variantReport.js';

const RULE_WIDTH = 80;
const PARENT_MARKER = '[PARENT]';
const NO_MARKER = ' '.repeat(PARENT_MARKER.length);

function title(text: string): string[] {
  return [text, '='.repeat(text.length)];
}

function memberLine(member: VariantMember, position: number): string {
  return `${position}. ${member.isParent ? PARENT_MARKER : NO_MARKER} ${member.code} - ${member.name}`;
}

function groupHeader(group: VariantGroup): string[] {
  return [`Group #${group.id} - Parent catalog: ${group.parentCode}`, '-'.repeat(RULE_WIDTH)];
}

// ============================================================================
// VARIANT GROUPS
// ============================================================================

export function renderVariantGroupsReport(groups: VariantGroup[], generatedAt: Date = new Date()): string {
  const totalVariants = groups.reduce((sum, group) => sum + group.members.length, 0);
  const lines: string[] = [
    ...title('PRODUCT VARIANT GROUPS REPORT'),
    '',
    `Generated: ${formatTimestamp(generatedAt)}`,
    `Total groups: ${groups.length}`,
    `Total variants: ${totalVariants}`,
    '',
  ];

  for (const group of groups) {
    lines.push(...groupHeader(group));
    group.members.forEach((member, index) => {
      lines.push(memberLine(member, index + 1));
      lines.push(`   Base name: ${member.baseName}`);
    });
    lines.push('', '='.repeat(RULE_WIDTH), '');
  }

  return lines.join('\n');
}

// ============================================================================
// DIFFERENCES
// ============================================================================

export interface DifferencesReportOptions {
  /** Only members passing this are listed (schema categories) */
  include: (record: ProductRecord) => boolean;
  generatedAt?: Date;
}

function differenceLines(record: ProductRecord): string[] {
  const { attributes } = record;
  const lines: string[] = [];

  const dimensions = (['width', 'length', 'height'] as const)
    .filter(attribute => attributes[attribute] !== undefined)
    .map(attribute => `${ATTRIBUTE_LABELS[attribute]}: ${attributes[attribute]}`);
  if (dimensions.length > 0) lines.push(`   Rozmery: ${dimensions.join(', ')}`);

  if (attributes.power !== undefined) lines.push(`   ${ATTRIBUTE_LABELS.power}: ${attributes.power}`);
  if (attributes.volume !== undefined) lines.push(`   ${ATTRIBUTE_LABELS.volume}: ${attributes.volume}`);
  if (attributes.variantLabel !== undefined) lines.push(`   ${ATTRIBUTE_LABELS.variantLabel}: ${attributes.variantLabel}`);

  return lines.length > 0 ? lines : ['   Žiadne rozdiely neboli detekované'];
}

export function renderDifferencesReport(
  groups: VariantGroup[],
  records: ProductRecord[],
  options: DifferencesReportOptions
): string {
  const byCode = new Map<string, ProductRecord>(records.map(record => [record.code, record]));
  const lines: string[] = [
    ...title('PRODUCT DIFFERENCES REPORT'),
    '',
    `Generated: ${formatTimestamp(options.generatedAt ?? new Date())}`,
    '',
  ];

  for (const group of groups) {
    const listed = group.members.flatMap(member => {
      const record = byCode.get(member.code);
      return record && options.include(record) ? [{ member, record }] : [];
    });
    if (listed.length === 0) continue;

    lines.push(...groupHeader(group));
    listed.forEach(({ member, record }, index) => {
      lines.push(memberLine(member, index + 1));
      lines.push(...differenceLines(record));
    });
    lines.push('');
  }

  return lines.join('\n');
}

// ============================================================================
// ASSIGNMENT SUMMARY
// ============================================================================

function ambiguousJson(entry: AmbiguousEntry): string {
  const line: Record<string, string | number> = {
    group_id: entry.groupId,
    token: entry.token,
    match_count: entry.matchCount,
  };
  if (entry.selected !== undefined) line.selected = entry.selected;
  return JSON.stringify(line);
}

function section(lines: string[], heading: string, entries: string[]): void {
  if (entries.length === 0) return;
  lines.push('', heading, ...entries);
}

export function renderAssignmentSummary(summary: AssignmentSummary, generatedAt: Date = new Date()): string {
  const lines: string[] = [
    ...title('VARIANT ASSIGNMENT SUMMARY'),
    '',
    `Generated: ${formatTimestamp(generatedAt)}`,
    '',
    `Groups processed: ${summary.groupsProcessed}`,
    `Products considered: ${summary.productsConsidered}`,
    `Assignments made: ${summary.assignmentsMade}`,
    `Conflicts overridden: ${summary.conflictsOverridden.length}`,
    `Conflicts skipped: ${summary.conflictsSkipped.length}`,
    `Hierarchy conflicts: ${summary.hierarchyConflicts.length}`,
    `Unmatched parent tokens: ${summary.unmatchedParents.length}`,
    `Unmatched product tokens: ${summary.unmatchedProducts.length}`,
    `Ambiguous parent tokens: ${summary.ambiguousParents.length}`,
    `Ambiguous product tokens: ${summary.ambiguousProducts.length}`,
  ];

  section(lines, 'UNMATCHED PARENTS', summary.unmatchedParents.map(entry =>
    JSON.stringify({ group_id: entry.groupId, token: entry.token })
  ));
  section(lines, 'UNMATCHED PRODUCTS', summary.unmatchedProducts.map(entry =>
    JSON.stringify({ group_id: entry.groupId, token: entry.token })
  ));
  section(lines, 'AMBIGUOUS PARENTS', summary.ambiguousParents.map(ambiguousJson));
  section(lines, 'AMBIGUOUS PRODUCTS', summary.ambiguousProducts.map(ambiguousJson));
  section(lines, 'CONFLICTS OVERRIDDEN', summary.conflictsOverridden.map(entry =>
    JSON.stringify({ group_id: entry.groupId, catalog: entry.code, old_parent: entry.oldParent, new_parent: entry.newParent })
  ));
  section(lines, 'CONFLICTS SKIPPED', summary.conflictsSkipped.map(entry =>
    JSON.stringify({
      group_id: entry.groupId,
      catalog: entry.code,
      existing_parent: entry.existingParent,
      desired_parent: entry.desiredParent,
    })
  ));

  section(lines, 'HIERARCHY CONFLICTS', summary.hierarchyConflicts.map(entry =>
    JSON.stringify({ group_id: entry.groupId, catalog: entry.code, kind: entry.kind, resolution: entry.resolution })
  ));

  return lines.join('\n') + '\n';
}

// ============================================================================
// MERGE SUMMARY
// ============================================================================

export function renderMergeSummary(stats: MergeStatistics, generatedAt: Date = new Date()): string {
  const lines: string[] = [
    ...title('MERGE SUMMARY'),
    '',
    `Generated: ${formatTimestamp(generatedAt)}`,
    '',
    `Primary (${stats.primary}): ${stats.primaryCount} records, ${stats.duplicatesDropped} duplicates dropped`,
  ];

  for (const [source, counts] of Object.entries(stats.sources)) {
    lines.push(
      `Source ${source}: +${counts.added} added, ${counts.updated} updated, ` +
        `${counts.skipped} skipped, ${counts.duplicatesDropped} duplicates dropped`
    );
  }
  if (stats.skippedSources.length > 0) {
    lines.push(`Skipped sources: ${stats.skippedSources.join(', ')}`);
  }
  if (stats.categoryFilter) {
    lines.push(`Category filter: kept ${stats.categoryFilter.kept}, removed ${stats.categoryFilter.removed}`);
  }
  lines.push(`Total records: ${stats.total}`);

  return lines.join('\n') + '\n';
}
