import { product } from '../../__tests__/helpers.js';
import type { MergeStatistics, VariantGroup } from '../../types/Product.js';
import { emptyAssignmentSummary } from '../../variants/variantReport.js';
import {
  renderAssignmentSummary,
  renderDifferencesReport,
  renderMergeSummary,
  renderVariantGroupsReport,
} from '../reportWriter.js';

const generatedAt = new Date(2026, 9, 18, 14, 5, 9);
const NO_MARKER = ' '.repeat(8);

const group: VariantGroup = {
  id: 1,
  parentCode: 'T001',
  members: [
    { code: 'T001', name: 'Pracovný stôl 850', baseName: 'Pracovný stôl', isParent: true },
    { code: 'T002', name: 'Pracovný stôl 1200', baseName: 'Pracovný stôl', isParent: false },
  ],
};

describe('renderVariantGroupsReport', () => {
  test('writes the header, one block per group and the member lines', () => {
    expect(renderVariantGroupsReport([group], generatedAt)).toBe([
      'PRODUCT VARIANT GROUPS REPORT',
      '='.repeat(29),
      '',
      'Generated: 2026-10-18 14:05:09',
      'Total groups: 1',
      'Total variants: 2',
      '',
      'Group #1 - Parent catalog: T001',
      '-'.repeat(80),
      '1. [PARENT] T001 - Pracovný stôl 850',
      '   Base name: Pracovný stôl',
      `2. ${NO_MARKER} T002 - Pracovný stôl 1200`,
      '   Base name: Pracovný stôl',
      '',
      '='.repeat(80),
      '',
    ].join('\n'));
  });
});

describe('renderDifferencesReport', () => {
  test('lists the extracted attributes of included members', () => {
    const parent = product('T001', 'Pracovný stôl 850', { defaultCategory: 'Stoly' });
    parent.attributes = { width: '400 mm', height: '850 mm', power: '800 W', variantLabel: 'nerez' };
    const child = product('T002', 'Pracovný stôl 1200', { defaultCategory: 'Stoly' });
    const other: VariantGroup = {
      id: 2,
      parentCode: 'C001',
      members: [{ code: 'C001', name: 'Chladnička', baseName: 'Chladnička', isParent: true }],
    };

    const text = renderDifferencesReport([group, other], [parent, child, product('C001', 'Chladnička')], {
      include: record => record.rawCategory === 'Stoly',
      generatedAt,
    });

    expect(text).toBe([
      'PRODUCT DIFFERENCES REPORT',
      '='.repeat(26),
      '',
      'Generated: 2026-10-18 14:05:09',
      '',
      'Group #1 - Parent catalog: T001',
      '-'.repeat(80),
      '1. [PARENT] T001 - Pracovný stôl 850',
      '   Rozmery: Šírka: 400 mm, Výška: 850 mm',
      '   Výkon: 800 W',
      '   Variant: nerez',
      `2. ${NO_MARKER} T002 - Pracovný stôl 1200`,
      '   Žiadne rozdiely neboli detekované',
      '',
    ].join('\n'));
  });
});

describe('renderAssignmentSummary', () => {
  test('writes counts and JSON lines for non-empty sections only', () => {
    const summary = emptyAssignmentSummary();
    summary.groupsProcessed = 1;
    summary.productsConsidered = 2;
    summary.assignmentsMade = 1;
    summary.ambiguousParents.push({ groupId: 1, token: 'LX-xxxx', matchCount: 2, selected: 'LX-0001' });
    summary.conflictsOverridden.push({ groupId: 1, code: 'LX-0002', oldParent: 'Z9', newParent: 'LX-0001' });
    summary.hierarchyConflicts.push({ groupId: 2, code: 'LX-0001', kind: 'parent-is-child', resolution: 'skipped' });

    expect(renderAssignmentSummary(summary, generatedAt)).toBe([
      'VARIANT ASSIGNMENT SUMMARY',
      '='.repeat(26),
      '',
      'Generated: 2026-10-18 14:05:09',
      '',
      'Groups processed: 1',
      'Products considered: 2',
      'Assignments made: 1',
      'Conflicts overridden: 1',
      'Conflicts skipped: 0',
      'Hierarchy conflicts: 1',
      'Unmatched parent tokens: 0',
      'Unmatched product tokens: 0',
      'Ambiguous parent tokens: 1',
      'Ambiguous product tokens: 0',
      '',
      'AMBIGUOUS PARENTS',
      '{"group_id":1,"token":"LX-xxxx","match_count":2,"selected":"LX-0001"}',
      '',
      'CONFLICTS OVERRIDDEN',
      '{"group_id":1,"catalog":"LX-0002","old_parent":"Z9","new_parent":"LX-0001"}',
      '',
      'HIERARCHY CONFLICTS',
      '{"group_id":2,"catalog":"LX-0001","kind":"parent-is-child","resolution":"skipped"}',
      '',
    ].join('\n'));
  });
});

describe('renderMergeSummary', () => {
  test('writes one line per source', () => {
    const stats: MergeStatistics = {
      primary: 'eshop',
      primaryCount: 2,
      duplicatesDropped: 1,
      sources: { supplier: { added: 1, updated: 1, skipped: 0, duplicatesDropped: 0 } },
      skippedSources: ['broken'],
      categoryFilter: { selected: ['Stoly'], kept: 1, removed: 1 },
      total: 3,
    };

    expect(renderMergeSummary(stats, generatedAt)).toBe([
      'MERGE SUMMARY',
      '='.repeat(13),
      '',
      'Generated: 2026-10-18 14:05:09',
      '',
      'Primary (eshop): 2 records, 1 duplicates dropped',
      'Source supplier: +1 added, 1 updated, 0 skipped, 0 duplicates dropped',
      'Skipped sources: broken',
      'Category filter: kept 1, removed 1',
      'Total records: 3',
      '',
    ].join('\n'));
  });
});
