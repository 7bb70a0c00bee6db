/**
 * ════════════════════════════════════════════════════════════════════════════════
 * FILE: variantMatcher.ts
 * PURPOSE: Variant family detection over a merged, categorized table
 * ════════════════════════════════════════════════════════════════════════════════
 *
 * analyze()            → groups of near-identical base names, parent by natural sort
 * assignParents()      → parentCode on every non-parent member
 * extractDifferences() → width/length/height/power/volume/label for schema categories
 * applyReport()        → re-apply a reviewed groups report (wildcard codes allowed)
 */

import { VariantExtractionSchema } from '../config/variantSchema.js';
import type { ProductRecord, VariantAttribute, VariantGroup } from '../types/Product.js';
import { describeError } from '../utils/errors.js';
import { extractAttributes, pickAttributes } from './differenceExtractor.js';
import { createManufacturerExclusion, type ProductExclusion } from './manufacturerExclusion.js';
import {
  DEFAULT_GROUPING_THRESHOLDS,
  type GroupingThresholds,
  groupByBaseName,
  selectCandidates,
} from './variantGrouping.js';
import {
  applyVariantReport,
  parseVariantReport,
  type ReapplyOptions,
  type ReapplyResult,
} from './variantReport.js';

// ============================================================================
// TYPES
// ============================================================================

export interface VariantMatcherOptions extends Partial<GroupingThresholds>, ReapplyOptions {
  /** Records to leave out of grouping; defaults to the manufacturer block-list */
  exclude?: ProductExclusion;
  schema?: VariantExtractionSchema;
  onProgress?: (message: string) => void;
}

export interface ExtractionFailure {
  code: string;
  message: string;
}

export interface ExtractionResult {
  /** Members in a schema category */
  processed: number;
  /** Members that received at least one attribute */
  extracted: number;
  failures: ExtractionFailure[];
}

export interface ReportApplication extends ReapplyResult {
  extraction: ExtractionResult | null;
}

// ============================================================================
// MATCHER
// ============================================================================

export class VariantMatcher {
  private readonly thresholds: GroupingThresholds;
  private readonly exclude: ProductExclusion;
  private readonly schema: VariantExtractionSchema;
  private readonly reapply: ReapplyOptions;
  private readonly progress: (message: string) => void;

  constructor(options: VariantMatcherOptions = {}) {
    this.thresholds = {
      minBaseNameLength: options.minBaseNameLength ?? DEFAULT_GROUPING_THRESHOLDS.minBaseNameLength,
      similarityThreshold: options.similarityThreshold ?? DEFAULT_GROUPING_THRESHOLDS.similarityThreshold,
      minLengthRatio: options.minLengthRatio ?? DEFAULT_GROUPING_THRESHOLDS.minLengthRatio,
    };
    this.exclude = options.exclude ?? createManufacturerExclusion();
    this.schema = options.schema ?? new VariantExtractionSchema();
    this.reapply = { override: options.override, ambiguousProducts: options.ambiguousProducts };
    this.progress = options.onProgress ?? (message => console.log(message));
  }

  analyze(records: ProductRecord[]): VariantGroup[] {
    if (records.length > 0 && records.every(record => record.name.trim() === '')) {
      console.warn('⚠️  [variantMatcher] No product names in the table - nothing to analyze');
      return [];
    }

    const candidates = selectCandidates(records, this.exclude);
    this.progress(`🔍 Analyzing ${candidates.length} of ${records.length} products for variants...`);

    if (candidates.length < 2) {
      this.progress('   No suitable products for variant detection');
      return [];
    }

    const groups = groupByBaseName(candidates, this.thresholds);
    const variants = groups.reduce((sum, group) => sum + group.members.length, 0);
    this.progress(`✅ Found ${groups.length} variant groups (${variants} products)`);
    return groups;
  }

  /** Number of records whose parentCode was set */
  assignParents(records: ProductRecord[], groups: VariantGroup[]): number {
    const byCode = new Map<string, ProductRecord>(records.map(record => [record.code, record]));
    let assigned = 0;

    for (const group of groups) {
      for (const member of group.members) {
        if (member.isParent || member.code === group.parentCode) continue;
        const record = byCode.get(member.code);
        if (!record || record.parentCode === group.parentCode) continue;
        if (record.parentCode && this.reapply.override === false) continue;
        record.parentCode = group.parentCode;
        assigned++;
      }
    }

    this.progress(`   Assigned parent codes to ${assigned} products`);
    return assigned;
  }

  extractDifferences(records: ProductRecord[], groups: VariantGroup[]): ExtractionResult {
    const byCode = new Map<string, ProductRecord>(records.map(record => [record.code, record]));
    const result: ExtractionResult = { processed: 0, extracted: 0, failures: [] };

    for (const group of groups) {
      for (const member of group.members) {
        const record = byCode.get(member.code);
        if (!record) continue;

        const allowed = this.attributesFor(record);
        if (allowed === null) continue;
        result.processed++;

        try {
          const attributes = pickAttributes(extractAttributes(record, member.baseName), allowed);
          record.attributes = { ...record.attributes, ...attributes };
          if (Object.keys(attributes).length > 0) result.extracted++;
        } catch (error) {
          const message = describeError(error);
          console.error(`❌ [variantMatcher] Extraction failed for ${record.code}: ${message}`);
          result.failures.push({ code: record.code, message });
        }
      }
    }

    this.progress(`   Extracted differences for ${result.extracted} of ${result.processed} products`);
    return result;
  }

  applyReport(
    records: ProductRecord[],
    reportText: string,
    options: { extractDifferences?: boolean } = {}
  ): ReportApplication {
    const reportGroups = parseVariantReport(reportText);
    this.progress(`📄 Re-applying ${reportGroups.length} groups from report...`);

    const result = applyVariantReport(records, reportGroups, this.reapply);
    const { summary } = result;
    this.progress(
      `✅ ${summary.assignmentsMade} assignments, ${summary.unmatchedProducts.length + summary.unmatchedParents.length} unmatched, ` +
        `${summary.conflictsOverridden.length + summary.conflictsSkipped.length + summary.hierarchyConflicts.length} conflicts`
    );

    const extraction = options.extractDifferences ? this.extractDifferences(records, result.groups) : null;
    return { ...result, extraction };
  }

  /**
   * Schema attributes for the record's category, or null when not listed.
   * Tried on the output path, the mapped category, then the feed's own text.
   */
  attributesFor(record: ProductRecord): VariantAttribute[] | null {
    for (const category of [record.canonicalCategory, record.resolvedCategory, record.rawCategory]) {
      const attributes = this.schema.attributesFor(category);
      if (attributes !== null) return attributes;
    }
    return null;
  }

  isExtractionCategory(record: ProductRecord): boolean {
    return this.attributesFor(record) !== null;
  }
}
