/**
 * ════════════════════════════════════════════════════════════════════════════════
 * FILE: reconcileCatalog.ts
 * PURPOSE: One reconciliation run - merge → categorize → variants → reports
 * ════════════════════════════════════════════════════════════════════════════════
 *
 * Hosts (CLI, GUI, batch jobs) read the feeds into SourceTables, build the
 * stages once with createPipeline() and call reconcileCatalog(). The only
 * point where a run waits on the outside world is the category resolver.
 */

import { CategoryStore, type CategoryResolver } from '../categories/categoryStore.js';
import { JsonFileMappingStore } from '../categories/mappingStore.js';
import type { PipelineConfig } from '../config/pipelineConfig.js';
import { VariantExtractionSchema } from '../config/variantSchema.js';
import { mergeSources, type MergeOptions, type SecondarySources } from '../merge/sourceMerger.js';
import { saveReport } from '../reports/reportFiles.js';
import {
  renderDifferencesReport,
  renderMergeSummary,
  renderVariantGroupsReport,
} from '../reports/reportWriter.js';
import type { MergeStatistics, ProductRecord, SourceTable, VariantGroup } from '../types/Product.js';
import { createManufacturerExclusion } from '../variants/manufacturerExclusion.js';
import { type ExtractionResult, VariantMatcher } from '../variants/variantMatcher.js';

export interface ReconcileInput {
  primary: SourceTable;
  secondary: SecondarySources;
}

export interface PipelineStages {
  categoryStore: CategoryStore;
  variantMatcher: VariantMatcher;
}

export interface ReconcileOptions {
  merge?: MergeOptions;
  /** Write the rendered reports here when set */
  reportDir?: string;
  now?: () => Date;
}

export interface ReconcileReports {
  merge: string;
  variantGroups: string;
  differences: string;
}

export interface ReconcileResult {
  records: ProductRecord[];
  mergeStats: MergeStatistics;
  groups: VariantGroup[];
  assigned: number;
  extraction: ExtractionResult;
  reports: ReconcileReports;
  savedReports: string[];
}

export interface PipelineHooks {
  resolver?: CategoryResolver;
  onProgress?: (message: string) => void;
}

/** Build the stages from configuration; throws ConfigurationError for a bad store or schema */
export function createPipeline(config: PipelineConfig, hooks: PipelineHooks = {}): PipelineStages {
  const categoryStore = new CategoryStore({
    store: new JsonFileMappingStore(config.categoryMappingsPath),
    resolver: hooks.resolver,
    resolverTimeoutMs: config.resolverTimeoutMs,
    pathFormat: config.categoryPath,
  });

  const variantMatcher = new VariantMatcher({
    ...config.grouping,
    exclude: createManufacturerExclusion(config.excludedManufacturers),
    schema: VariantExtractionSchema.fromFile(config.variantSchemaPath),
    override: config.overrideConflicts,
    onProgress: hooks.onProgress,
  });

  return { categoryStore, variantMatcher };
}

export async function reconcileCatalog(
  input: ReconcileInput,
  stages: PipelineStages,
  options: ReconcileOptions = {}
): Promise<ReconcileResult> {
  const now = options.now ?? (() => new Date());
  const { categoryStore, variantMatcher } = stages;

  console.log('═'.repeat(60));
  console.log('📦 CATALOG RECONCILIATION');
  console.log('═'.repeat(60));

  const { records, stats } = mergeSources(input.primary, input.secondary, { now, ...options.merge });
  await categoryStore.categorize(records);

  const groups = variantMatcher.analyze(records);
  const assigned = variantMatcher.assignParents(records, groups);
  const extraction = variantMatcher.extractDifferences(records, groups);

  const generatedAt = now();
  const reports: ReconcileReports = {
    merge: renderMergeSummary(stats, generatedAt),
    variantGroups: renderVariantGroupsReport(groups, generatedAt),
    differences: renderDifferencesReport(groups, records, {
      include: record => variantMatcher.isExtractionCategory(record),
      generatedAt,
    }),
  };

  const savedReports: string[] = [];
  if (options.reportDir) {
    savedReports.push(
      saveReport(options.reportDir, 'merge_summary', reports.merge, generatedAt),
      saveReport(options.reportDir, 'product_variants', reports.variantGroups, generatedAt),
      saveReport(options.reportDir, 'product_differences', reports.differences, generatedAt)
    );
  }

  console.log(`\n✅ ${records.length} records, ${groups.length} variant groups, ${assigned} parent assignments`);

  return { records, mergeStats: stats, groups, assigned, extraction, reports, savedReports };
}
