export * from './types/Product.js';

export { ConfigurationError } from './utils/errors.js';
export { normalizeUnit, formatMeasure, parseDecimal, type Measure } from './utils/units.js';
export { naturalSortKey, compareNatural, naturalSort, naturalMin } from './utils/naturalSort.js';
export { SequenceMatcher, similarityRatio } from './utils/sequenceMatcher.js';
export { fullRatio, tokenSortRatio, partialRatio } from './utils/fuzzyRatios.js';
export { normalizeCategoryText } from './utils/textNormalize.js';

export * from './config/pipelineConfig.js';
export * from './config/variantSchema.js';

export * from './merge/sourceMerger.js';

export * from './categories/categoryStore.js';
export * from './categories/mappingStore.js';
export * from './categories/categorySuggestions.js';
export * from './categories/categoryTransform.js';
export * from './categories/categoryFilter.js';

export { extractBaseName } from './variants/baseName.js';
export * from './variants/manufacturerExclusion.js';
export * from './variants/variantGrouping.js';
export * from './variants/differenceExtractor.js';
export * from './variants/catalogPattern.js';
export * from './variants/variantReport.js';
export * from './variants/variantMatcher.js';

export * from './reports/reportWriter.js';
export * from './reports/reportFiles.js';

export * from './pipeline/reconcileCatalog.js';
