/**
 * ════════════════════════════════════════════════════════════════════════════════
 * FILE: categoryStore.ts
 * PURPOSE: Resolve raw feed categories into the canonical taxonomy
 * ════════════════════════════════════════════════════════════════════════════════
 *
 * Resolution order for a raw category:
 * 1. Stored mapping (first entry wins, compared raw and normalized)
 * 2. Already a canonical category → itself
 * 3. Resolver callback (human or another system), offered the top suggestions;
 *    the answer is stored at once so the same raw category is asked only once
 * 4. No resolver, a decline, a timeout or a failing resolver → raw category unchanged
 *
 * One instance is created per run and passed to the stages that need it.
 */

import type { CategoryMapping, ProductRecord } from '../types/Product.js';
import { describeError } from '../utils/errors.js';
import { isBlankValue } from '../utils/tableColumns.js';
import { normalizeCategoryText } from '../utils/textNormalize.js';
import {
  type CategorySuggestion,
  DEFAULT_SUGGESTION_LIMIT,
  suggestCategories,
} from './categorySuggestions.js';
import { type CategoryPathOptions, formatCategoryPath } from './categoryTransform.js';
import type { MappingStore } from './mappingStore.js';

// ============================================================================
// TYPES
// ============================================================================

export interface CategoryResolutionRequest {
  rawCategory: string;
  productName: string | null;
  suggestions: CategorySuggestion[];
}

/** Returns the canonical category, or null/'' to decline */
export type CategoryResolver = (
  request: CategoryResolutionRequest
) => Promise<string | null> | string | null;

export interface CategoryStoreOptions {
  store: MappingStore;
  resolver?: CategoryResolver;
  /** Unanswered resolutions are declined after this long; unset waits forever */
  resolverTimeoutMs?: number;
  suggestionLimit?: number;
  /** Applied last by categorize(); null leaves categories as resolved */
  pathFormat?: CategoryPathOptions | null;
}

type ResolverOutcome =
  | { kind: 'answer'; value: string | null }
  | { kind: 'timeout' }
  | { kind: 'error'; message: string };

// ============================================================================
// STORE
// ============================================================================

export class CategoryStore {
  private readonly store: MappingStore;
  private readonly resolver: CategoryResolver | undefined;
  private readonly resolverTimeoutMs: number | undefined;
  private readonly suggestionLimit: number;
  private readonly pathFormat: CategoryPathOptions | null;

  private mappings: CategoryMapping[] = [];
  private readonly known = new Set<string>();
  /** Resolutions waiting on the resolver, by normalized raw category */
  private readonly pending = new Map<string, Promise<string>>();
  private readonly warned = new Set<string>();

  constructor(options: CategoryStoreOptions) {
    this.store = options.store;
    this.resolver = options.resolver;
    this.resolverTimeoutMs = options.resolverTimeoutMs;
    this.suggestionLimit = options.suggestionLimit ?? DEFAULT_SUGGESTION_LIMIT;
    this.pathFormat = options.pathFormat === undefined ? null : options.pathFormat;
    this.reload();
  }

  /** Re-read every mapping from the backing store */
  reload(): void {
    this.mappings = this.store.load();
    this.known.clear();
    for (const mapping of this.mappings) {
      this.rememberCanonical(mapping);
    }
    console.log(`📂 [categoryStore] ${this.mappings.length} mappings loaded from ${this.store.location}`);
  }

  /** Write the full cached list back to the store */
  flush(): void {
    this.store.save(this.mappings);
  }

  get size(): number {
    return this.mappings.length;
  }

  mappingsSnapshot(): CategoryMapping[] {
    return this.mappings.map(mapping => ({ ...mapping }));
  }

  knownCategories(): string[] {
    return [...this.known];
  }

  /** Canonical categories seen elsewhere (e.g. already-mapped primary data) */
  registerKnownCategories(categories: Iterable<string>): void {
    for (const category of categories) {
      const trimmed = category.trim();
      if (trimmed) this.known.add(trimmed);
    }
  }

  lookup(rawCategory: string): string | null {
    const normalized = normalizeCategoryText(rawCategory);

    for (const mapping of this.mappings) {
      const old = mapping.oldCategory;
      const oldNormalized = normalizeCategoryText(old);
      if (
        old === rawCategory ||
        old === normalized ||
        oldNormalized === rawCategory ||
        oldNormalized === normalized
      ) {
        return mapping.newCategory;
      }
    }
    return null;
  }

  /**
   * Check-and-insert: an existing mapping for the raw category wins and is
   * returned instead of adding a second entry.
   */
  add(rawCategory: string, canonicalCategory: string): string {
    const existing = this.lookup(rawCategory);
    if (existing !== null) return existing;

    const mapping: CategoryMapping = { oldCategory: rawCategory, newCategory: canonicalCategory };
    this.mappings.push(mapping);
    this.store.append(mapping);
    this.rememberCanonical(mapping);
    return canonicalCategory;
  }

  suggest(rawCategory: string, limit = this.suggestionLimit): CategorySuggestion[] {
    return suggestCategories(rawCategory, this.known, limit);
  }

  async resolve(rawCategory: string, productNameHint: string | null = null): Promise<string> {
    if (isBlankValue(rawCategory)) return '';

    const mapped = this.lookup(rawCategory);
    if (mapped !== null) return mapped;

    const normalized = normalizeCategoryText(rawCategory);
    if (this.known.has(rawCategory) || this.known.has(normalized)) return rawCategory;

    const resolver = this.resolver;
    if (!resolver) {
      if (!this.warned.has(normalized)) {
        this.warned.add(normalized);
        console.warn(`⚠️  [categoryStore] No mapping for "${rawCategory}" - keeping it unchanged`);
      }
      return rawCategory;
    }

    const inFlight = this.pending.get(normalized);
    if (inFlight) return inFlight;

    const resolution = this.askResolver(resolver, rawCategory, productNameHint).finally(() => {
      this.pending.delete(normalized);
    });
    this.pending.set(normalized, resolution);
    return resolution;
  }

  /** Resolve every record in table order and apply the path format */
  async categorize(records: ProductRecord[]): Promise<ProductRecord[]> {
    for (const record of records) {
      const resolved = await this.resolve(record.rawCategory, record.name || null);
      record.resolvedCategory = resolved;
      record.canonicalCategory = this.pathFormat ? formatCategoryPath(resolved, this.pathFormat) : resolved;
    }
    console.log(`✅ [categoryStore] ${records.length} records categorized`);
    return records;
  }

  // ──────────────────────────────────────────────────────────────────────────
  // Internals
  // ──────────────────────────────────────────────────────────────────────────

  private rememberCanonical(mapping: CategoryMapping): void {
    const canonical = mapping.newCategory.trim();
    // Identity entries record a decline, not a taxonomy category
    if (canonical && canonical !== mapping.oldCategory.trim()) this.known.add(canonical);
  }

  private async askResolver(
    resolver: CategoryResolver,
    rawCategory: string,
    productName: string | null
  ): Promise<string> {
    const request: CategoryResolutionRequest = {
      rawCategory,
      productName,
      suggestions: this.suggest(rawCategory),
    };

    const outcome = await this.callWithTimeout(resolver, request);

    if (outcome.kind === 'timeout') {
      console.warn(`⚠️  [categoryStore] Resolver timed out for "${rawCategory}" - keeping it unchanged`);
      return rawCategory;
    }
    if (outcome.kind === 'error') {
      console.error(`❌ [categoryStore] Resolver failed for "${rawCategory}": ${outcome.message}`);
      return rawCategory;
    }

    const answer = outcome.value?.trim() ?? '';
    // A decline is stored as an identity mapping so it is not asked again
    return this.add(rawCategory, answer === '' ? rawCategory : answer);
  }

  private async callWithTimeout(
    resolver: CategoryResolver,
    request: CategoryResolutionRequest
  ): Promise<ResolverOutcome> {
    const answer = (async (): Promise<ResolverOutcome> => {
      try {
        return { kind: 'answer', value: await resolver(request) };
      } catch (error) {
        return { kind: 'error', message: describeError(error) };
      }
    })();

    const timeoutMs = this.resolverTimeoutMs;
    if (timeoutMs === undefined) return answer;

    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<ResolverOutcome>(resolve => {
      timer = setTimeout(() => resolve({ kind: 'timeout' }), timeoutMs);
    });

    try {
      return await Promise.race([answer, timeout]);
    } finally {
      clearTimeout(timer);
    }
  }
}
