/**
 * Variant Extraction Schema
 *
 * Which categories get structured difference extraction, and which
 * attributes they get. Categories missing from the schema get none.
 *
 * File format (JSON):
 *   [{ "category": "Stoly", "resultColumns": ["Šírka", "Dĺžka", "Výška"] }]
 */

import * as fs from 'fs';
import { z } from 'zod';
import type { VariantAttribute, VariantAttributes } from '../types/Product.js';
import { ConfigurationError, describeError } from '../utils/errors.js';

// ============================================================================
// ATTRIBUTE LABELS
// ============================================================================

/** Column label used in exports and reports for each attribute */
export const ATTRIBUTE_LABELS: Record<VariantAttribute, string> = {
  width: 'Šírka',
  length: 'Dĺžka',
  height: 'Výška',
  power: 'Výkon',
  volume: 'Objem',
  variantLabel: 'Variant',
};

export const VARIANT_ATTRIBUTES: VariantAttribute[] = ['width', 'length', 'height', 'power', 'volume', 'variantLabel'];

/** Accepts either the attribute key or its column label, case-insensitively */
export function resolveAttributeName(name: string): VariantAttribute | null {
  const wanted = name.trim().normalize('NFC').toLowerCase();
  for (const attribute of VARIANT_ATTRIBUTES) {
    if (attribute.toLowerCase() === wanted || ATTRIBUTE_LABELS[attribute].toLowerCase() === wanted) {
      return attribute;
    }
  }
  return null;
}

/** Attributes keyed by column label: { "Šírka": "400 mm", ... } */
export function attributeColumns(attributes: VariantAttributes): Record<string, string> {
  const columns: Record<string, string> = {};
  for (const attribute of VARIANT_ATTRIBUTES) {
    const value = attributes[attribute];
    if (value !== undefined) columns[ATTRIBUTE_LABELS[attribute]] = value;
  }
  return columns;
}

// ============================================================================
// SCHEMA
// ============================================================================

const SchemaFile = z.array(
  z.object({
    category: z.string().min(1),
    resultColumns: z.array(z.string()),
  })
);

export type VariantSchemaEntry = z.infer<typeof SchemaFile>[number];

export class VariantExtractionSchema {
  private readonly byCategory = new Map<string, VariantAttribute[]>();

  constructor(entries: VariantSchemaEntry[] = []) {
    for (const entry of entries) {
      const category = entry.category.trim();
      // First entry for a category wins
      if (this.byCategory.has(category)) continue;

      const attributes: VariantAttribute[] = [];
      for (const column of entry.resultColumns) {
        const attribute = resolveAttributeName(column);
        if (attribute === null) {
          console.warn(`⚠️  [variantSchema] Unknown column "${column}" for ${category} - ignored`);
        } else if (!attributes.includes(attribute)) {
          attributes.push(attribute);
        }
      }
      this.byCategory.set(category, attributes);
    }
  }

  static fromFile(filePath: string): VariantExtractionSchema {
    if (!fs.existsSync(filePath)) {
      console.warn(`⚠️  [variantSchema] ${filePath} not found - no categories get difference extraction`);
      return new VariantExtractionSchema();
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
    } catch (error) {
      throw new ConfigurationError(`Variant schema ${filePath} is unreadable: ${describeError(error)}`, filePath);
    }

    const result = SchemaFile.safeParse(parsed);
    if (!result.success) {
      const issue = result.error.issues[0];
      throw new ConfigurationError(
        `Variant schema ${filePath} is invalid at [${issue?.path.join('.') ?? ''}]: ${issue?.message ?? 'invalid'}`,
        filePath
      );
    }
    return new VariantExtractionSchema(result.data);
  }

  get categories(): string[] {
    return [...this.byCategory.keys()];
  }

  /** Attributes to extract for a category, or null when it is not listed */
  attributesFor(category: string): VariantAttribute[] | null {
    return this.byCategory.get(category.trim()) ?? null;
  }
}
