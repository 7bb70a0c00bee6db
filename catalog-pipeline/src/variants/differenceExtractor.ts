/**
 * Difference extraction - what sets one variant apart from its siblings.
 *
 * Reads dimensions, power, volume and a short variant label out of the
 * product name and the free-text parameter blob. Values are converted to
 * mm / W / L and rendered as "400 mm", "2000 W", "2x 150 W", "5 L".
 */

import type { ProductRecord, VariantAttribute, VariantAttributes } from '../types/Product.js';
import { textLength } from '../utils/textNormalize.js';
import { formatMeasure, normalizeUnit } from '../utils/units.js';

type Dimension = 'width' | 'length' | 'height';

const NUMBER = String.raw`(\d+(?:[.,]\d+)?)`;

// ============================================================================
// PATTERNS
// ============================================================================

const DIMENSIONS_3D = new RegExp(
  String.raw`${NUMBER}\s*[xX×]\s*${NUMBER}\s*[xX×]\s*${NUMBER}(?:\s*([a-zA-Z]+))?`,
  'g'
);
const DIMENSIONS_2D = new RegExp(String.raw`${NUMBER}\s*[xX×]\s*${NUMBER}(?:\s*([a-zA-Z]+))?`, 'g');

const LENGTH_UNITS = new Set(['mm', 'cm', 'm']);

const LABELED_DIMENSIONS: Record<Dimension, RegExp[]> = {
  width: [
    new RegExp(String.raw`šírka[:\s]+${NUMBER}\s*([a-zA-Z]+)?`, 'iu'),
    new RegExp(String.raw`(?<!\p{L})š\s*[:-]\s*${NUMBER}\s*([a-zA-Z]+)?`, 'iu'),
  ],
  length: [
    new RegExp(String.raw`dĺžka[:\s]+${NUMBER}\s*([a-zA-Z]+)?`, 'iu'),
    new RegExp(String.raw`dlžka[:\s]+${NUMBER}\s*([a-zA-Z]+)?`, 'iu'),
    new RegExp(String.raw`(?<!\p{L})d\s*[:-]\s*${NUMBER}\s*([a-zA-Z]+)?`, 'iu'),
  ],
  height: [
    new RegExp(String.raw`výška[:\s]+${NUMBER}\s*([a-zA-Z]+)?`, 'iu'),
    new RegExp(String.raw`vyska[:\s]+${NUMBER}\s*([a-zA-Z]+)?`, 'iu'),
    new RegExp(String.raw`(?<!\p{L})v\s*[:-]\s*${NUMBER}\s*([a-zA-Z]+)?`, 'iu'),
  ],
};

const POWER_MULTIPLIED = new RegExp(String.raw`(\d+)\s*[xX]\s*${NUMBER}\s*([kK]?[wW])\b`);
const POWER_PLAIN = new RegExp(String.raw`${NUMBER}\s*([kK]?[wW])\b`);
const POWER_LABELED = new RegExp(String.raw`výkon[:\s]+${NUMBER}\s*([kK]?[wW])\b`, 'iu');

const VOLUME_UNIT = String.raw`([lL](?:iter|itre|itrov)?s?)`;
const VOLUME_MULTIPLIED = new RegExp(String.raw`(\d+)\s*[xX]\s*${NUMBER}\s*([lL])\b`);
const VOLUME_PLAIN = new RegExp(String.raw`${NUMBER}\s*${VOLUME_UNIT}\b`);
const VOLUME_LABELED = new RegExp(String.raw`objem[:\s]+${NUMBER}\s*${VOLUME_UNIT}\b`, 'iu');

const ZONE_COUNT = /(\d+)\s*z[oó]n[ayí]?/i;
const GN_CONTAINERS = /(\d+)[xX]\s*GN\s*\d+\/\d+/;
const NUMERIC_PREFIX = /^(\d+)\s*-/;
const MAX_LABEL_LENGTH = 30;

// ============================================================================
// EXTRACTORS
// ============================================================================

function textSources(name: string, parameters: string): string[] {
  return [name, parameters].map(text => text.normalize('NFC')).filter(text => text.trim() !== '');
}

function lengthUnit(captured: string | undefined): string | null {
  if (captured === undefined) return 'mm';
  const unit = captured.toLowerCase();
  return LENGTH_UNITS.has(unit) ? unit : null;
}

function measure(value: string, unit: string): string | null {
  const normalized = normalizeUnit(value, unit);
  return normalized ? formatMeasure(normalized) : null;
}

/** First NxN(xN) run whose unit, if any, is a length unit */
function findDimensionRun(pattern: RegExp, text: string): { values: string[]; unit: string } | null {
  for (const match of text.matchAll(pattern)) {
    const values = match.slice(1, -1);
    const unit = lengthUnit(match[match.length - 1]);
    if (unit !== null) return { values, unit };
  }
  return null;
}

export function extractDimensions(name: string, parameters = ''): Partial<Record<Dimension, string>> {
  const found: Partial<Record<Dimension, string>> = {};
  const order: Dimension[] = ['width', 'length', 'height'];
  const sources = textSources(name, parameters);

  const fill = (dimension: Dimension, value: string, unit: string): void => {
    if (found[dimension] !== undefined) return;
    const rendered = measure(value, unit);
    if (rendered !== null) found[dimension] = rendered;
  };

  for (const text of sources) {
    const run = findDimensionRun(DIMENSIONS_3D, text) ?? findDimensionRun(DIMENSIONS_2D, text);
    if (run) run.values.forEach((value, index) => fill(order[index], value, run.unit));
    if (order.every(dimension => found[dimension] !== undefined)) return found;
  }

  for (const dimension of order) {
    for (const text of sources) {
      if (found[dimension] !== undefined) break;
      for (const pattern of LABELED_DIMENSIONS[dimension]) {
        const match = pattern.exec(text);
        if (!match) continue;
        fill(dimension, match[1], lengthUnit(match[2]) ?? 'mm');
        break;
      }
    }
  }

  return found;
}

function extractQuantity(
  sources: string[],
  multiplied: RegExp,
  plain: RegExp,
  labeled: RegExp
): string | null {
  for (const text of sources) {
    const many = multiplied.exec(text);
    if (many) {
      const rendered = measure(many[2], many[3]);
      if (rendered !== null) return `${many[1]}x ${rendered}`;
    }
    const single = plain.exec(text);
    if (single) {
      const rendered = measure(single[1], single[2]);
      if (rendered !== null) return rendered;
    }
  }
  for (const text of sources) {
    const match = labeled.exec(text);
    if (match) return measure(match[1], match[2]);
  }
  return null;
}

export function extractPower(name: string, parameters = ''): string | null {
  return extractQuantity(textSources(name, parameters), POWER_MULTIPLIED, POWER_PLAIN, POWER_LABELED);
}

export function extractVolume(name: string, parameters = ''): string | null {
  return extractQuantity(textSources(name, parameters), VOLUME_MULTIPLIED, VOLUME_PLAIN, VOLUME_LABELED);
}

export function extractVariantLabel(fullName: string, baseName: string): string {
  const name = fullName.trim();
  if (name === baseName.trim()) return '';

  const zones = ZONE_COUNT.exec(name);
  if (zones) return `${zones[1]} zón`;

  const containers = GN_CONTAINERS.exec(name);
  if (containers) return `${containers[1]}x GN`;

  const prefix = NUMERIC_PREFIX.exec(name);
  if (prefix) return `Typ ${prefix[1]}`;

  const difference = baseName ? name.split(baseName).join('').trim() : name;
  if (textLength(difference) > MAX_LABEL_LENGTH) return '';
  return difference.replace(/^[\s\-–:]+|[\s\-–:]+$/g, '');
}

/** Every attribute found for a record, before the schema filter */
export function extractAttributes(record: ProductRecord, baseName: string): VariantAttributes {
  const attributes: VariantAttributes = { ...extractDimensions(record.name, record.parameters) };

  const power = extractPower(record.name, record.parameters);
  if (power !== null) attributes.power = power;

  const volume = extractVolume(record.name, record.parameters);
  if (volume !== null) attributes.volume = volume;

  const label = extractVariantLabel(record.name, baseName);
  if (label) attributes.variantLabel = label;

  return attributes;
}

export function pickAttributes(attributes: VariantAttributes, allowed: VariantAttribute[]): VariantAttributes {
  const picked: VariantAttributes = {};
  for (const attribute of allowed) {
    const value = attributes[attribute];
    if (value !== undefined) picked[attribute] = value;
  }
  return picked;
}
