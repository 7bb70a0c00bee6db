import { formatMeasure, normalizeUnit, parseDecimal } from '../units.js';

describe('normalizeUnit', () => {
  test('converts to canonical units', () => {
    expect(normalizeUnit(2, 'kw')).toEqual({ value: 2000, unit: 'W' });
    expect(normalizeUnit(150, 'cm')).toEqual({ value: 1500, unit: 'mm' });
    expect(normalizeUnit(5, 'l')).toEqual({ value: 5, unit: 'L' });
    expect(normalizeUnit('2,5', 'm')).toEqual({ value: 2500, unit: 'mm' });
    expect(normalizeUnit(10, 'Litrov')).toEqual({ value: 10, unit: 'L' });
  });

  test('passes unknown units through lowercased', () => {
    expect(normalizeUnit(3, 'KG')).toEqual({ value: 3, unit: 'kg' });
  });

  test('returns null for a value that is not a number', () => {
    expect(normalizeUnit('abc', 'mm')).toBeNull();
    expect(normalizeUnit('', 'mm')).toBeNull();
  });
});

describe('formatting', () => {
  test('renders integers without decimals and trims float noise', () => {
    expect(formatMeasure({ value: 400, unit: 'mm' })).toBe('400 mm');
    expect(formatMeasure(normalizeUnit('1.1', 'm') ?? { value: 0, unit: '' })).toBe('1100 mm');
    expect(formatMeasure({ value: 2.5, unit: 'L' })).toBe('2.5 L');
  });

  test('parseDecimal accepts a decimal comma', () => {
    expect(parseDecimal('120,50')).toBe(120.5);
    expect(parseDecimal(' 7 ')).toBe(7);
    expect(parseDecimal('n/a')).toBeNull();
  });
});
