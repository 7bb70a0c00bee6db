/**
 * Unit normalization for extracted variant attributes.
 *
 * Lengths end up in mm, power in W, volume in L. Unknown units pass
 * through lowercased.
 */

export interface Measure {
  value: number;
  unit: string;
}

const UNIT_TABLE: Record<string, Measure> = {
  mm: { value: 1, unit: 'mm' },
  cm: { value: 10, unit: 'mm' },
  m: { value: 1000, unit: 'mm' },
  w: { value: 1, unit: 'W' },
  kw: { value: 1000, unit: 'W' },
  l: { value: 1, unit: 'L' },
  ls: { value: 1, unit: 'L' },
  liter: { value: 1, unit: 'L' },
  liters: { value: 1, unit: 'L' },
  litre: { value: 1, unit: 'L' },
  litres: { value: 1, unit: 'L' },
  litrov: { value: 1, unit: 'L' },
};

/** Accepts "2,5" as well as "2.5"; blank or non-numeric input yields null */
export function parseDecimal(value: string | number): number | null {
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  const cleaned = value.trim().replace(',', '.');
  if (cleaned === '') return null;
  const parsed = Number(cleaned);
  return Number.isFinite(parsed) ? parsed : null;
}

export function normalizeUnit(value: string | number, unit: string): Measure | null {
  const amount = parseDecimal(value);
  if (amount === null) return null;

  const key = unit.trim().toLowerCase();
  const conversion = UNIT_TABLE[key];
  if (!conversion) return { value: amount, unit: key };
  return { value: amount * conversion.value, unit: conversion.unit };
}

export function formatNumber(value: number): string {
  // 1.1 * 1000 is 1100.0000000000002 in binary floating point
  return String(Number(value.toFixed(6)));
}

export function formatMeasure(measure: Measure): string {
  return `${formatNumber(measure.value)} ${measure.unit}`;
}
