/**
 * Base name extraction - the grouping key for variant detection.
 *
 * "Pracovný stôl 400x600x850mm" and "Pracovný stôl 400x600x1200mm" both
 * reduce to "Pracovný stôl". Patterns are applied in order.
 */

const STRIP_PATTERNS: Array<[RegExp, string]> = [
  // NxN / NxNxN runs with optional unit, followed by more text
  [/\s+\d+(?:[xX×]\d+)+(?:\s*mm)?(?:\s*cm)?(?:\s*l)?(?:\s|$)/g, ' '],
  // ... at the very end
  [/\s+\d+(?:[xX×]\d+)+(?:\s*mm)?(?:\s*cm)?(?:\s*l)?$/g, ''],
  // "- 600x400", "– 1200 mm"
  [/\s*[-–]\s*\d+(?:[xX×]\d+)*(?:\s*mm)?(?:\s*cm)?(?:\s*l)?/g, ''],
  // bare numbers with an optional unit word: "100 l", "2/3", "15kg"
  [/\s*[-–]?\s*\d+(?:[/-]\d+)?(?:\s*[a-zA-Z]+)?(?:\s|$)/g, ' '],
  // "(600x400 mm)"
  [/\s*\(\d+(?:[xX×]\d+)*(?:\s*mm)?(?:\s*cm)?(?:\s*l)?\)/g, ''],
];

export function extractBaseName(name: string): string {
  let baseName = name;
  for (const [pattern, replacement] of STRIP_PATTERNS) {
    baseName = baseName.replace(pattern, replacement);
  }
  return baseName.replace(/\s+/g, ' ').trim();
}
