/**
 * 0–100 string similarity scores used for category suggestions.
 */

import { SequenceMatcher, similarityRatio } from './sequenceMatcher.js';

/** Plain similarity, scaled to 0–100 */
export function fullRatio(a: string, b: string): number {
  if (a.length === 0 || b.length === 0) return 0;
  return similarityRatio(a, b) * 100;
}

/** Lowercase, non-alphanumerics to spaces, trimmed */
export function processForTokens(text: string): string {
  return text.toLowerCase().replace(/[^\p{L}\p{N}]+/gu, ' ').trim();
}

function sortedTokens(text: string): string {
  return processForTokens(text).split(' ').filter(Boolean).sort().join(' ');
}

/** Word-order insensitive similarity */
export function tokenSortRatio(a: string, b: string): number {
  return fullRatio(sortedTokens(a), sortedTokens(b));
}

/**
 * Best similarity of the shorter string against same-length windows of the
 * longer one, with windows anchored on the common blocks.
 */
export function partialRatio(a: string, b: string): number {
  if (a.length === 0 || b.length === 0) return 0;

  const [shorter, longer] = Array.from(a).length <= Array.from(b).length ? [a, b] : [b, a];
  const shortChars = Array.from(shorter);
  const longChars = Array.from(longer);
  const blocks = new SequenceMatcher(shorter, longer).getMatchingBlocks();

  let best = 0;
  for (const block of blocks) {
    const start = Math.max(0, block.b - block.a);
    const window = longChars.slice(start, start + shortChars.length).join('');
    const score = similarityRatio(shorter, window);
    if (score > 0.995) return 100;
    best = Math.max(best, score);
  }
  return best * 100;
}
