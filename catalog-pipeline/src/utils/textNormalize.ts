/**
 * Text normalization for category lookups.
 *
 * Feed exports mix NFC/NFD text, non-breaking spaces and HTML entities
 * ("Chladenie &amp; mrazenie"), so both sides of a comparison go through
 * normalizeCategoryText() first.
 */

import * as cheerio from 'cheerio';

/**
 * Decode every HTML character reference (the full named set, with or without
 * the trailing semicolon, plus numeric references). Markup is not
 * interpreted: a literal "<" stays text.
 */
export function decodeHtmlEntities(text: string): string {
  if (!text.includes('&')) return text;
  const $ = cheerio.load(text.replace(/</g, '&lt;'), null, false);
  return $.root().text();
}

export function normalizeCategoryText(text: string): string {
  return decodeHtmlEntities(text.normalize('NFKC'))
    .replace(/\u00a0/g, ' ')
    .trim();
}

/** Length in code points, not UTF-16 units */
export function textLength(text: string): number {
  return Array.from(text).length;
}
