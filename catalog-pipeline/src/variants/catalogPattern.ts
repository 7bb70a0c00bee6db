/**
 * Catalog code patterns from hand-edited variant reports.
 *
 * Reviewers write "LX-xxxx" for "LX- followed by four digits", "T-*" for
 * "anything starting with T" and "A?1" for one unknown character. Codes and
 * patterns are compared without separators (space - _ / \ .), case-insensitively.
 *
 * An x/X run glued to a preceding letter of the same case belongs to the
 * code itself: in "LX-xxxx" the first X is literal and only "xxxx" is a
 * placeholder, giving ^LX\d{4}$.
 */

import { naturalSort } from '../utils/naturalSort.js';

export interface CatalogPattern {
  token: string;
  /** Separator-free uppercase literal form, for tokens without wildcards */
  literal: string;
  regex: RegExp;
  hasWildcards: boolean;
}

const SEPARATOR = /[\s\-_/\\.]/;
const SEPARATORS = /[\s\-_/\\.]/g;

/** Leading slashes and a trailing file extension removed; separators kept */
export function cleanCatalogToken(token: string): string {
  return token.trim().replace(/^[/\\]+/, '').replace(/\.[A-Za-z]{2,4}$/, '');
}

export function normalizeCodeForMatch(code: string): string {
  return code.trim().toUpperCase().replace(SEPARATORS, '');
}

function escapeRegex(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function isLetter(char: string | undefined): char is string {
  return char !== undefined && /\p{L}/u.test(char);
}

function isUpper(char: string): boolean {
  return char !== char.toLowerCase() && char === char.toUpperCase();
}

export function compileCatalogPattern(token: string): CatalogPattern {
  const chars = Array.from(cleanCatalogToken(token));
  let body = '';
  let literal = '';
  let hasWildcards = false;

  let i = 0;
  while (i < chars.length) {
    const char = chars[i];

    if (char === 'x' || char === 'X') {
      let end = i;
      while (end < chars.length && (chars[end] === 'x' || chars[end] === 'X')) end++;

      let start = i;
      const previous = chars[i - 1];
      if (isLetter(previous)) {
        const upper = isUpper(previous);
        while (start < end && isUpper(chars[start]) === upper) {
          body += escapeRegex(chars[start].toUpperCase());
          literal += chars[start].toUpperCase();
          start++;
        }
      }
      if (end > start) {
        body += `\\d{${end - start}}`;
        hasWildcards = true;
      }
      i = end;
      continue;
    }

    if (char === '*') {
      body += '.*';
      hasWildcards = true;
    } else if (char === '?') {
      body += '.';
      hasWildcards = true;
    } else if (!SEPARATOR.test(char)) {
      body += escapeRegex(char.toUpperCase());
      literal += char.toUpperCase();
    }
    i++;
  }

  return {
    token,
    literal,
    regex: new RegExp(`^${body}$`, 'i'),
    hasWildcards,
  };
}

/**
 * Live catalog codes indexed by their separator-free form.
 */
export class CatalogCodeIndex {
  private readonly byNormalized = new Map<string, string[]>();

  constructor(codes: Iterable<string>) {
    for (const code of codes) {
      if (!code) continue;
      const key = normalizeCodeForMatch(code);
      const existing = this.byNormalized.get(key);
      if (!existing) this.byNormalized.set(key, [code]);
      else if (!existing.includes(code)) existing.push(code);
    }
  }

  /** Matching live codes in natural order */
  resolve(token: string): string[] {
    const pattern = compileCatalogPattern(token);
    if (!pattern.literal && !pattern.hasWildcards) return [];

    if (!pattern.hasWildcards) {
      return naturalSort(this.byNormalized.get(pattern.literal) ?? []);
    }

    const matches: string[] = [];
    for (const [key, codes] of this.byNormalized) {
      if (pattern.regex.test(key)) matches.push(...codes);
    }
    return naturalSort(matches);
  }
}
