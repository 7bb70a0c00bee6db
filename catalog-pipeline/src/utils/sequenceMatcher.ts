/**
 * Longest-common-block string similarity (Ratcliff/Obershelp).
 *
 * ratio() = 2 * matchedCharacters / (len(a) + len(b)), where matched characters
 * come from recursively taking the longest common block and repeating on the
 * pieces to its left and right. Sequences of 200+ elements drop "popular"
 * elements (more than 1% + 1 occurrences) from the index, like the classic
 * autojunk heuristic.
 */

export interface MatchingBlock {
  /** Start in a */
  a: number;
  /** Start in b */
  b: number;
  size: number;
}

const AUTOJUNK_MIN_LENGTH = 200;

export class SequenceMatcher {
  private readonly a: string[];
  private readonly b: string[];
  private readonly b2j = new Map<string, number[]>();
  private blocks: MatchingBlock[] | null = null;

  constructor(a: string, b: string, autojunk = true) {
    // Code points, so "š" is one element whatever its UTF-16 length
    this.a = Array.from(a);
    this.b = Array.from(b);
    this.indexB(autojunk);
  }

  private indexB(autojunk: boolean): void {
    this.b.forEach((element, j) => {
      const indices = this.b2j.get(element);
      if (indices) indices.push(j);
      else this.b2j.set(element, [j]);
    });

    const n = this.b.length;
    if (!autojunk || n < AUTOJUNK_MIN_LENGTH) return;

    const limit = Math.floor(n / 100) + 1;
    for (const [element, indices] of [...this.b2j]) {
      if (indices.length > limit) this.b2j.delete(element);
    }
  }

  findLongestMatch(alo: number, ahi: number, blo: number, bhi: number): MatchingBlock {
    const { a, b } = this;
    let bestI = alo;
    let bestJ = blo;
    let bestSize = 0;
    let j2len = new Map<number, number>();

    for (let i = alo; i < ahi; i++) {
      const next = new Map<number, number>();
      for (const j of this.b2j.get(a[i]) ?? []) {
        if (j < blo) continue;
        if (j >= bhi) break;
        const k = (j2len.get(j - 1) ?? 0) + 1;
        next.set(j, k);
        if (k > bestSize) {
          bestI = i - k + 1;
          bestJ = j - k + 1;
          bestSize = k;
        }
      }
      j2len = next;
    }

    // Popular elements were left out of the index; grow the block over them
    while (bestI > alo && bestJ > blo && a[bestI - 1] === b[bestJ - 1]) {
      bestI--;
      bestJ--;
      bestSize++;
    }
    while (bestI + bestSize < ahi && bestJ + bestSize < bhi && a[bestI + bestSize] === b[bestJ + bestSize]) {
      bestSize++;
    }

    return { a: bestI, b: bestJ, size: bestSize };
  }

  /** Non-adjacent matching blocks, ending with a zero-size sentinel at (len(a), len(b)) */
  getMatchingBlocks(): MatchingBlock[] {
    if (this.blocks) return this.blocks;

    const la = this.a.length;
    const lb = this.b.length;
    const queue: Array<[number, number, number, number]> = [[0, la, 0, lb]];
    const found: MatchingBlock[] = [];

    while (queue.length > 0) {
      const next = queue.pop();
      if (!next) break;
      const [alo, ahi, blo, bhi] = next;
      const match = this.findLongestMatch(alo, ahi, blo, bhi);
      if (match.size === 0) continue;

      found.push(match);
      if (alo < match.a && blo < match.b) queue.push([alo, match.a, blo, match.b]);
      if (match.a + match.size < ahi && match.b + match.size < bhi) {
        queue.push([match.a + match.size, ahi, match.b + match.size, bhi]);
      }
    }
    found.sort((x, y) => x.a - y.a || x.b - y.b || x.size - y.size);

    const merged: MatchingBlock[] = [];
    let current: MatchingBlock = { a: 0, b: 0, size: 0 };
    for (const block of found) {
      if (current.a + current.size === block.a && current.b + current.size === block.b) {
        current = { ...current, size: current.size + block.size };
      } else {
        if (current.size > 0) merged.push(current);
        current = block;
      }
    }
    if (current.size > 0) merged.push(current);
    merged.push({ a: la, b: lb, size: 0 });

    this.blocks = merged;
    return merged;
  }

  ratio(): number {
    const total = this.a.length + this.b.length;
    if (total === 0) return 1;
    const matches = this.getMatchingBlocks().reduce((sum, block) => sum + block.size, 0);
    return (2 * matches) / total;
  }
}

/** Similarity of two strings in [0, 1] */
export function similarityRatio(a: string, b: string): number {
  return new SequenceMatcher(a, b).ratio();
}
