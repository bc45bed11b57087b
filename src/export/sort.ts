import type { CountRow } from "../nlp/frequency";

// Code units in the surrogate range sort after the rest of the BMP in code point order.
function codePointKey(unit: number): number {
  if (unit >= 0xd800 && unit <= 0xdfff) return unit + 0x2000;
  if (unit >= 0xe000) return unit - 0x800;
  return unit;
}

/**
 * Orders strings by Unicode code point, which is also their UTF-8 byte order.
 * Plain `<` on JS strings compares UTF-16 code units and disagrees for
 * astral characters against U+E000..U+FFFF.
 */
export function compareCodePoints(a: string, b: string): number {
  const n = Math.min(a.length, b.length);
  for (let i = 0; i < n; i++) {
    const x = a.charCodeAt(i);
    const y = b.charCodeAt(i);
    if (x !== y) return codePointKey(x) - codePointKey(y);
  }
  return a.length - b.length;
}

export function compareRows(a: CountRow, b: CountRow): number {
  if (b.count !== a.count) return b.count - a.count;
  return compareCodePoints(a.text, b.text);
}

/**
 * Ranks a count mapping: descending count, then ascending text.
 * With `minCount`, entries counted fewer than `minCount` times are dropped first.
 */
export function rankCounts(
  counts: Iterable<[string, number]>,
  minCount?: number
): CountRow[] {
  const rows: CountRow[] = [];
  for (const [text, count] of counts) {
    if (minCount !== undefined && count < minCount) continue;
    rows.push({ text, count });
  }
  return rows.sort(compareRows);
}
