/**
 * Order strings by Unicode code point.
 *
 * Plain `<` compares UTF-16 code units, which puts astral characters
 * (U+10000 and up) before U+E000..U+FFFF.
 */
export function compareCodePoints(a: string, b: string): number {
  if (a === b) return 0;
  const length = Math.min(a.length, b.length);
  let i = 0;
  while (i < length) {
    // Prefixes match up to i, so both strings sit on a code point boundary.
    const x = a.codePointAt(i) ?? 0;
    const y = b.codePointAt(i) ?? 0;
    if (x !== y) {
      return x < y ? -1 : 1;
    }
    i += x > 0xffff ? 2 : 1;
  }
  return a.length < b.length ? -1 : 1;
}
