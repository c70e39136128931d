/**
 * Separators between numbers sharing one field. `:::` is covered by the colon
 * class; a run of separators (and the whitespace around it) stays together.
 */
const SEPARATOR_RUN = /(?:[,|/;:\t]|\s{2,})(?:[,|/;:\t\s])*/g;

/**
 * Split a raw phone field into pieces that each more likely hold one number.
 *
 * Cuts are placed after each separator run, so the separator ends the
 * preceding piece and `tokenizeField(s).join('') === s`. When the field has
 * more than one `+`, every piece is also cut right before each `+`.
 */
export function tokenizeField(field: string): string[] {
  if (!field) return [];

  const pieces: string[] = [];
  let start = 0;
  for (const match of field.matchAll(SEPARATOR_RUN)) {
    const end = (match.index ?? 0) + match[0].length;
    pieces.push(field.slice(start, end));
    start = end;
  }
  if (start < field.length) pieces.push(field.slice(start));

  if (countPlus(field) <= 1) return pieces;
  return pieces.flatMap(splitBeforePlus);
}

function countPlus(text: string): number {
  let count = 0;
  for (const ch of text) {
    if (ch === '+') count++;
  }
  return count;
}

function splitBeforePlus(piece: string): string[] {
  const parts: string[] = [];
  let start = 0;
  for (let i = 1; i < piece.length; i++) {
    if (piece[i] === '+') {
      parts.push(piece.slice(start, i));
      start = i;
    }
  }
  parts.push(piece.slice(start));
  return parts;
}
