/**
 * Line-level helpers shared by block parsers.
 */

import { anyOf, eol, fail, mkParser, ok, skipLeft, type Parser, type SourcePosition } from "@inkwell/parse";

/** Horizontal whitespace */
export const ws = anyOf(" ", "\t");

/** Optional whitespace followed by a newline or the end of input */
export const wsEol: Parser<string> = skipLeft(ws, eol());

/** Offset of the end of the line containing `offset`, before its newline */
export function lineEnd(input: string, offset: number): number {
  const nl = input.indexOf("\n", offset);
  return nl === -1 ? input.length : nl;
}

/** True when the line starting at `offset` holds only whitespace */
export function isBlankLine(input: string, offset: number): boolean {
  const end = lineEnd(input, offset);
  for (let i = offset; i < end; i++) {
    const c = input[i];
    if (c !== " " && c !== "\t") return false;
  }
  return true;
}

/** The rest of the current line; the newline is consumed but not returned */
export const restOfLine: Parser<string> = mkParser((pos) => {
  if (pos.atEnd) return fail(pos, "unexpected end of input");
  const end = lineEnd(pos.input, pos.offset);
  return ok(pos.input.slice(pos.offset, end), pos.moveTo(end + 1));
});

/** Skip any number of blank lines, and trailing whitespace at the end of input. */
export function skipBlankLines(pos: SourcePosition): SourcePosition {
  let offset = pos.offset;
  const { input } = pos;
  while (offset < input.length && isBlankLine(input, offset)) {
    offset = lineEnd(input, offset) + 1;
  }
  return pos.moveTo(offset);
}
