/**
 * Character classifiers and character-run parsers.
 *
 * Every character of every document passes through one of these, so the
 * classifiers are built once and answer in O(1): a direct comparison for one
 * or two characters, a lookup table sized to the largest code otherwise.
 */

import { formatMessage, IW1001 } from "@inkwell/core";
import { fail, mkParser, ok, ParserBase } from "./combinators.js";
import type { SourcePosition } from "./position.js";
import type { Parser, ParseResult } from "./types.js";

/** Predicate over a UTF-16 character code */
export type CharPredicate = (code: number) => boolean;

function codesOf(chars: readonly string[]): number[] {
  const codes: number[] = [];
  for (const s of chars) {
    for (let i = 0; i < s.length; i++) {
      codes.push(s.charCodeAt(i));
    }
  }
  return codes;
}

function tableLookup(table: Uint8Array): CharPredicate {
  const size = table.length;
  return (code) => code >= 0 && code < size && table[code] === 1;
}

/**
 * Classifier for a fixed set of characters. Each argument may hold several
 * characters: `charLookup("*_")` equals `charLookup("*", "_")`.
 */
export function charLookup(...chars: string[]): CharPredicate {
  const codes = [...new Set(codesOf(chars))];
  switch (codes.length) {
    case 0:
      return () => false;
    case 1: {
      const [a] = codes;
      return (code) => code === a;
    }
    case 2: {
      const [a, b] = codes;
      return (code) => code === a || code === b;
    }
    default: {
      const table = new Uint8Array(Math.max(...codes) + 1);
      for (const code of codes) table[code] = 1;
      return tableLookup(table);
    }
  }
}

/** Classifier for inclusive character ranges such as `["a", "z"]`. */
export function rangeLookup(...ranges: ReadonlyArray<readonly [string, string]>): CharPredicate {
  let max = -1;
  for (const [, to] of ranges) max = Math.max(max, to.charCodeAt(0));
  const table = new Uint8Array(max + 1);
  for (const [from, to] of ranges) {
    for (let code = from.charCodeAt(0); code <= to.charCodeAt(0); code++) table[code] = 1;
  }
  return tableLookup(table);
}

export const CharGroup = {
  digit: rangeLookup(["0", "9"]),
  alpha: rangeLookup(["a", "z"], ["A", "Z"]),
  alphaNum: rangeLookup(["0", "9"], ["a", "z"], ["A", "Z"]),
  whitespace: charLookup(" \t\n\r\f"),
  hexDigit: rangeLookup(["0", "9"], ["a", "f"], ["A", "F"]),
} as const satisfies Record<string, CharPredicate>;

/**
 * A run of characters matching a predicate. Always succeeds with the longest
 * run (possibly empty) unless a minimum is configured.
 */
export class Characters extends ParserBase<string> {
  constructor(
    private readonly predicate: CharPredicate,
    private readonly minCount: number = 0,
    private readonly maxCount: number = Infinity,
  ) {
    super();
  }

  /** Fail when fewer than `n` characters match */
  min(n: number): Characters {
    return new Characters(this.predicate, n, this.maxCount);
  }

  /** Stop after `n` characters */
  max(n: number): Characters {
    return new Characters(this.predicate, this.minCount, n);
  }

  /** Exactly `n` characters */
  take(n: number): Characters {
    return new Characters(this.predicate, n, n);
  }

  apply(pos: SourcePosition): ParseResult<string> {
    const { input, offset } = pos;
    const end = Math.min(input.length, offset + this.maxCount);
    let i = offset;
    while (i < end && this.predicate(input.charCodeAt(i))) i++;

    const count = i - offset;
    if (count < this.minCount) {
      return fail(pos, formatMessage(IW1001, { min: this.minCount, actual: count }), i);
    }
    return ok(input.slice(offset, i), pos.moveTo(i));
  }
}

/** Any number of the given characters. */
export function anyOf(...chars: string[]): Characters {
  return new Characters(charLookup(...chars));
}

/** Any number of characters other than the given ones. */
export function anyBut(...chars: string[]): Characters {
  const lookup = charLookup(...chars);
  return new Characters((code) => !lookup(code));
}

/** Any number of characters within the inclusive ranges. */
export function anyIn(...ranges: ReadonlyArray<readonly [string, string]>): Characters {
  return new Characters(rangeLookup(...ranges));
}

/** Any number of characters satisfying the predicate. */
export function anyWhile(predicate: CharPredicate): Characters {
  return new Characters(predicate);
}

/** At least one of the given characters. */
export function someOf(...chars: string[]): Characters {
  return anyOf(...chars).min(1);
}

/** Exactly one of the given characters. */
export function oneOf(...chars: string[]): Parser<string> {
  const lookup = charLookup(...chars);
  const expected = codesOf(chars)
    .map((c) => JSON.stringify(String.fromCharCode(c)))
    .join(", ");
  return mkParser((pos) => {
    if (lookup(pos.code)) return ok(pos.char, pos.consume(1));
    return fail(pos, `expected one of ${expected}`);
  });
}
