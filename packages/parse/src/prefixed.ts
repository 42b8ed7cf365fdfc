/**
 * Prefixed parsers and single-character dispatch.
 *
 * A prefixed parser declares the characters a match may start with. That
 * promise lets a set of parsers be indexed by first character, so choosing
 * among dozens of block or span parsers costs one map lookup instead of a
 * chain of failed attempts.
 */

import { invariant } from "@inkwell/core";
import { alternatives, fail, mkParser, ParserBase } from "./combinators.js";
import { charLookup, type CharPredicate } from "./characters.js";
import type { SourcePosition } from "./position.js";
import type { Parser, ParseResult } from "./types.js";

/**
 * A parser that fails without consuming on any first character outside
 * `startChars`.
 */
export class PrefixedParser<T> extends ParserBase<T> {
  readonly startLookup: CharPredicate;

  constructor(
    readonly startChars: string,
    private readonly underlying: Parser<T>,
  ) {
    super();
    invariant(startChars.length > 0, "a prefixed parser needs at least one start character");
    this.startLookup = charLookup(startChars);
  }

  apply(pos: SourcePosition): ParseResult<T> {
    if (!this.startLookup(pos.code)) {
      return fail(pos, `expected one of ${JSON.stringify(this.startChars)}`);
    }
    return this.underlying.parse(pos);
  }
}

export function prefixed<T>(startChars: string, parser: Parser<T>): PrefixedParser<T> {
  return new PrefixedParser(startChars, parser);
}

export type Precedence = "high" | "low";

/**
 * A parser contributed by a host format or an extension. An empty
 * `startChars` marks an unconditional parser that is only tried when no
 * prefixed group claims the current character.
 */
export interface ParserDefinition<T> {
  readonly parser: Parser<T>;
  readonly startChars: string;
  readonly precedence: Precedence;
}

/**
 * Conflict-resolution order: extension high, host high, host low, extension low.
 */
export function orderByPrecedence<T>(
  host: readonly ParserDefinition<T>[],
  extensions: readonly ParserDefinition<T>[],
): ParserDefinition<T>[] {
  const high = (d: ParserDefinition<T>) => d.precedence === "high";
  const low = (d: ParserDefinition<T>) => d.precedence === "low";
  return [...extensions.filter(high), ...host.filter(high), ...host.filter(low), ...extensions.filter(low)];
}

export interface PrefixedGroups<T> {
  /** One ordered alternation per start character */
  readonly groups: ReadonlyMap<string, Parser<T>>;
  /** Parsers without start characters, in order */
  readonly fallback: readonly Parser<T>[];
  /** Every character that has a group */
  readonly startChars: string;
}

/**
 * Group definitions by start character, keeping their relative order inside
 * each group.
 */
export function mergePrefixed<T>(definitions: readonly ParserDefinition<T>[]): PrefixedGroups<T> {
  const byChar = new Map<string, Parser<T>[]>();
  const fallback: Parser<T>[] = [];

  for (const def of definitions) {
    if (def.startChars.length === 0) {
      fallback.push(def.parser);
      continue;
    }
    for (const ch of new Set(def.startChars)) {
      const list = byChar.get(ch);
      if (list) list.push(def.parser);
      else byChar.set(ch, [def.parser]);
    }
  }

  const groups = new Map<string, Parser<T>>();
  for (const [ch, list] of byChar) {
    groups.set(ch, alternatives(list));
  }
  return { groups, fallback, startChars: [...groups.keys()].join("") };
}

/**
 * Peek one character and run the group registered for it. The group's
 * failure is final; the unconditional parsers are only tried when no group
 * exists for the character.
 */
export function dispatch<T>(definitions: readonly ParserDefinition<T>[]): Parser<T> {
  const { groups, fallback } = mergePrefixed(definitions);
  const fallbackParser = fallback.length > 0 ? alternatives(fallback) : undefined;

  return mkParser((pos) => {
    const group = pos.atEnd ? undefined : groups.get(pos.char);
    if (group) return group.parse(pos);
    if (fallbackParser) return fallbackParser.parse(pos);
    return fail(pos, pos.atEnd ? "unexpected end of input" : `no parser for ${JSON.stringify(pos.char)}`);
  });
}
