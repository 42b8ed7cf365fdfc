/**
 * Parser combinator API for @inkwell/parse
 *
 * All combinators return `Parser<T>` values that can be composed freely.
 * PEG semantics: ordered alternation, first match wins. Failures are values;
 * only `parseAll` throws.
 */

import { SourcePosition } from "./position.js";
import type { Failure, Parser, ParseResult, Success } from "./types.js";

// ---------------------------------------------------------------------------
// Base class and helpers
// ---------------------------------------------------------------------------

/**
 * Base for parsers with extra configuration methods (character runs,
 * delimited scanners, prefixed parsers).
 */
export abstract class ParserBase<T> implements Parser<T> {
  abstract apply(pos: SourcePosition): ParseResult<T>;

  parse(input: string | SourcePosition): ParseResult<T> {
    return this.apply(typeof input === "string" ? new SourcePosition(input) : input);
  }

  parseAll(input: string): T {
    const result = this.apply(new SourcePosition(input));
    if (!result.ok) {
      throw new ParseError(input, result.pos.offset, result.message);
    }
    if (!result.next.atEnd) {
      throw new ParseError(input, result.next.offset, "expected end of input");
    }
    return result.value;
  }
}

class FnParser<T> extends ParserBase<T> {
  constructor(private readonly fn: (pos: SourcePosition) => ParseResult<T>) {
    super();
  }

  apply(pos: SourcePosition): ParseResult<T> {
    return this.fn(pos);
  }
}

/** Create a Parser<T> from a raw parse function. */
export function mkParser<T>(fn: (pos: SourcePosition) => ParseResult<T>): Parser<T> {
  return new FnParser(fn);
}

export function ok<T>(value: T, next: SourcePosition): Success<T> {
  return { ok: true, value, next };
}

export function fail(pos: SourcePosition, message: string, maxOffset: number = pos.offset): Failure {
  return { ok: false, message, pos, maxOffset: Math.max(maxOffset, pos.offset) };
}

/**
 * The failure that got further. Ties join both messages with " or ".
 */
export function furthest(a: Failure, b: Failure): Failure {
  if (a.maxOffset > b.maxOffset) return a;
  if (b.maxOffset > a.maxOffset) return b;
  if (a.message === b.message) return a;
  const pos = b.pos.offset > a.pos.offset ? b.pos : a.pos;
  return fail(pos, `${a.message} or ${b.message}`, a.maxOffset);
}

// ---------------------------------------------------------------------------
// Error reporting
// ---------------------------------------------------------------------------

/** Descriptive parse error with position context. */
export class ParseError extends Error {
  /** Zero-based offset in the input where parsing failed. */
  readonly offset: number;
  readonly line: number;
  readonly column: number;
  readonly reason: string;

  constructor(input: string, offset: number, reason: string) {
    const pos = new SourcePosition(input, offset);
    const snippet = input.slice(Math.max(0, offset - 10), offset + 20);
    super(`Parse error at line ${pos.line}, col ${pos.column}: ${reason}\n  ...${snippet}...`);
    this.name = "ParseError";
    this.offset = offset;
    this.line = pos.line;
    this.column = pos.column;
    this.reason = reason;
  }
}

// ---------------------------------------------------------------------------
// Primitive parsers
// ---------------------------------------------------------------------------

/** Always succeed with `value`, consuming nothing. */
export function success<T>(value: T): Parser<T> {
  return mkParser((pos) => ok(value, pos));
}

/** Always fail with `message`. */
export function failure<T = never>(message: string): Parser<T> {
  return mkParser<T>((pos) => fail(pos, message));
}

/** Match an exact string literal. */
export function literal(s: string): Parser<string> {
  return mkParser((pos) => {
    if (pos.input.startsWith(s, pos.offset)) {
      return ok(s, pos.consume(s.length));
    }
    return fail(pos, `expected ${JSON.stringify(s)}`);
  });
}

/** Match a single specific character. */
export function char(c: string): Parser<string> {
  return mkParser((pos) => {
    if (pos.char === c) {
      return ok(c, pos.consume(1));
    }
    return fail(pos, `expected ${JSON.stringify(c)}`);
  });
}

/** Match any single character. */
export function oneChar(): Parser<string> {
  return mkParser((pos) => {
    if (!pos.atEnd) {
      return ok(pos.char, pos.consume(1));
    }
    return fail(pos, "unexpected end of input");
  });
}

/** Match a regex anchored at the current position. */
export function regex(pattern: RegExp): Parser<string> {
  const anchored = new RegExp(pattern.source, "y");
  return mkParser((pos) => {
    anchored.lastIndex = pos.offset;
    const m = anchored.exec(pos.input);
    if (m) {
      return ok(m[0], pos.consume(m[0].length));
    }
    return fail(pos, `expected /${pattern.source}/`);
  });
}

/** Match end of input. */
export function eof(): Parser<null> {
  return mkParser((pos) => {
    if (pos.atEnd) {
      return ok(null, pos);
    }
    return fail(pos, "expected end of input");
  });
}

/** Match a line ending ("\n" or "\r\n") or end of input. */
export function eol(): Parser<string> {
  return mkParser((pos) => {
    if (pos.atEnd) return ok("", pos);
    if (pos.char === "\n") return ok("\n", pos.consume(1));
    if (pos.char === "\r" && pos.charAt(1) === "\n") return ok("\r\n", pos.consume(2));
    return fail(pos, "expected end of line");
  });
}

// ---------------------------------------------------------------------------
// Sequence combinators
// ---------------------------------------------------------------------------

/** Sequence two parsers. */
export function seq<A, B>(a: Parser<A>, b: Parser<B>): Parser<[A, B]> {
  return mkParser((pos) => {
    const ra = a.parse(pos);
    if (!ra.ok) return ra;
    const rb = b.parse(ra.next);
    if (!rb.ok) return rb;
    return ok([ra.value, rb.value] as [A, B], rb.next);
  });
}

/** Sequence three parsers. */
export function seq3<A, B, C>(a: Parser<A>, b: Parser<B>, c: Parser<C>): Parser<[A, B, C]> {
  return mkParser((pos) => {
    const ra = a.parse(pos);
    if (!ra.ok) return ra;
    const rb = b.parse(ra.next);
    if (!rb.ok) return rb;
    const rc = c.parse(rb.next);
    if (!rc.ok) return rc;
    return ok([ra.value, rb.value, rc.value] as [A, B, C], rc.next);
  });
}

/** Run `a` then `b`, keeping only the result of `b`. */
export function skipLeft<A, B>(a: Parser<A>, b: Parser<B>): Parser<B> {
  return map(seq(a, b), ([, vb]) => vb);
}

/** Run `a` then `b`, keeping only the result of `a`. */
export function skipRight<A, B>(a: Parser<A>, b: Parser<B>): Parser<A> {
  return map(seq(a, b), ([va]) => va);
}

// ---------------------------------------------------------------------------
// Alternation
// ---------------------------------------------------------------------------

/** Ordered alternation (PEG): try `a` first, then `b`. */
export function alt<A, B>(a: Parser<A>, b: Parser<B>): Parser<A | B> {
  return mkParser((pos): ParseResult<A | B> => {
    const ra = a.parse(pos);
    if (ra.ok) return ra;
    const rb = b.parse(pos);
    if (rb.ok) return rb;
    return furthest(ra, rb);
  });
}

/**
 * Ordered alternation over a list. The first success wins; when all fail,
 * the failure that got furthest is reported.
 */
export function alternatives<T>(parsers: readonly Parser<T>[]): Parser<T> {
  if (parsers.length === 1) return parsers[0];
  return mkParser((pos) => {
    let best: Failure | undefined;
    for (const p of parsers) {
      const r = p.parse(pos);
      if (r.ok) return r;
      best = best ? furthest(best, r) : r;
    }
    return best ?? fail(pos, "no alternatives");
  });
}

// ---------------------------------------------------------------------------
// Repetition
// ---------------------------------------------------------------------------

/**
 * Between `min` and `max` repetitions. Stops on the first failure and on
 * the first success that consumes nothing.
 */
export function rep<T>(p: Parser<T>, options: { min?: number; max?: number } = {}): Parser<T[]> {
  const min = options.min ?? 0;
  const max = options.max ?? Infinity;
  return mkParser((pos) => {
    const results: T[] = [];
    let cur = pos;
    let lastFailure: Failure | undefined;
    while (results.length < max) {
      const r = p.parse(cur);
      if (!r.ok) {
        lastFailure = r;
        break;
      }
      if (r.next.offset === cur.offset) break;
      results.push(r.value);
      cur = r.next;
    }
    if (results.length < min) {
      return fail(
        cur,
        `expected at least ${min} occurrences, got only ${results.length}`,
        lastFailure?.maxOffset ?? cur.offset,
      );
    }
    return ok(results, cur);
  });
}

/** Zero or more repetitions. Always succeeds. */
export function many<T>(p: Parser<T>): Parser<T[]> {
  return rep(p);
}

/** One or more repetitions. */
export function many1<T>(p: Parser<T>): Parser<T[]> {
  return mkParser((pos) => {
    const first = p.parse(pos);
    if (!first.ok) return first;
    const rest = rep(p).parse(first.next);
    if (!rest.ok) return rest;
    return ok([first.value, ...rest.value], rest.next);
  });
}

/** Optional: succeed with `null` if `p` fails. */
export function optional<T>(p: Parser<T>): Parser<T | null> {
  return mkParser((pos): ParseResult<T | null> => {
    const r = p.parse(pos);
    if (r.ok) return r;
    return ok(null, pos);
  });
}

// ---------------------------------------------------------------------------
// Lookahead / negation
// ---------------------------------------------------------------------------

/** Negative lookahead: succeed with null only if `p` fails. Does not consume input. */
export function not<T>(p: Parser<T>): Parser<null> {
  return mkParser((pos) => {
    const r = p.parse(pos);
    if (r.ok) return fail(pos, `unexpected ${JSON.stringify(r.value)}`);
    return ok(null, pos);
  });
}

/** Positive lookahead: succeed with the result of `p` without consuming input. */
export function lookAhead<T>(p: Parser<T>): Parser<T> {
  return mkParser((pos) => {
    const r = p.parse(pos);
    if (!r.ok) return r;
    return ok(r.value, pos);
  });
}

// ---------------------------------------------------------------------------
// Transformation
// ---------------------------------------------------------------------------

/** Transform a parser's result with a function. */
export function map<A, B>(p: Parser<A>, f: (a: A) => B): Parser<B> {
  return mkParser((pos) => {
    const r = p.parse(pos);
    if (!r.ok) return r;
    return ok(f(r.value), r.next);
  });
}

/** Replace a parser's result with a constant. */
export function as<A, B>(p: Parser<A>, value: B): Parser<B> {
  return map(p, () => value);
}

/** Choose the next parser from the result of `p`. */
export function flatMap<A, B>(p: Parser<A>, f: (a: A) => Parser<B>): Parser<B> {
  return mkParser((pos) => {
    const r = p.parse(pos);
    if (!r.ok) return r;
    return f(r.value).parse(r.next);
  });
}

/** Pair a parser's result with the source text it consumed. */
export function withSource<T>(p: Parser<T>): Parser<[T, string]> {
  return mkParser((pos) => {
    const r = p.parse(pos);
    if (!r.ok) return r;
    return ok([r.value, pos.input.slice(pos.offset, r.next.offset)] as [T, string], r.next);
  });
}

/** Pair a parser's result with the position it started at. */
export function withPosition<T>(p: Parser<T>): Parser<[T, SourcePosition]> {
  return mkParser((pos) => {
    const r = p.parse(pos);
    if (!r.ok) return r;
    return ok([r.value, pos] as [T, SourcePosition], r.next);
  });
}

/** Succeed only when `p` consumes the rest of the input. */
export function consumeAll<T>(p: Parser<T>): Parser<T> {
  return skipRight(p, eof());
}

// ---------------------------------------------------------------------------
// Separation combinators
// ---------------------------------------------------------------------------

/** Zero or more items separated by `sep`. */
export function sepBy<T, S>(item: Parser<T>, sep: Parser<S>): Parser<T[]> {
  return mkParser((pos) => {
    const r = sepBy1(item, sep).parse(pos);
    if (r.ok) return r;
    return ok([], pos);
  });
}

/** One or more items separated by `sep`. */
export function sepBy1<T, S>(item: Parser<T>, sep: Parser<S>): Parser<T[]> {
  return mkParser((pos) => {
    const first = item.parse(pos);
    if (!first.ok) return first;
    const results: T[] = [first.value];
    let cur = first.next;
    for (;;) {
      const rs = sep.parse(cur);
      if (!rs.ok) break;
      const ri = item.parse(rs.next);
      if (!ri.ok) break;
      if (ri.next.offset === cur.offset) break;
      results.push(ri.value);
      cur = ri.next;
    }
    return ok(results, cur);
  });
}

/** Parse `p` between `open` and `close`, returning only the inner result. */
export function between<O, T, C>(open: Parser<O>, p: Parser<T>, close: Parser<C>): Parser<T> {
  return mkParser((pos) => {
    const ro = open.parse(pos);
    if (!ro.ok) return ro;
    const rp = p.parse(ro.next);
    if (!rp.ok) return rp;
    const rc = close.parse(rp.next);
    if (!rc.ok) return rc;
    return ok(rp.value, rc.next);
  });
}

/** Lazy parser for recursive grammars. `f` is called on first use. */
export function lazy<T>(f: () => Parser<T>): Parser<T> {
  let cached: Parser<T> | null = null;
  return mkParser((pos) => {
    if (!cached) cached = f();
    return cached.parse(pos);
  });
}

// ---------------------------------------------------------------------------
// Convenience string parsers
// ---------------------------------------------------------------------------

/** Parse a double-quoted string with backslash escape support. */
export function quotedString(): Parser<string> {
  return mkParser((pos) => {
    const { input } = pos;
    if (pos.char !== '"') {
      return fail(pos, "expected quoted string");
    }
    let i = pos.offset + 1;
    let value = "";
    while (i < input.length) {
      const ch = input[i];
      if (ch === "\\") {
        i++;
        if (i >= input.length) break;
        const esc = input[i];
        switch (esc) {
          case "n":
            value += "\n";
            break;
          case "r":
            value += "\r";
            break;
          case "t":
            value += "\t";
            break;
          default:
            value += esc;
            break;
        }
        i++;
      } else if (ch === '"') {
        return ok(value, pos.moveTo(i + 1));
      } else {
        value += ch;
        i++;
      }
    }
    return fail(pos.moveTo(input.length), "expected closing quote", input.length);
  });
}
