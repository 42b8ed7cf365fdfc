import { describe, it, expect } from "vitest";
import {
  SourcePosition,
  ParseError,
  literal,
  char,
  oneChar,
  eof,
  eol,
  seq,
  seq3,
  alt,
  alternatives,
  rep,
  many,
  many1,
  optional,
  not,
  lookAhead,
  map,
  as,
  flatMap,
  withSource,
  consumeAll,
  sepBy,
  sepBy1,
  between,
  lazy,
  success,
  failure,
  skipLeft,
  skipRight,
  quotedString,
} from "../index.js";
import type { Parser } from "../index.js";
import { run } from "./helpers.js";

// ---------------------------------------------------------------------------
// Positions
// ---------------------------------------------------------------------------

describe("SourcePosition", () => {
  it("reports line, column and line content", () => {
    const pos = new SourcePosition("ab\ncd", 4);
    expect(pos.line).toBe(2);
    expect(pos.column).toBe(2);
    expect(pos.lineContent).toBe("cd");
    expect(pos.char).toBe("d");
    expect(pos.remaining).toBe(1);
  });

  it("never moves past the input", () => {
    const pos = new SourcePosition("ab").consume(5);
    expect(pos.offset).toBe(2);
    expect(pos.atEnd).toBe(true);
    expect(pos.char).toBe("");
  });

  it("tracks nesting separately from the offset", () => {
    const pos = new SourcePosition("abc", 1).nested().nested();
    expect(pos.nestLevel).toBe(2);
    expect(pos.consume(1).nestLevel).toBe(2);
    expect(pos.withNestLevel(0).offset).toBe(1);
  });
});

// ---------------------------------------------------------------------------
// Primitives
// ---------------------------------------------------------------------------

describe("literal", () => {
  it("matches an exact string", () => {
    expect(run(literal("hello"), "hello world")).toEqual({ ok: true, value: "hello", offset: 5 });
  });

  it("fails on mismatch without consuming", () => {
    expect(run(literal("hello"), "help")).toEqual({
      ok: false,
      message: 'expected "hello"',
      offset: 0,
      maxOffset: 0,
    });
  });
});

describe("char and oneChar", () => {
  it("match single characters", () => {
    expect(run(char("x"), "xyz")).toEqual({ ok: true, value: "x", offset: 1 });
    expect(run(oneChar(), "q")).toEqual({ ok: true, value: "q", offset: 1 });
    expect(run(oneChar(), "").ok).toBe(false);
  });
});

describe("eof and eol", () => {
  it("eof only succeeds at the end", () => {
    expect(run(eof(), "")).toEqual({ ok: true, value: null, offset: 0 });
    expect(run(eof(), "a").ok).toBe(false);
  });

  it("eol accepts both line endings and the end of input", () => {
    expect(run(eol(), "\r\nx")).toEqual({ ok: true, value: "\r\n", offset: 2 });
    expect(run(eol(), "\nx")).toEqual({ ok: true, value: "\n", offset: 1 });
    expect(run(eol(), "")).toEqual({ ok: true, value: "", offset: 0 });
    expect(run(eol(), "x").ok).toBe(false);
  });
});

// ---------------------------------------------------------------------------
// Sequencing
// ---------------------------------------------------------------------------

describe("seq", () => {
  it("sequences parsers", () => {
    expect(run(seq(char("a"), char("b")), "abc")).toEqual({ ok: true, value: ["a", "b"], offset: 2 });
    expect(run(seq3(char("a"), char("b"), char("c")), "abc")).toEqual({
      ok: true,
      value: ["a", "b", "c"],
      offset: 3,
    });
  });

  it("reports the failure of the later parser at its own position", () => {
    expect(run(seq(char("a"), char("b")), "ac")).toEqual({
      ok: false,
      message: 'expected "b"',
      offset: 1,
      maxOffset: 1,
    });
  });

  it("skipLeft and skipRight keep one side", () => {
    expect(run(skipLeft(char("<"), char("a")), "<a")).toEqual({ ok: true, value: "a", offset: 2 });
    expect(run(skipRight(char("a"), char(">")), "a>")).toEqual({ ok: true, value: "a", offset: 2 });
  });
});

// ---------------------------------------------------------------------------
// Alternation
// ---------------------------------------------------------------------------

describe("alt", () => {
  it("returns the first match", () => {
    expect(run(alt(literal("ab"), literal("a")), "abc")).toEqual({ ok: true, value: "ab", offset: 2 });
    expect(run(alt(char("x"), char("a")), "abc")).toEqual({ ok: true, value: "a", offset: 1 });
  });

  it("reports the branch that got furthest", () => {
    const p = alt(seq(literal("ab"), literal("c")), literal("x"));
    expect(run(p, "abd")).toEqual({ ok: false, message: 'expected "c"', offset: 2, maxOffset: 2 });
  });

  it("joins messages of equally far failures", () => {
    expect(run(alt(char("a"), char("b")), "c")).toEqual({
      ok: false,
      message: 'expected "a" or expected "b"',
      offset: 0,
      maxOffset: 0,
    });
  });

  it("alternatives tries a list in order", () => {
    const p = alternatives([char("a"), char("b"), as(char("b"), "second b")]);
    expect(run(p, "b")).toEqual({ ok: true, value: "b", offset: 1 });
  });

  it("alternatives reports the furthest failure of the whole list", () => {
    const p = alternatives<string | [string, string]>([char("x"), seq(char("a"), char("b")), char("y")]);
    expect(run(p, "ac")).toEqual({ ok: false, message: 'expected "b"', offset: 1, maxOffset: 1 });
  });
});

// ---------------------------------------------------------------------------
// Repetition
// ---------------------------------------------------------------------------

describe("repetition", () => {
  it("many stops on a zero-width success instead of looping", () => {
    expect(run(many(success(1)), "abc")).toEqual({ ok: true, value: [], offset: 0 });
  });

  it("rep with a minimum rejects a zero-width parser", () => {
    expect(run(rep(success(1), { min: 2 }), "abc")).toEqual({
      ok: false,
      message: "expected at least 2 occurrences, got only 0",
      offset: 0,
      maxOffset: 0,
    });
  });

  it("rep honours min and max", () => {
    expect(run(rep(char("a"), { max: 2 }), "aaa")).toEqual({ ok: true, value: ["a", "a"], offset: 2 });
    expect(run(rep(char("a"), { min: 2 }), "ab")).toEqual({
      ok: false,
      message: "expected at least 2 occurrences, got only 1",
      offset: 1,
      maxOffset: 1,
    });
  });

  it("many1 needs one match", () => {
    expect(run(many1(char("a")), "aab")).toEqual({ ok: true, value: ["a", "a"], offset: 2 });
    expect(run(many1(char("a")), "b").ok).toBe(false);
  });
});

// ---------------------------------------------------------------------------
// Optional, lookahead, mapping
// ---------------------------------------------------------------------------

describe("optional / not / lookAhead", () => {
  it("optional yields null when absent", () => {
    expect(run(optional(char("a")), "b")).toEqual({ ok: true, value: null, offset: 0 });
  });

  it("not succeeds only when the inner parser fails", () => {
    expect(run(not(char("a")), "b")).toEqual({ ok: true, value: null, offset: 0 });
    expect(run(not(char("a")), "a")).toEqual({ ok: false, message: 'unexpected "a"', offset: 0, maxOffset: 0 });
  });

  it("lookAhead does not consume", () => {
    expect(run(lookAhead(literal("ab")), "abc")).toEqual({ ok: true, value: "ab", offset: 0 });
  });
});

describe("map / flatMap / withSource", () => {
  it("map transforms and propagates failure", () => {
    expect(run(map(char("7"), Number), "7")).toEqual({ ok: true, value: 7, offset: 1 });
    expect(run(map(char("7"), Number), "8").ok).toBe(false);
  });

  it("flatMap chooses the next parser", () => {
    const p = flatMap(oneChar(), (c) => char(c));
    expect(run(p, "xx")).toEqual({ ok: true, value: "x", offset: 2 });
    expect(run(p, "xy").ok).toBe(false);
  });

  it("withSource returns the consumed text", () => {
    expect(run(withSource(seq(char("a"), char("b"))), "abc")).toEqual({
      ok: true,
      value: [["a", "b"], "ab"],
      offset: 2,
    });
  });

  it("consumeAll requires the end of input", () => {
    expect(run(consumeAll(literal("ab")), "abc")).toEqual({
      ok: false,
      message: "expected end of input",
      offset: 2,
      maxOffset: 2,
    });
  });

  it("failure always fails", () => {
    expect(run(failure("nope"), "x")).toEqual({ ok: false, message: "nope", offset: 0, maxOffset: 0 });
  });
});

// ---------------------------------------------------------------------------
// Separation, nesting, recursion
// ---------------------------------------------------------------------------

describe("sepBy", () => {
  it("collects separated items and stops before a trailing separator", () => {
    expect(run(sepBy(char("a"), char(",")), "a,a,")).toEqual({ ok: true, value: ["a", "a"], offset: 3 });
    expect(run(sepBy(char("a"), char(",")), "b")).toEqual({ ok: true, value: [], offset: 0 });
    expect(run(sepBy1(char("a"), char(",")), "b").ok).toBe(false);
  });
});

describe("between and lazy", () => {
  it("between keeps the inner value", () => {
    expect(run(between(char("("), char("x"), char(")")), "(x)")).toEqual({ ok: true, value: "x", offset: 3 });
  });

  it("lazy supports recursive grammars", () => {
    const depth: Parser<number> = lazy(() =>
      alt(
        map(between(char("("), depth, char(")")), (n) => n + 1),
        success(0),
      ),
    );
    expect(run(depth, "((()))")).toEqual({ ok: true, value: 3, offset: 6 });
  });
});

describe("quotedString", () => {
  it("reads escapes", () => {
    expect(run(quotedString(), '"a\\"b" rest')).toEqual({ ok: true, value: 'a"b', offset: 6 });
  });

  it("fails at the end of input when unterminated", () => {
    expect(run(quotedString(), '"abc')).toEqual({
      ok: false,
      message: "expected closing quote",
      offset: 4,
      maxOffset: 4,
    });
  });
});

describe("parseAll", () => {
  it("returns the value when everything is consumed", () => {
    expect(literal("ab").parseAll("ab")).toBe("ab");
  });

  it("throws a ParseError with line and column", () => {
    const p = seq(literal("a\n"), char("x"));
    let caught: unknown;
    try {
      p.parseAll("a\ny");
    } catch (e) {
      caught = e;
    }
    expect(caught).toBeInstanceOf(ParseError);
    if (caught instanceof ParseError) {
      expect(caught.line).toBe(2);
      expect(caught.column).toBe(1);
      expect(caught.message.startsWith('Parse error at line 2, col 1: expected "x"')).toBe(true);
    }
  });

  it("throws when input is left over", () => {
    expect(() => literal("a").parseAll("ab")).toThrow("expected end of input");
  });
});
