/**
 * Object-literal grammar.
 *
 * A small configuration syntax: `key = value`, `key: value` or `key { ... }`
 * fields separated by commas or newlines, with quoted strings, arrays,
 * nested objects and unquoted runs as values. Unquoted `true`, `false`,
 * `null` and numbers are typed; `#` and `//` start a comment.
 */

import {
  alt,
  alternatives,
  anyBut,
  anyOf,
  between,
  charLookup,
  char,
  consumeAll,
  fail,
  lazy,
  literal,
  lookAhead,
  many,
  map,
  mkParser,
  ok,
  oneOf,
  optional,
  quotedString,
  seq,
  sepBy,
  skipLeft,
  skipRight,
  someOf,
  withSource,
  type Parser,
  type ParseResult,
  type SourcePosition,
} from "@inkwell/parse";
import { fieldsToObject, type ConfigObject, type ConfigValue, type Field } from "./values.js";

export interface ParsedValue {
  readonly value: ConfigValue;
  readonly source: string;
}

const NUMBER = /^-?(0|[1-9][0-9]*)(\.[0-9]+)?([eE][+-]?[0-9]+)?$/;

/** How deep arrays and objects may nest inside one another */
export const MAX_VALUE_NESTING = 64;

const inlineWs = anyOf(" ", "\t");

const comment: Parser<string> = skipLeft(alt(literal("#"), literal("//")), anyBut("\n"));

/** Whitespace, newlines and comments */
export const wsOrNl: Parser<string[]> = many(alternatives([someOf(" \t\r\n"), comment]));

function skipWs(pos: SourcePosition): SourcePosition {
  const r = wsOrNl.parse(pos);
  return r.ok ? r.next : pos;
}

/** Type an unquoted run: booleans, null and numbers, anything else a string */
export function typedValue(text: string): ConfigValue {
  switch (text) {
    case "true":
      return true;
    case "false":
      return false;
    case "null":
      return null;
  }
  return NUMBER.test(text) ? Number(text) : text;
}

function unquoted(stopChars: string, comments: boolean): Parser<ParsedValue> {
  const stop = charLookup(stopChars);
  return mkParser((pos) => {
    const { input, offset } = pos;
    let i = offset;
    while (i < input.length && !stop(input.charCodeAt(i)) && !(comments && input.startsWith("//", i))) i++;
    const source = input.slice(offset, i).trim();
    if (source.length === 0) return fail(pos, "expected a value");
    if (source[0] === "[" || source[0] === "{") return fail(pos, "unclosed array or object");
    return ok({ value: typedValue(source), source }, pos.moveTo(i));
  });
}

const quoted: Parser<ParsedValue> = map(withSource(quotedString()), ([value, source]) => ({ value, source }));

const comma = seq(char(","), wsOrNl);

/** Parse `p` one nesting level deeper, failing past the limit */
function nestedValue(p: Parser<ParsedValue>): Parser<ParsedValue> {
  return mkParser((pos) => {
    if (pos.nestLevel >= MAX_VALUE_NESTING) return fail(pos, "values nested too deeply");
    const r = p.parse(pos.nested());
    return r.ok ? ok(r.value, r.next.withNestLevel(pos.nestLevel)) : r;
  });
}

const arrayValue: Parser<ParsedValue> = lazy(() =>
  nestedValue(
    map(
      withSource(
        between(
          seq(char("["), wsOrNl),
          skipRight(sepBy(skipRight(valueUntil(",]\n\r#"), wsOrNl), comma), optional(comma)),
          char("]"),
        ),
      ),
      ([items, source]) => ({ value: items.map((item) => item.value), source }),
    ),
  ),
);

const objectValue: Parser<ParsedValue> = lazy(() =>
  nestedValue(
    map(withSource(between(char("{"), objectMembers, char("}"))), ([fields, source]) => ({
      value: fieldsToObject(fields),
      source,
    })),
  ),
);

/**
 * A single value. Unquoted runs end at any of `stopChars`, and at `//` when
 * `comments` is set.
 */
export function valueUntil(stopChars: string, comments = true): Parser<ParsedValue> {
  return alternatives([quoted, arrayValue, objectValue, unquoted(stopChars, comments)]);
}

interface Key {
  readonly key: string;
  readonly path: readonly string[];
}

const key: Parser<Key> = alt(
  map(quotedString(), (k) => ({ key: k, path: [k] })),
  map(anyBut(" \t\r\n=:{}[],\"#").min(1), (k) => ({ key: k, path: k.split(".") })),
);

const assignSign = seq(oneOf("=", ":"), inlineWs);

const assignment: Parser<ParsedValue> = alt(
  skipLeft(assignSign, valueUntil(",}\n\r#")),
  skipLeft(lookAhead(char("{")), objectValue),
);

const field: Parser<Field> = map(seq(skipRight(key, inlineWs), assignment), ([k, v]) => ({
  key: k.key,
  path: k.path,
  value: v.value,
  source: v.source,
}));

/**
 * Fields separated by commas or newlines, with surrounding whitespace and
 * comments skipped. Stops in front of anything that cannot start a field.
 */
export const objectMembers: Parser<Field[]> = mkParser((pos) => {
  const fields: Field[] = [];
  let cur = skipWs(pos);

  for (;;) {
    const f = field.parse(cur);
    if (!f.ok) {
      if (f.maxOffset > cur.offset) return f;
      break;
    }
    fields.push(f.value);

    const ws = inlineWs.parse(f.next);
    const after = ws.ok ? ws.next : f.next;
    if (after.char === ",") {
      cur = skipWs(after.consume(1));
    } else if (after.atEnd || "\r\n#".includes(after.char) || after.capture(2) === "//") {
      cur = skipWs(after);
    } else {
      cur = after;
      break;
    }
  }
  return ok(fields, cur);
});

const rootFields: Parser<Field[]> = alt(
  between(seq(wsOrNl, char("{")), objectMembers, seq(char("}"), wsOrNl)),
  objectMembers,
);

/** Every field of a whole document body, braces optional. */
export function parseFields(text: string): ParseResult<Field[]> {
  return consumeAll(rootFields).parse(text);
}

/** A whole document body as an object; later duplicate keys win. */
export function parseConfigObject(text: string): ParseResult<ConfigObject> {
  return map(consumeAll(rootFields), fieldsToObject).parse(text);
}

/** A single standalone value, such as an attribute's source text. */
export function parseValue(text: string): ParseResult<ConfigValue> {
  const ws = anyOf(" \t\r\n");
  return map(consumeAll(skipRight(skipLeft(ws, valueUntil("", false)), ws)), (v) => v.value).parse(text);
}
