/**
 * A minimal host markup language.
 *
 * Spans: `*emphasis*`, `**strong**`, `` `literal` ``, backslash escapes and
 * `${key}` references. Blocks: `#` headers up to level six and paragraphs,
 * which run up to a blank line or a header line. Directives are added as
 * extensions.
 */

import {
  alternatives,
  anyOf,
  char,
  delimitedBy,
  fail,
  literal as literalText,
  map,
  mkParser,
  ok,
  oneChar,
  prefixed,
  skipLeft,
  SourcePosition,
  undelimited,
  type Parser,
} from "@inkwell/parse";
import { emphasis, header, literal, paragraph, strong, text, type Span } from "../ast.js";
import { BlockParser, SpanParser, type MarkupFormat, type RecursiveSpanParsers } from "../bundle.js";
import { isBlankLine, lineEnd } from "../lines.js";
import { referenceParser } from "../references.js";

const HEADER_LINE = /#{1,6}[ \t]/y;

function isHeaderLine(input: string, offset: number): boolean {
  HEADER_LINE.lastIndex = offset;
  return HEADER_LINE.test(input);
}

function nonEmpty(parser: Parser<Span[]>): Parser<Span[]> {
  return mkParser((pos) => {
    const r = parser.parse(pos);
    if (r.ok && r.value.length === 0) return fail(pos, "expected content");
    return r;
  });
}

/** Spans of `input[start, end)`, keeping offsets relative to the whole input */
function spansBetween(parsers: RecursiveSpanParsers, pos: SourcePosition, start: number, end: number): Span[] {
  const bounded = new SourcePosition(pos.input.slice(0, end), start, pos.nestLevel);
  const r = parsers.recursiveSpans(undelimited()).parse(bounded);
  return r.ok ? r.value : [text(pos.input.slice(start, end))];
}

export const escapedChar = prefixed("\\", skipLeft(char("\\"), oneChar()));

const emphasisParser = SpanParser.recursive((parsers) => {
  const strongSpan = map(skipLeft(literalText("**"), nonEmpty(parsers.recursiveSpans(delimitedBy("**")))), strong);
  const emphasisSpan = map(skipLeft(char("*"), nonEmpty(parsers.recursiveSpans(delimitedBy("*")))), emphasis);
  return prefixed("*", alternatives<Span>([strongSpan, emphasisSpan]));
});

const literalParser = SpanParser.standalone(
  prefixed("`", map(skipLeft(char("`"), delimitedBy("`").nonEmpty().asText()), literal)),
);

const referenceSpanParser = SpanParser.recursive((parsers) => referenceParser(parsers.config));

const hashes = anyOf("#").min(1).max(6);
const headerGap = anyOf(" ", "\t").min(1);

const headerParser = BlockParser.recursive((parsers) =>
  prefixed(
    "#",
    mkParser((pos) => {
      const level = hashes.parse(pos);
      if (!level.ok) return level;
      const gap = headerGap.parse(level.next);
      if (!gap.ok) return gap;

      const end = lineEnd(pos.input, gap.next.offset);
      const content = pos.input.slice(gap.next.offset, end).trimEnd();
      const spans = spansBetween(parsers, pos, gap.next.offset, gap.next.offset + content.length);
      return ok(header(level.value.length, spans), pos.moveTo(end + 1));
    }),
  ),
);

const paragraphParser = BlockParser.recursive((parsers) =>
  mkParser((pos) => {
    if (pos.atEnd) return fail(pos, "unexpected end of input");
    const { input } = pos;
    let end = lineEnd(input, pos.offset);
    while (end < input.length) {
      const next = end + 1;
      if (next >= input.length || isBlankLine(input, next) || isHeaderLine(input, next)) break;
      end = lineEnd(input, next);
    }
    return ok(paragraph(spansBetween(parsers, pos, pos.offset, end)), pos.moveTo(end + 1));
  }),
);

export const BasicMarkup: MarkupFormat = {
  name: "basic",
  blockParsers: [headerParser, paragraphParser],
  spanParsers: [emphasisParser, literalParser, referenceSpanParser],
  escapedChar,
};
