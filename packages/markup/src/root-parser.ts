/**
 * RootParser
 *
 * Assembles a host format and its extensions into the parsers for one
 * document: span parsers grouped by start character, block parsers
 * dispatched by their first character with the unconditional parsers
 * (paragraphs) as fallback. Parsing a document never fails.
 */

import { Config } from "@inkwell/config";
import { settings } from "@inkwell/core";
import {
  alt,
  alternatives,
  DEFAULT_MAX_NESTING_LEVEL,
  dispatch,
  lazy,
  map,
  mergePrefixed,
  mkParser,
  ok,
  orderByPrecedence,
  prefixed,
  SourcePosition,
  spans,
  undelimited,
  type DelimitedScanner,
  type NodeAlgebra,
  type Parser,
  type ParserDefinition,
  type PrefixedGroups,
  type PrefixedParser,
} from "@inkwell/parse";
import { paragraph, rootElement, text, type Block, type RootElement, type Span } from "./ast.js";
import {
  noExtensions,
  SpanParser,
  type MarkupExtensions,
  type MarkupFormat,
  type RecursiveParsers,
} from "./bundle.js";
import { lineEnd, skipBlankLines } from "./lines.js";

/** How the span engine builds and merges document spans */
export const spanAlgebra: NodeAlgebra<Span> = {
  text,
  asText: (node) => (node.kind === "text" ? node.content : undefined),
  isEmpty: (node) => node.kind === "text" && node.content.length === 0,
};

export interface RootParserOptions {
  readonly extensions?: MarkupExtensions;
  /** Values for `${ref}` references */
  readonly config?: Config;
  /** Defaults to the `parser.maxNestingLevel` setting */
  readonly maxNestingLevel?: number;
}

export class RootParser implements RecursiveParsers {
  readonly escapedChar: PrefixedParser<string>;
  readonly config: Config;
  readonly maxNestingLevel: number;
  readonly recursiveBlocks: Parser<Block[]>;
  readonly rootElement: Parser<RootElement>;

  private readonly spanGroups: PrefixedGroups<Span>;
  private readonly blockParser: Parser<Block>;
  private readonly fallbackBlock: Parser<Block>;

  constructor(format: MarkupFormat, options: RootParserOptions = {}) {
    const extensions = options.extensions ?? noExtensions;
    this.config = options.config ?? Config.empty;
    this.maxNestingLevel =
      options.maxNestingLevel ?? settings.getNumber("parser.maxNestingLevel", DEFAULT_MAX_NESTING_LEVEL);
    this.escapedChar = format.escapedChar;

    const escape = SpanParser.standalone(
      prefixed(format.escapedChar.startChars, map(format.escapedChar, text)),
    ).withLowPrecedence();
    const hostSpans = [...format.spanParsers, escape].map((b) => b.createParser(this));
    const extensionSpans = extensions.spanParsers.map((b) => b.createParser(this));
    this.spanGroups = mergePrefixed(orderByPrecedence(hostSpans, extensionSpans));

    const blocks = orderByPrecedence(
      format.blockParsers.map((b) => b.createParser(this)),
      extensions.blockParsers.map((b) => b.createParser(this)),
    );
    this.fallbackBlock = fallbackOf(blocks);
    this.blockParser = alt(dispatch(blocks), this.fallbackBlock);
    this.recursiveBlocks = this.blocks();
    this.rootElement = map(this.recursiveBlocks, rootElement);
  }

  recursiveSpans(scanner: DelimitedScanner): Parser<Span[]> {
    return lazy(() => spans(scanner, this.spanGroups, spanAlgebra, { maxNestingLevel: this.maxNestingLevel }));
  }

  parseSpans(source: string, nestLevel = 0): Span[] {
    const r = this.recursiveSpans(undelimited()).parse(new SourcePosition(source, 0, nestLevel));
    return r.ok ? r.value : [text(source)];
  }

  parseBlocks(source: string, nestLevel = 0): Block[] {
    const r = this.recursiveBlocks.parse(new SourcePosition(source, 0, nestLevel));
    return r.ok ? r.value : [paragraph([text(source)])];
  }

  /** Parse a whole document, starting at `offset` */
  parseDocument(input: string, offset = 0): RootElement {
    const r = this.rootElement.parse(new SourcePosition(input, offset));
    return r.ok ? r.value : rootElement([paragraph([text(input.slice(offset))])]);
  }

  private blocks(): Parser<Block[]> {
    return mkParser((pos) => {
      const parser = pos.nestLevel < this.maxNestingLevel ? this.blockParser : this.fallbackBlock;
      const out: Block[] = [];
      let cur = skipBlankLines(pos);

      while (!cur.atEnd) {
        const r = parser.parse(cur);
        if (r.ok && r.next.offset > cur.offset) {
          out.push(r.value);
          cur = skipBlankLines(r.next);
        } else {
          const end = lineEnd(cur.input, cur.offset);
          out.push(paragraph([text(cur.input.slice(cur.offset, end))]));
          cur = skipBlankLines(cur.moveTo(end + 1));
        }
      }
      return ok(out, cur);
    });
  }
}

function fallbackOf(blocks: readonly ParserDefinition<Block>[]): Parser<Block> {
  const unconditional = blocks.filter((d) => d.startChars.length === 0).map((d) => d.parser);
  if (unconditional.length > 0) return alternatives(unconditional);
  return mkParser((pos) => {
    const end = lineEnd(pos.input, pos.offset);
    return ok(paragraph([text(pos.input.slice(pos.offset, end))]), pos.moveTo(end + 1));
  });
}
