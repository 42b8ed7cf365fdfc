/**
 * Parser bundles.
 *
 * A host markup format and any number of extensions contribute block and
 * span parsers as builders. A builder receives the recursive parsers of the
 * root parser being assembled, so a parser can re-enter markup parsing for
 * its own content.
 */

import type { Config } from "@inkwell/config";
import {
  prefixed,
  PrefixedParser,
  type DelimitedScanner,
  type Parser,
  type ParserDefinition,
  type Precedence,
} from "@inkwell/parse";
import type { Block, Span } from "./ast.js";

/** Recursive entry points for parsers of inline content */
export interface RecursiveSpanParsers {
  /** Spans up to the end of `scanner`, with every span parser active */
  recursiveSpans(scanner: DelimitedScanner): Parser<Span[]>;
  /** Parse a standalone string as spans */
  parseSpans(source: string, nestLevel?: number): Span[];
  /** The host format's escape, for text with embedded escapes */
  readonly escapedChar: PrefixedParser<string>;
  /** Values `${ref}` references are resolved against */
  readonly config: Config;
}

/** Recursive entry points for block parsers */
export interface RecursiveParsers extends RecursiveSpanParsers {
  /** Blocks from the current position to the end of input */
  readonly recursiveBlocks: Parser<Block[]>;
  /** Parse a standalone string as blocks */
  parseBlocks(source: string, nestLevel?: number): Block[];
}

/**
 * Creates a parser definition once the recursive parsers exist.
 */
export class ParserBuilder<T, P> {
  constructor(
    private readonly create: (parsers: P) => Parser<T>,
    private readonly startChars?: string,
    private readonly precedence: Precedence = "high",
  ) {}

  /** Try this parser after the host's parsers for the same character */
  withLowPrecedence(): ParserBuilder<T, P> {
    return new ParserBuilder(this.create, this.startChars, "low");
  }

  /** Restrict the parser to the given start characters */
  forStartChar(chars: string): ParserBuilder<T, P> {
    return new ParserBuilder(this.create, chars, this.precedence);
  }

  createParser(parsers: P): ParserDefinition<T> {
    const parser = this.create(parsers);
    if (this.startChars !== undefined) {
      return { parser: prefixed(this.startChars, parser), startChars: this.startChars, precedence: this.precedence };
    }
    const startChars = parser instanceof PrefixedParser ? parser.startChars : "";
    return { parser, startChars, precedence: this.precedence };
  }
}

export type SpanParserBuilder = ParserBuilder<Span, RecursiveSpanParsers>;
export type BlockParserBuilder = ParserBuilder<Block, RecursiveParsers>;

export const SpanParser = {
  /** A parser that needs no recursive parsing */
  standalone(parser: Parser<Span>): SpanParserBuilder {
    return new ParserBuilder(() => parser);
  },
  recursive(create: (parsers: RecursiveSpanParsers) => Parser<Span>): SpanParserBuilder {
    return new ParserBuilder(create);
  },
};

export const BlockParser = {
  standalone(parser: Parser<Block>): BlockParserBuilder {
    return new ParserBuilder(() => parser);
  },
  recursive(create: (parsers: RecursiveParsers) => Parser<Block>): BlockParserBuilder {
    return new ParserBuilder(create);
  },
};

/** A host markup language */
export interface MarkupFormat {
  readonly name: string;
  readonly blockParsers: readonly BlockParserBuilder[];
  readonly spanParsers: readonly SpanParserBuilder[];
  readonly escapedChar: PrefixedParser<string>;
}

/** Parsers added on top of a host format */
export interface MarkupExtensions {
  readonly blockParsers: readonly BlockParserBuilder[];
  readonly spanParsers: readonly SpanParserBuilder[];
  /** Span parsers for templates */
  readonly templateParsers: readonly SpanParserBuilder[];
}

export const noExtensions: MarkupExtensions = { blockParsers: [], spanParsers: [], templateParsers: [] };

/** Concatenate extensions, keeping their order. */
export function mergeExtensions(extensions: readonly MarkupExtensions[]): MarkupExtensions {
  return {
    blockParsers: extensions.flatMap((e) => e.blockParsers),
    spanParsers: extensions.flatMap((e) => e.spanParsers),
    templateParsers: extensions.flatMap((e) => e.templateParsers),
  };
}
