/**
 * TemplateParser
 *
 * Templates are plain text with `${ref}` references and template
 * directives. No other markup is recognized, so a backslash or an asterisk
 * is literal text; the escape only applies inside directive attributes.
 */

import { Config } from "@inkwell/config";
import { settings } from "@inkwell/core";
import {
  DEFAULT_MAX_NESTING_LEVEL,
  lazy,
  map,
  mergePrefixed,
  orderByPrecedence,
  SourcePosition,
  spans,
  undelimited,
  type DelimitedScanner,
  type Parser,
  type PrefixedGroups,
  type PrefixedParser,
} from "@inkwell/parse";
import { templateRoot, text, type Span, type TemplateRoot } from "./ast.js";
import { noExtensions, SpanParser, type MarkupExtensions, type RecursiveSpanParsers } from "./bundle.js";
import { escapedChar } from "./basic/format.js";
import { referenceParser } from "./references.js";
import { spanAlgebra, type RootParserOptions } from "./root-parser.js";

export class TemplateParser implements RecursiveSpanParsers {
  readonly escapedChar: PrefixedParser<string> = escapedChar;
  readonly config: Config;
  readonly maxNestingLevel: number;
  readonly templateRoot: Parser<TemplateRoot>;

  private readonly spanGroups: PrefixedGroups<Span>;

  constructor(options: RootParserOptions = {}) {
    const extensions: MarkupExtensions = options.extensions ?? noExtensions;
    this.config = options.config ?? Config.empty;
    this.maxNestingLevel =
      options.maxNestingLevel ?? settings.getNumber("parser.maxNestingLevel", DEFAULT_MAX_NESTING_LEVEL);

    const host = [SpanParser.recursive((parsers) => referenceParser(parsers.config))].map((b) => b.createParser(this));
    const ext = extensions.templateParsers.map((b) => b.createParser(this));
    this.spanGroups = mergePrefixed(orderByPrecedence(host, ext));
    this.templateRoot = map(this.recursiveSpans(undelimited()), templateRoot);
  }

  recursiveSpans(scanner: DelimitedScanner): Parser<Span[]> {
    return lazy(() => spans(scanner, this.spanGroups, spanAlgebra, { maxNestingLevel: this.maxNestingLevel }));
  }

  parseSpans(source: string, nestLevel = 0): Span[] {
    const r = this.recursiveSpans(undelimited()).parse(new SourcePosition(source, 0, nestLevel));
    return r.ok ? r.value : [text(source)];
  }

  /** Parse a whole template, starting at `offset` */
  parseTemplate(input: string, offset = 0): TemplateRoot {
    const r = this.templateRoot.parse(new SourcePosition(input, offset));
    return r.ok ? r.value : templateRoot([text(input.slice(offset))]);
  }
}
