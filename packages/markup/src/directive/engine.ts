/**
 * Directive parsing for the three directive families.
 *
 * Every family shares the declaration grammar and the evaluation of parts;
 * a `DirectiveFamily` supplies what differs: how a body is found, which
 * node types stand for resolvers, separators and invalid usage, and how
 * standalone content is parsed for the `parser` part.
 */

import { formatMessage, IW2000, IW2006, IW2007 } from "@inkwell/core";
import {
  delimitedBy,
  fail,
  literal,
  map,
  mkParser,
  ok,
  prefixed,
  skipRight,
  SourcePosition,
  success,
  type Parser,
  type PrefixedParser,
} from "@inkwell/parse";
import {
  invalidBlock,
  invalidSpan,
  paragraph,
  text,
  type Block,
  type DocumentCursor,
  type InvalidContent,
  type SeparatorInstance,
  type Span,
} from "../ast.js";
import type { RecursiveParsers, RecursiveSpanParsers } from "../bundle.js";
import { isBlankLine, lineEnd, wsEol } from "../lines.js";
import { declarationParser, type DirectiveDeclaration } from "./declaration.js";
import type { DirectiveBody, DirectiveContext, DirectivePart, Validated } from "./dsl.js";

export type FamilyName = "span" | "block" | "template";

export interface DirectiveFamily<N, P extends RecursiveSpanParsers> {
  readonly name: FamilyName;
  readonly supportsCustomFence: boolean;
  /** The body after a declaration, up to and including the fence */
  body(fence: string, parsers: P): Parser<DirectiveBody<N>>;
  /** What follows a declaration without a body */
  readonly noBody: Parser<unknown>;
  separator(instance: SeparatorInstance): N;
  instanceOf(node: N): SeparatorInstance | undefined;
  resolver(source: string, offset: number, resolve: (cursor: DocumentCursor) => N): N;
  invalid(content: InvalidContent): N;
  parse(parsers: P, source: string, nestLevel: number): N[];
  /** The recorded source of a directive */
  trimSource(source: string): string;
}

export interface Directive<N> {
  readonly family: FamilyName;
  readonly name: string;
  readonly part: DirectivePart<N, N>;
}

function spanBody(fence: string, parsers: RecursiveSpanParsers): Parser<DirectiveBody<Span>> {
  const nodes = parsers.recursiveSpans(delimitedBy(fence));
  return mkParser((pos) => {
    const r = nodes.parse(pos);
    if (!r.ok) return r;
    const raw = pos.input.slice(pos.offset, r.next.offset - fence.length);
    return ok({ raw, nodes: r.value, offset: pos.offset }, r.next);
  });
}

export const SpanFamily: DirectiveFamily<Span, RecursiveSpanParsers> = {
  name: "span",
  supportsCustomFence: false,
  body: spanBody,
  noBody: success(null),
  separator: (instance) => ({ kind: "spanSeparator", instance }),
  instanceOf: (node) => (node.kind === "spanSeparator" ? node.instance : undefined),
  resolver: (source, offset, resolve) => ({ kind: "spanResolver", source, offset, resolve }),
  invalid: invalidSpan,
  parse: (parsers, source, nestLevel) => parsers.parseSpans(source, nestLevel),
  trimSource: (source) => source,
};

export const TemplateFamily: DirectiveFamily<Span, RecursiveSpanParsers> = {
  ...SpanFamily,
  name: "template",
};

/**
 * Lines after the declaration line up to a line holding only the fence.
 * Blank lines around the content are dropped; the content is parsed as
 * blocks one nesting level deeper, with offsets into the whole document.
 */
function blockBody(fence: string, parsers: RecursiveParsers): Parser<DirectiveBody<Block>> {
  const closing = skipRight(literal(fence), wsEol);

  return mkParser((pos) => {
    const firstLine = wsEol.parse(pos);
    if (!firstLine.ok) return firstLine;

    const { input } = pos;
    let offset = firstLine.next.offset;
    let first = -1;
    let last = -1;

    while (offset < input.length) {
      const close = closing.parse(pos.moveTo(offset));
      if (close.ok) {
        const start = first === -1 ? offset : first;
        const end = first === -1 ? offset : last;
        const raw = input.slice(start, end);
        const r = parsers.recursiveBlocks.parse(new SourcePosition(input.slice(0, end), start, pos.nestLevel + 1));
        const nodes = r.ok ? r.value : [paragraph([text(raw)])];
        return ok({ raw, nodes, offset: start }, close.next);
      }
      const end = lineEnd(input, offset);
      if (!isBlankLine(input, offset)) {
        if (first === -1) first = offset;
        last = end;
      }
      offset = end + 1;
    }
    return fail(pos.moveTo(input.length), `expected ${JSON.stringify(fence)}`);
  });
}

export const BlockFamily: DirectiveFamily<Block, RecursiveParsers> = {
  name: "block",
  supportsCustomFence: true,
  body: blockBody,
  noBody: wsEol,
  separator: (instance) => ({ kind: "blockSeparator", instance }),
  instanceOf: (node) => (node.kind === "blockSeparator" ? node.instance : undefined),
  resolver: (source, offset, resolve) => ({ kind: "blockResolver", source, offset, resolve }),
  invalid: invalidBlock,
  parse: (parsers, source, nestLevel) => parsers.parseBlocks(source, nestLevel),
  trimSource: (source) => (source.endsWith("\n") ? source.slice(0, -1) : source),
};

function runPart<N>(part: DirectivePart<N, N>, context: DirectiveContext<N>): Validated<N> {
  try {
    return part.run(context);
  } catch (e) {
    return { ok: false, errors: [e instanceof Error ? e.message : String(e)] };
  }
}

/**
 * The node a directive occurrence stands for once its part has run, or an
 * invalid node listing every problem in order: declaration errors, part
 * errors, duplicate attributes.
 */
export function evaluateDirective<N, P extends RecursiveSpanParsers>(
  family: DirectiveFamily<N, P>,
  directive: Directive<N> | undefined,
  context: DirectiveContext<N>,
): N {
  const { declaration } = context;
  const errors = [...declaration.errors];
  let code = IW2000.code;
  let value: N | undefined;

  if (directive) {
    const r = runPart(directive.part, context);
    if (r.ok) value = r.value;
    else errors.push(...r.errors);
  } else {
    code = IW2007.code;
    errors.push(formatMessage(IW2007, { family: family.name, name: declaration.name }));
  }
  for (const name of declaration.duplicates) {
    errors.push(formatMessage(IW2006, { name }));
  }

  if (errors.length === 0 && value !== undefined) return value;
  return family.invalid({
    message: formatMessage(IW2000, { name: declaration.name, errors: errors.join(", ") }),
    source: context.source,
    offset: context.offset,
    code,
  });
}

export interface DirectiveParserOptions {
  readonly defaultFence: string;
  /** Names that parse as separator occurrences */
  readonly separators: ReadonlySet<string>;
}

/**
 * A parser for `@:name` occurrences of one family. Separator names become
 * separator nodes, even where a directive shares the name, registered
 * directives become resolver nodes, and
 * unknown names become resolvers that report the missing registration.
 * Only registered directives whose part needs a body consume one.
 */
export function directiveParser<N, P extends RecursiveSpanParsers>(
  family: DirectiveFamily<N, P>,
  directives: ReadonlyMap<string, Directive<N>>,
  parsers: P,
  options: DirectiveParserOptions,
): PrefixedParser<N> {
  const declaration = declarationParser({
    supportsCustomFence: family.supportsCustomFence,
    defaultFence: options.defaultFence,
    escapedChar: parsers.escapedChar,
  });
  const noBody = map(family.noBody, () => undefined);

  return prefixed(
    "@",
    mkParser((pos) => {
      const decl = declaration.parse(pos);
      if (!decl.ok) return decl;

      const isSeparator = options.separators.has(decl.value.name);
      const directive = isSeparator ? undefined : directives.get(decl.value.name);
      const wantsBody = directive?.part.hasBody ?? false;

      let body: DirectiveBody<N> | undefined;
      let next = decl.next;
      if (wantsBody) {
        const b = family.body(decl.value.fence, parsers).parse(decl.next);
        if (b.ok) {
          body = b.value;
          next = b.next;
        }
      }
      if (!body) {
        const r = noBody.parse(decl.next);
        if (!r.ok) return r;
        next = r.next;
      }

      const source = family.trimSource(pos.input.slice(pos.offset, next.offset));
      if (isSeparator) {
        return ok(family.separator(separatorInstance(decl.value, source, pos.offset)), next);
      }

      const nestLevel = pos.nestLevel;
      const resolve = (cursor: DocumentCursor): N =>
        evaluateDirective(family, directive, {
          declaration: decl.value,
          body,
          source,
          offset: pos.offset,
          cursor,
          parse: (src) => family.parse(parsers, src, nestLevel),
        });
      return ok(family.resolver(source, pos.offset, resolve), next);
    }),
  );
}

function separatorInstance(declaration: DirectiveDeclaration, source: string, offset: number): SeparatorInstance {
  return { name: declaration.name, declaration, source, offset };
}
