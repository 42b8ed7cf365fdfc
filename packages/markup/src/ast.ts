/**
 * Document tree.
 *
 * Every node is an immutable plain object tagged by `kind`. Resolver nodes
 * stand in for directive output until `resolveTree` runs them with a
 * document cursor; separator nodes mark the split points of a directive body.
 */

import type { Config } from "@inkwell/config";
import type { DirectiveDeclaration } from "./directive/declaration.js";

/** Where a document sits, handed to resolvers and directives */
export interface DocumentCursor {
  readonly path: string;
  readonly config: Config;
}

/** Placeholder content shared by invalid spans and blocks */
export interface InvalidContent {
  readonly message: string;
  /** The original source of the construct */
  readonly source: string;
  readonly offset?: number;
  /** Diagnostic catalog code */
  readonly code?: number;
}

/** A separator marker, kept in a directive body until its parent splits it */
export interface SeparatorInstance {
  readonly name: string;
  readonly declaration: DirectiveDeclaration;
  readonly source: string;
  readonly offset: number;
}

// ---------------------------------------------------------------------------
// Spans
// ---------------------------------------------------------------------------

export interface Text {
  readonly kind: "text";
  readonly content: string;
}

export interface Emphasis {
  readonly kind: "emphasis";
  readonly content: readonly Span[];
}

export interface Strong {
  readonly kind: "strong";
  readonly content: readonly Span[];
}

export interface Literal {
  readonly kind: "literal";
  readonly content: string;
}

export interface SpanSequence {
  readonly kind: "spanSequence";
  readonly content: readonly Span[];
  readonly styles: readonly string[];
}

export interface InvalidSpan extends InvalidContent {
  readonly kind: "invalidSpan";
}

export interface SpanResolver {
  readonly kind: "spanResolver";
  readonly source: string;
  readonly offset: number;
  resolve(cursor: DocumentCursor): Span;
}

export interface SpanSeparator {
  readonly kind: "spanSeparator";
  readonly instance: SeparatorInstance;
}

export type Span = Text | Emphasis | Strong | Literal | SpanSequence | InvalidSpan | SpanResolver | SpanSeparator;

// ---------------------------------------------------------------------------
// Blocks
// ---------------------------------------------------------------------------

export interface Paragraph {
  readonly kind: "paragraph";
  readonly content: readonly Span[];
}

export interface Header {
  readonly kind: "header";
  readonly level: number;
  readonly content: readonly Span[];
}

export interface BlockSequence {
  readonly kind: "blockSequence";
  readonly content: readonly Block[];
  readonly styles: readonly string[];
}

export interface InvalidBlock extends InvalidContent {
  readonly kind: "invalidBlock";
}

export interface BlockResolver {
  readonly kind: "blockResolver";
  readonly source: string;
  readonly offset: number;
  resolve(cursor: DocumentCursor): Block;
}

export interface BlockSeparator {
  readonly kind: "blockSeparator";
  readonly instance: SeparatorInstance;
}

export type Block = Paragraph | Header | BlockSequence | InvalidBlock | BlockResolver | BlockSeparator;

// ---------------------------------------------------------------------------
// Roots
// ---------------------------------------------------------------------------

export interface RootElement {
  readonly kind: "root";
  readonly content: readonly Block[];
}

export interface TemplateRoot {
  readonly kind: "templateRoot";
  readonly content: readonly Span[];
}

// ---------------------------------------------------------------------------
// Constructors
// ---------------------------------------------------------------------------

export const text = (content: string): Text => ({ kind: "text", content });

export const emphasis = (content: readonly Span[]): Emphasis => ({ kind: "emphasis", content });

export const strong = (content: readonly Span[]): Strong => ({ kind: "strong", content });

export const literal = (content: string): Literal => ({ kind: "literal", content });

export const spanSequence = (content: readonly Span[], styles: readonly string[] = []): SpanSequence => ({
  kind: "spanSequence",
  content,
  styles,
});

export const invalidSpan = (content: InvalidContent): InvalidSpan => ({ kind: "invalidSpan", ...content });

export const paragraph = (content: readonly Span[]): Paragraph => ({ kind: "paragraph", content });

export const header = (level: number, content: readonly Span[]): Header => ({ kind: "header", level, content });

export const blockSequence = (content: readonly Block[], styles: readonly string[] = []): BlockSequence => ({
  kind: "blockSequence",
  content,
  styles,
});

export const invalidBlock = (content: InvalidContent): InvalidBlock => ({ kind: "invalidBlock", ...content });

export const rootElement = (content: readonly Block[]): RootElement => ({ kind: "root", content });

export const templateRoot = (content: readonly Span[]): TemplateRoot => ({ kind: "templateRoot", content });

/** The empty text node; the span engine drops it */
export const emptyText: Text = text("");

/** The plain text of a span list, ignoring markup. */
export function plainText(spans: readonly Span[]): string {
  let out = "";
  for (const span of spans) {
    switch (span.kind) {
      case "text":
      case "literal":
        out += span.content;
        break;
      case "emphasis":
      case "strong":
      case "spanSequence":
        out += plainText(span.content);
        break;
      case "invalidSpan":
      case "spanResolver":
        out += span.source;
        break;
      case "spanSeparator":
        out += span.instance.source;
        break;
    }
  }
  return out;
}
