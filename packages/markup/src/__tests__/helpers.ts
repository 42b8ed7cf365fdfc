import { createLogger } from "@inkwell/core";
import { parseDocument, type Block, type Directive, type ParseOptions, type Span } from "../index.js";

/** A logger that drops every line */
export const silent = createLogger("test", { writer: () => {} });

export function blocksOf(input: string, options: ParseOptions = {}): readonly Block[] {
  return parseDocument(input, { logger: silent, ...options }).root.content;
}

/** Spans of the first paragraph, with the given span directives registered */
export function spansOf(input: string, span: readonly Directive<Span>[], options: ParseOptions = {}): readonly Span[] {
  const [first] = blocksOf(input, { ...options, directives: { span } });
  return first?.kind === "paragraph" ? first.content : [];
}
