/**
 * Turns directive lists into parser extensions for a root or template parser.
 */

import { settings } from "@inkwell/core";
import type { Block, Span } from "../ast.js";
import { BlockParser, SpanParser, type MarkupExtensions } from "../bundle.js";
import { DEFAULT_FENCE } from "./declaration.js";
import { BlockFamily, directiveParser, SpanFamily, TemplateFamily, type Directive } from "./engine.js";
import { createDirectiveRegistry, separatorNames } from "./registry.js";

function defaultFence(): string {
  return settings.getString("parser.defaultFence", DEFAULT_FENCE);
}

export const DirectiveSupport = {
  /**
   * Extensions that parse `@:` directives of each family. Registries are
   * built here, so a duplicate name fails immediately.
   */
  withDirectives(
    block: readonly Directive<Block>[] = [],
    span: readonly Directive<Span>[] = [],
    template: readonly Directive<Span>[] = [],
  ): MarkupExtensions {
    const blocks = createDirectiveRegistry(block, "block");
    const spans = createDirectiveRegistry(span, "span");
    const templates = createDirectiveRegistry(template, "template");

    return {
      blockParsers: [
        BlockParser.recursive((parsers) =>
          directiveParser(BlockFamily, blocks, parsers, {
            defaultFence: defaultFence(),
            separators: separatorNames(blocks),
          }),
        ),
      ],
      spanParsers: [
        SpanParser.recursive((parsers) =>
          directiveParser(SpanFamily, spans, parsers, {
            defaultFence: defaultFence(),
            separators: separatorNames(spans),
          }),
        ),
      ],
      templateParsers: [
        SpanParser.recursive((parsers) =>
          directiveParser(TemplateFamily, templates, parsers, {
            defaultFence: defaultFence(),
            separators: separatorNames(templates),
          }),
        ),
      ],
    };
  },
};
