/**
 * Rewrite step: run every resolver node against a document cursor.
 *
 * Resolution is recursive into resolver output, so a directive whose body
 * contains further directives comes back fully resolved. Separator markers
 * that no parent directive claimed become invalid nodes.
 */

import { formatMessage, IW2104, unreachable } from "@inkwell/core";
import {
  invalidBlock,
  invalidSpan,
  type Block,
  type DocumentCursor,
  type InvalidContent,
  type RootElement,
  type SeparatorInstance,
  type Span,
  type TemplateRoot,
} from "./ast.js";

function orphaned(instance: SeparatorInstance): InvalidContent {
  return {
    message: formatMessage(IW2104, { name: instance.name }),
    source: instance.source,
    offset: instance.offset,
    code: IW2104.code,
  };
}

export function resolveSpan(span: Span, cursor: DocumentCursor): Span {
  switch (span.kind) {
    case "text":
    case "literal":
    case "invalidSpan":
      return span;
    case "emphasis":
    case "strong":
    case "spanSequence":
      return { ...span, content: resolveSpans(span.content, cursor) };
    case "spanResolver":
      return resolveSpan(span.resolve(cursor), cursor);
    case "spanSeparator":
      return invalidSpan(orphaned(span.instance));
    default:
      return unreachable(span);
  }
}

export function resolveSpans(spans: readonly Span[], cursor: DocumentCursor): Span[] {
  return spans.map((span) => resolveSpan(span, cursor));
}

export function resolveBlock(block: Block, cursor: DocumentCursor): Block {
  switch (block.kind) {
    case "paragraph":
    case "header":
      return { ...block, content: resolveSpans(block.content, cursor) };
    case "blockSequence":
      return { ...block, content: resolveBlocks(block.content, cursor) };
    case "invalidBlock":
      return block;
    case "blockResolver":
      return resolveBlock(block.resolve(cursor), cursor);
    case "blockSeparator":
      return invalidBlock(orphaned(block.instance));
    default:
      return unreachable(block);
  }
}

export function resolveBlocks(blocks: readonly Block[], cursor: DocumentCursor): Block[] {
  return blocks.map((block) => resolveBlock(block, cursor));
}

/**
 * Replace every resolver in the tree with its output. Text nodes are not
 * merged afterwards, so each directive's output stays a node of its own.
 */
export function resolveTree(root: RootElement, cursor: DocumentCursor): RootElement;
export function resolveTree(root: TemplateRoot, cursor: DocumentCursor): TemplateRoot;
export function resolveTree(root: RootElement | TemplateRoot, cursor: DocumentCursor): RootElement | TemplateRoot {
  return root.kind === "root"
    ? { ...root, content: resolveBlocks(root.content, cursor) }
    : { ...root, content: resolveSpans(root.content, cursor) };
}
