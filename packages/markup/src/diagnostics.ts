/**
 * Invalid nodes as rich diagnostics, for rendering with the core CLI
 * renderer.
 */

import { DiagnosticBuilder, getDiagnosticDescriptor, IW1000, type RichDiagnostic } from "@inkwell/core";
import type { Block, InvalidContent, RootElement, Span, TemplateRoot } from "./ast.js";

function spanInvalids(spans: readonly Span[], out: InvalidContent[]): void {
  for (const span of spans) {
    switch (span.kind) {
      case "invalidSpan":
        out.push(span);
        break;
      case "emphasis":
      case "strong":
      case "spanSequence":
        spanInvalids(span.content, out);
        break;
      default:
        break;
    }
  }
}

function blockInvalids(blocks: readonly Block[], out: InvalidContent[]): void {
  for (const block of blocks) {
    switch (block.kind) {
      case "invalidBlock":
        out.push(block);
        break;
      case "paragraph":
      case "header":
        spanInvalids(block.content, out);
        break;
      case "blockSequence":
        blockInvalids(block.content, out);
        break;
      default:
        break;
    }
  }
}

/** Every invalid node of a resolved tree, in document order */
export function invalidNodes(tree: RootElement | TemplateRoot): InvalidContent[] {
  const out: InvalidContent[] = [];
  if (tree.kind === "root") blockInvalids(tree.content, out);
  else spanInvalids(tree.content, out);
  return out;
}

/**
 * One diagnostic per invalid node. Nodes with an offset point at their
 * source in `source`; the message is the node's own.
 */
export function collectDiagnostics(tree: RootElement | TemplateRoot, source: string, path: string): RichDiagnostic[] {
  return invalidNodes(tree).map((node) => {
    const descriptor = (node.code !== undefined ? getDiagnosticDescriptor(node.code) : undefined) ?? IW1000;
    const builder = new DiagnosticBuilder(descriptor).withMessage(node.message);
    if (node.offset !== undefined) {
      builder.at({ path, source, start: node.offset, end: node.offset + node.source.length });
    }
    return builder.build();
  });
}
