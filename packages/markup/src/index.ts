/**
 * @inkwell/markup
 *
 * Markup and template parsing into immutable document trees.
 *
 * Provides:
 * - The document tree and the resolver rewrite step
 * - Parser bundles and the root parser for a host markup format
 * - A minimal host format with headers, paragraphs and inline styles
 * - The directive engine: declarations, families, validation DSL, separators
 * - Document and template entry points with diagnostics
 *
 * @module
 */

export * from "./ast.js";
export { resolveTree, resolveBlock, resolveBlocks, resolveSpan, resolveSpans } from "./resolve.js";

export {
  ParserBuilder,
  SpanParser,
  BlockParser,
  noExtensions,
  mergeExtensions,
  type RecursiveSpanParsers,
  type RecursiveParsers,
  type SpanParserBuilder,
  type BlockParserBuilder,
  type MarkupFormat,
  type MarkupExtensions,
} from "./bundle.js";

export { RootParser, spanAlgebra, type RootParserOptions } from "./root-parser.js";
export { TemplateParser } from "./template.js";
export { BasicMarkup, escapedChar } from "./basic/format.js";
export { referenceParser, resolveReference } from "./references.js";
export { ws, wsEol, lineEnd, isBlankLine, restOfLine, skipBlankLines } from "./lines.js";

export {
  declarationParser,
  nameDecl,
  isValidName,
  DEFAULT_FENCE,
  type Attribute,
  type DirectiveDeclaration,
  type DeclarationOptions,
} from "./directive/declaration.js";
export {
  DirectivePart,
  AttributePart,
  createDsl,
  valid,
  invalid,
  type Validated,
  type DirectiveBody,
  type DirectiveContext,
  type DirectiveDsl,
} from "./directive/dsl.js";
export { separatedBody, type SeparatorDirective, type Multipart } from "./directive/separators.js";
export {
  SpanFamily,
  BlockFamily,
  TemplateFamily,
  directiveParser,
  evaluateDirective,
  type Directive,
  type DirectiveFamily,
  type DirectiveParserOptions,
  type FamilyName,
} from "./directive/engine.js";
export { createDirectiveRegistry, separatorNames } from "./directive/registry.js";
export {
  Spans,
  Blocks,
  Templates,
  type DirectiveBuilders,
  type FamilyDsl,
  type SeparatorOptions,
} from "./directive/builders.js";
export { DirectiveSupport } from "./directive/support.js";

export {
  parseDocument,
  parseTemplate,
  type ParseOptions,
  type ParsedDocument,
  type ParsedTemplate,
  type DirectiveLists,
} from "./document.js";
export { collectDiagnostics, invalidNodes } from "./diagnostics.js";
export { StandardDirectives, styleDirective, calloutDirective, ifDirective, isTruthy } from "./standard.js";
