/**
 * Document and template entry points.
 *
 * Parsing never throws: anything the grammar cannot read stays in the tree
 * as text or as an invalid node, and every invalid node is also returned as
 * a diagnostic.
 */

import { Config } from "@inkwell/config";
import { createLogger, IW1000, type Logger, type RichDiagnostic } from "@inkwell/core";
import {
  invalidBlock,
  invalidSpan,
  rootElement,
  templateRoot,
  type Block,
  type InvalidContent,
  type RootElement,
  type Span,
  type TemplateRoot,
} from "./ast.js";
import { BasicMarkup } from "./basic/format.js";
import { mergeExtensions, type MarkupExtensions, type MarkupFormat } from "./bundle.js";
import { collectDiagnostics } from "./diagnostics.js";
import type { Directive } from "./directive/engine.js";
import { DirectiveSupport } from "./directive/support.js";
import { resolveTree } from "./resolve.js";
import { RootParser } from "./root-parser.js";
import { TemplateParser } from "./template.js";

export interface DirectiveLists {
  readonly block?: readonly Directive<Block>[];
  readonly span?: readonly Directive<Span>[];
  readonly template?: readonly Directive<Span>[];
}

export interface ParseOptions {
  /** Shown in diagnostics and handed to directives (default: "<input>") */
  readonly path?: string;
  /** Base configuration; a config header is merged over it */
  readonly config?: Config;
  readonly directives?: DirectiveLists;
  /** Further parser extensions, after the directives */
  readonly extensions?: readonly MarkupExtensions[];
  readonly format?: MarkupFormat;
  readonly maxNestingLevel?: number;
  readonly logger?: Logger;
}

export interface ParsedDocument {
  readonly root: RootElement;
  /** The configuration references and directives were resolved against */
  readonly config: Config;
  readonly diagnostics: readonly RichDiagnostic[];
}

export interface ParsedTemplate {
  readonly root: TemplateRoot;
  readonly config: Config;
  readonly diagnostics: readonly RichDiagnostic[];
}

interface ConfigHeader {
  readonly config: Config;
  /** Where the content starts */
  readonly offset: number;
  readonly error?: InvalidContent;
}

const HEADER_OPEN = "{%";
const HEADER_CLOSE = "%}";

/**
 * An optional `{% … %}` header at the very start of the input. An
 * unterminated header is not a header.
 */
function readHeader(input: string, base: Config): ConfigHeader {
  if (!input.startsWith(HEADER_OPEN)) return { config: base, offset: 0 };
  const close = input.indexOf(HEADER_CLOSE, HEADER_OPEN.length);
  if (close === -1) return { config: base, offset: 0 };

  const end = close + HEADER_CLOSE.length;
  const offset = input[end] === "\n" ? end + 1 : end;
  const parsed = Config.parse(input.slice(HEADER_OPEN.length, close));
  if (parsed.ok) return { config: parsed.value.withFallback(base), offset };
  return {
    config: base,
    offset,
    error: { message: parsed.error, source: input.slice(0, end), offset: 0, code: IW1000.code },
  };
}

function extensionsOf(options: ParseOptions): MarkupExtensions {
  const { block, span, template } = options.directives ?? {};
  return mergeExtensions([DirectiveSupport.withDirectives(block, span, template), ...(options.extensions ?? [])]);
}

const normalize = (input: string): string => input.replace(/\r\n/g, "\n");

export function parseDocument(input: string, options: ParseOptions = {}): ParsedDocument {
  const source = normalize(input);
  const path = options.path ?? "<input>";
  const logger = options.logger ?? createLogger("document");
  const header = readHeader(source, options.config ?? Config.empty);

  const parser = new RootParser(options.format ?? BasicMarkup, {
    extensions: extensionsOf(options),
    config: header.config,
    maxNestingLevel: options.maxNestingLevel,
  });
  const parsed = parser.parseDocument(source, header.offset);
  const content = header.error ? [invalidBlock(header.error), ...parsed.content] : parsed.content;
  const root = resolveTree(rootElement(content), { path, config: header.config });
  const diagnostics = collectDiagnostics(root, source, path);

  logger.debug(`parsed ${path}: ${root.content.length} blocks, ${diagnostics.length} invalid`);
  return { root, config: header.config, diagnostics };
}

export function parseTemplate(input: string, options: ParseOptions = {}): ParsedTemplate {
  const source = normalize(input);
  const path = options.path ?? "<input>";
  const logger = options.logger ?? createLogger("template");
  const header = readHeader(source, options.config ?? Config.empty);

  const parser = new TemplateParser({
    extensions: extensionsOf(options),
    config: header.config,
    maxNestingLevel: options.maxNestingLevel,
  });
  const parsed = parser.parseTemplate(source, header.offset);
  const content = header.error ? [invalidSpan(header.error), ...parsed.content] : parsed.content;
  const root = resolveTree(templateRoot(content), { path, config: header.config });
  const diagnostics = collectDiagnostics(root, source, path);

  logger.debug(`parsed ${path}: ${root.content.length} spans, ${diagnostics.length} invalid`);
  return { root, config: header.config, diagnostics };
}
