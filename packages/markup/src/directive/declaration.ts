/**
 * Directive declarations: `@:name(positional, ...) { named = attributes } fence`.
 *
 * The declaration grammar is shared by every directive family. Positional
 * values are quoted or unquoted strings; the named section is handed to the
 * object-literal grammar, with the closing brace checked here so that a
 * missing one is reported on the directive.
 */

import { objectMembers, type ConfigValue, type Field } from "@inkwell/config";
import { formatMessage, IW1002 } from "@inkwell/core";
import {
  alt,
  anyBut,
  anyWhile,
  between,
  char,
  CharGroup,
  delimitedBy,
  escapedText,
  literal,
  map,
  mkParser,
  ok,
  optional,
  sepBy1,
  seq,
  skipLeft,
  skipRight,
  success,
  withSource,
  type Parser,
  type PrefixedParser,
} from "@inkwell/parse";
import { ws } from "../lines.js";

export interface Attribute {
  /** Index for positional attributes, name for named ones */
  readonly key: number | string;
  readonly value: ConfigValue;
  readonly source: string;
}

export interface DirectiveDeclaration {
  readonly name: string;
  /** Positional attributes first; of repeated named keys only the first */
  readonly attributes: readonly Attribute[];
  /** Named keys that occur more than once */
  readonly duplicates: readonly string[];
  /** Problems found in the declaration itself */
  readonly errors: readonly string[];
  readonly fence: string;
}

export interface DeclarationOptions {
  /** Allow a fence of up to three characters after the attributes */
  readonly supportsCustomFence?: boolean;
  readonly defaultFence?: string;
  /** Escape used inside positional values */
  readonly escapedChar: PrefixedParser<string>;
}

export const DEFAULT_FENCE = "@:@";

const nameChar = (code: number): boolean => CharGroup.alphaNum(code) || code === 45 || code === 95;

/** A letter followed by letters, digits, `-` or `_` */
export const nameDecl: Parser<string> = map(
  withSource(seq(anyWhile(CharGroup.alpha).take(1), anyWhile(nameChar))),
  ([, source]) => source,
);

const NAME = /^[A-Za-z][A-Za-z0-9_-]*$/;

export function isValidName(name: string): boolean {
  return NAME.test(name);
}

function positionalSection(escape: PrefixedParser<string>): Parser<string[]> {
  const quoted = between(seq(ws, char('"')), escapedText(delimitedBy('"'), escape), ws);
  const unquoted = skipRight(escapedText(delimitedBy(",", ")").keepDelimiter(), escape), ws);
  const value = map(alt(quoted, unquoted), (v) => v.trim());
  const none = map(seq(ws, char(")")), (): string[] => []);
  return skipLeft(seq(ws, char("(")), alt(none, skipRight(sepBy1(value, char(",")), char(")"))));
}

interface NamedSection {
  readonly fields: readonly Field[];
  readonly error?: string;
}

const openBrace = seq(ws, char("{"));
const closeBrace = char("}");

const namedSection: Parser<NamedSection | null> = mkParser((pos) => {
  const open = openBrace.parse(pos);
  if (!open.ok) return ok(null, pos);

  const members = objectMembers.parse(open.next);
  if (!members.ok) {
    const close = pos.input.indexOf("}", members.pos.offset);
    if (close === -1) return ok(null, pos);
    return ok({ fields: [], error: members.message }, pos.moveTo(close + 1));
  }

  const close = closeBrace.parse(members.next);
  if (close.ok) return ok({ fields: members.value }, close.next);
  return ok({ fields: members.value, error: formatMessage(IW1002) }, members.next);
});

function toDeclaration(
  name: string,
  positional: readonly string[],
  named: NamedSection | null,
  fence: string,
): DirectiveDeclaration {
  const attributes: Attribute[] = positional.map((value, index) => ({ key: index, value, source: value }));
  const seen = new Set<string>();
  const duplicates: string[] = [];

  for (const field of named?.fields ?? []) {
    if (!seen.has(field.key)) {
      seen.add(field.key);
      attributes.push({ key: field.key, value: field.value, source: field.source });
    } else if (!duplicates.includes(field.key)) {
      duplicates.push(field.key);
    }
  }

  return { name, attributes, duplicates, errors: named?.error ? [named.error] : [], fence };
}

/**
 * The declaration of a directive, up to and including its fence. A custom
 * fence is the first run of one to three characters other than whitespace
 * after the attributes; without one the default fence applies.
 */
export function declarationParser(options: DeclarationOptions): Parser<DirectiveDeclaration> {
  const defaultFence = options.defaultFence ?? DEFAULT_FENCE;
  const fence: Parser<string> = options.supportsCustomFence
    ? alt(skipLeft(ws, anyBut(" ", "\t", "\n", "\r").min(1).max(3)), success(defaultFence))
    : success(defaultFence);

  const attributeSection = seq(optional(positionalSection(options.escapedChar)), namedSection);

  return map(
    seq(seq(skipLeft(literal("@:"), nameDecl), attributeSection), fence),
    ([[name, [positional, named]], fenceText]) => toDeclaration(name, positional ?? [], named, fenceText),
  );
}
