/**
 * `${key}` and `${?key}` references, resolved while parsing against the
 * document configuration.
 */

import { renderValue, type Config } from "@inkwell/config";
import { formatMessage, IW3001 } from "@inkwell/core";
import {
  anyBut,
  char,
  literal,
  mkParser,
  ok,
  optional,
  prefixed,
  seq3,
  skipLeft,
  withSource,
  type PrefixedParser,
} from "@inkwell/parse";
import { emptyText, invalidSpan, text, type Span } from "./ast.js";

const referenceSyntax = withSource(
  seq3(skipLeft(literal("${"), optional(char("?"))), anyBut("}", "\n").min(1), char("}")),
);

/**
 * The node a reference stands for: the value as text, an empty node for a
 * missing optional key, an invalid span for a missing required one.
 */
export function resolveReference(config: Config, key: string, required: boolean, source: string, offset: number): Span {
  const value = config.get(key);
  if (value !== undefined) return text(renderValue(value));
  if (!required) return emptyText;
  return invalidSpan({ message: formatMessage(IW3001, { key }), source, offset, code: IW3001.code });
}

export function referenceParser(config: Config): PrefixedParser<Span> {
  return prefixed(
    "$",
    mkParser((pos) => {
      const r = referenceSyntax.parse(pos);
      if (!r.ok) return r;
      const [[optionalMark, key], source] = r.value;
      return ok(resolveReference(config, key.trim(), optionalMark === null, source, pos.offset), r.next);
    }),
  );
}
