/**
 * Recursive span engine.
 *
 * Builds the node list for a run of inline markup: plain text is scanned up
 * to the next character some span parser claims, that parser runs one
 * nesting level deeper, and anything it cannot handle is kept as literal
 * text. The only failure that escapes is the scanner's own.
 */

import { mkParser, ok } from "./combinators.js";
import type { DelimitedScanner } from "./delimited.js";
import type { SourcePosition } from "./position.js";
import { mergePrefixed, type ParserDefinition, type PrefixedGroups, type PrefixedParser } from "./prefixed.js";
import type { Parser } from "./types.js";

/** How the engine creates, inspects and drops nodes */
export interface NodeAlgebra<N> {
  text(value: string): N;
  /** The text of a plain text node, undefined for anything else */
  asText(node: N): string | undefined;
  /** Empty nodes are dropped from the output */
  isEmpty(node: N): boolean;
}

export interface SpanEngineOptions {
  /** Nesting depth at which start characters are read as literal text */
  maxNestingLevel?: number;
}

export const DEFAULT_MAX_NESTING_LEVEL = 12;

function toGroups<N>(parsers: PrefixedGroups<N> | readonly ParserDefinition<N>[]): PrefixedGroups<N> {
  return "groups" in parsers ? parsers : mergePrefixed(parsers);
}

/**
 * Inline nodes up to the end of `scanner`. Adjacent text is merged into one
 * node. A stop character configured on the scanner itself (rather than
 * claimed by a span parser) ends the span without being consumed.
 */
export function spans<N>(
  scanner: DelimitedScanner,
  parsers: PrefixedGroups<N> | readonly ParserDefinition<N>[],
  algebra: NodeAlgebra<N>,
  options: SpanEngineOptions = {},
): Parser<N[]> {
  const { groups, startChars } = toGroups(parsers);
  const maxNesting = options.maxNestingLevel ?? DEFAULT_MAX_NESTING_LEVEL;
  const textScanner = scanner.stopChars(startChars);

  return mkParser((pos) => {
    const out: N[] = [];
    let pending = "";
    let cur: SourcePosition = pos;

    const flush = (): void => {
      if (pending.length > 0) {
        out.push(algebra.text(pending));
        pending = "";
      }
    };

    for (;;) {
      const scanned = textScanner.parse(cur);
      if (!scanned.ok) return scanned;

      pending += scanned.value.text;
      cur = scanned.next;

      const { end, stopChar } = scanned.value;
      const group = end === "stopChar" && stopChar !== undefined ? groups.get(stopChar) : undefined;
      if (!group || stopChar === undefined) {
        flush();
        return ok(out, cur);
      }

      if (cur.nestLevel < maxNesting) {
        const nested = group.parse(cur.nested());
        if (nested.ok && nested.next.offset > cur.offset) {
          const node = nested.value;
          if (!algebra.isEmpty(node)) {
            const text = algebra.asText(node);
            if (text !== undefined) {
              pending += text;
            } else {
              flush();
              out.push(node);
            }
          }
          cur = nested.next.withNestLevel(cur.nestLevel);
          continue;
        }
      }

      pending += stopChar;
      cur = cur.consume(1);
    }
  });
}

/**
 * Text up to the end of `scanner`, with `escape` applied wherever one of its
 * start characters appears. A failed escape keeps its character literally.
 */
export function escapedText(scanner: DelimitedScanner, escape: PrefixedParser<string>): Parser<string> {
  const textScanner = scanner.stopChars(escape.startChars);

  return mkParser((pos) => {
    let text = "";
    let cur: SourcePosition = pos;

    for (;;) {
      const scanned = textScanner.parse(cur);
      if (!scanned.ok) return scanned;

      text += scanned.value.text;
      cur = scanned.next;

      const { end, stopChar } = scanned.value;
      if (end !== "stopChar" || stopChar === undefined || !escape.startLookup(cur.code)) {
        return ok(text, cur);
      }

      const escaped = escape.parse(cur);
      if (escaped.ok && escaped.next.offset > cur.offset) {
        text += escaped.value;
        cur = escaped.next;
      } else {
        text += stopChar;
        cur = cur.consume(1);
      }
    }
  });
}
