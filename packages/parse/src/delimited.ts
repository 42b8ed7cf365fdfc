/**
 * Delimited text scanning.
 *
 * A `DelimitedScanner` consumes plain text until its delimiter matches, a stop
 * character is hit, or (when allowed) the input ends, and reports which of
 * the three ended the scan. The recursive span engine uses the stop
 * characters for nested markup and the delimiter for the end of the span.
 */

import { formatMessage, IW1001 } from "@inkwell/core";
import { alternatives, fail, literal, map, ok, ParserBase } from "./combinators.js";
import { charLookup, type CharPredicate } from "./characters.js";
import type { SourcePosition } from "./position.js";
import { PrefixedParser } from "./prefixed.js";
import type { Parser, ParseResult } from "./types.js";

export type DelimitedEnd = "delimiter" | "stopChar" | "eof";

export interface DelimitedText {
  readonly text: string;
  readonly end: DelimitedEnd;
  /** Set when `end` is "stopChar"; the stop character is not consumed */
  readonly stopChar?: string;
}

interface Delimiter {
  readonly parser: Parser<unknown>;
  /** Characters the delimiter may start with; undefined means any */
  readonly startLookup?: CharPredicate;
}

interface ScannerConfig {
  readonly delimiter?: Delimiter;
  readonly stopChars: string;
  readonly minChars: number;
  readonly nonEmpty: boolean;
  readonly keepDelimiter: boolean;
  readonly acceptEof: boolean;
}

export class DelimitedScanner extends ParserBase<DelimitedText> {
  private readonly stopLookup: CharPredicate;

  constructor(private readonly config: ScannerConfig) {
    super();
    this.stopLookup = charLookup(config.stopChars);
  }

  /** Characters that end the scan without being consumed, added to any already set */
  stopChars(chars: string): DelimitedScanner {
    return new DelimitedScanner({ ...this.config, stopChars: this.config.stopChars + chars });
  }

  /** Fail when the text is shorter than `n` characters */
  min(n: number): DelimitedScanner {
    return new DelimitedScanner({ ...this.config, minChars: n });
  }

  /** Fail on empty text */
  nonEmpty(): DelimitedScanner {
    return new DelimitedScanner({ ...this.config, nonEmpty: true });
  }

  /** Leave the delimiter unconsumed */
  keepDelimiter(): DelimitedScanner {
    return new DelimitedScanner({ ...this.config, keepDelimiter: true });
  }

  /** Succeed at end of input instead of failing */
  acceptEof(): DelimitedScanner {
    return new DelimitedScanner({ ...this.config, acceptEof: true });
  }

  /** Only the scanned text */
  asText(): Parser<string> {
    return map(this, (result) => result.text);
  }

  apply(pos: SourcePosition): ParseResult<DelimitedText> {
    const { input, offset } = pos;
    const { delimiter } = this.config;

    for (let i = offset; i < input.length; i++) {
      const code = input.charCodeAt(i);

      if (delimiter && (delimiter.startLookup === undefined || delimiter.startLookup(code))) {
        const at = pos.moveTo(i);
        const r = delimiter.parser.parse(at);
        if (r.ok) {
          return this.finish(pos, i, { text: input.slice(offset, i), end: "delimiter" }, this.config.keepDelimiter ? at : r.next);
        }
      }

      if (this.stopLookup(code)) {
        const at = pos.moveTo(i);
        return this.finish(pos, i, { text: input.slice(offset, i), end: "stopChar", stopChar: input[i] }, at);
      }
    }

    const end = pos.moveTo(input.length);
    if (this.config.acceptEof) {
      return this.finish(pos, input.length, { text: input.slice(offset), end: "eof" }, end);
    }
    return fail(end, "unexpected end of input", input.length);
  }

  private finish(
    start: SourcePosition,
    stoppedAt: number,
    result: DelimitedText,
    next: SourcePosition,
  ): ParseResult<DelimitedText> {
    const count = result.text.length;
    const min = Math.max(this.config.minChars, this.config.nonEmpty ? 1 : 0);
    if (count < min) {
      return fail(start, formatMessage(IW1001, { min, actual: count }), stoppedAt);
    }
    return ok(result, next);
  }
}

const defaults: ScannerConfig = {
  stopChars: "",
  minChars: 0,
  nonEmpty: false,
  keepDelimiter: false,
  acceptEof: false,
};

function toDelimiter(delimiters: ReadonlyArray<string | Parser<unknown>>): Delimiter {
  let startChars = "";
  let known = true;
  const parsers: Parser<unknown>[] = [];

  for (const d of delimiters) {
    if (typeof d === "string") {
      parsers.push(literal(d));
      startChars += d.charAt(0);
    } else {
      parsers.push(d);
      if (d instanceof PrefixedParser) startChars += d.startChars;
      else known = false;
    }
  }

  return {
    parser: alternatives(parsers),
    startLookup: known ? charLookup(startChars) : undefined,
  };
}

/**
 * Text up to the first of the given delimiters. Delimiters are only tried
 * at their start characters when those are known (strings and prefixed
 * parsers); a plain parser is tried at every position.
 */
export function delimitedBy(...delimiters: ReadonlyArray<string | Parser<unknown>>): DelimitedScanner {
  return new DelimitedScanner({ ...defaults, delimiter: toDelimiter(delimiters) });
}

/** Text up to the point where `parser` succeeds. */
export function anyUntil(parser: Parser<unknown>): DelimitedScanner {
  return delimitedBy(parser);
}

/** Text to the end of input, or to a stop character. */
export function undelimited(): DelimitedScanner {
  return new DelimitedScanner({ ...defaults, acceptEof: true });
}
