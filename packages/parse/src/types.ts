/**
 * Core types for @inkwell/parse
 *
 * Defines the parse result and the parser interface.
 */

import type { SourcePosition } from "./position.js";

export interface Success<T> {
  readonly ok: true;
  readonly value: T;
  /** Position after the consumed input; never before the start position */
  readonly next: SourcePosition;
}

export interface Failure {
  readonly ok: false;
  readonly message: string;
  /** Where the failure is reported */
  readonly pos: SourcePosition;
  /** Furthest offset reached by any branch tried on the way to this failure */
  readonly maxOffset: number;
}

/** Result of a parse attempt. */
export type ParseResult<T> = Success<T> | Failure;

/** A parser is a function from a position to a ParseResult. */
export interface Parser<T> {
  /** Attempt to parse from the start of a string, or from a position. */
  parse(input: string | SourcePosition): ParseResult<T>;
  /** Parse the full input, throwing ParseError if it is not consumed entirely. */
  parseAll(input: string): T;
}
