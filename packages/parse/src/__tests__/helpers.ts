import type { Parser } from "../index.js";

export type Outcome<T> =
  | { ok: true; value: T; offset: number }
  | { ok: false; message: string; offset: number; maxOffset: number };

/** Flatten a result into plain data for assertions. */
export function run<T>(parser: Parser<T>, input: string): Outcome<T> {
  const r = parser.parse(input);
  return r.ok
    ? { ok: true, value: r.value, offset: r.next.offset }
    : { ok: false, message: r.message, offset: r.pos.offset, maxOffset: r.maxOffset };
}
