/**
 * Decoders turn a configuration value, together with the source text it was
 * read from, into a typed value or an error message.
 */

import { formatMessage, IW4001, IW4002, IW4003, IW4004, IW4005, IW4006 } from "@inkwell/core";
import { parseValue } from "./grammar.js";
import { isConfigArray, renderValue, type ConfigValue } from "./values.js";

export type Decoded<T> = { readonly ok: true; readonly value: T } | { readonly ok: false; readonly error: string };

export interface Decoder<T> {
  decode(value: ConfigValue, source: string): Decoded<T>;
}

export function decoded<T>(value: T): Decoded<T> {
  return { ok: true, value };
}

export function decodeError<T = never>(error: string): Decoded<T> {
  return { ok: false, error };
}

const INTEGER = /^-?[0-9]+$/;
const NUMERIC = /^-?(0|[1-9][0-9]*)(\.[0-9]+)?([eE][+-]?[0-9]+)?$/;

export const Decoders = {
  /** Any value, unchanged */
  value: { decode: (value) => decoded(value) } satisfies Decoder<ConfigValue>,

  /** Strings, with numbers and booleans rendered as text */
  string: {
    decode(value, source) {
      if (typeof value === "string") return decoded(value);
      if (typeof value === "number" || typeof value === "boolean") return decoded(String(value));
      return decodeError(formatMessage(IW4006, { source }));
    },
  } satisfies Decoder<string>,

  int: {
    decode(value, source) {
      if (typeof value === "number" && Number.isInteger(value)) return decoded(value);
      if (typeof value === "string" && INTEGER.test(value.trim())) return decoded(Number.parseInt(value, 10));
      return decodeError(formatMessage(IW4001, { source }));
    },
  } satisfies Decoder<number>,

  number: {
    decode(value, source) {
      if (typeof value === "number") return decoded(value);
      if (typeof value === "string" && NUMERIC.test(value.trim())) return decoded(Number(value));
      return decodeError(formatMessage(IW4002, { source }));
    },
  } satisfies Decoder<number>,

  boolean: {
    decode(value, source) {
      if (typeof value === "boolean") return decoded(value);
      if (value === "true" || value === "false") return decoded(value === "true");
      return decodeError(formatMessage(IW4003, { source }));
    },
  } satisfies Decoder<boolean>,
};

/** Arrays whose every element decodes with `element`; the first bad element is reported. */
export function arrayOf<T>(element: Decoder<T>): Decoder<T[]> {
  return {
    decode(value, source) {
      if (!isConfigArray(value)) return decodeError(formatMessage(IW4005, { source }));
      const out: T[] = [];
      for (const item of value) {
        const r = element.decode(item, renderValue(item));
        if (!r.ok) return r;
        out.push(r.value);
      }
      return decoded(out);
    },
  };
}

/** One of a fixed set of strings. */
export function oneOf<V extends string>(values: readonly V[]): Decoder<V> {
  return {
    decode(value, source) {
      const match = values.find((v) => v === value);
      if (match !== undefined) return decoded(match);
      return decodeError(formatMessage(IW4004, { values: values.join(", "), source }));
    },
  };
}

/**
 * Decode a raw attribute source. The text is read as a single value first,
 * so `42` is a number and `"a b"` loses its quotes; text that does not parse
 * is decoded as the plain string.
 */
export function decodeSource<T>(decoder: Decoder<T>, raw: string): Decoded<T> {
  const parsed = parseValue(raw);
  return decoder.decode(parsed.ok ? parsed.value : raw, raw);
}
