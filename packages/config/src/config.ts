/**
 * Immutable configuration lookup by dotted path.
 */

import { formatMessage, IW1000 } from "@inkwell/core";
import { decodeError, type Decoded, type Decoder } from "./decoders.js";
import { parseConfigObject } from "./grammar.js";
import { isConfigObject, mergeObjects, renderValue, type ConfigObject, type ConfigValue } from "./values.js";

function splitPath(path: string): string[] {
  return path.split(".").filter((segment) => segment.length > 0);
}

function lookup(root: ConfigObject, segments: readonly string[]): ConfigValue | undefined {
  let current: ConfigValue = root;
  for (const segment of segments) {
    if (!isConfigObject(current) || !Object.hasOwn(current, segment)) return undefined;
    current = current[segment];
  }
  return current;
}

function assoc(root: ConfigObject, segments: readonly string[], value: ConfigValue): ConfigObject {
  const [head, ...rest] = segments;
  if (head === undefined) return root;
  if (rest.length === 0) return { ...root, [head]: value };
  const child = root[head];
  return { ...root, [head]: assoc(isConfigObject(child) ? child : {}, rest, value) };
}

export class Config {
  static readonly empty: Config = new Config({});

  private constructor(
    readonly root: ConfigObject,
    private readonly fallback?: Config,
  ) {}

  static fromObject(root: ConfigObject): Config {
    return new Config(root);
  }

  /** Parse an object-literal document; a syntax error is a decode failure. */
  static parse(text: string): Decoded<Config> {
    const result = parseConfigObject(text);
    if (!result.ok) {
      return decodeError(formatMessage(IW1000, { message: result.message }));
    }
    return { ok: true, value: new Config(result.value) };
  }

  has(path: string): boolean {
    return this.get(path) !== undefined;
  }

  /** The value at a dotted path, looking through the fallback chain. */
  get(path: string): ConfigValue | undefined {
    const segments = splitPath(path);
    const own = lookup(this.root, segments);
    const inherited = this.fallback?.get(path);
    if (isConfigObject(own) && isConfigObject(inherited)) return mergeObjects(inherited, own);
    return own !== undefined ? own : inherited;
  }

  /** Decode the value at `path`; undefined when there is none. */
  getAs<T>(path: string, decoder: Decoder<T>): Decoded<T> | undefined {
    const value = this.get(path);
    return value === undefined ? undefined : decoder.decode(value, renderValue(value));
  }

  withValue(path: string, value: ConfigValue): Config {
    return new Config(assoc(this.root, splitPath(path), value), this.fallback);
  }

  /** A config that consults `other` for anything this one lacks. */
  withFallback(other: Config): Config {
    return new Config(this.root, this.fallback ? this.fallback.withFallback(other) : other);
  }

  /** Every key, with fallbacks merged underneath. */
  toObject(): ConfigObject {
    return this.fallback ? mergeObjects(this.fallback.toObject(), this.root) : this.root;
  }
}
