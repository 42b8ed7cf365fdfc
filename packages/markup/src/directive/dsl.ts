/**
 * Validation DSL for directive attributes and bodies.
 *
 * A directive is defined by a `DirectivePart`: a validator that reads what
 * it needs from the directive context and either succeeds with a value or
 * fails with messages. Parts combine applicatively with `mapN`, which runs
 * every part and keeps all of their errors in order.
 */

import { Config, Decoders, type ConfigObject, type ConfigValue, type Decoded, type Decoder } from "@inkwell/config";
import { formatMessage, IW2001, IW2002, IW2003, IW2004, IW2005 } from "@inkwell/core";
import type { DocumentCursor } from "../ast.js";
import type { DirectiveDeclaration } from "./declaration.js";

export type Validated<T> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly errors: readonly string[] };

export function valid<T>(value: T): Validated<T> {
  return { ok: true, value };
}

export function invalid<T = never>(errors: readonly string[]): Validated<T> {
  return { ok: false, errors };
}

export interface DirectiveBody<N> {
  /** Body source without the fence */
  readonly raw: string;
  readonly nodes: readonly N[];
  /** Offset of `raw` in the document */
  readonly offset: number;
}

export interface DirectiveContext<N> {
  readonly declaration: DirectiveDeclaration;
  readonly body: DirectiveBody<N> | undefined;
  /** Source of the whole directive */
  readonly source: string;
  readonly offset: number;
  readonly cursor: DocumentCursor;
  /** Parse a string as content of the directive's family */
  parse(source: string): N[];
}

export class DirectivePart<T, N> {
  constructor(
    private readonly evaluate: (context: DirectiveContext<N>) => Validated<T>,
    /** Whether a directive using this part takes a body */
    readonly hasBody: boolean = false,
    /** Separator names this part splits the body at */
    readonly separators: readonly string[] = [],
  ) {}

  run(context: DirectiveContext<N>): Validated<T> {
    return this.evaluate(context);
  }

  map<U>(f: (value: T) => U): DirectivePart<U, N> {
    return new DirectivePart(
      (context) => {
        const r = this.run(context);
        return r.ok ? valid(f(r.value)) : r;
      },
      this.hasBody,
      this.separators,
    );
  }

  /** Map with a function that may fail */
  evalMap<U>(f: (value: T) => Decoded<U>): DirectivePart<U, N> {
    return new DirectivePart(
      (context) => {
        const r = this.run(context);
        if (!r.ok) return r;
        const d = f(r.value);
        return d.ok ? valid(d.value) : invalid([d.error]);
      },
      this.hasBody,
      this.separators,
    );
  }
}

function missingMessage(key: number | string): string {
  return typeof key === "number" ? formatMessage(IW2001, { index: key }) : formatMessage(IW2003, { name: key });
}

function conversionMessage(key: number | string, error: string): string {
  return typeof key === "number"
    ? formatMessage(IW2002, { index: key, error })
    : formatMessage(IW2004, { name: key, error });
}

/** The decoded attribute, or undefined when it is absent */
function lookupAttribute<T, N>(
  context: DirectiveContext<N>,
  key: number | string,
  decoder: Decoder<T>,
): Validated<T> | undefined {
  const attribute = context.declaration.attributes.find((a) => a.key === key);
  if (!attribute) return undefined;
  const d = decoder.decode(attribute.value, attribute.source);
  return d.ok ? valid(d.value) : invalid([conversionMessage(key, d.error)]);
}

/**
 * A positional (number key) or named (string key) attribute. Required
 * unless made `optional()` or given a default.
 */
export class AttributePart<T, N> extends DirectivePart<T, N> {
  constructor(
    private readonly key: number | string,
    private readonly decoder: Decoder<T>,
  ) {
    super((context) => lookupAttribute(context, key, decoder) ?? invalid([missingMessage(key)]));
  }

  as<U>(decoder: Decoder<U>): AttributePart<U, N> {
    return new AttributePart(this.key, decoder);
  }

  optional(): DirectivePart<T | undefined, N> {
    return new DirectivePart<T | undefined, N>(
      (context) => lookupAttribute(context, this.key, this.decoder) ?? valid(undefined),
    );
  }

  withDefault(value: T): DirectivePart<T, N> {
    return new DirectivePart((context) => lookupAttribute(context, this.key, this.decoder) ?? valid(value));
  }
}

type PartValues<P extends readonly unknown[], N> = {
  [K in keyof P]: P[K] extends DirectivePart<infer T, N> ? T : never;
};

/** The parts that need no knowledge of the directive family */
export interface DirectiveDsl<N> {
  attribute(key: number | string): AttributePart<ConfigValue, N>;
  /** Every named attribute as a config */
  readonly allAttributes: DirectivePart<Config, N>;
  readonly parsedBody: DirectivePart<readonly N[], N>;
  readonly rawBody: DirectivePart<string, N>;
  readonly source: DirectivePart<string, N>;
  readonly parser: DirectivePart<(source: string) => N[], N>;
  readonly cursor: DirectivePart<DocumentCursor, N>;
  empty<T>(value: T): DirectivePart<T, N>;
  /** Run every part; the function sees all values, or the errors of every failed part are kept */
  mapN<P extends readonly DirectivePart<unknown, N>[], R>(
    parts: [...P],
    f: (values: PartValues<P, N>) => R,
  ): DirectivePart<R, N>;
}

export function createDsl<N>(): DirectiveDsl<N> {
  const bodyMissing = (): Validated<never> => invalid([formatMessage(IW2005)]);

  return {
    attribute: (key) => new AttributePart<ConfigValue, N>(key, Decoders.value),

    allAttributes: new DirectivePart((context) => {
      const named: Record<string, ConfigValue> = {};
      for (const a of context.declaration.attributes) {
        if (typeof a.key === "string") named[a.key] = a.value;
      }
      const root: ConfigObject = named;
      return valid(Config.fromObject(root));
    }),

    parsedBody: new DirectivePart(
      (context) => (context.body ? valid(context.body.nodes) : bodyMissing()),
      true,
    ),

    rawBody: new DirectivePart((context) => (context.body ? valid(context.body.raw) : bodyMissing()), true),

    source: new DirectivePart((context) => valid(context.source)),

    parser: new DirectivePart((context) => valid((source: string) => context.parse(source))),

    cursor: new DirectivePart((context) => valid(context.cursor)),

    empty: (value) => new DirectivePart(() => valid(value)),

    mapN<P extends readonly DirectivePart<unknown, N>[], R>(
      parts: [...P],
      f: (values: PartValues<P, N>) => R,
    ): DirectivePart<R, N> {
      return new DirectivePart<R, N>(
        (context) => {
          const values: unknown[] = [];
          const errors: string[] = [];
          for (const part of parts) {
            const r = part.run(context);
            if (r.ok) values.push(r.value);
            else errors.push(...r.errors);
          }
          if (errors.length > 0) return invalid(errors);
          const tuple: readonly unknown[] = values;
          return valid(f(tuple as PartValues<P, N>));
        },
        parts.some((p) => p.hasBody),
        parts.flatMap((p) => p.separators),
      );
    },
  };
}
