/**
 * Entry points for defining directives: `Spans`, `Blocks` and `Templates`.
 *
 * @example
 * ```typescript
 * const { dsl } = Spans;
 * const style = Spans.create(
 *   "style",
 *   dsl.mapN([dsl.attribute(0).as(Decoders.string), dsl.parsedBody], ([name, body]) =>
 *     spanSequence(body, [name]),
 *   ),
 * );
 * ```
 */

import { invariant } from "@inkwell/core";
import type { Block, SeparatorInstance, Span } from "../ast.js";
import { isValidName } from "./declaration.js";
import { createDsl, type DirectiveDsl, type DirectivePart } from "./dsl.js";
import { BlockFamily, SpanFamily, TemplateFamily, type Directive, type FamilyName } from "./engine.js";
import { separatedBody, type Multipart, type SeparatorDirective } from "./separators.js";

export interface SeparatorOptions {
  readonly min?: number;
  readonly max?: number;
}

export interface FamilyDsl<N> extends DirectiveDsl<N> {
  /** The body split at the given separators */
  separatedBody<T>(separators: readonly SeparatorDirective<T, N>[]): DirectivePart<Multipart<T, N>, N>;
}

export interface DirectiveBuilders<N> {
  readonly family: FamilyName;
  create(name: string, part: DirectivePart<N, N>): Directive<N>;
  separator<T>(name: string, part: DirectivePart<T, N>, options?: SeparatorOptions): SeparatorDirective<T, N>;
  readonly dsl: FamilyDsl<N>;
}

function checkName(name: string): void {
  invariant(isValidName(name), `invalid directive name: '${name}'`);
}

function directiveBuilders<N>(
  family: FamilyName,
  instanceOf: (node: N) => SeparatorInstance | undefined,
): DirectiveBuilders<N> {
  return {
    family,
    create(name, part) {
      checkName(name);
      return { family, name, part };
    },
    separator(name, part, options = {}) {
      checkName(name);
      const min = options.min ?? 0;
      const max = options.max ?? Number.POSITIVE_INFINITY;
      invariant(min >= 0 && min <= max, `separator '${name}': min must be between 0 and max`);
      return { name, part, min, max };
    },
    dsl: {
      ...createDsl<N>(),
      separatedBody: (separators) => separatedBody(separators, instanceOf),
    },
  };
}

export const Spans: DirectiveBuilders<Span> = directiveBuilders("span", SpanFamily.instanceOf);

export const Blocks: DirectiveBuilders<Block> = directiveBuilders("block", BlockFamily.instanceOf);

export const Templates: DirectiveBuilders<Span> = directiveBuilders("template", TemplateFamily.instanceOf);
