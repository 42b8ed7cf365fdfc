/**
 * Separator directives split the body of their parent into sections, as
 * `@:else` does for `@:if`. A separator is only valid inside a parent whose
 * part declares it; anywhere else the rewrite step reports it as orphaned.
 */

import { formatMessage, IW2005, IW2006, IW2101, IW2102, IW2103 } from "@inkwell/core";
import type { SeparatorInstance } from "../ast.js";
import { DirectivePart, invalid, valid, type DirectiveBody, type DirectiveContext, type Validated } from "./dsl.js";

export interface SeparatorDirective<T, N> {
  readonly name: string;
  /** Validates one occurrence; its body is the content up to the next separator */
  readonly part: DirectivePart<T, N>;
  readonly min: number;
  readonly max: number;
}

export interface Multipart<T, N> {
  /** Content before the first separator */
  readonly mainBody: readonly N[];
  /** One value per separator occurrence, in document order */
  readonly children: readonly T[];
}

interface Section<N> {
  readonly instance: SeparatorInstance;
  readonly nodes: N[];
}

function rawSection<N>(body: DirectiveBody<N>, instance: SeparatorInstance, next: SeparatorInstance | undefined): string {
  const start = instance.offset + instance.source.length - body.offset;
  const end = next ? next.offset - body.offset : body.raw.length;
  return body.raw.slice(start, end);
}

/**
 * Split the parent body at the given separators and validate each
 * occurrence with its own part. Occurrence counts are checked after the
 * occurrences themselves, in the order the separators are listed.
 */
export function separatedBody<T, N>(
  separators: readonly SeparatorDirective<T, N>[],
  instanceOf: (node: N) => SeparatorInstance | undefined,
): DirectivePart<Multipart<T, N>, N> {
  const byName = new Map(separators.map((s) => [s.name, s]));

  const evaluate = (context: DirectiveContext<N>): Validated<Multipart<T, N>> => {
    const { body } = context;
    if (!body) return invalid([formatMessage(IW2005)]);

    const mainBody: N[] = [];
    const sections: Section<N>[] = [];
    for (const node of body.nodes) {
      const instance = instanceOf(node);
      if (instance && byName.has(instance.name)) {
        sections.push({ instance, nodes: [] });
      } else {
        const current = sections[sections.length - 1];
        if (current) current.nodes.push(node);
        else mainBody.push(node);
      }
    }

    const children: T[] = [];
    const errors: string[] = [];
    sections.forEach((section, i) => {
      const { instance } = section;
      const separator = byName.get(instance.name);
      if (!separator) return;
      const childContext: DirectiveContext<N> = {
        ...context,
        declaration: instance.declaration,
        source: instance.source,
        offset: instance.offset,
        body: {
          raw: rawSection(body, instance, sections[i + 1]?.instance),
          nodes: section.nodes,
          offset: instance.offset + instance.source.length,
        },
      };
      const r = separator.part.run(childContext);
      const childErrors = [
        ...instance.declaration.errors,
        ...(r.ok ? [] : r.errors),
        ...instance.declaration.duplicates.map((name) => formatMessage(IW2006, { name })),
      ];
      if (childErrors.length > 0) {
        errors.push(formatMessage(IW2103, { name: instance.name, errors: childErrors.join(", ") }));
      } else if (r.ok) {
        children.push(r.value);
      }
    });

    for (const separator of separators) {
      const actual = sections.filter((s) => s.instance.name === separator.name).length;
      if (actual < separator.min) {
        errors.push(formatMessage(IW2101, { name: separator.name, min: separator.min, actual }));
      }
      if (actual > separator.max) {
        errors.push(formatMessage(IW2102, { name: separator.name, max: separator.max, actual }));
      }
    }

    return errors.length > 0 ? invalid(errors) : valid({ mainBody, children });
  };

  return new DirectivePart(
    evaluate,
    true,
    separators.map((s) => s.name),
  );
}
