/**
 * Directives available out of the box: `@:style` for spans, `@:callout`
 * for blocks and `@:if` / `@:else` for templates.
 */

import { Decoders, isConfigArray, type ConfigValue } from "@inkwell/config";
import { blockSequence, spanSequence } from "./ast.js";
import { Blocks, Spans, Templates } from "./directive/builders.js";

/** `@:style(name) content @:@`: the content with a style applied */
export const styleDirective = Spans.create(
  "style",
  Spans.dsl.mapN([Spans.dsl.attribute(0).as(Decoders.string), Spans.dsl.parsedBody], ([style, body]) =>
    spanSequence(body, [style]),
  ),
);

/** A block sequence styled `callout-<kind>` */
export const calloutDirective = Blocks.create(
  "callout",
  Blocks.dsl.mapN([Blocks.dsl.attribute(0).as(Decoders.string), Blocks.dsl.parsedBody], ([kind, body]) =>
    blockSequence(body, [`callout-${kind}`]),
  ),
);

/** Values an `@:if` treats as false */
export function isTruthy(value: ConfigValue | undefined): boolean {
  if (value === undefined || value === null || value === false || value === "") return false;
  if (isConfigArray(value) && value.length === 0) return false;
  return true;
}

const elseSeparator = Templates.separator("else", Templates.dsl.parsedBody, { max: 1 });

/**
 * `@:if(key) … @:else … @:@`: the first section when `key` is truthy in the
 * document configuration, otherwise the `else` section, if any.
 */
export const ifDirective = Templates.create(
  "if",
  Templates.dsl.mapN(
    [Templates.dsl.attribute(0).as(Decoders.string), Templates.dsl.separatedBody([elseSeparator]), Templates.dsl.cursor],
    ([key, sections, cursor]) => {
      const content = isTruthy(cursor.config.get(key)) ? sections.mainBody : (sections.children[0] ?? []);
      return spanSequence(content);
    },
  ),
);

export const StandardDirectives = {
  block: [calloutDirective],
  span: [styleDirective],
  template: [ifDirective],
};
