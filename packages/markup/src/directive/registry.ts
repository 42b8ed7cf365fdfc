/**
 * Directive registries are built once per extension bundle and handed to
 * the parsers that need them.
 */

import { createGenericRegistry, invariant } from "@inkwell/core";
import type { Directive, FamilyName } from "./engine.js";

/** Directives by name; a repeated name is a programmer error */
export function createDirectiveRegistry<N>(
  directives: readonly Directive<N>[],
  family: FamilyName,
): ReadonlyMap<string, Directive<N>> {
  const registry = createGenericRegistry<string, Directive<N>>({ name: `${family} directives` });
  for (const directive of directives) {
    invariant(
      directive.family === family,
      `directive '${directive.name}' is a ${directive.family} directive, not a ${family} directive`,
    );
    registry.set(directive.name, directive);
  }
  return registry.freeze();
}

/** Every separator name the given directives declare */
export function separatorNames<N>(directives: ReadonlyMap<string, Directive<N>>): ReadonlySet<string> {
  const names = new Set<string>();
  for (const directive of directives.values()) {
    for (const name of directive.part.separators) names.add(name);
  }
  return names;
}
