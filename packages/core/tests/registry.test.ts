/**
 * Tests for the generic registry
 */

import { describe, expect, it } from "vitest";
import { createGenericRegistry, InvariantError, invariant, unreachable } from "@inkwell/core";

describe("GenericRegistry", () => {
  it("stores and retrieves entries", () => {
    const registry = createGenericRegistry<string, number>();
    registry.set("a", 1);
    expect(registry.get("a")).toBe(1);
    expect(registry.has("b")).toBe(false);
    expect(registry.size).toBe(1);
  });

  it("throws on duplicate keys", () => {
    const registry = createGenericRegistry<string, number>({ name: "directives" });
    registry.set("style", 1);
    expect(() => registry.set("style", 2)).toThrow(InvariantError);
    expect(() => registry.set("style", 2)).toThrow("directives: entry for key 'style' already exists");
    expect(registry.get("style")).toBe(1);
  });

  it("freezes into an independent map", () => {
    const registry = createGenericRegistry<string, number>();
    registry.set("a", 1);
    const frozen = registry.freeze();
    registry.set("b", 2);
    expect([...frozen.keys()]).toEqual(["a"]);
    expect([...registry].map(([k]) => k)).toEqual(["a", "b"]);
  });
});

describe("safety", () => {
  it("invariant throws with the message", () => {
    expect(() => invariant(false, "empty start set")).toThrow("empty start set");
    expect(() => invariant(true, "never")).not.toThrow();
  });

  it("unreachable always throws", () => {
    expect(() => unreachable()).toThrow("Unreachable code reached");
  });
});
