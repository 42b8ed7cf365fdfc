import { describe, it, expect } from "vitest";
import { Config, decodeError, decoded, Decoders } from "@inkwell/config";
import { createDsl, text, type Attribute, type DirectiveContext, type Span } from "../index.js";

const dsl = createDsl<Span>();

function context(attributes: Attribute[], body?: string): DirectiveContext<Span> {
  return {
    declaration: { name: "dir", attributes, duplicates: [], errors: [], fence: "@:@" },
    body: body === undefined ? undefined : { raw: body, nodes: [text(body)], offset: 10 },
    source: "@:dir",
    offset: 0,
    cursor: { path: "doc.md", config: Config.fromObject({ lang: "en" }) },
    parse: (source) => [text(source.toUpperCase())],
  };
}

describe("attribute parts", () => {
  it("reads positional and named attributes", () => {
    const ctx = context([
      { key: 0, value: "first", source: "first" },
      { key: "count", value: 3, source: "3" },
    ]);
    expect(dsl.attribute(0).run(ctx)).toEqual({ ok: true, value: "first" });
    expect(dsl.attribute("count").as(Decoders.int).run(ctx)).toEqual({ ok: true, value: 3 });
  });

  it("reports missing attributes by index or name", () => {
    const ctx = context([]);
    expect(dsl.attribute(1).run(ctx)).toEqual({
      ok: false,
      errors: ["required positional attribute at index 1 is missing"],
    });
    expect(dsl.attribute("count").run(ctx)).toEqual({ ok: false, errors: ["required attribute 'count' is missing"] });
  });

  it("reports conversion errors with the attribute source", () => {
    const ctx = context([
      { key: 0, value: "x1", source: "x1" },
      { key: "count", value: "many", source: "many" },
    ]);
    expect(dsl.attribute(0).as(Decoders.int).run(ctx)).toEqual({
      ok: false,
      errors: ["error converting positional attribute at index 0: not an integer: x1"],
    });
    expect(dsl.attribute("count").as(Decoders.int).run(ctx)).toEqual({
      ok: false,
      errors: ["error converting attribute 'count': not an integer: many"],
    });
  });

  it("makes optional attributes undefined when absent but still converts them when present", () => {
    const optional = dsl.attribute("count").as(Decoders.int).optional();
    expect(optional.run(context([]))).toEqual({ ok: true, value: undefined });
    expect(optional.run(context([{ key: "count", value: "x", source: "x" }]))).toEqual({
      ok: false,
      errors: ["error converting attribute 'count': not an integer: x"],
    });
  });

  it("uses the default for an absent attribute", () => {
    const part = dsl.attribute("count").as(Decoders.int).withDefault(7);
    expect(part.run(context([]))).toEqual({ ok: true, value: 7 });
    expect(part.run(context([{ key: "count", value: 2, source: "2" }]))).toEqual({ ok: true, value: 2 });
  });
});

describe("body and context parts", () => {
  it("gives the parsed and raw body", () => {
    const ctx = context([], " inner ");
    expect(dsl.parsedBody.run(ctx)).toEqual({ ok: true, value: [text(" inner ")] });
    expect(dsl.rawBody.run(ctx)).toEqual({ ok: true, value: " inner " });
    expect(dsl.parsedBody.hasBody).toBe(true);
    expect(dsl.source.hasBody).toBe(false);
  });

  it("reports a missing body", () => {
    expect(dsl.rawBody.run(context([]))).toEqual({ ok: false, errors: ["required body is missing"] });
  });

  it("exposes the cursor, the source and the parser", () => {
    const ctx = context([]);
    const cursor = dsl.cursor.run(ctx);
    expect(cursor.ok && cursor.value.path).toBe("doc.md");
    expect(dsl.source.run(ctx)).toEqual({ ok: true, value: "@:dir" });
    const parser = dsl.parser.run(ctx);
    expect(parser.ok && parser.value("abc")).toEqual([text("ABC")]);
  });

  it("collects the named attributes into a config", () => {
    const ctx = context([
      { key: 0, value: "pos", source: "pos" },
      { key: "name", value: "Planet", source: "Planet" },
      { key: "n", value: 42, source: "42" },
    ]);
    const r = dsl.allAttributes.run(ctx);
    expect(r.ok && r.value.toObject()).toEqual({ name: "Planet", n: 42 });
  });
});

describe("combinators", () => {
  it("maps and evaluates values", () => {
    const ctx = context([{ key: 0, value: "5", source: "5" }]);
    const doubled = dsl.attribute(0).as(Decoders.int).map((n) => n * 2);
    expect(doubled.run(ctx)).toEqual({ ok: true, value: 10 });

    const small = dsl
      .attribute(0)
      .as(Decoders.int)
      .evalMap((n) => (n < 3 ? decoded(n) : decodeError(`too large: ${n}`)));
    expect(small.run(ctx)).toEqual({ ok: false, errors: ["too large: 5"] });
  });

  it("combines parts and keeps every error in order", () => {
    const part = dsl.mapN(
      [dsl.attribute(0).as(Decoders.string), dsl.attribute("count").as(Decoders.int), dsl.parsedBody],
      ([name, count, body]) => `${name}:${count}:${body.length}`,
    );
    expect(part.hasBody).toBe(true);
    expect(part.run(context([]))).toEqual({
      ok: false,
      errors: [
        "required positional attribute at index 0 is missing",
        "required attribute 'count' is missing",
        "required body is missing",
      ],
    });

    const ctx = context(
      [
        { key: 0, value: "foo", source: "foo" },
        { key: "count", value: 11, source: "11" },
      ],
      "text",
    );
    expect(part.run(ctx)).toEqual({ ok: true, value: "foo:11:1" });
  });

  it("succeeds with a constant for empty", () => {
    expect(dsl.empty("fixed").run(context([]))).toEqual({ ok: true, value: "fixed" });
  });
});
