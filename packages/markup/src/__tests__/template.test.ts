import { describe, it, expect } from "vitest";
import { Config } from "@inkwell/config";
import { invalidSpan, parseTemplate, spanSequence, StandardDirectives, TemplateParser, text } from "../index.js";
import { silent } from "./helpers.js";

const directives = { template: StandardDirectives.template };

describe("parseTemplate", () => {
  it("substitutes references into the surrounding text", () => {
    const { root } = parseTemplate("Hello ${name}!", {
      config: Config.fromObject({ name: "World" }),
      logger: silent,
    });
    expect(root.content).toEqual([text("Hello World!")]);
  });

  it("keeps markup characters literal", () => {
    const { root } = parseTemplate("*not* `code` \\n", { logger: silent });
    expect(root.content).toEqual([text("*not* `code` \\n")]);
  });

  it("picks the first section of an if when the key is truthy", () => {
    const { root } = parseTemplate("@:if(draft) Draft @:else Final @:@", {
      config: Config.fromObject({ draft: true }),
      directives,
      logger: silent,
    });
    expect(root.content).toEqual([spanSequence([text(" Draft ")])]);
  });

  it("picks the else section for a missing or false key", () => {
    const missing = parseTemplate("@:if(draft) Draft @:else Final @:@", { directives, logger: silent });
    expect(missing.root.content).toEqual([spanSequence([text(" Final ")])]);

    const empty = parseTemplate("[@:if(tags) has tags @:@]", {
      config: Config.fromObject({ tags: [] }),
      directives,
      logger: silent,
    });
    expect(empty.root.content).toEqual([text("["), spanSequence([]), text("]")]);
  });

  it("allows at most one else", () => {
    const { root, diagnostics } = parseTemplate("@:if(a) 1 @:else 2 @:else 3 @:@", { directives, logger: silent });
    expect(root.content).toEqual([
      invalidSpan({
        message:
          "One or more errors processing directive 'if': " +
          "too many occurrences of separator directive 'else': expected max: 1, actual: 2",
        source: "@:if(a) 1 @:else 2 @:else 3 @:@",
        offset: 0,
        code: 2000,
      }),
    ]);
    expect(diagnostics.map((d) => d.code)).toEqual([2000]);
  });

  it("merges a config header over the given config", () => {
    const { root, config } = parseTemplate("{% draft = true %}\n@:if(draft) yes @:@", {
      directives,
      logger: silent,
    });
    expect(config.get("draft")).toBe(true);
    expect(root.content).toEqual([spanSequence([text(" yes ")])]);
  });
});

describe("TemplateParser", () => {
  it("parses standalone spans", () => {
    const parser = new TemplateParser({ config: Config.fromObject({ a: 1 }) });
    expect(parser.parseSpans("x${a}y")).toEqual([text("x1y")]);
  });
});
