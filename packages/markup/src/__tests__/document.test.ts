import { describe, it, expect } from "vitest";
import { Config } from "@inkwell/config";
import { createLogger, renderDiagnosticCLI } from "@inkwell/core";
import { literal as literalText, map, prefixed } from "@inkwell/parse";
import {
  BasicMarkup,
  emphasis,
  header,
  invalidSpan,
  literal,
  paragraph,
  parseDocument,
  RootParser,
  SpanParser,
  Spans,
  StandardDirectives,
  strong,
  text,
  type MarkupFormat,
} from "../index.js";
import { blocksOf, silent } from "./helpers.js";

describe("basic markup", () => {
  it("reads headers and paragraphs", () => {
    expect(blocksOf("# Title *x*\nline one\nline two\n\n## Sub")).toEqual([
      header(1, [text("Title "), emphasis([text("x")])]),
      paragraph([text("line one\nline two")]),
      header(2, [text("Sub")]),
    ]);
  });

  it("ends a paragraph at a header line", () => {
    expect(blocksOf("intro\n### Next")).toEqual([paragraph([text("intro")]), header(3, [text("Next")])]);
  });

  it("keeps a hash without a space as paragraph text", () => {
    expect(blocksOf("#tag")).toEqual([paragraph([text("#tag")])]);
  });

  it("reads inline styles", () => {
    expect(blocksOf("**bold** and *em* use `x*y` here")).toEqual([
      paragraph([
        strong([text("bold")]),
        text(" and "),
        emphasis([text("em")]),
        text(" use "),
        literal("x*y"),
        text(" here"),
      ]),
    ]);
  });

  it("applies backslash escapes", () => {
    expect(blocksOf("a \\*b\\* c")).toEqual([paragraph([text("a *b* c")])]);
  });

  it("keeps an unclosed style as text", () => {
    expect(blocksOf("a *b")).toEqual([paragraph([text("a *b")])]);
  });

  it("normalizes line endings", () => {
    expect(blocksOf("a\r\nb")).toEqual([paragraph([text("a\nb")])]);
  });
});

describe("references", () => {
  it("drops empty and missing optional values and merges the text around them", () => {
    const config = Config.fromObject({ empty: "" });
    expect(blocksOf("a${empty}b${?missing}c", { config })).toEqual([paragraph([text("abc")])]);
  });

  it("reports a missing required reference", () => {
    const { root, diagnostics } = parseDocument("a ${title} b", { logger: silent, path: "ref.md" });
    expect(root.content).toEqual([
      paragraph([
        text("a "),
        invalidSpan({ message: "Missing required reference: 'title'", source: "${title}", offset: 2, code: 3001 }),
        text(" b"),
      ]),
    ]);
    expect(diagnostics).toHaveLength(1);
    expect(diagnostics[0]?.code).toBe(3001);
    expect(diagnostics[0]?.span).toEqual({ path: "ref.md", source: "a ${title} b", start: 2, end: 10 });
  });
});

describe("parseDocument", () => {
  it("merges a config header over the given config", () => {
    const { root, config } = parseDocument("{% title = Intro %}\nWelcome to ${title}", {
      config: Config.fromObject({ title: "Base", site: "Docs" }),
      logger: silent,
    });
    expect(config.get("title")).toBe("Intro");
    expect(config.get("site")).toBe("Docs");
    expect(root.content).toEqual([paragraph([text("Welcome to Intro")])]);
  });

  it("keeps an unreadable config header as an invalid block", () => {
    const { root, diagnostics } = parseDocument("{% = %}\nBody", { logger: silent });
    expect(root.content).toHaveLength(2);
    expect(root.content[0]).toMatchObject({ kind: "invalidBlock", source: "{% = %}", offset: 0, code: 1000 });
    expect(root.content[1]).toEqual(paragraph([text("Body")]));
    expect(diagnostics.map((d) => d.code)).toEqual([1000]);
  });

  it("logs one debug line per document", () => {
    const lines: string[] = [];
    const logger = createLogger("document", { writer: (line) => lines.push(line), debug: true });
    parseDocument("hello\n\n${missing}", { path: "a.md", logger });
    expect(lines).toEqual(["[inkwell:document] parsed a.md: 2 blocks, 1 invalid"]);
  });

  it("renders diagnostics for invalid directives", () => {
    const { diagnostics } = parseDocument("Hi @:nope there", { path: "p.md", logger: silent });
    expect(diagnostics).toHaveLength(1);
    const [first] = diagnostics;
    expect(first?.span).toEqual({ path: "p.md", source: "Hi @:nope there", start: 3, end: 9 });
    const lines = first ? renderDiagnosticCLI(first, { colors: false, contextLines: 1 }).split("\n") : [];
    expect(lines.slice(0, 2)).toEqual([
      "error[IW2007]: One or more errors processing directive 'nope': No span directive registered with name: nope",
      "  --> p.md:1:4",
    ]);
  });

  it("never throws on malformed input", () => {
    const inputs = ["", "@:", "@:dir(", "@:dir {", "{%", "{% a = %}", "\\", "*", "`", "${", "@:@", "# ", "@:box\n@:@\n@:@"];
    for (const input of inputs) {
      const { root } = parseDocument(input, {
        directives: { block: StandardDirectives.block, span: StandardDirectives.span },
        logger: silent,
      });
      expect(root.kind).toBe("root");
    }
  });

  it("reports a deeply nested config header as an invalid block", () => {
    const input = "{% a = " + "[".repeat(20000) + " %}\nhello";
    const { root, diagnostics } = parseDocument(input, { logger: silent });
    expect(root.content).toHaveLength(2);
    expect(root.content[0]).toMatchObject({ kind: "invalidBlock", source: input.slice(0, -6), offset: 0, code: 1000 });
    expect(root.content[1]).toEqual(paragraph([text("hello")]));
    expect(diagnostics.map((d) => d.code)).toEqual([1000]);
  });

  it("reports a deeply nested attribute section on its directive", () => {
    const input = "x @:style(a) { k = " + "{k=".repeat(20000) + " } t @:@";
    const [first] = blocksOf(input, { directives: { span: StandardDirectives.span } });
    expect(first?.kind).toBe("paragraph");
    const content = first?.kind === "paragraph" ? first.content : [];
    expect(content).toHaveLength(2);
    expect(content[0]).toEqual(text("x "));
    expect(content[1]).toMatchObject({ kind: "invalidSpan", source: input.slice(2), offset: 2, code: 2000 });
  });

  it("stops descending into deeply nested directive bodies", () => {
    const blocks = "@:callout(n)\n".repeat(2000) + "x\n" + "@:@\n".repeat(2000);
    const spans = "@:style(a) ".repeat(20000) + "x" + " @:@".repeat(20000);
    for (const input of [blocks, spans]) {
      const { root } = parseDocument(input, { directives: StandardDirectives, logger: silent });
      expect(root.kind).toBe("root");
    }
  });
});

describe("RootParser", () => {
  it("tries extension parsers before low-precedence host parsers on the same character", () => {
    const hostAt = SpanParser.standalone(prefixed("@", map(literalText("@"), () => text("[at]")))).withLowPrecedence();
    const format: MarkupFormat = { ...BasicMarkup, spanParsers: [...BasicMarkup.spanParsers, hostAt] };
    const dir = Spans.create("dir", Spans.dsl.attribute(0).map((v) => text(String(v))));

    expect(blocksOf("x @:dir(foo) @ y", { format, directives: { span: [dir] } })).toEqual([
      paragraph([text("x "), text("foo"), text(" [at] y")]),
    ]);
  });

  it("reads nested markup as text beyond the nesting limit", () => {
    expect(new RootParser(BasicMarkup, { maxNestingLevel: 1 }).parseDocument("*a `b` c*").content).toEqual([
      paragraph([emphasis([text("a `b` c")])]),
    ]);
    expect(new RootParser(BasicMarkup).parseDocument("*a `b` c*").content).toEqual([
      paragraph([emphasis([text("a "), literal("b"), text(" c")])]),
    ]);
  });

  it("parses standalone blocks and spans", () => {
    const parser = new RootParser(BasicMarkup);
    expect(parser.parseBlocks("one\n\ntwo")).toEqual([paragraph([text("one")]), paragraph([text("two")])]);
    expect(parser.parseSpans("*x*")).toEqual([emphasis([text("x")])]);
  });
});
