import { describe, expect, it } from "vitest";
import { Config, Decoders } from "../index.js";

describe("Config", () => {
  const config = Config.fromObject({ page: { title: "Home", weight: 3 }, draft: false });

  it("looks up dotted paths", () => {
    expect(config.get("page.title")).toBe("Home");
    expect(config.get("draft")).toBe(false);
    expect(config.get("page.missing")).toBeUndefined();
    expect(config.get("draft.deeper")).toBeUndefined();
  });

  it("distinguishes a present null from a missing key", () => {
    const c = Config.fromObject({ nothing: null });
    expect(c.has("nothing")).toBe(true);
    expect(c.has("other")).toBe(false);
  });

  it("decodes values", () => {
    expect(config.getAs("page.weight", Decoders.int)).toEqual({ ok: true, value: 3 });
    expect(config.getAs("page.title", Decoders.int)).toEqual({ ok: false, error: "not an integer: Home" });
    expect(config.getAs("nope", Decoders.int)).toBeUndefined();
  });

  it("sets values without changing the original", () => {
    const next = config.withValue("page.author.name", "Ada");
    expect(next.get("page.author.name")).toBe("Ada");
    expect(next.get("page.title")).toBe("Home");
    expect(config.get("page.author")).toBeUndefined();
  });

  it("falls back to another config", () => {
    const base = Config.fromObject({ page: { title: "Base", lang: "en" }, site: "docs" });
    const merged = config.withFallback(base);
    expect(merged.get("page.title")).toBe("Home");
    expect(merged.get("site")).toBe("docs");
    expect(merged.get("page")).toEqual({ title: "Home", lang: "en", weight: 3 });
    expect(merged.toObject()).toEqual({ page: { title: "Home", lang: "en", weight: 3 }, site: "docs", draft: false });
  });

  it("parses object-literal text", () => {
    const r = Config.parse("a.b = 1");
    expect(r.ok && r.value.get("a.b")).toBe(1);
  });

  it("reports syntax errors", () => {
    const r = Config.parse("a = ");
    expect(r.ok).toBe(false);
  });

  it("starts empty", () => {
    expect(Config.empty.toObject()).toEqual({});
  });
});
