import { describe, expect, it } from "vitest";
import { arrayOf, decodeSource, Decoders, oneOf } from "../index.js";

describe("Decoders", () => {
  it("decodes integers from numbers and digit strings", () => {
    expect(Decoders.int.decode(7, "7")).toEqual({ ok: true, value: 7 });
    expect(Decoders.int.decode("4", "4")).toEqual({ ok: true, value: 4 });
  });

  it("reports the source of a value that is not an integer", () => {
    expect(Decoders.int.decode("foo", "foo")).toEqual({ ok: false, error: "not an integer: foo" });
    expect(Decoders.int.decode(1.5, "1.5")).toEqual({ ok: false, error: "not an integer: 1.5" });
  });

  it("renders scalars as strings", () => {
    expect(Decoders.string.decode(42, "42")).toEqual({ ok: true, value: "42" });
    expect(Decoders.string.decode(true, "true")).toEqual({ ok: true, value: "true" });
    expect(Decoders.string.decode([], "[]")).toEqual({ ok: false, error: "not a string: []" });
  });

  it("decodes numbers and booleans", () => {
    expect(Decoders.number.decode("2.5", "2.5")).toEqual({ ok: true, value: 2.5 });
    expect(Decoders.number.decode("x", "x")).toEqual({ ok: false, error: "not a number: x" });
    expect(Decoders.boolean.decode("false", "false")).toEqual({ ok: true, value: false });
    expect(Decoders.boolean.decode("yes", "yes")).toEqual({ ok: false, error: "not a boolean: yes" });
  });
});

describe("arrayOf", () => {
  it("decodes every element", () => {
    expect(arrayOf(Decoders.int).decode([1, "2"], "[1, 2]")).toEqual({ ok: true, value: [1, 2] });
  });

  it("reports the first bad element", () => {
    expect(arrayOf(Decoders.int).decode([1, "a", "b"], "[1, a, b]")).toEqual({ ok: false, error: "not an integer: a" });
  });

  it("rejects scalars", () => {
    expect(arrayOf(Decoders.string).decode("a", "a")).toEqual({ ok: false, error: "not an array: a" });
  });
});

describe("oneOf", () => {
  const kind = oneOf(["info", "warning"]);

  it("accepts the listed values", () => {
    expect(kind.decode("info", "info")).toEqual({ ok: true, value: "info" });
  });

  it("lists the allowed values", () => {
    expect(kind.decode("error", "error")).toEqual({ ok: false, error: "expected one of info, warning, got: error" });
  });
});

describe("decodeSource", () => {
  it("reads the raw text as a value first", () => {
    expect(decodeSource(Decoders.value, "42")).toEqual({ ok: true, value: 42 });
    expect(decodeSource(Decoders.string, '"a, b"')).toEqual({ ok: true, value: "a, b" });
    expect(decodeSource(arrayOf(Decoders.int), "[1, 2]")).toEqual({ ok: true, value: [1, 2] });
  });

  it("keeps the raw text in messages", () => {
    expect(decodeSource(Decoders.int, "foo")).toEqual({ ok: false, error: "not an integer: foo" });
  });
});
