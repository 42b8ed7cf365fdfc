/**
 * Tests for settings loading
 */

import { afterEach, describe, expect, it, vi } from "vitest";
import { mkdtempSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { defineSettings, envKeyToPath, parseEnvValue, settings } from "@inkwell/core";

function emptyDir(): string {
  return mkdtempSync(join(tmpdir(), "inkwell-settings-"));
}

describe("settings", () => {
  afterEach(() => {
    settings.reset();
    vi.restoreAllMocks();
  });

  describe("environment mapping", () => {
    it("maps double underscores to nesting and words to camelCase", () => {
      expect(envKeyToPath("INKWELL_PARSER__MAX_NESTING_LEVEL")).toBe("parser.maxNestingLevel");
      expect(envKeyToPath("INKWELL_DEBUG")).toBe("debug");
    });

    it("interprets booleans and integers", () => {
      expect(parseEnvValue("1")).toBe(true);
      expect(parseEnvValue("false")).toBe(false);
      expect(parseEnvValue("")).toBe(false);
      expect(parseEnvValue("8")).toBe(8);
      expect(parseEnvValue("%%")).toBe("%%");
    });
  });

  describe("defaults", () => {
    it("exposes the built-in values after reset", () => {
      settings.reset();
      expect(settings.getNumber("parser.maxNestingLevel", 0)).toBe(12);
      expect(settings.getString("parser.defaultFence", "")).toBe("@:@");
      expect(settings.getBoolean("debug", true)).toBe(false);
      expect(settings.getNumber("diagnostics.contextLines", 0)).toBe(1);
    });

    it("falls back when the stored value has the wrong type", () => {
      settings.reset();
      expect(settings.getNumber("parser.defaultFence", 5)).toBe(5);
      expect(settings.getString("parser.missing", "x")).toBe("x");
    });
  });

  describe("load", () => {
    it("applies environment overrides", () => {
      settings.load({ searchFrom: emptyDir(), env: { INKWELL_PARSER__MAX_NESTING_LEVEL: "8" } });
      expect(settings.getNumber("parser.maxNestingLevel", 12)).toBe(8);
      expect(settings.getString("parser.defaultFence", "")).toBe("@:@");
      expect(settings.getConfigFilePath()).toBeUndefined();
    });

    it("reads a config file and lets the environment win", () => {
      const dir = emptyDir();
      writeFileSync(
        join(dir, ".inkwellrc.json"),
        JSON.stringify({ parser: { defaultFence: "%%", maxNestingLevel: 4 } }),
      );

      settings.load({ searchFrom: dir, env: { INKWELL_PARSER__MAX_NESTING_LEVEL: "6" } });

      expect(settings.getString("parser.defaultFence", "")).toBe("%%");
      expect(settings.getNumber("parser.maxNestingLevel", 12)).toBe(6);
      expect(settings.getConfigFilePath()).toBe(join(dir, ".inkwellrc.json"));
    });

    it("warns and keeps defaults when the config file is malformed", () => {
      const dir = emptyDir();
      writeFileSync(join(dir, ".inkwellrc.json"), "{ not json");
      const warn = vi.spyOn(console, "warn").mockImplementation(() => {});

      settings.load({ searchFrom: dir, env: {} });

      expect(warn).toHaveBeenCalledTimes(1);
      expect(String(warn.mock.calls[0][0])).toMatch(/^\[inkwell:settings\] Failed to load config file: /);
      expect(settings.getNumber("parser.maxNestingLevel", 0)).toBe(12);
    });
  });

  describe("set", () => {
    it("merges programmatic values over the current ones", () => {
      settings.reset();
      settings.set({ parser: { maxNestingLevel: 3 } });
      expect(settings.getNumber("parser.maxNestingLevel", 12)).toBe(3);
      expect(settings.getString("parser.defaultFence", "")).toBe("@:@");
      expect(settings.has("debug")).toBe(false);
    });

    it("defineSettings returns its argument", () => {
      const values = defineSettings({ debug: true });
      expect(values).toEqual({ debug: true });
    });
  });
});
