/**
 * Settings for the inkwell toolkit
 *
 * Settings are loaded from (in priority order):
 *
 * 1. Environment variables: INKWELL_* (highest priority, for CI overrides)
 * 2. Config files: .inkwellrc, .inkwellrc.json, inkwell.config.js, etc.
 * 3. package.json: "inkwell" key
 * 4. Programmatic: settings.set() calls
 * 5. Defaults (lowest priority)
 *
 * Parsers read these once, when they are constructed. Nothing inside a
 * parse step consults them.
 *
 * @example
 * ```typescript
 * import { settings } from "@inkwell/core";
 *
 * settings.getNumber("parser.maxNestingLevel", 12); // → 12
 * settings.set({ debug: true });
 * ```
 *
 * @example Config file (.inkwellrc.json)
 * ```json
 * { "parser": { "maxNestingLevel": 8 }, "diagnostics": { "colors": true } }
 * ```
 */

import { cosmiconfigSync } from "cosmiconfig";

// ============================================================================
// Types
// ============================================================================

/**
 * Parser limits and defaults.
 */
export type ParserSettings = {
  /** Deepest span/block nesting before nested markup is read as literal text */
  maxNestingLevel?: number;
  /** Closing fence of directive bodies when no custom fence is declared */
  defaultFence?: string;
};

/**
 * Diagnostic rendering options.
 */
export type DiagnosticsSettings = {
  /** ANSI colors in rendered diagnostics */
  colors?: boolean;
  /** Source lines shown before and after the offending line */
  contextLines?: number;
};

/**
 * Full settings shape.
 */
export type InkwellSettings = {
  /** Enable debug logging */
  debug?: boolean;
  parser?: ParserSettings;
  diagnostics?: DiagnosticsSettings;
};

type SettingsTree = Record<string, unknown>;

export const DEFAULT_SETTINGS = {
  debug: false,
  parser: {
    maxNestingLevel: 12,
    defaultFence: "@:@",
  },
  diagnostics: {
    colors: false,
    contextLines: 1,
  },
} satisfies InkwellSettings;

// ============================================================================
// Global State
// ============================================================================

let settingsStore: SettingsTree = {};
let settingsLoaded = false;
let settingsFilePath: string | undefined;

// ============================================================================
// Environment Variable Loading
// ============================================================================

const ENV_PREFIX = "INKWELL_";

/**
 * Convert an environment variable name to a settings path.
 *
 *   INKWELL_DEBUG                     → debug
 *   INKWELL_PARSER__MAX_NESTING_LEVEL → parser.maxNestingLevel
 */
export function envKeyToPath(key: string): string {
  return key
    .slice(ENV_PREFIX.length)
    .toLowerCase()
    .split("__")
    .map((segment) => segment.replace(/_([a-z0-9])/g, (_m, c: string) => c.toUpperCase()))
    .join(".");
}

/**
 * Interpret an environment variable value.
 */
export function parseEnvValue(value: string): unknown {
  if (value === "1" || value === "true") return true;
  if (value === "0" || value === "false" || value === "") return false;
  if (/^\d+$/.test(value)) return parseInt(value, 10);
  return value;
}

/**
 * Load settings from environment variables prefixed with INKWELL_.
 */
function loadSettingsFromEnv(env: NodeJS.ProcessEnv = process.env): SettingsTree {
  const envSettings: SettingsTree = {};

  for (const [key, value] of Object.entries(env)) {
    if (!key.startsWith(ENV_PREFIX) || value === undefined) continue;
    setNestedValue(envSettings, envKeyToPath(key), parseEnvValue(value));
  }

  return envSettings;
}

// ============================================================================
// Utility Functions
// ============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Set a nested value using dot notation.
 */
function setNestedValue(obj: SettingsTree, path: string, value: unknown): void {
  const parts = path.split(".");
  let current: SettingsTree = obj;

  for (let i = 0; i < parts.length - 1; i++) {
    const part = parts[i];
    const child = current[part];
    if (isRecord(child)) {
      current = child;
    } else {
      const created: SettingsTree = {};
      current[part] = created;
      current = created;
    }
  }

  current[parts[parts.length - 1]] = value;
}

/**
 * Get a nested value using dot notation.
 */
function getNestedValue(obj: unknown, path: string): unknown {
  let current: unknown = obj;

  for (const part of path.split(".")) {
    if (!isRecord(current)) {
      return undefined;
    }
    current = current[part];
  }

  return current;
}

/**
 * Deep merge objects (right takes precedence).
 */
export function deepMerge(target: SettingsTree, source: SettingsTree): SettingsTree {
  const result: SettingsTree = { ...target };

  for (const key of Object.keys(source)) {
    const sourceValue = source[key];
    const targetValue = result[key];

    if (isRecord(sourceValue) && isRecord(targetValue)) {
      result[key] = deepMerge(targetValue, sourceValue);
    } else {
      result[key] = sourceValue;
    }
  }

  return result;
}

// ============================================================================
// Config File Loading
// ============================================================================

const MODULE_NAME = "inkwell";

/**
 * Load settings from the nearest config file, searching upwards from `searchFrom`.
 */
function loadSettingsFromFiles(searchFrom?: string): SettingsTree {
  const explorer = cosmiconfigSync(MODULE_NAME, {
    searchPlaces: [
      "package.json",
      `.${MODULE_NAME}rc`,
      `.${MODULE_NAME}rc.json`,
      `.${MODULE_NAME}rc.yaml`,
      `.${MODULE_NAME}rc.yml`,
      `.${MODULE_NAME}rc.js`,
      `.${MODULE_NAME}rc.cjs`,
      `${MODULE_NAME}.config.js`,
      `${MODULE_NAME}.config.cjs`,
    ],
  });

  try {
    const result = explorer.search(searchFrom);
    const loaded: unknown = result?.config;
    if (result && !result.isEmpty && isRecord(loaded)) {
      settingsFilePath = result.filepath;
      return loaded;
    }
  } catch (error) {
    console.warn(`[inkwell:settings] Failed to load config file: ${error instanceof Error ? error.message : String(error)}`);
  }
  return {};
}

// ============================================================================
// Initialization
// ============================================================================

function initializeSettings(): void {
  if (settingsLoaded) return;

  const fileSettings = loadSettingsFromFiles();
  const envSettings = loadSettingsFromEnv();

  // Merge: defaults < file < env
  settingsStore = deepMerge(deepMerge(DEFAULT_SETTINGS, fileSettings), envSettings);
  settingsLoaded = true;
}

// ============================================================================
// Public API
// ============================================================================

/**
 * Get a settings value by dotted path.
 */
function get(path: string): unknown {
  initializeSettings();
  return getNestedValue(settingsStore, path);
}

/**
 * Get a numeric setting, or `fallback` when it is absent or not a number.
 */
function getNumber(path: string, fallback: number): number {
  const value = get(path);
  return typeof value === "number" && Number.isFinite(value) ? value : fallback;
}

/**
 * Get a boolean setting, or `fallback` when it is absent or not a boolean.
 */
function getBoolean(path: string, fallback: boolean): boolean {
  const value = get(path);
  return typeof value === "boolean" ? value : fallback;
}

/**
 * Get a string setting, or `fallback` when it is absent or not a string.
 */
function getString(path: string, fallback: string): string {
  const value = get(path);
  return typeof value === "string" ? value : fallback;
}

/**
 * Set settings values programmatically.
 */
function set(values: InkwellSettings): void {
  initializeSettings();
  settingsStore = deepMerge(settingsStore, values);
}

/**
 * Check if a settings path has a truthy value.
 */
function has(path: string): boolean {
  return !!get(path);
}

/**
 * Get all settings values.
 */
function getAll(): Readonly<SettingsTree> {
  initializeSettings();
  return settingsStore;
}

/**
 * Get the path to the loaded config file (if any).
 */
function getConfigFilePath(): string | undefined {
  initializeSettings();
  return settingsFilePath;
}

/**
 * Reload from files and environment, searching for config files from `searchFrom`.
 */
function load(options: { searchFrom?: string; env?: NodeJS.ProcessEnv } = {}): void {
  settingsFilePath = undefined;
  const fileSettings = loadSettingsFromFiles(options.searchFrom);
  const envSettings = loadSettingsFromEnv(options.env);
  settingsStore = deepMerge(deepMerge(DEFAULT_SETTINGS, fileSettings), envSettings);
  settingsLoaded = true;
}

/**
 * Reset settings to defaults (mainly for testing). Nothing is read from
 * files or the environment until the next `load()`.
 */
function reset(): void {
  settingsStore = deepMerge({}, DEFAULT_SETTINGS);
  settingsLoaded = true;
  settingsFilePath = undefined;
}

// ============================================================================
// Export: settings object
// ============================================================================

export const settings = {
  get,
  getNumber,
  getBoolean,
  getString,
  set,
  has,
  getAll,
  getConfigFilePath,
  load,
  reset,
} as const;

/**
 * Helper for creating type-safe config files.
 */
export function defineSettings(values: InkwellSettings): InkwellSettings {
  return values;
}
