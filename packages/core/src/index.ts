/**
 * Core module exports for @inkwell/core
 *
 * This package provides:
 * - Settings (defaults, config file, INKWELL_* environment)
 * - The diagnostic catalog and its CLI renderer
 * - Scoped logging
 * - A generic registry and runtime safety primitives
 */

// Settings
export {
  settings,
  defineSettings,
  deepMerge,
  envKeyToPath,
  parseEnvValue,
  DEFAULT_SETTINGS,
  type InkwellSettings,
  type ParserSettings,
  type DiagnosticsSettings,
} from "./settings.js";

// Diagnostics
export * from "./diagnostics.js";

// Logging
export { createLogger, type Logger, type LoggerOptions, type LogLevel } from "./logger.js";

// Registry
export {
  createGenericRegistry,
  type GenericRegistry,
  type RegistryOptions,
} from "./registry.js";

// Runtime Safety Primitives
export { invariant, unreachable, InvariantError } from "./safety.js";
