/**
 * Diagnostics System for inkwell
 *
 * Every message the toolkit can attach to an invalid node comes from this
 * catalog. Descriptors carry a stable `IW` code, a category, and a message
 * template with `{placeholders}`; the same message text is what ends up in
 * the document tree, so templates here are part of the observable output.
 *
 * @example
 * ```typescript
 * formatMessage(IW2001, { index: 0 });
 * // → "required positional attribute at index 0 is missing"
 *
 * new DiagnosticBuilder(IW2007, (d) => out.push(d))
 *   .at({ path: "intro.md", source, start: 12, end: 20 })
 *   .withArgs({ family: "span", name: "colour" })
 *   .help("Register the directive through DirectiveSupport.withDirectives")
 *   .emit();
 * ```
 */

import { settings } from "./settings.js";

// ============================================================================
// Diagnostic Categories
// ============================================================================

export enum DiagnosticCategory {
  Syntax = "syntax",
  Directive = "directive",
  Separator = "separator",
  Reference = "reference",
  Configuration = "config",
  Internal = "internal",
}

export type Severity = "error" | "warning" | "info";

// ============================================================================
// Diagnostic Descriptor (Catalog Entry)
// ============================================================================

export interface DiagnosticDescriptor {
  /** Unique numeric code, rendered as IW<code> */
  readonly code: number;

  readonly severity: Severity;

  readonly category: DiagnosticCategory;

  /** Message template with {placeholders} for interpolation */
  readonly messageTemplate: string;

  /** Long-form explanation, shown with `showExplanation` */
  readonly explanation: string;
}

export type MessageArgs = Record<string, string | number | undefined>;

/**
 * Interpolate a descriptor's template. Unknown placeholders are left as-is,
 * and substituted values are never re-scanned.
 */
export function formatMessage(descriptor: DiagnosticDescriptor, args: MessageArgs = {}): string {
  return descriptor.messageTemplate.replace(/\{(\w+)\}/g, (placeholder, key: string) => {
    const value = args[key];
    return value === undefined ? placeholder : String(value);
  });
}

/**
 * Format a code for display: 2001 → "IW2001".
 */
export function formatCode(code: number): string {
  return `IW${code}`;
}

// ============================================================================
// Rich Diagnostic Types
// ============================================================================

/**
 * A region of a source document, as character offsets.
 */
export interface SourceSpan {
  /** Document path, shown on the location line */
  path: string;
  /** Full text of the document */
  source: string;
  start: number;
  end: number;
}

/**
 * Structured diagnostic, rendered by `renderDiagnosticCLI`.
 */
export interface RichDiagnostic {
  code: number;
  severity: Severity;
  category: DiagnosticCategory;
  /** Message with placeholders interpolated */
  message: string;
  span?: SourceSpan;
  notes: string[];
  help?: string;
  explanation?: string;
}

// ============================================================================
// Diagnostic Builder
// ============================================================================

/**
 * Fluent builder for rich diagnostics.
 */
export class DiagnosticBuilder {
  private readonly diagnostic: RichDiagnostic;
  private args: MessageArgs = {};

  constructor(
    private readonly descriptor: DiagnosticDescriptor,
    private readonly emitter: (diagnostic: RichDiagnostic) => void = () => {},
  ) {
    this.diagnostic = {
      code: descriptor.code,
      severity: descriptor.severity,
      category: descriptor.category,
      message: descriptor.messageTemplate,
      notes: [],
      explanation: descriptor.explanation,
    };
  }

  at(span: SourceSpan): this {
    this.diagnostic.span = span;
    return this;
  }

  withArgs(args: MessageArgs): this {
    this.args = { ...this.args, ...args };
    return this;
  }

  /** Replace the interpolated message outright */
  withMessage(message: string): this {
    this.diagnostic.message = message;
    this.args = {};
    return this;
  }

  note(message: string): this {
    this.diagnostic.notes.push(message);
    return this;
  }

  help(message: string): this {
    this.diagnostic.help = message;
    return this;
  }

  build(): RichDiagnostic {
    const message =
      Object.keys(this.args).length > 0 ? formatMessage(this.descriptor, this.args) : this.diagnostic.message;
    return { ...this.diagnostic, notes: [...this.diagnostic.notes], message };
  }

  emit(): void {
    this.emitter(this.build());
  }
}

// ============================================================================
// Catalog: Syntax (1000-1099)
// ============================================================================

export const IW1000: DiagnosticDescriptor = {
  code: 1000,
  severity: "error",
  category: DiagnosticCategory.Syntax,
  messageTemplate: "{message}",
  explanation: `A construct could not be read and was kept as an invalid node.

The surrounding document was still parsed; only the construct itself is
replaced by a placeholder that carries its original source.`,
};

export const IW1001: DiagnosticDescriptor = {
  code: 1001,
  severity: "error",
  category: DiagnosticCategory.Syntax,
  messageTemplate: "expected at least {min} characters, got only {actual}",
  explanation: `A character run was configured with a minimum length that the input did not reach.`,
};

export const IW1002: DiagnosticDescriptor = {
  code: 1002,
  severity: "error",
  category: DiagnosticCategory.Syntax,
  messageTemplate: "Missing closing brace for attribute section",
  explanation: `A directive's named attribute section was opened with '{' but never closed.

Correct:
  @:callout { kind = note }
Incorrect:
  @:callout { kind = note`,
};

// ============================================================================
// Catalog: Directives (2000-2099)
// ============================================================================

export const IW2000: DiagnosticDescriptor = {
  code: 2000,
  severity: "error",
  category: DiagnosticCategory.Directive,
  messageTemplate: "One or more errors processing directive '{name}': {errors}",
  explanation: `A directive occurrence failed validation. Every problem found is listed,
separated by commas, in this order: declaration problems, then attribute and body
problems in the order the directive declares them, then duplicate attributes.`,
};

export const IW2001: DiagnosticDescriptor = {
  code: 2001,
  severity: "error",
  category: DiagnosticCategory.Directive,
  messageTemplate: "required positional attribute at index {index} is missing",
  explanation: `The directive expects a positional attribute that was not supplied.

Correct:
  @:style(highlight) text @:@`,
};

export const IW2002: DiagnosticDescriptor = {
  code: 2002,
  severity: "error",
  category: DiagnosticCategory.Directive,
  messageTemplate: "error converting positional attribute at index {index}: {error}",
  explanation: `A positional attribute was present but its decoder rejected the value.`,
};

export const IW2003: DiagnosticDescriptor = {
  code: 2003,
  severity: "error",
  category: DiagnosticCategory.Directive,
  messageTemplate: "required attribute '{name}' is missing",
  explanation: `The directive expects a named attribute in its { } section.`,
};

export const IW2004: DiagnosticDescriptor = {
  code: 2004,
  severity: "error",
  category: DiagnosticCategory.Directive,
  messageTemplate: "error converting attribute '{name}': {error}",
  explanation: `A named attribute was present but its decoder rejected the value.`,
};

export const IW2005: DiagnosticDescriptor = {
  code: 2005,
  severity: "error",
  category: DiagnosticCategory.Directive,
  messageTemplate: "required body is missing",
  explanation: `The directive expects a body closed by its fence (default @:@), and none
was found. An unterminated body counts as a missing one.`,
};

export const IW2006: DiagnosticDescriptor = {
  code: 2006,
  severity: "error",
  category: DiagnosticCategory.Directive,
  messageTemplate: "duplicate attribute '{name}'",
  explanation: `A named attribute appeared more than once. The first occurrence is kept.`,
};

export const IW2007: DiagnosticDescriptor = {
  code: 2007,
  severity: "error",
  category: DiagnosticCategory.Directive,
  messageTemplate: "No {family} directive registered with name: {name}",
  explanation: `No directive of this family is registered under the name. Attributes of
the occurrence are not validated.`,
};

// ============================================================================
// Catalog: Separators (2100-2199)
// ============================================================================

export const IW2101: DiagnosticDescriptor = {
  code: 2101,
  severity: "error",
  category: DiagnosticCategory.Separator,
  messageTemplate: "too few occurrences of separator directive '{name}': expected min: {min}, actual: {actual}",
  explanation: `The parent directive requires the separator at least 'min' times.`,
};

export const IW2102: DiagnosticDescriptor = {
  code: 2102,
  severity: "error",
  category: DiagnosticCategory.Separator,
  messageTemplate: "too many occurrences of separator directive '{name}': expected max: {max}, actual: {actual}",
  explanation: `The parent directive allows the separator at most 'max' times.`,
};

export const IW2103: DiagnosticDescriptor = {
  code: 2103,
  severity: "error",
  category: DiagnosticCategory.Separator,
  messageTemplate: "One or more errors processing separator directive '{name}': {errors}",
  explanation: `A separator inside a directive body failed its own validation.`,
};

export const IW2104: DiagnosticDescriptor = {
  code: 2104,
  severity: "error",
  category: DiagnosticCategory.Separator,
  messageTemplate: "Orphaned separator directive with name '{name}'",
  explanation: `A separator marker appeared outside the body of a directive that declares it.

Correct:
  @:if(draft) shown @:else hidden @:@
Incorrect:
  @:else hidden`,
};

// ============================================================================
// Catalog: References (3000-3099)
// ============================================================================

export const IW3001: DiagnosticDescriptor = {
  code: 3001,
  severity: "error",
  category: DiagnosticCategory.Reference,
  messageTemplate: "Missing required reference: '{key}'",
  explanation: `A \${key} reference names a key absent from the document configuration.
Use \${?key} for a reference that may be missing.`,
};

// ============================================================================
// Catalog: Configuration values (4000-4099)
// ============================================================================

export const IW4001: DiagnosticDescriptor = {
  code: 4001,
  severity: "error",
  category: DiagnosticCategory.Configuration,
  messageTemplate: "not an integer: {source}",
  explanation: `The value was expected to be a whole number.`,
};

export const IW4002: DiagnosticDescriptor = {
  code: 4002,
  severity: "error",
  category: DiagnosticCategory.Configuration,
  messageTemplate: "not a number: {source}",
  explanation: `The value was expected to be numeric.`,
};

export const IW4003: DiagnosticDescriptor = {
  code: 4003,
  severity: "error",
  category: DiagnosticCategory.Configuration,
  messageTemplate: "not a boolean: {source}",
  explanation: `The value was expected to be true or false.`,
};

export const IW4004: DiagnosticDescriptor = {
  code: 4004,
  severity: "error",
  category: DiagnosticCategory.Configuration,
  messageTemplate: "expected one of {values}, got: {source}",
  explanation: `The value must be one of a fixed set.`,
};

export const IW4005: DiagnosticDescriptor = {
  code: 4005,
  severity: "error",
  category: DiagnosticCategory.Configuration,
  messageTemplate: "not an array: {source}",
  explanation: `The value was expected to be an array such as [a, b].`,
};

export const IW4006: DiagnosticDescriptor = {
  code: 4006,
  severity: "error",
  category: DiagnosticCategory.Configuration,
  messageTemplate: "not a string: {source}",
  explanation: `The value was expected to be a string, not an object or array.`,
};

// ============================================================================
// Catalog Lookup
// ============================================================================

export const DIAGNOSTIC_CATALOG: ReadonlyMap<number, DiagnosticDescriptor> = new Map(
  [
    IW1000,
    IW1001,
    IW1002,
    IW2000,
    IW2001,
    IW2002,
    IW2003,
    IW2004,
    IW2005,
    IW2006,
    IW2007,
    IW2101,
    IW2102,
    IW2103,
    IW2104,
    IW3001,
    IW4001,
    IW4002,
    IW4003,
    IW4004,
    IW4005,
    IW4006,
  ].map((d) => [d.code, d]),
);

export function getDiagnosticDescriptor(code: number): DiagnosticDescriptor | undefined {
  return DIAGNOSTIC_CATALOG.get(code);
}

export function getDiagnosticsByCategory(category: DiagnosticCategory): DiagnosticDescriptor[] {
  return [...DIAGNOSTIC_CATALOG.values()].filter((d) => d.category === category);
}

// ============================================================================
// CLI Renderer: Rust-Style Error Output
// ============================================================================

const COLORS = {
  reset: "\x1b[0m",
  bold: "\x1b[1m",
  red: "\x1b[31m",
  yellow: "\x1b[33m",
  blue: "\x1b[34m",
  cyan: "\x1b[36m",
  green: "\x1b[32m",
} as const;

type ColorName = keyof typeof COLORS;

function severityColor(severity: Severity): "red" | "yellow" | "cyan" {
  switch (severity) {
    case "error":
      return "red";
    case "warning":
      return "yellow";
    case "info":
      return "cyan";
  }
}

/**
 * 1-based line and column of an offset.
 */
export function lineAndColumn(source: string, offset: number): { line: number; column: number } {
  const clamped = Math.max(0, Math.min(offset, source.length));
  let line = 1;
  let lineStart = 0;
  for (let i = 0; i < clamped; i++) {
    if (source.charCodeAt(i) === 10) {
      line++;
      lineStart = i + 1;
    }
  }
  return { line, column: clamped - lineStart + 1 };
}

export interface CLIRenderOptions {
  /** ANSI colors (default: `diagnostics.colors` setting, off under NO_COLOR) */
  colors?: boolean;
  /** Context lines before/after the error (default: `diagnostics.contextLines` setting) */
  contextLines?: number;
  showExplanation?: boolean;
  /** Custom writer function (default: console.error) */
  writer?: (text: string) => void;
}

/**
 * Render a RichDiagnostic in Rust-style format.
 *
 * @example Output:
 * ```
 * error[IW2007]: No span directive registered with name: colour
 *   --> intro.md:3:5
 *    |
 *  2 | Some text
 *  3 | The @:colour(red) sky
 *    |     ^^^^^^^^^^^^^
 *    |
 *    = help: Register the directive through DirectiveSupport.withDirectives
 * ```
 */
export function renderDiagnosticCLI(diagnostic: RichDiagnostic, options: CLIRenderOptions = {}): string {
  const useColors = options.colors ?? (settings.getBoolean("diagnostics.colors", false) && !process.env.NO_COLOR);
  const contextLines = options.contextLines ?? settings.getNumber("diagnostics.contextLines", 1);
  const color = (text: string, ...styles: ColorName[]): string =>
    useColors ? `${styles.map((s) => COLORS[s]).join("")}${text}${COLORS.reset}` : text;

  const lines: string[] = [];
  const severityClr = severityColor(diagnostic.severity);

  lines.push(
    `${color(diagnostic.severity, "bold", severityClr)}${color(`[${formatCode(diagnostic.code)}]`, "bold", severityClr)}: ${color(diagnostic.message, "bold")}`,
  );

  if (diagnostic.span) {
    const { path, source, start, end } = diagnostic.span;
    const startPos = lineAndColumn(source, start);
    const endPos = lineAndColumn(source, Math.max(start, end));
    const sourceLines = source.split("\n");

    lines.push(`  ${color("-->", "blue")} ${path}:${startPos.line}:${startPos.column}`);

    const minLine = Math.max(1, startPos.line - contextLines);
    const maxLine = Math.min(sourceLines.length, endPos.line + contextLines);
    const numWidth = Math.max(2, String(maxLine).length);
    const gutter = " ".repeat(numWidth);
    const bar = color("|", "blue");

    lines.push(` ${gutter} ${bar}`);
    for (let lineNum = minLine; lineNum <= maxLine; lineNum++) {
      const lineText = sourceLines[lineNum - 1] ?? "";
      lines.push(` ${color(String(lineNum).padStart(numWidth, " "), "blue")} ${bar} ${lineText}`);

      if (lineNum >= startPos.line && lineNum <= endPos.line) {
        const fromCol = lineNum === startPos.line ? startPos.column : 1;
        const toCol = lineNum === endPos.line ? endPos.column : lineText.length + 1;
        const underline = " ".repeat(fromCol - 1) + "^".repeat(Math.max(1, toCol - fromCol));
        lines.push(` ${gutter} ${bar} ${color(underline, severityClr)}`);
      }
    }
    lines.push(` ${gutter} ${bar}`);
  }

  for (const note of diagnostic.notes) {
    lines.push(`   ${color("= note:", "bold")} ${note}`);
  }

  if (diagnostic.help) {
    lines.push(`   ${color("= help:", "bold", "green")} ${diagnostic.help}`);
  }

  if (options.showExplanation && diagnostic.explanation) {
    lines.push("");
    lines.push(color("Explanation:", "bold"));
    for (const expLine of diagnostic.explanation.split("\n")) {
      lines.push(`  ${expLine}`);
    }
  }

  return lines.join("\n");
}

/**
 * Render multiple diagnostics with a summary line.
 */
export function renderDiagnosticsCLI(diagnostics: readonly RichDiagnostic[], options: CLIRenderOptions = {}): string {
  if (diagnostics.length === 0) {
    return "";
  }

  const lines: string[] = [];
  for (const diag of diagnostics) {
    lines.push(renderDiagnosticCLI(diag, options));
    lines.push("");
  }

  const errorCount = diagnostics.filter((d) => d.severity === "error").length;
  const warnCount = diagnostics.filter((d) => d.severity === "warning").length;

  const parts: string[] = [];
  if (errorCount > 0) parts.push(`${errorCount} error${errorCount > 1 ? "s" : ""}`);
  if (warnCount > 0) parts.push(`${warnCount} warning${warnCount > 1 ? "s" : ""}`);
  if (parts.length > 0) lines.push(`${parts.join(", ")} generated`);

  return lines.join("\n");
}

export function printDiagnostic(diagnostic: RichDiagnostic, options: CLIRenderOptions = {}): void {
  const writer = options.writer ?? ((text: string) => console.error(text));
  writer(renderDiagnosticCLI(diagnostic, options));
}

export function printDiagnostics(diagnostics: readonly RichDiagnostic[], options: CLIRenderOptions = {}): void {
  const writer = options.writer ?? ((text: string) => console.error(text));
  writer(renderDiagnosticsCLI(diagnostics, options));
}
