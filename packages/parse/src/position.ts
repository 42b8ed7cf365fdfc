/**
 * Immutable input positions.
 *
 * A position pairs the full input with an offset and the current markup
 * nesting depth. Every parse step returns a new position; nothing is mutated.
 */

export class SourcePosition {
  constructor(
    readonly input: string,
    readonly offset: number = 0,
    readonly nestLevel: number = 0,
  ) {}

  get atEnd(): boolean {
    return this.offset >= this.input.length;
  }

  /** Number of characters left */
  get remaining(): number {
    return Math.max(0, this.input.length - this.offset);
  }

  /** The character at the offset, or "" at end of input */
  get char(): string {
    return this.charAt(0);
  }

  /** UTF-16 code at the offset, or -1 at end of input */
  get code(): number {
    return this.atEnd ? -1 : this.input.charCodeAt(this.offset);
  }

  charAt(relative: number): string {
    const index = this.offset + relative;
    return index >= 0 && index < this.input.length ? this.input[index] : "";
  }

  /** The next `n` characters, without consuming them */
  capture(n: number): string {
    return this.input.slice(this.offset, this.offset + n);
  }

  consume(n: number): SourcePosition {
    return this.moveTo(this.offset + n);
  }

  moveTo(offset: number): SourcePosition {
    const clamped = Math.max(0, Math.min(offset, this.input.length));
    return clamped === this.offset ? this : new SourcePosition(this.input, clamped, this.nestLevel);
  }

  nested(): SourcePosition {
    return this.withNestLevel(this.nestLevel + 1);
  }

  withNestLevel(level: number): SourcePosition {
    return level === this.nestLevel ? this : new SourcePosition(this.input, this.offset, level);
  }

  /** 1-based line number, computed on demand */
  get line(): number {
    let line = 1;
    for (let i = 0; i < this.offset; i++) {
      if (this.input.charCodeAt(i) === 10) line++;
    }
    return line;
  }

  /** 1-based column, computed on demand */
  get column(): number {
    return this.offset - this.lineStart + 1;
  }

  /** Text of the line containing the offset, without its newline */
  get lineContent(): string {
    const end = this.input.indexOf("\n", this.offset);
    return this.input.slice(this.lineStart, end === -1 ? this.input.length : end);
  }

  private get lineStart(): number {
    return this.offset === 0 ? 0 : this.input.lastIndexOf("\n", this.offset - 1) + 1;
  }
}
