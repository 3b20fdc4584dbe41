// Read position into an immutable source string, shared by the HTML and CSS parsers

import type { ParseError } from './errors.ts';

export type CharPredicate = (ch: string) => boolean;

export function isWhitespace(ch: string): boolean {
  return ch === ' ' || ch === '\t' || ch === '\n' || ch === '\r' || ch === '\f';
}

export function isAsciiLetter(ch: string): boolean {
  return (ch >= 'a' && ch <= 'z') || (ch >= 'A' && ch <= 'Z');
}

export function isDigit(ch: string): boolean {
  return ch >= '0' && ch <= '9';
}

export function isHexDigit(ch: string): boolean {
  return isDigit(ch) || (ch >= 'a' && ch <= 'f') || (ch >= 'A' && ch <= 'F');
}

/**
 * A cursor over source text. The text never changes; only `pos` advances.
 * Each parser owns one cursor, so parse steps can be driven and checked in isolation.
 */
export class Cursor {
  readonly source: string;
  private _pos: number;

  constructor(source: string, pos = 0) {
    this.source = source;
    this._pos = pos;
  }

  get pos(): number {
    return this._pos;
  }

  eof(): boolean {
    return this._pos >= this.source.length;
  }

  /**
   * Character at `pos + offset`, or '' past the end
   */
  peek(offset = 0): string {
    return this.source.charAt(this._pos + offset);
  }

  startsWith(s: string): boolean {
    return this.source.startsWith(s, this._pos);
  }

  next(): string {
    const ch = this.source.charAt(this._pos);
    if (this._pos < this.source.length) {
      this._pos++;
    }
    return ch;
  }

  /**
   * Consume `s` if it is next in the input
   */
  eat(s: string): boolean {
    if (this.startsWith(s)) {
      this._pos += s.length;
      return true;
    }
    return false;
  }

  consumeWhile(test: CharPredicate): string {
    const start = this._pos;
    while (this._pos < this.source.length && test(this.source.charAt(this._pos))) {
      this._pos++;
    }
    return this.source.slice(start, this._pos);
  }

  consumeWhitespace(): void {
    this.consumeWhile(isWhitespace);
  }

  /**
   * Advance past the next occurrence of `terminator`.
   * Returns the text before it, and whether the terminator was found.
   */
  consumeThrough(terminator: string): { text: string; found: boolean } {
    const index = this.source.indexOf(terminator, this._pos);
    if (index === -1) {
      const text = this.source.slice(this._pos);
      this._pos = this.source.length;
      return { text, found: false };
    }
    const text = this.source.slice(this._pos, index);
    this._pos = index + terminator.length;
    return { text, found: true };
  }

  /**
   * 1-based line and column of a source offset
   */
  location(offset = this._pos): { line: number; column: number } {
    let line = 1;
    let lineStart = 0;
    const end = Math.min(offset, this.source.length);
    for (let i = 0; i < end; i++) {
      if (this.source.charCodeAt(i) === 10) {
        line++;
        lineStart = i + 1;
      }
    }
    return { line, column: end - lineStart + 1 };
  }

  errorAt(offset: number, message: string): ParseError {
    return { message, ...this.location(offset) };
  }
}
