// Recursive-descent CSS parser
// Unsupported syntax is skipped at the smallest enclosing unit (selector,
// declaration or at-rule) so one bad fragment never drops a whole stylesheet

import { Cursor, isAsciiLetter, isDigit, isHexDigit } from './cursor.ts';
import { PARSE_MESSAGES } from './errors.ts';
import type { ParseError } from './errors.ts';
import { getLogger } from './logging.ts';
import { color, compareSpecificity, keyword, length, simpleSelector, specificity } from './stylesheet.ts';
import type { Declaration, Rule, Selector, Stylesheet, Value } from './stylesheet.ts';

const logger = getLogger('CssParser');

export interface CssParseResult {
  stylesheet: Stylesheet;
  errors: ParseError[];
}

function isIdentChar(ch: string): boolean {
  return ch !== '' && (isAsciiLetter(ch) || isDigit(ch) || ch === '-' || ch === '_' || ch.charCodeAt(0) >= 0x80);
}

function startsNumber(cursor: Cursor): boolean {
  const ch = cursor.peek();
  if (isDigit(ch)) {
    return true;
  }
  const offset = ch === '-' || ch === '+' ? 1 : 0;
  if (offset === 1 && isDigit(cursor.peek(1))) {
    return true;
  }
  return cursor.peek(offset) === '.' && isDigit(cursor.peek(offset + 1));
}

export class CssParser {
  private _cursor: Cursor;
  private _errors: ParseError[] = [];

  constructor(source: string) {
    this._cursor = new Cursor(source);
  }

  parse(): CssParseResult {
    const stylesheet: Stylesheet = { rules: this.parseRules() };
    if (this._errors.length > 0) {
      logger.debug('Skipped unsupported CSS', { errors: this._errors.length, rules: stylesheet.rules.length });
    }
    return { stylesheet, errors: this._errors };
  }

  /**
   * Rules until end of input
   */
  parseRules(): Rule[] {
    const cursor = this._cursor;
    const rules: Rule[] = [];

    for (;;) {
      this._skipWhitespaceAndComments();
      if (cursor.eof()) {
        break;
      }
      if (cursor.peek() === '@') {
        this._skipAtRule();
        continue;
      }
      if (cursor.peek() === '}') {
        this._error(cursor.pos, PARSE_MESSAGES.invalidDeclaration(''));
        cursor.next();
        continue;
      }
      const rule = this.parseRule();
      if (rule) {
        rules.push(rule);
      }
    }
    return rules;
  }

  /**
   * One `selectors { declarations }` block. Returns null when no selector survived.
   */
  parseRule(): Rule | null {
    const cursor = this._cursor;
    const start = cursor.pos;
    const selectors = this.parseSelectors();

    if (!cursor.eat('{')) {
      this._error(start, PARSE_MESSAGES.missingBlock());
      cursor.consumeWhile(() => true);
      return null;
    }

    const declarations = this.parseDeclarations();
    if (selectors.length === 0) {
      this._error(start, PARSE_MESSAGES.ruleWithoutSelectors());
      return null;
    }
    return { selectors, declarations };
  }

  /**
   * Comma-separated selectors up to `{`, most specific first
   */
  parseSelectors(): Selector[] {
    const cursor = this._cursor;
    const selectors: Selector[] = [];

    for (;;) {
      this._skipWhitespaceAndComments();
      if (cursor.eof() || cursor.peek() === '{') {
        break;
      }
      if (cursor.eat(',')) {
        continue;
      }

      const start = cursor.pos;
      const selector = this.parseSimpleSelector();
      this._skipWhitespaceAndComments();
      const next = cursor.peek();

      if (selector && (next === '' || next === ',' || next === '{')) {
        selectors.push(selector);
      } else {
        // Combinators, pseudo-classes, attribute selectors
        cursor.consumeWhile(ch => ch !== ',' && ch !== '{');
        this._error(start, PARSE_MESSAGES.unsupportedSelector(cursor.source.slice(start, cursor.pos).trim()));
      }
    }

    // Array.prototype.sort is stable, so equal specificities keep source order
    return selectors.sort((a, b) => compareSpecificity(specificity(b), specificity(a)));
  }

  /**
   * Optional type (or `*`) followed by any mix of `#id` and `.class`
   */
  parseSimpleSelector(): Selector | null {
    const cursor = this._cursor;
    let tagName: string | undefined;
    let id: string | undefined;
    const classes: string[] = [];
    let consumed = false;

    if (cursor.eat('*')) {
      consumed = true;
    } else if (isIdentChar(cursor.peek())) {
      tagName = cursor.consumeWhile(isIdentChar).toLowerCase();
      consumed = true;
    }

    for (;;) {
      const ch = cursor.peek();
      if (ch !== '#' && ch !== '.') {
        break;
      }
      cursor.next();
      const name = cursor.consumeWhile(isIdentChar);
      if (name === '') {
        return null;
      }
      if (ch === '#') {
        if (id !== undefined && id !== name) {
          return null;
        }
        id = name;
      } else {
        classes.push(name);
      }
      consumed = true;
    }

    return consumed ? simpleSelector({ tagName, id, classes }) : null;
  }

  /**
   * Declarations after `{`, through the closing `}`
   */
  parseDeclarations(): Declaration[] {
    const cursor = this._cursor;
    const declarations: Declaration[] = [];

    for (;;) {
      this._skipWhitespaceAndComments();
      if (cursor.eof()) {
        this._error(cursor.pos, PARSE_MESSAGES.unterminatedBlock());
        break;
      }
      if (cursor.eat('}')) {
        break;
      }
      if (cursor.eat(';')) {
        continue;
      }
      const declaration = this.parseDeclaration();
      if (declaration) {
        declarations.push(declaration);
      }
    }
    return declarations;
  }

  /**
   * Declarations of a `style` attribute: no braces around them
   */
  parseDeclarationList(): Declaration[] {
    const cursor = this._cursor;
    const declarations: Declaration[] = [];

    for (;;) {
      this._skipWhitespaceAndComments();
      if (cursor.eof()) {
        break;
      }
      if (cursor.eat(';') || cursor.eat('}')) {
        continue;
      }
      const declaration = this.parseDeclaration();
      if (declaration) {
        declarations.push(declaration);
      }
    }
    return declarations;
  }

  /**
   * `property: value` followed by `;`, `}` or end of input.
   * Anything else skips the declaration up to the next `;` or `}`.
   */
  parseDeclaration(): Declaration | null {
    const cursor = this._cursor;
    const start = cursor.pos;
    const property = cursor.consumeWhile(isIdentChar).toLowerCase();
    this._skipWhitespaceAndComments();

    if (property === '' || !cursor.eat(':')) {
      this._skipDeclaration();
      this._error(start, PARSE_MESSAGES.invalidDeclaration(property));
      return null;
    }

    this._skipWhitespaceAndComments();
    const value = this.parseValue();
    this._skipWhitespaceAndComments();

    const next = cursor.peek();
    if (value && (next === '' || next === ';' || next === '}')) {
      cursor.eat(';');
      return { property, value };
    }

    this._skipDeclaration();
    this._error(start, PARSE_MESSAGES.invalidDeclaration(property));
    return null;
  }

  /**
   * Length, color or keyword; null for anything else
   */
  parseValue(): Value | null {
    const cursor = this._cursor;
    if (startsNumber(cursor)) {
      return this._parseLength();
    }
    if (cursor.peek() === '#') {
      return this._parseColor();
    }
    if (isIdentChar(cursor.peek())) {
      return keyword(cursor.consumeWhile(isIdentChar));
    }
    return null;
  }

  private _parseLength(): Value | null {
    const cursor = this._cursor;
    let text = '';
    if (cursor.peek() === '-' || cursor.peek() === '+') {
      text += cursor.next();
    }
    text += cursor.consumeWhile(isDigit);
    if (cursor.peek() === '.' && isDigit(cursor.peek(1))) {
      text += cursor.next();
      text += cursor.consumeWhile(isDigit);
    }

    const parsed = parseFloat(text);
    // Normalise -0 so equal inputs always yield equal values
    const amount = parsed === 0 ? 0 : parsed;
    const unit = cursor.consumeWhile(isIdentChar).toLowerCase();

    if (unit === 'px') {
      return length(amount);
    }
    if (unit === '' && amount === 0 && cursor.peek() !== '%') {
      return length(0);
    }
    return null;
  }

  private _parseColor(): Value | null {
    const cursor = this._cursor;
    cursor.eat('#');
    const digits = cursor.consumeWhile(isHexDigit);
    const channel = (index: number, size: number): number => {
      const part = digits.slice(index * size, index * size + size);
      return parseInt(size === 1 ? part + part : part, 16);
    };

    switch (digits.length) {
      case 3:
        return color(channel(0, 1), channel(1, 1), channel(2, 1));
      case 6:
        return color(channel(0, 2), channel(1, 2), channel(2, 2));
      case 8:
        return color(channel(0, 2), channel(1, 2), channel(2, 2), channel(3, 2));
      default:
        return null;
    }
  }

  private _skipWhitespaceAndComments(): void {
    const cursor = this._cursor;
    for (;;) {
      cursor.consumeWhitespace();
      const start = cursor.pos;
      if (!cursor.eat('/*')) {
        return;
      }
      if (!cursor.consumeThrough('*/').found) {
        this._error(start, PARSE_MESSAGES.unterminatedCssComment());
      }
    }
  }

  /**
   * Skip to the next `;` (consumed) or `}` (left for the block), stepping over quoted strings
   */
  private _skipDeclaration(): void {
    const cursor = this._cursor;
    while (!cursor.eof()) {
      const ch = cursor.peek();
      if (ch === '}') {
        return;
      }
      cursor.next();
      if (ch === ';') {
        return;
      }
      if (ch === '"' || ch === "'") {
        cursor.consumeThrough(ch);
      }
    }
  }

  /**
   * Skip `@name ... ;` or `@name ... { ... }` including nested blocks
   */
  private _skipAtRule(): void {
    const cursor = this._cursor;
    const start = cursor.pos;
    cursor.eat('@');
    const name = cursor.consumeWhile(isIdentChar);
    this._error(start, PARSE_MESSAGES.atRuleSkipped(name));

    let depth = 0;
    while (!cursor.eof()) {
      const ch = cursor.next();
      if (ch === ';' && depth === 0) {
        return;
      }
      if (ch === '{') {
        depth++;
      } else if (ch === '}') {
        depth--;
        if (depth <= 0) {
          return;
        }
      }
    }
  }

  private _error(offset: number, message: string): void {
    const error = this._cursor.errorAt(offset, message);
    this._errors.push(error);
    if (logger.isTraceEnabled()) {
      logger.trace(message, { line: error.line, column: error.column });
    }
  }
}

/**
 * Parse a stylesheet. Never throws.
 */
export function parseCss(source: string): Stylesheet {
  return new CssParser(source).parse().stylesheet;
}

/**
 * Parse a stylesheet and report what was skipped
 */
export function parseCssDocument(source: string): CssParseResult {
  return new CssParser(source).parse();
}

/**
 * Parse the body of a `style` attribute, e.g. "width: 10px; color: #fff"
 */
export function parseDeclarationList(source: string): Declaration[] {
  return new CssParser(source).parseDeclarationList();
}
