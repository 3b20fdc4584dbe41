// Recursive-descent HTML parser
// Lenient by policy: malformed markup is repaired locally and reported, never thrown

import { Cursor, isAsciiLetter, isWhitespace } from './cursor.ts';
import { createElement, createText, textContent } from './dom.ts';
import type { DomNode, ElementNode } from './dom.ts';
import { PARSE_MESSAGES } from './errors.ts';
import type { ParseError } from './errors.ts';
import { getLogger } from './logging.ts';
import { collectElements } from './utils/tree-traversal.ts';

const logger = getLogger('HtmlParser');

export interface HtmlParseResult {
  root: ElementNode;
  errors: ParseError[];
}

/**
 * Elements that never have children; `<br>` needs no closing tag.
 */
export const VOID_ELEMENTS: ReadonlySet<string> = new Set([
  'area', 'base', 'br', 'col', 'embed', 'hr', 'img', 'input',
  'link', 'meta', 'source', 'track', 'wbr',
]);

const NAMED_ENTITIES: Readonly<Record<string, string>> = {
  amp: '&',
  lt: '<',
  gt: '>',
  quot: '"',
  apos: "'",
  nbsp: ' ',
};

function isTagNameChar(ch: string): boolean {
  return ch !== '' && !isWhitespace(ch) && ch !== '/' && ch !== '>' && ch !== '<';
}

function isAttributeNameChar(ch: string): boolean {
  return isTagNameChar(ch) && ch !== '=';
}

/**
 * Decode the character references the parser understands.
 * Unknown or out-of-range references are left as written.
 */
export function decodeEntities(text: string): string {
  if (!text.includes('&')) {
    return text;
  }
  return text.replace(/&(#[xX][0-9a-fA-F]+|#[0-9]+|[a-zA-Z]+);/g, (match: string, ref: string) => {
    if (ref.startsWith('#')) {
      const hex = ref[1] === 'x' || ref[1] === 'X';
      const codePoint = parseInt(ref.slice(hex ? 2 : 1), hex ? 16 : 10);
      if (codePoint > 0 && codePoint <= 0x10FFFF) {
        return String.fromCodePoint(codePoint);
      }
      return match;
    }
    return NAMED_ENTITIES[ref] ?? match;
  });
}

export class HtmlParser {
  private _cursor: Cursor;
  private _errors: ParseError[] = [];

  constructor(source: string) {
    this._cursor = new Cursor(source);
  }

  /**
   * Parse the whole input into a single root element
   */
  parse(): HtmlParseResult {
    const nodes: DomNode[] = [];

    for (;;) {
      appendNodes(nodes, this.parseNodes());
      if (this._cursor.eof()) {
        break;
      }
      // parseNodes only stops early at a closing tag with nothing open
      const start = this._cursor.pos;
      const name = this._consumeClosingTag();
      this._error(start, PARSE_MESSAGES.strayClosingTag(name));
    }

    let root: ElementNode;
    const [first] = nodes;
    if (nodes.length === 1 && first.kind === 'element') {
      root = first;
    } else {
      if (nodes.length > 1) {
        this._error(0, PARSE_MESSAGES.multipleRoots(nodes.length));
      }
      root = createElement('html', {}, nodes);
    }

    if (this._errors.length > 0) {
      logger.debug('Recovered from malformed HTML', { errors: this._errors.length });
    }
    return { root, errors: this._errors };
  }

  /**
   * Sibling nodes up to a closing tag or end of input
   */
  parseNodes(): DomNode[] {
    const nodes: DomNode[] = [];
    const cursor = this._cursor;

    for (;;) {
      cursor.consumeWhitespace();
      if (cursor.eof() || cursor.startsWith('</')) {
        break;
      }
      if (this._skipMarkupDeclaration()) {
        continue;
      }
      appendNodes(nodes, [this.parseNode()]);
    }
    return nodes;
  }

  parseNode(): DomNode {
    const cursor = this._cursor;
    if (cursor.peek() === '<' && isAsciiLetter(cursor.peek(1))) {
      return this.parseElement();
    }
    return this.parseText();
  }

  /**
   * A run of text up to the next `<`. A `<` that starts no tag is kept as text.
   */
  parseText(): DomNode {
    const cursor = this._cursor;
    let text = '';
    if (cursor.peek() === '<') {
      text += cursor.next();
    }
    text += cursor.consumeWhile(ch => ch !== '<');
    return createText(decodeEntities(text));
  }

  parseElement(): ElementNode {
    const cursor = this._cursor;
    const start = cursor.pos;

    cursor.eat('<');
    const tagName = cursor.consumeWhile(isTagNameChar).toLowerCase();
    const attributes = this.parseAttributes();

    if (cursor.eat('/>')) {
      return createElement(tagName, attributes);
    }
    if (!cursor.eat('>')) {
      this._error(start, PARSE_MESSAGES.unclosedElement(tagName));
      return createElement(tagName, attributes);
    }
    if (VOID_ELEMENTS.has(tagName)) {
      return createElement(tagName, attributes);
    }

    const children = this.parseNodes();

    if (cursor.eof()) {
      this._error(start, PARSE_MESSAGES.unclosedElement(tagName));
      return createElement(tagName, attributes, children);
    }

    // Any closing tag ends the innermost open element, matching or not
    const closeStart = cursor.pos;
    const closeName = this._consumeClosingTag();
    if (closeName !== tagName) {
      this._error(closeStart, PARSE_MESSAGES.mismatchedClosingTag(tagName, closeName));
    }
    return createElement(tagName, attributes, children);
  }

  /**
   * `name="value"` pairs up to `>` or `/>`
   */
  parseAttributes(): Map<string, string> {
    const cursor = this._cursor;
    const attributes = new Map<string, string>();

    for (;;) {
      cursor.consumeWhitespace();
      if (cursor.eof() || cursor.peek() === '>' || cursor.startsWith('/>')) {
        break;
      }
      if (cursor.peek() === '/') {
        cursor.next();
        continue;
      }

      const name = cursor.consumeWhile(isAttributeNameChar).toLowerCase();
      if (name === '') {
        // Stray `=`, quote or `<`: drop one character and carry on
        cursor.next();
        continue;
      }

      cursor.consumeWhitespace();
      let value = '';
      if (cursor.eat('=')) {
        cursor.consumeWhitespace();
        const valueStart = cursor.pos;
        if (cursor.eat('"')) {
          const { text, found } = cursor.consumeThrough('"');
          if (!found) {
            this._error(valueStart, PARSE_MESSAGES.unterminatedAttribute(name));
          }
          value = decodeEntities(text);
        } else {
          value = decodeEntities(cursor.consumeWhile(ch => !isWhitespace(ch) && ch !== '>'));
          this._error(valueStart, PARSE_MESSAGES.unquotedAttribute(name));
        }
      }

      if (!attributes.has(name)) {
        attributes.set(name, value);
      }
    }
    return attributes;
  }

  private _consumeClosingTag(): string {
    const cursor = this._cursor;
    cursor.eat('</');
    const name = cursor.consumeWhile(isTagNameChar).toLowerCase();
    cursor.consumeThrough('>');
    return name;
  }

  /**
   * Skip `<!-- -->`, `<!DOCTYPE>` and `<? >`. Returns true if something was skipped.
   */
  private _skipMarkupDeclaration(): boolean {
    const cursor = this._cursor;
    const start = cursor.pos;

    if (cursor.eat('<!--')) {
      if (!cursor.consumeThrough('-->').found) {
        this._error(start, PARSE_MESSAGES.unterminatedComment());
      }
      return true;
    }
    if (cursor.startsWith('<!') || cursor.startsWith('<?')) {
      cursor.consumeThrough('>');
      return true;
    }
    return false;
  }

  private _error(offset: number, message: string): void {
    const error = this._cursor.errorAt(offset, message);
    this._errors.push(error);
    if (logger.isTraceEnabled()) {
      logger.trace(message, { line: error.line, column: error.column });
    }
  }
}

// Adjacent text runs (split by a literal `<` or a comment) become one node
function appendNodes(target: DomNode[], nodes: readonly DomNode[]): void {
  for (const node of nodes) {
    const last = target[target.length - 1];
    if (node.kind === 'text' && last !== undefined && last.kind === 'text') {
      target[target.length - 1] = createText(last.text + node.text);
    } else {
      target.push(node);
    }
  }
}

/**
 * Parse an HTML document. Never throws.
 */
export function parseHtml(source: string): ElementNode {
  return new HtmlParser(source).parse().root;
}

/**
 * Parse an HTML document and report what was repaired along the way
 */
export function parseHtmlDocument(source: string): HtmlParseResult {
  return new HtmlParser(source).parse();
}

/**
 * Text of every `<style>` element, in document order
 */
export function extractStyleText(root: DomNode): string[] {
  return collectElements(root, element => element.tagName === 'style').map(textContent);
}
