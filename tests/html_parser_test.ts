// Tests for the HTML parser

import { expect, test } from 'vitest';
import { getClassSet, getElementId } from '../src/dom.ts';
import type { DomNode, ElementNode } from '../src/dom.ts';
import { PARSE_MESSAGES } from '../src/errors.ts';
import { decodeEntities, extractStyleText, parseHtml, parseHtmlDocument } from '../src/html-parser.ts';

function element(node: DomNode | undefined): ElementNode {
  if (node?.kind !== 'element') {
    throw new Error(`expected an element, got ${node?.kind}`);
  }
  return node;
}

function text(node: DomNode | undefined): string {
  if (node?.kind !== 'text') {
    throw new Error(`expected a text node, got ${node?.kind}`);
  }
  return node.text;
}

test('nested elements with closing tags', () => {
  const { root, errors } = parseHtmlDocument('<a><b>x</b></a>');

  expect(root.tagName).toBe('a');
  expect(root.children).toHaveLength(1);
  const b = element(root.children[0]);
  expect(b.tagName).toBe('b');
  expect(b.children).toHaveLength(1);
  expect(text(b.children[0])).toBe('x');
  expect(errors).toEqual([]);
});

test('missing closing tags are closed at end of input', () => {
  const { root, errors } = parseHtmlDocument('<a><b>x');

  expect(root.tagName).toBe('a');
  const b = element(root.children[0]);
  expect(b.tagName).toBe('b');
  expect(text(b.children[0])).toBe('x');
  expect(errors).toEqual([
    { message: PARSE_MESSAGES.unclosedElement('b'), line: 1, column: 4 },
    { message: PARSE_MESSAGES.unclosedElement('a'), line: 1, column: 1 },
  ]);
});

test('error locations count lines and columns from 1', () => {
  const { errors } = parseHtmlDocument('<div>\n<span>x');

  expect(errors[0]).toEqual({ message: PARSE_MESSAGES.unclosedElement('span'), line: 2, column: 1 });
  expect(errors[1]).toEqual({ message: PARSE_MESSAGES.unclosedElement('div'), line: 1, column: 1 });
});

test('whitespace between tags never becomes a text node', () => {
  const root = parseHtml('<div>\n  <p>hi</p>\n</div>');

  expect(root.children).toHaveLength(1);
  expect(element(root.children[0]).tagName).toBe('p');
});

test('text keeps inner and trailing whitespace', () => {
  const root = parseHtml('<p>hello world </p>');
  expect(text(root.children[0])).toBe('hello world ');
});

test('attributes and class set', () => {
  const root = parseHtml('<div id="main" class="a  b"></div>');

  expect(root.attributes.get('id')).toBe('main');
  expect(root.attributes.get('class')).toBe('a  b');
  expect(getElementId(root)).toBe('main');
  expect([...getClassSet(root)]).toEqual(['a', 'b']);
});

test('tag and attribute names are lower-cased', () => {
  const { root, errors } = parseHtmlDocument('<DIV CLASS="x"></div>');

  expect(root.tagName).toBe('div');
  expect(root.attributes.get('class')).toBe('x');
  expect(errors).toEqual([]);
});

test('first occurrence of a duplicated attribute wins', () => {
  const root = parseHtml('<div id="a" id="b"></div>');
  expect(root.attributes.get('id')).toBe('a');
});

test('unquoted attribute values are read and reported', () => {
  const { root, errors } = parseHtmlDocument('<div id=main></div>');

  expect(root.attributes.get('id')).toBe('main');
  expect(errors).toEqual([{ message: PARSE_MESSAGES.unquotedAttribute('id'), line: 1, column: 9 }]);
});

test('attribute without a value gets the empty string', () => {
  const root = parseHtml('<input disabled>');

  expect(root.tagName).toBe('input');
  expect(root.attributes.get('disabled')).toBe('');
  expect(root.children).toEqual([]);
});

test('void elements take no children', () => {
  const root = parseHtml('<div><br><img src="a.png">text</div>');

  expect(root.children).toHaveLength(3);
  const br = element(root.children[0]);
  const img = element(root.children[1]);
  expect(br.tagName).toBe('br');
  expect(br.children).toEqual([]);
  expect(img.attributes.get('src')).toBe('a.png');
  expect(text(root.children[2])).toBe('text');
});

test('self-closing tag is an empty element', () => {
  const root = parseHtml('<div><p/>x</div>');

  expect(root.children).toHaveLength(2);
  const p = element(root.children[0]);
  expect(p.tagName).toBe('p');
  expect(p.children).toEqual([]);
  expect(text(root.children[1])).toBe('x');
});

test('mismatched closing tag closes the innermost element', () => {
  const { root, errors } = parseHtmlDocument('<div><span>x</div>');

  expect(root.tagName).toBe('div');
  const span = element(root.children[0]);
  expect(span.tagName).toBe('span');
  expect(text(span.children[0])).toBe('x');
  expect(errors).toEqual([
    { message: PARSE_MESSAGES.mismatchedClosingTag('span', 'div'), line: 1, column: 13 },
    { message: PARSE_MESSAGES.unclosedElement('div'), line: 1, column: 1 },
  ]);
});

test('several top-level nodes are wrapped in an implicit html element', () => {
  const { root, errors } = parseHtmlDocument('<p>a</p><p>b</p>');

  expect(root.tagName).toBe('html');
  expect(root.children).toHaveLength(2);
  expect(errors).toEqual([{ message: PARSE_MESSAGES.multipleRoots(2), line: 1, column: 1 }]);
});

test('bare text is wrapped without a diagnostic', () => {
  const { root, errors } = parseHtmlDocument('hello');

  expect(root.tagName).toBe('html');
  expect(text(root.children[0])).toBe('hello');
  expect(errors).toEqual([]);
});

test('empty input yields an empty html element', () => {
  const root = parseHtml('');

  expect(root.tagName).toBe('html');
  expect(root.children).toEqual([]);
});

test('stray top-level closing tag is skipped', () => {
  const { root, errors } = parseHtmlDocument('</p><div></div>');

  expect(root.tagName).toBe('div');
  expect(errors).toEqual([{ message: PARSE_MESSAGES.strayClosingTag('p'), line: 1, column: 1 }]);
});

test('doctype and comments are skipped and split text is merged', () => {
  const root = parseHtml('<!DOCTYPE html><!-- c --><p>a<!-- x -->b</p>');

  expect(root.tagName).toBe('p');
  expect(root.children).toHaveLength(1);
  expect(text(root.children[0])).toBe('ab');
});

test('a < that starts no tag is kept as text', () => {
  const root = parseHtml('<p>1 < 2</p>');

  expect(root.children).toHaveLength(1);
  expect(text(root.children[0])).toBe('1 < 2');
});

test('character references are decoded in text and attributes', () => {
  const root = parseHtml('<p title="a &amp; b">x &lt; y</p>');

  expect(root.attributes.get('title')).toBe('a & b');
  expect(text(root.children[0])).toBe('x < y');
});

test('decodeEntities handles numeric references and leaves unknown ones', () => {
  expect(decodeEntities('&#65;&#x42;&unknown;')).toBe('AB&unknown;');
  expect(decodeEntities('no entities')).toBe('no entities');
});

test('extractStyleText returns style contents in document order', () => {
  const root = parseHtml(
    '<html><head><style>p { color: #fff; }</style></head><body><style>div { width: 1px }</style></body></html>'
  );

  expect(extractStyleText(root)).toEqual(['p { color: #fff; }', 'div { width: 1px }']);
});
