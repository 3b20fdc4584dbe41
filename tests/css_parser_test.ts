// Tests for the CSS parser

import { expect, test } from 'vitest';
import { parseCss, parseCssDocument, parseDeclarationList } from '../src/css-parser.ts';
import { PARSE_MESSAGES } from '../src/errors.ts';
import { color, formatSelector, keyword, length, simpleSelector } from '../src/stylesheet.ts';
import type { Rule } from '../src/stylesheet.ts';

function onlyRule(source: string): Rule {
  const { rules } = parseCss(source);
  expect(rules).toHaveLength(1);
  return rules[0];
}

test('single rule with a length declaration', () => {
  const rule = onlyRule('div { width: 100px; }');

  expect(rule.selectors).toEqual([simpleSelector({ tagName: 'div' })]);
  expect(rule.declarations).toEqual([{ property: 'width', value: length(100) }]);
});

test('compound selectors', () => {
  const rule = onlyRule('div#main.note.wide { display: block }');
  const [selector] = rule.selectors;

  expect(selector.tagName).toBe('div');
  expect(selector.id).toBe('main');
  expect([...selector.classes]).toEqual(['note', 'wide']);
});

test('selectors are sorted by descending specificity', () => {
  const rule = onlyRule('p, #x, .a.b, div.a { color: #000 }');
  expect(rule.selectors.map(formatSelector)).toEqual(['#x', '.a.b', 'div.a', 'p']);
});

test('selectors of equal specificity keep source order', () => {
  const rule = onlyRule('b, a { color: #000 }');
  expect(rule.selectors.map(formatSelector)).toEqual(['b', 'a']);
});

test('hex colors in three, six and eight digit forms', () => {
  const rule = onlyRule('p { color: #ff0000; background-color: #abc; border-color: #01020304 }');

  expect(rule.declarations).toEqual([
    { property: 'color', value: color(255, 0, 0) },
    { property: 'background-color', value: color(170, 187, 204) },
    { property: 'border-color', value: color(1, 2, 3, 4) },
  ]);
});

test('keywords are kept verbatim, property names lower-cased', () => {
  const rule = onlyRule('P { WIDTH: 10PX; Display: Block }');

  expect(rule.selectors).toEqual([simpleSelector({ tagName: 'p' })]);
  expect(rule.declarations).toEqual([
    { property: 'width', value: length(10) },
    { property: 'display', value: keyword('Block') },
  ]);
});

test('numbers may be signed and fractional; unitless zero is 0px', () => {
  const rule = onlyRule('p { margin-top: -10px; width: 1.5px; height: .5px; margin: 0 }');

  expect(rule.declarations).toEqual([
    { property: 'margin-top', value: length(-10) },
    { property: 'width', value: length(1.5) },
    { property: 'height', value: length(0.5) },
    { property: 'margin', value: length(0) },
  ]);
});

test('unsupported units and unitless non-zero numbers are skipped', () => {
  const { stylesheet, errors } = parseCssDocument('p { width: 50%; margin: 5; height: 2em; color: #fff }');

  expect(stylesheet.rules[0].declarations).toEqual([{ property: 'color', value: color(255, 255, 255) }]);
  expect(errors.map(error => error.message)).toEqual([
    PARSE_MESSAGES.invalidDeclaration('width'),
    PARSE_MESSAGES.invalidDeclaration('margin'),
    PARSE_MESSAGES.invalidDeclaration('height'),
  ]);
});

test('multi-value declarations are skipped up to the next semicolon', () => {
  const { stylesheet, errors } = parseCssDocument('p { margin: 0 auto; color: #000 }');

  expect(stylesheet.rules[0].declarations).toEqual([{ property: 'color', value: color(0, 0, 0) }]);
  expect(errors).toEqual([{ message: PARSE_MESSAGES.invalidDeclaration('margin'), line: 1, column: 5 }]);
});

test('unsupported selectors are dropped individually', () => {
  const { stylesheet, errors } = parseCssDocument('div p, .ok { color: #fff }');

  expect(stylesheet.rules[0].selectors.map(formatSelector)).toEqual(['.ok']);
  expect(errors).toEqual([{ message: PARSE_MESSAGES.unsupportedSelector('div p'), line: 1, column: 1 }]);
});

test('a rule left without selectors is dropped after its block', () => {
  const { stylesheet, errors } = parseCssDocument('a:hover { color: #fff } p { width: 1px }');

  expect(stylesheet.rules).toHaveLength(1);
  expect(stylesheet.rules[0].selectors.map(formatSelector)).toEqual(['p']);
  expect(errors.map(error => error.message)).toEqual([
    PARSE_MESSAGES.unsupportedSelector('a:hover'),
    PARSE_MESSAGES.ruleWithoutSelectors(),
  ]);
});

test('universal selector alone yields an empty selector', () => {
  const rule = onlyRule('* { color: #fff }');
  expect(rule.selectors).toEqual([simpleSelector()]);
});

test('at-rules are skipped whole', () => {
  const { stylesheet, errors } = parseCssDocument(
    '@import url(x.css); @media screen { p { color: #f00 } } div { width: 10px }'
  );

  expect(stylesheet.rules).toHaveLength(1);
  expect(stylesheet.rules[0].selectors.map(formatSelector)).toEqual(['div']);
  expect(errors.map(error => error.message)).toEqual([
    PARSE_MESSAGES.atRuleSkipped('import'),
    PARSE_MESSAGES.atRuleSkipped('media'),
  ]);
});

test('comments count as whitespace', () => {
  const rule = onlyRule('/* c */ p /* d */ { /* e */ width: /* f */ 10px /* g */; }');
  expect(rule.declarations).toEqual([{ property: 'width', value: length(10) }]);
});

test('missing block skips the rest of the input', () => {
  const { stylesheet, errors } = parseCssDocument('div');

  expect(stylesheet.rules).toEqual([]);
  expect(errors).toEqual([{ message: PARSE_MESSAGES.missingBlock(), line: 1, column: 1 }]);
});

test('unterminated block keeps the declarations read so far', () => {
  const { stylesheet, errors } = parseCssDocument('p { width: 10px');

  expect(stylesheet.rules[0].declarations).toEqual([{ property: 'width', value: length(10) }]);
  expect(errors.map(error => error.message)).toEqual([PARSE_MESSAGES.unterminatedBlock()]);
});

test('rules without declarations are kept', () => {
  const rule = onlyRule('p {}');
  expect(rule.declarations).toEqual([]);
});

test('declaration list of a style attribute', () => {
  expect(parseDeclarationList('width: 10px; color: #00ff00')).toEqual([
    { property: 'width', value: length(10) },
    { property: 'color', value: color(0, 255, 0) },
  ]);
  expect(parseDeclarationList('')).toEqual([]);
});

test('parsing never throws on garbage', () => {
  const { stylesheet } = parseCssDocument('}}} {{ ;; @ # . , :');
  expect(stylesheet.rules.every(rule => rule.selectors.length > 0)).toBe(true);
});
