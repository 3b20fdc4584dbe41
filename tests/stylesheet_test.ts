// Tests for selector matching, specificity and value helpers

import { expect, test } from 'vitest';
import { createElement } from '../src/dom.ts';
import {
  color,
  compareSpecificity,
  firstMatchingSelector,
  formatSelector,
  formatValue,
  isKeyword,
  keyword,
  length,
  selectorMatches,
  simpleSelector,
  specificity,
  toPx,
  valuesEqual,
} from '../src/stylesheet.ts';

const div = createElement('div', { id: 'main', class: 'note wide' });

test('specificity counts ids, classes and type', () => {
  expect(specificity(simpleSelector({ tagName: 'div', id: 'x', classes: ['a', 'b'] }))).toEqual([1, 2, 1]);
  expect(specificity(simpleSelector())).toEqual([0, 0, 0]);
});

test('specificity compares left to right', () => {
  expect(compareSpecificity([1, 0, 0], [0, 9, 9])).toBeGreaterThan(0);
  expect(compareSpecificity([0, 1, 0], [0, 0, 5])).toBeGreaterThan(0);
  expect(compareSpecificity([0, 0, 1], [0, 0, 2])).toBeLessThan(0);
  expect(compareSpecificity([0, 1, 1], [0, 1, 1])).toBe(0);
});

test('selector matches when every part matches', () => {
  expect(selectorMatches(simpleSelector({ tagName: 'div' }), div)).toBe(true);
  expect(selectorMatches(simpleSelector({ id: 'main' }), div)).toBe(true);
  expect(selectorMatches(simpleSelector({ classes: ['note', 'wide'] }), div)).toBe(true);
  expect(selectorMatches(simpleSelector({ tagName: 'div', id: 'main', classes: ['note'] }), div)).toBe(true);
});

test('selector fails when any part differs', () => {
  expect(selectorMatches(simpleSelector({ tagName: 'p' }), div)).toBe(false);
  expect(selectorMatches(simpleSelector({ id: 'other' }), div)).toBe(false);
  expect(selectorMatches(simpleSelector({ classes: ['missing'] }), div)).toBe(false);
  expect(selectorMatches(simpleSelector({ tagName: 'div', classes: ['note', 'missing'] }), div)).toBe(false);
});

test('empty selector matches nothing', () => {
  expect(selectorMatches(simpleSelector(), div)).toBe(false);
});

test('firstMatchingSelector returns the first hit in rule order', () => {
  const rule = {
    selectors: [simpleSelector({ id: 'other' }), simpleSelector({ classes: ['note'] }), simpleSelector({ tagName: 'div' })],
    declarations: [],
  };

  const found = firstMatchingSelector(rule, div);
  expect(found && formatSelector(found)).toBe('.note');
  expect(firstMatchingSelector({ selectors: [simpleSelector({ tagName: 'p' })], declarations: [] }, div)).toBeUndefined();
});

test('formatValue renders CSS text', () => {
  expect(formatValue(keyword('auto'))).toBe('auto');
  expect(formatValue(length(1.5))).toBe('1.5px');
  expect(formatValue(color(255, 255, 255))).toBe('#ffffff');
  expect(formatValue(color(1, 2, 3, 4))).toBe('#01020304');
});

test('formatSelector renders compound selectors', () => {
  expect(formatSelector(simpleSelector({ tagName: 'div', id: 'x', classes: ['a', 'b'] }))).toBe('div#x.a.b');
  expect(formatSelector(simpleSelector())).toBe('*');
});

test('value helpers compare by variant', () => {
  expect(toPx(length(12))).toBe(12);
  expect(toPx(keyword('auto'))).toBe(0);
  expect(isKeyword(keyword('auto'), 'auto')).toBe(true);
  expect(isKeyword(length(0), 'auto')).toBe(false);
  expect(valuesEqual(color(1, 2, 3), color(1, 2, 3, 255))).toBe(true);
  expect(valuesEqual(length(1), keyword('1px'))).toBe(false);
});
