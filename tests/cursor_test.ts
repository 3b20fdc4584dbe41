// Tests for the source cursor shared by both parsers

import { expect, test } from 'vitest';
import { Cursor, isDigit, isHexDigit, isWhitespace } from '../src/cursor.ts';

test('consumes characters and stops at the end', () => {
  const cursor = new Cursor('ab');

  expect(cursor.next()).toBe('a');
  expect(cursor.peek()).toBe('b');
  expect(cursor.peek(1)).toBe('');
  expect(cursor.next()).toBe('b');
  expect(cursor.eof()).toBe(true);
  expect(cursor.next()).toBe('');
  expect(cursor.pos).toBe(2);
});

test('consumeWhile and eat', () => {
  const cursor = new Cursor('123abc');

  expect(cursor.consumeWhile(isDigit)).toBe('123');
  expect(cursor.eat('ab')).toBe(true);
  expect(cursor.eat('x')).toBe(false);
  expect(cursor.pos).toBe(5);
});

test('consumeThrough reports whether the terminator was found', () => {
  const cursor = new Cursor('a-->b');

  expect(cursor.consumeThrough('-->')).toEqual({ text: 'a', found: true });
  expect(cursor.consumeThrough('-->')).toEqual({ text: 'b', found: false });
  expect(cursor.eof()).toBe(true);
});

test('location counts lines and columns from 1', () => {
  const cursor = new Cursor('ab\ncd\n');

  expect(cursor.location(0)).toEqual({ line: 1, column: 1 });
  expect(cursor.location(4)).toEqual({ line: 2, column: 2 });
  expect(cursor.location(6)).toEqual({ line: 3, column: 1 });
  expect(cursor.errorAt(3, 'x')).toEqual({ message: 'x', line: 2, column: 1 });
});

test('character classes', () => {
  expect(isWhitespace('\f')).toBe(true);
  expect(isWhitespace('a')).toBe(false);
  expect(isHexDigit('F')).toBe(true);
  expect(isHexDigit('g')).toBe(false);
});
