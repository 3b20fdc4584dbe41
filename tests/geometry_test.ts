// Tests for box model geometry

import { expect, test } from 'vitest';
import { borderBox, cloneDimensions, emptyDimensions, marginBox, paddingBox, pointInRect } from '../src/geometry.ts';
import type { Dimensions } from '../src/geometry.ts';

function sample(): Dimensions {
  return {
    content: { x: 20, y: 30, width: 100, height: 50 },
    padding: { left: 1, right: 2, top: 3, bottom: 4 },
    border: { left: 5, right: 5, top: 5, bottom: 5 },
    margin: { left: 10, right: 0, top: 10, bottom: 0 },
  };
}

test('outer boxes grow by each edge in turn', () => {
  const d = sample();

  expect(paddingBox(d)).toEqual({ x: 19, y: 27, width: 103, height: 57 });
  expect(borderBox(d)).toEqual({ x: 14, y: 22, width: 113, height: 67 });
  expect(marginBox(d)).toEqual({ x: 4, y: 12, width: 123, height: 77 });
});

test('empty dimensions are all zero', () => {
  expect(marginBox(emptyDimensions())).toEqual({ x: 0, y: 0, width: 0, height: 0 });
});

test('cloneDimensions copies every rectangle', () => {
  const d = sample();
  const copy = cloneDimensions(d);
  copy.content.x = 99;
  copy.margin.left = 99;

  expect(d.content.x).toBe(20);
  expect(d.margin.left).toBe(10);
});

test('pointInRect includes the top-left edge and excludes the bottom-right', () => {
  const rect = { x: 0, y: 0, width: 10, height: 10 };

  expect(pointInRect(0, 0, rect)).toBe(true);
  expect(pointInRect(9.5, 9.5, rect)).toBe(true);
  expect(pointInRect(10, 5, rect)).toBe(false);
  expect(pointInRect(5, -1, rect)).toBe(false);
});
